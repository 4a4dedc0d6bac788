import { Injectable, Logger } from '@nestjs/common';
import { AttachmentClassifierService } from '../parser/attachment-classifier.service';
import { MatchRecord, ParsedEmail } from '../common/interfaces';

@Injectable()
export class MessageEvaluatorService {
  private readonly logger = new Logger(MessageEvaluatorService.name);

  constructor(private readonly classifier: AttachmentClassifierService) {}

  /**
   * Évaluer un email: retourne un MatchRecord si au moins une pièce jointe
   * contient le mot-clé, sinon null.
   */
  async evaluate(email: ParsedEmail, keyword: string): Promise<MatchRecord | null> {
    if (email.attachments.length === 0) {
      return null;
    }

    // Les pièces jointes sont indépendantes: classification en parallèle
    const results = await Promise.all(
      email.attachments.map((attachment) => this.classifier.classify(attachment, keyword)),
    );

    // Promise.all conserve l'ordre d'origine des pièces jointes
    const matchedFilenames = results.filter((r) => r.matched).map((r) => r.filename);

    if (matchedFilenames.length === 0) {
      return null;
    }

    this.logger.log(`Mot-clé "${keyword}" trouvé dans ${matchedFilenames.join(', ')} (email ${email.id})`);

    return {
      messageId: email.id,
      sender: email.sender,
      subject: email.subject,
      receivedAt: email.receivedAt,
      bodyPreview: email.bodyPreview,
      matchedFilenames,
    };
  }
}
