import { Inject, Injectable, Logger } from '@nestjs/common';
import { AttachmentMatch, EmailAttachment, ExtractionResult } from '../common/interfaces';
import { errorMessage } from '../common/errors';
import { containsKeyword } from '../common/keyword';
import { selectFormat } from './format-dispatch';
import { EXTRACTORS, ExtractorTable, UNSUPPORTED, decodeFailure } from './extractors';

@Injectable()
export class AttachmentClassifierService {
  private readonly logger = new Logger(AttachmentClassifierService.name);

  constructor(@Inject(EXTRACTORS) private readonly extractors: ExtractorTable) {}

  /**
   * Extraire le texte d'une pièce jointe. Ne lève jamais d'exception.
   */
  async extract(attachment: EmailAttachment): Promise<ExtractionResult> {
    const format = selectFormat(attachment.filename, attachment.mimeHint);
    if (!format) return UNSUPPORTED;

    try {
      return await this.extractors[format](attachment);
    } catch (error) {
      return decodeFailure(`erreur inattendue (${format}): ${errorMessage(error)}`);
    }
  }

  /**
   * Classifier une pièce jointe: le mot-clé apparaît-il dans son texte ?
   */
  async classify(attachment: EmailAttachment, keyword: string): Promise<AttachmentMatch> {
    const result = await this.extract(attachment);
    const { filename } = attachment;

    switch (result.kind) {
      case 'text':
        return { filename, matched: containsKeyword(result.text, keyword), outcome: 'text' };

      case 'listing': {
        const matched = containsKeyword(result.text, keyword);
        if (matched) {
          this.logger.debug(`"${keyword}" trouvé dans les noms d'entrées de l'archive ${filename} (contenu non analysé)`);
        }
        return { filename, matched, outcome: 'listing' };
      }

      case 'unsupported':
        this.logger.debug(`Type de pièce jointe non supporté: ${filename} (${attachment.mimeHint})`);
        return { filename, matched: false, outcome: 'unsupported' };

      case 'decode_error':
        this.logger.warn(`Pièce jointe illisible ${filename}: ${result.reason}`);
        return { filename, matched: false, outcome: 'decode_error', reason: result.reason };
    }
  }
}
