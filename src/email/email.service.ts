import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as imapSimple from 'imap-simple';
import { simpleParser, ParsedMail } from 'mailparser';
import { EmailAttachment, FetchOptions, MailSource, ParsedEmail } from '../common/interfaces';
import { FetchError, errorMessage } from '../common/errors';
import { withTimeout } from '../common/with-timeout';
import { buildBodyPreview, formatImapDate, formatSender, toFetchError } from './mail-helpers';

interface ImapSession {
  connection?: imapSimple.ImapSimple;
  closed: boolean;
}

/**
 * Source de mails IMAP
 */
@Injectable()
export class EmailService implements MailSource {
  private readonly logger = new Logger(EmailService.name);

  constructor(private configService: ConfigService) {}

  private getImapConfig(): imapSimple.ImapSimpleOptions {
    return {
      imap: {
        host: this.configService.get<string>('imap.host', 'imap.gmail.com'),
        port: this.configService.get<number>('imap.port', 993),
        user: this.configService.get<string>('imap.user', ''),
        password: this.configService.get<string>('imap.password', ''),
        tls: this.configService.get<boolean>('imap.tls', true),
        authTimeout: this.configService.get<number>('imap.authTimeout', 10000),
        tlsOptions: this.configService.get('imap.tlsOptions'),
      },
    };
  }

  private get folder(): string {
    return this.configService.get<string>('imap.folder', 'INBOX');
  }

  private get bodyPreviewLength(): number {
    return this.configService.get<number>('monitor.bodyPreviewLength', 500);
  }

  /**
   * Emails reçus depuis `since`, pièces jointes incluses.
   * Toute erreur est traduite en FetchError (auth, réseau, throttling, timeout).
   * La connexion est fermée ici, y compris quand le timeout abandonne une recherche bloquée.
   */
  async fetchMessages(since: Date, options: FetchOptions): Promise<ParsedEmail[]> {
    const session: ImapSession = { closed: false };

    try {
      return await withTimeout(
        this.search(since, session),
        options.timeoutMs,
        () => new FetchError('timeout', `IMAP timeout après ${options.timeoutMs} ms`),
      );
    } catch (error) {
      const fetchError = toFetchError(error);
      this.logger.error(`Erreur IMAP (${fetchError.kind}): ${fetchError.message}`);
      throw fetchError;
    } finally {
      session.closed = true;
      session.connection?.end();
    }
  }

  private async search(since: Date, session: ImapSession): Promise<ParsedEmail[]> {
    const connection = await imapSimple.connect(this.getImapConfig());

    // Connexion obtenue après le timeout: personne ne la fermera plus
    if (session.closed) {
      connection.end();
      throw new FetchError('timeout', 'Connexion IMAP établie après abandon');
    }
    session.connection = connection;
    this.logger.debug('Connexion IMAP établie');

    await connection.openBox(this.folder);

    // SINCE ne tient compte que de la date: l'heure est filtrée après parsing
    const messages = await connection.search([['SINCE', formatImapDate(since)]], {
      bodies: [''],
      struct: true,
      markSeen: false,
    });

    this.logger.log(`${messages.length} message(s) dans ${this.folder} depuis ${formatImapDate(since)}`);

    const parsedEmails: ParsedEmail[] = [];
    for (const message of messages) {
      const all = message.parts.find((part) => part.which === '');
      if (!all) continue;

      const parsed = await this.parseMessage(message.attributes.uid, all.body);
      if (parsed && parsed.receivedAt.getTime() >= since.getTime()) {
        parsedEmails.push(parsed);
      }
    }

    return parsedEmails;
  }

  private async parseMessage(uid: number, source: Buffer | string): Promise<ParsedEmail | null> {
    try {
      const parsed: ParsedMail = await simpleParser(source);

      // Pièces jointes nommées uniquement (les images inline n'en ont pas)
      const attachments: EmailAttachment[] = parsed.attachments.flatMap((att) =>
        att.filename
          ? [{ filename: att.filename, mimeHint: att.contentType, rawBytes: att.content }]
          : [],
      );

      return {
        // Message-ID stable entre redémarrages et dossiers, UID en secours
        id: parsed.messageId || `uid:${uid}`,
        sender: formatSender(parsed.from?.text),
        subject: parsed.subject || '(sans objet)',
        receivedAt: parsed.date || new Date(),
        bodyPreview: buildBodyPreview(parsed.text, this.bodyPreviewLength),
        attachments,
      };
    } catch (error) {
      this.logger.error(`Erreur parsing email ${uid}: ${errorMessage(error)}`);
      return null;
    }
  }
}
