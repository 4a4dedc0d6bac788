export interface EmailAttachment {
  filename: string;
  mimeHint: string;          // Content-Type annoncé par l'expéditeur (peut être faux)
  rawBytes: Buffer;
}

export interface ParsedEmail {
  id: string;                // Identifiant attribué par la source, unique dans la boîte
  sender: string;
  subject: string;
  receivedAt: Date;
  bodyPreview: string;
  attachments: EmailAttachment[];
}

/**
 * Résultat d'extraction d'une pièce jointe (jamais persisté)
 */
export type ExtractionResult =
  | { kind: 'text'; text: string }
  | { kind: 'listing'; entries: string[]; text: string } // Archive: noms d'entrées uniquement
  | { kind: 'unsupported' }
  | { kind: 'decode_error'; reason: string };

export type ExtractionOutcome = ExtractionResult['kind'];

export interface AttachmentMatch {
  filename: string;
  matched: boolean;
  outcome: ExtractionOutcome;
  reason?: string;
}

export interface MatchRecord {
  messageId: string;
  sender: string;
  subject: string;
  receivedAt: Date;
  bodyPreview: string;
  matchedFilenames: string[];
}

export interface PollConfig {
  keyword: string;
  lookbackDays: number;
  intervalSeconds: number;
  fetchTimeoutMs?: number;
  concurrency?: number;
}

export interface FetchOptions {
  timeoutMs: number;
}

/**
 * Source de mails consommée par le moteur (IMAP en production, fake en test)
 */
export interface MailSource {
  fetchMessages(since: Date, options: FetchOptions): Promise<ParsedEmail[]>;
}

/**
 * Destination des nouvelles correspondances. Fire-and-forget pour le moteur.
 */
export interface NotificationSink {
  notify(record: MatchRecord): Promise<void>;
}

export const MAIL_SOURCE = Symbol('MAIL_SOURCE');
export const NOTIFICATION_SINK = Symbol('NOTIFICATION_SINK');
