import { FetchError, FetchErrorKind, errorMessage } from '../common/errors';

/**
 * "Nom" <adresse@domaine> → Nom. Sinon la chaîne d'origine.
 */
export function formatSender(sender: string | undefined): string {
  const raw = (sender ?? '').trim();
  if (!raw) return 'Expéditeur inconnu';

  const quoted = raw.match(/^\s*"?([^"]*?)"?\s*<.+@.+>\s*$/);
  if (quoted && quoted[1]) {
    return quoted[1].trim();
  }

  return raw;
}

/**
 * Aperçu du corps: espaces normalisés, tronqué à maxLength caractères
 */
export function buildBodyPreview(body: string | undefined, maxLength: number): string {
  const collapsed = (body ?? '').replace(/\s+/g, ' ').trim();
  if (collapsed.length <= maxLength) return collapsed;
  return `${collapsed.slice(0, maxLength).trimEnd()}…`;
}

// Format IMAP: DD-Mon-YYYY (ex: 1-Jan-2024)
export function formatImapDate(date: Date): string {
  const months = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
  return `${date.getUTCDate()}-${months[date.getUTCMonth()]}-${date.getUTCFullYear()}`;
}

const readField = (error: unknown, field: string): string | undefined => {
  if (typeof error !== 'object' || error === null) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
};

/**
 * Traduit une erreur node-imap / socket en FetchError
 */
export function toFetchError(error: unknown): FetchError {
  if (error instanceof FetchError) return error;

  const message = errorMessage(error);
  const source = readField(error, 'source');
  const textCode = readField(error, 'textCode');
  const code = readField(error, 'code');

  let kind: FetchErrorKind = 'network';
  if (
    source === 'authentication' ||
    textCode === 'AUTHENTICATIONFAILED' ||
    textCode === 'AUTHORIZATIONFAILED' ||
    /invalid credentials|authentication failed/i.test(message)
  ) {
    kind = 'auth';
  } else if (textCode === 'THROTTLED' || /throttl|rate limit|too many/i.test(message)) {
    kind = 'rate_limited';
  } else if (source === 'timeout' || source === 'timeout-auth' || code === 'ETIMEDOUT') {
    kind = 'timeout';
  }

  return new FetchError(kind, message);
}
