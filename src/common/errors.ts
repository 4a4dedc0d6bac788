/**
 * Taxonomie des erreurs du moteur de surveillance.
 *
 * Les erreurs sous le niveau message ne remontent jamais jusqu'au cycle,
 * celles sous le niveau cycle n'arrêtent jamais le scheduler.
 */
export class MonitorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Configuration invalide, fatale pour start(), jamais appliquée partiellement
 */
export class ConfigError extends MonitorError {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
  }
}

export type FetchErrorKind = 'auth' | 'network' | 'rate_limited' | 'timeout';

/**
 * Source de mails indisponible: le cycle est abandonné, l'état reste intact,
 * le tick suivant réessaie.
 */
export class FetchError extends MonitorError {
  readonly retryable = true;

  constructor(
    readonly kind: FetchErrorKind,
    message: string,
  ) {
    super(message);
  }
}

/**
 * Pièce jointe illisible. Reste locale à la pièce jointe.
 */
export class DecodeError extends MonitorError {
  constructor(
    readonly filename: string,
    readonly reason: string,
  ) {
    super(`${filename}: ${reason}`);
  }
}

/**
 * Le dedup store a reçu un résultat différent pour un message déjà évalué.
 * Signale un bug de logique: à remonter bruyamment.
 */
export class ConsistencyError extends MonitorError {
  constructor(
    readonly messageId: string,
    message: string,
  ) {
    super(message);
  }
}

export class SchedulerStateError extends MonitorError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
