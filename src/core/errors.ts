/**
 * Erreurs fatales d'un import. Les anomalies d'extraction par inscription
 * ne passent jamais par ici: elles dégradent le champ à null/vide.
 */

export class FeedImportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/**
 * Aucun bundle candidat: ni l'index, ni les sondes HEAD (aujourd'hui..J-2)
 */
export class DiscoveryError extends FeedImportError {
  constructor(
    readonly baseUrl: string,
    readonly probedUrls: string[],
    cause?: unknown
  ) {
    super(`Aucun bundle récent trouvé sous ${baseUrl} (sondes: ${probedUrls.length})`, cause);
  }
}

/**
 * Téléchargement impossible après épuisement des tentatives
 */
export class FetchError extends FeedImportError {
  constructor(
    readonly attempts: number,
    cause: unknown
  ) {
    super(`Échec de téléchargement après ${attempts} tentative(s): ${describeError(cause)}`, cause);
  }
}

export class ArchiveError extends FeedImportError {}

/**
 * Échec pendant la réconciliation; la transaction du run a été annulée
 */
export class ReconciliationError extends FeedImportError {
  constructor(cause: unknown) {
    super(`Réconciliation annulée (rollback): ${describeError(cause)}`, cause);
  }
}

export class RunLockError extends FeedImportError {
  constructor(
    readonly heldBy: string,
    readonly acquiredAtUtc: string,
    cause?: unknown
  ) {
    super(`Import déjà en cours (instance ${heldBy}, depuis ${acquiredAtUtc})`, cause);
  }
}

export class ConfigError extends FeedImportError {
  constructor(readonly problems: string[]) {
    super(`Configuration invalide: ${problems.join('; ')}`);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function describeError(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}
