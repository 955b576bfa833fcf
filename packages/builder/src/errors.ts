/**
 * Errors raised while loading the dataset and resolving user-supplied names.
 * All of them are fatal to a run.
 */

/** The snapshot (or alias file) is missing, malformed, truncated or of an unsupported version */
export class DataLoadError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(source ? `${message} (${source})` : message);
    this.name = "DataLoadError";
  }
}

/** A prefixed custom name has no entry in the alias table */
export class UnknownAliasError extends Error {
  constructor(public readonly label: string) {
    super(`Unknown custom name: "${label}"`);
    this.name = "UnknownAliasError";
  }
}

/** A canonical name (or the target of an alias) matches no system in the dataset */
export class UnknownPointError extends Error {
  constructor(public readonly label: string) {
    super(`System not found: "${label}"`);
    this.name = "UnknownPointError";
  }
}
