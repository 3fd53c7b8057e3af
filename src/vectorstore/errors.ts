/**
 * errors.ts - Error types raised by the route index
 */

/**
 * Raised when a caller hands the index an unusable batch, such as parallel
 * arrays of different lengths or an empty route label.
 */
export class IndexInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IndexInputError";
  }
}

/**
 * Raised when a JSON field stored in the backend cannot be decoded into the
 * shape the index expects.
 */
export class PayloadDecodeError extends Error {
  public readonly field: string;
  public readonly details?: unknown;

  constructor(field: string, message: string, details?: unknown) {
    super(`Malformed stored payload in "${field}": ${message}`);
    this.name = "PayloadDecodeError";
    this.field = field;
    this.details = details;
  }
}
