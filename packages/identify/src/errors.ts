/**
 * Identification errors.
 *
 * `identify` never throws on malformed input; it returns one of these
 * inside a neverthrow `Err`.
 */

export type IdentificationErrorCode =
  /** No encoding or chain matches, or a checksum/structure check failed */
  | "INVALID_INPUT"
  /** A key class was recognized but no registered chain derives from it */
  | "NOT_IMPLEMENTED";

export class IdentificationError extends Error {
  public readonly code: IdentificationErrorCode;

  /** Why each attempted interpretation was rejected */
  public readonly reasons: readonly string[];

  constructor(code: IdentificationErrorCode, message: string, reasons: readonly string[] = []) {
    super(message);
    this.name = "IdentificationError";
    this.code = code;
    this.reasons = reasons;
  }
}
