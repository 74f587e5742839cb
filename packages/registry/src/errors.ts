/**
 * @chainprobe/registry — Registry errors.
 *
 * Thrown while building or querying a registry. Identification of
 * well-formed input never raises these.
 */

export type RegistryErrorCode =
  | "INVALID_DESCRIPTOR"
  | "DUPLICATE_CHAIN"
  | "UNKNOWN_CHAIN";

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}
