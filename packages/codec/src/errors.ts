/**
 * @chainprobe/codec — Error type for encoding and checksum primitives.
 *
 * Primitives never throw on malformed input; they return
 * `err(new CodecError(...))` and let callers decide.
 */

export type CodecErrorCode =
  | "INVALID_CHARACTER"
  | "INVALID_FORMAT"
  | "INVALID_LENGTH"
  | "INVALID_CHECKSUM"
  | "MIXED_CASE"
  | "INVALID_PADDING"
  | "INVALID_PREFIX"
  | "INVALID_POINT"
  | "INVALID_ARGUMENT";

export class CodecError extends Error {
  public readonly code: CodecErrorCode;

  constructor(code: CodecErrorCode, message: string) {
    super(message);
    this.name = "CodecError";
    this.code = code;
  }
}
