/**
 * Hex encoding.
 *
 * Decoding accepts an optional 0x / 0X prefix and either case.
 * Encoding is always lowercase.
 */

import { err, ok, type Result } from "neverthrow";
import { CodecError } from "../errors.js";

const HEX_BODY = /^[0-9a-fA-F]*$/;

/**
 * Split a hex string into its body and whether it carried a 0x prefix.
 */
export function stripHexPrefix(text: string): { readonly body: string; readonly prefixed: boolean } {
  if (text.startsWith("0x") || text.startsWith("0X")) {
    return { body: text.slice(2), prefixed: true };
  }
  return { body: text, prefixed: false };
}

export function isHex(text: string): boolean {
  const { body } = stripHexPrefix(text);
  return body.length > 0 && HEX_BODY.test(body);
}

export function hexDecode(text: string): Result<Uint8Array, CodecError> {
  const { body } = stripHexPrefix(text);
  if (!HEX_BODY.test(body)) {
    return err(new CodecError("INVALID_CHARACTER", `Non-hex character in "${text}"`));
  }
  if (body.length % 2 !== 0) {
    return err(new CodecError("INVALID_LENGTH", `Odd number of hex digits (${body.length})`));
  }
  return ok(Uint8Array.from(Buffer.from(body, "hex")));
}

export function hexEncode(bytes: Uint8Array, prefix = false): string {
  const body = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
  return prefix ? `0x${body}` : body;
}
