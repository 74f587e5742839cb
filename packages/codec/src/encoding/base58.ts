/**
 * Base58 (Bitcoin alphabet).
 *
 * The alphabet omits 0, O, I and l. Leading zero bytes map to leading '1's.
 */

import bs58 from "bs58";
import { err, ok, type Result } from "neverthrow";
import { CodecError } from "../errors.js";

export const BASE58_ALPHABET = "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

const ALPHABET_SET = new Set(BASE58_ALPHABET);

export function isBase58(text: string): boolean {
  if (text.length === 0) return false;
  for (const ch of text) {
    if (!ALPHABET_SET.has(ch)) return false;
  }
  return true;
}

export function base58Encode(bytes: Uint8Array): string {
  return bs58.encode(bytes);
}

export function base58Decode(text: string): Result<Uint8Array, CodecError> {
  if (text.length === 0) {
    return err(new CodecError("INVALID_LENGTH", "Empty Base58 string"));
  }
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (!ALPHABET_SET.has(ch)) {
      return err(new CodecError("INVALID_CHARACTER", `Invalid Base58 character '${ch}' at position ${i}`));
    }
  }
  const bytes = bs58.decodeUnsafe(text);
  if (bytes === undefined) {
    return err(new CodecError("INVALID_CHARACTER", `Invalid Base58 string "${text}"`));
  }
  return ok(Uint8Array.from(bytes));
}
