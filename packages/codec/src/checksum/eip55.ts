/**
 * EIP-55 mixed-case checksum for hex account addresses.
 *
 * Hash the lowercase hex body (no 0x) with Keccak-256. A letter at index i
 * is uppercase iff hash nibble i is >= 8. Digits carry no information.
 *
 * An all-lowercase or all-uppercase address is valid but unchecksummed.
 * A mixed-case address must match the checksum exactly.
 */

import { err, ok, type Result } from "neverthrow";
import { CodecError } from "../errors.js";
import { hexDecode, hexEncode, stripHexPrefix } from "../encoding/hex.js";
import { keccak256 } from "../crypto/hash.js";
import { utf8Bytes } from "../bytes.js";

export const EVM_ADDRESS_LENGTH = 20;

export interface Eip55Address {
  readonly bytes: Uint8Array;

  /** True when the input carried a verified mixed-case checksum */
  readonly checksummed: boolean;

  /** Checksummed 0x form */
  readonly normalized: string;
}

function applyChecksum(lowerBody: string): string {
  const hash = hexEncode(keccak256(utf8Bytes(lowerBody)));
  let out = "0x";
  for (let i = 0; i < lowerBody.length; i++) {
    const ch = lowerBody.charAt(i);
    out += parseInt(hash.charAt(i), 16) >= 8 ? ch.toUpperCase() : ch;
  }
  return out;
}

/** Checksummed address for raw address bytes. */
export function checksumFromBytes(bytes: Uint8Array): string {
  return applyChecksum(hexEncode(bytes));
}

export function toChecksumAddress(
  address: string,
  byteLength: number = EVM_ADDRESS_LENGTH,
): Result<string, CodecError> {
  return hexDecode(address).andThen((bytes) => {
    if (bytes.length !== byteLength) {
      return err(new CodecError("INVALID_LENGTH", `Expected ${byteLength} bytes, got ${bytes.length}`));
    }
    return ok(checksumFromBytes(bytes));
  });
}

export function verifyEip55(
  address: string,
  byteLength: number = EVM_ADDRESS_LENGTH,
): Result<Eip55Address, CodecError> {
  const { body, prefixed } = stripHexPrefix(address);
  if (!prefixed) {
    return err(new CodecError("INVALID_PREFIX", "Hex address must start with 0x"));
  }
  return toChecksumAddress(address, byteLength).andThen((normalized) => {
    const bytes = Uint8Array.from(Buffer.from(body, "hex"));
    if (body === body.toLowerCase() || body === body.toUpperCase()) {
      return ok({ bytes, checksummed: false, normalized });
    }
    if (`0x${body}` !== normalized) {
      return err(new CodecError("INVALID_CHECKSUM", "EIP-55 checksum mismatch"));
    }
    return ok({ bytes, checksummed: true, normalized });
  });
}
