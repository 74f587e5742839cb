/**
 * SS58 (Substrate) addresses.
 *
 * Layout: Base58(prefix ‖ payload ‖ checksum).
 *
 * - prefix 0..63 is one byte
 * - prefix 64..16383 is two bytes: 0x40 | (prefix >> 8), prefix & 0xFF
 * - first bytes >= 0x80 are reserved
 * - checksum = Blake2b-512("SS58PRE" ‖ prefix bytes ‖ payload), truncated
 *   to 2 bytes for 32/33-byte payloads and 1 byte for 1/2/4/8-byte ones
 */

import { err, ok, type Result } from "neverthrow";
import { CodecError } from "../errors.js";
import { base58Decode, base58Encode } from "../encoding/base58.js";
import { blake2b } from "../crypto/hash.js";
import { bytesEqual, concatBytes, utf8Bytes } from "../bytes.js";

export const SS58_MAX_PREFIX = 16383;

const CONTEXT = utf8Bytes("SS58PRE");

/** Payload length → checksum length. */
const CHECKSUM_LENGTHS: ReadonlyMap<number, number> = new Map([
  [1, 1],
  [2, 1],
  [4, 1],
  [8, 1],
  [32, 2],
  [33, 2],
]);

export interface Ss58Address {
  readonly prefix: number;
  readonly payload: Uint8Array;
}

export function ss58PrefixBytes(prefix: number): Result<Uint8Array, CodecError> {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > SS58_MAX_PREFIX) {
    return err(new CodecError("INVALID_PREFIX", `SS58 prefix ${prefix} is outside 0..${SS58_MAX_PREFIX}`));
  }
  if (prefix < 64) return ok(Uint8Array.of(prefix));
  return ok(Uint8Array.of(0x40 | (prefix >> 8), prefix & 0xff));
}

export function ss58Checksum(prefixBytes: Uint8Array, payload: Uint8Array, length: number): Uint8Array {
  return blake2b(concatBytes(CONTEXT, prefixBytes, payload), 64).subarray(0, length);
}

export function ss58Encode(prefix: number, payload: Uint8Array): Result<string, CodecError> {
  const checksumLength = CHECKSUM_LENGTHS.get(payload.length);
  if (checksumLength === undefined) {
    return err(new CodecError("INVALID_LENGTH", `Unsupported SS58 payload length ${payload.length}`));
  }
  return ss58PrefixBytes(prefix).map((prefixBytes) =>
    base58Encode(concatBytes(prefixBytes, payload, ss58Checksum(prefixBytes, payload, checksumLength))),
  );
}

export function ss58Decode(text: string): Result<Ss58Address, CodecError> {
  return base58Decode(text).andThen((bytes) => {
    const first = bytes[0];
    if (first === undefined) {
      return err(new CodecError("INVALID_LENGTH", "Empty SS58 data"));
    }
    if (first >= 0x80) {
      return err(new CodecError("INVALID_PREFIX", `Reserved SS58 prefix byte 0x${first.toString(16)}`));
    }

    let prefix: number;
    let prefixLength: number;
    if (first < 64) {
      prefix = first;
      prefixLength = 1;
    } else {
      const second = bytes[1];
      if (second === undefined) {
        return err(new CodecError("INVALID_LENGTH", "Truncated two-byte SS58 prefix"));
      }
      prefix = ((first & 0x3f) << 8) | second;
      prefixLength = 2;
      if (prefix < 64) {
        return err(new CodecError("INVALID_PREFIX", `Non-canonical two-byte encoding of SS58 prefix ${prefix}`));
      }
    }

    const rest = bytes.length - prefixLength;
    let payloadLength: number | undefined;
    for (const [candidate, checksumLength] of CHECKSUM_LENGTHS) {
      if (candidate + checksumLength === rest) payloadLength = candidate;
    }
    if (payloadLength === undefined) {
      return err(new CodecError("INVALID_LENGTH", `Unsupported SS58 length (${bytes.length} bytes)`));
    }

    const checksumLength = CHECKSUM_LENGTHS.get(payloadLength) ?? 2;
    const prefixBytes = bytes.subarray(0, prefixLength);
    const payload = bytes.subarray(prefixLength, prefixLength + payloadLength);
    const checksum = bytes.subarray(prefixLength + payloadLength);
    if (!bytesEqual(ss58Checksum(prefixBytes, payload, checksumLength), checksum)) {
      return err(new CodecError("INVALID_CHECKSUM", "SS58 checksum mismatch"));
    }
    return ok({ prefix, payload: Uint8Array.from(payload) });
  });
}
