/**
 * Base58Check: Base58 over `version ‖ payload ‖ checksum`, where the
 * checksum is the first 4 bytes of SHA-256(SHA-256(version ‖ payload)).
 */

import { err, ok, type Result } from "neverthrow";
import { CodecError } from "../errors.js";
import { base58Decode, base58Encode } from "../encoding/base58.js";
import { doubleSha256 } from "../crypto/hash.js";
import { bytesEqual, concatBytes } from "../bytes.js";

const CHECKSUM_LENGTH = 4;

export interface Base58CheckPayload {
  readonly version: number;
  readonly payload: Uint8Array;
}

export function base58CheckChecksum(body: Uint8Array): Uint8Array {
  return doubleSha256(body).subarray(0, CHECKSUM_LENGTH);
}

export function base58CheckEncode(version: number, payload: Uint8Array): Result<string, CodecError> {
  if (!Number.isInteger(version) || version < 0 || version > 0xff) {
    return err(new CodecError("INVALID_ARGUMENT", `Version ${version} is not a single byte`));
  }
  const body = concatBytes(Uint8Array.of(version), payload);
  return ok(base58Encode(concatBytes(body, base58CheckChecksum(body))));
}

export function base58CheckDecode(text: string): Result<Base58CheckPayload, CodecError> {
  return base58Decode(text).andThen((bytes) => {
    if (bytes.length < 1 + CHECKSUM_LENGTH) {
      return err(new CodecError("INVALID_LENGTH", `Base58Check data too short (${bytes.length} bytes)`));
    }
    const body = bytes.subarray(0, bytes.length - CHECKSUM_LENGTH);
    const checksum = bytes.subarray(bytes.length - CHECKSUM_LENGTH);
    if (!bytesEqual(base58CheckChecksum(body), checksum)) {
      return err(new CodecError("INVALID_CHECKSUM", "Base58Check checksum mismatch"));
    }
    return ok({ version: body[0] ?? 0, payload: Uint8Array.from(body.subarray(1)) });
  });
}
