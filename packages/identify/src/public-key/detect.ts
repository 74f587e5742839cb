/**
 * Public-key detection.
 *
 * Decodes the input as hex (optional 0x), Base58 or Bech32 and recognizes
 * the key shape:
 *
 * - 65 bytes, tag 04       → uncompressed secp256k1 (must lie on the curve)
 * - 33 bytes, tag 02 / 03  → compressed secp256k1 (must decompress)
 * - 32 bytes               → Ed25519-compatible (sr25519 included)
 */

import { err, ok, type Result } from "neverthrow";
import {
  CodecError,
  base58Decode,
  bech32Decode,
  fromWords,
  hexDecode,
  hexEncode,
  isEd25519Shaped,
  parseSecp256k1PublicKey,
  type Secp256k1PublicKey,
} from "@chainprobe/codec";
import type { InputSignature } from "@chainprobe/types";

/** Bech32-wrapped keys may exceed the 90-character address limit. */
const BECH32_KEY_MAX_LENGTH = 1023;

export type KeyEncoding = "hex" | "base58" | "bech32";

interface DetectedKeyBase {
  /** Key bytes exactly as supplied */
  readonly raw: Uint8Array;
  readonly encoding: KeyEncoding;

  /** Canonical text form of the supplied key */
  readonly normalized: string;
}

export interface Secp256k1Key extends DetectedKeyBase {
  readonly keyType: "secp256k1";
  readonly point: Secp256k1PublicKey;
}

export interface Ed25519Key extends DetectedKeyBase {
  readonly keyType: "ed25519";
}

export type DetectedKey = Secp256k1Key | Ed25519Key;

interface DecodedBytes {
  readonly bytes: Uint8Array;
  readonly encoding: KeyEncoding;
  readonly normalized: string;
}

function classify({ bytes, encoding, normalized }: DecodedBytes): Result<DetectedKey, CodecError> {
  const tag = bytes[0];
  if ((bytes.length === 65 && tag === 0x04) || (bytes.length === 33 && (tag === 0x02 || tag === 0x03))) {
    return parseSecp256k1PublicKey(bytes).map((point) => ({
      keyType: "secp256k1" as const,
      raw: bytes,
      encoding,
      normalized,
      point,
    }));
  }
  if (bytes.length === 32) {
    return isEd25519Shaped(bytes)
      ? ok({ keyType: "ed25519" as const, raw: bytes, encoding, normalized })
      : err(new CodecError("INVALID_POINT", "32 bytes but not a canonical Ed25519 encoding"));
  }
  return err(new CodecError("INVALID_LENGTH", `No public-key shape is ${bytes.length} bytes`));
}

function decodings(signature: InputSignature): Result<DecodedBytes, CodecError>[] {
  const { input } = signature;
  const attempts: Result<DecodedBytes, CodecError>[] = [];

  if (signature.hex !== undefined) {
    attempts.push(
      hexDecode(input).map((bytes) => ({ bytes, encoding: "hex" as const, normalized: hexEncode(bytes, true) })),
    );
  }
  if (signature.base58 !== undefined) {
    attempts.push(base58Decode(input).map((bytes) => ({ bytes, encoding: "base58" as const, normalized: input })));
  }
  if (signature.bech32 !== undefined) {
    attempts.push(
      bech32Decode(input, BECH32_KEY_MAX_LENGTH)
        .andThen((decoded) => fromWords(decoded.words))
        .map((bytes) => ({ bytes, encoding: "bech32" as const, normalized: input.toLowerCase() })),
    );
  }
  return attempts;
}

/**
 * The first interpretation of the input that is a recognizable public key.
 * Fails with the first rejection when none is.
 */
export function detectPublicKey(signature: InputSignature): Result<DetectedKey, CodecError> {
  let firstError: CodecError | undefined;
  for (const attempt of decodings(signature)) {
    const key = attempt.andThen(classify);
    if (key.isOk()) return key;
    firstError ??= key.error;
  }
  return err(firstError ?? new CodecError("INVALID_FORMAT", "Input is not hex, Base58 or Bech32"));
}
