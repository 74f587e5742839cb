/**
 * Per-format address codec.
 *
 * `decodeAddress` validates an input against one registered address format
 * (checksum plus structural constraints); `encodeAddress` produces the
 * canonical string for a decoded value. For every accepted input,
 * `encodeAddress(format, decodeAddress(format, x))` is the canonical form of x.
 */

import { err, ok, type Result } from "neverthrow";
import {
  BECH32_MAX_LENGTH,
  CodecError,
  base58CheckDecode,
  base58CheckEncode,
  base58Decode,
  base58Encode,
  bech32Decode,
  bech32Encode,
  checksumFromBytes,
  fromWords,
  hexDecode,
  hexEncode,
  ss58Decode,
  ss58Encode,
  toWords,
  verifyEip55,
  type Bech32Variant,
} from "@chainprobe/codec";
import type { AddressFormat } from "@chainprobe/registry";

/** SS58 account payloads: a 32-byte key or a 33-byte compressed ECDSA key. */
const SS58_ACCOUNT_LENGTHS: ReadonlySet<number> = new Set([32, 33]);

export type DecodedAddress =
  | {
      readonly encoding: "hex";
      readonly bytes: Uint8Array;
      readonly checksummed: boolean;
    }
  | {
      readonly encoding: "base58check";
      readonly version: number;
      readonly payload: Uint8Array;
    }
  | {
      readonly encoding: "bech32";
      readonly hrp: string;
      readonly variant: Bech32Variant;
      readonly witnessVersion?: number;
      readonly program: Uint8Array;
    }
  | {
      readonly encoding: "base58";
      readonly bytes: Uint8Array;
    }
  | {
      readonly encoding: "ss58";
      readonly prefix: number;
      readonly payload: Uint8Array;
    };

function lengthError(what: string, expected: string, actual: number): CodecError {
  return new CodecError("INVALID_LENGTH", `${what} must be ${expected} bytes, got ${actual}`);
}

// =============================================================================
// Decode
// =============================================================================

function decodeHex(format: Extract<AddressFormat, { encoding: "hex" }>, input: string): Result<DecodedAddress, CodecError> {
  if (format.checksum === "eip55") {
    return verifyEip55(input, format.byteLength).map((verified) => ({
      encoding: "hex" as const,
      bytes: verified.bytes,
      checksummed: verified.checksummed,
    }));
  }
  if (!input.startsWith(format.prefix)) {
    return err(new CodecError("INVALID_PREFIX", `Expected prefix "${format.prefix}"`));
  }
  return hexDecode(input.slice(format.prefix.length)).andThen((bytes) =>
    bytes.length === format.byteLength
      ? ok({ encoding: "hex" as const, bytes, checksummed: false })
      : err(lengthError("Hex address", String(format.byteLength), bytes.length)),
  );
}

function decodeBech32(
  format: Extract<AddressFormat, { encoding: "bech32" }>,
  input: string,
): Result<DecodedAddress, CodecError> {
  return bech32Decode(input, format.maxLength ?? BECH32_MAX_LENGTH).andThen((decoded) => {
    if (!format.hrps.includes(decoded.hrp)) {
      return err(new CodecError("INVALID_PREFIX", `HRP '${decoded.hrp}' is not one of ${format.hrps.join(", ")}`));
    }
    if (decoded.variant !== format.variant) {
      return err(new CodecError("INVALID_CHECKSUM", `Expected a ${format.variant} checksum, found ${decoded.variant}`));
    }

    let words = decoded.words;
    const witnessVersion = format.witnessVersion;
    if (witnessVersion !== undefined) {
      if (words[0] !== witnessVersion) {
        return err(new CodecError("INVALID_FORMAT", `Expected witness version ${witnessVersion}, found ${words[0] ?? "none"}`));
      }
      words = words.slice(1);
    }

    return fromWords(words).andThen((program) => {
      const { min, max } = format.programLength;
      if (program.length < min || program.length > max) {
        return err(lengthError("Program", min === max ? String(min) : `${min}..${max}`, program.length));
      }
      return ok({
        encoding: "bech32" as const,
        hrp: decoded.hrp,
        variant: decoded.variant,
        ...(witnessVersion !== undefined ? { witnessVersion } : {}),
        program,
      });
    });
  });
}

/**
 * Validate `input` against a single address format.
 */
export function decodeAddress(format: AddressFormat, input: string): Result<DecodedAddress, CodecError> {
  switch (format.encoding) {
    case "hex":
      return decodeHex(format, input);

    case "base58check":
      return base58CheckDecode(input).andThen(({ version, payload }) => {
        if (version !== format.version) {
          return err(new CodecError("INVALID_PREFIX", `Version byte 0x${version.toString(16).padStart(2, "0")} is not 0x${format.version.toString(16).padStart(2, "0")}`));
        }
        if (payload.length !== format.payloadLength) {
          return err(lengthError("Payload", String(format.payloadLength), payload.length));
        }
        return ok({ encoding: "base58check" as const, version, payload });
      });

    case "bech32":
      return decodeBech32(format, input);

    case "base58":
      return base58Decode(input).andThen((bytes) =>
        bytes.length === format.byteLength
          ? ok({ encoding: "base58" as const, bytes })
          : err(lengthError("Base58 payload", String(format.byteLength), bytes.length)),
      );

    case "ss58":
      return ss58Decode(input).andThen(({ prefix, payload }) => {
        if (prefix !== format.prefix && !format.acceptUnregistered) {
          return err(new CodecError("INVALID_PREFIX", `SS58 prefix ${prefix} is not ${format.prefix}`));
        }
        if (!SS58_ACCOUNT_LENGTHS.has(payload.length)) {
          return err(lengthError("SS58 account", "32 or 33", payload.length));
        }
        return ok({ encoding: "ss58" as const, prefix, payload });
      });

    default: {
      const exhaustive: never = format;
      return exhaustive;
    }
  }
}

// =============================================================================
// Encode
// =============================================================================

function formatMismatch(format: AddressFormat, decoded: DecodedAddress): CodecError {
  return new CodecError("INVALID_ARGUMENT", `Cannot encode a ${decoded.encoding} value with a ${format.encoding} format`);
}

/**
 * Canonical string for a decoded address under `format`.
 */
export function encodeAddress(format: AddressFormat, decoded: DecodedAddress): Result<string, CodecError> {
  switch (decoded.encoding) {
    case "hex":
      if (format.encoding !== "hex") return err(formatMismatch(format, decoded));
      return ok(
        format.checksum === "eip55"
          ? checksumFromBytes(decoded.bytes)
          : `${format.prefix}${hexEncode(decoded.bytes)}`,
      );

    case "base58check":
      if (format.encoding !== "base58check") return err(formatMismatch(format, decoded));
      return base58CheckEncode(decoded.version, decoded.payload);

    case "bech32": {
      if (format.encoding !== "bech32") return err(formatMismatch(format, decoded));
      const words = toWords(decoded.program);
      return bech32Encode(
        decoded.hrp,
        decoded.witnessVersion !== undefined ? [decoded.witnessVersion, ...words] : words,
        decoded.variant,
        format.maxLength ?? BECH32_MAX_LENGTH,
      );
    }

    case "base58":
      if (format.encoding !== "base58") return err(formatMismatch(format, decoded));
      return ok(base58Encode(decoded.bytes));

    case "ss58":
      if (format.encoding !== "ss58") return err(formatMismatch(format, decoded));
      return ss58Encode(decoded.prefix, decoded.payload);

    default: {
      const exhaustive: never = decoded;
      return exhaustive;
    }
  }
}
