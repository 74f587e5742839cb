/**
 * secp256k1 public-key handling.
 *
 * Curve: y² = x³ + 7 over GF(p), p = 2²⁵⁶ − 2³² − 977.
 * Since p ≡ 3 (mod 4), a square root of a is a^((p+1)/4) mod p.
 *
 * Only public points are handled here: no scalars, no signing.
 */

import { err, ok, type Result } from "neverthrow";
import { CodecError } from "../errors.js";
import { hexEncode } from "../encoding/hex.js";

export const SECP256K1_P = 0xfffffffffffffffffffffffffffffffffffffffffffffffffffffffefffffc2fn;

const CURVE_B = 7n;
const SQRT_EXPONENT = (SECP256K1_P + 1n) / 4n;

export type Secp256k1Form = "compressed" | "uncompressed";

export interface Secp256k1PublicKey {
  /** Serialization the key was supplied in */
  readonly form: Secp256k1Form;

  /** 33 bytes: 02/03 ‖ x */
  readonly compressed: Uint8Array;

  /** 65 bytes: 04 ‖ x ‖ y */
  readonly uncompressed: Uint8Array;
}

// =============================================================================
// Field arithmetic
// =============================================================================

function mod(a: bigint): bigint {
  const r = a % SECP256K1_P;
  return r >= 0n ? r : r + SECP256K1_P;
}

function powMod(base: bigint, exponent: bigint): bigint {
  let result = 1n;
  let b = mod(base);
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) result = mod(result * b);
    b = mod(b * b);
    e >>= 1n;
  }
  return result;
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  return bytes.length === 0 ? 0n : BigInt(`0x${hexEncode(bytes)}`);
}

function bigIntTo32Bytes(value: bigint): Uint8Array {
  return Uint8Array.from(Buffer.from(value.toString(16).padStart(64, "0"), "hex"));
}

function curveRhs(x: bigint): bigint {
  return mod(x * x * x + CURVE_B);
}

// =============================================================================
// Points
// =============================================================================

export function isOnCurve(x: bigint, y: bigint): boolean {
  if (x < 0n || y < 0n || x >= SECP256K1_P || y >= SECP256K1_P) return false;
  return mod(y * y) === curveRhs(x);
}

/**
 * Expand a 33-byte compressed key (02/03 ‖ x) to 65 bytes (04 ‖ x ‖ y).
 */
export function decompressPublicKey(bytes: Uint8Array): Result<Uint8Array, CodecError> {
  if (bytes.length !== 33) {
    return err(new CodecError("INVALID_LENGTH", `Compressed key must be 33 bytes, got ${bytes.length}`));
  }
  const tag = bytes[0];
  if (tag !== 0x02 && tag !== 0x03) {
    return err(new CodecError("INVALID_PREFIX", `Compressed key tag must be 02 or 03, got ${hexEncode(bytes.subarray(0, 1))}`));
  }

  const x = bytesToBigInt(bytes.subarray(1));
  if (x >= SECP256K1_P) {
    return err(new CodecError("INVALID_POINT", "x coordinate is not a field element"));
  }

  const rhs = curveRhs(x);
  let y = powMod(rhs, SQRT_EXPONENT);
  if (mod(y * y) !== rhs) {
    return err(new CodecError("INVALID_POINT", "x coordinate has no point on secp256k1"));
  }
  if ((y & 1n) !== BigInt(tag & 1)) {
    y = SECP256K1_P - y;
  }

  const out = new Uint8Array(65);
  out[0] = 0x04;
  out.set(bytes.subarray(1), 1);
  out.set(bigIntTo32Bytes(y), 33);
  return ok(out);
}

/**
 * Compress a 65-byte uncompressed key, validating that it lies on the curve.
 */
export function compressPublicKey(bytes: Uint8Array): Result<Uint8Array, CodecError> {
  if (bytes.length !== 65) {
    return err(new CodecError("INVALID_LENGTH", `Uncompressed key must be 65 bytes, got ${bytes.length}`));
  }
  if (bytes[0] !== 0x04) {
    return err(new CodecError("INVALID_PREFIX", `Uncompressed key tag must be 04, got ${hexEncode(bytes.subarray(0, 1))}`));
  }

  const x = bytesToBigInt(bytes.subarray(1, 33));
  const y = bytesToBigInt(bytes.subarray(33));
  if (!isOnCurve(x, y)) {
    return err(new CodecError("INVALID_POINT", "Point is not on secp256k1"));
  }

  const out = new Uint8Array(33);
  out[0] = (y & 1n) === 0n ? 0x02 : 0x03;
  out.set(bytes.subarray(1, 33), 1);
  return ok(out);
}

/**
 * Parse either serialization, returning both.
 */
export function parseSecp256k1PublicKey(bytes: Uint8Array): Result<Secp256k1PublicKey, CodecError> {
  if (bytes.length === 33) {
    return decompressPublicKey(bytes).map((uncompressed) => ({
      form: "compressed" as const,
      compressed: Uint8Array.from(bytes),
      uncompressed,
    }));
  }
  if (bytes.length === 65) {
    return compressPublicKey(bytes).map((compressed) => ({
      form: "uncompressed" as const,
      compressed,
      uncompressed: Uint8Array.from(bytes),
    }));
  }
  return err(new CodecError("INVALID_LENGTH", `secp256k1 key must be 33 or 65 bytes, got ${bytes.length}`));
}
