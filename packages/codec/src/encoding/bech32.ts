/**
 * Bech32 / Bech32m (BIP-173, BIP-350).
 *
 * A string is `hrp ‖ "1" ‖ data ‖ checksum`, where data and checksum are
 * 5-bit groups written in CHARSET. The two variants differ only in the
 * constant the checksum polymod is XORed with.
 *
 * Design rules:
 * - Decoding rejects mixed case; canonical output is lowercase
 * - The separator is the last '1' in the string
 * - Segwit framing (witness version + program) is the caller's concern
 */

import { err, ok, type Result } from "neverthrow";
import { CodecError } from "../errors.js";

export type Bech32Variant = "bech32" | "bech32m";

export const BECH32_CHARSET = "qpzry9x8gf2tvdw0s3jn54khce6mua7l";

/** Default maximum string length from BIP-173. */
export const BECH32_MAX_LENGTH = 90;

const CHECKSUM_LENGTH = 6;

const GENERATOR = [0x3b6a57b2, 0x26508e6d, 0x1ea119fa, 0x3d4233dd, 0x2a1462b3] as const;

const VARIANT_CONSTANT: Readonly<Record<Bech32Variant, number>> = {
  bech32: 1,
  bech32m: 0x2bc830a3,
};

export interface Bech32Decoded {
  /** Lowercased human-readable part */
  readonly hrp: string;

  /** 5-bit data groups, checksum removed */
  readonly words: readonly number[];

  readonly variant: Bech32Variant;
}

// =============================================================================
// Checksum
// =============================================================================

export function bech32Polymod(values: readonly number[]): number {
  let chk = 1;
  for (const value of values) {
    const top = chk >> 25;
    chk = ((chk & 0x1ffffff) << 5) ^ value;
    for (let i = 0; i < 5; i++) {
      if ((top >> i) & 1) chk ^= GENERATOR[i] ?? 0;
    }
  }
  return chk;
}

export function hrpExpand(hrp: string): number[] {
  const ret: number[] = [];
  for (let i = 0; i < hrp.length; i++) ret.push(hrp.charCodeAt(i) >> 5);
  ret.push(0);
  for (let i = 0; i < hrp.length; i++) ret.push(hrp.charCodeAt(i) & 31);
  return ret;
}

export function bech32CreateChecksum(
  hrp: string,
  words: readonly number[],
  variant: Bech32Variant,
): number[] {
  const values = [...hrpExpand(hrp), ...words, 0, 0, 0, 0, 0, 0];
  const mod = bech32Polymod(values) ^ VARIANT_CONSTANT[variant];
  const ret: number[] = [];
  for (let p = 0; p < CHECKSUM_LENGTH; p++) {
    ret.push((mod >> (5 * (5 - p))) & 31);
  }
  return ret;
}

/**
 * Verify the checksum over `words` (checksum included).
 * Returns the variant whose constant matched, or undefined.
 */
export function bech32VerifyChecksum(
  hrp: string,
  words: readonly number[],
): Bech32Variant | undefined {
  const residue = bech32Polymod([...hrpExpand(hrp), ...words]);
  if (residue === VARIANT_CONSTANT.bech32) return "bech32";
  if (residue === VARIANT_CONSTANT.bech32m) return "bech32m";
  return undefined;
}

// =============================================================================
// Bit regrouping
// =============================================================================

/**
 * Regroup a sequence of `fromBits`-wide values into `toBits`-wide values.
 *
 * With `pad = false` the trailing bits must be fewer than `fromBits` and
 * all zero; anything else is a padding error.
 */
export function convertBits(
  data: ArrayLike<number>,
  fromBits: number,
  toBits: number,
  pad: boolean,
): Result<number[], CodecError> {
  if (
    !Number.isInteger(fromBits) ||
    !Number.isInteger(toBits) ||
    fromBits < 1 ||
    fromBits > 8 ||
    toBits < 1 ||
    toBits > 8
  ) {
    return err(new CodecError("INVALID_ARGUMENT", `Cannot regroup ${fromBits}-bit values into ${toBits}-bit values`));
  }

  let acc = 0;
  let bits = 0;
  const ret: number[] = [];
  const maxv = (1 << toBits) - 1;
  const maxAcc = (1 << (fromBits + toBits - 1)) - 1;

  for (let i = 0; i < data.length; i++) {
    const value = data[i] ?? 0;
    if (!Number.isInteger(value) || value < 0 || value >> fromBits !== 0) {
      return err(new CodecError("INVALID_ARGUMENT", `Value ${value} does not fit in ${fromBits} bits`));
    }
    acc = ((acc << fromBits) | value) & maxAcc;
    bits += fromBits;
    while (bits >= toBits) {
      bits -= toBits;
      ret.push((acc >> bits) & maxv);
    }
  }

  if (pad) {
    if (bits > 0) ret.push((acc << (toBits - bits)) & maxv);
  } else if (bits >= fromBits) {
    return err(new CodecError("INVALID_PADDING", `Incomplete group: ${bits} bits left over`));
  } else if ((acc << (toBits - bits)) & maxv) {
    return err(new CodecError("INVALID_PADDING", "Non-zero padding bits"));
  }

  return ok(ret);
}

/** Bytes to 5-bit words, zero-padded. */
export function toWords(bytes: Uint8Array): number[] {
  const ret: number[] = [];
  let acc = 0;
  let bits = 0;
  for (const byte of bytes) {
    acc = ((acc << 8) | byte) & 0xfff;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      ret.push((acc >> bits) & 31);
    }
  }
  if (bits > 0) ret.push((acc << (5 - bits)) & 31);
  return ret;
}

/** 5-bit words back to bytes; padding must be canonical. */
export function fromWords(words: readonly number[]): Result<Uint8Array, CodecError> {
  return convertBits(words, 5, 8, false).map((bytes) => Uint8Array.from(bytes));
}

// =============================================================================
// Encode / Decode
// =============================================================================

function checkHrp(hrp: string): CodecError | undefined {
  if (hrp.length === 0) {
    return new CodecError("INVALID_FORMAT", "Empty human-readable part");
  }
  for (let i = 0; i < hrp.length; i++) {
    const code = hrp.charCodeAt(i);
    if (code < 33 || code > 126) {
      return new CodecError("INVALID_CHARACTER", `Human-readable part character out of range at position ${i}`);
    }
  }
  return undefined;
}

export function bech32Encode(
  hrp: string,
  words: readonly number[],
  variant: Bech32Variant = "bech32",
  limit: number = BECH32_MAX_LENGTH,
): Result<string, CodecError> {
  const hrpError = checkHrp(hrp);
  if (hrpError !== undefined) return err(hrpError);
  if (hrp !== hrp.toLowerCase() && hrp !== hrp.toUpperCase()) {
    return err(new CodecError("MIXED_CASE", "Mixed-case human-readable part"));
  }

  const lowerHrp = hrp.toLowerCase();
  let out = `${lowerHrp}1`;
  for (const word of words) {
    const ch = BECH32_CHARSET.charAt(word);
    if (!Number.isInteger(word) || word < 0 || word > 31 || ch === "") {
      return err(new CodecError("INVALID_ARGUMENT", `Word ${word} is not a 5-bit value`));
    }
    out += ch;
  }
  for (const word of bech32CreateChecksum(lowerHrp, words, variant)) {
    out += BECH32_CHARSET.charAt(word);
  }

  if (out.length > limit) {
    return err(new CodecError("INVALID_LENGTH", `Encoded length ${out.length} exceeds limit ${limit}`));
  }
  return ok(out);
}

export function bech32Decode(
  text: string,
  limit: number = BECH32_MAX_LENGTH,
): Result<Bech32Decoded, CodecError> {
  if (text.length > limit) {
    return err(new CodecError("INVALID_LENGTH", `Length ${text.length} exceeds limit ${limit}`));
  }
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code < 33 || code > 126) {
      return err(new CodecError("INVALID_CHARACTER", `Character out of range at position ${i}`));
    }
  }

  const lower = text.toLowerCase();
  if (text !== lower && text !== text.toUpperCase()) {
    return err(new CodecError("MIXED_CASE", "Bech32 string mixes upper and lower case"));
  }

  const pos = lower.lastIndexOf("1");
  if (pos === -1) {
    return err(new CodecError("INVALID_FORMAT", "Missing '1' separator"));
  }
  if (pos === 0) {
    return err(new CodecError("INVALID_FORMAT", "Empty human-readable part"));
  }
  if (lower.length - pos - 1 < CHECKSUM_LENGTH) {
    return err(new CodecError("INVALID_LENGTH", "Data part shorter than the 6-character checksum"));
  }

  const hrp = lower.slice(0, pos);
  const data: number[] = [];
  for (let i = pos + 1; i < lower.length; i++) {
    const value = BECH32_CHARSET.indexOf(lower.charAt(i));
    if (value === -1) {
      return err(new CodecError("INVALID_CHARACTER", `Invalid Bech32 character '${text.charAt(i)}' at position ${i}`));
    }
    data.push(value);
  }

  const variant = bech32VerifyChecksum(hrp, data);
  if (variant === undefined) {
    return err(new CodecError("INVALID_CHECKSUM", "Bech32 checksum mismatch"));
  }

  return ok({ hrp, words: data.slice(0, -CHECKSUM_LENGTH), variant });
}
