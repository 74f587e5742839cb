/**
 * Input characterization.
 *
 * Gathers structural facts about a raw string before any chain-specific
 * validation. The only rule: never drop a family the input could still
 * belong to. Mixed-case Bech32 is kept so its validator can reject it with
 * a reason.
 */

import {
  BECH32_CHARSET,
  base58Decode,
  isBase58,
  stripHexPrefix,
} from "@chainprobe/codec";
import {
  ENCODING_FAMILIES,
  type Base58Facts,
  type Bech32Facts,
  type CaseKind,
  type EncodingFamily,
  type HexFacts,
  type InputSignature,
} from "@chainprobe/types";

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/** Smallest decoded Base58Check: version + 4-byte checksum. */
const MIN_BASE58CHECK_BYTES = 5;

/** Smallest decoded SS58: prefix + 1-byte payload + 1-byte checksum. */
const MIN_SS58_BYTES = 3;

const BECH32_CHECKSUM_LENGTH = 6;

export function caseKindOf(text: string): CaseKind {
  const letters = text.replace(/[^a-zA-Z]/g, "");
  if (letters.length === 0) return "none";
  if (letters === letters.toLowerCase()) return "lower";
  if (letters === letters.toUpperCase()) return "upper";
  return "mixed";
}

function hexFacts(input: string): HexFacts | undefined {
  const { body, prefixed } = stripHexPrefix(input);
  if (!HEX_DIGITS.test(body)) return undefined;
  return {
    prefixed,
    byteLength: Math.floor(body.length / 2),
    evenLength: body.length % 2 === 0,
    caseKind: caseKindOf(body),
  };
}

function base58Facts(input: string): Base58Facts | undefined {
  if (!isBase58(input)) return undefined;
  const decoded = base58Decode(input);
  if (decoded.isErr()) return undefined;
  return {
    decodedLength: decoded.value.length,
    leadingByte: decoded.value[0] ?? 0,
  };
}

function bech32Facts(input: string): Bech32Facts | undefined {
  const lower = input.toLowerCase();
  const pos = lower.lastIndexOf("1");
  if (pos < 1) return undefined;

  const data = lower.slice(pos + 1);
  if (data.length < BECH32_CHECKSUM_LENGTH) return undefined;
  for (const ch of data) {
    if (!BECH32_CHARSET.includes(ch)) return undefined;
  }

  const hrp = lower.slice(0, pos);
  for (let i = 0; i < hrp.length; i++) {
    const code = hrp.charCodeAt(i);
    if (code < 33 || code > 126) return undefined;
  }
  return { hrp, dataLength: data.length };
}

/**
 * Describe the structural shape of `input` (already trimmed).
 */
export function characterize(input: string): InputSignature {
  const hex = hexFacts(input);
  const base58 = base58Facts(input);
  const bech32 = bech32Facts(input);

  const families = new Set<EncodingFamily>();
  if (hex !== undefined) families.add("hex");
  if (base58 !== undefined) {
    families.add("base58");
    if (base58.decodedLength >= MIN_BASE58CHECK_BYTES) families.add("base58check");
    if (base58.decodedLength >= MIN_SS58_BYTES && base58.leadingByte < 0x80) families.add("ss58");
  }
  if (bech32 !== undefined) families.add("bech32");

  return {
    input,
    length: input.length,
    caseKind: caseKindOf(input),
    families: ENCODING_FAMILIES.filter((family) => families.has(family)),
    ...(hex !== undefined ? { hex } : {}),
    ...(base58 !== undefined ? { base58 } : {}),
    ...(bech32 !== undefined ? { bech32 } : {}),
  };
}
