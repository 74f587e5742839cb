/**
 * Input Signature
 *
 * Structural facts about a raw input string, gathered before any
 * chain-specific validation. A signature never excludes a family the
 * input could still belong to; validators make the final call.
 */

import type { EncodingFamily } from "./chain.js";

/** Letter casing observed in the input. "none" means no letters at all. */
export type CaseKind = "lower" | "upper" | "mixed" | "none";

export interface HexFacts {
  /** Input carried a 0x / 0X prefix */
  readonly prefixed: boolean;

  /** Byte length of the hex body (rounded down for odd lengths) */
  readonly byteLength: number;

  /** Hex body has an even number of digits */
  readonly evenLength: boolean;

  /** Casing of the hex body alone */
  readonly caseKind: CaseKind;
}

export interface Base58Facts {
  /** Length of the Base58-decoded byte string */
  readonly decodedLength: number;

  /** First decoded byte (version or prefix byte) */
  readonly leadingByte: number;
}

export interface Bech32Facts {
  /** Human-readable part, lowercased */
  readonly hrp: string;

  /** Number of 5-bit data symbols after the separator, checksum included */
  readonly dataLength: number;
}

export interface InputSignature {
  /** Trimmed input the facts describe */
  readonly input: string;
  readonly length: number;
  readonly caseKind: CaseKind;

  /** Every encoding family the input is structurally compatible with */
  readonly families: readonly EncodingFamily[];

  readonly hex?: HexFacts;
  readonly base58?: Base58Facts;
  readonly bech32?: Bech32Facts;
}
