/**
 * @chainprobe/types — Shared domain types for the chainprobe stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Chains are data; only encodings and key classes are closed unions
 */

// Chain types
export type {
  ChainId,
  ChainGroup,
  EncodingFamily,
  KeyType,
} from "./chain.js";
export { ENCODING_FAMILIES, KEY_TYPES } from "./chain.js";

// Signature types
export type {
  CaseKind,
  HexFacts,
  Base58Facts,
  Bech32Facts,
  InputSignature,
} from "./signature.js";

// Identification types
export type {
  Candidate,
  CandidateKind,
  IdentificationResult,
} from "./identification.js";

// Runtime guards
export {
  isEncodingFamily,
  isKeyType,
  isCandidateKind,
  isCandidate,
  isIdentificationResult,
} from "./guards.js";
