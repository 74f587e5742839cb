/**
 * Runtime Type Guards
 *
 * Narrowing functions for chainprobe domain types.
 * Used where results cross a process or serialization boundary.
 */

import type { EncodingFamily, KeyType } from "./chain.js";
import { ENCODING_FAMILIES, KEY_TYPES } from "./chain.js";
import type { Candidate, CandidateKind, IdentificationResult } from "./identification.js";

// =============================================================================
// Chain guards
// =============================================================================

const FAMILY_SET = new Set<string>(ENCODING_FAMILIES);
const KEY_TYPE_SET = new Set<string>(KEY_TYPES);
const CANDIDATE_KINDS = new Set<string>(["address", "public-key"]);

export function isEncodingFamily(value: unknown): value is EncodingFamily {
  return typeof value === "string" && FAMILY_SET.has(value);
}

export function isKeyType(value: unknown): value is KeyType {
  return typeof value === "string" && KEY_TYPE_SET.has(value);
}

// =============================================================================
// Identification guards
// =============================================================================

export function isCandidateKind(value: unknown): value is CandidateKind {
  return typeof value === "string" && CANDIDATE_KINDS.has(value);
}

export function isCandidate(value: unknown): value is Candidate {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.chain === "string" &&
    v.chain.length > 0 &&
    typeof v.confidence === "number" &&
    v.confidence >= 0 &&
    v.confidence <= 1 &&
    typeof v.reasoning === "string" &&
    (v.derivedAddress === undefined || typeof v.derivedAddress === "string") &&
    isCandidateKind(v.kind)
  );
}

export function isIdentificationResult(value: unknown): value is IdentificationResult {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.normalized === "string" &&
    Array.isArray(v.candidates) &&
    v.candidates.length > 0 &&
    v.candidates.every(isCandidate)
  );
}
