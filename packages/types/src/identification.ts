/**
 * Identification Types
 *
 * The output contract of the engine.
 *
 * Rules:
 * - Candidates are ordered by confidence, highest first
 * - At most one candidate per chain
 * - A result always carries at least one candidate
 */

import type { ChainId } from "./chain.js";

/** Whether a candidate came from address validation or key derivation. */
export type CandidateKind = "address" | "public-key";

/**
 * One chain an input may belong to.
 */
export interface Candidate {
  readonly chain: ChainId;

  /** Confidence in [0, 1]; only the relative order is meaningful */
  readonly confidence: number;

  /** Short human-readable explanation of why this chain matched */
  readonly reasoning: string;

  /** Address derived from a public key, present for "public-key" candidates */
  readonly derivedAddress?: string;

  readonly kind: CandidateKind;
}

export interface IdentificationResult {
  /** Canonical form of the input under the top candidate */
  readonly normalized: string;

  readonly candidates: readonly Candidate[];
}
