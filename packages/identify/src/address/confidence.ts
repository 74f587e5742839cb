/**
 * Confidence tiers.
 *
 * Only the relative order is a contract:
 *   exact & unambiguous > exact & shared > derived > unchecksummed > weak,
 * and within a tier the primary chain of a family ranks above its siblings.
 */

export type MatchStrength =
  /** Checksum verified */
  | "exact"
  /** Structurally valid, but the encoding carried no checksum to verify */
  | "unchecksummed"
  /** Length-only match, or a fallback interpretation */
  | "weak";

interface Tier {
  readonly primary: number;
  readonly sibling: number;
}

export const CONFIDENCE = {
  unambiguous: 0.95,
  exact: { primary: 0.9, sibling: 0.85 },
  derived: { primary: 0.8, sibling: 0.75 },
  unchecksummed: { primary: 0.75, sibling: 0.7 },
  weak: { primary: 0.6, sibling: 0.55 },
} as const satisfies Record<string, Tier | number>;

function pick(tier: Tier, primary: boolean): number {
  return primary ? tier.primary : tier.sibling;
}

/**
 * @param shared - other chains of the same family matched the same input
 */
export function addressConfidence(strength: MatchStrength, primary: boolean, shared: boolean): number {
  switch (strength) {
    case "exact":
      return shared ? pick(CONFIDENCE.exact, primary) : CONFIDENCE.unambiguous;
    case "unchecksummed":
      return pick(CONFIDENCE.unchecksummed, primary);
    case "weak":
      return pick(CONFIDENCE.weak, primary);
  }
}

export function derivedConfidence(primary: boolean): number {
  return pick(CONFIDENCE.derived, primary);
}
