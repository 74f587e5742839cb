/**
 * Public-key candidate resolution.
 *
 * One candidate per chain with a derivation for the detected key type,
 * each carrying its derived address. Chains that derive the same address
 * (every EVM chain) still get separate candidates.
 */

import type { ChainRegistry } from "@chainprobe/registry";
import type { Logger } from "../logger.js";
import type { ScoredCandidate } from "../address/resolver.js";
import { derivedConfidence } from "../address/confidence.js";
import type { DetectedKey } from "./detect.js";
import { runDerivation } from "./pipeline.js";

export interface KeyResolution {
  readonly candidates: readonly ScoredCandidate[];

  /** Chains that accept the key type but whose derivation failed */
  readonly failures: readonly string[];

  /** Whether any chain registers a derivation for the key type */
  readonly supported: boolean;
}

export function describeKey(key: DetectedKey): string {
  return key.keyType === "secp256k1"
    ? `${key.point.form} secp256k1 public key`
    : "32-byte Ed25519-compatible public key";
}

export function resolvePublicKeyCandidates(
  key: DetectedKey,
  registry: ChainRegistry,
  logger?: Logger,
): KeyResolution {
  const accepting = registry.acceptingKeyType(key.keyType);
  const candidates: ScoredCandidate[] = [];
  const failures: string[] = [];

  for (const { chain, derivation } of accepting) {
    const derived = runDerivation(derivation, key);
    if (derived.isErr()) {
      logger?.warn({ chain: chain.id, err: derived.error }, "derivation failed");
      failures.push(`${chain.id}: ${derived.error.message}`);
      continue;
    }
    candidates.push({
      candidate: {
        chain: chain.id,
        confidence: derivedConfidence(chain.primary),
        reasoning: `Address derived from ${describeKey(key)}`,
        derivedAddress: derived.value,
        kind: "public-key",
      },
      normalized: key.normalized,
    });
  }

  return { candidates, failures, supported: accepting.length > 0 };
}
