/**
 * Top-level identification.
 *
 * characterize → address resolution → (if nothing matched) public-key
 * resolution → merge → rank.
 *
 * Design rules:
 * - Pure: the only side effect is logging through the injected logger
 * - One candidate per chain; the highest confidence wins
 * - Ties keep registry declaration order
 * - Malformed input yields Err, never a throw
 */

import { err, ok, type Result } from "neverthrow";
import {
  type ChainRegistry,
  RegistryError,
  defaultRegistry,
  loadRegistryFile,
} from "@chainprobe/registry";
import type { IdentificationResult } from "@chainprobe/types";
import { characterize } from "./characterize.js";
import { resolveAddressCandidates, type ScoredCandidate } from "./address/resolver.js";
import { detectPublicKey } from "./public-key/detect.js";
import { describeKey, resolvePublicKeyCandidates } from "./public-key/resolver.js";
import { IdentificationError } from "./errors.js";
import { ConfigSchema, tryLoadConfig } from "./config.js";
import { createLogger, silentLogger, type Logger } from "./logger.js";

export interface IdentifierOptions {
  /** Chains to identify against; the built-in registry by default */
  readonly registry?: ChainRegistry;
  readonly logger?: Logger;
}

export interface Identifier {
  readonly registry: ChainRegistry;
  identify(input: string): Result<IdentificationResult, IdentificationError>;
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * Keep the best candidate per chain, then sort by confidence (descending)
 * with registry order breaking ties.
 */
export function rankCandidates(
  scored: readonly ScoredCandidate[],
  registry: ChainRegistry,
): ScoredCandidate[] {
  const best = new Map<string, ScoredCandidate>();
  for (const entry of scored) {
    const current = best.get(entry.candidate.chain);
    if (current === undefined || entry.candidate.confidence > current.candidate.confidence) {
      best.set(entry.candidate.chain, entry);
    }
  }
  return [...best.values()].sort(
    (a, b) =>
      b.candidate.confidence - a.candidate.confidence ||
      registry.indexOf(a.candidate.chain) - registry.indexOf(b.candidate.chain),
  );
}

function toResult(ranked: readonly ScoredCandidate[]): IdentificationResult | undefined {
  const top = ranked[0];
  if (top === undefined) return undefined;
  return {
    normalized: top.normalized,
    candidates: ranked.map((entry) => entry.candidate),
  };
}

// =============================================================================
// Identifier
// =============================================================================

export function createIdentifier(options: IdentifierOptions = {}): Identifier {
  const registry = options.registry ?? defaultRegistry();
  const logger = options.logger ?? silentLogger();

  function identify(raw: string): Result<IdentificationResult, IdentificationError> {
    const input = raw.trim();
    if (input === "") {
      return err(new IdentificationError("INVALID_INPUT", "Input is empty"));
    }

    const signature = characterize(input);
    logger.debug({ families: signature.families, length: signature.length }, "input characterized");

    const addresses = resolveAddressCandidates(signature, registry);
    logger.debug({ matched: addresses.candidates.length, rejected: addresses.reasons.length }, "address candidates resolved");

    const fromAddresses = toResult(rankCandidates(addresses.candidates, registry));
    if (fromAddresses !== undefined) {
      logger.debug({ candidates: fromAddresses.candidates.length, top: fromAddresses.candidates[0]?.chain }, "identified as address");
      return ok(fromAddresses);
    }

    logger.debug("no address match, trying public-key derivation");
    const key = detectPublicKey(signature);
    if (key.isErr()) {
      const reasons = [...addresses.reasons, `public key: ${key.error.message}`];
      return err(
        new IdentificationError(
          "INVALID_INPUT",
          signature.families.length === 0
            ? "Input is not hex, Base58 or Bech32"
            : "Input matches no registered address format or public-key shape",
          reasons,
        ),
      );
    }

    const keys = resolvePublicKeyCandidates(key.value, registry, logger);
    const fromKey = toResult(rankCandidates(keys.candidates, registry));
    if (fromKey === undefined) {
      return err(
        new IdentificationError(
          "NOT_IMPLEMENTED",
          keys.supported
            ? `No derivation succeeded for the ${describeKey(key.value)}`
            : `No registered chain derives addresses from ${key.value.keyType} keys`,
          keys.failures,
        ),
      );
    }

    logger.debug({ keyType: key.value.keyType, candidates: fromKey.candidates.length }, "identified as public key");
    return ok(fromKey);
  }

  return { registry, identify };
}

// =============================================================================
// Default instance
// =============================================================================

let defaultIdentifier: Identifier | undefined;

function buildDefaultIdentifier(): Identifier {
  const loaded = tryLoadConfig();
  const config = loaded.unwrapOr(
    ConfigSchema.parse({ CHAIN_REGISTRY_EXTRA: process.env["CHAIN_REGISTRY_EXTRA"] }),
  );
  const logger = createLogger(config);
  if (loaded.isErr()) {
    logger.warn({ issues: loaded.error.issues }, "invalid configuration, using defaults");
  }

  const base = defaultRegistry();
  const extraPath = config.CHAIN_REGISTRY_EXTRA;
  if (extraPath === undefined) {
    return createIdentifier({ registry: base, logger });
  }

  try {
    return createIdentifier({ registry: base.extend(loadRegistryFile(extraPath)), logger });
  } catch (error) {
    if (!(error instanceof RegistryError)) throw error;
    logger.warn({ err: error, path: extraPath }, "extra chain descriptors ignored");
    return createIdentifier({ registry: base, logger });
  }
}

/**
 * Identify an address or public key against the built-in chains
 * (plus any listed in CHAIN_REGISTRY_EXTRA). An invalid environment falls
 * back to defaults with a warning; it never makes this throw.
 */
export function identify(input: string): Result<IdentificationResult, IdentificationError> {
  defaultIdentifier ??= buildDefaultIdentifier();
  return defaultIdentifier.identify(input);
}
