/**
 * Property-based tests for identification.
 *
 * 1. Every derived address identifies back to the chain that derived it
 * 2. A lowercase 20-byte hex address yields every EVM chain
 * 3. Identification is deterministic and candidates are ranked
 * 4. Both serializations of a secp256k1 key derive the same EVM address
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { secp256k1 } from "@noble/curves/secp256k1";
import { hexEncode, isEd25519Shaped, ss58Encode } from "@chainprobe/codec";
import { createIdentifier } from "../src/identify.js";
import { characterize } from "../src/characterize.js";
import { detectPublicKey } from "../src/public-key/detect.js";
import { runDerivation } from "../src/public-key/pipeline.js";
import { ED_KEY_POLKADOT, EVM_CHAINS, G_COMPRESSED, GENESIS_ADDRESS, P2WPKH_ADDRESS } from "./fixtures.js";

const identifier = createIdentifier();

// =============================================================================
// Arbitraries
// =============================================================================

const arbScalar = fc.bigInt({ min: 1n, max: secp256k1.CURVE.n - 1n });
const arbSecpKey = arbScalar.map((k) => secp256k1.ProjectivePoint.BASE.multiply(k));
const arbEdKey = fc.uint8Array({ minLength: 32, maxLength: 32 }).filter(isEd25519Shaped);
const arbHash20 = fc.uint8Array({ minLength: 20, maxLength: 20 });

const arbInput = fc.oneof(
  fc.string({ maxLength: 80 }),
  fc.constantFrom(GENESIS_ADDRESS, P2WPKH_ADDRESS, ED_KEY_POLKADOT, G_COMPRESSED),
  arbHash20.map((bytes) => hexEncode(bytes, true)),
  arbEdKey.map((bytes) => hexEncode(bytes)),
);

// =============================================================================
// Derivation round trip
// =============================================================================

describe("derived addresses", () => {
  it("identify back to the chain that derived them", () => {
    fc.assert(
      fc.property(arbSecpKey, arbEdKey, (point, edKey) => {
        const texts = { secp256k1: hexEncode(point.toRawBytes(true)), ed25519: hexEncode(edKey) };

        for (const chain of identifier.registry.all()) {
          for (const derivation of chain.derivations) {
            const key = detectPublicKey(characterize(texts[derivation.keyType]))._unsafeUnwrap();
            const address = runDerivation(derivation, key)._unsafeUnwrap();

            const result = identifier.identify(address)._unsafeUnwrap();
            expect(result.normalized).toBe(address);
            expect(result.candidates.map((c) => c.chain)).toContain(chain.id);
          }
        }
      }),
      { numRuns: 10 },
    );
  });

  it("agree across secp256k1 key serializations", () => {
    fc.assert(
      fc.property(arbSecpKey, (point) => {
        const evmAddress = (text: string): string | undefined =>
          identifier
            .identify(text)
            ._unsafeUnwrap()
            .candidates.find((c) => c.chain === "ethereum")?.derivedAddress;

        const compressed = evmAddress(hexEncode(point.toRawBytes(true)));
        expect(compressed).toBeDefined();
        expect(evmAddress(hexEncode(point.toRawBytes(false), true))).toBe(compressed);
      }),
      { numRuns: 25 },
    );
  });
});

// =============================================================================
// Ambiguity
// =============================================================================

describe("ambiguous addresses", () => {
  it("return every EVM chain for unchecksummed hex", () => {
    fc.assert(
      fc.property(arbHash20, (bytes) => {
        const result = identifier.identify(hexEncode(bytes, true))._unsafeUnwrap();
        expect(result.candidates.map((c) => c.chain)).toEqual(EVM_CHAINS);
      }),
      { numRuns: 50 },
    );
  });

  it("resolve two-byte SS58 prefixes to their chain", () => {
    fc.assert(
      fc.property(arbEdKey, (payload) => {
        const address = ss58Encode(136, payload)._unsafeUnwrap();
        expect(identifier.identify(address)._unsafeUnwrap().candidates.map((c) => c.chain)).toEqual(["altair"]);
      }),
      { numRuns: 25 },
    );
  });
});

// =============================================================================
// Ranking
// =============================================================================

describe("results", () => {
  it("are deterministic", () => {
    fc.assert(
      fc.property(arbInput, (input) => {
        expect(identifier.identify(input)).toEqual(identifier.identify(input));
      }),
      { numRuns: 100 },
    );
  });

  it("rank unique chains by descending confidence", () => {
    fc.assert(
      fc.property(arbInput, (input) => {
        const result = identifier.identify(input);
        if (result.isErr()) return;

        const { candidates } = result.value;
        expect(candidates.length).toBeGreaterThan(0);
        expect(new Set(candidates.map((c) => c.chain)).size).toBe(candidates.length);
        for (let i = 1; i < candidates.length; i++) {
          const previous = candidates[i - 1];
          const current = candidates[i];
          if (previous === undefined || current === undefined) continue;
          expect(previous.confidence).toBeGreaterThanOrEqual(current.confidence);
        }
        for (const candidate of candidates) {
          expect(candidate.confidence).toBeGreaterThan(0);
          expect(candidate.confidence).toBeLessThanOrEqual(1);
        }
      }),
      { numRuns: 100 },
    );
  });
});
