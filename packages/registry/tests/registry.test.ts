/**
 * Tests for the chain registry and the built-in descriptors.
 */
import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { InputSignature } from "@chainprobe/types";
import { ChainRegistry } from "../src/registry.js";
import { defaultRegistry, loadRegistryFile, parseChainDescriptors } from "../src/load.js";
import { RegistryError } from "../src/errors.js";

const EVM_CHAINS = [
  "ethereum",
  "polygon",
  "bsc",
  "avalanche",
  "arbitrum",
  "optimism",
  "base",
  "fantom",
  "celo",
  "gnosis",
];

const COSMOS_CHAINS = [
  "cosmos-hub",
  "osmosis",
  "juno",
  "akash",
  "stargaze",
  "secret-network",
  "terra",
  "kava",
  "regen",
  "sentinel",
];

function extraChain(id: string): Record<string, unknown> {
  return {
    id,
    name: "Test Chain",
    family: "test",
    addressFormats: [{ encoding: "ss58", label: "account", prefix: 7 }],
  };
}

// =============================================================================
// Built-in descriptors
// =============================================================================

describe("defaultRegistry", () => {
  const registry = defaultRegistry();

  it("loads every built-in chain", () => {
    expect(registry.size).toBe(30);
  });

  it("returns the same instance on repeated calls", () => {
    expect(defaultRegistry()).toBe(registry);
  });

  it("keeps declaration order", () => {
    const ids = registry.all().map((chain) => chain.id);
    expect(ids.slice(0, 10)).toEqual(EVM_CHAINS);
    expect(ids.slice(10, 15)).toEqual(["bitcoin", "litecoin", "dogecoin", "tron", "solana"]);
    expect(ids.slice(15, 25)).toEqual(COSMOS_CHAINS);
    expect(ids.slice(25)).toEqual(["polkadot", "kusama", "substrate", "altair", "cardano"]);
    expect(registry.indexOf("ethereum")).toBe(0);
    expect(registry.indexOf("cardano")).toBe(29);
    expect(registry.indexOf("unknown")).toBe(-1);
  });

  it("marks one primary per group", () => {
    for (const group of ["evm", "bitcoin", "cosmos", "substrate"]) {
      const primaries = registry.byGroup(group).filter((chain) => chain.primary);
      expect(primaries).toHaveLength(1);
    }
    expect(registry.get("ethereum").primary).toBe(true);
    expect(registry.get("polygon").primary).toBe(false);
  });

  it("groups chains by encoding family", () => {
    expect(registry.byFamily("hex").map((chain) => chain.id)).toEqual(EVM_CHAINS);
    expect(registry.byFamily("base58").map((chain) => chain.id)).toEqual(["solana"]);
    expect(registry.byFamily("ss58").map((chain) => chain.id)).toEqual([
      "polkadot",
      "kusama",
      "substrate",
      "altair",
    ]);
  });

  it("registers SS58 prefixes", () => {
    expect(registry.ss58PrefixRegistered(0)).toBe(true);
    expect(registry.ss58PrefixRegistered(136)).toBe(true);
    expect(registry.ss58PrefixRegistered(7)).toBe(false);
  });

  it("lists chains accepting each key type", () => {
    const secp = registry.acceptingKeyType("secp256k1").map((m) => m.chain.id);
    expect(secp).toHaveLength(28);
    expect(secp).not.toContain("solana");
    expect(secp).not.toContain("cardano");

    const ed = registry.acceptingKeyType("ed25519").map((m) => m.chain.id);
    expect(ed).toEqual(["solana", ...COSMOS_CHAINS, "polkadot", "kusama", "substrate", "altair", "cardano"]);
  });

  it("freezes descriptors", () => {
    expect(Object.isFrozen(registry.get("bitcoin"))).toBe(true);
    expect(Object.isFrozen(registry.get("bitcoin").addressFormats)).toBe(true);
  });
});

// =============================================================================
// Lookup
// =============================================================================

describe("ChainRegistry lookup", () => {
  const registry = defaultRegistry();

  it("get throws UNKNOWN_CHAIN", () => {
    expect(() => registry.get("nope")).toThrow(RegistryError);
    try {
      registry.get("nope");
    } catch (error) {
      expect(error instanceof RegistryError && error.code).toBe("UNKNOWN_CHAIN");
    }
  });

  it("find and has", () => {
    expect(registry.find("tron")?.name).toBe("Tron");
    expect(registry.find("nope")).toBeUndefined();
    expect(registry.has("solana")).toBe(true);
    expect(registry.has("nope")).toBe(false);
  });
});

// =============================================================================
// Compatibility
// =============================================================================

describe("compatibleWith", () => {
  const registry = defaultRegistry();

  it("returns every EVM chain for a 0x hex signature", () => {
    const signature: InputSignature = {
      input: "0x" + "ab".repeat(20),
      length: 42,
      caseKind: "lower",
      families: ["hex"],
      hex: { prefixed: true, byteLength: 20, evenLength: true, caseKind: "lower" },
    };
    expect(registry.compatibleWith(signature).map((m) => m.chain.id)).toEqual(EVM_CHAINS);
  });

  it("skips hex formats for unprefixed hex", () => {
    const signature: InputSignature = {
      input: "ab".repeat(20),
      length: 40,
      caseKind: "lower",
      families: ["hex"],
      hex: { prefixed: false, byteLength: 20, evenLength: true, caseKind: "lower" },
    };
    expect(registry.compatibleWith(signature)).toEqual([]);
  });

  it("filters Bech32 formats by HRP", () => {
    const signature: InputSignature = {
      input: "osmo1...",
      length: 43,
      caseKind: "lower",
      families: ["bech32"],
      bech32: { hrp: "osmo", dataLength: 38 },
    };
    const matches = registry.compatibleWith(signature);
    expect(matches.map((m) => m.chain.id)).toEqual(["osmosis"]);
  });

  it("filters Base58Check formats by version byte", () => {
    const signature: InputSignature = {
      input: "1...",
      length: 34,
      caseKind: "mixed",
      families: ["base58", "base58check", "ss58"],
      base58: { decodedLength: 25, leadingByte: 0 },
    };
    const matches = registry.compatibleWith(signature);
    expect(matches.map((m) => `${m.chain.id}:${m.format.label}`)).toEqual([
      "bitcoin:P2PKH",
      "solana:account",
      "polkadot:account",
      "kusama:account",
      "substrate:account",
      "altair:account",
    ]);
  });
});

// =============================================================================
// Construction
// =============================================================================

describe("parseChainDescriptors", () => {
  it("applies defaults", () => {
    const [chain] = parseChainDescriptors([extraChain("test-chain")]);
    expect(chain?.primary).toBe(false);
    expect(chain?.derivations).toEqual([]);
    expect(chain?.addressFormats[0]).toEqual({ encoding: "ss58", label: "account", prefix: 7, acceptUnregistered: false });
  });

  it("rejects a non-kebab-case id", () => {
    expect(() => parseChainDescriptors([extraChain("Test_Chain")])).toThrow(
      "Invalid chain descriptor at 0.id: id must be kebab-case",
    );
  });

  it("rejects an unknown encoding", () => {
    const bad = { ...extraChain("test-chain"), addressFormats: [{ encoding: "base64", label: "x" }] };
    expect(() => parseChainDescriptors([bad])).toThrow(RegistryError);
  });

  it("rejects an uppercase HRP", () => {
    const bad = {
      ...extraChain("test-chain"),
      addressFormats: [
        { encoding: "bech32", label: "x", hrps: ["TEST"], variant: "bech32", programLength: { min: 20, max: 20 } },
      ],
    };
    expect(() => parseChainDescriptors([bad])).toThrow("hrp must be lowercase printable ASCII");
  });

  it("rejects a non-raw ed25519 derivation", () => {
    const bad = {
      ...extraChain("test-chain"),
      derivations: [{ keyType: "ed25519", input: "compressed", steps: [], encoder: { type: "base58" } }],
    };
    expect(() => parseChainDescriptors([bad])).toThrow("ed25519 derivations take the raw key");
  });

  it("rejects two derivations for one key type", () => {
    const derivation = { keyType: "ed25519", input: "raw", steps: [], encoder: { type: "base58" } };
    const bad = { ...extraChain("test-chain"), derivations: [derivation, derivation] };
    expect(() => parseChainDescriptors([bad])).toThrow("duplicate ed25519 derivation");
  });
});

describe("ChainRegistry construction", () => {
  it("rejects duplicate ids", () => {
    const chains = parseChainDescriptors([extraChain("test-chain"), extraChain("test-chain")]);
    expect(() => new ChainRegistry(chains)).toThrow(
      "ChainRegistry: chain 'test-chain' is declared more than once",
    );
  });

  it("extend appends without touching the original", () => {
    const base = defaultRegistry();
    const extended = base.extend(parseChainDescriptors([extraChain("test-chain")]));
    expect(extended.size).toBe(31);
    expect(extended.indexOf("test-chain")).toBe(30);
    expect(extended.ss58PrefixRegistered(7)).toBe(true);
    expect(base.has("test-chain")).toBe(false);
  });

  it("extend rejects a clash with a built-in id", () => {
    expect(() => defaultRegistry().extend(parseChainDescriptors([extraChain("bitcoin")]))).toThrow(RegistryError);
  });
});

describe("loadRegistryFile", () => {
  it("reads descriptors from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "chainprobe-"));
    const path = join(dir, "extra.json");
    writeFileSync(path, JSON.stringify([extraChain("test-chain")]));
    expect(loadRegistryFile(path).map((chain) => chain.id)).toEqual(["test-chain"]);
  });

  it("wraps unreadable JSON in INVALID_DESCRIPTOR", () => {
    const dir = mkdtempSync(join(tmpdir(), "chainprobe-"));
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    try {
      loadRegistryFile(path);
      expect.unreachable();
    } catch (error) {
      expect(error instanceof RegistryError && error.code).toBe("INVALID_DESCRIPTOR");
    }
  });
});
