/**
 * Chain Types
 *
 * Identification primitives shared by the registry and the engine.
 *
 * Rules:
 * - Chain IDs are stable kebab-case strings ("ethereum", "cosmos-hub")
 * - Families and encodings are closed unions; chains are open metadata
 * - No behaviour in these types
 */

/**
 * Chain identifier (e.g., "ethereum", "bitcoin", "cosmos-hub").
 */
export type ChainId = string;

/**
 * Sibling group a chain belongs to (e.g., "evm", "cosmos").
 * Chains in the same group share an address shape.
 */
export type ChainGroup = string;

/**
 * Structural encoding families an address or key can be written in.
 */
export type EncodingFamily = "hex" | "base58check" | "bech32" | "base58" | "ss58";

export const ENCODING_FAMILIES: readonly EncodingFamily[] = [
  "hex",
  "base58check",
  "bech32",
  "base58",
  "ss58",
] as const;

/**
 * Public-key classes the engine can derive addresses for.
 *
 * "ed25519" covers every 32-byte Ed25519-compatible key, sr25519 included:
 * the two cannot be told apart from the bytes alone.
 */
export type KeyType = "secp256k1" | "ed25519";

export const KEY_TYPES: readonly KeyType[] = ["secp256k1", "ed25519"] as const;
