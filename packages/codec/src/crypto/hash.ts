/**
 * Hash functions used by address checksums and key derivation.
 *
 * SHA-256 and SHA3-256 come from node:crypto; Keccak-256 (pre-NIST
 * padding), RIPEMD-160 and variable-length Blake2b from @noble/hashes.
 */

import { createHash } from "node:crypto";
import { keccak_256 } from "@noble/hashes/sha3";
import { ripemd160 as nobleRipemd160 } from "@noble/hashes/ripemd160";
import { blake2b as nobleBlake2b } from "@noble/hashes/blake2b";

export function sha256(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(data).digest());
}

export function doubleSha256(data: Uint8Array): Uint8Array {
  return sha256(sha256(data));
}

export function sha3_256(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha3-256").update(data).digest());
}

export function keccak256(data: Uint8Array): Uint8Array {
  return keccak_256(data);
}

export function ripemd160(data: Uint8Array): Uint8Array {
  return nobleRipemd160(data);
}

/** RIPEMD-160 of SHA-256: the Bitcoin-style 20-byte key hash. */
export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(sha256(data));
}

/**
 * Blake2b with a configurable digest length (1..64 bytes).
 * 64 is Blake2b-512, 32 is Blake2b-256, 28 is Blake2b-224.
 */
export function blake2b(data: Uint8Array, outputLength = 64): Uint8Array {
  return nobleBlake2b(data, { dkLen: outputLength });
}
