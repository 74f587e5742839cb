/**
 * Derivation pipeline.
 *
 * Runs a registry DerivationSpec against a detected key:
 * select the key serialization, apply the hash steps in order, encode.
 */

import { err, ok, type Result } from "neverthrow";
import {
  CodecError,
  base58CheckEncode,
  base58Encode,
  bech32Encode,
  blake2b,
  checksumFromBytes,
  concatBytes,
  hexDecode,
  keccak256,
  ripemd160,
  sha256,
  sha3_256,
  ss58Encode,
  toWords,
  EVM_ADDRESS_LENGTH,
} from "@chainprobe/codec";
import type { DerivationSpec, Encoder, HashStep, KeyInput } from "@chainprobe/registry";
import type { DetectedKey } from "./detect.js";

export function keyInput(key: DetectedKey, input: KeyInput): Result<Uint8Array, CodecError> {
  if (input === "raw") return ok(key.raw);
  if (key.keyType !== "secp256k1") {
    return err(new CodecError("INVALID_ARGUMENT", `${key.keyType} keys have no '${input}' form`));
  }
  switch (input) {
    case "compressed":
      return ok(key.point.compressed);
    case "uncompressed":
      return ok(key.point.uncompressed);
    case "xy":
      return ok(key.point.uncompressed.subarray(1));
  }
}

export function applyStep(data: Uint8Array, step: HashStep): Result<Uint8Array, CodecError> {
  switch (step.op) {
    case "sha256":
      return ok(sha256(data));
    case "keccak256":
      return ok(keccak256(data));
    case "ripemd160":
      return ok(ripemd160(data));
    case "sha3-256":
      return ok(sha3_256(data));
    case "blake2b":
      return ok(blake2b(data, step.outputLength));
    case "slice": {
      const end = step.end ?? data.length;
      if (step.start > end || end > data.length) {
        return err(new CodecError("INVALID_LENGTH", `Cannot slice [${step.start}, ${end}) from ${data.length} bytes`));
      }
      return ok(data.slice(step.start, end));
    }
    case "prepend":
      return hexDecode(step.hex).map((prefix) => concatBytes(prefix, data));
  }
}

export function encodeDerived(encoder: Encoder, data: Uint8Array): Result<string, CodecError> {
  switch (encoder.type) {
    case "eip55":
      if (data.length !== EVM_ADDRESS_LENGTH) {
        return err(new CodecError("INVALID_LENGTH", `EIP-55 addresses are ${EVM_ADDRESS_LENGTH} bytes, got ${data.length}`));
      }
      return ok(checksumFromBytes(data));
    case "base58check":
      return base58CheckEncode(encoder.version, data);
    case "base58":
      return ok(base58Encode(data));
    case "bech32": {
      const words = toWords(data);
      return bech32Encode(
        encoder.hrp,
        encoder.witnessVersion !== undefined ? [encoder.witnessVersion, ...words] : words,
        encoder.variant,
      );
    }
    case "ss58":
      return ss58Encode(encoder.prefix, data);
  }
}

/**
 * Derive the address `spec` produces for `key`.
 */
export function runDerivation(spec: DerivationSpec, key: DetectedKey): Result<string, CodecError> {
  if (spec.keyType !== key.keyType) {
    return err(new CodecError("INVALID_ARGUMENT", `Derivation expects a ${spec.keyType} key, got ${key.keyType}`));
  }
  let current = keyInput(key, spec.input);
  for (const step of spec.steps) {
    current = current.andThen((data) => applyStep(data, step));
  }
  return current.andThen((data) => encodeDerived(spec.encoder, data));
}
