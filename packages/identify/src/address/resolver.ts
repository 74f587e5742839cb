/**
 * Address candidate resolution.
 *
 * Tries every (chain, format) pair the registry considers structurally
 * compatible, keeps the ones whose validator accepts the input, and scores
 * them. Rejections are kept as reasons for the error path.
 */

import type { ChainRegistry, AddressFormat, ChainDescriptor } from "@chainprobe/registry";
import type { Candidate, InputSignature } from "@chainprobe/types";
import { decodeAddress, encodeAddress, type DecodedAddress } from "./decode.js";
import { addressConfidence, type MatchStrength } from "./confidence.js";

/**
 * A candidate plus the canonical form of the input under that candidate.
 */
export interface ScoredCandidate {
  readonly candidate: Candidate;
  readonly normalized: string;
}

export interface AddressResolution {
  readonly candidates: readonly ScoredCandidate[];
  readonly reasons: readonly string[];
}

interface AddressMatch {
  readonly chain: ChainDescriptor;
  readonly format: AddressFormat;
  readonly decoded: DecodedAddress;
  readonly normalized: string;
  readonly strength: MatchStrength;
}

function hexByte(value: number): string {
  return `0x${value.toString(16).padStart(2, "0")}`;
}

function strengthOf(format: AddressFormat, decoded: DecodedAddress): MatchStrength {
  switch (decoded.encoding) {
    case "hex":
      return decoded.checksummed ? "exact" : "unchecksummed";
    case "base58":
      return "weak";
    case "ss58":
      return format.encoding === "ss58" && decoded.prefix !== format.prefix ? "weak" : "exact";
    case "base58check":
    case "bech32":
      return "exact";
  }
}

function describeMatch(match: AddressMatch): string {
  const { format, decoded } = match;
  switch (decoded.encoding) {
    case "hex":
      return decoded.checksummed
        ? `EIP-55 checksummed ${decoded.bytes.length}-byte hex ${format.label} address`
        : `${decoded.bytes.length}-byte hex ${format.label} address without EIP-55 checksum`;
    case "base58check":
      return `Base58Check ${format.label} address, version ${hexByte(decoded.version)}, checksum valid`;
    case "bech32": {
      const name = decoded.variant === "bech32m" ? "Bech32m" : "Bech32";
      const witness = decoded.witnessVersion !== undefined ? ` (witness v${decoded.witnessVersion})` : "";
      return `${name} ${format.label} address with HRP '${decoded.hrp}'${witness}`;
    }
    case "base58":
      return `Base58 string decoding to ${decoded.bytes.length} bytes (no checksum)`;
    case "ss58":
      return match.strength === "weak"
        ? `SS58 address with unregistered prefix ${decoded.prefix}`
        : `SS58 ${format.label} address with prefix ${decoded.prefix}, checksum valid`;
  }
}

/**
 * Every chain whose address format accepts the input.
 */
export function resolveAddressCandidates(
  signature: InputSignature,
  registry: ChainRegistry,
): AddressResolution {
  const matches: AddressMatch[] = [];
  const reasons: string[] = [];

  for (const { chain, format } of registry.compatibleWith(signature)) {
    const where = `${chain.id} ${format.label}`;
    const decoded = decodeAddress(format, signature.input);
    if (decoded.isErr()) {
      reasons.push(`${where}: ${decoded.error.message}`);
      continue;
    }

    const value = decoded.value;
    if (
      value.encoding === "ss58" &&
      format.encoding === "ss58" &&
      value.prefix !== format.prefix &&
      registry.ss58PrefixRegistered(value.prefix)
    ) {
      reasons.push(`${where}: SS58 prefix ${value.prefix} belongs to another chain`);
      continue;
    }

    const normalized = encodeAddress(format, value);
    if (normalized.isErr()) {
      reasons.push(`${where}: ${normalized.error.message}`);
      continue;
    }

    matches.push({
      chain,
      format,
      decoded: value,
      normalized: normalized.value,
      strength: strengthOf(format, value),
    });
  }

  // Families where more than one chain verified a checksum
  const exactByFamily = new Map<string, Set<string>>();
  for (const match of matches) {
    if (match.strength !== "exact") continue;
    const ids = exactByFamily.get(match.chain.family) ?? new Set<string>();
    ids.add(match.chain.id);
    exactByFamily.set(match.chain.family, ids);
  }

  const candidates = matches.map((match): ScoredCandidate => {
    const siblings = exactByFamily.get(match.chain.family)?.size ?? 0;
    const shared = siblings > 1;
    const reasoning = shared
      ? `${describeMatch(match)}; shared by ${siblings} ${match.chain.family} chains`
      : describeMatch(match);
    return {
      candidate: {
        chain: match.chain.id,
        confidence: addressConfidence(match.strength, match.chain.primary, shared),
        reasoning,
        kind: "address",
      },
      normalized: match.normalized,
    };
  });

  return { candidates, reasons };
}
