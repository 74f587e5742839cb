/**
 * Chain Registry
 *
 * Immutable catalogue of chain descriptors. Built once, read by every
 * identification; there are no mutating methods.
 *
 * Design rules:
 * - Declaration order is the tie-break order for equal confidence
 * - Each chain id appears exactly once
 * - Extension returns a new registry; existing instances never change
 */

import type { ChainId, ChainGroup, EncodingFamily, InputSignature, KeyType } from "@chainprobe/types";
import { RegistryError } from "./errors.js";
import type { AddressFormat, ChainDescriptor, DerivationSpec } from "./schema.js";

/**
 * A descriptor paired with one of its address formats.
 */
export interface FormatMatch {
  readonly chain: ChainDescriptor;
  readonly format: AddressFormat;
}

/**
 * A descriptor paired with its derivation for a key type.
 */
export interface DerivationMatch {
  readonly chain: ChainDescriptor;
  readonly derivation: DerivationSpec;
}

function deepFreeze(value: unknown): void {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
}

/**
 * Cheap structural pre-filter. Leaves the real validation to the decoders,
 * so anything that could still match passes.
 */
function formatMayMatch(format: AddressFormat, signature: InputSignature): boolean {
  switch (format.encoding) {
    case "hex":
      return signature.hex !== undefined && (format.prefix === "" || signature.hex.prefixed);
    case "base58check":
      return signature.base58 !== undefined && signature.base58.leadingByte === format.version;
    case "bech32":
      return signature.bech32 !== undefined && format.hrps.includes(signature.bech32.hrp);
    case "base58":
    case "ss58":
      return true;
    default: {
      const exhaustive: never = format;
      return exhaustive;
    }
  }
}

export class ChainRegistry {
  private readonly chains: readonly ChainDescriptor[];
  private readonly byId: ReadonlyMap<ChainId, ChainDescriptor>;
  private readonly order: ReadonlyMap<ChainId, number>;
  private readonly ss58Prefixes: ReadonlySet<number>;

  constructor(descriptors: readonly ChainDescriptor[]) {
    const byId = new Map<ChainId, ChainDescriptor>();
    const order = new Map<ChainId, number>();
    const ss58Prefixes = new Set<number>();

    descriptors.forEach((descriptor, index) => {
      if (byId.has(descriptor.id)) {
        throw new RegistryError(
          "DUPLICATE_CHAIN",
          `ChainRegistry: chain '${descriptor.id}' is declared more than once`,
        );
      }
      deepFreeze(descriptor);
      byId.set(descriptor.id, descriptor);
      order.set(descriptor.id, index);
      for (const format of descriptor.addressFormats) {
        if (format.encoding === "ss58") ss58Prefixes.add(format.prefix);
      }
    });

    this.chains = Object.freeze([...descriptors]);
    this.byId = byId;
    this.order = order;
    this.ss58Prefixes = ss58Prefixes;
  }

  /**
   * A new registry with `descriptors` appended after the existing rows.
   */
  extend(descriptors: readonly ChainDescriptor[]): ChainRegistry {
    return new ChainRegistry([...this.chains, ...descriptors]);
  }

  /**
   * All descriptors in declaration order.
   */
  all(): readonly ChainDescriptor[] {
    return this.chains;
  }

  get size(): number {
    return this.chains.length;
  }

  /**
   * Get a descriptor by id.
   * Throws if the chain is not registered.
   */
  get(id: ChainId): ChainDescriptor {
    const descriptor = this.byId.get(id);
    if (descriptor === undefined) {
      throw new RegistryError("UNKNOWN_CHAIN", `ChainRegistry: no chain registered with id '${id}'`);
    }
    return descriptor;
  }

  find(id: ChainId): ChainDescriptor | undefined {
    return this.byId.get(id);
  }

  has(id: ChainId): boolean {
    return this.byId.has(id);
  }

  /**
   * Declaration index of a chain, or -1 if unknown.
   */
  indexOf(id: ChainId): number {
    return this.order.get(id) ?? -1;
  }

  /**
   * Descriptors with at least one address format in `encoding`.
   */
  byFamily(encoding: EncodingFamily): readonly ChainDescriptor[] {
    return this.chains.filter((chain) =>
      chain.addressFormats.some((format) => format.encoding === encoding),
    );
  }

  /**
   * Descriptors in a sibling group (e.g., all "evm" chains).
   */
  byGroup(group: ChainGroup): readonly ChainDescriptor[] {
    return this.chains.filter((chain) => chain.family === group);
  }

  /**
   * Every (chain, format) pair structurally compatible with the signature.
   */
  compatibleWith(signature: InputSignature): readonly FormatMatch[] {
    const families = new Set(signature.families);
    const matches: FormatMatch[] = [];
    for (const chain of this.chains) {
      for (const format of chain.addressFormats) {
        if (families.has(format.encoding) && formatMayMatch(format, signature)) {
          matches.push({ chain, format });
        }
      }
    }
    return matches;
  }

  /**
   * Every chain with a derivation for `keyType`, in declaration order.
   */
  acceptingKeyType(keyType: KeyType): readonly DerivationMatch[] {
    const matches: DerivationMatch[] = [];
    for (const chain of this.chains) {
      const derivation = chain.derivations.find((d) => d.keyType === keyType);
      if (derivation !== undefined) matches.push({ chain, derivation });
    }
    return matches;
  }

  /**
   * Whether any descriptor claims `prefix` as its own SS58 prefix.
   */
  ss58PrefixRegistered(prefix: number): boolean {
    return this.ss58Prefixes.has(prefix);
  }
}
