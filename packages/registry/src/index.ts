/**
 * @chainprobe/registry — Chain metadata registry.
 *
 * Maps structural input signatures to candidate chains and holds the
 * public-key derivation recipe for each chain. New chains are rows in
 * data/chains.json, never new code.
 */

export { ChainRegistry } from "./registry.js";
export type { FormatMatch, DerivationMatch } from "./registry.js";

export { defaultRegistry, loadRegistryFile, parseChainDescriptors } from "./load.js";

export { RegistryError } from "./errors.js";
export type { RegistryErrorCode } from "./errors.js";

export {
  AddressFormatSchema,
  ChainDescriptorSchema,
  ChainDescriptorListSchema,
  DerivationSpecSchema,
  EncoderSchema,
  HashStepSchema,
} from "./schema.js";
export type {
  AddressFormat,
  HexFormat,
  Base58CheckFormat,
  Bech32Format,
  Base58Format,
  Ss58Format,
  ChainDescriptor,
  DerivationSpec,
  Encoder,
  HashStep,
  KeyInput,
} from "./schema.js";
