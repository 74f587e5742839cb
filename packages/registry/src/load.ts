/**
 * Descriptor loading.
 *
 * Built-in descriptors ship as data/chains.json beside the sources. Extra
 * descriptors can be read from any JSON file of the same shape.
 */

import { readFileSync } from "node:fs";
import { RegistryError } from "./errors.js";
import { ChainRegistry } from "./registry.js";
import { ChainDescriptorListSchema, type ChainDescriptor } from "./schema.js";

const BUILTIN_CHAINS = new URL("../data/chains.json", import.meta.url);

/**
 * Validate raw JSON against the descriptor schema.
 *
 * @throws {RegistryError} INVALID_DESCRIPTOR with the first schema issue
 */
export function parseChainDescriptors(raw: unknown): readonly ChainDescriptor[] {
  const parsed = ChainDescriptorListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new RegistryError(
      "INVALID_DESCRIPTOR",
      `Invalid chain descriptor${where}: ${issue?.message ?? parsed.error.message}`,
    );
  }
  return parsed.data;
}

/**
 * Read and validate a descriptor file.
 */
export function loadRegistryFile(path: string | URL): readonly ChainDescriptor[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RegistryError("INVALID_DESCRIPTOR", `Cannot read chain descriptors from ${String(path)}: ${reason}`);
  }
  return parseChainDescriptors(raw);
}

let builtin: ChainRegistry | undefined;

/**
 * Process-wide registry of the built-in chains, built on first use.
 */
export function defaultRegistry(): ChainRegistry {
  if (builtin === undefined) {
    builtin = new ChainRegistry(loadRegistryFile(BUILTIN_CHAINS));
  }
  return builtin;
}
