/**
 * Chain descriptor schema.
 *
 * Descriptors are plain JSON validated with Zod at load time. Adding a chain
 * means adding a row; every variant below is a closed union the engine
 * dispatches on exhaustively.
 *
 * Design rules:
 * - Address formats describe structure only (no chain-specific code)
 * - At most one derivation per key type
 * - Ed25519 keys feed derivations as-is ("raw")
 */

import { z } from "zod";

// =============================================================================
// Address formats
// =============================================================================

const Label = z.string().min(1);

const HexByte = z.number().int().min(0).max(255);

export const Bech32VariantSchema = z.enum(["bech32", "bech32m"]);

export const HexFormatSchema = z.object({
  encoding: z.literal("hex"),
  label: Label,
  prefix: z.string().default("0x"),
  byteLength: z.number().int().positive(),
  checksum: z.enum(["eip55", "none"]),
});

export const Base58CheckFormatSchema = z.object({
  encoding: z.literal("base58check"),
  label: Label,
  version: HexByte,
  payloadLength: z.number().int().positive(),
});

// Lowercase printable ASCII; canonical Bech32 output is lowercase.
const Hrp = z.string().regex(/^[\x21-\x40\x5b-\x7e]+$/, "hrp must be lowercase printable ASCII");

export const Bech32FormatSchema = z.object({
  encoding: z.literal("bech32"),
  label: Label,
  hrps: z.array(Hrp).min(1),
  variant: Bech32VariantSchema,
  witnessVersion: z.number().int().min(0).max(16).optional(),
  programLength: z
    .object({
      min: z.number().int().min(0),
      max: z.number().int().min(0),
    })
    .refine((range) => range.min <= range.max, { message: "programLength.min exceeds max" }),
  maxLength: z.number().int().positive().optional(),
});

export const Base58FormatSchema = z.object({
  encoding: z.literal("base58"),
  label: Label,
  byteLength: z.number().int().positive(),
});

export const Ss58FormatSchema = z.object({
  encoding: z.literal("ss58"),
  label: Label,
  prefix: z.number().int().min(0).max(16383),
  acceptUnregistered: z.boolean().default(false),
});

export const AddressFormatSchema = z.discriminatedUnion("encoding", [
  HexFormatSchema,
  Base58CheckFormatSchema,
  Bech32FormatSchema,
  Base58FormatSchema,
  Ss58FormatSchema,
]);

export type HexFormat = z.infer<typeof HexFormatSchema>;
export type Base58CheckFormat = z.infer<typeof Base58CheckFormatSchema>;
export type Bech32Format = z.infer<typeof Bech32FormatSchema>;
export type Base58Format = z.infer<typeof Base58FormatSchema>;
export type Ss58Format = z.infer<typeof Ss58FormatSchema>;
export type AddressFormat = z.infer<typeof AddressFormatSchema>;

// =============================================================================
// Derivations
// =============================================================================

export const HashStepSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("sha256") }),
  z.object({ op: z.literal("keccak256") }),
  z.object({ op: z.literal("ripemd160") }),
  z.object({ op: z.literal("sha3-256") }),
  z.object({ op: z.literal("blake2b"), outputLength: z.number().int().min(1).max(64) }),
  z.object({
    op: z.literal("slice"),
    start: z.number().int().min(0),
    end: z.number().int().min(0).optional(),
  }),
  z.object({ op: z.literal("prepend"), hex: z.string().regex(/^(?:[0-9a-f]{2})+$/) }),
]);

export const EncoderSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("eip55") }),
  z.object({ type: z.literal("base58check"), version: HexByte }),
  z.object({ type: z.literal("base58") }),
  z.object({
    type: z.literal("bech32"),
    hrp: Hrp,
    variant: Bech32VariantSchema,
    witnessVersion: z.number().int().min(0).max(16).optional(),
  }),
  z.object({ type: z.literal("ss58"), prefix: z.number().int().min(0).max(16383) }),
]);

export const KeyInputSchema = z.enum(["raw", "compressed", "uncompressed", "xy"]);

export const DerivationSpecSchema = z
  .object({
    keyType: z.enum(["secp256k1", "ed25519"]),
    input: KeyInputSchema,
    steps: z.array(HashStepSchema),
    encoder: EncoderSchema,
  })
  .refine((spec) => spec.keyType === "secp256k1" || spec.input === "raw", {
    message: "ed25519 derivations take the raw key",
    path: ["input"],
  });

export type HashStep = z.infer<typeof HashStepSchema>;
export type Encoder = z.infer<typeof EncoderSchema>;
export type KeyInput = z.infer<typeof KeyInputSchema>;
export type DerivationSpec = z.infer<typeof DerivationSpecSchema>;

// =============================================================================
// Descriptor
// =============================================================================

export const ChainDescriptorSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "id must be kebab-case"),
    name: z.string().min(1),
    family: z.string().min(1),
    primary: z.boolean().default(false),
    addressFormats: z.array(AddressFormatSchema).min(1),
    derivations: z.array(DerivationSpecSchema).default([]),
  })
  .superRefine((descriptor, ctx) => {
    const seen = new Set<string>();
    for (const derivation of descriptor.derivations) {
      if (seen.has(derivation.keyType)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate ${derivation.keyType} derivation`,
          path: ["derivations"],
        });
      }
      seen.add(derivation.keyType);
    }
  });

export const ChainDescriptorListSchema = z.array(ChainDescriptorSchema);

export type ChainDescriptor = z.infer<typeof ChainDescriptorSchema>;
