/**
 * @chainprobe/identify — Blockchain address and public-key identification.
 *
 * `identify(input)` returns every chain the input could belong to, ranked
 * by confidence, with the input normalized under the top candidate. Public
 * keys come back with the address each chain derives from them.
 */

export { identify, createIdentifier, rankCandidates } from "./identify.js";
export type { Identifier, IdentifierOptions } from "./identify.js";

export { characterize, caseKindOf } from "./characterize.js";

export { decodeAddress, encodeAddress } from "./address/decode.js";
export type { DecodedAddress } from "./address/decode.js";
export { resolveAddressCandidates } from "./address/resolver.js";
export type { AddressResolution, ScoredCandidate } from "./address/resolver.js";
export { CONFIDENCE, addressConfidence, derivedConfidence } from "./address/confidence.js";
export type { MatchStrength } from "./address/confidence.js";

export { detectPublicKey } from "./public-key/detect.js";
export type { DetectedKey, Ed25519Key, KeyEncoding, Secp256k1Key } from "./public-key/detect.js";
export { applyStep, encodeDerived, keyInput, runDerivation } from "./public-key/pipeline.js";
export { resolvePublicKeyCandidates } from "./public-key/resolver.js";
export type { KeyResolution } from "./public-key/resolver.js";

export { IdentificationError } from "./errors.js";
export type { IdentificationErrorCode } from "./errors.js";

export { ConfigSchema, loadConfig, tryLoadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export type { Candidate, IdentificationResult, InputSignature } from "@chainprobe/types";
