/**
 * @chainprobe/codec — Encoding, hashing and checksum primitives.
 *
 * Every decoder returns a neverthrow Result; nothing here throws on
 * malformed input.
 */

export { CodecError } from "./errors.js";
export type { CodecErrorCode } from "./errors.js";

export { concatBytes, bytesEqual, utf8Bytes } from "./bytes.js";

// Encodings
export { hexDecode, hexEncode, isHex, stripHexPrefix } from "./encoding/hex.js";
export { BASE58_ALPHABET, base58Decode, base58Encode, isBase58 } from "./encoding/base58.js";
export {
  BECH32_CHARSET,
  BECH32_MAX_LENGTH,
  bech32CreateChecksum,
  bech32Decode,
  bech32Encode,
  bech32Polymod,
  bech32VerifyChecksum,
  convertBits,
  fromWords,
  hrpExpand,
  toWords,
} from "./encoding/bech32.js";
export type { Bech32Decoded, Bech32Variant } from "./encoding/bech32.js";

// Crypto
export { blake2b, doubleSha256, hash160, keccak256, ripemd160, sha256, sha3_256 } from "./crypto/hash.js";
export {
  SECP256K1_P,
  compressPublicKey,
  decompressPublicKey,
  isOnCurve,
  parseSecp256k1PublicKey,
} from "./crypto/secp256k1.js";
export type { Secp256k1Form, Secp256k1PublicKey } from "./crypto/secp256k1.js";
export { ED25519_KEY_LENGTH, ED25519_P, isEd25519Shaped } from "./crypto/ed25519.js";

// Checksums
export { base58CheckChecksum, base58CheckDecode, base58CheckEncode } from "./checksum/base58check.js";
export type { Base58CheckPayload } from "./checksum/base58check.js";
export { EVM_ADDRESS_LENGTH, checksumFromBytes, toChecksumAddress, verifyEip55 } from "./checksum/eip55.js";
export type { Eip55Address } from "./checksum/eip55.js";
export { SS58_MAX_PREFIX, ss58Checksum, ss58Decode, ss58Encode, ss58PrefixBytes } from "./checksum/ss58.js";
export type { Ss58Address } from "./checksum/ss58.js";
