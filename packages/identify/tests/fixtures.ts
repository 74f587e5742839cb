/**
 * Shared test vectors.
 */

/** secp256k1 generator point, i.e. the public key of private key 1. */
export const G_COMPRESSED = "0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798";
export const G_UNCOMPRESSED =
  "0479be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798" +
  "483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8";

/** hash160 of G_COMPRESSED */
export const G_HASH160 = "751e76e8199196d454941c45d1b3a323f1433bd6";

export const G_EVM_ADDRESS = "0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf";
export const G_BTC_COMPRESSED = "1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH";
export const G_BTC_UNCOMPRESSED = "1EHNa6Q4Jz2uvNExL497mE43ikXhwF6kZm";

/** A well-known 32-byte development key. */
export const ED_KEY = "d43593c715fdd31c61141abd04a99fd6822c8558854ccde39a5684e7a56da27d";
export const ED_KEY_SUBSTRATE = "5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY";
export const ED_KEY_POLKADOT = "15oF4uVJwmo4TdGW7VfQxNLavjCXviqxT9S1MgbjMNHr6Sp5";

export const GENESIS_ADDRESS = "1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa";
export const P2SH_ADDRESS = "3J98t1WpEZ73CNmQviecrnyiWrnqRhWNLy";
export const P2WPKH_ADDRESS = "bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4";
export const P2TR_ADDRESS = "bc1p0xlxvlhemja6c4dqv22uapctqupfhlxm9h8z3k2e72q4k9hcz7vqzk5jj0";

export const EVM_LOWER = "0xd8da6bf26964af9d7eed9e03e53415d37aa96045";
export const EVM_CHECKSUMMED = "0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045";

export const SOLANA_ADDRESS = "TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA";

export const EVM_CHAINS = [
  "ethereum",
  "polygon",
  "bsc",
  "avalanche",
  "arbitrum",
  "optimism",
  "base",
  "fantom",
  "celo",
  "gnosis",
];

export const COSMOS_CHAINS = [
  "cosmos-hub",
  "osmosis",
  "juno",
  "akash",
  "stargaze",
  "secret-network",
  "terra",
  "kava",
  "regen",
  "sentinel",
];
