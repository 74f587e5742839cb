/**
 * Ed25519 key shape.
 *
 * A public key is the little-endian y coordinate with the sign of x in the
 * top bit. Only the shape is checked; the point itself is not decoded, so
 * sr25519 keys pass as well.
 */

export const ED25519_P = 2n ** 255n - 19n;

export const ED25519_KEY_LENGTH = 32;

export function isEd25519Shaped(bytes: Uint8Array): boolean {
  if (bytes.length !== ED25519_KEY_LENGTH) return false;
  let y = 0n;
  for (let i = ED25519_KEY_LENGTH - 1; i >= 0; i--) {
    const byte = bytes[i] ?? 0;
    y = (y << 8n) | BigInt(i === ED25519_KEY_LENGTH - 1 ? byte & 0x7f : byte);
  }
  return y < ED25519_P;
}
