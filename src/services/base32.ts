/** RFC 4648 base32 alphabet. */
export const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

/** Padding characters needed after a final group of 0-4 input bytes. */
const PADDING_BY_REMAINDER = ["", "======", "====", "===", "="];

/**
 * Encodes bytes as RFC 4648 base32 text, padded with `=` to a multiple of
 * 8 characters. Empty input gives an empty string.
 */
export function encodeBase32(bytes: Uint8Array): string {
  let bits = 0;
  let value = 0;
  let output = "";

  for (let i = 0; i < bytes.length; i++) {
    value = ((value << 8) | bytes[i]) & 0xfff;
    bits += 8;
    while (bits >= 5) {
      output += BASE32_ALPHABET[(value >>> (bits - 5)) & 31];
      bits -= 5;
    }
  }
  if (bits > 0) {
    output += BASE32_ALPHABET[(value << (5 - bits)) & 31];
  }

  return output + PADDING_BY_REMAINDER[bytes.length % 5];
}

/** Base32 without the trailing `=`, the form authenticator apps accept. */
export function encodeBase32Unpadded(bytes: Uint8Array): string {
  return encodeBase32(bytes).replace(/=+$/, "");
}
