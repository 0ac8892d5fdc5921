/**
 * Parses a hex string into a number.
 *
 * `parseInt` silently stops at the first non-hex character
 * (`parseInt('1g', 16) === 1`), so each character is checked
 * against its code point instead.
 *
 * Throws on an empty string or invalid hex characters.
 */
export function parseHex(hex: string): number {
  if (hex.length === 0) {
    throw new Error('empty hex string');
  }

  let value = 0;
  for (let i = 0; i < hex.length; i++) {
    const char = hex.charCodeAt(i);
    let digit: number;

    if (char >= 48 && char <= 57) {
      // 0-9
      digit = char - 48;
    } else if (char >= 97 && char <= 102) {
      // a-f
      digit = char - 87;
    } else if (char >= 65 && char <= 70) {
      // A-F
      digit = char - 55;
    } else {
      throw new Error('invalid hex character');
    }

    value = value * 16 + digit;
  }

  return value;
}

/**
 * Formats a byte as lowercase hex, left padded with zeros to `width`.
 */
export function toHex(byte: number, width = 2) {
  return byte.toString(16).padStart(width, '0');
}

/**
 * Splits a string into consecutive chunks of `size` characters.
 *
 * The last chunk is shorter when the length is not a multiple of `size`.
 */
export function chunk(str: string, size: number): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < str.length; i += size) {
    chunks.push(str.slice(i, i + size));
  }
  return chunks;
}

/**
 * Reverses the order of the 8 bits in a byte (`0x01` becomes `0x80`).
 */
export function reverseBits(byte: number) {
  let reversed = 0;
  for (let bit = 0; bit < 8; bit++) {
    reversed = (reversed << 1) | ((byte >> bit) & 1);
  }
  return reversed;
}
