import { ParseError } from '../errors.js';

const HEX_RE = /^[0-9A-Fa-f]*$/;

export function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Uppercase hex of `value`, zero padded to `digits`. Wider values are not truncated.
 */
export function toHex(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}

export function bytesToHex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += toHexByte(b);
  return out;
}

export function isHex(text: string): boolean {
  return HEX_RE.test(text);
}

/**
 * Decode an even-length hex string. Throws `ParseError` on odd length or non-hex characters.
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) throw new ParseError(`odd-length hex string '${hex}'`);
  if (!isHex(hex)) throw new ParseError(`non-hexadecimal digit found in '${hex}'`);
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/**
 * Big-endian unsigned integer of `bytes`. Safe up to 6 bytes.
 */
export function bytesToUint(bytes: Uint8Array): number {
  let value = 0;
  for (const b of bytes) value = value * 0x100 + b;
  return value;
}

/**
 * Big-endian encoding of `value` on `size` bytes.
 */
export function uintToBytes(value: number, size: number): Uint8Array {
  const out = new Uint8Array(size);
  let rest = value;
  for (let i = size - 1; i >= 0; i--) {
    out[i] = rest % 0x100;
    rest = Math.floor(rest / 0x100);
  }
  return out;
}

export function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}
