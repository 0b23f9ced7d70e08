// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view over a slice of the input array.
 * @param arr - The input Uint8Array to slice.
 * @param start - The starting index of the slice.
 * @param end - The ending index of the slice.
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Creates a new Uint8Array of the specified size and fills it with the specified value.
 * @param size - The size of the new Uint8Array.
 * @param fill - The value to fill the new Uint8Array with.
 */
export function allocUint8Array(size: number, fill: number = 0): Uint8Array {
  const arr: Uint8Array = new Uint8Array(size);
  if (fill !== 0) {
    arr.fill(fill);
  }
  return arr;
}

/**
 * Converts a Uint8Array to a hex string.
 * @param uint8arr - The Uint8Array to convert.
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += (HEX_TABLE[(b >> 4) & 0xf] ?? '') + (HEX_TABLE[b & 0xf] ?? '');
  }
  return hex;
}

/**
 * Encodes text as UTF-8 bytes. Protocol fields are plain ASCII.
 */
export function textToBytes(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * Decodes UTF-8 bytes to text.
 * @returns The decoded text, or null when the bytes are not valid UTF-8.
 */
export function bytesToText(bytes: Uint8Array): string | null {
  try {
    return textDecoder.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Printable form of a wire frame for logs: `\r` shown as `<CR>`.
 */
export function toPrintable(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    if (b === 0x0d) out += '<CR>';
    else if (b >= 0x20 && b < 0x7f) out += String.fromCharCode(b);
    else out += `\\x${(HEX_TABLE[(b >> 4) & 0xf] ?? '') + (HEX_TABLE[b & 0xf] ?? '')}`;
  }
  return out;
}

/**
 * Tests whether every byte in the range is an ASCII decimal digit.
 */
export function isAsciiDigits(bytes: Uint8Array): boolean {
  if (bytes.length === 0) return false;
  for (const b of bytes) {
    if (b < 0x30 || b > 0x39) return false;
  }
  return true;
}
