// src/utils/checksum.ts

/**
 * Computes the printable frame checksum: sum of all bytes modulo 64, offset by 64.
 * The result always lies in [64, 127].
 * @param msg - Bytes preceding the checksum (device id digits and payload)
 * @returns Checksum byte value
 */
export function checksum(msg: Uint8Array): number {
  let sum = 0;
  for (const b of msg) {
    sum += b;
  }
  return (sum % 64) + 64;
}

/**
 * Checks a received checksum byte against the bytes it covers.
 */
export function verifyChecksum(msg: Uint8Array, candidate: number): boolean {
  return checksum(msg) === candidate;
}
