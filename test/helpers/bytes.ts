import { checksum } from '../../src/utils/checksum.js';

export const ascii = (text: string): Uint8Array => new TextEncoder().encode(text);

export const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

/**
 * Builds a wire frame: 3-digit id, payload, checksum and <CR>.
 */
export function frame(deviceId: number, payload: string): Uint8Array {
  const body = ascii(`${String(deviceId).padStart(3, '0')}${payload}`);
  return new Uint8Array([...body, checksum(body), 0x0d]);
}
