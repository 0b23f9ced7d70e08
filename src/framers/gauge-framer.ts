// src/framers/gauge-framer.ts

import type { GaugeError } from '../errors.js';
import type { FrameDecodeResult } from '../types/gauge-types.js';

/**
 * Segments a receive buffer into addressed frames and builds outgoing frames.
 */
export interface GaugeFramer {
  /**
   * Decodes at most one frame from the head of the buffer.
   * `consumed === 0` means more bytes are needed; a non-zero `consumed` with
   * `deviceId === 0` and an empty payload marks a discarded frame.
   */
  decode(buffer: Uint8Array): FrameDecodeResult;

  /**
   * Wraps a payload with the device id, checksum and end delimiter.
   * The transaction id is accepted for interface compatibility and ignored.
   */
  encode(payload: Uint8Array, deviceId: number, transactionId?: number): Uint8Array;

  /**
   * Reason a delimited frame is discarded, or null when it is valid.
   */
  diagnose?(frame: Uint8Array): GaugeError | null;
}
