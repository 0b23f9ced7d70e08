// src/framers/ascii-framer.ts
import type { GaugeFramer } from './gauge-framer.js';
import { FRAME } from '../constants/constants.js';
import { checksum } from '../utils/checksum.js';
import { concatUint8Arrays, isAsciiDigits, textToBytes, toPrintable } from '../utils/utils.js';
import {
  GaugeChecksumError,
  GaugeConfigError,
  GaugeError,
  GaugeInvalidAddressError,
  GaugeMalformedFrameError,
} from '../errors.js';
import type { AsciiFramerOptions, FrameDecodeResult } from '../types/gauge-types.js';

const EMPTY = new Uint8Array(0);

/**
 * `<3-digit id><payload><checksum>\r` framing shared by both gauge dialects.
 */
export class AsciiFramer implements GaugeFramer {
  private readonly _minSize: number;

  constructor(options: AsciiFramerOptions = {}) {
    const { minSize } = { minSize: FRAME.MIN_SIZE_PROTOCOL_A, ...options };
    if (!Number.isInteger(minSize) || minSize < 1) {
      throw new GaugeConfigError(`Invalid minimum frame size: ${minSize}`);
    }
    this._minSize = minSize;
  }

  public get minSize(): number {
    return this._minSize;
  }

  public decode(buffer: Uint8Array): FrameDecodeResult {
    if (buffer.length < this._minSize) {
      return { consumed: 0, deviceId: 0, payload: EMPTY };
    }

    const end = buffer.indexOf(FRAME.END_DELIMITER);
    if (end === -1) {
      return { consumed: 0, deviceId: 0, payload: EMPTY };
    }

    // A delimited frame is consumed whether or not it is valid
    const consumed = end + 1;
    if (this.diagnose(buffer.subarray(0, consumed)) !== null) {
      return { consumed, deviceId: 0, payload: EMPTY };
    }

    return {
      consumed,
      deviceId: parseDeviceId(buffer),
      payload: buffer.slice(FRAME.DEVICE_ID_LENGTH, end - 1),
    };
  }

  public encode(payload: Uint8Array, deviceId: number, _transactionId?: number): Uint8Array {
    if (!Number.isInteger(deviceId) || deviceId < 0 || deviceId > FRAME.MAX_DEVICE_ID) {
      throw new GaugeInvalidAddressError(deviceId);
    }
    const body = concatUint8Arrays([
      textToBytes(String(deviceId).padStart(FRAME.DEVICE_ID_LENGTH, '0')),
      payload,
    ]);
    return concatUint8Arrays([body, new Uint8Array([checksum(body), FRAME.END_DELIMITER])]);
  }

  /**
   * Explains why a delimited frame would be discarded.
   * @param frame - Bytes up to and including the end delimiter
   * @returns The reason, or null for a valid frame
   */
  public diagnose(frame: Uint8Array): GaugeError | null {
    const end = frame.length - 1;
    if (end < 0 || frame[end] !== FRAME.END_DELIMITER) {
      return new GaugeMalformedFrameError('Frame is not terminated by <CR>');
    }
    if (end < FRAME.DEVICE_ID_LENGTH + 1) {
      return new GaugeMalformedFrameError(`Frame too short: ${toPrintable(frame)}`);
    }
    if (!isAsciiDigits(frame.subarray(0, FRAME.DEVICE_ID_LENGTH))) {
      return new GaugeMalformedFrameError(`Invalid device id in frame: ${toPrintable(frame)}`);
    }
    const expected = checksum(frame.subarray(0, end - 1));
    const received = frame[end - 1] ?? 0;
    if (expected !== received) {
      return new GaugeChecksumError(expected, received);
    }
    return null;
  }
}

function parseDeviceId(buffer: Uint8Array): number {
  let id = 0;
  for (const b of buffer.subarray(0, FRAME.DEVICE_ID_LENGTH)) {
    id = id * 10 + (b - 0x30);
  }
  return id;
}

export function createProtocolAFramer(): AsciiFramer {
  return new AsciiFramer({ minSize: FRAME.MIN_SIZE_PROTOCOL_A });
}

export function createProtocolBFramer(): AsciiFramer {
  return new AsciiFramer({ minSize: FRAME.MIN_SIZE_PROTOCOL_B });
}
