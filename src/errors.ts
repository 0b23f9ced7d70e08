// src/errors.ts

import { ERROR_MESSAGE_DESCRIPTIONS, type ErrorMessage } from './constants/constants.js';

/**
 * Base class for all gauge protocol errors
 */
export class GaugeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GaugeError';
  }
}

/**
 * Error class for a transport read that did not complete in time
 */
export class GaugeTimeoutError extends GaugeError {
  constructor(message: string = 'Gauge request timed out') {
    super(message);
    this.name = 'GaugeTimeoutError';
  }
}

/**
 * Error class for checksum mismatch
 */
export class GaugeChecksumError extends GaugeError {
  constructor(expected: number, received: number) {
    super(`Checksum mismatch: expected 0x${expected.toString(16)}, got 0x${received.toString(16)}`);
    this.name = 'GaugeChecksumError';
  }
}

/**
 * Error class for a delimited frame that cannot be parsed
 */
export class GaugeMalformedFrameError extends GaugeError {
  constructor(message: string = 'Malformed gauge frame') {
    super(message);
    this.name = 'GaugeMalformedFrameError';
  }
}

/**
 * Error class for values that cannot be represented on the wire
 */
export class GaugeDataConversionError extends GaugeError {
  constructor(value: unknown, expected: string) {
    super(`Cannot convert value ${String(value)}: expected ${expected}`);
    this.name = 'GaugeDataConversionError';
  }
}

/**
 * Error class for a device id outside the 3-digit range
 */
export class GaugeInvalidAddressError extends GaugeError {
  constructor(deviceId: number) {
    super(`Invalid device id: ${deviceId}. Device id must be between 0-999.`);
    this.name = 'GaugeInvalidAddressError';
  }
}

/**
 * Error class for invalid configuration
 */
export class GaugeConfigError extends GaugeError {
  constructor(message: string = 'Invalid gauge configuration') {
    super(message);
    this.name = 'GaugeConfigError';
  }
}

/**
 * Error class for operations on a closed transport
 */
export class GaugeNotConnectedError extends GaugeError {
  constructor(message: string = 'Transport is not connected') {
    super(message);
    this.name = 'GaugeNotConnectedError';
  }
}

/**
 * Error class for receive buffer overflow
 */
export class GaugeBufferOverflowError extends GaugeError {
  constructor(size: number, max: number) {
    super(`Buffer overflow: ${size} bytes exceeds maximum ${max}`);
    this.name = 'GaugeBufferOverflowError';
  }
}

/**
 * Error class for a Protocol-B ERROR reply
 */
export class GaugeDeviceError extends GaugeError {
  readonly errorMessage: ErrorMessage;

  constructor(errorMessage: ErrorMessage) {
    super(`Device error ${errorMessage}: ${ERROR_MESSAGE_DESCRIPTIONS[errorMessage]}`);
    this.name = 'GaugeDeviceError';
    this.errorMessage = errorMessage;
  }
}

// --- Node serial transport errors ---

/**
 * Base error for NodeSerialTransport
 */
export class NodeSerialTransportError extends GaugeError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialTransportError';
  }
}

/**
 * Error opening or configuring the serial port
 */
export class NodeSerialConnectionError extends NodeSerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialConnectionError';
  }
}

/**
 * Error reading from the serial port
 */
export class NodeSerialReadError extends NodeSerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialReadError';
  }
}

/**
 * Error writing to the serial port
 */
export class NodeSerialWriteError extends NodeSerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialWriteError';
  }
}
