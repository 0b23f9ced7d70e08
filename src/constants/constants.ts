// src/constants/constants.ts

/**
 * Framing constants shared by both gauge dialects
 */
export const FRAME = {
  END_DELIMITER: 0x0d,
  DEVICE_ID_LENGTH: 3,
  MAX_DEVICE_ID: 999,
  /** 3-digit id + checksum, empty payload */
  MIN_SIZE_PROTOCOL_A: 4,
  /** Protocol-B payload is never empty */
  MIN_SIZE_PROTOCOL_B: 6,
} as const;

/** Protocol-A data field never carries more than 6 bytes */
export const PROTOCOL_A_MAX_DATA = 6;

/** Protocol-B declared length is two decimal digits */
export const PROTOCOL_B_MAX_DATA = 99;

export const DEFAULT_MODEL = 'MTM09D';

/** Only code accepted when an atmosphere adjustment is pending */
export const ATMOSPHERE_CODE = '100023';

/** Only code accepted when a zero adjustment is pending */
export const ZERO_CODE = '000000';

/** Value written to the pressure pair on a successful atmosphere adjustment, mbar */
export const ATMOSPHERE_PRESSURE = 1000;

export const PRESSURE_EXPONENT_BIAS = 20;
export const PRESSURE_ZERO_EXPONENT = -1;

/**
 * Protocol-A command verbs
 */
export enum GaugeVerb {
  TYPE = 'T',
  READ_PRESSURE = 'M',
  WRITE_PRESSURE = 'm',
  READ_SETPOINT = 'S',
  WRITE_SETPOINT = 's',
  READ_CALIBRATION = 'C',
  WRITE_CALIBRATION = 'c',
  READ_PENNING_STATE = 'I',
  WRITE_PENNING_STATE = 'i',
  READ_PENNING_SYNC = 'W',
  WRITE_PENNING_SYNC = 'w',
  ADJUST = 'j',
}

/**
 * Protocol-B access codes. Reply digits are request + 1, except the reply-only
 * STREAMING and ERROR codes.
 */
export enum AccessCode {
  READ = 0,
  WRITE = 2,
  FACTORY_DEFAULT = 4,
  STREAMING = 6,
  ERROR = 7,
  BINARY = 8,
}

/**
 * Error messages carried in the data field of a Protocol-B ERROR reply
 */
export enum ErrorMessage {
  NO_DEF = 'NO_DEF',
  LOGIC = '_LOGIC',
  RANGE = '_RANGE',
  ERROR1 = 'ERROR1',
  SYNTAX = 'SYNTAX',
  LENGTH = 'LENGTH',
  CD_RE = '_CD_RE',
  EP_RE = '_EP_RE',
  UNSUP = '_UNSUP',
  SEDIS = '_SEDIS',
}

export const ERROR_MESSAGE_DESCRIPTIONS: Record<ErrorMessage, string> = {
  [ErrorMessage.NO_DEF]: 'Command is not valid (not defined) for device.',
  [ErrorMessage.LOGIC]: 'Access Code is not valid or execution of command is not logical.',
  [ErrorMessage.RANGE]: 'Value in send request is out of range.',
  [ErrorMessage.ERROR1]: 'Sensor is defect or stacked out.',
  [ErrorMessage.SYNTAX]: 'Command is valid, but data contains a syntax error.',
  [ErrorMessage.LENGTH]: 'Command is valid, but data length is out of range.',
  [ErrorMessage.CD_RE]: 'Calibration data read error.',
  [ErrorMessage.EP_RE]: 'EEPROM read error.',
  [ErrorMessage.UNSUP]: 'Unsupported data (not valid value).',
  [ErrorMessage.SEDIS]: 'Sensor element disabled.',
};

/**
 * Word offsets of the flat register image (16 words)
 */
export const REGISTER_OFFSETS = {
  PRESSURE: 0,
  SETPOINT_1: 2,
  SETPOINT_2: 4,
  CALIBRATION_1: 6,
  CALIBRATION_2: 8,
  PENNING_STATE: 10,
  PENNING_SYNC: 11,
  SETPOINT_SELECT: 12,
  CALIBRATION_SELECT: 13,
  ATMOSPHERE_SELECT: 14,
  ZERO_SELECT: 15,
} as const;

export const REGISTER_COUNT = 16;
