// src/pdu/protocol-b.ts

import {
  AccessCode,
  ERROR_MESSAGE_DESCRIPTIONS,
  ErrorMessage,
  GaugeVerb,
  PROTOCOL_B_MAX_DATA,
} from '../constants/constants.js';
import { GaugeDataConversionError } from '../errors.js';
import type {
  ProtocolBCommand,
  ProtocolBDirection,
  ResolvedVerb,
} from '../types/gauge-types.js';
import { bytesToText, textToBytes } from '../utils/utils.js';

/** access digit + 2-char verb + 2-digit length */
const HEADER_LENGTH = 5;

const ACCESS_CODES = new Map<number, AccessCode>([
  [AccessCode.READ, AccessCode.READ],
  [AccessCode.WRITE, AccessCode.WRITE],
  [AccessCode.FACTORY_DEFAULT, AccessCode.FACTORY_DEFAULT],
  [AccessCode.STREAMING, AccessCode.STREAMING],
  [AccessCode.ERROR, AccessCode.ERROR],
  [AccessCode.BINARY, AccessCode.BINARY],
]);

const ERROR_MESSAGES = new Map<string, ErrorMessage>(
  Object.values(ErrorMessage).map(message => [message, message])
);

/**
 * Protocol-B verbs mapped onto the gauge verbs executed for read and write access.
 */
const VERB_TABLE: Record<string, { read?: GaugeVerb; write?: GaugeVerb }> = {
  TD: { read: GaugeVerb.TYPE },
  MV: { read: GaugeVerb.READ_PRESSURE, write: GaugeVerb.WRITE_PRESSURE },
  SP: { read: GaugeVerb.READ_SETPOINT, write: GaugeVerb.WRITE_SETPOINT },
  CA: { read: GaugeVerb.READ_CALIBRATION, write: GaugeVerb.WRITE_CALIBRATION },
  PE: { read: GaugeVerb.READ_PENNING_STATE, write: GaugeVerb.WRITE_PENNING_STATE },
  PS: { read: GaugeVerb.READ_PENNING_SYNC, write: GaugeVerb.WRITE_PENNING_SYNC },
  AJ: { write: GaugeVerb.ADJUST },
};

/**
 * @returns The access code for a digit, or null when it is not one of the six known codes
 */
export function accessCodeFromInt(value: number): AccessCode | null {
  return ACCESS_CODES.get(value) ?? null;
}

/**
 * Wire digit of the reply to a request: request + 1, except for the reply-only
 * STREAMING and ERROR codes.
 */
export function replyAccessDigit(code: AccessCode): number {
  return code === AccessCode.STREAMING || code === AccessCode.ERROR ? code : code + 1;
}

export function errorMessageFromString(value: string): ErrorMessage | null {
  return ERROR_MESSAGES.get(value) ?? null;
}

export function describeErrorMessage(message: ErrorMessage): string {
  return ERROR_MESSAGE_DESCRIPTIONS[message];
}

export function createProtocolBCommand(
  accessCode: AccessCode,
  verb: string,
  data: string = ''
): ProtocolBCommand {
  return { accessCode, verb, data, length: textToBytes(data).length };
}

/**
 * Maps a Protocol-B command onto the gauge verb it executes. The access code
 * selects the read or write side; anything else is pass-through.
 */
export function resolveProtocolBVerb(command: ProtocolBCommand): ResolvedVerb {
  const entry = VERB_TABLE[command.verb];
  let verb: GaugeVerb | undefined;
  if (command.accessCode === AccessCode.READ) verb = entry?.read;
  else if (command.accessCode === AccessCode.WRITE) verb = entry?.write;
  return verb ? { kind: 'known', verb } : { kind: 'passthrough' };
}

function decode(raw: Uint8Array, adjustAccessCode: boolean): ProtocolBCommand | null {
  if (raw.length < HEADER_LENGTH) return null;
  const header = bytesToText(raw.subarray(0, HEADER_LENGTH));
  if (header === null || !/^\d..\d\d$/.test(header)) return null;

  let digit = Number(header[0]);
  if (adjustAccessCode && digit !== AccessCode.STREAMING && digit !== AccessCode.ERROR) {
    digit -= 1;
  }
  const accessCode = accessCodeFromInt(digit);
  if (accessCode === null) return null;

  const length = Number(header.slice(3, 5));
  if (raw.length < HEADER_LENGTH + length) return null;
  const data = bytesToText(raw.subarray(HEADER_LENGTH, HEADER_LENGTH + length));
  if (data === null) return null;

  return { accessCode, verb: header.slice(1, 3), data, length };
}

/**
 * Decodes a reply payload. The wire access digit is decremented to recover the
 * request code, unless it is STREAMING or ERROR.
 * @returns The command, or null on any parse failure
 */
export function decodeProtocolB(raw: Uint8Array): ProtocolBCommand | null {
  return decode(raw, true);
}

/**
 * Decodes a request payload, where the wire digit is the access code itself.
 */
export function decodeProtocolBRequest(raw: Uint8Array): ProtocolBCommand | null {
  return decode(raw, false);
}

/**
 * Encodes `digit + verb + 2-digit length + data`. Replies carry the incremented
 * access digit.
 * @throws GaugeDataConversionError when the verb is not 2 characters or the data
 * does not fit the length field
 */
export function encodeProtocolB(
  command: ProtocolBCommand,
  direction: ProtocolBDirection = 'request'
): Uint8Array {
  if (command.verb.length !== 2) {
    throw new GaugeDataConversionError(command.verb, '2-character verb');
  }
  const length = textToBytes(command.data).length;
  if (length > PROTOCOL_B_MAX_DATA) {
    throw new GaugeDataConversionError(command.data, `at most ${PROTOCOL_B_MAX_DATA} data bytes`);
  }
  const digit = direction === 'reply' ? replyAccessDigit(command.accessCode) : command.accessCode;
  return textToBytes(`${digit}${command.verb}${String(length).padStart(2, '0')}${command.data}`);
}
