// src/pdu/protocol-a.ts

import { GaugeVerb, PROTOCOL_A_MAX_DATA } from '../constants/constants.js';
import type { ProtocolACommand, ResolvedVerb } from '../types/gauge-types.js';
import { bytesToText, concatUint8Arrays, textToBytes } from '../utils/utils.js';

const GAUGE_VERBS: ReadonlySet<string> = new Set<string>(Object.values(GaugeVerb));

function isGaugeVerb(verb: string): verb is GaugeVerb {
  return GAUGE_VERBS.has(verb);
}

/** Longest prefix of `text` that fits in `maxBytes` UTF-8 bytes */
function truncateUtf8(text: string, maxBytes: number): string {
  let out = '';
  let size = 0;
  for (const ch of text) {
    size += textToBytes(ch).length;
    if (size > maxBytes) break;
    out += ch;
  }
  return out;
}

/**
 * Resolves a verb character into a known gauge verb or the pass-through fallback.
 */
export function resolveProtocolAVerb(verb: string): ResolvedVerb {
  return isGaugeVerb(verb) ? { kind: 'known', verb } : { kind: 'passthrough' };
}

/**
 * Builds a Protocol-A command. Only the first character of `verb` is kept and
 * data is cut to 6 UTF-8 bytes on a character boundary.
 * @param verb - Command verb, e.g. 'M'
 * @param data - ASCII data field
 */
export function createProtocolACommand(verb: string = '', data: string = ''): ProtocolACommand {
  const v = verb.slice(0, 1);
  const d = truncateUtf8(data, PROTOCOL_A_MAX_DATA);
  return {
    verb: v,
    resolved: resolveProtocolAVerb(v),
    data: d,
    length: textToBytes(d).length,
    functionCode: v.codePointAt(0) ?? 0,
  };
}

/**
 * Encodes the data field of a command. The verb is not included.
 */
export function encodeProtocolA(command: ProtocolACommand): Uint8Array {
  return textToBytes(command.data);
}

/**
 * Wire payload handed to the framer: verb followed by data.
 */
export function toProtocolAPayload(command: ProtocolACommand): Uint8Array {
  return concatUint8Arrays([textToBytes(command.verb), encodeProtocolA(command)]);
}

/**
 * Decodes a frame payload: byte 0 is the verb, the rest is data capped at 6 bytes.
 * @returns The command, or null when the payload is empty or not valid text
 */
export function decodeProtocolA(raw: Uint8Array): ProtocolACommand | null {
  if (raw.length === 0) return null;
  const verb = bytesToText(raw.subarray(0, 1));
  const data = bytesToText(raw.subarray(1));
  if (verb === null || data === null) return null;
  return createProtocolACommand(verb, data);
}
