// src/gauge-emulator/command-interpreter.ts

import {
  ATMOSPHERE_CODE,
  DEFAULT_MODEL,
  GaugeVerb,
  ZERO_CODE,
} from '../constants/constants.js';
import type { ResolvedVerb } from '../types/gauge-types.js';
import { calibrationDecode, pressureDecode } from '../utils/numeric.js';
import {
  calibrationPair,
  type ChannelIndex,
  type GaugeRegisters,
  type RegisterPair,
  type RegisterWord,
  setpointPair,
  toChannelIndex,
} from './register-model.js';

const WORD_PATTERN = /^\d+$/;

/** Numeric reads are reported as at least six digits */
function formatCode(value: number): string {
  return String(value).padStart(6, '0');
}

function fitsPair(code: string): boolean {
  const value = Number(code);
  return Number.isSafeInteger(value) && value <= 0xffffffff;
}

function readSelected(
  registers: GaugeRegisters,
  data: string,
  pairOf: (index: ChannelIndex) => RegisterPair
): string {
  const index = toChannelIndex(data);
  return index === null ? data : formatCode(registers.readPair(pairOf(index)));
}

/**
 * Two-step write: one-character data selects the slot, longer data is written to
 * the selected slot and clears the selection.
 */
function selectThenWrite(
  registers: GaugeRegisters,
  data: string,
  kind: 'setpoint' | 'calibration',
  decode: (code: string) => number | null
): string {
  if (data.length === 1) {
    const index = toChannelIndex(data);
    if (index !== null) registers.latch = { kind, index };
    return data;
  }

  const latch = registers.latch;
  if (latch.kind !== kind) return data;
  if (decode(data) === null || !fitsPair(data)) return data;

  const pair = kind === 'setpoint' ? setpointPair(latch.index) : calibrationPair(latch.index);
  registers.writePair(pair, Number(data));
  registers.clearLatch();
  return data;
}

function writeWord(registers: GaugeRegisters, name: RegisterWord, data: string): string {
  if (WORD_PATTERN.test(data)) {
    const value = Number(data);
    if (value <= 0xffff) registers.writeWord(name, value);
  }
  return data;
}

/**
 * `1` arms an atmosphere adjustment, `0` a zero adjustment. A six-digit code then
 * applies the armed adjustment when it matches the expected code; anything else
 * is rejected with an empty reply.
 */
function adjust(registers: GaugeRegisters, data: string): string {
  if (data === '1') {
    registers.latch = { kind: 'atmosphere' };
    return data;
  }
  if (data === '0') {
    registers.latch = { kind: 'zero' };
    return data;
  }
  if (data.length === 1) return data;

  const latch = registers.latch;
  if (latch.kind === 'atmosphere' && data === ATMOSPHERE_CODE) {
    registers.writePair('pressure', Number(ATMOSPHERE_CODE));
    registers.clearLatch();
    return data;
  }
  if (latch.kind === 'zero' && data === ZERO_CODE) {
    registers.writePair('pressure', 0);
    registers.clearLatch();
    return data;
  }
  return '';
}

/**
 * Executes one command against the register model.
 * @param registers - Instrument state, mutated by write commands
 * @param resolved - Verb resolved at decode time
 * @param data - Command data field
 * @param model - Reply to the type query
 * @returns Reply data. Invalid write data is echoed with the state unchanged.
 */
export function interpret(
  registers: GaugeRegisters,
  resolved: ResolvedVerb,
  data: string,
  model: string = DEFAULT_MODEL
): string {
  if (resolved.kind === 'passthrough') return data;

  switch (resolved.verb) {
    case GaugeVerb.TYPE:
      return model;
    case GaugeVerb.READ_PRESSURE:
      return formatCode(registers.readPair('pressure'));
    case GaugeVerb.WRITE_PRESSURE:
      if (pressureDecode(data) !== null) registers.writePair('pressure', Number(data));
      return data;
    case GaugeVerb.READ_SETPOINT:
      return readSelected(registers, data, setpointPair);
    case GaugeVerb.WRITE_SETPOINT:
      return selectThenWrite(registers, data, 'setpoint', pressureDecode);
    case GaugeVerb.READ_CALIBRATION:
      return readSelected(registers, data, calibrationPair);
    case GaugeVerb.WRITE_CALIBRATION:
      return selectThenWrite(registers, data, 'calibration', calibrationDecode);
    case GaugeVerb.READ_PENNING_STATE:
      return formatCode(registers.readWord('penningState'));
    case GaugeVerb.WRITE_PENNING_STATE:
      return writeWord(registers, 'penningState', data);
    case GaugeVerb.READ_PENNING_SYNC:
      return formatCode(registers.readWord('penningSync'));
    case GaugeVerb.WRITE_PENNING_SYNC:
      return writeWord(registers, 'penningSync', data);
    case GaugeVerb.ADJUST:
      return adjust(registers, data);
  }
}
