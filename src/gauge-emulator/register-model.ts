// src/gauge-emulator/register-model.ts

import { REGISTER_COUNT, REGISTER_OFFSETS } from '../constants/constants.js';
import { GaugeDataConversionError } from '../errors.js';
import { combineUint32, splitUint32 } from '../utils/numeric.js';

export type ChannelIndex = 1 | 2;

/** Values stored as two words, high word first */
export type RegisterPair = 'pressure' | 'setpoint1' | 'setpoint2' | 'calibration1' | 'calibration2';

/** Values stored as a single word */
export type RegisterWord = 'penningState' | 'penningSync';

/**
 * Select register state: which slot the next write applies to.
 */
export type Latch =
  | { kind: 'idle' }
  | { kind: 'setpoint'; index: ChannelIndex }
  | { kind: 'calibration'; index: ChannelIndex }
  | { kind: 'atmosphere' }
  | { kind: 'zero' };

export const IDLE: Latch = { kind: 'idle' };

const PAIR_OFFSETS: Record<RegisterPair, number> = {
  pressure: REGISTER_OFFSETS.PRESSURE,
  setpoint1: REGISTER_OFFSETS.SETPOINT_1,
  setpoint2: REGISTER_OFFSETS.SETPOINT_2,
  calibration1: REGISTER_OFFSETS.CALIBRATION_1,
  calibration2: REGISTER_OFFSETS.CALIBRATION_2,
};

const PAIRS: readonly RegisterPair[] = [
  'pressure',
  'setpoint1',
  'setpoint2',
  'calibration1',
  'calibration2',
];

const WORD_OFFSETS: Record<RegisterWord, number> = {
  penningState: REGISTER_OFFSETS.PENNING_STATE,
  penningSync: REGISTER_OFFSETS.PENNING_SYNC,
};

export function setpointPair(index: ChannelIndex): RegisterPair {
  return index === 1 ? 'setpoint1' : 'setpoint2';
}

export function calibrationPair(index: ChannelIndex): RegisterPair {
  return index === 1 ? 'calibration1' : 'calibration2';
}

export function toChannelIndex(value: string | number): ChannelIndex | null {
  if (value === 1 || value === '1') return 1;
  if (value === 2 || value === '2') return 2;
  return null;
}

/**
 * In-memory instrument state. Pairs hold the integer value of a numeric code
 * (pressure `'123417'` is stored as 123417).
 */
export class GaugeRegisters {
  private _pairs: Record<RegisterPair, number> = {
    pressure: 0,
    setpoint1: 0,
    setpoint2: 0,
    calibration1: 0,
    calibration2: 0,
  };
  private _words: Record<RegisterWord, number> = { penningState: 0, penningSync: 0 };
  private _latch: Latch = IDLE;

  get latch(): Latch {
    return this._latch;
  }

  set latch(latch: Latch) {
    this._latch = latch;
  }

  clearLatch(): void {
    this._latch = IDLE;
  }

  readPair(name: RegisterPair): number {
    return this._pairs[name];
  }

  /**
   * @throws GaugeDataConversionError when the value is not an unsigned 32-bit integer
   */
  writePair(name: RegisterPair, value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new GaugeDataConversionError(value, 'unsigned 32-bit integer');
    }
    this._pairs[name] = value;
  }

  readWord(name: RegisterWord): number {
    return this._words[name];
  }

  /**
   * @throws GaugeDataConversionError when the value is not an unsigned 16-bit integer
   */
  writeWord(name: RegisterWord, value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new GaugeDataConversionError(value, 'unsigned 16-bit integer');
    }
    this._words[name] = value;
  }

  /**
   * Flat 16-word register image.
   */
  toWords(): number[] {
    const words = new Array<number>(REGISTER_COUNT).fill(0);
    for (const name of PAIRS) {
      const offset = PAIR_OFFSETS[name];
      const [high, low] = splitUint32(this._pairs[name]);
      words[offset] = high;
      words[offset + 1] = low;
    }
    words[WORD_OFFSETS.penningState] = this._words.penningState;
    words[WORD_OFFSETS.penningSync] = this._words.penningSync;

    const latch = this._latch;
    if (latch.kind === 'setpoint') words[REGISTER_OFFSETS.SETPOINT_SELECT] = latch.index;
    if (latch.kind === 'calibration') words[REGISTER_OFFSETS.CALIBRATION_SELECT] = latch.index;
    if (latch.kind === 'atmosphere') words[REGISTER_OFFSETS.ATMOSPHERE_SELECT] = 1;
    if (latch.kind === 'zero') words[REGISTER_OFFSETS.ZERO_SELECT] = 1;
    return words;
  }

  /**
   * Rebuilds the model from a register image. Select registers are read in the
   * order setpoint, calibration, atmosphere, zero; the first one set wins.
   */
  static fromWords(words: readonly number[]): GaugeRegisters {
    if (words.length !== REGISTER_COUNT) {
      throw new GaugeDataConversionError(words.length, `${REGISTER_COUNT} register words`);
    }
    const word = (offset: number): number => (words[offset] ?? 0) & 0xffff;
    const registers = new GaugeRegisters();
    for (const name of PAIRS) {
      const offset = PAIR_OFFSETS[name];
      registers.writePair(name, combineUint32(word(offset), word(offset + 1)));
    }
    registers.writeWord('penningState', word(WORD_OFFSETS.penningState));
    registers.writeWord('penningSync', word(WORD_OFFSETS.penningSync));

    const setpoint = toChannelIndex(word(REGISTER_OFFSETS.SETPOINT_SELECT));
    const calibration = toChannelIndex(word(REGISTER_OFFSETS.CALIBRATION_SELECT));
    if (setpoint !== null) registers.latch = { kind: 'setpoint', index: setpoint };
    else if (calibration !== null) registers.latch = { kind: 'calibration', index: calibration };
    else if (word(REGISTER_OFFSETS.ATMOSPHERE_SELECT) !== 0) registers.latch = { kind: 'atmosphere' };
    else if (word(REGISTER_OFFSETS.ZERO_SELECT) !== 0) registers.latch = { kind: 'zero' };
    return registers;
  }
}
