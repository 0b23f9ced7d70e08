import { beforeEach, describe, expect, it } from 'vitest';
import { GaugeVerb } from '../src/constants/constants.js';
import { interpret } from '../src/gauge-emulator/command-interpreter.js';
import { GaugeRegisters } from '../src/gauge-emulator/register-model.js';
import type { ResolvedVerb } from '../src/types/gauge-types.js';

const known = (verb: GaugeVerb): ResolvedVerb => ({ kind: 'known', verb });

describe('interpret', () => {
  let registers: GaugeRegisters;

  beforeEach(() => {
    registers = new GaugeRegisters();
    registers.writePair('pressure', 100023);
    registers.writePair('setpoint1', 123417);
    registers.writePair('setpoint2', 100023);
    registers.writePair('calibration1', 100);
    registers.writePair('calibration2', 123);
    registers.writeWord('penningState', 1);
  });

  it('answers the type query with the model', () => {
    expect(interpret(registers, known(GaugeVerb.TYPE), '')).toBe('MTM09D');
    expect(interpret(registers, known(GaugeVerb.TYPE), '', 'PTR90')).toBe('PTR90');
  });

  it('echoes pass-through data', () => {
    expect(interpret(registers, { kind: 'passthrough' }, 'abc')).toBe('abc');
  });

  describe('pressure', () => {
    it('reads the pressure code', () => {
      expect(interpret(registers, known(GaugeVerb.READ_PRESSURE), '')).toBe('100023');
    });

    it('pads short codes to six digits', () => {
      registers.writePair('pressure', 19);
      expect(interpret(registers, known(GaugeVerb.READ_PRESSURE), '')).toBe('000019');
    });

    it('writes a valid code', () => {
      expect(interpret(registers, known(GaugeVerb.WRITE_PRESSURE), '123417')).toBe('123417');
      expect(registers.readPair('pressure')).toBe(123417);
    });

    it('reads back a written code', () => {
      interpret(registers, known(GaugeVerb.WRITE_PRESSURE), '987620');
      expect(interpret(registers, known(GaugeVerb.READ_PRESSURE), '')).toBe('987620');
    });

    it('echoes invalid data without writing', () => {
      expect(interpret(registers, known(GaugeVerb.WRITE_PRESSURE), '12a417')).toBe('12a417');
      expect(registers.readPair('pressure')).toBe(100023);
    });
  });

  describe('setpoints', () => {
    it('reads the selected setpoint', () => {
      expect(interpret(registers, known(GaugeVerb.READ_SETPOINT), '1')).toBe('123417');
      expect(interpret(registers, known(GaugeVerb.READ_SETPOINT), '2')).toBe('100023');
    });

    it('echoes an invalid index', () => {
      expect(interpret(registers, known(GaugeVerb.READ_SETPOINT), '3')).toBe('3');
    });

    it('selects then writes', () => {
      expect(interpret(registers, known(GaugeVerb.WRITE_SETPOINT), '2')).toBe('2');
      expect(registers.latch).toEqual({ kind: 'setpoint', index: 2 });
      expect(interpret(registers, known(GaugeVerb.WRITE_SETPOINT), '987619')).toBe('987619');
      expect(registers.readPair('setpoint2')).toBe(987619);
      expect(registers.latch).toEqual({ kind: 'idle' });
    });

    it('ignores a write without a selection', () => {
      expect(interpret(registers, known(GaugeVerb.WRITE_SETPOINT), '987619')).toBe('987619');
      expect(registers.readPair('setpoint1')).toBe(123417);
      expect(registers.readPair('setpoint2')).toBe(100023);
    });

    it('ignores an invalid selection', () => {
      expect(interpret(registers, known(GaugeVerb.WRITE_SETPOINT), '5')).toBe('5');
      expect(registers.latch).toEqual({ kind: 'idle' });
    });

    it('keeps the selection after invalid data', () => {
      interpret(registers, known(GaugeVerb.WRITE_SETPOINT), '1');
      expect(interpret(registers, known(GaugeVerb.WRITE_SETPOINT), '12x417')).toBe('12x417');
      expect(registers.latch).toEqual({ kind: 'setpoint', index: 1 });
      expect(registers.readPair('setpoint1')).toBe(123417);
    });

    it('does not write a setpoint while a calibration is selected', () => {
      interpret(registers, known(GaugeVerb.WRITE_CALIBRATION), '1');
      interpret(registers, known(GaugeVerb.WRITE_SETPOINT), '987619');
      expect(registers.readPair('setpoint1')).toBe(123417);
      expect(registers.latch).toEqual({ kind: 'calibration', index: 1 });
    });
  });

  describe('calibration', () => {
    it('reads the selected factor', () => {
      expect(interpret(registers, known(GaugeVerb.READ_CALIBRATION), '1')).toBe('000100');
      expect(interpret(registers, known(GaugeVerb.READ_CALIBRATION), '2')).toBe('000123');
    });

    it('selects then writes', () => {
      interpret(registers, known(GaugeVerb.WRITE_CALIBRATION), '1');
      expect(interpret(registers, known(GaugeVerb.WRITE_CALIBRATION), '99')).toBe('99');
      expect(registers.readPair('calibration1')).toBe(99);
      expect(registers.latch).toEqual({ kind: 'idle' });
    });
  });

  describe('penning', () => {
    it('reads state and sync words', () => {
      expect(interpret(registers, known(GaugeVerb.READ_PENNING_STATE), '')).toBe('000001');
      expect(interpret(registers, known(GaugeVerb.READ_PENNING_SYNC), '')).toBe('000000');
    });

    it('writes digit values', () => {
      expect(interpret(registers, known(GaugeVerb.WRITE_PENNING_STATE), '0')).toBe('0');
      expect(registers.readWord('penningState')).toBe(0);
      expect(interpret(registers, known(GaugeVerb.WRITE_PENNING_SYNC), '1')).toBe('1');
      expect(registers.readWord('penningSync')).toBe(1);
    });

    it('echoes values that do not fit a word', () => {
      expect(interpret(registers, known(GaugeVerb.WRITE_PENNING_STATE), '70000')).toBe('70000');
      expect(interpret(registers, known(GaugeVerb.WRITE_PENNING_STATE), 'on')).toBe('on');
      expect(registers.readWord('penningState')).toBe(1);
    });
  });

  describe('adjust', () => {
    it('applies the atmosphere adjustment', () => {
      registers.writePair('pressure', 123417);
      expect(interpret(registers, known(GaugeVerb.ADJUST), '1')).toBe('1');
      expect(registers.latch).toEqual({ kind: 'atmosphere' });
      expect(interpret(registers, known(GaugeVerb.ADJUST), '100023')).toBe('100023');
      expect(registers.readPair('pressure')).toBe(100023);
      expect(registers.latch).toEqual({ kind: 'idle' });
    });

    it('applies the zero adjustment', () => {
      interpret(registers, known(GaugeVerb.ADJUST), '0');
      expect(interpret(registers, known(GaugeVerb.ADJUST), '000000')).toBe('000000');
      expect(registers.readPair('pressure')).toBe(0);
    });

    it('rejects a code that does not match the armed adjustment', () => {
      interpret(registers, known(GaugeVerb.ADJUST), '1');
      expect(interpret(registers, known(GaugeVerb.ADJUST), '000000')).toBe('');
      expect(registers.readPair('pressure')).toBe(100023);
      expect(registers.latch).toEqual({ kind: 'atmosphere' });
    });

    it('rejects a code when nothing is armed', () => {
      expect(interpret(registers, known(GaugeVerb.ADJUST), '100023')).toBe('');
    });

    it('echoes other single characters', () => {
      expect(interpret(registers, known(GaugeVerb.ADJUST), '5')).toBe('5');
      expect(registers.latch).toEqual({ kind: 'idle' });
    });
  });
});
