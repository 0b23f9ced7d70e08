import { describe, expect, it } from 'vitest';
import { GaugeVerb } from '../src/constants/constants.js';
import {
  createProtocolACommand,
  decodeProtocolA,
  encodeProtocolA,
  resolveProtocolAVerb,
  toProtocolAPayload,
} from '../src/pdu/protocol-a.js';
import { ascii, text } from './helpers/bytes.js';

describe('createProtocolACommand', () => {
  it('builds a command with length and function code', () => {
    const command = createProtocolACommand('M', '123417');
    expect(command).toEqual({
      verb: 'M',
      resolved: { kind: 'known', verb: GaugeVerb.READ_PRESSURE },
      data: '123417',
      length: 6,
      functionCode: 0x4d,
    });
  });

  it('keeps the first verb character and at most six data characters', () => {
    const command = createProtocolACommand('Mx', '12345678');
    expect(command.verb).toBe('M');
    expect(command.data).toBe('123456');
    expect(command.length).toBe(6);
  });

  it('caps data at six UTF-8 bytes on a character boundary', () => {
    const cut = createProtocolACommand('m', '12345\u00e9');
    expect(cut.data).toBe('12345');
    expect(cut.length).toBe(5);

    const fits = createProtocolACommand('m', '1234\u00e9');
    expect(fits.data).toBe('1234\u00e9');
    expect(fits.length).toBe(6);
  });

  it('defaults to an empty command', () => {
    const command = createProtocolACommand();
    expect(command.verb).toBe('');
    expect(command.data).toBe('');
    expect(command.functionCode).toBe(0);
    expect(command.resolved).toEqual({ kind: 'passthrough' });
  });
});

describe('resolveProtocolAVerb', () => {
  it('distinguishes read and write verbs by case', () => {
    expect(resolveProtocolAVerb('S')).toEqual({ kind: 'known', verb: GaugeVerb.READ_SETPOINT });
    expect(resolveProtocolAVerb('s')).toEqual({ kind: 'known', verb: GaugeVerb.WRITE_SETPOINT });
    expect(resolveProtocolAVerb('j')).toEqual({ kind: 'known', verb: GaugeVerb.ADJUST });
  });

  it('falls back to pass-through for unknown verbs', () => {
    expect(resolveProtocolAVerb('X')).toEqual({ kind: 'passthrough' });
    expect(resolveProtocolAVerb('J')).toEqual({ kind: 'passthrough' });
  });
});

describe('Protocol-A encoding', () => {
  it('encodes only the data field', () => {
    expect(text(encodeProtocolA(createProtocolACommand('m', '100023')))).toBe('100023');
  });

  it('prefixes the verb in the wire payload', () => {
    expect(text(toProtocolAPayload(createProtocolACommand('m', '100023')))).toBe('m100023');
    expect(text(toProtocolAPayload(createProtocolACommand('T')))).toBe('T');
  });
});

describe('decodeProtocolA', () => {
  it('splits verb and data', () => {
    const command = decodeProtocolA(ascii('M123417'));
    expect(command?.verb).toBe('M');
    expect(command?.data).toBe('123417');
    expect(command?.resolved).toEqual({ kind: 'known', verb: GaugeVerb.READ_PRESSURE });
  });

  it('ignores bytes past the data field', () => {
    expect(decodeProtocolA(ascii('M12341799'))?.data).toBe('123417');
  });

  it('drops a multi-byte character that crosses the data limit', () => {
    const command = decodeProtocolA(new Uint8Array([...ascii('M12345'), 0xc3, 0xa9]));
    expect(command?.data).toBe('12345');
    expect(command?.length).toBe(5);
  });

  it('keeps a multi-byte character that fits the data limit', () => {
    expect(decodeProtocolA(new Uint8Array([...ascii('M1234'), 0xc3, 0xa9]))?.data).toBe(
      '1234\u00e9'
    );
  });

  it('returns null for an empty payload', () => {
    expect(decodeProtocolA(new Uint8Array(0))).toBeNull();
  });

  it('returns null for bytes that are not text', () => {
    expect(decodeProtocolA(new Uint8Array([0xff, 0x31]))).toBeNull();
    expect(decodeProtocolA(new Uint8Array([0x4d, 0xc3]))).toBeNull();
  });
});
