import { describe, expect, it } from 'vitest';
import EmulatorTransport from '../src/transport/emulator-transports/emulator-transport.js';
import GaugeEmulator from '../src/gauge-emulator/gauge-emulator.js';
import {
  GaugeBufferOverflowError,
  GaugeDataConversionError,
  GaugeNotConnectedError,
  GaugeTimeoutError,
} from '../src/errors.js';
import { frame, text } from './helpers/bytes.js';

async function connectedEmulator(id: number): Promise<GaugeEmulator> {
  const emulator = new GaugeEmulator(id);
  await emulator.connect();
  return emulator;
}

describe('EmulatorTransport', () => {
  it('refuses writes before connect', async () => {
    const transport = new EmulatorTransport(await connectedEmulator(1));
    expect(transport.isOpen).toBe(false);
    await expect(transport.write(frame(1, 'T'))).rejects.toBeInstanceOf(GaugeNotConnectedError);
  });

  it('queues emulator replies for reading', async () => {
    const transport = new EmulatorTransport(await connectedEmulator(1));
    await transport.connect();
    await transport.write(frame(1, 'T'));
    expect(text(await transport.read(3))).toBe('001');
    expect(text(await transport.read(9))).toBe('TMTM09D@\r');
  });

  it('times out when no bytes arrive', async () => {
    const transport = new EmulatorTransport(await connectedEmulator(1));
    await transport.connect();
    await expect(transport.read(1, 20)).rejects.toBeInstanceOf(GaugeTimeoutError);
  });

  it('wakes a pending read on write', async () => {
    const transport = new EmulatorTransport(await connectedEmulator(1));
    await transport.connect();
    const pending = transport.read(3, 500);
    await transport.write(frame(1, 'T'));
    expect(text(await pending)).toBe('001');
  });

  it('fails a pending read on disconnect', async () => {
    const transport = new EmulatorTransport(await connectedEmulator(1));
    await transport.connect();
    const pending = transport.read(1, 500);
    await transport.disconnect();
    await expect(pending).rejects.toBeInstanceOf(GaugeNotConnectedError);
  });

  it('rejects non-positive read lengths', async () => {
    const transport = new EmulatorTransport();
    await transport.connect();
    await expect(transport.read(0)).rejects.toBeInstanceOf(GaugeDataConversionError);
  });

  it('clears buffered bytes on flush', async () => {
    const transport = new EmulatorTransport(await connectedEmulator(1));
    await transport.connect();
    await transport.write(frame(1, 'T'));
    await transport.flush();
    await expect(transport.read(1, 20)).rejects.toBeInstanceOf(GaugeTimeoutError);
  });

  it('routes frames to attached emulators only', async () => {
    const first = await connectedEmulator(1);
    const second = await connectedEmulator(2);
    const transport = new EmulatorTransport([first]);
    await transport.connect();

    transport.attach(second);
    await transport.write(frame(2, 'T'));
    expect(text(await transport.read(3))).toBe('002');
    await transport.flush();

    transport.detach(second);
    await transport.write(frame(2, 'T'));
    await expect(transport.read(1, 20)).rejects.toBeInstanceOf(GaugeTimeoutError);
  });

  it('rejects replies past the buffer limit', async () => {
    const transport = new EmulatorTransport(await connectedEmulator(1), { maxBufferSize: 8 });
    await transport.connect();
    await expect(transport.write(frame(1, 'T'))).rejects.toBeInstanceOf(GaugeBufferOverflowError);
  });
});
