import { beforeEach, describe, expect, it } from 'vitest';
import VacuumGaugeClient from '../src/client.js';
import { GaugeProtocol } from '../src/framers/gauge-protocol.js';
import { createProtocolAFramer } from '../src/framers/ascii-framer.js';
import GaugeEmulator from '../src/gauge-emulator/gauge-emulator.js';
import EmulatorTransport from '../src/transport/emulator-transports/emulator-transport.js';
import { GaugeInvalidAddressError } from '../src/errors.js';
import { ScriptedTransport } from './helpers/scripted-transport.js';
import { frame } from './helpers/bytes.js';

describe('VacuumGaugeClient', () => {
  let emulator: GaugeEmulator;
  let client: VacuumGaugeClient;

  beforeEach(async () => {
    emulator = new GaugeEmulator(1);
    await emulator.connect();
    const transport = new EmulatorTransport(emulator);
    await transport.connect();
    client = new VacuumGaugeClient(new GaugeProtocol(transport, createProtocolAFramer()), 1, {
      timeout: 200,
    });
  });

  it('reads the model', async () => {
    await expect(client.getModel()).resolves.toBe('MTM09D');
  });

  it('measures the pressure', async () => {
    await expect(client.measure()).resolves.toBe(1000);
    await expect(client.readData()).resolves.toEqual({ pressure: 1000 });
  });

  it('writes the pressure', async () => {
    await expect(client.setPressure(1.234e-3)).resolves.toBe(1.234e-3);
    expect(emulator.pressure).toBe(1.234e-3);
  });

  it('reads and writes setpoints', async () => {
    await expect(client.getSetpoint(1)).resolves.toBe(1000);
    await expect(client.setSetpoint(2, 0.9876)).resolves.toBe(0.9876);
    expect(emulator.setpoint2).toBe(0.9876);
    expect(emulator.setpoint1).toBe(1000);
    await expect(client.getSetpoint(2)).resolves.toBe(0.9876);
  });

  it('reads and writes calibration factors', async () => {
    await expect(client.getCalibration(1)).resolves.toBe(1);
    await expect(client.setCalibration(2, 1.23)).resolves.toBe(1.23);
    expect(emulator.calibration2).toBe(1.23);
    await expect(client.getCalibration(2)).resolves.toBe(1.23);
  });

  it('toggles the penning flags', async () => {
    await expect(client.getPenningState()).resolves.toBe(true);
    await expect(client.setPenningState(false)).resolves.toBe(false);
    expect(emulator.penningState).toBe(false);
    await expect(client.getPenningState()).resolves.toBe(false);

    await expect(client.setPenningSync(false)).resolves.toBe(false);
    await expect(client.getPenningSync()).resolves.toBe(false);
  });

  it('adjusts to atmosphere', async () => {
    emulator.pressure = 5;
    await expect(client.setAtmosphere()).resolves.toBe(1000);
    expect(emulator.pressure).toBe(1000);
  });

  it('adjusts to zero', async () => {
    await expect(client.setZero()).resolves.toBe(0);
    expect(emulator.pressure).toBe(0);
  });

  it('returns null when the gauge does not answer', async () => {
    await emulator.disconnect();
    const transport = new EmulatorTransport(emulator);
    await transport.connect();
    const silent = new VacuumGaugeClient(new GaugeProtocol(transport, createProtocolAFramer()), 1, {
      timeout: 30,
    });
    await expect(silent.measure()).resolves.toBeNull();
    await expect(silent.setSetpoint(1, 1)).resolves.toBeNull();
  });

  it('returns null on a line that was never opened', async () => {
    const transport = new EmulatorTransport(emulator);
    const offline = new VacuumGaugeClient(new GaugeProtocol(transport, createProtocolAFramer()), 1, {
      timeout: 50,
    });
    await expect(offline.measure()).resolves.toBeNull();
    await expect(offline.getModel()).resolves.toBeNull();
  });

  it('returns null when the line drops during a request', async () => {
    const transport = new EmulatorTransport(new GaugeEmulator(2));
    await transport.connect();
    const dropped = new VacuumGaugeClient(new GaugeProtocol(transport, createProtocolAFramer()), 1, {
      timeout: 1000,
    });
    const pending = dropped.measure();
    setTimeout(() => {
      void transport.disconnect();
    }, 20);
    await expect(pending).resolves.toBeNull();
  });

  it('rejects invalid device ids', () => {
    const transport = new ScriptedTransport(() => new Uint8Array(0));
    const protocol = new GaugeProtocol(transport, createProtocolAFramer());
    expect(() => new VacuumGaugeClient(protocol, 1000)).toThrow(GaugeInvalidAddressError);
  });
});

describe('VacuumGaugeClient replies', () => {
  async function clientAnswering(payload: string): Promise<VacuumGaugeClient> {
    const transport = new ScriptedTransport(() => frame(1, payload));
    await transport.connect();
    return new VacuumGaugeClient(new GaugeProtocol(transport, createProtocolAFramer()), 1, {
      timeout: 50,
    });
  }

  it('returns null on a verb mismatch', async () => {
    const client = await clientAnswering('T100023');
    await expect(client.measure()).resolves.toBeNull();
  });

  it('returns null on an empty payload', async () => {
    const client = await clientAnswering('');
    await expect(client.getModel()).resolves.toBeNull();
  });

  it('returns null when the data is not a pressure code', async () => {
    const client = await clientAnswering('M1x0023');
    await expect(client.measure()).resolves.toBeNull();
  });

  it('returns null when a flag is not numeric', async () => {
    const client = await clientAnswering('Ion');
    await expect(client.getPenningState()).resolves.toBeNull();
  });
});
