import { describe, expect, it } from 'vitest';
import ProtocolBClient from '../src/protocol-b-client.js';
import { GaugeProtocol } from '../src/framers/gauge-protocol.js';
import { createProtocolBFramer } from '../src/framers/ascii-framer.js';
import GaugeEmulator from '../src/gauge-emulator/gauge-emulator.js';
import EmulatorTransport from '../src/transport/emulator-transports/emulator-transport.js';
import { AccessCode, ErrorMessage } from '../src/constants/constants.js';
import { GaugeDeviceError } from '../src/errors.js';
import { ScriptedTransport } from './helpers/scripted-transport.js';
import { frame, text } from './helpers/bytes.js';

async function emulatedClient(): Promise<{ client: ProtocolBClient; emulator: GaugeEmulator }> {
  const emulator = new GaugeEmulator(1, { dialect: 'B' });
  await emulator.connect();
  const transport = new EmulatorTransport(emulator);
  await transport.connect();
  const client = new ProtocolBClient(new GaugeProtocol(transport, createProtocolBFramer()), 1, {
    timeout: 200,
  });
  return { client, emulator };
}

async function scriptedClient(payload: string): Promise<{
  client: ProtocolBClient;
  transport: ScriptedTransport;
}> {
  const transport = new ScriptedTransport(() => frame(1, payload));
  await transport.connect();
  const client = new ProtocolBClient(new GaugeProtocol(transport, createProtocolBFramer()), 1, {
    timeout: 50,
  });
  return { client, transport };
}

describe('ProtocolBClient', () => {
  it('reads the model', async () => {
    const { client } = await emulatedClient();
    await expect(client.getModel()).resolves.toBe('MTM09D');
  });

  it('measures and writes the pressure', async () => {
    const { client, emulator } = await emulatedClient();
    await expect(client.measure()).resolves.toBe(1000);
    await expect(client.setPressure(1.234e-3)).resolves.toBe(1.234e-3);
    expect(emulator.pressure).toBe(1.234e-3);
  });

  it('returns the decoded reply of a query', async () => {
    const { client } = await emulatedClient();
    await expect(client.query(AccessCode.READ, 'SP', '2')).resolves.toEqual({
      accessCode: AccessCode.READ,
      verb: 'SP',
      data: '100023',
      length: 6,
    });
  });

  it('sends the request access digit', async () => {
    const { client, transport } = await scriptedClient('1MV06100023');
    await client.measure();
    expect(transport.written.map(text)).toEqual(['0010MV00D\r']);
  });

  it('raises device errors', async () => {
    const { client } = await scriptedClient('7MV06_RANGE');
    const error = await client.measure().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(GaugeDeviceError);
    expect(error instanceof GaugeDeviceError ? error.errorMessage : null).toBe(ErrorMessage.RANGE);
  });

  it('returns null for an error reply with unknown text', async () => {
    const { client } = await scriptedClient('7MV06GARBLE');
    await expect(client.measure()).resolves.toBeNull();
  });

  it('returns null on a verb mismatch', async () => {
    const { client } = await scriptedClient('1TD00');
    await expect(client.measure()).resolves.toBeNull();
  });

  it('returns null on an undecodable reply', async () => {
    const { client } = await scriptedClient('1MV09123');
    await expect(client.measure()).resolves.toBeNull();
  });
});
