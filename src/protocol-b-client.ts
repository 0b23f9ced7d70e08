// src/protocol-b-client.ts

import { AccessCode, FRAME } from './constants/constants.js';
import { GaugeDeviceError, GaugeInvalidAddressError } from './errors.js';
import type { GaugeProtocol } from './framers/gauge-protocol.js';
import Logger from './logger.js';
import {
  createProtocolBCommand,
  decodeProtocolB,
  encodeProtocolB,
  errorMessageFromString,
} from './pdu/protocol-b.js';
import type { GaugeClientOptions, ProtocolBCommand } from './types/gauge-types.js';
import { pressureDecode, pressureEncode } from './utils/numeric.js';

const logger = new Logger();
logger.setLevel('error');
const clientLogger = logger.createLogger('ProtocolBClient');

/**
 * Protocol-B client: access code, two-character verb, length-prefixed data.
 */
class ProtocolBClient {
  private protocol: GaugeProtocol;
  private deviceId: number;
  private defaultTimeout: number;

  constructor(protocol: GaugeProtocol, deviceId: number = 1, options: GaugeClientOptions = {}) {
    if (!Number.isInteger(deviceId) || deviceId < 0 || deviceId > FRAME.MAX_DEVICE_ID) {
      throw new GaugeInvalidAddressError(deviceId);
    }
    this.protocol = protocol;
    this.deviceId = deviceId;
    this.defaultTimeout = options.timeout ?? 1000;
    clientLogger.setLevel(options.logLevel ?? 'error');
  }

  /**
   * Sends one request and decodes the reply.
   * @returns The reply, or null on timeout, undecodable reply, unknown error text or verb mismatch
   * @throws GaugeDeviceError when the gauge answers with a known ERROR message
   */
  async query(
    accessCode: AccessCode,
    verb: string,
    data: string = ''
  ): Promise<ProtocolBCommand | null> {
    const payload = encodeProtocolB(createProtocolBCommand(accessCode, verb, data));
    const reply = await this.protocol.exchange(this.deviceId, payload, this.defaultTimeout);
    if (reply === null) {
      clientLogger.warn('No response', { deviceId: this.deviceId, verb, accessCode });
      return null;
    }

    const decoded = decodeProtocolB(reply);
    if (decoded === null) {
      clientLogger.warn('Undecodable response', { deviceId: this.deviceId, verb, accessCode });
      return null;
    }
    if (decoded.accessCode === AccessCode.ERROR) {
      const message = errorMessageFromString(decoded.data);
      if (message === null) {
        clientLogger.warn(`Unknown device error: ${decoded.data}`, {
          deviceId: this.deviceId,
          verb,
        });
        return null;
      }
      throw new GaugeDeviceError(message);
    }
    if (decoded.verb !== verb) {
      clientLogger.warn(`Unexpected verb in response: ${decoded.verb}`, {
        deviceId: this.deviceId,
        verb,
      });
      return null;
    }
    return decoded;
  }

  async getModel(): Promise<string | null> {
    const reply = await this.query(AccessCode.READ, 'TD');
    return reply === null ? null : reply.data;
  }

  async measure(): Promise<number | null> {
    const reply = await this.query(AccessCode.READ, 'MV');
    return reply === null ? null : pressureDecode(reply.data);
  }

  /**
   * @returns The pressure echoed by the gauge
   */
  async setPressure(pressure: number): Promise<number | null> {
    const reply = await this.query(AccessCode.WRITE, 'MV', pressureEncode(pressure));
    return reply === null ? null : pressureDecode(reply.data);
  }
}

export default ProtocolBClient;
