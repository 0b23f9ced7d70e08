// src/client.ts

import { ATMOSPHERE_CODE, FRAME, GaugeVerb, ZERO_CODE } from './constants/constants.js';
import { GaugeDataConversionError, GaugeInvalidAddressError } from './errors.js';
import type { GaugeProtocol } from './framers/gauge-protocol.js';
import Logger from './logger.js';
import { createProtocolACommand, decodeProtocolA, toProtocolAPayload } from './pdu/protocol-a.js';
import type {
  GaugeClientOptions,
  GaugeReading,
  LogContext,
  LogLevel,
} from './types/gauge-types.js';
import {
  calibrationDecode,
  calibrationEncode,
  pressureDecode,
  pressureEncode,
} from './utils/numeric.js';

const logger = new Logger();
logger.setLevel('error');
const clientLogger = logger.createLogger('VacuumGaugeClient');

const FLAG_PATTERN = /^\d+$/;

function parseFlag(data: string | null): boolean | null {
  if (data === null || !FLAG_PATTERN.test(data)) return null;
  return Number(data) !== 0;
}

/**
 * Protocol-A client for one gauge. Every operation resolves to null when the
 * gauge does not answer in time or answers with something unusable.
 */
class VacuumGaugeClient {
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
   * Enables the client logger
   * @param level - Logging level
   */
  enableLogger(level: LogLevel = 'info'): void {
    clientLogger.setLevel(level);
  }

  disableLogger(): void {
    clientLogger.setLevel('error');
  }

  /**
   * Adds fields to every log line of the client logger.
   */
  setLoggerContext(context: LogContext): void {
    logger.addGlobalContext(context);
  }

  private _validateChannel(channel: number): void {
    if (channel !== 1 && channel !== 2) {
      throw new GaugeDataConversionError(channel, 'channel 1 or 2');
    }
  }

  /**
   * Sends one command and returns the reply data.
   * @returns Reply data, or null on timeout, undecodable reply or verb mismatch
   */
  private async _request(verb: GaugeVerb, data: string = ''): Promise<string | null> {
    const command = createProtocolACommand(verb, data);
    const reply = await this.protocol.exchange(
      this.deviceId,
      toProtocolAPayload(command),
      this.defaultTimeout
    );
    if (reply === null) {
      clientLogger.warn('No response', { deviceId: this.deviceId, verb });
      return null;
    }

    const decoded = decodeProtocolA(reply);
    if (decoded === null) {
      clientLogger.warn('Undecodable response', { deviceId: this.deviceId, verb });
      return null;
    }
    if (decoded.verb !== command.verb) {
      clientLogger.warn(`Unexpected verb in response: ${decoded.verb}`, {
        deviceId: this.deviceId,
        verb,
      });
      return null;
    }
    clientLogger.debug(`Response data: ${decoded.data}`, { deviceId: this.deviceId, verb });
    return decoded.data;
  }

  private async _requestPressure(verb: GaugeVerb, data: string = ''): Promise<number | null> {
    const reply = await this._request(verb, data);
    return reply === null ? null : pressureDecode(reply);
  }

  private async _requestCalibration(verb: GaugeVerb, data: string = ''): Promise<number | null> {
    const reply = await this._request(verb, data);
    return reply === null ? null : calibrationDecode(reply);
  }

  /**
   * Reads the instrument model identifier.
   */
  async getModel(): Promise<string | null> {
    return this._request(GaugeVerb.TYPE);
  }

  /**
   * Reads the current pressure.
   */
  async measure(): Promise<number | null> {
    return this._requestPressure(GaugeVerb.READ_PRESSURE);
  }

  /**
   * Writes the pressure register.
   * @returns The pressure echoed by the gauge
   */
  async setPressure(pressure: number): Promise<number | null> {
    return this._requestPressure(GaugeVerb.WRITE_PRESSURE, pressureEncode(pressure));
  }

  async getSetpoint(channel: 1 | 2): Promise<number | null> {
    this._validateChannel(channel);
    return this._requestPressure(GaugeVerb.READ_SETPOINT, String(channel));
  }

  /**
   * Selects the setpoint, then writes it.
   * @returns The setpoint echoed by the gauge
   */
  async setSetpoint(channel: 1 | 2, pressure: number): Promise<number | null> {
    this._validateChannel(channel);
    const code = pressureEncode(pressure);
    const selected = await this._request(GaugeVerb.WRITE_SETPOINT, String(channel));
    if (selected === null) return null;
    return this._requestPressure(GaugeVerb.WRITE_SETPOINT, code);
  }

  async getCalibration(channel: 1 | 2): Promise<number | null> {
    this._validateChannel(channel);
    return this._requestCalibration(GaugeVerb.READ_CALIBRATION, String(channel));
  }

  /**
   * Selects the calibration channel, then writes the factor.
   * @returns The factor echoed by the gauge
   */
  async setCalibration(channel: 1 | 2, value: number): Promise<number | null> {
    this._validateChannel(channel);
    const code = calibrationEncode(value);
    const selected = await this._request(GaugeVerb.WRITE_CALIBRATION, String(channel));
    if (selected === null) return null;
    return this._requestCalibration(GaugeVerb.WRITE_CALIBRATION, code);
  }

  async getPenningState(): Promise<boolean | null> {
    return parseFlag(await this._request(GaugeVerb.READ_PENNING_STATE));
  }

  async setPenningState(on: boolean): Promise<boolean | null> {
    return parseFlag(await this._request(GaugeVerb.WRITE_PENNING_STATE, on ? '1' : '0'));
  }

  async getPenningSync(): Promise<boolean | null> {
    return parseFlag(await this._request(GaugeVerb.READ_PENNING_SYNC));
  }

  async setPenningSync(on: boolean): Promise<boolean | null> {
    return parseFlag(await this._request(GaugeVerb.WRITE_PENNING_SYNC, on ? '1' : '0'));
  }

  /**
   * Arms and applies the atmosphere adjustment.
   * @returns Pressure after adjustment (1000 mbar)
   */
  async setAtmosphere(): Promise<number | null> {
    const armed = await this._request(GaugeVerb.ADJUST, '1');
    if (armed === null) return null;
    return this._requestPressure(GaugeVerb.ADJUST, ATMOSPHERE_CODE);
  }

  /**
   * Arms and applies the zero adjustment.
   * @returns Pressure after adjustment (0)
   */
  async setZero(): Promise<number | null> {
    const armed = await this._request(GaugeVerb.ADJUST, '0');
    if (armed === null) return null;
    return this._requestPressure(GaugeVerb.ADJUST, ZERO_CODE);
  }

  async readData(): Promise<GaugeReading> {
    return { pressure: await this.measure() };
  }
}

export default VacuumGaugeClient;
