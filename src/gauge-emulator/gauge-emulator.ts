// src/gauge-emulator/gauge-emulator.ts

import Logger from '../logger.js';
import type {
  Dialect,
  GaugeEmulatorOptions,
  GaugeState,
  LoggerInstance,
} from '../types/gauge-types.js';
import { DEFAULT_MODEL, FRAME } from '../constants/constants.js';
import { GaugeError, GaugeInvalidAddressError } from '../errors.js';
import { type AsciiFramer, createProtocolAFramer, createProtocolBFramer } from '../framers/ascii-framer.js';
import {
  createProtocolACommand,
  decodeProtocolA,
  toProtocolAPayload,
} from '../pdu/protocol-a.js';
import {
  createProtocolBCommand,
  decodeProtocolBRequest,
  encodeProtocolB,
  resolveProtocolBVerb,
} from '../pdu/protocol-b.js';
import {
  calibrationDecode,
  calibrationEncode,
  pressureDecode,
  pressureEncode,
} from '../utils/numeric.js';
import { allocUint8Array, concatUint8Arrays, toPrintable } from '../utils/utils.js';
import { interpret } from './command-interpreter.js';
import { GaugeRegisters, type RegisterPair } from './register-model.js';

/** Receive buffer limit; garbage without a delimiter beyond this is dropped */
const MAX_RX_BUFFER = 4096;

const DEFAULT_STATE: GaugeState = {
  pressure: 1000,
  setpoint1: 1000,
  setpoint2: 1000,
  calibration1: 1,
  calibration2: 1,
  penningState: true,
  penningSync: true,
};

/**
 * Virtual vacuum gauge answering Protocol-A or Protocol-B frames from an
 * in-memory register model.
 */
class GaugeEmulator {
  private deviceId: number;
  private _dialect: Dialect;
  private model: string;
  private framer: AsciiFramer;
  private _registers: GaugeRegisters;
  private rxBuffer: Uint8Array = allocUint8Array(0);
  private loggerEnabled: boolean;
  private logger: LoggerInstance;
  public connected: boolean;

  constructor(deviceId: number = 1, options: GaugeEmulatorOptions = {}) {
    if (!Number.isInteger(deviceId) || deviceId < 0 || deviceId > FRAME.MAX_DEVICE_ID) {
      throw new GaugeInvalidAddressError(deviceId);
    }
    this.deviceId = deviceId;

    const opts: Required<GaugeEmulatorOptions> = {
      dialect: 'A',
      model: DEFAULT_MODEL,
      loggerEnabled: false,
      initialState: {},
      ...options,
    };
    this._dialect = opts.dialect;
    this.model = opts.model;
    this.framer = opts.dialect === 'A' ? createProtocolAFramer() : createProtocolBFramer();

    this._registers = new GaugeRegisters();
    this.applyState({ ...DEFAULT_STATE, ...opts.initialState });

    this.loggerEnabled = opts.loggerEnabled;
    const loggerInstance = new Logger();
    this.logger = loggerInstance.createLogger('GaugeEmulator');
    this.logger.setLevel(this.loggerEnabled ? 'info' : 'error');

    this.connected = false;
  }

  get id(): number {
    return this.deviceId;
  }

  get dialect(): Dialect {
    return this._dialect;
  }

  get registers(): GaugeRegisters {
    return this._registers;
  }

  enableLogger(): void {
    if (!this.loggerEnabled) {
      this.loggerEnabled = true;
      this.logger.setLevel('info');
    }
  }

  disableLogger(): void {
    if (this.loggerEnabled) {
      this.loggerEnabled = false;
      this.logger.setLevel('error');
    }
  }

  async connect(): Promise<void> {
    this.connected = true;
    this.logger.info('Connected', { deviceId: this.deviceId });
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.rxBuffer = allocUint8Array(0);
    this.logger.info('Disconnected', { deviceId: this.deviceId });
  }

  // === Physical values ===

  get pressure(): number {
    return this.readPressure('pressure');
  }

  set pressure(value: number) {
    this.writePressure('pressure', value);
  }

  get setpoint1(): number {
    return this.readPressure('setpoint1');
  }

  set setpoint1(value: number) {
    this.writePressure('setpoint1', value);
  }

  get setpoint2(): number {
    return this.readPressure('setpoint2');
  }

  set setpoint2(value: number) {
    this.writePressure('setpoint2', value);
  }

  get calibration1(): number {
    return this.readCalibration('calibration1');
  }

  set calibration1(value: number) {
    this.writeCalibration('calibration1', value);
  }

  get calibration2(): number {
    return this.readCalibration('calibration2');
  }

  set calibration2(value: number) {
    this.writeCalibration('calibration2', value);
  }

  get penningState(): boolean {
    return this._registers.readWord('penningState') !== 0;
  }

  set penningState(on: boolean) {
    this._registers.writeWord('penningState', on ? 1 : 0);
  }

  get penningSync(): boolean {
    return this._registers.readWord('penningSync') !== 0;
  }

  set penningSync(on: boolean) {
    this._registers.writeWord('penningSync', on ? 1 : 0);
  }

  private readPressure(pair: RegisterPair): number {
    const code = String(this._registers.readPair(pair)).padStart(6, '0');
    return pressureDecode(code) ?? 0;
  }

  private writePressure(pair: RegisterPair, value: number): void {
    this._registers.writePair(pair, Number(pressureEncode(value)));
  }

  private readCalibration(pair: RegisterPair): number {
    return calibrationDecode(String(this._registers.readPair(pair))) ?? 0;
  }

  private writeCalibration(pair: RegisterPair, value: number): void {
    this._registers.writePair(pair, Number(calibrationEncode(value)));
  }

  private applyState(state: GaugeState): void {
    this.pressure = state.pressure;
    this.setpoint1 = state.setpoint1;
    this.setpoint2 = state.setpoint2;
    this.calibration1 = state.calibration1;
    this.calibration2 = state.calibration2;
    this.penningState = state.penningState;
    this.penningSync = state.penningSync;
  }

  // === Request handling ===

  /**
   * Runs one Protocol-A command against the register model, bypassing framing.
   * @returns Reply data
   */
  execute(verb: string, data: string = ''): string {
    const command = createProtocolACommand(verb, data);
    return interpret(this._registers, command.resolved, command.data, this.model);
  }

  /**
   * Accepts raw bytes from the line and returns every reply frame they produce.
   * Partial frames are kept until the rest arrives.
   */
  handleRequest(buffer: Uint8Array): Uint8Array {
    if (!this.connected) {
      this.logger.warn('Received request but emulator not connected', {
        deviceId: this.deviceId,
      });
      return allocUint8Array(0);
    }

    this.rxBuffer = concatUint8Arrays([this.rxBuffer, buffer]);
    const replies: Uint8Array[] = [];

    for (;;) {
      const { consumed, deviceId, payload } = this.framer.decode(this.rxBuffer);
      if (consumed === 0) break;

      const frame = this.rxBuffer.subarray(0, consumed);
      this.rxBuffer = this.rxBuffer.slice(consumed);

      const reason = this.framer.diagnose(frame);
      if (reason !== null) {
        this.logger.warn(`Frame dropped: ${reason.message}`, { deviceId: this.deviceId });
        continue;
      }
      if (deviceId !== this.deviceId) {
        this.logger.debug('Frame ignored - other device', { deviceId, target: this.deviceId });
        continue;
      }

      try {
        const reply = this.dispatch(payload);
        if (reply !== null) replies.push(this.framer.encode(reply, this.deviceId));
      } catch (err: unknown) {
        const message = err instanceof GaugeError ? err.message : String(err);
        this.logger.error(`Failed to process frame ${toPrintable(frame)}: ${message}`, {
          deviceId: this.deviceId,
        });
      }
    }

    if (this.rxBuffer.length > MAX_RX_BUFFER) {
      this.logger.warn(`Receive buffer overflow, dropping ${this.rxBuffer.length} bytes`, {
        deviceId: this.deviceId,
      });
      this.rxBuffer = allocUint8Array(0);
    }

    return concatUint8Arrays(replies);
  }

  private dispatch(payload: Uint8Array): Uint8Array | null {
    if (this._dialect === 'A') {
      const command = decodeProtocolA(payload);
      if (command === null) {
        this.logger.warn('Undecodable Protocol-A payload', { deviceId: this.deviceId });
        return null;
      }
      this.logger.info('Request received', {
        deviceId: this.deviceId,
        verb: command.verb,
        data: command.data,
      });
      const output = interpret(this._registers, command.resolved, command.data, this.model);
      return toProtocolAPayload(createProtocolACommand(command.verb, output));
    }

    const command = decodeProtocolBRequest(payload);
    if (command === null) {
      this.logger.warn('Undecodable Protocol-B payload', { deviceId: this.deviceId });
      return null;
    }
    this.logger.info('Request received', {
      deviceId: this.deviceId,
      verb: command.verb,
      accessCode: command.accessCode,
      data: command.data,
    });
    const output = interpret(
      this._registers,
      resolveProtocolBVerb(command),
      command.data,
      this.model
    );
    return encodeProtocolB(createProtocolBCommand(command.accessCode, command.verb, output), 'reply');
  }
}

export default GaugeEmulator;
