// src/transport/emulator-transports/emulator-transport.ts

import type GaugeEmulator from '../../gauge-emulator/gauge-emulator.js';
import Logger from '../../logger.js';
import {
  GaugeBufferOverflowError,
  GaugeDataConversionError,
  GaugeNotConnectedError,
  GaugeTimeoutError,
} from '../../errors.js';
import type { EmulatorTransportOptions, Transport } from '../../types/gauge-types.js';
import { allocUint8Array, concatUint8Arrays, sliceUint8Array } from '../../utils/utils.js';

const loggerInstance = new Logger();
const logger = loggerInstance.createLogger('EmulatorTransport');
logger.setLevel('error');

/**
 * In-process loopback line: every write is offered to each attached emulator
 * and their replies are queued for reading.
 */
class EmulatorTransport implements Transport {
  private emulators: GaugeEmulator[];
  private options: Required<EmulatorTransportOptions>;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _waiters: Array<() => void> = [];

  constructor(emulators: GaugeEmulator | GaugeEmulator[] = [], options: EmulatorTransportOptions = {}) {
    this.emulators = Array.isArray(emulators) ? [...emulators] : [emulators];
    this.options = {
      readTimeout: 1000,
      maxBufferSize: 4096,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  attach(emulator: GaugeEmulator): void {
    if (!this.emulators.includes(emulator)) this.emulators.push(emulator);
  }

  detach(emulator: GaugeEmulator): void {
    this.emulators = this.emulators.filter(e => e !== emulator);
  }

  async connect(): Promise<void> {
    this._isOpen = true;
    logger.info(`Loopback opened with ${this.emulators.length} device(s)`);
  }

  async disconnect(): Promise<void> {
    this._isOpen = false;
    this.readBuffer = allocUint8Array(0);
    this._wake();
    logger.info('Loopback closed');
  }

  async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this._isOpen) throw new GaugeNotConnectedError();
    const replies = this.emulators.map(emulator => emulator.handleRequest(buffer));
    const next = concatUint8Arrays([this.readBuffer, ...replies]);
    if (next.length > this.options.maxBufferSize) {
      throw new GaugeBufferOverflowError(next.length, this.options.maxBufferSize);
    }
    this.readBuffer = next;
    this._wake();
  }

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (length <= 0) throw new GaugeDataConversionError(length, 'positive');
    const deadline = Date.now() + timeout;
    for (;;) {
      if (!this._isOpen) throw new GaugeNotConnectedError();
      if (this.readBuffer.length >= length) {
        const data = this.readBuffer.slice(0, length);
        this.readBuffer = sliceUint8Array(this.readBuffer, length);
        return data;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this._waitForData(remaining))) {
        throw new GaugeTimeoutError('Read timeout');
      }
    }
  }

  private _waitForData(ms: number): Promise<boolean> {
    return new Promise(resolve => {
      const wake = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this._waiters = this._waiters.filter(w => w !== wake);
        resolve(false);
      }, ms);
      this._waiters.push(wake);
    });
  }

  private _wake(): void {
    const waiters = this._waiters;
    this._waiters = [];
    waiters.forEach(w => w());
  }
}

export default EmulatorTransport;
