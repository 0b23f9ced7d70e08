// src/transport/node-transports/node-serialport.ts
import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, toHex } from '../../utils/utils.js';
import Logger from '../../logger.js';
import {
  GaugeBufferOverflowError,
  GaugeConfigError,
  GaugeDataConversionError,
  GaugeTimeoutError,
  NodeSerialConnectionError,
  NodeSerialReadError,
  NodeSerialTransportError,
  NodeSerialWriteError,
} from '../../errors.js';
import type { NodeSerialTransportOptions, Transport } from '../../types/gauge-types.js';

/** Gauges talk 9600 8N1 out of the box */
const LINE_DEFAULTS: Required<NodeSerialTransportOptions> = {
  baudRate: 9600,
  dataBits: 8,
  stopBits: 1,
  parity: 'none',
  readTimeout: 1000,
  maxBufferSize: 4096,
};

const BAUD_RANGE = { min: 300, max: 115200 } as const;

const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger']);
const logger = loggerInstance.createLogger('NodeSerialTransport');
logger.setLevel('info');

const OPEN_ERROR_MESSAGES: ReadonlyArray<[string, string]> = [
  ['permission', 'Permission denied'],
  ['busy', 'Serial port is busy'],
  ['no such file', 'Serial port does not exist'],
];

const ERROR_HANDLERS: Record<string, (err: Error) => void> = {
  [GaugeBufferOverflowError.name]: err => logger.error(`Receive buffer overflow: ${err.message}`),
  [NodeSerialConnectionError.name]: err => logger.error(`Connection failed: ${err.message}`),
  [NodeSerialReadError.name]: err => logger.error(`Read failed: ${err.message}`),
  [NodeSerialWriteError.name]: err => logger.error(`Write failed: ${err.message}`),
  [NodeSerialTransportError.name]: err => logger.error(`Port error: ${err.message}`),
};

function reportError(err: Error): void {
  const handler = ERROR_HANDLERS[err.name];
  if (handler) handler(err);
  else logger.error(`Unexpected error: ${err.message}`);
}

function toOpenError(err: Error): NodeSerialConnectionError {
  const lower = err.message.toLowerCase();
  const known = OPEN_ERROR_MESSAGES.find(([needle]) => lower.includes(needle));
  return new NodeSerialConnectionError(known ? known[1] : err.message);
}

/**
 * Gauge line on the `serialport` package. Received bytes collect in a buffer;
 * `read` resolves as soon as enough of them are there.
 */
class NodeSerialTransport implements Transport {
  private readonly path: string;
  private readonly options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private rx: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _lineMutex: Mutex = new Mutex();
  private _onBytes: (() => void) | null = null;

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = { ...LINE_DEFAULTS, ...options };
    const { baudRate } = this.options;
    if (baudRate < BAUD_RANGE.min || baudRate > BAUD_RANGE.max) {
      throw new GaugeConfigError(`Invalid baud rate: ${baudRate}`);
    }
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this.port) await this._close();
    try {
      await this._open();
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new NodeSerialTransportError(String(err));
      reportError(error);
      this.port = null;
      this._isOpen = false;
      throw error;
    }
    logger.info(`Opened ${this.path} at ${this.options.baudRate} baud`);
  }

  async disconnect(): Promise<void> {
    if (!this.port) {
      this._isOpen = false;
      return;
    }
    await this._close();
    logger.info(`Closed ${this.path}`);
  }

  async flush(): Promise<void> {
    this.rx = allocUint8Array(0);
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this._isOpen || !port?.isOpen) throw new NodeSerialWriteError('Port closed');
    logger.debug(`TX ${toHex(buffer)}`);
    await this._lineMutex.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          const fail = (err: Error): void => {
            const error = new NodeSerialWriteError(err.message);
            reportError(error);
            reject(error);
          };
          port.write(Buffer.from(buffer), (writeErr: Error | null | undefined) => {
            if (writeErr) return fail(writeErr);
            port.drain((drainErr: Error | null) => (drainErr ? fail(drainErr) : resolve()));
          });
        })
    );
  }

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (length <= 0) throw new GaugeDataConversionError(length, 'positive');
    return this._lineMutex.runExclusive(() => this._take(length, timeout));
  }

  private _take(length: number, timeout: number): Promise<Uint8Array> {
    return new Promise<Uint8Array>((resolve, reject) => {
      const settle = (): boolean => {
        if (!this._isOpen) {
          finish();
          reject(new NodeSerialReadError('Port closed'));
          return true;
        }
        if (this.rx.length < length) return false;
        const data = this.rx.slice(0, length);
        this.rx = sliceUint8Array(this.rx, length);
        finish();
        resolve(data);
        return true;
      };
      const timer = setTimeout(() => {
        finish();
        reject(new GaugeTimeoutError('Read timeout'));
      }, timeout);
      const finish = (): void => {
        clearTimeout(timer);
        this._onBytes = null;
      };

      if (!settle()) {
        this._onBytes = () => {
          settle();
        };
      }
    });
  }

  private _open(): Promise<void> {
    const { baudRate, dataBits, stopBits, parity } = this.options;
    const port = new SerialPort({
      path: this.path,
      baudRate,
      dataBits,
      stopBits,
      parity,
      autoOpen: false,
    });
    this.port = port;

    return new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          reject(toOpenError(err));
          return;
        }
        this._isOpen = true;
        port.on('data', (data: Buffer) => this._receive(data));
        port.on('error', (portErr: Error) => reportError(new NodeSerialTransportError(portErr.message)));
        port.on('close', () => this._lineClosed());
        resolve();
      });
    });
  }

  private _receive(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    logger.debug(`RX ${toHex(chunk)}`);
    let next = concatUint8Arrays([this.rx, chunk]);
    if (next.length > this.options.maxBufferSize) {
      reportError(new GaugeBufferOverflowError(next.length, this.options.maxBufferSize));
      next = sliceUint8Array(next, -this.options.maxBufferSize);
    }
    this.rx = next;
    this._onBytes?.();
  }

  private _lineClosed(): void {
    if (this._isOpen) logger.warn(`${this.path} closed unexpectedly`);
    this._isOpen = false;
    this._onBytes?.();
  }

  private async _close(): Promise<void> {
    const port = this.port;
    this.port = null;
    this._isOpen = false;
    this.rx = allocUint8Array(0);
    if (!port) return;
    port.removeAllListeners();
    if (port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null) =>
          err ? reject(new NodeSerialConnectionError(err.message)) : resolve()
        );
      });
    }
    this._onBytes?.();
  }
}

export default NodeSerialTransport;
