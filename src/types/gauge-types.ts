// src/types/gauge-types.ts

import type { AccessCode, GaugeVerb } from '../constants/constants.js';

// !=============================================================================
// ! Logging
// !=============================================================================
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Logging context */
export interface LogContext {
  deviceId?: number;
  verb?: string;
  accessCode?: number;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'deviceId' | 'verb' | 'responseTime';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Category logger */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Transport
// !=============================================================================
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  read(length: number, timeout?: number): Promise<Uint8Array>;
  flush?(): Promise<void>;
}

/** Options for the Node.js SerialPort transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  readTimeout?: number;
  maxBufferSize?: number;
}

export interface EmulatorTransportOptions {
  readTimeout?: number;
  maxBufferSize?: number;
}

// !=============================================================================
// ! Framing and PDUs
// !=============================================================================
export type Dialect = 'A' | 'B';

/** One decode step over a receive buffer */
export interface FrameDecodeResult {
  /** Bytes to drop from the head of the buffer; 0 means wait for more input */
  consumed: number;
  /** 0 when no usable frame was produced */
  deviceId: number;
  payload: Uint8Array;
}

export interface AsciiFramerOptions {
  minSize?: number;
}

/** Verb resolved at decode time; anything unknown falls through to echo */
export type ResolvedVerb =
  | { kind: 'known'; verb: GaugeVerb }
  | { kind: 'passthrough' };

export interface ProtocolACommand {
  verb: string;
  resolved: ResolvedVerb;
  data: string;
  length: number;
  /** Code point of the verb, 0 when there is none */
  functionCode: number;
}

export interface ProtocolBCommand {
  accessCode: AccessCode;
  verb: string;
  data: string;
  length: number;
}

export type ProtocolBDirection = 'request' | 'reply';

// !=============================================================================
// ! Emulator, protocol and clients
// !=============================================================================
export interface GaugeState {
  pressure: number;
  setpoint1: number;
  setpoint2: number;
  calibration1: number;
  calibration2: number;
  penningState: boolean;
  penningSync: boolean;
}

export interface GaugeEmulatorOptions {
  dialect?: Dialect;
  model?: string;
  loggerEnabled?: boolean;
  initialState?: Partial<GaugeState>;
}

export interface GaugeProtocolOptions {
  logLevel?: LogLevel;
}

export interface GaugeClientOptions {
  timeout?: number;
  logLevel?: LogLevel;
}

export interface GaugeReading {
  pressure: number | null;
}
