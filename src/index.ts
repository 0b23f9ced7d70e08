// src/index.ts

export * from './constants/constants.js';
export * from './errors.js';
export * from './types/gauge-types.js';
export { checksum, verifyChecksum } from './utils/checksum.js';
export {
  calibrationDecode,
  calibrationEncode,
  combineUint32,
  exponentOf,
  mantissaOf,
  pressureDecode,
  pressureEncode,
  splitUint32,
} from './utils/numeric.js';
export type { GaugeFramer } from './framers/gauge-framer.js';
export { AsciiFramer, createProtocolAFramer, createProtocolBFramer } from './framers/ascii-framer.js';
export { GaugeProtocol } from './framers/gauge-protocol.js';
export * from './pdu/protocol-a.js';
export * from './pdu/protocol-b.js';
export * from './gauge-emulator/register-model.js';
export { interpret } from './gauge-emulator/command-interpreter.js';
export { default as GaugeEmulator } from './gauge-emulator/gauge-emulator.js';
export { default as EmulatorTransport } from './transport/emulator-transports/emulator-transport.js';
export { default as NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export { default as VacuumGaugeClient } from './client.js';
export { default as ProtocolBClient } from './protocol-b-client.js';
export { default as Logger } from './logger.js';
