// src/framers/gauge-protocol.ts
import { Mutex } from 'async-mutex';
import Logger from '../logger.js';
import type { GaugeFramer } from './gauge-framer.js';
import {
  GaugeNotConnectedError,
  GaugeTimeoutError,
  NodeSerialTransportError,
} from '../errors.js';
import type { GaugeProtocolOptions, LoggerInstance, Transport } from '../types/gauge-types.js';
import { allocUint8Array, concatUint8Arrays, toPrintable } from '../utils/utils.js';

/** Failures that mean the line is down or silent, reported as no reply */
function isLineFailure(err: unknown): err is Error {
  return (
    err instanceof GaugeTimeoutError ||
    err instanceof GaugeNotConnectedError ||
    err instanceof NodeSerialTransportError
  );
}

const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger', 'deviceId', 'responseTime']);

/**
 * Request/response exchange over one transport: one request in flight at a
 * time, replies matched by device id. Timeouts and a closed or dropped line
 * are reported as null.
 */
export class GaugeProtocol {
  private _mutex: Mutex = new Mutex();
  private _logger: LoggerInstance;

  constructor(
    private _transport: Transport,
    private _framer: GaugeFramer,
    options: GaugeProtocolOptions = {}
  ) {
    this._logger = loggerInstance.createLogger('GaugeProtocol');
    this._logger.setLevel(options.logLevel ?? 'error');
  }

  /**
   * Sends one framed request and waits for the first valid frame from the same device.
   * @param deviceId - Target device id, 0-999
   * @param payload - Frame payload (PDU)
   * @param timeout - Total time to wait for the reply, ms
   * @returns Reply payload, or null when no matching reply arrived in time or the line is down
   */
  public async exchange(
    deviceId: number,
    payload: Uint8Array,
    timeout: number
  ): Promise<Uint8Array | null> {
    return this._mutex.runExclusive(async () => {
      try {
        return await this._exchange(deviceId, payload, timeout);
      } catch (err: unknown) {
        if (!isLineFailure(err)) throw err;
        this._logger.warn(`No response: ${err.message}`, { deviceId });
        return null;
      }
    });
  }

  private async _exchange(
    deviceId: number,
    payload: Uint8Array,
    timeout: number
  ): Promise<Uint8Array | null> {
    const startTime = Date.now();
    const request = this._framer.encode(payload, deviceId);

    if (this._transport.flush) {
      await this._transport.flush();
    }

    this._logger.debug(`TX ${toPrintable(request)}`, { deviceId });
    await this._transport.write(request);

    let buffer: Uint8Array = allocUint8Array(0);

    for (;;) {
      const elapsed = Date.now() - startTime;
      if (elapsed >= timeout) {
        this._logger.warn(`No response after ${elapsed}ms`, { deviceId });
        return null;
      }

      const chunk = await this._transport.read(1, timeout - elapsed);
      buffer = concatUint8Arrays([buffer, chunk]);

      // Drain every complete frame; the first valid one for this device is the reply
      for (;;) {
        const { consumed, deviceId: replyId, payload: reply } = this._framer.decode(buffer);
        if (consumed === 0) break;

        const frame = buffer.subarray(0, consumed);
        buffer = buffer.slice(consumed);

        const reason = this._framer.diagnose?.(frame) ?? null;
        if (reason !== null) {
          this._logger.debug(`Skipping frame ${toPrintable(frame)}: ${reason.message}`, {
            deviceId,
          });
          continue;
        }
        if (replyId !== deviceId) {
          this._logger.debug(`Skipping frame from device ${replyId}`, { deviceId });
          continue;
        }

        this._logger.debug(`RX ${toPrintable(frame)}`, {
          deviceId,
          responseTime: Date.now() - startTime,
        });
        return reply;
      }
    }
  }

  public get transport(): Transport {
    return this._transport;
  }

  public get framer(): GaugeFramer {
    return this._framer;
  }
}
