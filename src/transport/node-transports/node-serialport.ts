// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { SERIAL_DEFAULTS, TeleinfoMode } from '../../constants/constants.js';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array } from '../../utils/utils.js';
import { rootLogger } from '../../logger.js';
import {
  NodeSerialConnectionError,
  NodeSerialReadError,
  TeleinfoConfigError,
  TeleinfoNotConnectedError,
  TeleinfoTimeoutError,
} from '../../errors.js';
import {
  ConnectionErrorType,
  type NodeSerialTransportOptions,
  type PortStateHandler,
  type Transport,
} from '../../types/teleinfo-types.js';
import { PortConnectionTracker } from '../trackers/PortConnectionTracker.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
  DEFAULT_MAX_BUFFER_SIZE: 4096,
  POLL_INTERVAL_MS: 10,
} as const;

// ========== LOGGER ==========
const logger = rootLogger.createLogger('NodeSerialTransport');

/** Line settings handed to `createPort` */
export interface SerialPortSettings {
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  stopBits: 1 | 1.5 | 2;
  parity: 'none' | 'even' | 'odd' | 'mark' | 'space';
}

/** The part of a serialport stream the transport drives */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback?: (err: Error | null) => void): void;
  close(callback?: (err: Error | null) => void): void;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(event?: string): unknown;
}

type ResolvedSerialOptions = Required<Omit<NodeSerialTransportOptions, 'mode'>>;

/**
 * Receive-only serial transport for a Teleinfo output (7E1).
 *
 * Incoming bytes are buffered as they arrive; `read` hands out whatever is available.
 */
class NodeSerialTransport implements Transport {
  private path: string;
  private options: ResolvedSerialOptions;
  private port: SerialPortHandle | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _reconnectAttempts: number = 0;
  private _shouldReconnect: boolean = true;
  private _reconnectTimeout: NodeJS.Timeout | null = null;
  private _isConnecting: boolean = false;
  private _operationMutex: Mutex = new Mutex();
  private readonly portConnectionTracker = new PortConnectionTracker({ debounceMs: 300 });

  constructor(port: string, options: NodeSerialTransportOptions = {}) {
    const { mode = TeleinfoMode.Standard, ...rest } = options;
    this.path = port;
    this.options = {
      ...SERIAL_DEFAULTS[mode],
      readTimeout: 1000,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      reconnectInterval: 3000,
      maxReconnectAttempts: Infinity,
      ...rest,
    };
  }

  public get isOpen(): boolean {
    return this._isOpen;
  }

  public setPortStateHandler(handler: PortStateHandler): void {
    this.portConnectionTracker.setHandler(handler).catch((err: unknown) => {
      logger.error(`Port state handler failed: ${String(err)}`);
    });
  }

  /**
   * Builds the underlying port. Overridden to plug another serialport binding.
   */
  protected createPort(settings: SerialPortSettings): SerialPortHandle {
    return new SerialPort({ ...settings, autoOpen: false });
  }

  private async _releaseAllResources(): Promise<void> {
    logger.debug('Releasing NodeSerial resources');
    const port = this.port;
    this._removeAllListeners();

    if (port && port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null) => {
          if (err) reject(new NodeSerialConnectionError(err.message, { cause: err }));
          else resolve();
        });
      });
    }

    this.port = null;
    this._isOpen = false;
    this.readBuffer = allocUint8Array(0);
  }

  private _removeAllListeners(): void {
    if (this.port) {
      this.port.removeAllListeners('data');
      this.port.removeAllListeners('error');
      this.port.removeAllListeners('close');
    }
  }

  async connect(): Promise<void> {
    if (this._isOpen) return;
    if (this._isConnecting) {
      logger.warn('Connection attempt already in progress');
      return;
    }

    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new TeleinfoConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    this._isConnecting = true;
    this._shouldReconnect = true;
    try {
      if (this._reconnectTimeout) {
        clearTimeout(this._reconnectTimeout);
        this._reconnectTimeout = null;
      }
      if (this.port) {
        await this._releaseAllResources();
      }
      await this._createAndOpenPort();
      logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
      await this.portConnectionTracker.notifyConnected();
    } catch (err: unknown) {
      const error =
        err instanceof NodeSerialConnectionError
          ? err
          : new NodeSerialConnectionError(String(err), { cause: err });
      logger.error(`Failed to open serial port ${this.path}: ${error.message}`);
      this._isOpen = false;
      throw error;
    } finally {
      this._isConnecting = false;
    }
  }

  private async _createAndOpenPort(): Promise<void> {
    const port = this.createPort({
      path: this.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
    });
    this.port = port;

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          const message = err.message.toLowerCase();
          if (message.includes('permission')) {
            reject(new NodeSerialConnectionError('Permission denied', { cause: err }));
          } else if (message.includes('busy')) {
            reject(new NodeSerialConnectionError('Serial port is busy', { cause: err }));
          } else if (message.includes('no such file')) {
            reject(new NodeSerialConnectionError('Serial port does not exist', { cause: err }));
          } else {
            reject(new NodeSerialConnectionError(err.message, { cause: err }));
          }
          return;
        }

        this._isOpen = true;
        this._reconnectAttempts = 0;
        this._removeAllListeners();
        port.on('data', (data: Buffer) => this._onData(data));
        port.on('error', (portErr: Error) => this._onError(portErr));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      const dropped = this.readBuffer.length - this.options.maxBufferSize;
      // keep the most recent bytes, the decoder resynchronizes on the next STX
      this.readBuffer = sliceUint8Array(this.readBuffer, dropped);
      logger.warn(`Receive buffer full, dropped ${dropped} bytes`, { bytes: dropped });
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
    this._handleConnectionLoss(err.message);
  }

  private _onClose(): void {
    if (!this._isOpen) return;
    logger.info(`Serial port ${this.path} closed`);
    this._handleConnectionLoss('Port was closed', ConnectionErrorType.PortClosed);
  }

  private _handleConnectionLoss(
    reason: string,
    type: ConnectionErrorType = ConnectionErrorType.ConnectionLost
  ): void {
    if (!this._isOpen) return;
    logger.warn(`Connection loss detected: ${reason}`);
    this._isOpen = false;
    this.portConnectionTracker.notifyDisconnected(type, reason).catch((err: unknown) => {
      logger.error(`Port state notification failed: ${String(err)}`);
    });
    this._scheduleReconnect();
  }

  private _scheduleReconnect(): void {
    if (!this._shouldReconnect || this._reconnectTimeout) return;
    if (this._reconnectAttempts >= this.options.maxReconnectAttempts) {
      this._shouldReconnect = false;
      logger.error(`Max reconnect attempts (${this.options.maxReconnectAttempts}) reached`);
      this.portConnectionTracker
        .notifyDisconnected(ConnectionErrorType.MaxReconnect, 'Max reconnect attempts reached')
        .catch((err: unknown) => logger.error(`Port state notification failed: ${String(err)}`));
      return;
    }
    this._reconnectAttempts++;
    this._reconnectTimeout = setTimeout(() => {
      this._reconnectTimeout = null;
      this.connect().catch((err: unknown) => {
        logger.warn(`Reconnect attempt ${this._reconnectAttempts} failed: ${String(err)}`);
        this._scheduleReconnect();
      });
    }, this.options.reconnectInterval);
  }

  /**
   * Drops buffered bytes, the next read starts with fresh data.
   */
  async flush(): Promise<void> {
    const release = await this._operationMutex.acquire();
    try {
      this.readBuffer = allocUint8Array(0);
    } finally {
      release();
    }
  }

  /**
   * Resolves with 1..`length` buffered bytes.
   * @throws TeleinfoTimeoutError when nothing arrived within `timeout`
   */
  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!Number.isInteger(length) || length <= 0) {
      throw new TeleinfoConfigError(`Read length must be a positive integer, got ${length}`);
    }
    const release = await this._operationMutex.acquire();
    const start = Date.now();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = (): void => {
          if (!this._isOpen || !this.port?.isOpen) {
            reject(
              this.port
                ? new NodeSerialReadError('Port closed')
                : new TeleinfoNotConnectedError()
            );
            return;
          }
          if (this.readBuffer.length > 0) {
            const data = this.readBuffer.slice(0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, data.length);
            resolve(data);
            return;
          }
          if (Date.now() - start >= timeout) {
            reject(new TeleinfoTimeoutError(`No data on ${this.path} within ${timeout}ms`));
            return;
          }
          setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  async disconnect(): Promise<void> {
    this._shouldReconnect = false;
    if (this._reconnectTimeout) {
      clearTimeout(this._reconnectTimeout);
      this._reconnectTimeout = null;
    }
    const wasOpen = this._isOpen;
    await this._releaseAllResources();
    if (wasOpen) {
      logger.info(`Serial port ${this.path} closed by user`);
      await this.portConnectionTracker.notifyDisconnected(
        ConnectionErrorType.ManualDisconnect,
        'Port closed by user'
      );
    }
  }
}

export { NodeSerialTransport };
