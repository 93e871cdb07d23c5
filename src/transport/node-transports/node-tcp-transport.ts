// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array } from '../../utils/utils.js';
import { rootLogger } from '../../logger.js';
import {
  NodeTcpConnectionError,
  TeleinfoConfigError,
  TeleinfoEndOfStreamError,
  TeleinfoNotConnectedError,
  TeleinfoTimeoutError,
} from '../../errors.js';
import {
  ConnectionErrorType,
  type NodeTcpTransportOptions,
  type PortStateHandler,
  type Transport,
} from '../../types/teleinfo-types.js';
import { PortConnectionTracker } from '../trackers/PortConnectionTracker.js';

const logger = rootLogger.createLogger('NodeTcpTransport');

const POLL_INTERVAL_MS = 10;

/**
 * Receive-only transport for serial-to-TCP bridges exposing a Teleinfo line.
 */
class NodeTcpTransport implements Transport {
  private host: string;
  private port: number;
  private options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _ended: boolean = false;

  private _reconnectAttempts: number = 0;
  private _shouldReconnect: boolean = true;
  private _reconnectTimeout: NodeJS.Timeout | null = null;
  private _isConnecting: boolean = false;
  private _operationMutex: Mutex = new Mutex();
  private readonly portConnectionTracker = new PortConnectionTracker({ debounceMs: 300 });

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      readTimeout: options.readTimeout ?? 2000,
      connectTimeout: options.connectTimeout ?? 5000,
      maxBufferSize: options.maxBufferSize ?? 8192,
      reconnectInterval: options.reconnectInterval ?? 3000,
      maxReconnectAttempts: options.maxReconnectAttempts ?? Infinity,
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

  public async connect(): Promise<void> {
    if (this._isConnecting || this._isOpen) return;
    this._isConnecting = true;
    this._shouldReconnect = true;
    this._ended = false;

    await new Promise<void>((resolve, reject) => {
      logger.info(`Connecting to ${this.host}:${this.port}...`);

      const socket = net.connect({ host: this.host, port: this.port }, () => {
        socket.setTimeout(0);
        this._isOpen = true;
        this._isConnecting = false;
        this._reconnectAttempts = 0;
        logger.info(`Connected to ${this.host}:${this.port}`);
        this.portConnectionTracker.notifyConnected().catch((err: unknown) => {
          logger.error(`Port state notification failed: ${String(err)}`);
        });
        resolve();
      });
      this.socket = socket;

      socket.on('data', (data: Buffer) => this._onData(data));

      socket.on('error', (err: Error) => {
        if (this._isConnecting) {
          this._isConnecting = false;
          reject(new NodeTcpConnectionError(err.message, { cause: err }));
          return;
        }
        logger.error(`Socket error: ${err.message}`);
      });

      socket.on('end', () => {
        this._ended = true;
      });
      socket.on('close', () => this._onClose());

      socket.setTimeout(this.options.connectTimeout);
      socket.on('timeout', () => {
        if (this._isConnecting) {
          this._isConnecting = false;
          socket.destroy();
          reject(new NodeTcpConnectionError(`TCP connection to ${this.host}:${this.port} timed out`));
        }
      });
    });
  }

  private _onData(data: Buffer): void {
    this.readBuffer = concatUint8Arrays([this.readBuffer, new Uint8Array(data)]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      const dropped = this.readBuffer.length - this.options.maxBufferSize;
      this.readBuffer = sliceUint8Array(this.readBuffer, dropped);
      logger.warn(`Receive buffer full, dropped ${dropped} bytes`, { bytes: dropped });
    }
  }

  private _onClose(): void {
    const wasOpen = this._isOpen;
    this._isOpen = false;
    this.socket = null;
    if (wasOpen) {
      logger.warn(`Connection closed for ${this.host}:${this.port}`);
      this.portConnectionTracker
        .notifyDisconnected(ConnectionErrorType.ConnectionLost, 'Connection closed by peer')
        .catch((err: unknown) => logger.error(`Port state notification failed: ${String(err)}`));
      this._scheduleReconnect();
    }
  }

  private _scheduleReconnect(): void {
    if (!this._shouldReconnect || this._reconnectTimeout) return;
    if (this._reconnectAttempts >= this.options.maxReconnectAttempts) {
      logger.error(`Max reconnect attempts (${this.options.maxReconnectAttempts}) reached`);
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
   * Resolves with 1..`length` buffered bytes.
   * @throws TeleinfoTimeoutError when nothing arrived within `timeout`
   * @throws TeleinfoEndOfStreamError once the peer closed and the buffer is drained
   */
  public async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!Number.isInteger(length) || length <= 0) {
      throw new TeleinfoConfigError(`Read length must be a positive integer, got ${length}`);
    }
    const start = Date.now();
    const release = await this._operationMutex.acquire();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = (): void => {
          if (this.readBuffer.length > 0) {
            const data = this.readBuffer.slice(0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, data.length);
            resolve(data);
            return;
          }
          if (this._ended) {
            reject(new TeleinfoEndOfStreamError(`${this.host}:${this.port} closed the connection`));
            return;
          }
          if (!this._isOpen) {
            reject(new TeleinfoNotConnectedError());
            return;
          }
          if (Date.now() - start >= timeout) {
            reject(new TeleinfoTimeoutError(`No data from ${this.host}:${this.port} within ${timeout}ms`));
            return;
          }
          setTimeout(check, POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  public async disconnect(): Promise<void> {
    this._shouldReconnect = false;
    if (this._reconnectTimeout) {
      clearTimeout(this._reconnectTimeout);
      this._reconnectTimeout = null;
    }
    const socket = this.socket;
    if (!socket) return;
    this._isOpen = false;
    await new Promise<void>(resolve => {
      socket.end(() => resolve());
    });
    socket.destroy();
    this.socket = null;
    await this.portConnectionTracker.notifyDisconnected(
      ConnectionErrorType.ManualDisconnect,
      'Connection closed by user'
    );
  }

  public async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }
}

export { NodeTcpTransport };
