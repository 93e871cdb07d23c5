// src/transport/trackers/PortConnectionTracker.ts

import { Mutex } from 'async-mutex';
import { ConnectionErrorType, type PortStateHandler } from '../../types/teleinfo-types.js';

/**
 * Connection state of a serial line or TCP bridge
 */
export interface PortConnectionState {
  isConnected: boolean;
  /** Reason of the last disconnection */
  errorType?: ConnectionErrorType;
  errorMessage?: string;
  /** Last state change (ms) */
  timestamp: number;
}

export interface PortConnectionTrackerOptions {
  /** Trailing debounce applied to disconnection notifications (ms), default 300 */
  debounceMs?: number;
}

/**
 * Tracks whether the port is connected and notifies a handler on changes.
 *
 * Connections are reported immediately; disconnections are debounced so that a
 * close/error pair from the same failure produces a single notification.
 */
export class PortConnectionTracker {
  private _handler?: PortStateHandler;
  private _state: PortConnectionState;
  private readonly _debounceMs: number;
  private readonly _mutex = new Mutex();
  private _debounceTimeout: NodeJS.Timeout | null = null;

  constructor(options: PortConnectionTrackerOptions = {}) {
    this._debounceMs = options.debounceMs ?? 300;
    this._state = { isConnected: false, timestamp: Date.now() };
  }

  /**
   * Installs the handler and calls it once with the current state.
   */
  public async setHandler(handler: PortStateHandler): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      this._handler = handler;
      if (this._state.isConnected) {
        handler(true);
      } else {
        handler(false, {
          type: this._state.errorType ?? ConnectionErrorType.UnknownError,
          message: this._state.errorMessage ?? 'Port not connected',
        });
      }
    } finally {
      release();
    }
  }

  /**
   * Ignored when the port is already marked connected.
   */
  public async notifyConnected(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (this._debounceTimeout) {
        clearTimeout(this._debounceTimeout);
        this._debounceTimeout = null;
      }
      if (this._state.isConnected) return;

      this._state = { isConnected: true, timestamp: Date.now() };
      this._handler?.(true);
    } finally {
      release();
    }
  }

  public async notifyDisconnected(
    errorType: ConnectionErrorType = ConnectionErrorType.UnknownError,
    errorMessage: string = 'Port disconnected'
  ): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (!this._state.isConnected) return;

      this._state = { isConnected: false, errorType, errorMessage, timestamp: Date.now() };

      if (this._debounceTimeout) clearTimeout(this._debounceTimeout);
      this._debounceTimeout = setTimeout(() => {
        this._debounceTimeout = null;
        this._handler?.(false, { type: errorType, message: errorMessage });
      }, this._debounceMs);
    } finally {
      release();
    }
  }

  public async getState(): Promise<PortConnectionState> {
    const release = await this._mutex.acquire();
    try {
      return { ...this._state };
    } finally {
      release();
    }
  }

  /**
   * Cancels a pending notification and resets the state.
   */
  public async clear(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (this._debounceTimeout) {
        clearTimeout(this._debounceTimeout);
        this._debounceTimeout = null;
      }
      this._state = { isConnected: false, timestamp: Date.now() };
    } finally {
      release();
    }
  }
}
