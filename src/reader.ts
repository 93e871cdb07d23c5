// src/reader.ts

import { Mutex } from 'async-mutex';
import { TeleinfoProtocol } from './framers/teleinfo-protocol.js';
import { rootLogger } from './logger.js';
import type { TeleinfoRecord } from './record/teleinfo-record.js';
import { Diagnostics } from './utils/diagnostics.js';
import { TeleinfoIoError, TeleinfoParseError, TeleinfoTimeoutError } from './errors.js';
import type {
  DiagnosticsStats,
  LogContext,
  LogLevel,
  TeleinfoReaderOptions,
  TeleinfoSource,
  Transport,
} from './types/teleinfo-types.js';
import { toPrintable } from './utils/utils.js';

const LOGGER_CATEGORIES = ['TeleinfoReader', 'TeleinfoProtocol'] as const;

const logger = rootLogger.createLogger('TeleinfoReader');

export interface RecordIterationOptions {
  /** Skip records whose checksums or layout did not validate */
  skipInvalid?: boolean;
}

function isTransport(source: TeleinfoSource): source is Transport {
  return (
    'connect' in source &&
    typeof source.connect === 'function' &&
    'disconnect' in source &&
    typeof source.disconnect === 'function'
  );
}

/**
 * Reads consecutive records from one source.
 *
 * Keeps the leftover between calls and serializes reads, so concurrent callers each
 * receive a distinct frame.
 */
class TeleinfoReader {
  private readonly source: TeleinfoSource;
  private readonly protocol: TeleinfoProtocol;
  private readonly diagnosticsEnabled: boolean;
  private readonly diagnostics: Diagnostics;
  private readonly _mutex: Mutex = new Mutex();
  private leftover: Uint8Array = new Uint8Array(0);

  constructor(source: TeleinfoSource, options: TeleinfoReaderOptions = {}) {
    const { diagnostics, logLevel, ...decodeOptions } = options;
    this.source = source;
    this.protocol = new TeleinfoProtocol(decodeOptions);
    this.diagnosticsEnabled = !!diagnostics;
    this.diagnostics = new Diagnostics({ loggerName: 'TeleinfoReader' });
    if (logLevel) this.enableLogger(logLevel);
  }

  /**
   * Enables the reader and decoder loggers
   */
  enableLogger(level: LogLevel = 'info'): void {
    for (const category of LOGGER_CATEGORIES) rootLogger.setLevelFor(category, level);
  }

  /**
   * Disables the reader and decoder loggers (errors only)
   */
  disableLogger(): void {
    for (const category of LOGGER_CATEGORIES) rootLogger.setLevelFor(category, 'error');
  }

  setLoggerContext(context: LogContext): void {
    rootLogger.addGlobalContext(context);
  }

  /** Bytes received after the last decoded frame */
  get pendingBytes(): number {
    return this.leftover.length;
  }

  /**
   * Opens the transport when the source manages a connection.
   */
  async connect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (isTransport(this.source) && !this.source.isOpen) {
        await this.source.connect();
      }
      rootLogger.setTransportType(this.source.constructor.name);
      logger.info('Reader ready');
    } finally {
      release();
    }
  }

  /**
   * Closes the transport and drops buffered bytes.
   */
  async disconnect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      this.leftover = new Uint8Array(0);
      if (isTransport(this.source)) {
        await this.source.disconnect();
      }
      logger.info('Reader disconnected');
    } finally {
      release();
    }
  }

  private _countingSource(): TeleinfoSource {
    if (!this.diagnosticsEnabled) return this.source;
    return {
      read: async (length: number, timeout?: number): Promise<Uint8Array> => {
        try {
          const chunk = await this.source.read(length, timeout);
          this.diagnostics.recordBytesReceived(chunk.length);
          return chunk;
        } catch (err: unknown) {
          if (err instanceof TeleinfoTimeoutError) this.diagnostics.recordTimeout();
          throw err;
        }
      },
    };
  }

  /**
   * Reads the next frame.
   *
   * After a `TeleinfoParseError` the reader resumes right after the rejected frame.
   * @throws TeleinfoParseError when a frame matches no grammar
   * @throws TeleinfoIoError when the source fails
   */
  async readRecord(): Promise<TeleinfoRecord> {
    const release = await this._mutex.acquire();
    const startTime = Date.now();
    try {
      const { leftover, record } = await this.protocol.decode(this._countingSource(), this.leftover);
      this.leftover = leftover;
      const responseTime = Date.now() - startTime;
      if (this.diagnosticsEnabled) this.diagnostics.recordFrame(record, responseTime);
      logger.debug(`Record with ${record.size} fields`, {
        mode: record.mode,
        responseTime,
        valid: record.valid,
      });
      return record;
    } catch (err: unknown) {
      if (err instanceof TeleinfoParseError) {
        this.leftover = err.remaining;
        if (this.diagnosticsEnabled) this.diagnostics.recordParseError(err.message);
        logger.warn(`Skipping frame: ${toPrintable(err.frame)}`);
      } else if (err instanceof TeleinfoIoError) {
        if (this.diagnosticsEnabled) this.diagnostics.recordTransportError(err.message);
        logger.error(`Transport failure: ${err.message}`);
      }
      throw err;
    } finally {
      release();
    }
  }

  /**
   * Yields records until the source fails. Unparseable frames are skipped.
   */
  async *records(options: RecordIterationOptions = {}): AsyncGenerator<TeleinfoRecord, void, undefined> {
    while (true) {
      let record: TeleinfoRecord;
      try {
        record = await this.readRecord();
      } catch (err: unknown) {
        if (err instanceof TeleinfoParseError) continue;
        throw err;
      }
      if (options.skipInvalid && !record.valid) continue;
      yield record;
    }
  }

  getDiagnostics(): DiagnosticsStats {
    return this.diagnostics.getStats();
  }

  resetDiagnostics(): void {
    this.diagnostics.reset();
  }

  printDiagnostics(): void {
    this.diagnostics.printStats();
  }
}

export { TeleinfoReader };
