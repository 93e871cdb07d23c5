// src/types/teleinfo-types.ts

import type { TeleinfoMode } from '../constants/constants.js';
import type { ExtraTags } from '../constants/tags.js';

// !=============================================================================
// ! Frame content
// !=============================================================================

/** Season marker of a horodate: winter (H), summer (E), or blank when the meter clock is unsynchronized */
export type HorodateSeason = 'H' | 'E' | 'h' | 'e' | ' ';

/** Timestamp embedded in a standard-mode field */
export interface Horodate {
  readonly season: HorodateSeason;
  /** Local time */
  readonly date: Date;
  /** The 13 characters as transmitted, needed for checksum recomputation */
  readonly rawValue: string;
}

/** One tag/value line of a frame */
export interface TeleinfoField {
  tag: string;
  /** Raw payload, not trimmed */
  value: string;
  /** Checksum character as transmitted */
  checksum: string;
  horodate?: Horodate;
}

/** Result of parsing a whole frame body with one grammar */
export interface ParsedFrame {
  mode: TeleinfoMode;
  fields: TeleinfoField[];
  /** Number of characters of the body covered by `fields` */
  consumed: number;
}

export type FrameExtraction =
  | { status: 'complete'; body: Uint8Array; end: number }
  | { status: 'incomplete' };

// !=============================================================================
// ! Transport
// !=============================================================================

/**
 * Minimal byte source consumed by `decode`.
 *
 * `read` resolves with at most `length` bytes and rejects with `TeleinfoTimeoutError`
 * when nothing arrived within `timeout`.
 */
export interface TeleinfoSource {
  read(length: number, timeout?: number): Promise<Uint8Array>;
}

/**
 * Reasons reported to a `PortStateHandler` on disconnection
 */
export enum ConnectionErrorType {
  UnknownError = 'UnknownError',
  PortClosed = 'PortClosed',
  ConnectionLost = 'ConnectionLost',
  MaxReconnect = 'MaxReconnect',
  ManualDisconnect = 'ManualDisconnect',
}

export type PortStateHandler = (
  connected: boolean,
  error?: { type: ConnectionErrorType; message: string }
) => void;

/** Connection-managing transport */
export interface Transport extends TeleinfoSource {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  flush?(): Promise<void>;
  setPortStateHandler(handler: PortStateHandler): void;
}

export interface NodeSerialTransportOptions {
  /** Selects baud rate defaults: 1200 for legacy, 9600 for standard */
  mode?: TeleinfoMode;
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'odd' | 'mark' | 'space';
  readTimeout?: number;
  maxBufferSize?: number;
  reconnectInterval?: number;
  maxReconnectAttempts?: number;
}

export interface NodeTcpTransportOptions {
  readTimeout?: number;
  connectTimeout?: number;
  maxBufferSize?: number;
  reconnectInterval?: number;
  maxReconnectAttempts?: number;
}

// !=============================================================================
// ! Decoder options
// !=============================================================================

export interface DecodeOptions {
  /** Maximum bytes requested per read */
  readChunkSize?: number;
  /** Timeout passed to each read (ms) */
  readTimeout?: number;
  /** Consecutive empty reads tolerated before giving up */
  maxEmptyReads?: number;
  /** Accumulator size limit while no complete frame is found */
  maxBufferSize?: number;
  /**
   * Keep frames whose body is only partly understood (as `valid: false` records)
   * instead of raising `TeleinfoParseError`
   */
  acceptPartialFrames?: boolean;
  extraTags?: ExtraTags;
}

export interface TeleinfoReaderOptions extends DecodeOptions {
  diagnostics?: boolean;
  logLevel?: LogLevel;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  mode?: TeleinfoMode;
  tag?: string;
  frameLength?: number;
  bytes?: number;
  responseTime?: number;
  transport?: string;
  [key: string]: unknown;
}

export type LogFormatField = 'timestamp' | 'level' | 'logger' | 'mode' | 'tag' | 'frameLength' | 'bytes' | 'responseTime';

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(level: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsOptions {
  /** Invalid frame rate (%) above which `analyze` warns */
  invalidRateThreshold?: number;
  /** Parse error, timeout or transport error count above which `analyze` warns */
  notificationThreshold?: number;
  loggerName?: string;
}

export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalFrames: number;
  validFrames: number;
  invalidFrames: number;
  parseErrors: number;
  timeouts: number;
  transportErrors: number;
  bytesReceived: number;
  framesByMode: Record<TeleinfoMode, number>;
  invalidRate: number;
  averageDecodeTime: number | null;
  minDecodeTime: number | null;
  maxDecodeTime: number | null;
  lastErrorMessage: string | null;
  lastFrameTimestamp: string | null;
}

export interface AnalysisResult {
  isHealthy: boolean;
  warnings: string[];
  stats: DiagnosticsStats;
}
