// src/utils/diagnostics.ts

import { TeleinfoMode } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import type { TeleinfoRecord } from '../record/teleinfo-record.js';
import type {
  AnalysisResult,
  DiagnosticsOptions,
  DiagnosticsStats,
  LoggerInstance,
} from '../types/teleinfo-types.js';

/**
 * Collects statistics about the decoded Teleinfo stream.
 */
class Diagnostics {
  private invalidRateThreshold: number;
  private notificationThreshold: number;
  private logger: LoggerInstance;
  private startTime: number;
  private totalFrames: number = 0;
  private validFrames: number = 0;
  private invalidFrames: number = 0;
  private parseErrors: number = 0;
  private timeouts: number = 0;
  private transportErrors: number = 0;
  private bytesReceived: number = 0;
  private framesByMode: Record<TeleinfoMode, number> = {
    [TeleinfoMode.Legacy]: 0,
    [TeleinfoMode.Standard]: 0,
  };
  private minDecodeTime: number | null = null;
  private maxDecodeTime: number | null = null;
  private _totalDecodeTime: number = 0;
  private lastErrorMessage: string | null = null;
  private lastFrameTimestamp: string | null = null;

  constructor(options: DiagnosticsOptions = {}) {
    this.invalidRateThreshold = options.invalidRateThreshold ?? 10; // %
    this.notificationThreshold = options.notificationThreshold ?? 10;
    this.logger = rootLogger.createLogger(options.loggerName || 'Diagnostics');
    this.startTime = Date.now();
    this.reset();
  }

  /**
   * Resets all counters. Uptime keeps counting from construction.
   */
  reset(): void {
    this.totalFrames = 0;
    this.validFrames = 0;
    this.invalidFrames = 0;
    this.parseErrors = 0;
    this.timeouts = 0;
    this.transportErrors = 0;
    this.bytesReceived = 0;
    this.framesByMode = { [TeleinfoMode.Legacy]: 0, [TeleinfoMode.Standard]: 0 };
    this.minDecodeTime = null;
    this.maxDecodeTime = null;
    this._totalDecodeTime = 0;
    this.lastErrorMessage = null;
    this.lastFrameTimestamp = null;
  }

  /**
   * Records a decoded frame and the time spent waiting for it.
   */
  recordFrame(record: TeleinfoRecord, decodeTimeMs: number): void {
    this.totalFrames++;
    if (record.valid) {
      this.validFrames++;
    } else {
      this.invalidFrames++;
    }
    this.framesByMode[record.mode]++;
    this._totalDecodeTime += decodeTimeMs;
    this.minDecodeTime =
      this.minDecodeTime === null ? decodeTimeMs : Math.min(this.minDecodeTime, decodeTimeMs);
    this.maxDecodeTime =
      this.maxDecodeTime === null ? decodeTimeMs : Math.max(this.maxDecodeTime, decodeTimeMs);
    this.lastFrameTimestamp = new Date().toISOString();
  }

  recordParseError(message: string): void {
    this.parseErrors++;
    this.lastErrorMessage = message;
  }

  recordTimeout(): void {
    this.timeouts++;
  }

  recordTransportError(message: string): void {
    this.transportErrors++;
    this.lastErrorMessage = message;
  }

  recordBytesReceived(byteLength: number): void {
    this.bytesReceived += byteLength;
  }

  /**
   * Percentage of decoded frames that were not valid.
   */
  get invalidRate(): number {
    return this.totalFrames === 0 ? 0 : (this.invalidFrames / this.totalFrames) * 100;
  }

  get averageDecodeTime(): number | null {
    return this.totalFrames === 0 ? null : this._totalDecodeTime / this.totalFrames;
  }

  get uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  /**
   * Analyzes statistics and returns potential issues.
   */
  analyze(): AnalysisResult {
    const warnings: string[] = [];
    if (this.invalidRate > this.invalidRateThreshold) {
      warnings.push(
        `High invalid frame rate: ${this.invalidRate.toFixed(2)}% (threshold: ${this.invalidRateThreshold}%)`
      );
    }
    if (this.parseErrors > this.notificationThreshold) {
      warnings.push(`High parse error count: ${this.parseErrors}`);
    }
    if (this.timeouts > this.notificationThreshold) {
      warnings.push(`High timeout count: ${this.timeouts}`);
    }
    if (this.transportErrors > this.notificationThreshold) {
      warnings.push(`High transport error count: ${this.transportErrors}`);
    }
    return {
      warnings,
      isHealthy: warnings.length === 0,
      stats: this.getStats(),
    };
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: this.uptimeSeconds,
      totalFrames: this.totalFrames,
      validFrames: this.validFrames,
      invalidFrames: this.invalidFrames,
      parseErrors: this.parseErrors,
      timeouts: this.timeouts,
      transportErrors: this.transportErrors,
      bytesReceived: this.bytesReceived,
      framesByMode: { ...this.framesByMode },
      invalidRate: this.invalidRate,
      averageDecodeTime: this.averageDecodeTime,
      minDecodeTime: this.minDecodeTime,
      maxDecodeTime: this.maxDecodeTime,
      lastErrorMessage: this.lastErrorMessage,
      lastFrameTimestamp: this.lastFrameTimestamp,
    };
  }

  /**
   * Prints formatted statistics through the diagnostics logger.
   */
  printStats(): void {
    const stats: DiagnosticsStats = this.getStats();
    this.logger.info('=== Teleinfo Diagnostics ===');
    this.logger.info(`Uptime: ${stats.uptimeSeconds} seconds`);
    this.logger.info(
      `Frames: ${stats.totalFrames} (valid ${stats.validFrames}, invalid ${stats.invalidFrames}, rate ${stats.invalidRate.toFixed(2)}%)`
    );
    this.logger.info(
      `By mode: legacy ${stats.framesByMode[TeleinfoMode.Legacy]}, standard ${stats.framesByMode[TeleinfoMode.Standard]}`
    );
    this.logger.info(`Parse errors: ${stats.parseErrors}`);
    this.logger.info(`Timeouts: ${stats.timeouts}`);
    this.logger.info(`Transport errors: ${stats.transportErrors}`);
    this.logger.info(`Bytes received: ${stats.bytesReceived}`);
    this.logger.info(
      `Decode time: avg ${stats.averageDecodeTime?.toFixed(1) ?? 'N/A'} ms, min ${stats.minDecodeTime ?? 'N/A'} ms, max ${stats.maxDecodeTime ?? 'N/A'} ms`
    );
    this.logger.info(`Last error: ${stats.lastErrorMessage ?? 'none'}`);
    this.logger.info('============================');
  }

  serialize(): string {
    return JSON.stringify(this.getStats(), null, 2);
  }
}

export { Diagnostics };
