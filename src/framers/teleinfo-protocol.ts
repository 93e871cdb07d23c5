// src/framers/teleinfo-protocol.ts

import { DECODE_DEFAULTS } from '../constants/constants.js';
import { createTagDictionary, DEFAULT_TAGS, type TagDictionary } from '../constants/tags.js';
import {
  TeleinfoBufferOverflowError,
  TeleinfoConfigError,
  TeleinfoError,
  TeleinfoIoError,
  TeleinfoParseError,
  TeleinfoTimeoutError,
  TeleinfoTooManyEmptyReadsError,
} from '../errors.js';
import { rootLogger } from '../logger.js';
import { TeleinfoRecord } from '../record/teleinfo-record.js';
import type { DecodeOptions, TeleinfoSource } from '../types/teleinfo-types.js';
import { concatUint8Arrays, sliceUint8Array, toPrintable } from '../utils/utils.js';
import { decodeBody, extractFrame, selectMode } from './frame-extractor.js';
import { LegacyFramer } from './legacy-framer.js';
import { StandardFramer } from './standard-framer.js';
import type { TeleinfoFramer } from './teleinfo-framer.js';

const logger = rootLogger.createLogger('TeleinfoProtocol');

export interface DecodeResult {
  /** Bytes after the decoded frame, to pass to the next call */
  leftover: Uint8Array;
  record: TeleinfoRecord;
}

type ResolvedDecodeOptions = Required<Omit<DecodeOptions, 'extraTags'>>;

const DEFAULT_OPTIONS: ResolvedDecodeOptions = {
  readChunkSize: DECODE_DEFAULTS.READ_CHUNK_SIZE,
  readTimeout: DECODE_DEFAULTS.READ_TIMEOUT,
  maxEmptyReads: Infinity,
  maxBufferSize: DECODE_DEFAULTS.MAX_BUFFER_SIZE,
  acceptPartialFrames: false,
};

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new TeleinfoConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Frame assembler over any byte source.
 *
 * Holds only configuration: the buffer between frames is the caller's leftover.
 */
export class TeleinfoProtocol {
  private readonly _options: ResolvedDecodeOptions;
  private readonly _framers: readonly TeleinfoFramer[];

  constructor(options: DecodeOptions = {}) {
    const { extraTags, ...rest } = options;
    this._options = { ...DEFAULT_OPTIONS, ...rest };

    assertPositiveInteger('readChunkSize', this._options.readChunkSize);
    assertPositiveInteger('maxBufferSize', this._options.maxBufferSize);
    if (!(this._options.readTimeout >= 0)) {
      throw new TeleinfoConfigError(`readTimeout must be >= 0, got ${this._options.readTimeout}`);
    }
    if (
      this._options.maxEmptyReads !== Infinity &&
      !(Number.isInteger(this._options.maxEmptyReads) && this._options.maxEmptyReads >= 0)
    ) {
      throw new TeleinfoConfigError(
        `maxEmptyReads must be a non-negative integer or Infinity, got ${this._options.maxEmptyReads}`
      );
    }

    const tags: TagDictionary = extraTags ? createTagDictionary(extraTags) : DEFAULT_TAGS;
    // Legacy is tried first
    this._framers = [new LegacyFramer(tags), new StandardFramer(tags)];
  }

  public get options(): Readonly<ResolvedDecodeOptions> {
    return this._options;
  }

  /**
   * Decodes the first complete frame of `buffer`.
   * @returns null when `buffer` holds no complete frame yet
   * @throws TeleinfoParseError when the frame matches no grammar
   */
  public decodeFrame(buffer: Uint8Array): DecodeResult | null {
    const extraction = extractFrame(buffer);
    if (extraction.status === 'incomplete') return null;

    const text = decodeBody(extraction.body);
    const leftover = sliceUint8Array(buffer, extraction.end);
    const selection = selectMode(text, this._framers, this._options);

    if (!selection) {
      logger.warn(`Unparseable frame: ${toPrintable(text)}`, { frameLength: text.length });
      throw new TeleinfoParseError('Frame body matches neither legacy nor standard grammar', text, leftover);
    }

    const { frame, complete } = selection;
    const record = TeleinfoRecord.fromFields(frame.mode, frame.fields, complete);

    if (!complete) {
      logger.warn(`Frame only parsed up to offset ${frame.consumed}`, {
        mode: frame.mode,
        frameLength: text.length,
      });
    } else if (!record.valid) {
      logger.debug('Checksum mismatch', { mode: frame.mode, invalid: record.invalidTags() });
    }
    logger.trace(`Frame decoded with ${record.size} fields`, {
      mode: frame.mode,
      frameLength: text.length,
    });

    return { leftover, record };
  }

  /**
   * Reads from `source` until one complete frame is decoded.
   *
   * Timeouts count as empty reads. Any other source failure becomes a `TeleinfoIoError`.
   */
  public async decode(source: TeleinfoSource, leftover: Uint8Array = new Uint8Array(0)): Promise<DecodeResult> {
    const { readChunkSize, readTimeout, maxEmptyReads, maxBufferSize } = this._options;
    let buffer: Uint8Array = leftover.slice();
    let emptyReads = 0;

    while (true) {
      const result = this.decodeFrame(buffer);
      if (result) return result;

      if (buffer.length > maxBufferSize) {
        throw new TeleinfoBufferOverflowError(buffer.length, maxBufferSize);
      }

      let chunk: Uint8Array;
      try {
        chunk = await source.read(readChunkSize, readTimeout);
      } catch (err: unknown) {
        if (err instanceof TeleinfoTimeoutError) {
          chunk = new Uint8Array(0);
        } else if (err instanceof TeleinfoError) {
          throw err;
        } else {
          const message = err instanceof Error ? err.message : String(err);
          throw new TeleinfoIoError(`Read failed: ${message}`, { cause: err });
        }
      }

      if (chunk.length === 0) {
        emptyReads++;
        if (emptyReads > maxEmptyReads) {
          throw new TeleinfoTooManyEmptyReadsError(emptyReads);
        }
        continue;
      }

      emptyReads = 0;
      logger.trace('Chunk received', { bytes: chunk.length });
      buffer = concatUint8Arrays([buffer, chunk]);
    }
  }
}

/**
 * Reads from `source` until one frame is decoded.
 * @param leftover - bytes returned by the previous call, empty on the first one
 */
export function decode(
  source: TeleinfoSource,
  leftover: Uint8Array = new Uint8Array(0),
  options: DecodeOptions = {}
): Promise<DecodeResult> {
  return new TeleinfoProtocol(options).decode(source, leftover);
}

/**
 * Synchronous variant of `decode` for callers owning their buffering.
 */
export function decodeFrame(buffer: Uint8Array, options: DecodeOptions = {}): DecodeResult | null {
  return new TeleinfoProtocol(options).decodeFrame(buffer);
}
