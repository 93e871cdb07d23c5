import { describe, expect, it } from 'vitest';
import { TeleinfoMode } from '../src/constants/constants.js';
import { decodeBody, extractFrame, selectMode } from '../src/framers/frame-extractor.js';
import { LegacyFramer } from '../src/framers/legacy-framer.js';
import { StandardFramer } from '../src/framers/standard-framer.js';
import { bytes } from './helpers/memory-source.js';
import { LEGACY_LINES, STANDARD_LINES } from './fixtures/frames.js';

const FRAMERS = [new LegacyFramer(), new StandardFramer()];

describe('extractFrame', () => {
  it('returns the body between STX and ETX and the offset after ETX', () => {
    const buffer = bytes('noise\x02\nIINST 001 X\r\x03tail');
    const result = extractFrame(buffer);
    expect(result.status).toBe('complete');
    if (result.status !== 'complete') return;
    expect(decodeBody(result.body)).toBe('\nIINST 001 X\r');
    expect(result.end).toBe(20);
    expect(decodeBody(buffer.subarray(result.end))).toBe('tail');
  });

  it('is incomplete without STX', () => {
    expect(extractFrame(bytes('\nIINST 001 X\r\x03'))).toEqual({ status: 'incomplete' });
  });

  it('is incomplete without an ETX after the STX', () => {
    expect(extractFrame(bytes('\x03\x02\nIINST 001 X\r'))).toEqual({ status: 'incomplete' });
  });

  it('returns an empty body for back to back delimiters', () => {
    const result = extractFrame(bytes('\x02\x03'));
    expect(result.status === 'complete' && result.body.length).toBe(0);
  });
});

describe('decodeBody', () => {
  it('replaces invalid UTF-8 with U+FFFD', () => {
    expect(decodeBody(new Uint8Array([0x41, 0xff, 0x42]))).toBe('A\uFFFDB');
  });
});

describe('selectMode', () => {
  it('selects legacy for a legacy body', () => {
    const selection = selectMode(LEGACY_LINES.join(''), FRAMERS);
    expect(selection?.complete).toBe(true);
    expect(selection?.frame.mode).toBe(TeleinfoMode.Legacy);
    expect(selection?.frame.fields).toHaveLength(LEGACY_LINES.length);
  });

  it('selects standard for a standard body', () => {
    const text = STANDARD_LINES.join('');
    const selection = selectMode(text, FRAMERS);
    expect(selection?.frame.mode).toBe(TeleinfoMode.Standard);
    expect(selection?.frame.consumed).toBe(text.length);
    expect(selection?.frame.fields.map(f => f.tag)).toEqual([
      'ADSC',
      'VTIC',
      'DATE',
      'NGTF',
      'EASF01',
      'EASF02',
      'NTARF',
      'SINSTS1',
      'SMAXSN',
    ]);
  });

  it('returns null when no grammar consumes the whole body', () => {
    const text = '\nIINST 001 X\r\nGARBAGE\r';
    expect(selectMode(text, FRAMERS)).toBeNull();
  });

  it('returns null for an empty body', () => {
    expect(selectMode('', FRAMERS)).toBeNull();
    expect(selectMode('', FRAMERS, { acceptPartialFrames: true })).toBeNull();
  });

  it('keeps the first partial parse when partial frames are accepted', () => {
    const text = '\nIINST 001 X\r\nGARBAGE\r';
    const selection = selectMode(text, FRAMERS, { acceptPartialFrames: true });
    expect(selection?.complete).toBe(false);
    expect(selection?.frame.mode).toBe(TeleinfoMode.Legacy);
    expect(selection?.frame.consumed).toBe(13);
    expect(selection?.frame.fields).toEqual([{ tag: 'IINST', value: '001', checksum: 'X' }]);
  });

  it('does not mix grammars inside one body', () => {
    const text = LEGACY_LINES[0] + STANDARD_LINES[0];
    expect(selectMode(text, FRAMERS)).toBeNull();
  });
});
