import { describe, expect, it } from 'vitest';
import { TeleinfoMode } from '../src/constants/constants.js';
import {
  buildChecksumInput,
  checksum,
  checksumChar,
  isFieldValid,
} from '../src/utils/checksum.js';
import { parseHorodate } from '../src/parser/horodate.js';
import { bytes } from './helpers/memory-source.js';

describe('checksum', () => {
  it('masks the sum to six bits and shifts it into the printable range', () => {
    expect(checksumChar('BBRHCJB 001478389')).toBe('E');
    expect(checksumChar('ADCO 031961098836')).toBe('M');
    expect(checksumChar('PAPP 00120')).toBe('$');
  });

  it('returns a space for empty input', () => {
    expect(checksum('')).toBe(0x20);
    expect(checksumChar('')).toBe(' ');
  });

  it('changes when any single byte of its input changes', () => {
    for (const [input, expected] of [
      ['BBRHCJB 001478389', 'E'],
      ['SMAXSN3-1\tH200213085118\t03191\t', 'K'],
    ] as const) {
      expect(checksumChar(input)).toBe(expected);
      for (let i = 0; i < input.length; i++) {
        const flipped =
          input.slice(0, i) + String.fromCharCode(input.charCodeAt(i) ^ 0x01) + input.slice(i + 1);
        expect(checksumChar(flipped)).not.toBe(expected);
      }
    }
  });

  it('gives the same result for a string and its bytes', () => {
    expect(checksum(bytes('PTEC HPJB'))).toBe(checksum('PTEC HPJB'));
    expect(checksumChar(bytes('PTEC HPJB'))).toBe('P');
  });
});

describe('buildChecksumInput', () => {
  it('omits the trailing separator in legacy mode', () => {
    const input = buildChecksumInput(TeleinfoMode.Legacy, { tag: 'IINST', value: '001' });
    expect(input).toBe('IINST 001');
    expect(checksumChar(input)).toBe('X');
  });

  it('includes the trailing separator in standard mode', () => {
    const input = buildChecksumInput(TeleinfoMode.Standard, { tag: 'EASF01', value: '004855593' });
    expect(input).toBe('EASF01\t004855593\t');
    expect(checksumChar(input)).toBe('I');
  });

  it('covers the raw horodate of timestamped fields', () => {
    const horodate = parseHorodate('H200214175135');
    expect(horodate).not.toBeNull();
    const input = buildChecksumInput(TeleinfoMode.Standard, {
      tag: 'SMAXSN',
      value: '10802',
      horodate: horodate ?? undefined,
    });
    expect(input).toBe('SMAXSN\tH200214175135\t10802\t');
    expect(checksumChar(input)).toBe('7');
  });

  it('distinguishes the season case through the raw token', () => {
    const lower = parseHorodate('h200214175135');
    const input = buildChecksumInput(TeleinfoMode.Standard, {
      tag: 'SMAXSN',
      value: '10802',
      horodate: lower ?? undefined,
    });
    expect(checksumChar(input)).toBe('W');
  });
});

describe('isFieldValid', () => {
  it('accepts a field whose transmitted checksum matches', () => {
    expect(
      isFieldValid(TeleinfoMode.Legacy, { tag: 'OPTARIF', value: 'BBR(', checksum: 'S' })
    ).toBe(true);
    expect(
      isFieldValid(TeleinfoMode.Standard, { tag: 'NTARF', value: '03', checksum: 'P' })
    ).toBe(true);
  });

  it('rejects a field whose transmitted checksum differs', () => {
    expect(
      isFieldValid(TeleinfoMode.Legacy, { tag: 'BBRHCJB', value: '001478390', checksum: 'E' })
    ).toBe(false);
  });

  it('rejects a legacy checksum presented as standard', () => {
    // "IINST\t001\t" sums differently from "IINST 001"
    expect(
      isFieldValid(TeleinfoMode.Standard, { tag: 'IINST', value: '001', checksum: 'X' })
    ).toBe(false);
  });
});
