// src/utils/checksum.ts

import { CHECKSUM_MASK, CHECKSUM_OFFSET, SEPARATORS, TeleinfoMode } from '../constants/constants.js';
import type { TeleinfoField } from '../types/teleinfo-types.js';

/**
 * Teleinfo checksum: sum of all code points (or bytes), low 6 bits, shifted into the
 * printable range.
 * @param content - checksum input, see `buildChecksumInput`
 * @returns the expected checksum character code (0x20..0x5F)
 */
export function checksum(content: string | Uint8Array): number {
  let sum: number = 0;
  if (typeof content === 'string') {
    for (const char of content) {
      sum += char.codePointAt(0)!; // !: a for..of character is never empty
    }
  } else {
    for (const byte of content) {
      sum += byte;
    }
  }
  return (sum & CHECKSUM_MASK) + CHECKSUM_OFFSET;
}

export function checksumChar(content: string | Uint8Array): string {
  return String.fromCharCode(checksum(content));
}

/**
 * Builds the string covered by a field checksum.
 *
 * Standard mode includes the separator that precedes the checksum, legacy mode does not.
 */
export function buildChecksumInput(
  mode: TeleinfoMode,
  field: Pick<TeleinfoField, 'tag' | 'value' | 'horodate'>
): string {
  const sep = SEPARATORS[mode];
  const horodate = field.horodate ? `${field.horodate.rawValue}${sep}` : '';
  const trailing = mode === TeleinfoMode.Standard ? sep : '';
  return `${field.tag}${sep}${horodate}${field.value}${trailing}`;
}

export function isFieldValid(mode: TeleinfoMode, field: TeleinfoField): boolean {
  return checksumChar(buildChecksumInput(mode, field)) === field.checksum;
}
