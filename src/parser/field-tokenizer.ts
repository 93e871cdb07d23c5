// src/parser/field-tokenizer.ts

import {
  HORODATE_LENGTH,
  LINE_END,
  LINE_START,
  SEPARATORS,
  TeleinfoMode,
} from '../constants/constants.js';
import type { TagDictionary } from '../constants/tags.js';
import type { TeleinfoField } from '../types/teleinfo-types.js';
import { parseHorodate } from './horodate.js';

export interface TokenizedLine {
  field: TeleinfoField;
  /** Offset right after the line terminator */
  next: number;
}

/**
 * Index of the next `sep` at or after `from`, staying inside the current line.
 * Returns -1 if a line delimiter or the end of input comes first.
 */
function findSeparator(input: string, from: number, sep: string): number {
  for (let i = from; i < input.length; i++) {
    const char = input[i];
    if (char === sep) return i;
    if (char === LINE_END || char === LINE_START) return -1;
  }
  return -1;
}

/**
 * Reads `VALUE sep CS \r` starting at `from`.
 */
function readValueAndChecksum(
  input: string,
  from: number,
  sep: string
): { value: string; checksum: string; next: number } | null {
  const valueEnd = findSeparator(input, from, sep);
  if (valueEnd < 0) return null;

  const checksumAt = valueEnd + 1;
  if (checksumAt >= input.length || input[checksumAt + 1] !== LINE_END) return null;

  return {
    value: input.slice(from, valueEnd),
    checksum: input.charAt(checksumAt),
    next: checksumAt + 2,
  };
}

/**
 * Reads `\n TAG sep` and returns the tag and the offset after the separator.
 */
function readTag(
  input: string,
  offset: number,
  sep: string,
  known: ReadonlySet<string>
): { tag: string; next: number } | null {
  if (input[offset] !== LINE_START) return null;
  const tagEnd = findSeparator(input, offset + 1, sep);
  if (tagEnd < 0) return null;
  const tag = input.slice(offset + 1, tagEnd);
  if (!known.has(tag)) return null;
  return { tag, next: tagEnd + 1 };
}

/**
 * Legacy line: `\n TAG ' ' VALUE ' ' CS \r`
 */
export function tokenizeLegacyLine(
  input: string,
  offset: number,
  tags: TagDictionary
): TokenizedLine | null {
  const sep = SEPARATORS[TeleinfoMode.Legacy];
  const head = readTag(input, offset, sep, tags.legacy);
  if (!head) return null;

  const rest = readValueAndChecksum(input, head.next, sep);
  if (!rest) return null;

  return {
    field: { tag: head.tag, value: rest.value, checksum: rest.checksum },
    next: rest.next,
  };
}

/**
 * Standard line without horodate: `\n TAG \t VALUE \t CS \r`
 */
function tokenizeStandardPlainLine(
  input: string,
  offset: number,
  tags: TagDictionary
): TokenizedLine | null {
  const sep = SEPARATORS[TeleinfoMode.Standard];
  const head = readTag(input, offset, sep, tags.standard);
  if (!head) return null;

  const rest = readValueAndChecksum(input, head.next, sep);
  if (!rest) return null;

  return {
    field: { tag: head.tag, value: rest.value, checksum: rest.checksum },
    next: rest.next,
  };
}

/**
 * Standard line with horodate: `\n TAG \t SYYMMDDHHMMSS \t VALUE \t CS \r`
 */
function tokenizeStandardHorodateLine(
  input: string,
  offset: number,
  tags: TagDictionary
): TokenizedLine | null {
  const sep = SEPARATORS[TeleinfoMode.Standard];
  const head = readTag(input, offset, sep, tags.standardHorodate);
  if (!head) return null;

  const horodateEnd = head.next + HORODATE_LENGTH;
  if (horodateEnd >= input.length || input[horodateEnd] !== sep) return null;
  const horodate = parseHorodate(input.slice(head.next, horodateEnd));
  if (!horodate) return null;

  const rest = readValueAndChecksum(input, horodateEnd + 1, sep);
  if (!rest) return null;

  return {
    field: { tag: head.tag, value: rest.value, checksum: rest.checksum, horodate },
    next: rest.next,
  };
}

/**
 * Standard line, plain form first then the horodate form.
 */
export function tokenizeStandardLine(
  input: string,
  offset: number,
  tags: TagDictionary
): TokenizedLine | null {
  return (
    tokenizeStandardPlainLine(input, offset, tags) ??
    tokenizeStandardHorodateLine(input, offset, tags)
  );
}
