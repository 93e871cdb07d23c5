// src/framers/teleinfo-framer.ts

import type { TeleinfoMode } from '../constants/constants.js';
import type { TagDictionary } from '../constants/tags.js';
import type { TokenizedLine } from '../parser/field-tokenizer.js';
import type { ParsedFrame, TeleinfoField } from '../types/teleinfo-types.js';

/**
 * Common interface of the two frame grammars
 */
export interface TeleinfoFramer {
  readonly mode: TeleinfoMode;
  /** Field separator of this grammar */
  readonly separator: string;

  /**
   * Parses the longest run of lines from the start of a frame body.
   * Returns null when not even one line matches.
   */
  parseBody(text: string): ParsedFrame | null;
}

export type LineTokenizer = (input: string, offset: number, tags: TagDictionary) => TokenizedLine | null;

/**
 * Applies `tokenize` repeatedly from offset 0 until a line fails to match.
 */
export function parseLineRun(
  mode: TeleinfoMode,
  text: string,
  tags: TagDictionary,
  tokenize: LineTokenizer
): ParsedFrame | null {
  const fields: TeleinfoField[] = [];
  let offset = 0;

  while (offset < text.length) {
    const line = tokenize(text, offset, tags);
    if (!line) break;
    fields.push(line.field);
    offset = line.next;
  }

  if (fields.length === 0) return null;
  return { mode, fields, consumed: offset };
}
