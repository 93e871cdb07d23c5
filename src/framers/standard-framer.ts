// src/framers/standard-framer.ts

import { SEPARATORS, TeleinfoMode } from '../constants/constants.js';
import { DEFAULT_TAGS, type TagDictionary } from '../constants/tags.js';
import { tokenizeStandardLine } from '../parser/field-tokenizer.js';
import type { ParsedFrame } from '../types/teleinfo-types.js';
import { parseLineRun, type TeleinfoFramer } from './teleinfo-framer.js';

/**
 * Linky standard mode (9600 baud): tab separated lines, some carrying a horodate
 */
export class StandardFramer implements TeleinfoFramer {
  public readonly mode = TeleinfoMode.Standard;
  public readonly separator = SEPARATORS[TeleinfoMode.Standard];

  constructor(private readonly _tags: TagDictionary = DEFAULT_TAGS) {}

  public parseBody(text: string): ParsedFrame | null {
    return parseLineRun(this.mode, text, this._tags, tokenizeStandardLine);
  }
}
