// src/framers/legacy-framer.ts

import { SEPARATORS, TeleinfoMode } from '../constants/constants.js';
import { DEFAULT_TAGS, type TagDictionary } from '../constants/tags.js';
import { tokenizeLegacyLine } from '../parser/field-tokenizer.js';
import type { ParsedFrame } from '../types/teleinfo-types.js';
import { parseLineRun, type TeleinfoFramer } from './teleinfo-framer.js';

/**
 * Historic meters (1200 baud): `\n TAG ' ' VALUE ' ' CS \r`
 */
export class LegacyFramer implements TeleinfoFramer {
  public readonly mode = TeleinfoMode.Legacy;
  public readonly separator = SEPARATORS[TeleinfoMode.Legacy];

  constructor(private readonly _tags: TagDictionary = DEFAULT_TAGS) {}

  public parseBody(text: string): ParsedFrame | null {
    return parseLineRun(this.mode, text, this._tags, tokenizeLegacyLine);
  }
}
