// src/constants/tags.ts

import { readFileSync } from 'node:fs';
import { TeleinfoConfigError } from '../errors.js';

/**
 * Known tag identifiers, split by grammar.
 *
 * `legacy` and `standard` tags carry no horodate, `standardHorodate` tags always do.
 * The three partitions are disjoint.
 */
export interface TagDictionary {
  readonly legacy: ReadonlySet<string>;
  readonly standard: ReadonlySet<string>;
  readonly standardHorodate: ReadonlySet<string>;
}

/** Additional tags merged into the default dictionary */
export interface ExtraTags {
  legacy?: Iterable<string>;
  standard?: Iterable<string>;
  standardHorodate?: Iterable<string>;
}

const TAGS_FILE = new URL('../../data/teleinfo-tags.json', import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function readTagList(raw: Record<string, unknown>, key: keyof TagDictionary): string[] {
  const list = raw[key];
  if (!isStringArray(list)) {
    throw new TeleinfoConfigError(`Invalid tag dictionary: "${key}" must be an array of strings`);
  }
  return list;
}

function loadDefaultTags(): TagDictionary {
  const parsed: unknown = JSON.parse(readFileSync(TAGS_FILE, 'utf8'));
  if (!isRecord(parsed)) {
    throw new TeleinfoConfigError('Invalid tag dictionary: expected an object');
  }
  return {
    legacy: new Set(readTagList(parsed, 'legacy')),
    standard: new Set(readTagList(parsed, 'standard')),
    standardHorodate: new Set(readTagList(parsed, 'standardHorodate')),
  };
}

export const DEFAULT_TAGS: TagDictionary = loadDefaultTags();

/**
 * Returns the default dictionary extended with `extra`.
 * A tag may only belong to one standard partition.
 */
export function createTagDictionary(extra: ExtraTags = {}): TagDictionary {
  const legacy = new Set([...DEFAULT_TAGS.legacy, ...(extra.legacy ?? [])]);
  const standard = new Set([...DEFAULT_TAGS.standard, ...(extra.standard ?? [])]);
  const standardHorodate = new Set([
    ...DEFAULT_TAGS.standardHorodate,
    ...(extra.standardHorodate ?? []),
  ]);

  for (const tag of standardHorodate) {
    if (standard.has(tag)) {
      throw new TeleinfoConfigError(`Tag "${tag}" cannot be both timestamped and plain`);
    }
  }

  return { legacy, standard, standardHorodate };
}
