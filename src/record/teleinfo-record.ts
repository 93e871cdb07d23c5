// src/record/teleinfo-record.ts

import type { TeleinfoMode } from '../constants/constants.js';
import { TeleinfoChecksumError } from '../errors.js';
import type { Horodate, TeleinfoField } from '../types/teleinfo-types.js';
import { isFieldValid } from '../utils/checksum.js';

// the date is handed out as a copy so the record stays immutable
function freezeHorodate(horodate: Horodate): Horodate {
  const time = horodate.date.getTime();
  return Object.freeze({
    season: horodate.season,
    rawValue: horodate.rawValue,
    get date(): Date {
      return new Date(time);
    },
  });
}

function freezeField(field: TeleinfoField): TeleinfoField {
  const { horodate, ...rest } = field;
  return Object.freeze(horodate ? { ...rest, horodate: freezeHorodate(horodate) } : rest);
}

export interface TeleinfoRecordJSON {
  mode: TeleinfoMode;
  valid: boolean;
  fields: Record<string, { value: string; checksum: string; horodate?: string }>;
}

/**
 * One decoded frame.
 *
 * Fields are keyed by tag; when a tag repeats inside a frame the last line wins.
 * Instances and their fields are frozen, horodate dates are returned as copies.
 */
export class TeleinfoRecord {
  public readonly mode: TeleinfoMode;
  /** Body fully consumed and every checksum matched */
  public readonly valid: boolean;
  private readonly _fields: Map<string, TeleinfoField>;

  constructor(mode: TeleinfoMode, fields: Iterable<TeleinfoField>, valid: boolean) {
    this.mode = mode;
    this.valid = valid;
    this._fields = new Map();
    for (const field of fields) {
      this._fields.set(field.tag, freezeField(field));
    }
    Object.freeze(this);
  }

  /**
   * Builds a record from parsed fields, computing `valid` from the checksums.
   *
   * Every parsed line is checked, including earlier copies of a repeated tag.
   * @param complete - whether the grammar consumed the whole frame body
   */
  static fromFields(mode: TeleinfoMode, fields: readonly TeleinfoField[], complete: boolean): TeleinfoRecord {
    const checksumsOk = fields.every(field => isFieldValid(mode, field));
    return new TeleinfoRecord(mode, fields, complete && checksumsOk);
  }

  get fields(): ReadonlyMap<string, TeleinfoField> {
    return this._fields;
  }

  get size(): number {
    return this._fields.size;
  }

  get(tag: string): TeleinfoField | undefined {
    return this._fields.get(tag);
  }

  getValue(tag: string): string | undefined {
    return this._fields.get(tag)?.value;
  }

  /**
   * Values of `tags`, in the order given, `null` for absent tags.
   */
  getValues(tags: readonly string[]): Array<[string, string | null]> {
    return tags.map(tag => [tag, this._fields.get(tag)?.value ?? null]);
  }

  has(tag: string): boolean {
    return this._fields.has(tag);
  }

  tags(): string[] {
    return [...this._fields.keys()];
  }

  /**
   * Tags whose transmitted checksum does not match their content.
   */
  invalidTags(): string[] {
    const invalid: string[] = [];
    for (const field of this._fields.values()) {
      if (!isFieldValid(this.mode, field)) invalid.push(field.tag);
    }
    return invalid;
  }

  toJSON(): TeleinfoRecordJSON {
    const fields: TeleinfoRecordJSON['fields'] = {};
    for (const field of this._fields.values()) {
      fields[field.tag] = {
        value: field.value,
        checksum: field.checksum,
        ...(field.horodate ? { horodate: field.horodate.rawValue } : {}),
      };
    }
    return { mode: this.mode, valid: this.valid, fields };
  }
}

/**
 * Throws `TeleinfoChecksumError` unless the record is valid.
 */
export function assertValid(record: TeleinfoRecord): void {
  if (!record.valid) {
    throw new TeleinfoChecksumError(record.invalidTags());
  }
}
