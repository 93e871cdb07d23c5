// src/record/meter-info.ts

import { TeleinfoMode } from '../constants/constants.js';
import type { TeleinfoRecord } from './teleinfo-record.js';

export enum TeleinfoMessageType {
  Short = 'short',
  Normal = 'normal',
}

export enum TeleinfoMeterType {
  MonoPhase = 'monophase',
  TriPhase = 'triphase',
}

/** PTEC (current tariff period) to the legacy index it increments */
const LEGACY_PERIOD_INDEX: Readonly<Record<string, string>> = {
  'TH..': 'BASE',
  'HC..': 'HCHC',
  'HP..': 'HCHP',
  'HN..': 'EJPHN',
  'PM..': 'EJPHPM',
  HCJB: 'BBRHCJB',
  HCJW: 'BBRHCJW',
  HCJR: 'BBRHCJR',
  HPJB: 'BBRHPJB',
  HPJW: 'BBRHPJW',
  HPJR: 'BBRHPJR',
};

const TEMPO_INDICES = ['BBRHCJB', 'BBRHPJB', 'BBRHCJR', 'BBRHPJR', 'BBRHCJW', 'BBRHPJW'];

const STANDARD_INDICES = Array.from(
  { length: 10 },
  (_, i) => `EASF${(i + 1).toString().padStart(2, '0')}`
);

/**
 * Legacy meters send a short frame (no OPTARIF) when a power overrun occurs.
 */
export function messageType(record: TeleinfoRecord): TeleinfoMessageType {
  if (record.mode === TeleinfoMode.Legacy && !record.has('OPTARIF')) {
    return TeleinfoMessageType.Short;
  }
  return TeleinfoMessageType.Normal;
}

export function meterType(record: TeleinfoRecord): TeleinfoMeterType {
  const phase1 = record.mode === TeleinfoMode.Legacy ? 'IINST1' : 'SINSTS1';
  return record.has(phase1) ? TeleinfoMeterType.TriPhase : TeleinfoMeterType.MonoPhase;
}

/**
 * Tag of the energy index currently increasing.
 * @returns undefined when the record lacks PTEC (legacy) or NTARF (standard)
 */
export function currentIndex(record: TeleinfoRecord): string | undefined {
  if (record.mode === TeleinfoMode.Standard) {
    const ntarf = record.getValue('NTARF');
    return ntarf === undefined ? undefined : `EASF${ntarf}`;
  }
  const ptec = record.getValue('PTEC');
  if (ptec === undefined) return undefined;
  return LEGACY_PERIOD_INDEX[ptec] ?? 'BASE';
}

/**
 * Tags of every energy index relevant to the subscribed contract.
 * @returns an empty list when a legacy record lacks OPTARIF
 */
export function billingIndices(record: TeleinfoRecord): string[] {
  if (record.mode === TeleinfoMode.Standard) return [...STANDARD_INDICES];

  const optarif = record.getValue('OPTARIF');
  if (optarif === undefined) return [];
  if (optarif.startsWith('BBR')) return [...TEMPO_INDICES];
  switch (optarif) {
    case 'HC..':
      return ['HCHC', 'HCHP'];
    case 'EJP.':
      return ['EJPHN', 'EJPHPM'];
    default:
      return ['BASE'];
  }
}
