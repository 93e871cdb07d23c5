import { describe, expect, it } from 'vitest';
import { TeleinfoMode } from '../src/constants/constants.js';
import {
  billingIndices,
  currentIndex,
  messageType,
  meterType,
  TeleinfoMessageType,
  TeleinfoMeterType,
} from '../src/record/meter-info.js';
import { TeleinfoRecord } from '../src/record/teleinfo-record.js';

function legacy(values: Record<string, string>): TeleinfoRecord {
  const fields = Object.entries(values).map(([tag, value]) => ({ tag, value, checksum: ' ' }));
  return new TeleinfoRecord(TeleinfoMode.Legacy, fields, true);
}

function standard(values: Record<string, string>): TeleinfoRecord {
  const fields = Object.entries(values).map(([tag, value]) => ({ tag, value, checksum: ' ' }));
  return new TeleinfoRecord(TeleinfoMode.Standard, fields, true);
}

describe('messageType', () => {
  it('treats legacy frames without OPTARIF as short', () => {
    expect(messageType(legacy({ ADIR1: '030', ADCO: '031961098836' }))).toBe(
      TeleinfoMessageType.Short
    );
    expect(messageType(legacy({ OPTARIF: 'BASE' }))).toBe(TeleinfoMessageType.Normal);
  });

  it('treats standard frames as normal', () => {
    expect(messageType(standard({ ADSC: '041776199277' }))).toBe(TeleinfoMessageType.Normal);
  });
});

describe('meterType', () => {
  it('detects three phase meters', () => {
    expect(meterType(legacy({ IINST1: '002' }))).toBe(TeleinfoMeterType.TriPhase);
    expect(meterType(legacy({ IINST: '001' }))).toBe(TeleinfoMeterType.MonoPhase);
    expect(meterType(standard({ SINSTS1: '00664' }))).toBe(TeleinfoMeterType.TriPhase);
    expect(meterType(standard({ SINSTS: '00664' }))).toBe(TeleinfoMeterType.MonoPhase);
  });
});

describe('currentIndex', () => {
  it('maps the legacy tariff period to its index', () => {
    expect(currentIndex(legacy({ PTEC: 'HPJB' }))).toBe('BBRHPJB');
    expect(currentIndex(legacy({ PTEC: 'HC..' }))).toBe('HCHC');
    expect(currentIndex(legacy({ PTEC: 'PM..' }))).toBe('EJPHPM');
    expect(currentIndex(legacy({ PTEC: 'TH..' }))).toBe('BASE');
    expect(currentIndex(legacy({ PTEC: '????' }))).toBe('BASE');
  });

  it('builds the standard index from NTARF', () => {
    expect(currentIndex(standard({ NTARF: '03' }))).toBe('EASF03');
  });

  it('is undefined when the period is missing', () => {
    expect(currentIndex(legacy({ IINST: '001' }))).toBeUndefined();
    expect(currentIndex(standard({ EAST: '021849107' }))).toBeUndefined();
  });
});

describe('billingIndices', () => {
  it('lists the indices of each legacy contract', () => {
    expect(billingIndices(legacy({ OPTARIF: 'BASE' }))).toEqual(['BASE']);
    expect(billingIndices(legacy({ OPTARIF: 'HC..' }))).toEqual(['HCHC', 'HCHP']);
    expect(billingIndices(legacy({ OPTARIF: 'EJP.' }))).toEqual(['EJPHN', 'EJPHPM']);
    expect(billingIndices(legacy({ OPTARIF: 'BBR(' }))).toEqual([
      'BBRHCJB',
      'BBRHPJB',
      'BBRHCJR',
      'BBRHPJR',
      'BBRHCJW',
      'BBRHPJW',
    ]);
  });

  it('lists the ten supplier indices in standard mode', () => {
    const indices = billingIndices(standard({}));
    expect(indices).toHaveLength(10);
    expect(indices[0]).toBe('EASF01');
    expect(indices[9]).toBe('EASF10');
  });

  it('is empty for a legacy record without OPTARIF', () => {
    expect(billingIndices(legacy({ IINST: '001' }))).toEqual([]);
  });
});
