import { describe, it, expect } from 'vitest';
import { validateRecord, dateTimeValid, daysInMonth, isValidToProcess } from './validate';
import { RawRecordCandidate } from './types';
import { buildRecord, RecordFields } from './testing/records';

function candidate(fields: RecordFields = {}): RawRecordCandidate {
  const rec = buildRecord(fields);
  const bytes = new Uint8Array(70);
  bytes.set(rec);
  return { bytes, offset: 0, declaredSize: rec[4] | (rec[5] << 8), typeByte: rec[3] };
}

const noFilter = { today: false };

describe('isValidToProcess', () => {
  it('accepts read types 0, 2 and 6 only', () => {
    const accepted = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10].filter(t => isValidToProcess(68, t));
    expect(accepted).toEqual([0, 2, 6]);
    expect(isValidToProcess(67, 2)).toBe(false);
  });
});

describe('dateTimeValid', () => {
  it('checks ranges', () => {
    expect(dateTimeValid(59, 59, 23, 31, 12, 99)).toBe(true);
    expect(dateTimeValid(60, 0, 0, 1, 1, 24)).toBe(false);
    expect(dateTimeValid(0, 60, 0, 1, 1, 24)).toBe(false);
    expect(dateTimeValid(0, 0, 24, 1, 1, 24)).toBe(false);
    expect(dateTimeValid(0, 0, 0, 1, 1, 100)).toBe(false);
    expect(dateTimeValid(0, 0, 0, 1, 0, 24)).toBe(false);
    expect(dateTimeValid(0, 0, 0, 1, 13, 24)).toBe(false);
    expect(dateTimeValid(0, 0, 0, 0, 1, 24)).toBe(false);
    expect(dateTimeValid(0, 0, 0, 31, 4, 24)).toBe(false);
  });

  it('uses the two-digit year for leap years', () => {
    expect(daysInMonth(2, 24)).toBe(29);
    expect(daysInMonth(2, 0)).toBe(29);
    expect(daysInMonth(2, 23)).toBe(28);
    expect(dateTimeValid(0, 0, 0, 29, 2, 23)).toBe(false);
  });
});

describe('validateRecord', () => {
  it('accepts a normal record and builds date and time', () => {
    const res = validateRecord(candidate(), 2, noFilter);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.record.date).toBe('2024-03-15');
    expect(res.record.time).toBe('14:30:00');
    expect(res.record.year).toBe(2024);
  });

  it('rejects by read type before anything else', () => {
    expect(validateRecord(candidate({ type: 0x10 }), 5, noFilter)).toEqual({ ok: false, reason: 'read-type' });
  });

  it('rejects wrong sizes and types', () => {
    expect(validateRecord(candidate({ size: 70 }), 2, noFilter)).toEqual({ ok: false, reason: 'read-type' });
    expect(validateRecord(candidate({ type: 0x89 }), 2, noFilter)).toEqual({ ok: false, reason: 'type' });
    expect(validateRecord(candidate({ type: 0x8a }), 2, noFilter).ok).toBe(true);
  });

  it('rejects impossible dates', () => {
    expect(validateRecord(candidate({ day: 30, month: 2 }), 2, noFilter)).toEqual({ ok: false, reason: 'datetime' });
  });

  it('applies the day filter', () => {
    expect(validateRecord(candidate(), 2, { today: false, day: '2024-03-15' }).ok).toBe(true);
    expect(validateRecord(candidate(), 2, { today: false, day: '2024-03-16' })).toEqual({ ok: false, reason: 'date-filter' });
  });

  it('applies the today filter against the clock', () => {
    const now = () => new Date(2024, 2, 15, 9, 0, 0);
    const later = () => new Date(2024, 2, 16, 9, 0, 0);
    expect(validateRecord(candidate(), 2, { today: true, now }).ok).toBe(true);
    expect(validateRecord(candidate(), 2, { today: true, now: later })).toEqual({ ok: false, reason: 'date-filter' });
    // today wins over an explicit day
    expect(validateRecord(candidate(), 2, { today: true, day: '2000-01-01', now }).ok).toBe(true);
  });
});
