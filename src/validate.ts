import { DateFilter, RawRecordCandidate, ValidationResult } from './types';
import { lpad } from './format';

export const RECORD_SIZE_EXPECTED = 68;
export const RECORD_TYPE_MASK = 0xfd;
export const RECORD_TYPE_VIB = 0x88;
export const RECORD_TYPE_KB = 0x8a;
// Accepted read types 0, 2 and 6
export const READ_TYPE_MASK = 0x45;

export function isValidToProcess(recordSize: number, readType: number): boolean {
  return readType >= 0 && readType <= 9 && recordSize === RECORD_SIZE_EXPECTED && ((1 << readType) & READ_TYPE_MASK) !== 0;
}

export function daysInMonth(month: number, yy: number): number {
  switch (month) {
    case 1: case 3: case 5: case 7: case 8: case 10: case 12:
      return 31;
    case 4: case 6: case 9: case 11:
      return 30;
    default:
      // two-digit year, low bits only
      return (yy & 3) === 0 ? 29 : 28;
  }
}

export function dateTimeValid(second: number, minute: number, hour: number, day: number, month: number, yy: number): boolean {
  if (second > 59 || minute > 59 || hour > 23) return false;
  if (yy > 99) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(month, yy);
}

export function validateRecord(candidate: RawRecordCandidate, readType: number, filter: DateFilter): ValidationResult {
  const rec = candidate.bytes;
  const size = candidate.declaredSize;

  if (!isValidToProcess(size, readType)) return { ok: false, reason: 'read-type' };
  if ((candidate.typeByte & RECORD_TYPE_MASK) !== RECORD_TYPE_VIB) return { ok: false, reason: 'type' };
  if (size !== RECORD_SIZE_EXPECTED) return { ok: false, reason: 'size' };

  // [second][minute][hour][day][month][yy] at 6..11
  const second = rec[6], minute = rec[7], hour = rec[8];
  const day = rec[9], month = rec[10], yy = rec[11];
  if (!dateTimeValid(second, minute, hour, day, month, yy)) return { ok: false, reason: 'datetime' };

  const year = 2000 + yy;
  const date = `${lpad(year, 4)}-${lpad(month, 2)}-${lpad(day, 2)}`;
  const time = `${lpad(hour, 2)}:${lpad(minute, 2)}:${lpad(second, 2)}`;

  if (filter.today) {
    const today = (filter.now ?? (() => new Date()))();
    if (year !== today.getFullYear() || month !== today.getMonth() + 1 || day !== today.getDate()) {
      return { ok: false, reason: 'date-filter' };
    }
  } else if (filter.day !== undefined && date !== filter.day) {
    return { ok: false, reason: 'date-filter' };
  }

  return { ok: true, record: { bytes: rec, date, time, year, month, day, hour, minute, second } };
}
