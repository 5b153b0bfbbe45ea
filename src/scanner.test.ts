import { describe, it, expect } from 'vitest';
import { StreamScanner, readTypeFromDelta } from './scanner';
import { memorySource } from './source';
import { ScannedRecord } from './types';
import { buildRecord, concat, noise } from './testing/records';

function scanAll(bytes: Uint8Array, chunk = Infinity, capacity?: number): { records: ScannedRecord[]; scanner: StreamScanner } {
  const scanner = new StreamScanner(memorySource(bytes, chunk), capacity);
  return { records: [...scanner.scan()], scanner };
}

describe('readTypeFromDelta', () => {
  it('is 2 only for the normal 68 byte spacing', () => {
    expect(readTypeFromDelta(68)).toBe(2);
    expect(readTypeFromDelta(67)).toBe(5);
    expect(readTypeFromDelta(69)).toBe(5);
    expect(readTypeFromDelta(136)).toBe(5);
  });
});

describe('StreamScanner', () => {
  it('emits one record behind and flushes the last as type 2', () => {
    const bytes = concat(buildRecord(), buildRecord(), buildRecord(), noise(10));
    const { records, scanner } = scanAll(bytes);
    expect(records.map(r => r.candidate.offset)).toEqual([0, 68, 136]);
    expect(records.map(r => r.readType)).toEqual([2, 2, 2]);
    expect(scanner.recordsFound).toBe(3);
  });

  it('classifies irregular spacing as type 5', () => {
    const firsts = [
      buildRecord({ size: 67 }).subarray(0, 67),
      concat(buildRecord(), noise(1)),
      concat(buildRecord(), noise(68)),
    ];
    for (const first of firsts) {
      const { records } = scanAll(concat(first, buildRecord()));
      expect(records.map(r => r.readType)).toEqual([5, 2]);
      expect(records[1].candidate.offset - records[0].candidate.offset).toBe(first.length);
    }
  });

  it('skips noise and still finds both markers', () => {
    const rec = buildRecord({ second: 7 });
    const bytes = concat(noise(33), rec, noise(500, 0x56), buildRecord());
    const { records } = scanAll(bytes);
    expect(records).toHaveLength(2);
    expect(records[0].candidate.offset).toBe(33);
    expect(records[1].candidate.offset).toBe(33 + 68 + 500);
    expect(Array.from(records[0].candidate.bytes.subarray(0, 68))).toEqual(Array.from(rec));
    expect(records[1].readType).toBe(2);
  });

  it('copies at most 70 bytes and zero-pads short records', () => {
    const short = buildRecord({ size: 20 });
    const bytes = concat(short.subarray(0, 20), buildRecord());
    const { records } = scanAll(bytes);
    expect(records[0].candidate.declaredSize).toBe(20);
    expect(records[0].candidate.bytes).toHaveLength(70);
    expect(records[0].candidate.bytes[20]).toBe(0);
    expect(records[1].candidate.offset).toBe(20);
  });

  it('advances at least 12 bytes on a zero size field', () => {
    const broken = buildRecord({ size: 0 });
    const bytes = concat(broken.subarray(0, 12), buildRecord());
    const { records } = scanAll(bytes);
    expect(records.map(r => r.candidate.offset)).toEqual([0, 12]);
    expect(records[0].readType).toBe(5);
  });

  it('drops a truncated trailing record', () => {
    const bytes = concat(buildRecord(), buildRecord().subarray(0, 40));
    const { records, scanner } = scanAll(bytes);
    expect(records).toHaveLength(1);
    expect(records[0].readType).toBe(2);
    expect(scanner.recordsFound).toBe(1);
  });

  it('drops a marker without a full header', () => {
    const bytes = concat(buildRecord(), buildRecord().subarray(0, 8));
    expect(scanAll(bytes).records).toHaveLength(1);
  });

  it('finds markers split across short reads', () => {
    const bytes = concat(noise(5), buildRecord(), buildRecord(), buildRecord());
    const { records } = scanAll(bytes, 7, 16);
    expect(records.map(r => r.candidate.offset)).toEqual([5, 73, 141]);
    expect(records.map(r => r.readType)).toEqual([2, 2, 2]);
  });

  it('grows the window for a record larger than it', () => {
    const big = buildRecord({ size: 300 });
    const bytes = concat(big, noise(300 - 68, 0), buildRecord());
    const { records, scanner } = scanAll(bytes, 50, 16);
    expect(records.map(r => r.candidate.offset)).toEqual([0, 300]);
    expect(scanner.capacity).toBeGreaterThanOrEqual(300);
  });

  it('finds a marker that follows a stray V', () => {
    const bytes = concat(Uint8Array.from([0x56]), buildRecord());
    expect(scanAll(bytes).records.map(r => r.candidate.offset)).toEqual([1]);
  });

  it('yields nothing for an empty stream', () => {
    expect(scanAll(new Uint8Array(0)).records).toEqual([]);
  });
});
