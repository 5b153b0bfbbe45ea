import { AxisSample, DecodedRecord, DecodeResult, DecodeStats, RowFormat } from './types';
import { ByteSource, fileSource, memorySource } from './source';
import { StreamScanner } from './scanner';
import { detectKbMode } from './mode';
import { validateRecord } from './validate';
import { decodeRecord, statusToString } from './codec';
import { formatFixedOdd } from './format';
import { DecodeOptions, DecodeOptionsInput, parseDecodeOptions } from './options';

const AXES = ['x', 'y', 'z'] as const;
const AXIS_UNITS = ['', 'mm/s', 'Hz', 'Hz', 'mm', 'm/s2', 'mm/s', 'Hz'];

export function headerNames(kbMode: boolean, counter: boolean): string[] {
  const h = ['date', 'time'];
  if (counter) h.push('counter');
  h.push('state', '|v|');
  for (const a of AXES) {
    h.push(`state(${a})`, `v(${a})`, kbMode ? `kb(${a})` : `f_zc(${a})`, `f_ft(${a})`,
      `u(${a})`, `a(${a})`, `v_cat(${a})`, `f_cat(${a})`);
  }
  h.push('temperature', 'battery', 'memory use', 'usb powered',
    'signal strength', 'signal quality', 'transmitted', 'all transmitted',
    'peak type', 'code', 'error code', 'geophone', 'clock changed');
  return h;
}

export function headerUnits(counter: boolean): string[] {
  const u = ['YYYY-MM-DD', 'hh:mm:ss'];
  if (counter) u.push('count');
  u.push('', 'mm/s');
  for (let i=0;i<AXES.length;i++) u.push(...AXIS_UNITS);
  u.push('°C', 'V', '%', '', 'dBm', '', '', '', '', '', '', '', '');
  return u;
}

function num(v: number | undefined, decimals: number): string {
  return v === undefined ? '' : formatFixedOdd(v, decimals);
}

function axisFields(s: AxisSample, fmt: RowFormat): string[] {
  const f2 = fmt.long ? 4 : 2;
  const f1 = fmt.long ? 4 : 1;
  return [statusToString(s.status), num(s.v, f2), num(s.kbzc, f2), num(s.ft, f1),
    num(s.u, f2), num(s.a, f2), num(s.cv, f2), num(s.cf, f1)];
}

export function formatRecord(r: DecodedRecord, fmt: RowFormat): string[] {
  const row = [r.date, r.time];
  if (fmt.counter) row.push(String(r.counter));
  row.push(statusToString(r.status), num(r.magnitude, fmt.long ? 4 : 2));
  row.push(...axisFields(r.x, fmt), ...axisFields(r.y, fmt), ...axisFields(r.z, fmt));
  row.push(
    formatFixedOdd(r.temperature, fmt.long ? 4 : 1),
    formatFixedOdd(r.voltage, fmt.long ? 4 : 2),
    String(r.memoryUse),
    String(r.usbPowered),
    r.signalDbm === undefined ? '' : String(r.signalDbm),
    r.signalQuality,
    String(r.transmitted),
    String(r.allTransmitted),
    r.peakType,
    r.code,
    String(r.errorCode),
    r.geophone,
    String(r.clockChanged),
  );
  return row;
}

/**
 * Decodes one file. Every call to `records()` opens the source again; the mode
 * pre-scan gets its own source as well. Not meant to be shared across files.
 */
export class VifDecoder {
  private mode: boolean | undefined;
  private processed = 0;
  private skipped = 0;
  private found = 0;
  readonly options: DecodeOptions;

  constructor(private readonly open: () => ByteSource, options: DecodeOptionsInput = {}, private readonly now?: () => Date) {
    this.options = parseDecodeOptions(options);
  }

  get kbMode(): boolean {
    if (this.mode !== undefined) return this.mode;
    const src = this.open();
    try {
      const mode = detectKbMode(src);
      this.mode = mode;
      return mode;
    } finally {
      src.close();
    }
  }

  headers(): string[][] {
    const counter = this.options.counter;
    return [headerNames(this.kbMode, counter), headerUnits(counter)];
  }

  *records(): Generator<DecodedRecord> {
    const kbMode = this.kbMode;
    const filter = { today: this.options.today, day: this.options.day, now: this.now };
    const src = this.open();
    try {
      const scanner = new StreamScanner(src);
      for (const { candidate, readType } of scanner.scan()) {
        this.found = scanner.recordsFound;
        const res = validateRecord(candidate, readType, filter);
        if (!res.ok) {
          this.skipped++;
          continue;
        }
        this.processed++;
        yield decodeRecord(res.record, kbMode);
      }
      this.found = scanner.recordsFound;
    } finally {
      src.close();
    }
  }

  *rows(): Generator<string[]> {
    const fmt: RowFormat = { long: this.options.long, counter: this.options.counter };
    for (const r of this.records()) yield formatRecord(r, fmt);
  }

  stats(): DecodeStats {
    return { recordsFound: this.found, processed: this.processed, skipped: this.skipped };
  }
}

function collect(decoder: VifDecoder): DecodeResult {
  const headers = decoder.options.header ? decoder.headers() : [];
  const rows = [...decoder.rows()];
  return { kbMode: decoder.kbMode, headers, rows, stats: decoder.stats() };
}

export function decodeVifFileToCsv(path: string, options: DecodeOptionsInput = {}, now?: () => Date): DecodeResult {
  return collect(new VifDecoder(() => fileSource(path), options, now));
}

export function decodeVifBytesToCsv(bytes: Uint8Array, options: DecodeOptionsInput = {}, now?: () => Date): DecodeResult {
  return collect(new VifDecoder(() => memorySource(bytes), options, now));
}
