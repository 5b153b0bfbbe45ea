import {
  AxisSample, CodeFamily, DecodedRecord, PeakTypeCat, SignalQuality, ValidityStatus, AcceptedRecord,
} from './types';
import { lpad } from './format';

export const FLOAT16_DIVISOR = 1000000;
export const INT16_DIVISOR = 2;
export const OVERLOAD_LIMIT = 99999999;

// Axis sub-blocks, 14 bytes each
export const AXIS_OFFSETS = { x: 14, y: 28, z: 42 } as const;

export function readU16(buf: Uint8Array, off: number): number {
  return buf[off] | (buf[off + 1] << 8);
}

export function readI16(buf: Uint8Array, off: number): number {
  return toI16(readU16(buf, off));
}

export function toI16(u: number): number {
  const v = u & 0xffff;
  return (v & 0x8000) ? v - 0x10000 : v;
}

/**
 * Custom float: bits 11..15 hold exponent+1, bits 0..10 the mantissa with an
 * implicit bit 11. Exponent fields outside 1..20 leave the signed raw value as
 * it is, which is how the sentinels -1..-4 come through.
 */
export function svFromFloat16(value: number): number {
  const raw = toI16(value);
  const e = ((raw & 0xffff) >>> 11) - 1;
  if (e >= 0 && e <= 0x13) {
    return ((raw & 0x7ff) | 0x800) << e;
  }
  return raw;
}

export function isSpecialValue(v: number): boolean {
  return v >= -4 && v <= -1;
}

export function isOverload(v: number): boolean {
  return v > OVERLOAD_LIMIT;
}

/** 0 when the raw field holds a plausible value, otherwise its status code. */
export function svIsValueValid(value: number): ValidityStatus {
  const decoded = svFromFloat16(value);
  const e = ((value & 0xffff) >>> 11) - 1;
  if (e < 0 || e > 0x13) {
    return isSpecialValue(decoded) ? statusOf(decoded) : ValidityStatus.OK;
  }
  return isOverload(decoded) ? ValidityStatus.OVERLOAD : ValidityStatus.OK;
}

function statusOf(v: number): ValidityStatus {
  switch (v) {
    case -1: return ValidityStatus.DISCONNECTED;
    case -2: return ValidityStatus.DATA_INVALID;
    case -3: return ValidityStatus.NO_DATA;
    case -4: return ValidityStatus.NOT_RESPONDING;
    default: return ValidityStatus.OK;
  }
}

export function statusToString(status: ValidityStatus): string {
  switch (status) {
    case ValidityStatus.DISCONNECTED: return 'DISCONNECTED';
    case ValidityStatus.DATA_INVALID: return 'DATA INVALID';
    case ValidityStatus.NO_DATA: return 'NO DATA';
    case ValidityStatus.NOT_RESPONDING: return 'NOT RESPONDING';
    case ValidityStatus.OVERLOAD: return 'OVERLOAD';
    default: return '';
  }
}

// Physical value of a custom-float field, undefined for sentinels and overloads.
export function decodeFloat16(value: number): number | undefined {
  const intVal = svFromFloat16(value);
  if (isSpecialValue(intVal) || isOverload(intVal)) return undefined;
  return intVal / FLOAT16_DIVISOR;
}

// Signed fixed point with one binary fraction digit.
export function decodeInt16(value: number): number | undefined {
  const v = toI16(value);
  if (isSpecialValue(v)) return undefined;
  return v / INT16_DIVISOR;
}

export function axisStatus(rec: Uint8Array, off: number): ValidityStatus {
  // v, u, a, cv in that order; first fault wins
  for (const field of [0, 6, 8, 10]) {
    const s = svIsValueValid(readU16(rec, off + field));
    if (s !== ValidityStatus.OK) return s;
  }
  return ValidityStatus.OK;
}

export function overallStatus(x: ValidityStatus, y: ValidityStatus, z: ValidityStatus): ValidityStatus {
  if (x === ValidityStatus.OVERLOAD || y === ValidityStatus.OVERLOAD || z === ValidityStatus.OVERLOAD) {
    return ValidityStatus.OVERLOAD;
  }
  if (x !== ValidityStatus.OK) return x;
  if (y !== ValidityStatus.OK) return y;
  return z;
}

/**
 * Second axis field. KB files store an energy value (custom float, root taken,
 * scaled to 0.01 and floored to zero at 0.1); standard files store a
 * zero-crossing period turned into 1024/raw Hz.
 */
export function decodeKbZc(raw: number, kbMode: boolean): number | undefined {
  if (kbMode) {
    const intVal = svFromFloat16(raw);
    if (intVal < 0) return undefined;
    const kb = Math.sqrt(intVal) * 0.01;
    return kb <= 0.1 ? 0 : kb;
  }
  const period = toI16(raw);
  if (period <= 0) return undefined;
  return 1024 / period;
}

export function decodeAxis(rec: Uint8Array, off: number, kbMode: boolean): AxisSample {
  const status = axisStatus(rec, off);
  if (status !== ValidityStatus.OK) return { status };
  return {
    status,
    v: decodeFloat16(readU16(rec, off)),
    kbzc: decodeKbZc(readU16(rec, off + 2), kbMode),
    ft: decodeInt16(readU16(rec, off + 4)),
    u: decodeFloat16(readU16(rec, off + 6)),
    a: decodeFloat16(readU16(rec, off + 8)),
    cv: decodeFloat16(readU16(rec, off + 10)),
    cf: decodeInt16(readU16(rec, off + 12)),
  };
}

export function formatGeophone(value: number): string {
  const number = value & 0x3fff;
  switch (value & 0xc000) {
    case 0x4000: return 'TDA' + lpad(number, 5);
    case 0x8000: return 'TDS' + lpad(number, 5);
    case 0xc000: return '???00000';
    default: return 'unknown' + lpad(number, 5);
  }
}

export function signalQuality(raw: number): SignalQuality {
  if (raw === 0) return 'Unknown';
  if (raw > 23) return 'Excellent';
  if (raw > 15) return 'Good';
  if (raw > 7) return 'Low';
  return 'Bad';
}

export function signalDbm(raw: number): number | undefined {
  return raw !== 0 ? 2 * raw - 113 : undefined;
}

export function peakTypeCat(peakType: number): PeakTypeCat {
  switch (peakType) {
    case 0: return 'vcatnone';
    case 1: return 'vcat1';
    case 2: return 'vcat2';
    case 3: return 'vcat3';
    default: return 'vcat'; // a 2-bit field never gets here
  }
}

export function temperatureC(raw: number): number {
  return raw * 0.5 - 27.5;
}

export function voltageV(raw: number): number {
  return raw * 0.01 + 2.45;
}

export function decodeRecord(rec: AcceptedRecord, kbMode: boolean): DecodedRecord {
  const b = rec.bytes;
  const x = decodeAxis(b, AXIS_OFFSETS.x, kbMode);
  const y = decodeAxis(b, AXIS_OFFSETS.y, kbMode);
  const z = decodeAxis(b, AXIS_OFFSETS.z, kbMode);
  const status = overallStatus(x.status, y.status, z.status);
  const signalRaw = b[59] & 0x1f;
  const code: CodeFamily = (b[60] & 4) !== 0 ? 'SBR' : 'DIN';

  return {
    date: rec.date,
    time: rec.time,
    counter: b[64] | (b[65] << 8) | (b[66] << 16),
    status,
    magnitude: status === ValidityStatus.OK ? decodeFloat16(readU16(b, 12)) : undefined,
    x, y, z,
    temperature: temperatureC(b[56]),
    voltage: voltageV(b[57]),
    memoryUse: b[58] & 0x7f,
    usbPowered: b[58] >> 7,
    signalRaw,
    signalDbm: signalDbm(signalRaw),
    signalQuality: signalQuality(signalRaw),
    transmitted: (b[59] & 0x20) !== 0 ? 1 : 0,
    allTransmitted: (b[59] & 0x40) !== 0 ? 1 : 0,
    peakType: peakTypeCat(b[60] & 3),
    code,
    errorCode: b[61],
    geophone: formatGeophone(readU16(b, 62)),
    clockChanged: b[60] >> 6,
  };
}
