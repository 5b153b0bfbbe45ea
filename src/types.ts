export interface RawRecordCandidate {
  bytes: Uint8Array; // always RECORD_BUFFER_SIZE long, zero-padded
  offset: number; // absolute position of the "VIB" marker in the stream
  declaredSize: number; // u16 LE at +4
  typeByte: number; // byte at +3
}

export interface ScannedRecord {
  candidate: RawRecordCandidate;
  readType: number;
}

export const ValidityStatus = {
  OK: 0,
  DISCONNECTED: -1,
  DATA_INVALID: -2,
  NO_DATA: -3,
  NOT_RESPONDING: -4,
  OVERLOAD: 0x7fffffff,
} as const;

export type ValidityStatus = typeof ValidityStatus[keyof typeof ValidityStatus];

export type RejectReason = 'read-type' | 'type' | 'size' | 'datetime' | 'date-filter';

export interface AcceptedRecord {
  bytes: Uint8Array;
  date: string; // YYYY-MM-DD
  time: string; // hh:mm:ss
  year: number; // full year, 2000 + yy
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export type ValidationResult =
  | { ok: true; record: AcceptedRecord }
  | { ok: false; reason: RejectReason };

export interface DateFilter {
  today: boolean;
  day?: string; // YYYY-MM-DD
  now?: () => Date;
}

// Numeric values are undefined when the raw field is a sentinel or cannot be shown.
export interface AxisSample {
  status: ValidityStatus;
  v?: number; // mm/s
  kbzc?: number; // kb, or zero-crossing frequency in Hz
  ft?: number; // Hz
  u?: number; // mm
  a?: number; // m/s2
  cv?: number; // mm/s
  cf?: number; // Hz
}

export type PeakTypeCat = 'vcatnone' | 'vcat1' | 'vcat2' | 'vcat3' | 'vcat';
export type SignalQuality = 'Unknown' | 'Excellent' | 'Good' | 'Low' | 'Bad';
export type CodeFamily = 'SBR' | 'DIN';

export interface DecodedRecord {
  date: string;
  time: string;
  counter: number;
  status: ValidityStatus;
  magnitude?: number; // |v|, mm/s
  x: AxisSample;
  y: AxisSample;
  z: AxisSample;
  temperature: number; // °C
  voltage: number; // V
  memoryUse: number; // %
  usbPowered: number; // 0/1
  signalRaw: number; // 0..31
  signalDbm?: number;
  signalQuality: SignalQuality;
  transmitted: number;
  allTransmitted: number;
  peakType: PeakTypeCat;
  code: CodeFamily;
  errorCode: number;
  geophone: string;
  clockChanged: number;
}

export interface RowFormat {
  long: boolean; // 4 decimals everywhere
  counter: boolean; // emit the counter column
}

export interface DecodeStats {
  recordsFound: number;
  processed: number;
  skipped: number;
}

export interface HeadersRows {
  headers: string[][]; // names line, units line
  rows: string[][];
}

export interface DecodeResult extends HeadersRows {
  kbMode: boolean;
  stats: DecodeStats;
}
