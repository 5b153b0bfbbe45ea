import { ByteSource } from './source';
import { RawRecordCandidate, ScannedRecord } from './types';
import { readU16 } from './codec';

export const MIN_RECORD_BYTES = 12;
export const RECORD_BUFFER_SIZE = 70;
export const SCAN_CHUNK_SIZE = 256 * 1024;
export const NORMAL_RECORD_SPACING = 68;

const V = 0x56, I = 0x49, B = 0x42;

export function readTypeFromDelta(delta: number): number {
  return delta === NORMAL_RECORD_SPACING ? 2 : 5;
}

/**
 * Finds "VIB" markers in a byte stream and hands out one candidate per marker.
 * A record's read type depends on where the next one starts, so every record
 * is emitted when its successor is found; the last one is flushed as type 2.
 *
 * The window holds unconsumed bytes from `start` (absolute stream offset).
 * Bytes before `scanIdx` are done and get dropped before the window grows.
 */
export class StreamScanner {
  private window: Uint8Array;
  private len = 0;
  private scanIdx = 0;
  private start = 0;
  public recordsFound = 0;

  constructor(private readonly source: ByteSource, initialCapacity = SCAN_CHUNK_SIZE * 2) {
    this.window = new Uint8Array(Math.max(initialCapacity, MIN_RECORD_BYTES));
  }

  get capacity(): number { return this.window.length; }

  *scan(): Generator<ScannedRecord> {
    let pending: RawRecordCandidate | undefined;

    for (;;) {
      if (!this.ensure(3)) break;

      const w = this.window;
      let i = this.scanIdx;
      while (i + 2 < this.len && !(w[i] === V && w[i + 1] === I && w[i + 2] === B)) i++;
      if (i + 2 >= this.len) {
        // keep the last two bytes, they may start a marker
        this.scanIdx = i;
        continue;
      }
      this.scanIdx = i;

      // a record cut short at the end of the stream is dropped
      if (!this.ensure(MIN_RECORD_BYTES)) break;
      const size = readU16(this.window, this.scanIdx + 4);
      const advance = Math.max(size, MIN_RECORD_BYTES);
      if (!this.ensure(advance)) break;

      const candidate = this.take(advance, size);
      this.recordsFound++;
      if (pending) {
        yield { candidate: pending, readType: readTypeFromDelta(candidate.offset - pending.offset) };
      }
      pending = candidate;
      this.scanIdx += advance;
    }

    if (pending) yield { candidate: pending, readType: 2 };
  }

  private take(advance: number, size: number): RawRecordCandidate {
    const bytes = new Uint8Array(RECORD_BUFFER_SIZE);
    const n = Math.min(advance, RECORD_BUFFER_SIZE);
    bytes.set(this.window.subarray(this.scanIdx, this.scanIdx + n));
    return {
      bytes,
      offset: this.start + this.scanIdx,
      declaredSize: size,
      typeByte: this.window[this.scanIdx + 3],
    };
  }

  // Makes `count` bytes available from scanIdx. False once the source runs dry.
  private ensure(count: number): boolean {
    while (this.scanIdx + count > this.len) {
      if (this.scanIdx > 0) {
        this.window.copyWithin(0, this.scanIdx, this.len);
        this.start += this.scanIdx;
        this.len -= this.scanIdx;
        this.scanIdx = 0;
      }
      if (this.len === this.window.length) {
        let size = this.window.length * 2;
        while (size < count) size *= 2;
        const bigger = new Uint8Array(size);
        bigger.set(this.window.subarray(0, this.len));
        this.window = bigger;
      }
      const n = this.source.read(this.window, this.len, this.window.length - this.len);
      if (n <= 0) return false;
      this.len += n;
    }
    return true;
  }
}
