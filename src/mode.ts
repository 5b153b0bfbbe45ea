import { ByteSource } from './source';
import { readU16 } from './codec';
import { MIN_RECORD_BYTES } from './scanner';
import { RECORD_TYPE_KB } from './validate';

const PRESCAN_CHUNK = 64 * 1024;

type State = 'V' | 'I' | 'B' | 'header' | 'skip';

/**
 * True when any record in the stream has type 0x8A. Walks marker by marker and
 * skips each record body by its declared size; runs on its own source so it
 * never touches the record scanner's window.
 */
export function detectKbMode(source: ByteSource, chunkSize = PRESCAN_CHUNK): boolean {
  const chunk = new Uint8Array(chunkSize);
  const header = new Uint8Array(MIN_RECORD_BYTES);
  let state: State = 'V';
  let have = 3;
  let skip = 0;

  for (;;) {
    const n = source.read(chunk, 0, chunk.length);
    if (n <= 0) return false;

    for (let k = 0; k < n; k++) {
      const b = chunk[k];
      if (state === 'skip') {
        const take = Math.min(skip, n - k);
        skip -= take;
        k += take - 1;
        if (skip === 0) state = 'V';
        continue;
      }
      if (state === 'header') {
        header[have++] = b;
        if (have < MIN_RECORD_BYTES) continue;
        if (header[3] === RECORD_TYPE_KB) return true;
        skip = readU16(header, 4) - MIN_RECORD_BYTES;
        have = 3;
        state = skip > 0 ? 'skip' : 'V';
        continue;
      }
      if (state === 'V' && b === 0x56) state = 'I';
      else if (state === 'I' && b === 0x49) state = 'B';
      else if (state === 'B' && b === 0x42) state = 'header';
      else state = b === 0x56 ? 'I' : 'V';
    }
  }
}
