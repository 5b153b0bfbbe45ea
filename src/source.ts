import * as fs from 'fs';

// Synchronous pull source; read() returns 0 once the stream is exhausted.
export interface ByteSource {
  read(into: Uint8Array, offset: number, length: number): number;
  close(): void;
}

export class VifOpenError extends Error {
  constructor(public readonly path: string, cause?: unknown) {
    super(`can't open file: "${path}"`, { cause });
    this.name = 'VifOpenError';
  }
}

export function fileSource(path: string): ByteSource {
  let fd: number;
  try {
    fd = fs.openSync(path, 'r');
  } catch (err) {
    throw new VifOpenError(path, err);
  }
  let closed = false;
  return {
    read(into, offset, length) {
      if (closed || length <= 0) return 0;
      return fs.readSync(fd, into, offset, length, null);
    },
    close() {
      if (closed) return;
      closed = true;
      fs.closeSync(fd);
    },
  };
}

/**
 * Serves bytes already in memory. `chunk` caps each read, which lets tests
 * drive the scanner through many short reads.
 */
export function memorySource(bytes: Uint8Array, chunk = Infinity): ByteSource {
  let pos = 0;
  return {
    read(into, offset, length) {
      const n = Math.min(length, chunk, bytes.length - pos);
      if (n <= 0) return 0;
      into.set(bytes.subarray(pos, pos + n), offset);
      pos += n;
      return n;
    },
    close() {
      pos = bytes.length;
    },
  };
}
