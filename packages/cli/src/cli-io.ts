/**
 * CLI I/O
 * File-descriptor backed input source and buffered output sink
 */

import * as fs from 'fs';
import type { InputSource, OutputSink } from 'eightfold';

const READ_CHUNK_SIZE = 4096;
const DEFAULT_HIGH_WATER_MARK = 4096;

/**
 * Output sink that batches bytes and hands them on at each newline, when the
 * batch is full, or when flushed.
 */
export class BufferedSink implements OutputSink {
  private pending: number[] = [];

  constructor(
    private readonly flushTo: (chunk: Uint8Array) => void,
    private readonly highWaterMark: number = DEFAULT_HIGH_WATER_MARK
  ) {}

  write(byte: number): void {
    this.pending.push(byte & 0xff);
    if (byte === 0x0a || this.pending.length >= this.highWaterMark) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pending.length === 0) {
      return;
    }
    const chunk = Uint8Array.from(this.pending);
    this.pending = [];
    this.flushTo(chunk);
  }
}

function writeAll(fd: number, chunk: Uint8Array): void {
  let offset = 0;
  while (offset < chunk.length) {
    offset += fs.writeSync(fd, chunk, offset);
  }
}

/** Buffered sink writing synchronously to a file descriptor */
export function fdSink(fd: number): BufferedSink {
  return new BufferedSink((chunk) => writeAll(fd, chunk));
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function readChunk(fd: number, buffer: Uint8Array): number {
  try {
    return fs.readSync(fd, buffer, 0, buffer.length, null);
  } catch (err) {
    // Windows reports a closed pipe as an EOF error
    if (isErrnoException(err) && err.code === 'EOF') {
      return 0;
    }
    throw err;
  }
}

/**
 * Input source reading a file descriptor with blocking reads.
 * `beforeRead` runs before each blocking read so that pending output (a
 * prompt, say) is visible while the program waits.
 */
export function fdInput(fd: number, beforeRead?: () => void): InputSource {
  const buffer = new Uint8Array(READ_CHUNK_SIZE);
  let available = 0;
  let index = 0;
  let ended = false;

  return {
    read() {
      if (index >= available) {
        if (ended) {
          return null;
        }
        beforeRead?.();
        available = readChunk(fd, buffer);
        index = 0;
        if (available === 0) {
          ended = true;
          return null;
        }
      }
      const byte = buffer[index] ?? null;
      index++;
      return byte;
    },
  };
}
