/**
 * Engine I/O
 *
 * Byte source and sink interfaces plus in-memory implementations.
 */

/** Byte-producing interface called once per `,` */
export interface InputSource {
  /** Next byte (0-255), or null at end of input */
  read(): number | null;
}

/** Byte-consuming interface called once per `.` */
export interface OutputSink {
  write(byte: number): void;
}

/** Output sink that keeps every byte in memory */
export interface CollectingSink extends OutputSink {
  bytes(): Uint8Array;
  /** Collected bytes decoded as UTF-8 */
  text(): string;
}

/**
 * Input source over a fixed buffer. Strings are UTF-8 encoded.
 * Once exhausted it reports end of input on every call.
 */
export function bytesInput(data: string | Uint8Array): InputSource {
  const bytes =
    typeof data === 'string' ? new TextEncoder().encode(data) : data;
  let index = 0;
  return {
    read() {
      const byte = bytes[index];
      if (byte === undefined) {
        return null;
      }
      index++;
      return byte;
    },
  };
}

/** Input source that is always at end of input */
export function emptyInput(): InputSource {
  return { read: () => null };
}

export function collectingSink(): CollectingSink {
  const chunks: number[] = [];
  return {
    write(byte) {
      chunks.push(byte & 0xff);
    },
    bytes() {
      return Uint8Array.from(chunks);
    },
    text() {
      return new TextDecoder().decode(Uint8Array.from(chunks));
    },
  };
}

/** Output sink that drops every byte */
export function discardSink(): OutputSink {
  return { write: () => undefined };
}
