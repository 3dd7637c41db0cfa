/**
 * Input Sources and Output Sinks
 *
 * Input is a lazy, finite, non-restartable byte sequence; each `,` consumes
 * exactly one byte. Output receives one byte per `.`.
 */

import { readSync } from 'node:fs';

// ============================================================
// INPUT
// ============================================================

export interface InputSource {
  /** Next byte, or undefined once the source is exhausted */
  read(): number | undefined;
  /** Bytes consumed so far */
  readonly position: number;
}

/** Input backed by a fixed byte array */
export function bytesInput(bytes: Uint8Array): InputSource {
  let position = 0;
  return {
    read() {
      const byte = bytes[position];
      if (byte !== undefined) {
        position++;
      }
      return byte;
    },
    get position() {
      return position;
    },
  };
}

/** Input backed by the UTF-8 encoding of `text` */
export function stringInput(text: string): InputSource {
  return bytesInput(new TextEncoder().encode(text));
}

export function emptyInput(): InputSource {
  return bytesInput(new Uint8Array(0));
}

/**
 * Input that restarts `text` each time it runs out, so every `,` reads from
 * the same fixed string. An empty string behaves like emptyInput().
 */
export function repeatingInput(text: string): InputSource {
  const bytes = new TextEncoder().encode(text);
  let position = 0;
  return {
    read() {
      if (bytes.length === 0) {
        return undefined;
      }
      const byte = bytes[position % bytes.length];
      position++;
      return byte;
    },
    get position() {
      return position;
    },
  };
}

/**
 * Input read synchronously from a file descriptor, one byte per request.
 * Reaching end of file exhausts the source for good.
 */
export function fdInput(fd: number): InputSource {
  const buffer = new Uint8Array(1);
  let position = 0;
  let exhausted = false;
  return {
    read() {
      if (exhausted) {
        return undefined;
      }
      const count = readSync(fd, buffer, 0, 1, null);
      const byte = buffer[0];
      if (count === 0 || byte === undefined) {
        exhausted = true;
        return undefined;
      }
      position++;
      return byte;
    },
    get position() {
      return position;
    },
  };
}

// ============================================================
// OUTPUT
// ============================================================

export interface OutputSink {
  write(byte: number): void;
}

export interface BufferOutput extends OutputSink {
  bytes(): Uint8Array;
  /** Collected bytes decoded as UTF-8 */
  text(): string;
}

export function bufferOutput(): BufferOutput {
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

/** Minimal writable surface shared by process.stdout and test doubles */
export interface ByteWritable {
  write(chunk: Uint8Array): unknown;
}

/** Forward each byte to a writable stream as it is produced */
export function streamOutput(stream: ByteWritable): OutputSink {
  return {
    write(byte) {
      stream.write(Uint8Array.of(byte & 0xff));
    },
  };
}

