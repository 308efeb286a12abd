import {
  closeSync,
  createReadStream as fsCreateReadStream,
  createWriteStream as fsCreateWriteStream,
  openSync,
  readSync,
  writeSync,
} from "node:fs";
import type { ReadStream, WriteStream } from "node:fs";
import type { Deserialize } from "../binding/binding.js";
import { sexp } from "../binding/shapes.js";
import type { ByteSource } from "../decoder/read.js";
import { streamDecoder } from "../decoder/stream.js";
import type { ByteSink } from "../encoder/output.js";
import { SexpError } from "../error/error.js";
import type { Sexp } from "../value/sexp.js";

const READ_HIGH_WATER_MARK = 64 * 1024;
const WRITE_HIGH_WATER_MARK = 16 * 1024;

const abortError = () => new Error("Operation aborted");

const attachAbortHandler = (stream: ReadStream | WriteStream, signal?: AbortSignal): void => {
  if (!signal) {
    return;
  }

  if (signal.aborted) {
    stream.destroy(abortError());
    return;
  }

  signal.addEventListener(
    "abort",
    () => {
      stream.destroy(abortError());
    },
    { once: true }
  );
};

/** Reads raw bytes; text decoding is left to the S-expression decoder. */
export const createReadStream = (path: string, signal?: AbortSignal): ReadStream => {
  const stream = fsCreateReadStream(path, {
    highWaterMark: READ_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream => {
  const stream = fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export type FileSource = ByteSource & { close(): void };
export type FileSink = ByteSink & { close(): void };

const openFile = (path: string, flags: "r" | "w"): number => {
  try {
    return openSync(path, flags);
  } catch (cause) {
    throw SexpError.io(cause);
  }
};

/** A blocking source over a file descriptor, for the synchronous decoder. */
export const createFileSource = (path: string): FileSource => {
  const fd = openFile(path, "r");
  return {
    read: (buffer) => readSync(fd, buffer, 0, buffer.length, null),
    close: () => closeSync(fd),
  };
};

export const createFileSink = (path: string): FileSink => {
  const fd = openFile(path, "w");
  return {
    write: (bytes) => {
      let written = 0;
      while (written < bytes.length) {
        written += writeSync(fd, bytes, written, bytes.length - written);
      }
    },
    close: () => closeSync(fd),
  };
};

const toBytes = (chunk: unknown): Uint8Array => {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return Buffer.from(chunk, "utf8");
  }
  throw new TypeError(`Unsupported chunk type: ${typeof chunk}`);
};

const concat = (head: Uint8Array, tail: Uint8Array): Uint8Array => {
  if (head.length === 0) {
    return tail;
  }
  const joined = new Uint8Array(head.length + tail.length);
  joined.set(head, 0);
  joined.set(tail, head.length);
  return joined;
};

/** Length of the prefix of `bytes` that does not stop inside a UTF-8 sequence. */
const completeLength = (bytes: Uint8Array): number => {
  let start = bytes.length - 1;
  while (start >= 0 && bytes.length - start < 4 && (bytes[start] & 0xc0) === 0x80) {
    start -= 1;
  }
  if (start < 0) {
    return bytes.length;
  }
  const lead = bytes[start];
  const needed = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return bytes.length - start < needed ? start : bytes.length;
};

/**
 * Decodes every complete value in `bytes` and returns the unread rest. A
 * value cut off by the end of the chunk is left for the next round unless
 * `final` is set.
 */
function* drainValues<T>(
  bytes: Uint8Array,
  shape: Deserialize<T>,
  final: boolean
): Generator<T, Uint8Array, undefined> {
  const decoder = streamDecoder(bytes, shape);
  for (;;) {
    let next: IteratorResult<T>;
    try {
      next = decoder.next();
    } catch (error) {
      if (!final && error instanceof SexpError && error.isEof()) {
        return bytes.subarray(decoder.byteOffset());
      }
      throw error;
    }
    if (next.done) {
      return bytes.subarray(decoder.byteOffset());
    }
    yield next.value;
  }
}

/**
 * Decodes the top-level lists of a chunked stream as they complete. Chunks
 * may split a value anywhere, including inside a multi-byte character.
 */
export async function* decodeReadable<T>(
  readable: AsyncIterable<unknown>,
  shape: Deserialize<T>
): AsyncGenerator<T, void, undefined> {
  let pending: Uint8Array = new Uint8Array(0);
  for await (const chunk of readable) {
    const bytes = concat(pending, toBytes(chunk));
    const usable = completeLength(bytes);
    const rest = yield* drainValues(bytes.subarray(0, usable), shape, false);
    pending = concat(rest, bytes.subarray(usable));
  }
  yield* drainValues(pending, shape, true);
}

export const decodeReadableValues = (
  readable: AsyncIterable<unknown>
): AsyncGenerator<Sexp, void, undefined> => decodeReadable(readable, sexp);
