import { sexp } from "../binding/shapes.js";
import type { ByteSource } from "../decoder/read.js";
import { streamDecoder } from "../decoder/stream.js";
import { toWriter, toWriterPretty } from "../encoder/encode.js";
import type { ByteSink } from "../encoder/output.js";
import { SexpError } from "../error/error.js";
import { createFileSink, createFileSource } from "../io/streams.js";
import type { FileSink, FileSource } from "../io/streams.js";

export type FormatOptions = {
  pretty: boolean;
  indent: string;
};

export type FormatResult = {
  values: number;
  bytesRead: number;
};

export type FileOpeners = {
  source: (path: string) => FileSource;
  sink: (path: string) => FileSink;
};

const NEWLINE = new TextEncoder().encode("\n");

const fileOpeners: FileOpeners = { source: createFileSource, sink: createFileSink };

/** Re-encodes every top-level list of `source` into `sink`, one per line. */
export const formatValues = (
  source: ByteSource,
  sink: ByteSink,
  options: FormatOptions
): FormatResult => {
  const values = streamDecoder(source, sexp);
  let count = 0;
  for (const value of values) {
    if (options.pretty) {
      toWriterPretty(sink, value, sexp, options.indent);
    } else {
      toWriter(sink, value, sexp);
    }
    try {
      sink.write(NEWLINE);
    } catch (cause) {
      throw SexpError.io(cause);
    }
    count += 1;
  }
  return { values: count, bytesRead: values.byteOffset() };
};

export const formatFile = (
  input: string,
  output: string,
  options: FormatOptions,
  open: FileOpeners = fileOpeners
): FormatResult => {
  let source: FileSource | undefined;
  let sink: FileSink | undefined;
  try {
    source = open.source(input);
    sink = open.sink(output);
    return formatValues(source, sink, options);
  } finally {
    sink?.close();
    source?.close();
  }
};
