import type { Serialize } from "../binding/binding.js";
import { sexp } from "../binding/shapes.js";
import type { Sexp } from "../value/sexp.js";
import { Encoder } from "./encoder.js";
import { CompactFormatter, PrettyFormatter } from "./formatter.js";
import type { Formatter } from "./formatter.js";
import { ByteBufferOutput, SinkOutput, StringOutput } from "./output.js";
import type { ByteSink, Output } from "./output.js";

const run = <T>(value: T, shape: Serialize<T>, output: Output, formatter: Formatter): void => {
  shape.serialize(value, new Encoder(output, formatter));
  output.flush();
};

export const toString = <T>(value: T, shape: Serialize<T>): string => {
  const output = new StringOutput();
  run(value, shape, output, new CompactFormatter());
  return output.toString();
};

export const toStringPretty = <T>(value: T, shape: Serialize<T>, indent = "  "): string => {
  const output = new StringOutput();
  run(value, shape, output, new PrettyFormatter(indent));
  return output.toString();
};

export const toBytes = <T>(value: T, shape: Serialize<T>): Uint8Array => {
  const output = new ByteBufferOutput();
  run(value, shape, output, new CompactFormatter());
  return output.toBytes();
};

export const toBytesPretty = <T>(value: T, shape: Serialize<T>, indent = "  "): Uint8Array => {
  const output = new ByteBufferOutput();
  run(value, shape, output, new PrettyFormatter(indent));
  return output.toBytes();
};

/** Writes through to `sink`; whatever was written before a failure stays written. */
export const toWriter = <T>(sink: ByteSink, value: T, shape: Serialize<T>): void => {
  run(value, shape, new SinkOutput(sink), new CompactFormatter());
};

export const toWriterPretty = <T>(
  sink: ByteSink,
  value: T,
  shape: Serialize<T>,
  indent = "  "
): void => {
  run(value, shape, new SinkOutput(sink), new PrettyFormatter(indent));
};

/** Compact text of a dynamic value. */
export const encode = (value: Sexp): string => toString(value, sexp);

export const encodePretty = (value: Sexp, indent = "  "): string =>
  toStringPretty(value, sexp, indent);
