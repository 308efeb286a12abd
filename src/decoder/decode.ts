import type { Deserialize } from "../binding/binding.js";
import { sexp } from "../binding/shapes.js";
import type { Sexp } from "../value/sexp.js";
import { Decoder } from "./decoder.js";
import type { ByteSource } from "./read.js";

/** Anything a decoder can read from. */
export type Source = string | Uint8Array | ByteSource;

export const decoderFor = (source: Source): Decoder => {
  if (typeof source === "string") {
    return Decoder.fromString(source);
  }
  if (source instanceof Uint8Array) {
    return Decoder.fromBytes(source);
  }
  return Decoder.fromReader(source);
};

const complete = <T>(decoder: Decoder, shape: Deserialize<T>): T => {
  const value = shape.deserialize(decoder);
  decoder.end();
  return value;
};

/** Decodes exactly one value; only whitespace may follow it. */
export const decode = <T>(source: Source, shape: Deserialize<T>): T =>
  complete(decoderFor(source), shape);

export const decodeValue = (source: Source): Sexp => decode(source, sexp);

export const fromString = <T>(text: string, shape: Deserialize<T>): T =>
  complete(Decoder.fromString(text), shape);

export const fromBytes = <T>(bytes: Uint8Array, shape: Deserialize<T>): T =>
  complete(Decoder.fromBytes(bytes), shape);

export const fromReader = <T>(source: ByteSource, shape: Deserialize<T>): T =>
  complete(Decoder.fromReader(source), shape);
