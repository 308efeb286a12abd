export { Category, ErrorCode, SexpError } from "./error/error.js";
export { Atom } from "./value/atom.js";
export type { AtomKind } from "./value/atom.js";
export { I64_MAX, I64_MIN, SexpNumber, U64_MAX } from "./value/number.js";
export { Sexp } from "./value/sexp.js";
export type { PlainValue, SexpType } from "./value/sexp.js";
export { fromValue, ValueDeserializer } from "./value/valueDeserializer.js";
export { toValue } from "./value/valueSerializer.js";

export { invalidType, invalidValue, visit } from "./binding/binding.js";
export type {
  Deserialize,
  Deserializer,
  EnumAccess,
  MapAccess,
  Next,
  SeqAccess,
  Serialize,
  SerializeImproperList,
  SerializeMap,
  SerializeSeq,
  SerializeStruct,
  Serializer,
  Visitor,
} from "./binding/binding.js";
export * as shapes from "./binding/shapes.js";
export type { EnumOf, Infer, RecordOf, Shape, TupleOf, VariantShape } from "./binding/shapes.js";

export { Decoder, RECURSION_LIMIT } from "./decoder/decoder.js";
export { decode, decodeValue, fromBytes, fromReader, fromString } from "./decoder/decode.js";
export type { Source } from "./decoder/decode.js";
export { IoRead, SliceRead, StrRead } from "./decoder/read.js";
export type { ByteSource, Position, Read, Reference } from "./decoder/read.js";
export { StreamDecoder, streamDecoder, streamValues } from "./decoder/stream.js";

export {
  encode,
  encodePretty,
  toBytes,
  toBytesPretty,
  toString,
  toStringPretty,
  toWriter,
  toWriterPretty,
} from "./encoder/encode.js";
export { Encoder } from "./encoder/encoder.js";
export { CharEscape, CompactFormatter, Formatter, PrettyFormatter } from "./encoder/formatter.js";
export { ByteBufferOutput, SinkOutput, StringOutput } from "./encoder/output.js";
export type { ByteSink, Output } from "./encoder/output.js";

export { createStreamParser, parseJsonStream } from "./parser/streamParser.js";
export type { JsonEventWriter } from "./parser/streamParser.js";
export { SexpStreamWriter } from "./json/sexpWriter.js";
export type { SexpWriterOptions, WriterStats } from "./json/sexpWriter.js";
export {
  createFileSink,
  createFileSource,
  createReadStream,
  createWriteStream,
  decodeReadable,
  decodeReadableValues,
} from "./io/streams.js";
export type { FileSink, FileSource } from "./io/streams.js";
