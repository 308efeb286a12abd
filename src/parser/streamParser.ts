import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Readable, Transform } from "node:stream";
import pkg from "stream-json";
const { parser } = pkg;

/** Receives one call per JSON token, in document order. */
export interface JsonEventWriter {
  writeStartObject(): void | Promise<void>;
  writeEndObject(): void | Promise<void>;
  writeStartArray(): void | Promise<void>;
  writeEndArray(): void | Promise<void>;
  writeKey(key: string): void | Promise<void>;
  writeString(value: string): void | Promise<void>;
  /** Numbers arrive as their JSON source text. */
  writeNumber(value: string): void | Promise<void>;
  writeBoolean(value: boolean): void | Promise<void>;
  writeNull(): void | Promise<void>;
}

type JsonToken = {
  name: string;
  value?: unknown;
};

const writeToken = (writer: JsonEventWriter, token: JsonToken): void | Promise<void> => {
  switch (token.name) {
    case "startObject":
      return writer.writeStartObject();
    case "endObject":
      return writer.writeEndObject();
    case "startArray":
      return writer.writeStartArray();
    case "endArray":
      return writer.writeEndArray();
    case "keyValue":
      return writer.writeKey(String(token.value ?? ""));
    case "stringValue":
      return writer.writeString(String(token.value ?? ""));
    case "numberValue":
      if (typeof token.value !== "string" && typeof token.value !== "number") {
        throw new Error("Number token missing value");
      }
      return writer.writeNumber(String(token.value));
    case "trueValue":
      return writer.writeBoolean(true);
    case "falseValue":
      return writer.writeBoolean(false);
    case "nullValue":
      return writer.writeNull();
    default:
      return;
  }
};

const createWriterSink = (writer: JsonEventWriter): Writable =>
  new Writable({
    objectMode: true,
    write(chunk: JsonToken, _encoding, callback) {
      try {
        const result = writeToken(writer, chunk);
        if (result) {
          result.then(
            () => callback(),
            (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
          );
        } else {
          callback();
        }
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
  });

/**
 * Builds the two stages of a JSON pipeline: stream-json's tokenizer, packing
 * keys, strings and numbers into single tokens, and a sink that replays the
 * tokens on `writer`.
 */
export const createStreamParser = (writer: JsonEventWriter): { parser: Transform; sink: Writable } => {
  const parserStream = parser({
    packKeys: true,
    packStrings: true,
    packNumbers: true,
    streamKeys: false,
    streamStrings: false,
    streamNumbers: false,
  });
  const sink = createWriterSink(writer);

  return { parser: parserStream, sink };
};

export const parseJsonStream = async (readable: Readable, writer: JsonEventWriter): Promise<void> => {
  const { parser: parserStream, sink } = createStreamParser(writer);
  await pipeline(readable, parserStream, sink);
};
