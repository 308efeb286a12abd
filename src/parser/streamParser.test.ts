import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import type { JsonEventWriter } from "./streamParser.js";
import { parseJsonStream } from "./streamParser.js";

type Event =
  | { type: "startObject" }
  | { type: "endObject" }
  | { type: "startArray" }
  | { type: "endArray" }
  | { type: "key"; value: string }
  | { type: "string"; value: string }
  | { type: "number"; value: string }
  | { type: "boolean"; value: boolean }
  | { type: "null" };

class RecordingWriter implements JsonEventWriter {
  readonly events: Event[] = [];

  writeStartObject(): void {
    this.events.push({ type: "startObject" });
  }

  writeEndObject(): void {
    this.events.push({ type: "endObject" });
  }

  writeStartArray(): void {
    this.events.push({ type: "startArray" });
  }

  writeEndArray(): void {
    this.events.push({ type: "endArray" });
  }

  writeKey(key: string): void {
    this.events.push({ type: "key", value: key });
  }

  writeString(value: string): void {
    this.events.push({ type: "string", value });
  }

  writeNumber(value: string): void {
    this.events.push({ type: "number", value });
  }

  writeBoolean(value: boolean): void {
    this.events.push({ type: "boolean", value });
  }

  writeNull(): void {
    this.events.push({ type: "null" });
  }
}

const parseJson = async (payload: string): Promise<RecordingWriter> => {
  const writer = new RecordingWriter();
  await parseJsonStream(Readable.from([payload]), writer);
  return writer;
};

describe("stream parser", () => {
  it("emits the expected sequence for a small object", async () => {
    const writer = await parseJson('{"name":"Ada","age":42}');

    expect(writer.events).toEqual([
      { type: "startObject" },
      { type: "key", value: "name" },
      { type: "string", value: "Ada" },
      { type: "key", value: "age" },
      { type: "number", value: "42" },
      { type: "endObject" },
    ]);
  });

  it("handles arrays, objects, strings, numbers, booleans, and nulls", async () => {
    const writer = await parseJson(
      '{"items":[1,"two",false,null,{"ok":true}],"empty":{},"value":null}'
    );

    expect(writer.events).toEqual([
      { type: "startObject" },
      { type: "key", value: "items" },
      { type: "startArray" },
      { type: "number", value: "1" },
      { type: "string", value: "two" },
      { type: "boolean", value: false },
      { type: "null" },
      { type: "startObject" },
      { type: "key", value: "ok" },
      { type: "boolean", value: true },
      { type: "endObject" },
      { type: "endArray" },
      { type: "key", value: "empty" },
      { type: "startObject" },
      { type: "endObject" },
      { type: "key", value: "value" },
      { type: "null" },
      { type: "endObject" },
    ]);
  });

  it("passes numbers through as their source text", async () => {
    const writer = await parseJson("[-0.50, 1e3, 18446744073709551616]");

    expect(writer.events).toEqual([
      { type: "startArray" },
      { type: "number", value: "-0.50" },
      { type: "number", value: "1e3" },
      { type: "number", value: "18446744073709551616" },
      { type: "endArray" },
    ]);
  });

  it("waits for asynchronous writers", async () => {
    const seen: string[] = [];
    const writer = new RecordingWriter();
    writer.writeString = async (value: string) => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      seen.push(value);
    };

    await parseJsonStream(Readable.from(['["a","b"]']), writer);

    expect(seen).toEqual(["a", "b"]);
  });

  it("rejects malformed input", async () => {
    await expect(parseJson('{"a":x}')).rejects.toThrow();
  });

  it("rejects when the writer throws", async () => {
    const writer = new RecordingWriter();
    writer.writeNull = () => {
      throw new Error("no nulls here");
    };

    await expect(parseJsonStream(Readable.from(["[null]"]), writer)).rejects.toThrow(
      "no nulls here"
    );
  });
});
