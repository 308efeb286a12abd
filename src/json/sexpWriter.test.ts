import { Readable, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { decodeValue } from "../decoder/decode.js";
import { parseJsonStream } from "../parser/streamParser.js";
import { Sexp } from "../value/sexp.js";
import { SexpStreamWriter } from "./sexpWriter.js";
import type { SexpWriterOptions } from "./sexpWriter.js";

const createCollector = (highWaterMark?: number) => {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    highWaterMark,
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      if (highWaterMark === undefined) {
        callback();
      } else {
        setImmediate(callback);
      }
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString("utf8") };
};

const convert = async (json: string, options?: SexpWriterOptions) => {
  const collector = createCollector();
  const writer = new SexpStreamWriter(collector.stream, options);
  await parseJsonStream(Readable.from([json]), writer);
  await writer.finalize();
  return { text: collector.text(), stats: writer.getStats() };
};

describe("SexpStreamWriter", () => {
  it("writes objects as alists and arrays as lists", async () => {
    const { text } = await convert(
      '{"name":"Ada","tags":["x",1.5],"n":null,"ok":true,"big":18446744073709551616}'
    );

    expect(text).toBe(
      '(("name" . "Ada") ("tags" . ("x" 1.5)) ("n" . #nil) ("ok" . #t) ("big" . 18446744073709552000.0))\n'
    );
  });

  it("writes text the decoder reads back", async () => {
    const { text } = await convert('{"a":[1,-2,{"b":false}]}');

    expect(
      Sexp.equals(
        decodeValue(text),
        Sexp.list([
          Sexp.entry('"a"', Sexp.list([Sexp.from(1), Sexp.from(-2), Sexp.list([Sexp.entry('"b"', Sexp.boolean(false))])])),
        ])
      )
    ).toBe(true);
  });

  it("writes the pretty layout", async () => {
    const { text } = await convert('{"a":[1,2],"b":{}}', { pretty: true });

    expect(text).toBe('(\n  ("a" . (\n    1\n    2\n  ))\n  ("b" . ())\n)\n');
  });

  it("counts tokens and bytes", async () => {
    const { text, stats } = await convert('{"s":"é","list":[true,null,3]}');

    expect(stats.tokens).toEqual({
      objects: 1,
      arrays: 1,
      keys: 2,
      strings: 1,
      numbers: 1,
      booleans: 1,
      nulls: 1,
    });
    expect(stats.bytesWritten).toBe(Buffer.byteLength(text));
  });

  it("keeps integer digits and writes other numbers as floats", async () => {
    const collector = createCollector();
    const writer = new SexpStreamWriter(collector.stream);
    await writer.writeStartArray();
    for (const number of ["-9223372036854775808", "-9223372036854775809", "1E2", "1e400", "0.5"]) {
      await writer.writeNumber(number);
    }
    await writer.writeEndArray();
    await writer.finalize();

    expect(collector.text()).toBe("(-9223372036854775808 -9223372036854776000.0 100.0 #nil 0.5)\n");
  });

  it("separates top-level documents with newlines", async () => {
    const collector = createCollector();
    const writer = new SexpStreamWriter(collector.stream);
    await writer.writeStartArray();
    await writer.writeEndArray();
    await writer.writeStartArray();
    await writer.writeNumber("-3");
    await writer.writeEndArray();
    await writer.finalize();

    expect(collector.text()).toBe("()\n(-3)\n");
  });

  it("waits for a slow stream to drain", async () => {
    const collector = createCollector(1);
    const writer = new SexpStreamWriter(collector.stream);
    const long = "a".repeat(70000);
    await writer.writeString(long);
    await writer.finalize();

    expect(collector.text()).toBe(`"${long}"\n`);
  });

  it("rejects unbalanced events", async () => {
    const writer = new SexpStreamWriter(createCollector().stream);

    expect(() => writer.writeKey("a")).toThrow("Key outside of an object");
    await writer.writeStartObject();
    expect(() => writer.writeString("x")).toThrow("Object value without a key");
    expect(() => writer.writeEndArray()).toThrow("Unbalanced array");
  });

  it("refuses to finalize an open document", async () => {
    const writer = new SexpStreamWriter(createCollector().stream);
    await writer.writeStartArray();

    await expect(writer.finalize()).rejects.toThrow("Unbalanced document");
  });
});
