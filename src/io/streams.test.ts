import {
  createFileSink,
  createFileSource,
  createReadStream,
  createWriteStream,
  decodeReadable,
  decodeReadableValues,
} from "./streams.js";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { finished } from "node:stream/promises";
import { array, i32, record, string } from "../binding/shapes.js";
import { fromReader } from "../decoder/decode.js";
import { toWriter } from "../encoder/encode.js";
import { ErrorCode, SexpError } from "../error/error.js";
import { Sexp } from "../value/sexp.js";

const collectValues = async (chunks: (string | Buffer)[]): Promise<Sexp[]> => {
  const values: Sexp[] = [];
  for await (const value of decodeReadableValues(Readable.from(chunks))) {
    values.push(value);
  }
  return values;
};

describe("streams", () => {
  it("createReadStream reads file content", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "input.txt");
    const content = "Hello World";
    await writeFile(filePath, content);

    const stream = createReadStream(filePath);
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.from(chunk));
    }
    const result = Buffer.concat(chunks).toString("utf8");
    expect(result).toBe(content);
  });

  it("createReadStream aborts with signal", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "input-abort.txt");
    // Large enough that reading is still in progress when the signal fires.
    await writeFile(filePath, Buffer.alloc(1024 * 1024));

    const controller = new AbortController();
    const stream = createReadStream(filePath, controller.signal);

    controller.abort();

    await expect(finished(stream)).rejects.toThrow(/aborted/i);
  });

  it("createWriteStream writes file content", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "output.txt");
    const content = "Hello Writer";

    const stream = createWriteStream(filePath);
    stream.write(content);
    stream.end();
    await finished(stream);

    const written = await readFile(filePath, "utf8");
    expect(written).toBe(content);
  });

  it("createWriteStream aborts with signal", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "output-abort.txt");

    const controller = new AbortController();
    const stream = createWriteStream(filePath, controller.signal);

    controller.abort();

    stream.write("data");

    await expect(finished(stream)).rejects.toThrow(/aborted/i);
  });

  it("createFileSink and createFileSource work on blocking descriptors", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "values.sexp");

    const sink = createFileSink(filePath);
    try {
      toWriter(sink, ["a", "b"], array(string));
    } finally {
      sink.close();
    }
    expect(await readFile(filePath, "utf8")).toBe('("a" "b")');

    const source = createFileSource(filePath);
    try {
      expect(fromReader(source, array(string))).toEqual(["a", "b"]);
    } finally {
      source.close();
    }
  });
});

describe("decodeReadable", () => {
  it("decodes values split across chunks", async () => {
    const values = await collectValues(["(a 1) (b", " 2)\n(c", ")"]);

    expect(values).toHaveLength(3);
    expect(Sexp.equals(values[0], Sexp.from(["a", 1]))).toBe(true);
    expect(Sexp.equals(values[1], Sexp.from(["b", 2]))).toBe(true);
    expect(Sexp.equals(values[2], Sexp.from(["c"]))).toBe(true);
  });

  it("holds back a character split between chunks", async () => {
    const bytes = Buffer.from('("é")', "utf8");
    const values = await collectValues([bytes.subarray(0, 3), bytes.subarray(3)]);

    expect(values).toHaveLength(1);
    expect(Sexp.equals(values[0], Sexp.list([Sexp.string("é")]))).toBe(true);
  });

  it.each([
    [["(a 1.", "5)"], Sexp.from(["a", 1.5])],
    [["(a -", "5)"], Sexp.from(["a", -5])],
    [["(a #:", "kw)"], Sexp.list([Sexp.symbol("a"), Sexp.keyword("kw")])],
    [["(a 1", ".5)"], Sexp.from(["a", 1.5])],
  ])("waits for the rest of a token cut at %j", async (chunks, expected) => {
    const values = await collectValues(chunks);

    expect(values).toHaveLength(1);
    expect(Sexp.equals(values[0], expected)).toBe(true);
  });

  it("fails on a token cut off at the end of the stream", async () => {
    let caught: unknown;
    try {
      await collectValues(["(a 1."]);
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof SexpError && caught.code).toBe(ErrorCode.EofWhileParsingValue);
  });

  it("decodes typed values from a file", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "points.sexp");
    await writeFile(filePath, "((x . 1)) ((x . 2))\n((x . 3))\n");

    const points: { x: number }[] = [];
    for await (const point of decodeReadable(createReadStream(filePath), record({ x: i32 }))) {
      points.push(point);
    }

    expect(points).toEqual([{ x: 1 }, { x: 2 }, { x: 3 }]);
  });

  it("fails on a value left incomplete at the end", async () => {
    let caught: unknown;
    try {
      await collectValues(["(a 1) (b"]);
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof SexpError && caught.code).toBe(ErrorCode.EofWhileParsingList);
  });

  it("fails right away on a syntax error", async () => {
    await expect(collectValues(["(a) b", "(c)"])).rejects.toThrow("expected `(` at line 1 column 5");
  });
});
