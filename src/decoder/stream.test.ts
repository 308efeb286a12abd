import { describe, expect, it } from "vitest";
import { i32, record } from "../binding/shapes.js";
import { ErrorCode, SexpError } from "../error/error.js";
import { Sexp } from "../value/sexp.js";
import { streamDecoder, streamValues } from "./stream.js";

const errorOf = (run: () => unknown): SexpError => {
  try {
    run();
  } catch (error) {
    if (error instanceof SexpError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a SexpError");
};

describe("StreamDecoder", () => {
  it("yields each top-level list and tracks the offset", () => {
    const stream = streamValues("(a 1) (b 2)");

    const first = stream.next();
    expect(first.done).toBe(false);
    expect(first.value && Sexp.equals(first.value, Sexp.from(["a", 1]))).toBe(true);
    expect(stream.byteOffset()).toBe(5);

    stream.next();
    expect(stream.byteOffset()).toBe(11);
    expect(stream.next().done).toBe(true);
    expect(stream.byteOffset()).toBe(11);
  });

  it("counts the offset in UTF-8 bytes", () => {
    const stream = streamValues('("é") (x)');
    stream.next();

    expect(stream.byteOffset()).toBe(6);
  });

  it("decodes typed values", () => {
    const values = [...streamDecoder("((a . 1)) ((a . 2))", record({ a: i32 }))];

    expect(values).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it("accepts bytes", () => {
    const values = [...streamValues(new TextEncoder().encode("() ()"))];

    expect(values).toHaveLength(2);
  });

  it("ends on whitespace-only input", () => {
    const stream = streamValues("  \n");

    expect(stream.next().done).toBe(true);
    expect(stream.byteOffset()).toBe(3);
  });

  it("keeps the offset of the last good value after a partial one", () => {
    const text = "(a 1) (b";
    const stream = streamValues(text);
    stream.next();

    const error = errorOf(() => stream.next());
    expect(error.code).toBe(ErrorCode.EofWhileParsingList);
    expect(error.isEof()).toBe(true);
    expect(stream.byteOffset()).toBe(5);
    expect(stream.next().done).toBe(true);

    const resumed = streamValues(`${text.slice(stream.byteOffset())} 2)`);
    const next = resumed.next();
    expect(next.value && Sexp.equals(next.value, Sexp.from(["b", 2]))).toBe(true);
  });

  it("accepts only lists at the top level", () => {
    const stream = streamValues("(a) b");
    stream.next();

    const error = errorOf(() => stream.next());
    expect(error.code).toBe(ErrorCode.ExpectedList);
    expect(error.message).toBe("expected `(` at line 1 column 5");
    expect(stream.next().done).toBe(true);
    expect(stream.byteOffset()).toBe(3);
  });
});
