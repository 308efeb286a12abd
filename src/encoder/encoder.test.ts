import { describe, expect, it } from "vitest";
import {
  array,
  bool,
  enumeration,
  f32,
  f64,
  i32,
  map,
  record,
  sexp,
  string,
  structVariant,
  unitVariant,
} from "../binding/shapes.js";
import type { Serialize } from "../binding/binding.js";
import { decodeValue } from "../decoder/decode.js";
import { ErrorCode, SexpError } from "../error/error.js";
import { SexpNumber } from "../value/number.js";
import { Sexp } from "../value/sexp.js";
import {
  encode,
  encodePretty,
  toBytes,
  toBytesPretty,
  toString,
  toStringPretty,
  toWriter,
  toWriterPretty,
} from "./encode.js";

const Shape = enumeration({ Point: structVariant({ x: i32, y: i32 }) });

const collectingSink = () => {
  const chunks: Uint8Array[] = [];
  return {
    chunks,
    write: (bytes: Uint8Array) => {
      chunks.push(bytes);
    },
    text: () => chunks.map((chunk) => new TextDecoder().decode(chunk)).join(""),
  };
};

describe("compact encoding", () => {
  it("writes atoms and numbers", () => {
    expect(encode(Sexp.from([1, -2, 0.5, "a", "#:k", true, false, null]))).toBe(
      "(1 -2 0.5 a #:k #t #f #nil)"
    );
    expect(encode(Sexp.list([Sexp.string("x y")]))).toBe('("x y")');
  });

  it("writes floats with a fractional part", () => {
    const two = SexpNumber.fromF64(2);

    expect(two && encode(Sexp.number(two))).toBe("2.0");
  });

  it("writes non-finite floats as nil", () => {
    expect(toString([Number.NaN, Number.POSITIVE_INFINITY], array(f64))).toBe("(#nil #nil)");
    expect(toString([Number.NEGATIVE_INFINITY], array(f32))).toBe("(#nil)");
  });

  it("writes improper lists", () => {
    expect(encode(Sexp.improperList([Sexp.from(1)], Sexp.symbol("b")))).toBe("(1 . b)");
    expect(encode(Sexp.improperList([Sexp.from(1), Sexp.from(2)], Sexp.from(3)))).toBe(
      "(1 2 . 3)"
    );
  });

  it("refuses symbols and keywords that would not read back", () => {
    expect(() => encode(Sexp.from("hello world"))).toThrow(
      'invalid value: symbol "hello world", expected a letter followed by no delimiters'
    );
    expect(() => encode(Sexp.symbol("1a"))).toThrow('invalid value: symbol "1a"');
    expect(() => encode(Sexp.list([Sexp.symbol("a(b")]))).toThrow('symbol "a(b"');
    expect(() => encodePretty(Sexp.keyword(""))).toThrow(
      'invalid value: keyword "", expected a non-empty name without delimiters'
    );

    let caught: unknown;
    try {
      encode(Sexp.symbol(""));
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof SexpError && caught.isData()).toBe(true);
  });

  it("writes bare names that read back", () => {
    const value = Sexp.list([Sexp.symbol("a.b-c#"), Sexp.keyword("1x")]);

    expect(encode(value)).toBe("(a.b-c# #:1x)");
    expect(Sexp.equals(decodeValue(encode(value)), value)).toBe(true);
  });

  it("writes struct variants as a name followed by entries", () => {
    expect(toString({ tag: "Point", value: { x: 1, y: 2 } }, Shape)).toBe(
      '("Point" ("x" . 1) ("y" . 2))'
    );
  });
});

describe("pretty encoding", () => {
  it("puts each element on its own line", () => {
    expect(encodePretty(Sexp.from([1, [2, 3], []]))).toBe(
      "(\n  1\n  (\n    2\n    3\n  )\n  ()\n)"
    );
  });

  it("honours the indent", () => {
    expect(encodePretty(Sexp.from([1]), "\t")).toBe("(\n\t1\n)");
  });

  it("indents entries and nested values", () => {
    const Item = record({ a: array(i32) });

    expect(toStringPretty({ a: [1, 2] }, Item)).toBe('(\n  ("a" . (\n    1\n    2\n  ))\n)');
    expect(toStringPretty({}, record({}))).toBe("()");
  });

  it("puts the tail of an improper list on its own line", () => {
    expect(encodePretty(Sexp.improperList([Sexp.from(1)], Sexp.symbol("b")))).toBe(
      "(\n  1\n  . b\n)"
    );
  });

  it("writes struct variants", () => {
    expect(toStringPretty({ tag: "Point", value: { x: 1, y: 2 } }, Shape)).toBe(
      '(\n  "Point"\n  ("x" . 1)\n  ("y" . 2)\n)'
    );
  });
});

describe("round trips", () => {
  const values: [string, Sexp][] = [
    ["atoms", Sexp.from([1, -2, 0.25, "sym", "#:kw", '"text"', true, null])],
    ["nesting", Sexp.from([[[]], [1, [2]]])],
    ["pairs", Sexp.list([Sexp.entry("a", Sexp.from(1)), Sexp.entry('"b c"', Sexp.from([2]))])],
    ["escapes", Sexp.string('tab\there "quoted" \\ \u0002 é')],
    ["extremes", Sexp.from([18446744073709551615n, -9223372036854775808n, 1.5e-7, 123.456])],
  ];

  it.each(values)("reads back %s from compact text", (_name, value) => {
    expect(Sexp.equals(decodeValue(encode(value)), value)).toBe(true);
  });

  it.each(values)("reads back %s from pretty text", (_name, value) => {
    expect(Sexp.equals(decodeValue(encodePretty(value)), value)).toBe(true);
  });

  it("re-encodes canonical text unchanged", () => {
    const text = '(1 -2 0.5 "s" sym #:kw #t #f #nil (a . b) ())';

    expect(encode(decodeValue(text))).toBe(text);
  });
});

describe("map keys", () => {
  const layouts: [string, <T>(value: T, shape: Serialize<T>) => string][] = [
    ["compact", toString],
    ["pretty", toStringPretty],
  ];

  it.each(layouts)("rejects boolean and float keys in %s output", (_name, write) => {
    const codes = [
      () => write(new Map([[true, 1]]), map(bool, i32)),
      () => write(new Map([[1.5, 1]]), map(f64, i32)),
    ].map((run) => {
      try {
        run();
      } catch (error) {
        return error instanceof SexpError ? error.code : undefined;
      }
      return undefined;
    });

    expect(codes).toEqual([ErrorCode.KeyMustBeAString, ErrorCode.KeyMustBeAString]);
  });

  it("writes unit variant keys as strings", () => {
    const Color = enumeration({ Red: unitVariant });
    const value = new Map([[{ tag: "Red" as const, value: null }, 1]]);

    expect(toString(value, map(Color, i32))).toBe('(("Red" . 1))');
  });
});

describe("byte and sink outputs", () => {
  it("produces UTF-8 bytes", () => {
    expect(toBytes(Sexp.string("é"), sexp)).toEqual(Uint8Array.of(0x22, 0xc3, 0xa9, 0x22));
    expect(new TextDecoder().decode(toBytesPretty(["a"], array(string)))).toBe('(\n  "a"\n)');
  });

  it("writes to a sink", () => {
    const sink = collectingSink();
    toWriter(sink, [1, 2], array(i32));
    toWriterPretty(sink, [3], array(i32), " ");

    expect(sink.text()).toBe("(1 2)(\n 3\n)");
  });

  it("wraps sink failures as io errors", () => {
    const failing = {
      write: () => {
        throw new Error("disk full");
      },
    };
    let caught: unknown;
    try {
      toWriter(failing, [1], array(i32));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SexpError);
    expect(caught instanceof SexpError && caught.code).toBe(ErrorCode.Io);
  });
});
