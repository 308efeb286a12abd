import { describe, expect, it } from "vitest";
import { ErrorCode, SexpError } from "../error/error.js";
import { Sexp } from "../value/sexp.js";
import { KeyDeserializer, keyToString } from "./keys.js";
import {
  bool,
  char,
  enumeration,
  f64,
  i32,
  i64,
  option,
  sexp,
  string,
  u64,
  u8,
  unit,
  unitVariant,
} from "./shapes.js";

const Color = enumeration({ Red: unitVariant, Green: unitVariant });

const codeOf = (run: () => unknown): ErrorCode | undefined => {
  try {
    run();
  } catch (error) {
    if (error instanceof SexpError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
};

describe("keyToString", () => {
  it("accepts string-like keys", () => {
    expect(keyToString("k", string)).toBe("k");
    expect(keyToString("é", char)).toBe("é");
    expect(keyToString(5, i32)).toBe("5");
    expect(keyToString(-7n, i64)).toBe("-7");
    expect(keyToString({ tag: "Red", value: null }, Color)).toBe("Red");
    expect(keyToString(Sexp.symbol("sym"), sexp)).toBe("sym");
  });

  it.each([
    ["a boolean", () => keyToString(true, bool)],
    ["a float", () => keyToString(1.5, f64)],
    ["unit", () => keyToString(null, unit)],
    ["a list", () => keyToString(Sexp.from([1]), sexp)],
  ])("rejects %s", (_name, run) => {
    expect(codeOf(run)).toBe(ErrorCode.KeyMustBeAString);
  });
});

describe("KeyDeserializer", () => {
  it("parses integer keys", () => {
    expect(i32.deserialize(new KeyDeserializer("42"))).toBe(42);
    expect(i32.deserialize(new KeyDeserializer("-3"))).toBe(-3);
  });

  it("hands non-integer text to the shape as a string", () => {
    expect(() => u8.deserialize(new KeyDeserializer("x"))).toThrow(
      'invalid type: string "x", expected u8'
    );
    expect(() => u64.deserialize(new KeyDeserializer("18446744073709551616"))).toThrow(
      'invalid type: string "18446744073709551616", expected u64'
    );
    expect(() => u8.deserialize(new KeyDeserializer("007"))).toThrow(
      'invalid type: string "007", expected u8'
    );
  });

  it("does not turn text into booleans", () => {
    expect(() => bool.deserialize(new KeyDeserializer("true"))).toThrow(
      'invalid type: string "true", expected a boolean'
    );
  });

  it("reads strings, options and dynamic values", () => {
    expect(string.deserialize(new KeyDeserializer("k"))).toBe("k");
    expect(option(string).deserialize(new KeyDeserializer("k"))).toBe("k");
    expect(Sexp.equals(sexp.deserialize(new KeyDeserializer("k")), Sexp.string("k"))).toBe(true);
  });

  it("reads unit variant tags", () => {
    expect(Color.deserialize(new KeyDeserializer("Green"))).toEqual({ tag: "Green", value: null });
    expect(() => Color.deserialize(new KeyDeserializer("Blue"))).toThrow(
      "unknown variant `Blue`, expected one of `Red`, `Green`"
    );
  });
});
