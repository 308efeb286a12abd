import { describe, expect, it } from "vitest";
import { Encoder } from "./encoder.js";
import { CharEscape, ESCAPE, Formatter, formatF32, formatF64 } from "./formatter.js";
import { StringOutput } from "./output.js";
import type { Output } from "./output.js";

describe("formatF64", () => {
  it.each([
    [1, "1.0"],
    [0.5, "0.5"],
    [-2.5, "-2.5"],
    [-0, "-0.0"],
    [1e21, "1000000000000000000000.0"],
    [1.23e22, "12300000000000000000000.0"],
    [1.5e-7, "0.00000015"],
    [-1e-7, "-0.0000001"],
  ])("writes %s as %s", (value, text) => {
    expect(formatF64(value)).toBe(text);
  });
});

describe("formatF32", () => {
  it("picks the shortest text for the single-precision value", () => {
    expect(formatF32(Math.fround(0.1))).toBe("0.1");
    expect(formatF32(16777217)).toBe("16777216.0");
    expect(formatF32(1e10)).toBe("10000000000.0");
    expect(formatF32(-0)).toBe("-0.0");
  });
});

describe("ESCAPE", () => {
  it("covers quotes, backslashes and control bytes only", () => {
    expect(ESCAPE[0x22]).toBe(CharEscape.Quote);
    expect(ESCAPE[0x5c]).toBe(CharEscape.ReverseSolidus);
    expect(ESCAPE[0x0a]).toBe(CharEscape.LineFeed);
    expect(ESCAPE[0x01]).toBe(CharEscape.AsciiControl);
    expect(ESCAPE[0x2f]).toBeUndefined();
    expect(ESCAPE[0x7f]).toBeUndefined();
  });
});

describe("Formatter hooks", () => {
  it("escapes strings through the formatter", () => {
    const output = new StringOutput();
    new Encoder(output).writeString('a"b\\c\n\u0001é');

    expect(output.toString()).toBe('"a\\"b\\\\c\\n\\u0001é"');
  });

  it("lets a subclass change single events", () => {
    class UpperBooleans extends Formatter {
      writeBool(out: Output, value: boolean): void {
        out.write(value ? "#T" : "#F");
      }
    }
    const output = new StringOutput();
    const encoder = new Encoder(output, new UpperBooleans());
    const seq = encoder.serializeSeq();
    seq.element(true, { serialize: (value, serializer) => serializer.serializeBool(value) });
    seq.element(false, { serialize: (value, serializer) => serializer.serializeBool(value) });
    seq.end();

    expect(output.toString()).toBe("(#T #F)");
  });
});
