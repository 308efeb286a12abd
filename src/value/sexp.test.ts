import { describe, expect, it } from "vitest";
import { Atom } from "./atom.js";
import { I64_MIN, SexpNumber, U64_MAX } from "./number.js";
import { Sexp } from "./sexp.js";

describe("Atom", () => {
  it("discriminates keywords, strings and symbols", () => {
    expect(Atom.discriminate("#:key").kind).toBe("keyword");
    expect(Atom.discriminate("#:key").text).toBe("key");
    expect(Atom.discriminate('"quoted"').kind).toBe("string");
    expect(Atom.discriminate('"quoted"').text).toBe("quoted");
    expect(Atom.discriminate("'single'").text).toBe("single");
    expect(Atom.discriminate("plain").kind).toBe("symbol");
    expect(Atom.discriminate('"').kind).toBe("symbol");
  });

  it("compares kind and text", () => {
    expect(Atom.symbol("a").equals(Atom.symbol("a"))).toBe(true);
    expect(Atom.symbol("a").equals(Atom.string("a"))).toBe(false);
  });
});

describe("SexpNumber", () => {
  it("stores non-negative signed integers as unsigned", () => {
    const number = SexpNumber.fromI64(5n);

    expect(number.isU64()).toBe(true);
    expect(number.asU64()).toBe(5n);
    expect(number.asI64()).toBe(5n);
  });

  it("reports i64 only for values in range", () => {
    expect(SexpNumber.fromU64(U64_MAX).isI64()).toBe(false);
    expect(SexpNumber.fromU64(U64_MAX).asI64()).toBeUndefined();
    expect(SexpNumber.fromI64(I64_MIN).asI64()).toBe(I64_MIN);
    expect(SexpNumber.fromI64(-1n).asU64()).toBeUndefined();
  });

  it("rejects values outside the integer ranges", () => {
    expect(() => SexpNumber.fromU64(U64_MAX + 1n)).toThrow(RangeError);
    expect(() => SexpNumber.fromI64(I64_MIN - 1n)).toThrow(RangeError);
  });

  it("refuses non-finite floats", () => {
    expect(SexpNumber.fromF64(Number.NaN)).toBeUndefined();
    expect(SexpNumber.fromF64(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(SexpNumber.fromF64(1.5)?.asF64()).toBe(1.5);
  });

  it("widens safe integers to integer variants", () => {
    expect(SexpNumber.from(7)?.isU64()).toBe(true);
    expect(SexpNumber.from(-7)?.asI64()).toBe(-7n);
    expect(SexpNumber.from(0.25)?.isF64()).toBe(true);
  });

  it("keeps integral doubles past 2^53 as floats", () => {
    expect(SexpNumber.from(2 ** 60)?.isF64()).toBe(true);
    expect(SexpNumber.from(1e20)?.asF64()).toBe(1e20);
    expect(SexpNumber.from(2n ** 60n)?.asU64()).toBe(2n ** 60n);
    expect(() => SexpNumber.from(2n ** 64n)).toThrow(RangeError);
  });

  it("distinguishes integers from floats of the same value", () => {
    const integer = SexpNumber.fromU64(1n);
    const float = SexpNumber.fromF64(1);

    expect(float).toBeDefined();
    expect(float && integer.equals(float)).toBe(false);
    expect(integer.asF64()).toBe(1);
  });
});

describe("Sexp", () => {
  it("collapses a nil tail into a proper list", () => {
    const value = Sexp.improperList([Sexp.symbol("a")], Sexp.nil);

    expect(value.type).toBe("list");
  });

  it("returns the tail itself when there are no head items", () => {
    expect(Sexp.equals(Sexp.improperList([], Sexp.symbol("b")), Sexp.symbol("b"))).toBe(true);
  });

  it("builds pairs with discriminated keys", () => {
    const entry = Sexp.entry('"name"', Sexp.from(3));

    expect(entry.type).toBe("improperList");
    if (entry.type === "improperList") {
      expect(entry.items[0]).toEqual(Sexp.string("name"));
      expect(Sexp.equals(entry.tail, Sexp.from(3))).toBe(true);
    }
  });

  it("converts plain values", () => {
    const value = Sexp.from([true, 1, -2, 0.5, "sym", "#:kw", null, [undefined]]);

    expect(
      Sexp.equals(
        value,
        Sexp.list([
          Sexp.boolean(true),
          Sexp.number(SexpNumber.fromU64(1n)),
          Sexp.number(SexpNumber.fromI64(-2n)),
          Sexp.from(0.5),
          Sexp.symbol("sym"),
          Sexp.keyword("kw"),
          Sexp.nil,
          Sexp.list([Sexp.nil]),
        ])
      )
    ).toBe(true);
  });

  it("maps non-finite numbers to nil", () => {
    expect(Sexp.from(Number.NaN)).toEqual(Sexp.nil);
  });

  it("compares structurally", () => {
    const left = Sexp.improperList([Sexp.from(1), Sexp.from(2)], Sexp.symbol("rest"));
    const right = Sexp.improperList([Sexp.from(1), Sexp.from(2)], Sexp.symbol("rest"));

    expect(Sexp.equals(left, right)).toBe(true);
    expect(Sexp.equals(left, Sexp.list([Sexp.from(1), Sexp.from(2)]))).toBe(false);
    expect(Sexp.equals(Sexp.from(1), Sexp.from(1.5))).toBe(false);
  });

  it("freezes item arrays", () => {
    const value = Sexp.list([Sexp.nil]);

    expect(value.type === "list" && Object.isFrozen(value.items)).toBe(true);
  });
});
