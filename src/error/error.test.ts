import { describe, expect, it } from "vitest";
import { Category, ErrorCode, SexpError } from "./error.js";

describe("SexpError", () => {
  it("formats the position into the message", () => {
    const error = SexpError.syntax(ErrorCode.TrailingCharacters, 3, 7);

    expect(error.message).toBe("trailing characters at line 3 column 7");
    expect(error.line).toBe(3);
    expect(error.column).toBe(7);
  });

  it("leaves the position out when it is unknown", () => {
    expect(SexpError.custom("missing field `a`").message).toBe("missing field `a`");
  });

  it("classifies codes", () => {
    expect(SexpError.syntax(ErrorCode.EofWhileParsingString, 1, 2).classify()).toBe(Category.Eof);
    expect(SexpError.syntax(ErrorCode.InvalidNumber, 1, 2).classify()).toBe(Category.Syntax);
    expect(SexpError.custom("boom").classify()).toBe(Category.Data);
    expect(SexpError.keyMustBeAString().classify()).toBe(Category.Data);
    expect(SexpError.io(new Error("disk full")).classify()).toBe(Category.Io);
  });

  it("answers the category predicates", () => {
    const eof = SexpError.syntax(ErrorCode.EofWhileParsingList, 1, 1);

    expect(eof.isEof()).toBe(true);
    expect(eof.isSyntax()).toBe(false);
    expect(eof.isData()).toBe(false);
    expect(eof.isIo()).toBe(false);
  });

  it("keeps the cause of io errors", () => {
    const cause = new Error("disk full");
    const error = SexpError.io(cause);

    expect(error.code).toBe(ErrorCode.Io);
    expect(error.message).toBe("disk full");
    expect(error.cause).toBe(cause);
  });

  it("positions an error only once", () => {
    const error = SexpError.custom("invalid type: nil, expected a string");
    const positioned = error.withPosition(2, 5);

    expect(positioned.message).toBe("invalid type: nil, expected a string at line 2 column 5");
    expect(positioned.withPosition(9, 9)).toBe(positioned);
    expect(error.line).toBe(0);
  });
});
