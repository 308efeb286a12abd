import { describe, expect, it } from "vitest";
import { decodeValue } from "../decoder/decode.js";
import { countValues, emptyCounts } from "./inspect.js";

describe("countValues", () => {
  it("counts every node", () => {
    const counts = countValues(decodeValue('(a 1 -2.5 "s" #t #nil (#:k . tail))'), emptyCounts());

    expect(counts).toEqual({
      items: 0,
      lists: 2,
      atoms: 4,
      numbers: 2,
      booleans: 1,
      nils: 1,
    });
  });

  it("accumulates across values", () => {
    const counts = emptyCounts();
    countValues(decodeValue("(1)"), counts);
    countValues(decodeValue("(())"), counts);

    expect(counts.lists).toBe(3);
    expect(counts.numbers).toBe(1);
  });
});
