import type { Sexp } from "../value/sexp.js";

export type ValueCounts = {
  items: number;
  lists: number;
  atoms: number;
  numbers: number;
  booleans: number;
  nils: number;
};

export const emptyCounts = (): ValueCounts => ({
  items: 0,
  lists: 0,
  atoms: 0,
  numbers: 0,
  booleans: 0,
  nils: 0,
});

/** Adds every node of `value` to `counts`; improper lists count as lists. */
export const countValues = (value: Sexp, counts: ValueCounts): ValueCounts => {
  switch (value.type) {
    case "nil":
      counts.nils += 1;
      break;
    case "atom":
      counts.atoms += 1;
      break;
    case "number":
      counts.numbers += 1;
      break;
    case "boolean":
      counts.booleans += 1;
      break;
    case "list":
      counts.lists += 1;
      value.items.forEach((item) => countValues(item, counts));
      break;
    case "improperList":
      counts.lists += 1;
      value.items.forEach((item) => countValues(item, counts));
      countValues(value.tail, counts);
      break;
  }
  return counts;
};
