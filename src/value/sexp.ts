import { Atom } from "./atom.js";
import { SexpNumber } from "./number.js";

/**
 * The in-memory form of any S-expression document. Values are immutable,
 * finite trees: build a new value rather than editing one.
 *
 * An `improperList` always has at least one head element and a tail that
 * is not `nil`; {@link Sexp.improperList} collapses the other cases.
 */
export type Sexp =
  | { readonly type: "nil" }
  | { readonly type: "atom"; readonly atom: Atom }
  | { readonly type: "number"; readonly number: SexpNumber }
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "list"; readonly items: readonly Sexp[] }
  | {
      readonly type: "improperList";
      readonly items: readonly Sexp[];
      readonly tail: Sexp;
    };

export type SexpType = Sexp["type"];

/** Plain JavaScript values accepted by {@link Sexp.from}. */
export type PlainValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Atom
  | SexpNumber
  | Sexp
  | PlainValue[];

const NIL: Sexp = { type: "nil" };

const atom = (value: Atom): Sexp => ({ type: "atom", atom: value });

const list = (items: readonly Sexp[]): Sexp => ({ type: "list", items: Object.freeze([...items]) });

const improperList = (items: readonly Sexp[], tail: Sexp): Sexp => {
  if (tail.type === "nil") {
    return list(items);
  }
  if (items.length === 0) {
    return tail;
  }
  return { type: "improperList", items: Object.freeze([...items]), tail };
};

const fromNumber = (value: number | bigint): Sexp => {
  const number = SexpNumber.from(value);
  return number ? { type: "number", number } : NIL;
};

const from = (value: PlainValue): Sexp => {
  if (value === null || value === undefined) {
    return NIL;
  }
  if (Array.isArray(value)) {
    return list(value.map(from));
  }
  if (value instanceof Atom) {
    return atom(value);
  }
  if (value instanceof SexpNumber) {
    return { type: "number", number: value };
  }
  switch (typeof value) {
    case "boolean":
      return { type: "boolean", value };
    case "number":
    case "bigint":
      return fromNumber(value);
    case "string":
      return atom(Atom.discriminate(value));
    default:
      return value;
  }
};

const equals = (left: Sexp, right: Sexp): boolean => {
  switch (left.type) {
    case "nil":
      return right.type === "nil";
    case "atom":
      return right.type === "atom" && left.atom.equals(right.atom);
    case "number":
      return right.type === "number" && left.number.equals(right.number);
    case "boolean":
      return right.type === "boolean" && left.value === right.value;
    case "list":
      return right.type === "list" && itemsEqual(left.items, right.items);
    case "improperList":
      return (
        right.type === "improperList" &&
        itemsEqual(left.items, right.items) &&
        equals(left.tail, right.tail)
      );
  }
};

const itemsEqual = (left: readonly Sexp[], right: readonly Sexp[]): boolean =>
  left.length === right.length && left.every((item, index) => equals(item, right[index]));

export const Sexp = {
  nil: NIL,
  atom,
  symbol: (name: string): Sexp => atom(Atom.symbol(name)),
  keyword: (name: string): Sexp => atom(Atom.keyword(name)),
  string: (text: string): Sexp => atom(Atom.string(text)),
  number: (number: SexpNumber): Sexp => ({ type: "number", number }),
  boolean: (value: boolean): Sexp => ({ type: "boolean", value }),
  list,
  improperList,
  /** A `(key . value)` pair; the key text is discriminated into an atom. */
  entry: (key: string, value: Sexp): Sexp => improperList([atom(Atom.discriminate(key))], value),
  from,
  equals,
};
