import { SexpError } from "../error/error.js";
import type { Atom } from "../value/atom.js";

/**
 * Visitor-style hooks between the codec and typed application data.
 *
 * Decoding: a {@link Deserializer} parses the next value and hands what it
 * found to one `visit*` method of a {@link Visitor}. Aggregates are handed
 * over as access objects so the visitor pulls nested values itself, which
 * keeps decoding single-pass with no intermediate tree.
 *
 * Encoding: a {@link Serialize} implementation describes a value as a
 * sequence of calls on a {@link Serializer}.
 */

export type Next<T> = { done: false; value: T } | { done: true };

export interface Deserialize<T> {
  deserialize(deserializer: Deserializer): T;
}

export interface Serialize<T> {
  serialize(value: T, serializer: Serializer): void;
}

export interface Visitor<T> {
  /** Completes "expected ..." in type mismatch messages, e.g. "a boolean". */
  readonly expecting: string;
  visitBool?(value: boolean): T;
  visitU64?(value: bigint): T;
  visitI64?(value: bigint): T;
  visitF64?(value: number): T;
  visitString?(value: string): T;
  visitBytes?(value: Uint8Array): T;
  /** Bare symbols and keywords. Quoted strings go to `visitString`. */
  visitAtom?(atom: Atom): T;
  visitNil?(): T;
  visitSome?(deserializer: Deserializer): T;
  visitSeq?(seq: SeqAccess): T;
  visitMap?(map: MapAccess): T;
  visitEnum?(data: EnumAccess): T;
}

export interface SeqAccess {
  nextElement<T>(seed: Deserialize<T>): Next<T>;
  /**
   * Reads the tail after ` . ` in an improper list. Only meaningful once
   * `nextElement` has reported `done`; proper lists report `done` here too.
   */
  nextTail<T>(seed: Deserialize<T>): Next<T>;
}

export interface MapAccess {
  nextKey<K>(seed: Deserialize<K>): Next<K>;
  nextValue<V>(seed: Deserialize<V>): V;
}

export interface EnumAccess {
  readonly variant: string;
  unitVariant(): void;
  newtypeVariant<T>(seed: Deserialize<T>): T;
  tupleVariant<T>(visitor: Visitor<T>): T;
  structVariant<T>(visitor: Visitor<T>): T;
}

/**
 * The shapes a typed target may ask for. Implementations are free to treat
 * most requests as `deserializeAny`; the S-expression decoder only changes
 * its behaviour for options, byte strings, keyed aggregates and enums.
 */
export interface Deserializer {
  deserializeAny<T>(visitor: Visitor<T>): T;
  deserializeInteger<T>(visitor: Visitor<T>): T;
  deserializeString<T>(visitor: Visitor<T>): T;
  deserializeBytes<T>(visitor: Visitor<T>): T;
  deserializeOption<T>(visitor: Visitor<T>): T;
  deserializeSeq<T>(visitor: Visitor<T>): T;
  deserializeMap<T>(visitor: Visitor<T>): T;
  deserializeEnum<T>(variants: readonly string[], visitor: Visitor<T>): T;
}

export interface SerializeSeq {
  element<T>(value: T, shape: Serialize<T>): void;
  end(): void;
}

export interface SerializeImproperList extends SerializeSeq {
  /** Writes the final ` . tail`; call once, after the head elements. */
  tail<T>(value: T, shape: Serialize<T>): void;
}

export interface SerializeMap {
  key<K>(key: K, shape: Serialize<K>): void;
  value<V>(value: V, shape: Serialize<V>): void;
  end(): void;
}

export interface SerializeStruct {
  field<T>(key: string, value: T, shape: Serialize<T>): void;
  end(): void;
}

export interface Serializer {
  serializeBool(value: boolean): void;
  serializeI8(value: number): void;
  serializeI16(value: number): void;
  serializeI32(value: number): void;
  serializeI64(value: bigint): void;
  serializeU8(value: number): void;
  serializeU16(value: number): void;
  serializeU32(value: number): void;
  serializeU64(value: bigint): void;
  serializeF32(value: number): void;
  serializeF64(value: number): void;
  serializeChar(value: string): void;
  serializeStr(value: string): void;
  serializeBytes(value: Uint8Array): void;
  serializeSymbol(name: string): void;
  serializeKeyword(name: string): void;
  serializeNone(): void;
  serializeSome<T>(value: T, shape: Serialize<T>): void;
  serializeUnit(): void;
  serializeUnitVariant(variant: string): void;
  serializeNewtypeVariant<T>(variant: string, value: T, shape: Serialize<T>): void;
  serializeSeq(length?: number): SerializeSeq;
  serializeTupleVariant(variant: string, length: number): SerializeSeq;
  serializeImproperList(length?: number): SerializeImproperList;
  serializeMap(length?: number): SerializeMap;
  serializeStruct(length: number): SerializeStruct;
  serializeStructVariant(variant: string, length: number): SerializeStruct;
}

export const invalidType = (found: string, expecting: string): SexpError =>
  SexpError.custom(`invalid type: ${found}, expected ${expecting}`);

export const invalidValue = (found: string, expecting: string): SexpError =>
  SexpError.custom(`invalid value: ${found}, expected ${expecting}`);

const describeAtom = (atom: Atom): string => {
  switch (atom.kind) {
    case "symbol":
      return `symbol \`${atom.text}\``;
    case "keyword":
      return `keyword \`#:${atom.text}\``;
    case "string":
      return `string ${JSON.stringify(atom.text)}`;
  }
};

/**
 * Dispatchers used by deserializers: each calls the matching visitor hook,
 * or fails with a Data error naming what was found.
 */
export const visit = {
  bool<T>(visitor: Visitor<T>, value: boolean): T {
    if (!visitor.visitBool) throw invalidType(`boolean \`${value ? "#t" : "#f"}\``, visitor.expecting);
    return visitor.visitBool(value);
  },
  u64<T>(visitor: Visitor<T>, value: bigint): T {
    if (!visitor.visitU64) throw invalidType(`integer \`${value}\``, visitor.expecting);
    return visitor.visitU64(value);
  },
  i64<T>(visitor: Visitor<T>, value: bigint): T {
    if (!visitor.visitI64) throw invalidType(`integer \`${value}\``, visitor.expecting);
    return visitor.visitI64(value);
  },
  f64<T>(visitor: Visitor<T>, value: number): T {
    if (!visitor.visitF64) throw invalidType(`floating point \`${value}\``, visitor.expecting);
    return visitor.visitF64(value);
  },
  string<T>(visitor: Visitor<T>, value: string): T {
    if (!visitor.visitString) throw invalidType(`string ${JSON.stringify(value)}`, visitor.expecting);
    return visitor.visitString(value);
  },
  bytes<T>(visitor: Visitor<T>, value: Uint8Array): T {
    if (!visitor.visitBytes) throw invalidType("byte array", visitor.expecting);
    return visitor.visitBytes(value);
  },
  atom<T>(visitor: Visitor<T>, atom: Atom): T {
    if (visitor.visitAtom) return visitor.visitAtom(atom);
    if (atom.isString()) return visit.string(visitor, atom.text);
    throw invalidType(describeAtom(atom), visitor.expecting);
  },
  nil<T>(visitor: Visitor<T>): T {
    if (!visitor.visitNil) throw invalidType("nil", visitor.expecting);
    return visitor.visitNil();
  },
  some<T>(visitor: Visitor<T>, deserializer: Deserializer): T {
    if (!visitor.visitSome) throw invalidType("option", visitor.expecting);
    return visitor.visitSome(deserializer);
  },
  seq<T>(visitor: Visitor<T>, seq: SeqAccess): T {
    if (!visitor.visitSeq) throw invalidType("list", visitor.expecting);
    return visitor.visitSeq(seq);
  },
  map<T>(visitor: Visitor<T>, map: MapAccess): T {
    if (!visitor.visitMap) throw invalidType("alist", visitor.expecting);
    return visitor.visitMap(map);
  },
  enum<T>(visitor: Visitor<T>, data: EnumAccess): T {
    if (!visitor.visitEnum) throw invalidType("enum", visitor.expecting);
    return visitor.visitEnum(data);
  },
};

/** A variant written as a bare name. */
export class UnitVariantAccess implements EnumAccess {
  constructor(readonly variant: string) {}

  unitVariant(): void {
    // A bare name is complete.
  }

  newtypeVariant<T>(_seed: Deserialize<T>): T {
    throw invalidType("unit variant", "newtype variant");
  }

  tupleVariant<T>(_visitor: Visitor<T>): T {
    throw invalidType("unit variant", "tuple variant");
  }

  structVariant<T>(_visitor: Visitor<T>): T {
    throw invalidType("unit variant", "struct variant");
  }
}
