import type {
  Serialize,
  SerializeImproperList,
  SerializeMap,
  SerializeSeq,
  SerializeStruct,
  Serializer,
} from "../binding/binding.js";
import { keyToString } from "../binding/keys.js";
import { SexpNumber } from "./number.js";
import { Sexp } from "./sexp.js";

const integer = (value: number | bigint): Sexp => {
  const number = SexpNumber.from(typeof value === "bigint" ? value : BigInt(value));
  return number ? Sexp.number(number) : Sexp.nil;
};

const float = (value: number): Sexp => {
  const number = SexpNumber.fromF64(value);
  return number ? Sexp.number(number) : Sexp.nil;
};

const entry = (key: string, value: Sexp): Sexp => Sexp.improperList([Sexp.string(key)], value);

class SeqBuilder implements SerializeImproperList {
  private readonly items: Sexp[];
  private tailValue: Sexp = Sexp.nil;

  constructor(
    private readonly done: (value: Sexp) => void,
    prefix: readonly Sexp[] = []
  ) {
    this.items = [...prefix];
  }

  element<T>(value: T, shape: Serialize<T>): void {
    this.items.push(toValue(value, shape));
  }

  tail<T>(value: T, shape: Serialize<T>): void {
    this.tailValue = toValue(value, shape);
  }

  end(): void {
    this.done(Sexp.improperList(this.items, this.tailValue));
  }
}

class EntriesBuilder implements SerializeMap, SerializeStruct {
  private readonly entries: Sexp[];
  private pendingKey: string | undefined;

  constructor(
    private readonly done: (value: Sexp) => void,
    prefix: readonly Sexp[] = []
  ) {
    this.entries = [...prefix];
  }

  key<K>(key: K, shape: Serialize<K>): void {
    this.pendingKey = keyToString(key, shape);
  }

  value<V>(value: V, shape: Serialize<V>): void {
    if (this.pendingKey === undefined) {
      throw new Error("map value serialized before its key");
    }
    this.entries.push(entry(this.pendingKey, toValue(value, shape)));
    this.pendingKey = undefined;
  }

  field<T>(key: string, value: T, shape: Serialize<T>): void {
    this.entries.push(entry(key, toValue(value, shape)));
  }

  end(): void {
    this.done(Sexp.list(this.entries));
  }
}

/**
 * Builds a {@link Sexp} with the same layout the text encoder writes: maps
 * and records become lists of `("key" . value)` pairs, variants with data
 * become lists headed by the variant name.
 */
class ValueSerializer implements Serializer {
  private result: Sexp | undefined;

  take(): Sexp {
    if (this.result === undefined) {
      throw new Error("shape did not serialize a value");
    }
    return this.result;
  }

  private readonly settle = (value: Sexp): void => {
    this.result = value;
  };

  serializeBool(value: boolean): void {
    this.result = Sexp.boolean(value);
  }

  serializeI8(value: number): void {
    this.result = integer(value);
  }

  serializeI16(value: number): void {
    this.result = integer(value);
  }

  serializeI32(value: number): void {
    this.result = integer(value);
  }

  serializeI64(value: bigint): void {
    this.result = integer(value);
  }

  serializeU8(value: number): void {
    this.result = integer(value);
  }

  serializeU16(value: number): void {
    this.result = integer(value);
  }

  serializeU32(value: number): void {
    this.result = integer(value);
  }

  serializeU64(value: bigint): void {
    this.result = integer(value);
  }

  serializeF32(value: number): void {
    this.result = float(value);
  }

  serializeF64(value: number): void {
    this.result = float(value);
  }

  serializeChar(value: string): void {
    this.result = Sexp.string(value);
  }

  serializeStr(value: string): void {
    this.result = Sexp.string(value);
  }

  serializeBytes(value: Uint8Array): void {
    this.result = Sexp.list(Array.from(value, (byte) => integer(byte)));
  }

  serializeSymbol(name: string): void {
    this.result = Sexp.symbol(name);
  }

  serializeKeyword(name: string): void {
    this.result = Sexp.keyword(name);
  }

  serializeNone(): void {
    this.result = Sexp.nil;
  }

  serializeSome<T>(value: T, shape: Serialize<T>): void {
    shape.serialize(value, this);
  }

  serializeUnit(): void {
    this.result = Sexp.nil;
  }

  serializeUnitVariant(variant: string): void {
    this.result = Sexp.string(variant);
  }

  serializeNewtypeVariant<T>(variant: string, value: T, shape: Serialize<T>): void {
    this.result = Sexp.list([Sexp.string(variant), toValue(value, shape)]);
  }

  serializeSeq(): SerializeSeq {
    return new SeqBuilder(this.settle);
  }

  serializeTupleVariant(variant: string): SerializeSeq {
    return new SeqBuilder(this.settle, [Sexp.string(variant)]);
  }

  serializeImproperList(): SerializeImproperList {
    return new SeqBuilder(this.settle);
  }

  serializeMap(): SerializeMap {
    return new EntriesBuilder(this.settle);
  }

  serializeStruct(): SerializeStruct {
    return new EntriesBuilder(this.settle);
  }

  serializeStructVariant(variant: string): SerializeStruct {
    return new EntriesBuilder(this.settle, [Sexp.string(variant)]);
  }
}

export const toValue = <T>(value: T, shape: Serialize<T>): Sexp => {
  const serializer = new ValueSerializer();
  shape.serialize(value, serializer);
  return serializer.take();
};
