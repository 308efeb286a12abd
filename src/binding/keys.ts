import { SexpError } from "../error/error.js";
import { I64_MIN, U64_MAX } from "../value/number.js";
import { UnitVariantAccess, visit } from "./binding.js";
import type {
  Deserializer,
  Serialize,
  SerializeImproperList,
  SerializeMap,
  SerializeSeq,
  SerializeStruct,
  Serializer,
  Visitor,
} from "./binding.js";

const INTEGER_TEXT = /^-?(?:0|[1-9][0-9]*)$/;

/**
 * Accepts only string-like keys: strings, chars, symbols, keywords, integers
 * (as decimal text) and unit variant tags. Anything else is
 * `KeyMustBeAString`.
 */
class KeySerializer implements Serializer {
  key: string | undefined;

  serializeBool(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeI8(value: number): void {
    this.key = String(value);
  }

  serializeI16(value: number): void {
    this.key = String(value);
  }

  serializeI32(value: number): void {
    this.key = String(value);
  }

  serializeI64(value: bigint): void {
    this.key = String(value);
  }

  serializeU8(value: number): void {
    this.key = String(value);
  }

  serializeU16(value: number): void {
    this.key = String(value);
  }

  serializeU32(value: number): void {
    this.key = String(value);
  }

  serializeU64(value: bigint): void {
    this.key = String(value);
  }

  serializeF32(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeF64(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeChar(value: string): void {
    this.key = value;
  }

  serializeStr(value: string): void {
    this.key = value;
  }

  serializeBytes(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeSymbol(name: string): void {
    this.key = name;
  }

  serializeKeyword(name: string): void {
    this.key = name;
  }

  serializeNone(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeSome(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeUnit(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeUnitVariant(variant: string): void {
    this.key = variant;
  }

  serializeNewtypeVariant(): void {
    throw SexpError.keyMustBeAString();
  }

  serializeSeq(): SerializeSeq {
    throw SexpError.keyMustBeAString();
  }

  serializeTupleVariant(): SerializeSeq {
    throw SexpError.keyMustBeAString();
  }

  serializeImproperList(): SerializeImproperList {
    throw SexpError.keyMustBeAString();
  }

  serializeMap(): SerializeMap {
    throw SexpError.keyMustBeAString();
  }

  serializeStruct(): SerializeStruct {
    throw SexpError.keyMustBeAString();
  }

  serializeStructVariant(): SerializeStruct {
    throw SexpError.keyMustBeAString();
  }
}

export const keyToString = <K>(key: K, shape: Serialize<K>): string => {
  const serializer = new KeySerializer();
  shape.serialize(key, serializer);
  if (serializer.key === undefined) {
    throw SexpError.keyMustBeAString();
  }
  return serializer.key;
};

/** Hands a key's text to whatever shape the key is declared as. */
export class KeyDeserializer implements Deserializer {
  constructor(private readonly key: string) {}

  deserializeAny<T>(visitor: Visitor<T>): T {
    return visit.string(visitor, this.key);
  }

  deserializeInteger<T>(visitor: Visitor<T>): T {
    if (!INTEGER_TEXT.test(this.key)) {
      return visit.string(visitor, this.key);
    }
    const value = BigInt(this.key);
    if (value < I64_MIN || value > U64_MAX) {
      return visit.string(visitor, this.key);
    }
    return value < 0n ? visit.i64(visitor, value) : visit.u64(visitor, value);
  }

  deserializeString<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeBytes<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeOption<T>(visitor: Visitor<T>): T {
    return visit.some(visitor, this);
  }

  deserializeSeq<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeMap<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeEnum<T>(_variants: readonly string[], visitor: Visitor<T>): T {
    return visit.enum(visitor, new UnitVariantAccess(this.key));
  }
}
