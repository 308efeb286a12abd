import type {
  Serialize,
  SerializeImproperList,
  SerializeMap,
  SerializeSeq,
  SerializeStruct,
  Serializer,
} from "../binding/binding.js";
import { invalidValue } from "../binding/binding.js";
import { keyToString } from "../binding/keys.js";
import { CompactFormatter, ESCAPE } from "./formatter.js";
import type { Formatter } from "./formatter.js";
import type { Output } from "./output.js";

/** Names the decoder reads back as a single bare symbol or keyword. */
const BARE_SYMBOL = /^[A-Za-z][^ \t\n\r()"]*$/;
const BARE_KEYWORD = /^[^ \t\n\r()"]+$/;

class SeqEncoder implements SerializeImproperList {
  constructor(
    private readonly encoder: Encoder,
    private first: boolean
  ) {}

  element<T>(value: T, shape: Serialize<T>): void {
    const { formatter, output } = this.encoder;
    formatter.beginArrayValue(output, this.first);
    this.first = false;
    shape.serialize(value, this.encoder);
    formatter.endArrayValue(output);
  }

  tail<T>(value: T, shape: Serialize<T>): void {
    const { formatter, output } = this.encoder;
    formatter.beginTail(output);
    shape.serialize(value, this.encoder);
    formatter.endTail(output);
  }

  end(): void {
    this.encoder.formatter.endArray(this.encoder.output);
  }
}

class EntriesEncoder implements SerializeMap, SerializeStruct {
  constructor(
    private readonly encoder: Encoder,
    private first: boolean,
    private readonly closing: "object" | "array"
  ) {}

  key<K>(key: K, shape: Serialize<K>): void {
    this.writeKey(keyToString(key, shape));
  }

  value<V>(value: V, shape: Serialize<V>): void {
    const { formatter, output } = this.encoder;
    formatter.beginObjectValue(output);
    shape.serialize(value, this.encoder);
    formatter.endObjectValue(output);
  }

  field<T>(key: string, value: T, shape: Serialize<T>): void {
    this.writeKey(key);
    this.value(value, shape);
  }

  end(): void {
    const { formatter, output } = this.encoder;
    if (this.closing === "object") {
      formatter.endObject(output);
    } else {
      formatter.endArray(output);
    }
  }

  private writeKey(key: string): void {
    const { formatter, output } = this.encoder;
    formatter.beginObjectKey(output, this.first);
    this.first = false;
    this.encoder.writeString(key);
  }
}

/**
 * Serializes values as S-expression text, calling the {@link Formatter}
 * for every lexical event.
 *
 * Variants are written as `"Name"` (unit), `("Name" value)` (newtype),
 * `("Name" a b)` (tuple) and `("Name" ("field" . value) ...)` (struct).
 * Keyed aggregates become association lists.
 */
export class Encoder implements Serializer {
  constructor(
    readonly output: Output,
    readonly formatter: Formatter = new CompactFormatter()
  ) {}

  writeString(value: string): void {
    this.formatter.beginString(this.output);
    let start = 0;
    for (let i = 0; i < value.length; i++) {
      const code = value.charCodeAt(i);
      const escape = code < ESCAPE.length ? ESCAPE[code] : undefined;
      if (escape === undefined) {
        continue;
      }
      if (start < i) {
        this.formatter.writeStringFragment(this.output, value.slice(start, i));
      }
      this.formatter.writeCharEscape(this.output, escape, code);
      start = i + 1;
    }
    if (start < value.length) {
      this.formatter.writeStringFragment(this.output, value.slice(start));
    }
    this.formatter.endString(this.output);
  }

  serializeBool(value: boolean): void {
    this.formatter.writeBool(this.output, value);
  }

  serializeI8(value: number): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeI16(value: number): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeI32(value: number): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeI64(value: bigint): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeU8(value: number): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeU16(value: number): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeU32(value: number): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeU64(value: bigint): void {
    this.formatter.writeInteger(this.output, value);
  }

  serializeF32(value: number): void {
    if (Number.isFinite(value)) {
      this.formatter.writeF32(this.output, value);
    } else {
      this.formatter.writeNull(this.output);
    }
  }

  serializeF64(value: number): void {
    if (Number.isFinite(value)) {
      this.formatter.writeF64(this.output, value);
    } else {
      this.formatter.writeNull(this.output);
    }
  }

  serializeChar(value: string): void {
    this.writeString(value);
  }

  serializeStr(value: string): void {
    this.writeString(value);
  }

  /** Bytes are written as a list of numbers. */
  serializeBytes(value: Uint8Array): void {
    this.formatter.beginArray(this.output);
    value.forEach((byte, index) => {
      this.formatter.beginArrayValue(this.output, index === 0);
      this.formatter.writeInteger(this.output, byte);
      this.formatter.endArrayValue(this.output);
    });
    this.formatter.endArray(this.output);
  }

  serializeSymbol(name: string): void {
    if (!BARE_SYMBOL.test(name)) {
      throw invalidValue(`symbol ${JSON.stringify(name)}`, "a letter followed by no delimiters");
    }
    this.formatter.writeSymbol(this.output, name);
  }

  serializeKeyword(name: string): void {
    if (!BARE_KEYWORD.test(name)) {
      throw invalidValue(`keyword ${JSON.stringify(name)}`, "a non-empty name without delimiters");
    }
    this.formatter.writeKeyword(this.output, name);
  }

  serializeNone(): void {
    this.formatter.writeNull(this.output);
  }

  serializeSome<T>(value: T, shape: Serialize<T>): void {
    shape.serialize(value, this);
  }

  serializeUnit(): void {
    this.formatter.writeNull(this.output);
  }

  serializeUnitVariant(variant: string): void {
    this.writeString(variant);
  }

  serializeNewtypeVariant<T>(variant: string, value: T, shape: Serialize<T>): void {
    const seq = this.beginVariant(variant);
    seq.element(value, shape);
    seq.end();
  }

  serializeSeq(): SerializeSeq {
    this.formatter.beginArray(this.output);
    return new SeqEncoder(this, true);
  }

  serializeTupleVariant(variant: string): SerializeSeq {
    return this.beginVariant(variant);
  }

  serializeImproperList(): SerializeImproperList {
    this.formatter.beginArray(this.output);
    return new SeqEncoder(this, true);
  }

  serializeMap(): SerializeMap {
    this.formatter.beginObject(this.output);
    return new EntriesEncoder(this, true, "object");
  }

  serializeStruct(): SerializeStruct {
    this.formatter.beginObject(this.output);
    return new EntriesEncoder(this, true, "object");
  }

  serializeStructVariant(variant: string): SerializeStruct {
    this.beginVariant(variant);
    return new EntriesEncoder(this, false, "array");
  }

  /** Opens `("Name"` and returns a writer for the payload that follows. */
  private beginVariant(variant: string): SeqEncoder {
    this.formatter.beginArray(this.output);
    this.formatter.beginArrayValue(this.output, true);
    this.writeString(variant);
    this.formatter.endArrayValue(this.output);
    return new SeqEncoder(this, false);
  }
}
