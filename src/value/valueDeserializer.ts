import { invalidType, UnitVariantAccess, visit } from "../binding/binding.js";
import type {
  Deserialize,
  Deserializer,
  EnumAccess,
  MapAccess,
  Next,
  SeqAccess,
  Visitor,
} from "../binding/binding.js";
import { KeyDeserializer } from "../binding/keys.js";
import { SexpError } from "../error/error.js";
import { Sexp } from "./sexp.js";

const utf8 = new TextEncoder();

const describe = (value: Sexp): string => {
  switch (value.type) {
    case "nil":
      return "nil";
    case "atom":
      return `${value.atom.kind} ${JSON.stringify(value.atom.text)}`;
    case "number":
      return value.number.isF64()
        ? `floating point \`${value.number}\``
        : `integer \`${value.number}\``;
    case "boolean":
      return `boolean \`${value.value ? "#t" : "#f"}\``;
    case "list":
      return "list";
    case "improperList":
      return "improper list";
  }
};

const headName = (value: Sexp): string | undefined =>
  value.type === "atom" ? value.atom.text : undefined;

class ItemsAccess implements SeqAccess {
  private index = 0;
  private tailRead = false;

  constructor(
    private readonly items: readonly Sexp[],
    private readonly tail?: Sexp
  ) {}

  nextElement<T>(seed: Deserialize<T>): Next<T> {
    if (this.index >= this.items.length) {
      return { done: true };
    }
    const item = this.items[this.index++];
    return { done: false, value: seed.deserialize(new ValueDeserializer(item)) };
  }

  nextTail<T>(seed: Deserialize<T>): Next<T> {
    if (this.tail === undefined || this.tailRead || this.index < this.items.length) {
      return { done: true };
    }
    this.tailRead = true;
    return { done: false, value: seed.deserialize(new ValueDeserializer(this.tail)) };
  }

  /** Everything has to be consumed, the same as the text decoder requires. */
  finish(expecting: string): void {
    if (this.index < this.items.length) {
      throw SexpError.custom(`invalid length ${this.items.length}, expected ${expecting}`);
    }
    if (this.tail !== undefined && !this.tailRead) {
      throw invalidType("improper list", expecting);
    }
  }
}

const visitItems = <T>(visitor: Visitor<T>, items: readonly Sexp[], tail?: Sexp): T => {
  const access = new ItemsAccess(items, tail);
  const value = visit.seq(visitor, access);
  access.finish(visitor.expecting);
  return value;
};

/**
 * Walks alist entries: `(key . value)` pairs, or `(key v1 v2 ...)` lists
 * standing for `(key . (v1 v2 ...))`. A bare `(key)` holds an empty list,
 * or none when read as an option.
 */
class EntriesAccess implements MapAccess {
  private index = 0;
  private pending: Deserializer = new ValueDeserializer(Sexp.nil);

  constructor(private readonly entries: readonly Sexp[]) {}

  nextKey<K>(seed: Deserialize<K>): Next<K> {
    if (this.index >= this.entries.length) {
      return { done: true };
    }
    const entry = this.entries[this.index++];
    let key: string | undefined;
    if (entry.type === "improperList" && entry.items.length === 1) {
      key = headName(entry.items[0]);
      this.pending = new ValueDeserializer(entry.tail);
    } else if (entry.type === "list" && entry.items.length > 0) {
      key = headName(entry.items[0]);
      this.pending = new EntryRestDeserializer(entry.items.slice(1));
    }
    if (key === undefined) {
      throw invalidType(describe(entry), "an alist entry");
    }
    return { done: false, value: seed.deserialize(new KeyDeserializer(key)) };
  }

  nextValue<V>(seed: Deserialize<V>): V {
    return seed.deserialize(this.pending);
  }
}

class ValueVariantAccess implements EnumAccess {
  constructor(
    readonly variant: string,
    private readonly payload: readonly Sexp[]
  ) {}

  unitVariant(): void {
    if (this.payload.length !== 0) {
      throw invalidType("variant with payload", "unit variant");
    }
  }

  newtypeVariant<T>(seed: Deserialize<T>): T {
    if (this.payload.length !== 1) {
      throw SexpError.custom(`invalid length ${this.payload.length}, expected newtype variant`);
    }
    return seed.deserialize(new ValueDeserializer(this.payload[0]));
  }

  tupleVariant<T>(visitor: Visitor<T>): T {
    return visitItems(visitor, this.payload);
  }

  structVariant<T>(visitor: Visitor<T>): T {
    return visit.map(visitor, new EntriesAccess(this.payload));
  }
}

/**
 * Reads typed data out of an already-built {@link Sexp}, accepting the same
 * layouts the text decoder does.
 */
export class ValueDeserializer implements Deserializer {
  constructor(private readonly value: Sexp) {}

  deserializeAny<T>(visitor: Visitor<T>): T {
    const value = this.value;
    switch (value.type) {
      case "nil":
        return visit.nil(visitor);
      case "atom":
        return visit.atom(visitor, value.atom);
      case "number":
        return value.number.match({
          posInt: (number) => visit.u64(visitor, number),
          negInt: (number) => visit.i64(visitor, number),
          float: (number) => visit.f64(visitor, number),
        });
      case "boolean":
        return visit.bool(visitor, value.value);
      case "list":
        return visitItems(visitor, value.items);
      case "improperList":
        return visitItems(visitor, value.items, value.tail);
    }
  }

  deserializeInteger<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeString<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeBytes<T>(visitor: Visitor<T>): T {
    if (this.value.type === "atom" && this.value.atom.isString()) {
      return visit.bytes(visitor, utf8.encode(this.value.atom.text));
    }
    return this.deserializeAny(visitor);
  }

  deserializeOption<T>(visitor: Visitor<T>): T {
    return this.value.type === "nil" ? visit.nil(visitor) : visit.some(visitor, this);
  }

  deserializeSeq<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeMap<T>(visitor: Visitor<T>): T {
    if (this.value.type !== "list") {
      throw invalidType(describe(this.value), visitor.expecting);
    }
    return visit.map(visitor, new EntriesAccess(this.value.items));
  }

  deserializeEnum<T>(_variants: readonly string[], visitor: Visitor<T>): T {
    const value = this.value;
    if (value.type === "atom" && !value.atom.isKeyword()) {
      return visit.enum(visitor, new UnitVariantAccess(value.atom.text));
    }
    if (value.type === "list" && value.items.length > 0) {
      const name = headName(value.items[0]);
      if (name !== undefined) {
        return visit.enum(visitor, new ValueVariantAccess(name, value.items.slice(1)));
      }
    }
    throw invalidType(describe(value), visitor.expecting);
  }
}

/** The `v1 v2 ...` of an `(key v1 v2 ...)` entry. */
class EntryRestDeserializer extends ValueDeserializer {
  constructor(private readonly rest: readonly Sexp[]) {
    super(Sexp.list(rest));
  }

  deserializeOption<T>(visitor: Visitor<T>): T {
    return this.rest.length === 0 ? visit.nil(visitor) : super.deserializeOption(visitor);
  }
}

export const fromValue = <T>(value: Sexp, shape: Deserialize<T>): T =>
  shape.deserialize(new ValueDeserializer(value));
