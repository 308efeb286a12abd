import { SexpError } from "../error/error.js";
import type { Atom } from "../value/atom.js";
import { I64_MAX, I64_MIN, SexpNumber, U64_MAX } from "../value/number.js";
import { Sexp } from "../value/sexp.js";
import { invalidValue } from "./binding.js";
import type {
  Deserialize,
  EnumAccess,
  SeqAccess,
  Serialize,
  Serializer,
  Visitor,
} from "./binding.js";

/**
 * Describes how one application type maps onto the codec: how to emit it
 * through a {@link Serializer} and how to rebuild it from a
 * {@link Deserializer}.
 */
export interface Shape<T> extends Serialize<T>, Deserialize<T> {
  readonly expecting: string;
  /** Value for an absent record field. Only optional shapes define it. */
  missing?(): T;
}

export type Infer<S> = S extends Shape<infer T> ? T : never;

export type TupleOf<S extends readonly Shape<unknown>[]> = {
  -readonly [K in keyof S]: Infer<S[K]>;
};

export type RecordOf<F extends Record<string, Shape<unknown>>> = {
  [K in keyof F]: Infer<F[K]>;
};

export const bool: Shape<boolean> = {
  expecting: "a boolean",
  serialize: (value, serializer) => serializer.serializeBool(value),
  deserialize: (deserializer) =>
    deserializer.deserializeAny<boolean>({ expecting: "a boolean", visitBool: (value) => value }),
};

const integerVisitor = (expecting: string, min: bigint, max: bigint): Visitor<bigint> => {
  const check = (value: bigint): bigint => {
    if (value < min || value > max) {
      throw invalidValue(`integer \`${value}\``, expecting);
    }
    return value;
  };
  return { expecting, visitU64: check, visitI64: check };
};

const smallInteger = (
  bits: 8 | 16 | 32,
  signed: boolean,
  write: (serializer: Serializer, value: number) => void
): Shape<number> => {
  const min = signed ? -(1n << BigInt(bits - 1)) : 0n;
  const max = signed ? (1n << BigInt(bits - 1)) - 1n : (1n << BigInt(bits)) - 1n;
  const expecting = `${signed ? "i" : "u"}${bits}`;
  const visitor = integerVisitor(expecting, min, max);
  return {
    expecting,
    serialize: (value, serializer) => {
      if (!Number.isInteger(value) || BigInt(value) < min || BigInt(value) > max) {
        throw invalidValue(`${value}`, expecting);
      }
      write(serializer, value);
    },
    deserialize: (deserializer) => Number(deserializer.deserializeInteger(visitor)),
  };
};

export const i8 = smallInteger(8, true, (serializer, value) => serializer.serializeI8(value));
export const i16 = smallInteger(16, true, (serializer, value) => serializer.serializeI16(value));
export const i32 = smallInteger(32, true, (serializer, value) => serializer.serializeI32(value));
export const u8 = smallInteger(8, false, (serializer, value) => serializer.serializeU8(value));
export const u16 = smallInteger(16, false, (serializer, value) => serializer.serializeU16(value));
export const u32 = smallInteger(32, false, (serializer, value) => serializer.serializeU32(value));

const wideInteger = (
  expecting: string,
  min: bigint,
  max: bigint,
  write: (serializer: Serializer, value: bigint) => void
): Shape<bigint> => {
  const visitor = integerVisitor(expecting, min, max);
  return {
    expecting,
    serialize: (value, serializer) => {
      if (value < min || value > max) {
        throw invalidValue(`${value}`, expecting);
      }
      write(serializer, value);
    },
    deserialize: (deserializer) => deserializer.deserializeInteger(visitor),
  };
};

export const i64 = wideInteger("i64", I64_MIN, I64_MAX, (serializer, value) =>
  serializer.serializeI64(value)
);
export const u64 = wideInteger("u64", 0n, U64_MAX, (serializer, value) =>
  serializer.serializeU64(value)
);

const floatVisitor = (expecting: string): Visitor<number> => ({
  expecting,
  visitF64: (value) => value,
  visitU64: (value) => Number(value),
  visitI64: (value) => Number(value),
});

export const f64: Shape<number> = {
  expecting: "f64",
  serialize: (value, serializer) => serializer.serializeF64(value),
  deserialize: (deserializer) => deserializer.deserializeAny(floatVisitor("f64")),
};

export const f32: Shape<number> = {
  expecting: "f32",
  serialize: (value, serializer) => serializer.serializeF32(value),
  deserialize: (deserializer) => Math.fround(deserializer.deserializeAny(floatVisitor("f32"))),
};

export const char: Shape<string> = {
  expecting: "a character",
  serialize: (value, serializer) => {
    if ([...value].length !== 1) {
      throw invalidValue(`string ${JSON.stringify(value)}`, "a character");
    }
    serializer.serializeChar(value);
  },
  deserialize: (deserializer) =>
    deserializer.deserializeString<string>({
      expecting: "a character",
      visitString: (value) => {
        if ([...value].length !== 1) {
          throw invalidValue(`string ${JSON.stringify(value)}`, "a character");
        }
        return value;
      },
    }),
};

export const string: Shape<string> = {
  expecting: "a string",
  serialize: (value, serializer) => serializer.serializeStr(value),
  deserialize: (deserializer) =>
    deserializer.deserializeString<string>({
      expecting: "a string",
      visitString: (value) => value,
      visitAtom: (atom) => atom.text,
    }),
};

const collect = <T>(seq: SeqAccess, shape: Deserialize<T>): T[] => {
  const items: T[] = [];
  for (;;) {
    const next = seq.nextElement(shape);
    if (next.done) {
      return items;
    }
    items.push(next.value);
  }
};

const utf8 = new TextEncoder();

export const bytes: Shape<Uint8Array> = {
  expecting: "a byte array",
  serialize: (value, serializer) => serializer.serializeBytes(value),
  deserialize: (deserializer) =>
    deserializer.deserializeBytes<Uint8Array>({
      expecting: "a byte array",
      visitBytes: (value) => Uint8Array.from(value),
      visitString: (value) => utf8.encode(value),
      visitSeq: (seq) => Uint8Array.from(collect(seq, u8)),
    }),
};

export const unit: Shape<null> = {
  expecting: "unit",
  serialize: (_value, serializer) => serializer.serializeUnit(),
  deserialize: (deserializer) =>
    deserializer.deserializeAny<null>({ expecting: "unit", visitNil: () => null }),
};

export const option = <T>(shape: Shape<T>): Shape<T | null> => {
  const expecting = `an optional ${shape.expecting}`;
  return {
    expecting,
    serialize: (value, serializer) => {
      if (value === null) {
        serializer.serializeNone();
      } else {
        serializer.serializeSome<T>(value, shape);
      }
    },
    deserialize: (deserializer) =>
      deserializer.deserializeOption<T | null>({
        expecting,
        visitNil: () => null,
        visitSome: (inner) => shape.deserialize(inner),
      }),
    missing: () => null,
  };
};

export const array = <T>(shape: Shape<T>): Shape<T[]> => {
  const expecting = `a list of ${shape.expecting}`;
  return {
    expecting,
    serialize: (value, serializer) => {
      const seq = serializer.serializeSeq(value.length);
      for (const item of value) {
        seq.element(item, shape);
      }
      seq.end();
    },
    deserialize: (deserializer) =>
      deserializer.deserializeSeq<T[]>({ expecting, visitSeq: (seq) => collect(seq, shape) }),
  };
};

const tupleVisitor = <S extends readonly Shape<unknown>[]>(
  shapes: S,
  expecting: string
): Visitor<TupleOf<S>> => ({
  expecting,
  visitSeq: (seq) => {
    const items: unknown[] = [];
    for (const shape of shapes) {
      const next = seq.nextElement(shape);
      if (next.done) {
        throw SexpError.custom(`invalid length ${items.length}, expected ${expecting}`);
      }
      items.push(next.value);
    }
    if (!seq.nextElement(sexp).done) {
      throw SexpError.custom(`invalid length ${items.length + 1}, expected ${expecting}`);
    }
    return items as TupleOf<S>;
  },
});

export const tuple = <S extends readonly Shape<unknown>[]>(...shapes: S): Shape<TupleOf<S>> => {
  const expecting = `a tuple of size ${shapes.length}`;
  const visitor = tupleVisitor(shapes, expecting);
  return {
    expecting,
    serialize: (value, serializer) => {
      const seq = serializer.serializeSeq(shapes.length);
      shapes.forEach((shape, index) => seq.element<unknown>(value[index], shape));
      seq.end();
    },
    deserialize: (deserializer) => deserializer.deserializeSeq(visitor),
  };
};

const recordVisitor = <F extends Record<string, Shape<unknown>>>(
  fields: ReadonlyMap<string, Shape<unknown>>,
  expecting: string
): Visitor<RecordOf<F>> => ({
  expecting,
  visitMap: (map) => {
    const result: Record<string, unknown> = {};
    for (;;) {
      const key = map.nextKey(string);
      if (key.done) {
        break;
      }
      const field = fields.get(key.value);
      if (!field) {
        const known = [...fields.keys()].map((name) => `\`${name}\``).join(", ");
        throw SexpError.custom(`unknown field \`${key.value}\`, expected one of ${known}`);
      }
      if (Object.hasOwn(result, key.value)) {
        throw SexpError.custom(`duplicate field \`${key.value}\``);
      }
      result[key.value] = map.nextValue(field);
    }
    for (const [name, shape] of fields) {
      if (Object.hasOwn(result, name)) {
        continue;
      }
      if (!shape.missing) {
        throw SexpError.custom(`missing field \`${name}\``);
      }
      result[name] = shape.missing();
    }
    return result as RecordOf<F>;
  },
});

const writeFields = (
  value: object,
  fields: ReadonlyMap<string, Shape<unknown>>,
  struct: { field<T>(key: string, value: T, shape: Serialize<T>): void; end(): void }
): void => {
  for (const [name, shape] of fields) {
    const fieldValue: unknown = Reflect.get(value, name);
    struct.field(name, fieldValue, shape);
  }
  struct.end();
};

/**
 * A fixed set of named fields, encoded as an association list. Fields are
 * written in declaration order; on decode, order does not matter and absent
 * optional fields become `null`.
 */
export const record = <F extends Record<string, Shape<unknown>>>(
  fields: F,
  name = "a record"
): Shape<RecordOf<F>> => {
  const lookup = new Map<string, Shape<unknown>>(Object.entries(fields));
  const visitor = recordVisitor<F>(lookup, name);
  return {
    expecting: name,
    serialize: (value, serializer) =>
      writeFields(value, lookup, serializer.serializeStruct(lookup.size)),
    deserialize: (deserializer) => deserializer.deserializeMap(visitor),
  };
};

export const map = <K, V>(keyShape: Shape<K>, valueShape: Shape<V>): Shape<Map<K, V>> => {
  const expecting = `a map from ${keyShape.expecting} to ${valueShape.expecting}`;
  return {
    expecting,
    serialize: (value, serializer) => {
      const entries = serializer.serializeMap(value.size);
      for (const [key, item] of value) {
        entries.key(key, keyShape);
        entries.value(item, valueShape);
      }
      entries.end();
    },
    deserialize: (deserializer) =>
      deserializer.deserializeMap<Map<K, V>>({
        expecting,
        visitMap: (access) => {
          const result = new Map<K, V>();
          for (;;) {
            const key = access.nextKey(keyShape);
            if (key.done) {
              return result;
            }
            result.set(key.value, access.nextValue(valueShape));
          }
        },
      }),
  };
};

export interface VariantShape<P> {
  serialize(variant: string, payload: P, serializer: Serializer): void;
  deserialize(access: EnumAccess): P;
}

export type InferVariant<S> = S extends VariantShape<infer P> ? P : never;

export type EnumOf<V extends Record<string, VariantShape<unknown>>> = {
  [K in keyof V & string]: { tag: K; value: InferVariant<V[K]> };
}[keyof V & string];

export const unitVariant: VariantShape<null> = {
  serialize: (variant, _payload, serializer) => serializer.serializeUnitVariant(variant),
  deserialize: (access) => {
    access.unitVariant();
    return null;
  },
};

export const newtypeVariant = <T>(shape: Shape<T>): VariantShape<T> => ({
  serialize: (variant, payload, serializer) =>
    serializer.serializeNewtypeVariant(variant, payload, shape),
  deserialize: (access) => access.newtypeVariant(shape),
});

export const tupleVariant = <S extends readonly Shape<unknown>[]>(
  ...shapes: S
): VariantShape<TupleOf<S>> => {
  const visitor = tupleVisitor(shapes, `a tuple variant of size ${shapes.length}`);
  return {
    serialize: (variant, payload, serializer) => {
      const seq = serializer.serializeTupleVariant(variant, shapes.length);
      shapes.forEach((shape, index) => seq.element<unknown>(payload[index], shape));
      seq.end();
    },
    deserialize: (access) => access.tupleVariant(visitor),
  };
};

export const structVariant = <F extends Record<string, Shape<unknown>>>(
  fields: F
): VariantShape<RecordOf<F>> => {
  const lookup = new Map<string, Shape<unknown>>(Object.entries(fields));
  const visitor = recordVisitor<F>(lookup, "a struct variant");
  return {
    serialize: (variant, payload, serializer) =>
      writeFields(payload, lookup, serializer.serializeStructVariant(variant, lookup.size)),
    deserialize: (access) => access.structVariant(visitor),
  };
};

/**
 * A tagged union. Values are `{ tag, value }` objects where `value` is the
 * variant payload (`null` for unit variants).
 */
export const enumeration = <V extends Record<string, VariantShape<unknown>>>(
  variants: V,
  name = "an enum"
): Shape<EnumOf<V>> => {
  const lookup = new Map<string, VariantShape<unknown>>(Object.entries(variants));
  const names = [...lookup.keys()];
  return {
    expecting: name,
    serialize: (value, serializer) => {
      const variant = lookup.get(value.tag);
      if (!variant) {
        throw invalidValue(`variant \`${value.tag}\``, name);
      }
      variant.serialize(value.tag, value.value, serializer);
    },
    deserialize: (deserializer) =>
      deserializer.deserializeEnum<EnumOf<V>>(names, {
        expecting: name,
        visitEnum: (access) => {
          const variant = lookup.get(access.variant);
          if (!variant) {
            const known = names.map((tag) => `\`${tag}\``).join(", ");
            throw SexpError.custom(`unknown variant \`${access.variant}\`, expected one of ${known}`);
          }
          const value = variant.deserialize(access);
          return { tag: access.variant, value } as EnumOf<V>;
        },
      }),
  };
};

const sexpVisitor: Visitor<Sexp> = {
  expecting: "any value",
  visitBool: (value) => Sexp.boolean(value),
  visitU64: (value) => Sexp.number(SexpNumber.fromU64(value)),
  visitI64: (value) => Sexp.number(SexpNumber.fromI64(value)),
  visitF64: (value) => {
    const number = SexpNumber.fromF64(value);
    return number ? Sexp.number(number) : Sexp.nil;
  },
  visitString: (value) => Sexp.string(value),
  visitBytes: (value) =>
    Sexp.list(Array.from(value, (byte) => Sexp.number(SexpNumber.fromU64(BigInt(byte))))),
  visitAtom: (atom) => Sexp.atom(atom),
  visitNil: () => Sexp.nil,
  visitSome: (deserializer) => sexp.deserialize(deserializer),
  visitSeq: (seq) => {
    const items = collect(seq, sexp);
    const tail = seq.nextTail(sexp);
    return tail.done ? Sexp.list(items) : Sexp.improperList(items, tail.value);
  },
};

const serializeAtom = (atom: Atom, serializer: Serializer): void => {
  switch (atom.kind) {
    case "symbol":
      serializer.serializeSymbol(atom.text);
      return;
    case "keyword":
      serializer.serializeKeyword(atom.text);
      return;
    case "string":
      serializer.serializeStr(atom.text);
      return;
  }
};

const serializeSexp = (value: Sexp, serializer: Serializer): void => {
  switch (value.type) {
    case "nil":
      serializer.serializeUnit();
      return;
    case "atom":
      serializeAtom(value.atom, serializer);
      return;
    case "number":
      value.number.match({
        posInt: (number) => serializer.serializeU64(number),
        negInt: (number) => serializer.serializeI64(number),
        float: (number) => serializer.serializeF64(number),
      });
      return;
    case "boolean":
      serializer.serializeBool(value.value);
      return;
    case "list": {
      const seq = serializer.serializeSeq(value.items.length);
      for (const item of value.items) {
        seq.element(item, sexp);
      }
      seq.end();
      return;
    }
    case "improperList": {
      const list = serializer.serializeImproperList(value.items.length);
      for (const item of value.items) {
        list.element(item, sexp);
      }
      list.tail(value.tail, sexp);
      list.end();
      return;
    }
  }
};

/** The generic value tree. */
export const sexp: Shape<Sexp> = {
  expecting: "any value",
  serialize: serializeSexp,
  deserialize: (deserializer) => deserializer.deserializeAny(sexpVisitor),
};
