import { UnitVariantAccess, visit } from "../binding/binding.js";
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
import { ErrorCode, SexpError } from "../error/error.js";
import { Atom } from "../value/atom.js";
import { I64_MIN, U64_MAX } from "../value/number.js";
import { Sexp } from "../value/sexp.js";
import { ValueDeserializer } from "../value/valueDeserializer.js";
import { Byte, isDelimiter, isDigit, isLetter, isWhitespace } from "./chars.js";
import { POW10 } from "./pow10.js";
import { ByteBuffer } from "../io/byteBuffer.js";
import { IoRead, SliceRead, StrRead } from "./read.js";
import type { ByteSource, Read } from "./read.js";

export const RECURSION_LIMIT = 128;

const U64_MAX_DIV_10 = U64_MAX / 10n;
const U64_MAX_MOD_10 = U64_MAX % 10n;

type ParsedNumber =
  | { type: "u64"; value: bigint }
  | { type: "i64"; value: bigint }
  | { type: "f64"; value: number };

const overflows = (significand: bigint, digit: bigint): boolean =>
  significand >= U64_MAX_DIV_10 && (significand > U64_MAX_DIV_10 || digit > U64_MAX_MOD_10);

const visitNumber = <T>(visitor: Visitor<T>, number: ParsedNumber): T => {
  switch (number.type) {
    case "u64":
      return visit.u64(visitor, number.value);
    case "i64":
      return visit.i64(visitor, number.value);
    case "f64":
      return visit.f64(visitor, number.value);
  }
};

/** Literals introduced by `#` decode to nil, a boolean or a keyword atom. */
const visitLiteral = <T>(visitor: Visitor<T>, literal: Sexp): T => {
  switch (literal.type) {
    case "nil":
      return visit.nil(visitor);
    case "boolean":
      return visit.bool(visitor, literal.value);
    case "atom":
      return visit.atom(visitor, literal.atom);
    default:
      throw new Error(`unexpected literal ${literal.type}`);
  }
};

/**
 * Recursive-descent S-expression decoder over a byte {@link Read}.
 *
 * The decoder implements {@link Deserializer}: shapes ask for the kind of
 * value they expect and the decoder drives their visitor while parsing.
 * Nesting is limited to {@link RECURSION_LIMIT} levels.
 */
export class Decoder implements Deserializer {
  private readonly scratch = new ByteBuffer();
  private remainingDepth = RECURSION_LIMIT;

  constructor(private readonly read: Read) {}

  static fromString(text: string): Decoder {
    return new Decoder(new StrRead(text));
  }

  static fromBytes(bytes: Uint8Array): Decoder {
    return new Decoder(new SliceRead(bytes));
  }

  static fromReader(source: ByteSource): Decoder {
    return new Decoder(new IoRead(source));
  }

  /** Fails with `TrailingCharacters` unless only whitespace remains. */
  end(): void {
    if (this.parseWhitespace() !== null) {
      throw this.peekError(ErrorCode.TrailingCharacters);
    }
  }

  byteOffset(): number {
    return this.read.byteOffset();
  }

  /** Skips whitespace and returns the next byte without consuming it. */
  parseWhitespace(): number | null {
    for (;;) {
      const byte = this.read.peek();
      if (byte === null || !isWhitespace(byte)) {
        return byte;
      }
      this.read.discard();
    }
  }

  peek(): number | null {
    return this.read.peek();
  }

  consume(): void {
    this.read.discard();
  }

  error(code: ErrorCode): SexpError {
    const { line, column } = this.read.position();
    return SexpError.syntax(code, line, column);
  }

  peekError(code: ErrorCode): SexpError {
    const { line, column } = this.read.peekPosition();
    return SexpError.syntax(code, line, column);
  }

  enterNested(): void {
    this.remainingDepth -= 1;
    if (this.remainingDepth === 0) {
      throw this.peekError(ErrorCode.RecursionLimitExceeded);
    }
  }

  leaveNested(): void {
    this.remainingDepth += 1;
  }

  /** Gives errors raised without a position the current one. */
  withPosition<T>(run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (error instanceof SexpError) {
        const { line, column } = this.read.position();
        throw error.withPosition(line, column);
      }
      throw error;
    }
  }

  /** Reads an entry key or variant name: a quoted string or a bare symbol. */
  parseName(eofCode: ErrorCode): string {
    const peek = this.parseWhitespace();
    if (peek === null) {
      throw this.peekError(eofCode);
    }
    if (peek === Byte.Quote) {
      this.read.discard();
      return this.read.parseStr(this.scratch).value;
    }
    if (isLetter(peek)) {
      return this.read.parseSymbol(this.scratch).value;
    }
    throw this.peekError(ErrorCode.ExpectedSomeString);
  }

  /** Reads `name payload...` after an opening parenthesis. */
  parseVariant<T>(visitor: Visitor<T>): T {
    const name = this.parseName(ErrorCode.EofWhileParsingValue);
    return visit.enum(visitor, new DataVariantAccess(this, name));
  }

  /** Reads the values before the next `)` as a sequence, leaving the `)`. */
  parseRemainingSeq<T>(visitor: Visitor<T>): T {
    this.enterNested();
    const value = visit.seq(visitor, new ListAccess(this, true));
    this.leaveNested();
    return value;
  }

  /** Reads the entries before the next `)` as an alist, leaving the `)`. */
  parseRemainingAlist<T>(visitor: Visitor<T>): T {
    this.enterNested();
    const value = visit.map(visitor, new AlistAccess(this));
    this.leaveNested();
    return value;
  }

  deserializeAny<T>(visitor: Visitor<T>): T {
    const peek = this.parseWhitespace();
    if (peek === null) {
      throw this.peekError(ErrorCode.EofWhileParsingValue);
    }
    return this.withPosition(() => this.parseValue(peek, visitor));
  }

  deserializeInteger<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeString<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeSeq<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeBytes<T>(visitor: Visitor<T>): T {
    if (this.parseWhitespace() !== Byte.Quote) {
      return this.deserializeAny(visitor);
    }
    this.read.discard();
    return this.withPosition(() => visit.bytes(visitor, this.read.parseStrRaw(this.scratch).value));
  }

  /** `#nil` is none; any other value is some. */
  deserializeOption<T>(visitor: Visitor<T>): T {
    if (this.parseWhitespace() !== Byte.Hash) {
      return visit.some(visitor, this);
    }
    this.read.discard();
    return this.withPosition(() => {
      const literal = this.parseHashLiteral();
      return literal.type === "nil"
        ? visit.nil(visitor)
        : visit.some(visitor, new ValueDeserializer(literal));
    });
  }

  deserializeMap<T>(visitor: Visitor<T>): T {
    const peek = this.parseWhitespace();
    if (peek === null) {
      throw this.peekError(ErrorCode.EofWhileParsingValue);
    }
    if (peek !== Byte.OpenParen) {
      throw this.peekError(ErrorCode.ExpectedList);
    }
    return this.withPosition(() => {
      this.enterNested();
      this.read.discard();
      const value = visit.map(visitor, new AlistAccess(this));
      this.leaveNested();
      this.endList();
      return value;
    });
  }

  deserializeEnum<T>(_variants: readonly string[], visitor: Visitor<T>): T {
    const peek = this.parseWhitespace();
    if (peek === null) {
      throw this.peekError(ErrorCode.EofWhileParsingValue);
    }
    return this.withPosition(() => {
      if (peek === Byte.Quote || isLetter(peek)) {
        return visit.enum(visitor, new UnitVariantAccess(this.parseName(ErrorCode.EofWhileParsingValue)));
      }
      if (peek !== Byte.OpenParen) {
        throw this.peekError(ErrorCode.ExpectedSomeValue);
      }
      this.enterNested();
      this.read.discard();
      const value = this.parseVariant(visitor);
      this.leaveNested();
      const close = this.parseWhitespace();
      if (close === Byte.CloseParen) {
        this.read.discard();
        return value;
      }
      if (close === null) {
        throw this.peekError(ErrorCode.EofWhileParsingAlist);
      }
      throw this.peekError(ErrorCode.ExpectedSomeValue);
    });
  }

  private parseValue<T>(peek: number, visitor: Visitor<T>): T {
    if (peek === Byte.Hash) {
      this.read.discard();
      return visitLiteral(visitor, this.parseHashLiteral());
    }
    if (peek === Byte.Minus) {
      this.read.discard();
      return visitNumber(visitor, this.parseInteger(false));
    }
    if (isDigit(peek)) {
      return visitNumber(visitor, this.parseInteger(true));
    }
    if (peek === Byte.Quote) {
      this.read.discard();
      return visit.string(visitor, this.read.parseStr(this.scratch).value);
    }
    if (peek === Byte.OpenParen) {
      return this.parseList(visitor);
    }
    if (isLetter(peek)) {
      return visit.atom(visitor, Atom.symbol(this.read.parseSymbol(this.scratch).value));
    }
    throw this.peekError(ErrorCode.ExpectedSomeValue);
  }

  /** Called after `#`. */
  private parseHashLiteral(): Sexp {
    const byte = this.read.next();
    switch (byte) {
      case null:
        throw this.error(ErrorCode.EofWhileParsingValue);
      case 0x74: // t
        return Sexp.boolean(true);
      case 0x66: // f
        return Sexp.boolean(false);
      case 0x6e: // n
        this.parseIdent("il");
        return Sexp.nil;
      case Byte.Colon: {
        const peek = this.read.peek();
        if (peek === null) {
          throw this.peekError(ErrorCode.EofWhileParsingValue);
        }
        if (isDelimiter(peek)) {
          throw this.peekError(ErrorCode.ExpectedSomeIdent);
        }
        return Sexp.keyword(this.read.parseSymbol(this.scratch).value);
      }
      default:
        throw this.error(ErrorCode.ExpectedSomeIdent);
    }
  }

  private parseIdent(rest: string): void {
    for (let i = 0; i < rest.length; i++) {
      const byte = this.read.next();
      if (byte === null) {
        throw this.error(ErrorCode.EofWhileParsingValue);
      }
      if (byte !== rest.charCodeAt(i)) {
        throw this.error(ErrorCode.ExpectedSomeIdent);
      }
    }
  }

  private parseList<T>(visitor: Visitor<T>): T {
    this.enterNested();
    this.read.discard();
    const value = visit.seq(visitor, new ListAccess(this, true));
    this.leaveNested();
    this.endList();
    return value;
  }

  private endList(): void {
    const peek = this.parseWhitespace();
    if (peek === Byte.CloseParen) {
      this.read.discard();
      return;
    }
    if (peek === null) {
      throw this.peekError(ErrorCode.EofWhileParsingList);
    }
    throw this.peekError(ErrorCode.TrailingCharacters);
  }

  private parseInteger(positive: boolean): ParsedNumber {
    const first = this.read.next();
    if (first === Byte.Zero) {
      // Only one leading zero is allowed.
      if (isDigit(this.read.peek())) {
        throw this.peekError(ErrorCode.InvalidNumber);
      }
      return this.parseNumber(positive, 0n);
    }
    if (first === null) {
      throw this.error(ErrorCode.EofWhileParsingValue);
    }
    if (!isDigit(first)) {
      throw this.error(ErrorCode.InvalidNumber);
    }
    let significand = BigInt(first - Byte.Zero);
    for (;;) {
      const byte = this.read.peek();
      if (!isDigit(byte)) {
        return this.parseNumber(positive, significand);
      }
      this.read.discard();
      const digit = BigInt(byte - Byte.Zero);
      if (overflows(significand, digit)) {
        return { type: "f64", value: this.parseLongInteger(positive, significand, 1) };
      }
      significand = significand * 10n + digit;
    }
  }

  /** The integer did not fit: count the remaining digits as exponent. */
  private parseLongInteger(positive: boolean, significand: bigint, exponent: number): number {
    for (;;) {
      const byte = this.read.peek();
      if (isDigit(byte)) {
        this.read.discard();
        exponent += 1;
      } else if (byte === Byte.Dot) {
        return this.parseDecimal(positive, significand, exponent);
      } else {
        return this.f64FromParts(positive, significand, exponent);
      }
    }
  }

  private parseNumber(positive: boolean, significand: bigint): ParsedNumber {
    if (this.read.peek() === Byte.Dot) {
      return { type: "f64", value: this.parseDecimal(positive, significand, 0) };
    }
    if (positive) {
      return { type: "u64", value: significand };
    }
    if (significand > -I64_MIN) {
      return { type: "f64", value: -Number(significand) };
    }
    return { type: "i64", value: -significand };
  }

  /** Called with `.` as the next byte. */
  private parseDecimal(positive: boolean, significand: bigint, exponent: number): number {
    this.read.discard();
    let atLeastOneDigit = false;
    for (;;) {
      const byte = this.read.peek();
      if (!isDigit(byte)) {
        break;
      }
      this.read.discard();
      atLeastOneDigit = true;
      const digit = BigInt(byte - Byte.Zero);
      if (overflows(significand, digit)) {
        // Digits beyond the significand's precision are dropped.
        while (isDigit(this.read.peek())) {
          this.read.discard();
        }
        break;
      }
      significand = significand * 10n + digit;
      exponent -= 1;
    }
    if (!atLeastOneDigit) {
      if (this.read.peek() === null) {
        throw this.peekError(ErrorCode.EofWhileParsingValue);
      }
      throw this.peekError(ErrorCode.InvalidNumber);
    }
    return this.f64FromParts(positive, significand, exponent);
  }

  private f64FromParts(positive: boolean, significand: bigint, exponent: number): number {
    let value = Number(significand);
    for (;;) {
      const magnitude = Math.abs(exponent);
      if (magnitude < POW10.length) {
        if (exponent >= 0) {
          value *= POW10[magnitude];
          if (!Number.isFinite(value)) {
            throw this.error(ErrorCode.NumberOutOfRange);
          }
        } else {
          value /= POW10[magnitude];
        }
        break;
      }
      if (value === 0) {
        break;
      }
      if (exponent >= 0) {
        throw this.error(ErrorCode.NumberOutOfRange);
      }
      value /= 1e308;
      exponent += 308;
    }
    return positive ? value : -value;
  }
}

class ListAccess implements SeqAccess {
  private heads = 0;

  constructor(
    private readonly decoder: Decoder,
    private first: boolean
  ) {}

  nextElement<T>(seed: Deserialize<T>): Next<T> {
    const peek = this.decoder.peek();
    if (peek === null) {
      throw this.decoder.peekError(ErrorCode.EofWhileParsingList);
    }
    let next: number | null = peek;
    if (isWhitespace(peek)) {
      next = this.decoder.parseWhitespace();
      if (next === null) {
        throw this.decoder.peekError(ErrorCode.EofWhileParsingList);
      }
    } else if (peek !== Byte.CloseParen && !this.first) {
      throw this.decoder.peekError(ErrorCode.ExpectedListEltOrEnd);
    }
    this.first = false;
    if (next === Byte.CloseParen || next === Byte.Dot) {
      return { done: true };
    }
    this.heads += 1;
    return { done: false, value: seed.deserialize(this.decoder) };
  }

  nextTail<T>(seed: Deserialize<T>): Next<T> {
    if (this.decoder.peek() !== Byte.Dot) {
      return { done: true };
    }
    if (this.heads === 0) {
      throw this.decoder.peekError(ErrorCode.ExpectedSomeValue);
    }
    this.decoder.consume();
    return { done: false, value: seed.deserialize(this.decoder) };
  }
}

class AlistAccess implements MapAccess {
  constructor(private readonly decoder: Decoder) {}

  nextKey<K>(seed: Deserialize<K>): Next<K> {
    const peek = this.decoder.parseWhitespace();
    if (peek === Byte.CloseParen) {
      return { done: true };
    }
    if (peek === null) {
      throw this.decoder.peekError(ErrorCode.EofWhileParsingAlist);
    }
    if (peek !== Byte.OpenParen) {
      throw this.decoder.peekError(ErrorCode.ExpectedList);
    }
    this.decoder.consume();
    const key = this.decoder.parseName(ErrorCode.EofWhileParsingAlist);
    return { done: false, value: seed.deserialize(new KeyDeserializer(key)) };
  }

  nextValue<V>(seed: Deserialize<V>): V {
    const peek = this.decoder.parseWhitespace();
    if (peek === null) {
      throw this.decoder.peekError(ErrorCode.EofWhileParsingAlist);
    }
    let value: V;
    if (peek === Byte.Dot) {
      this.decoder.consume();
      value = seed.deserialize(this.decoder);
    } else {
      value = seed.deserialize(new EntryValuesDeserializer(this.decoder));
    }
    const close = this.decoder.parseWhitespace();
    if (close === Byte.CloseParen) {
      this.decoder.consume();
      return value;
    }
    if (close === null) {
      throw this.decoder.peekError(ErrorCode.EofWhileParsingAlist);
    }
    throw this.decoder.peekError(ErrorCode.TrailingCharacters);
  }
}

/**
 * Reads the `v1 v2 ...` of an `(key v1 v2 ...)` entry, which stands for
 * `(key . (v1 v2 ...))`. The entry's closing parenthesis is left unread.
 */
class EntryValuesDeserializer implements Deserializer {
  constructor(private readonly decoder: Decoder) {}

  deserializeAny<T>(visitor: Visitor<T>): T {
    return this.decoder.withPosition(() => this.decoder.parseRemainingSeq(visitor));
  }

  deserializeInteger<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeString<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeBytes<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  /** A bare `(key)` reads as none. */
  deserializeOption<T>(visitor: Visitor<T>): T {
    return this.decoder.peek() === Byte.CloseParen ? visit.nil(visitor) : visit.some(visitor, this);
  }

  deserializeSeq<T>(visitor: Visitor<T>): T {
    return this.deserializeAny(visitor);
  }

  deserializeMap<T>(visitor: Visitor<T>): T {
    return this.decoder.withPosition(() => this.decoder.parseRemainingAlist(visitor));
  }

  deserializeEnum<T>(_variants: readonly string[], visitor: Visitor<T>): T {
    return this.decoder.withPosition(() => this.decoder.parseVariant(visitor));
  }
}

/** A variant written as `(name payload...)`. */
class DataVariantAccess implements EnumAccess {
  constructor(
    private readonly decoder: Decoder,
    readonly variant: string
  ) {}

  unitVariant(): void {
    // `(name)` carries no payload.
  }

  newtypeVariant<T>(seed: Deserialize<T>): T {
    return seed.deserialize(this.decoder);
  }

  tupleVariant<T>(visitor: Visitor<T>): T {
    return visit.seq(visitor, new ListAccess(this.decoder, false));
  }

  structVariant<T>(visitor: Visitor<T>): T {
    return visit.map(visitor, new AlistAccess(this.decoder));
  }
}
