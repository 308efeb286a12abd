import { ErrorCode, SexpError } from "../error/error.js";
import { ByteBuffer } from "../io/byteBuffer.js";
import { Byte, hexValue, isDelimiter } from "./chars.js";

export type Position = { line: number; column: number };

/**
 * A decoded payload. `borrowed` values are views of the input itself;
 * `copied` values were assembled in the scratch buffer because the input
 * had escapes or is not held in memory. Consumers treat both alike.
 */
export type Reference<T> = { kind: "borrowed"; value: T } | { kind: "copied"; value: T };

const IO_BUFFER_SIZE = 8 * 1024;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Byte-level cursor the decoder pulls from. */
export interface Read {
  next(): number | null;
  peek(): number | null;
  /** Consumes the byte returned by the last `peek`. */
  discard(): void;
  /** Line and column of the last consumed byte. */
  position(): Position;
  /** Line and column of the byte returned by `peek`. */
  peekPosition(): Position;
  /** Number of bytes consumed so far. */
  byteOffset(): number;
  /** Reads a string body after the opening quote, through the closing one. */
  parseStr(scratch: ByteBuffer): Reference<string>;
  /** Like `parseStr`, without requiring the payload to be UTF-8. */
  parseStrRaw(scratch: ByteBuffer): Reference<Uint8Array>;
  /** Reads bytes up to the next delimiter. */
  parseSymbol(scratch: ByteBuffer): Reference<string>;
}

abstract class ByteRead implements Read {
  abstract next(): number | null;
  abstract peek(): number | null;
  abstract discard(): void;
  abstract position(): Position;
  abstract peekPosition(): Position;
  abstract byteOffset(): number;
  abstract parseStrRaw(scratch: ByteBuffer): Reference<Uint8Array>;
  abstract parseSymbol(scratch: ByteBuffer): Reference<string>;

  parseStr(scratch: ByteBuffer): Reference<string> {
    const raw = this.parseStrRaw(scratch);
    return { kind: raw.kind, value: this.decodeUtf8(raw.value) };
  }

  protected error(code: ErrorCode): SexpError {
    const { line, column } = this.position();
    return SexpError.syntax(code, line, column);
  }

  protected decodeUtf8(bytes: Uint8Array): string {
    try {
      return utf8Decoder.decode(bytes);
    } catch {
      throw this.error(ErrorCode.InvalidUnicodeCodePoint);
    }
  }

  /** Called with the backslash already consumed. */
  protected parseEscape(scratch: ByteBuffer): void {
    const byte = this.next();
    switch (byte) {
      case null:
        throw this.error(ErrorCode.EofWhileParsingString);
      case Byte.Quote:
      case Byte.Backslash:
      case Byte.Slash:
        scratch.push(byte);
        return;
      case 0x62: // b
        scratch.push(0x08);
        return;
      case 0x66: // f
        scratch.push(0x0c);
        return;
      case 0x6e: // n
        scratch.push(0x0a);
        return;
      case 0x72: // r
        scratch.push(0x0d);
        return;
      case 0x74: // t
        scratch.push(0x09);
        return;
      case 0x75: // u
        scratch.pushAll(utf8Encoder.encode(String.fromCodePoint(this.decodeUnicodeEscape())));
        return;
      default:
        throw this.error(ErrorCode.InvalidEscape);
    }
  }

  private decodeUnicodeEscape(): number {
    const first = this.decodeHexEscape();
    if (first >= 0xdc00 && first <= 0xdfff) {
      throw this.error(ErrorCode.InvalidUnicodeCodePoint);
    }
    if (first < 0xd800 || first > 0xdbff) {
      return first;
    }
    const backslash = this.next();
    if (backslash === null) {
      throw this.error(ErrorCode.EofWhileParsingString);
    }
    if (backslash !== Byte.Backslash) {
      throw this.error(ErrorCode.LoneLeadingSurrogateInHexEscape);
    }
    const marker = this.next();
    if (marker === null) {
      throw this.error(ErrorCode.EofWhileParsingString);
    }
    if (marker !== 0x75) {
      throw this.error(ErrorCode.UnexpectedEndOfHexEscape);
    }
    const second = this.decodeHexEscape();
    if (second < 0xdc00 || second > 0xdfff) {
      throw this.error(ErrorCode.LoneLeadingSurrogateInHexEscape);
    }
    return 0x10000 + ((first - 0xd800) << 10) + (second - 0xdc00);
  }

  private decodeHexEscape(): number {
    let value = 0;
    for (let i = 0; i < 4; i++) {
      const byte = this.next();
      if (byte === null) {
        throw this.error(ErrorCode.EofWhileParsingString);
      }
      const digit = hexValue(byte);
      if (digit < 0) {
        throw this.error(ErrorCode.InvalidEscape);
      }
      value = value * 16 + digit;
    }
    return value;
  }
}

/**
 * Reads from an in-memory byte array. String payloads without escapes are
 * returned as borrowed views; line and column are computed only when an
 * error needs them.
 */
export class SliceRead extends ByteRead {
  private index = 0;

  constructor(private readonly bytes: Uint8Array) {
    super();
  }

  next(): number | null {
    if (this.index < this.bytes.length) {
      return this.bytes[this.index++];
    }
    return null;
  }

  peek(): number | null {
    return this.index < this.bytes.length ? this.bytes[this.index] : null;
  }

  discard(): void {
    this.index += 1;
  }

  position(): Position {
    return this.positionOf(this.index);
  }

  peekPosition(): Position {
    return this.positionOf(Math.min(this.index + 1, this.bytes.length));
  }

  byteOffset(): number {
    return this.index;
  }

  parseStrRaw(scratch: ByteBuffer): Reference<Uint8Array> {
    scratch.clear();
    let copied = false;
    let start = this.index;
    for (;;) {
      while (
        this.index < this.bytes.length &&
        this.bytes[this.index] !== Byte.Quote &&
        this.bytes[this.index] !== Byte.Backslash
      ) {
        this.index += 1;
      }
      if (this.index === this.bytes.length) {
        throw this.error(ErrorCode.EofWhileParsingString);
      }
      const segment = this.bytes.subarray(start, this.index);
      if (this.bytes[this.index] === Byte.Quote) {
        this.index += 1;
        if (!copied) {
          return { kind: "borrowed", value: segment };
        }
        scratch.pushAll(segment);
        return { kind: "copied", value: scratch.toBytes() };
      }
      scratch.pushAll(segment);
      copied = true;
      this.index += 1;
      this.parseEscape(scratch);
      start = this.index;
    }
  }

  parseSymbol(_scratch: ByteBuffer): Reference<string> {
    const start = this.index;
    while (this.index < this.bytes.length && !isDelimiter(this.bytes[this.index])) {
      this.index += 1;
    }
    return { kind: "borrowed", value: this.decodeUtf8(this.bytes.subarray(start, this.index)) };
  }

  private positionOf(index: number): Position {
    let line = 1;
    let column = 0;
    for (let i = 0; i < index; i++) {
      if (this.bytes[i] === Byte.Newline) {
        line += 1;
        column = 0;
      } else {
        column += 1;
      }
    }
    return { line, column };
  }
}

/** Reads a JavaScript string through its UTF-8 encoding. */
export class StrRead extends SliceRead {
  constructor(text: string) {
    super(utf8Encoder.encode(text));
  }
}

/**
 * A blocking byte source. `read` fills a prefix of `buffer` and returns how
 * many bytes it wrote; 0 means end of input.
 */
export interface ByteSource {
  read(buffer: Uint8Array): number;
}

/** Reads from a {@link ByteSource}, tracking line and column as it goes. */
export class IoRead extends ByteRead {
  private readonly buffer = new Uint8Array(IO_BUFFER_SIZE);
  private cursor = 0;
  private filled = 0;
  private exhausted = false;
  private line = 1;
  private column = 0;
  private offset = 0;

  constructor(private readonly source: ByteSource) {
    super();
  }

  next(): number | null {
    if (!this.fill()) {
      return null;
    }
    const byte = this.buffer[this.cursor++];
    this.offset += 1;
    if (byte === Byte.Newline) {
      this.line += 1;
      this.column = 0;
    } else {
      this.column += 1;
    }
    return byte;
  }

  peek(): number | null {
    return this.fill() ? this.buffer[this.cursor] : null;
  }

  discard(): void {
    this.next();
  }

  position(): Position {
    return { line: this.line, column: this.column };
  }

  peekPosition(): Position {
    const byte = this.peek();
    if (byte === null) {
      return this.position();
    }
    return byte === Byte.Newline
      ? { line: this.line + 1, column: 0 }
      : { line: this.line, column: this.column + 1 };
  }

  byteOffset(): number {
    return this.offset;
  }

  parseStrRaw(scratch: ByteBuffer): Reference<Uint8Array> {
    scratch.clear();
    for (;;) {
      const byte = this.next();
      if (byte === null) {
        throw this.error(ErrorCode.EofWhileParsingString);
      }
      if (byte === Byte.Quote) {
        return { kind: "copied", value: scratch.toBytes() };
      }
      if (byte === Byte.Backslash) {
        this.parseEscape(scratch);
      } else {
        scratch.push(byte);
      }
    }
  }

  parseSymbol(scratch: ByteBuffer): Reference<string> {
    scratch.clear();
    for (let byte = this.peek(); byte !== null && !isDelimiter(byte); byte = this.peek()) {
      scratch.push(byte);
      this.discard();
    }
    return { kind: "copied", value: this.decodeUtf8(scratch.view()) };
  }

  private fill(): boolean {
    if (this.cursor < this.filled) {
      return true;
    }
    if (this.exhausted) {
      return false;
    }
    let count: number;
    try {
      count = this.source.read(this.buffer);
    } catch (cause) {
      throw SexpError.io(cause);
    }
    if (count <= 0) {
      this.exhausted = true;
      return false;
    }
    this.cursor = 0;
    this.filled = count;
    return true;
  }
}
