import type { Output } from "./output.js";

export enum CharEscape {
  Quote,
  ReverseSolidus,
  Backspace,
  FormFeed,
  LineFeed,
  CarriageReturn,
  Tab,
  /** Any other byte below 0x20, written as `\u00XX`. */
  AsciiControl,
}

const escapeFor = (byte: number): CharEscape | undefined => {
  switch (byte) {
    case 0x22:
      return CharEscape.Quote;
    case 0x5c:
      return CharEscape.ReverseSolidus;
    case 0x08:
      return CharEscape.Backspace;
    case 0x0c:
      return CharEscape.FormFeed;
    case 0x0a:
      return CharEscape.LineFeed;
    case 0x0d:
      return CharEscape.CarriageReturn;
    case 0x09:
      return CharEscape.Tab;
    default:
      return byte < 0x20 ? CharEscape.AsciiControl : undefined;
  }
};

/** Escape for each byte value, `undefined` where the byte is written as is. */
export const ESCAPE: readonly (CharEscape | undefined)[] = Array.from({ length: 256 }, (_, byte) =>
  escapeFor(byte)
);

const HEX = "0123456789abcdef";

/**
 * Moves the exponent of `String(number)` output into the digits, since the
 * text grammar has no exponent syntax, and makes sure a fractional part is
 * present.
 */
const plainDecimal = (text: string): string => {
  const sign = text.startsWith("-") ? "-" : "";
  const body = sign ? text.slice(1) : text;
  const e = body.indexOf("e");
  if (e < 0) {
    return sign + (body.includes(".") ? body : `${body}.0`);
  }
  const mantissa = body.slice(0, e);
  const exponent = Number(body.slice(e + 1));
  const dot = mantissa.indexOf(".");
  const digits = dot < 0 ? mantissa : mantissa.slice(0, dot) + mantissa.slice(dot + 1);
  const point = (dot < 0 ? mantissa.length : dot) + exponent;
  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${"0".repeat(point - digits.length)}.0`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
};

/** Shortest decimal that reads back as the same double. */
export const formatF64 = (value: number): string =>
  plainDecimal(Object.is(value, -0) ? "-0" : String(value));

/** Shortest decimal that reads back as the same single-precision value. */
export const formatF32 = (value: number): string => {
  const single = Math.fround(value);
  if (single === 0) {
    return Object.is(single, -0) ? "-0.0" : "0.0";
  }
  for (let precision = 1; precision < 9; precision++) {
    const candidate = Number(single.toPrecision(precision));
    if (Math.fround(candidate) === single) {
      return plainDecimal(String(candidate));
    }
  }
  return plainDecimal(String(Number(single.toPrecision(9))));
};

/**
 * Decides the text for every lexical event the encoder produces. The
 * defaults write the compact layout; override single hooks to change it.
 */
export class Formatter {
  writeNull(out: Output): void {
    out.write("#nil");
  }

  writeBool(out: Output, value: boolean): void {
    out.write(value ? "#t" : "#f");
  }

  writeInteger(out: Output, value: number | bigint): void {
    out.write(String(value));
  }

  writeF32(out: Output, value: number): void {
    out.write(formatF32(value));
  }

  writeF64(out: Output, value: number): void {
    out.write(formatF64(value));
  }

  writeSymbol(out: Output, name: string): void {
    out.write(name);
  }

  writeKeyword(out: Output, name: string): void {
    out.write(`#:${name}`);
  }

  beginString(out: Output): void {
    out.write('"');
  }

  endString(out: Output): void {
    out.write('"');
  }

  writeStringFragment(out: Output, fragment: string): void {
    out.write(fragment);
  }

  writeCharEscape(out: Output, escape: CharEscape, byte: number): void {
    switch (escape) {
      case CharEscape.Quote:
        out.write('\\"');
        return;
      case CharEscape.ReverseSolidus:
        out.write("\\\\");
        return;
      case CharEscape.Backspace:
        out.write("\\b");
        return;
      case CharEscape.FormFeed:
        out.write("\\f");
        return;
      case CharEscape.LineFeed:
        out.write("\\n");
        return;
      case CharEscape.CarriageReturn:
        out.write("\\r");
        return;
      case CharEscape.Tab:
        out.write("\\t");
        return;
      case CharEscape.AsciiControl:
        out.write(`\\u00${HEX[byte >> 4]}${HEX[byte & 0xf]}`);
        return;
    }
  }

  beginArray(out: Output): void {
    out.write("(");
  }

  endArray(out: Output): void {
    out.write(")");
  }

  beginArrayValue(out: Output, first: boolean): void {
    if (!first) {
      out.write(" ");
    }
  }

  endArrayValue(_out: Output): void {
    // Nothing between elements beyond the separator.
  }

  /** Written between the head elements and the tail of an improper list. */
  beginTail(out: Output): void {
    out.write(" . ");
  }

  endTail(_out: Output): void {
    // The closing delimiter follows directly.
  }

  beginObject(out: Output): void {
    out.write("(");
  }

  endObject(out: Output): void {
    out.write(")");
  }

  beginObjectKey(out: Output, first: boolean): void {
    out.write(first ? "(" : " (");
  }

  beginObjectValue(out: Output): void {
    out.write(" . ");
  }

  endObjectValue(out: Output): void {
    out.write(")");
  }
}

/** No whitespace beyond single spaces between elements. */
export class CompactFormatter extends Formatter {}

/**
 * One element or entry per line, indented by depth. A non-empty aggregate
 * closes on its own line; an empty one stays `()`.
 */
export class PrettyFormatter extends Formatter {
  private currentIndent = 0;
  private hasValue = false;

  constructor(private readonly indent = "  ") {
    super();
  }

  beginArray(out: Output): void {
    this.open(out);
  }

  endArray(out: Output): void {
    this.close(out);
  }

  beginArrayValue(out: Output, _first: boolean): void {
    this.newline(out);
  }

  endArrayValue(_out: Output): void {
    this.hasValue = true;
  }

  beginTail(out: Output): void {
    this.newline(out);
    out.write(". ");
  }

  endTail(_out: Output): void {
    this.hasValue = true;
  }

  beginObject(out: Output): void {
    this.open(out);
  }

  endObject(out: Output): void {
    this.close(out);
  }

  beginObjectKey(out: Output, _first: boolean): void {
    this.newline(out);
    out.write("(");
  }

  endObjectValue(out: Output): void {
    out.write(")");
    this.hasValue = true;
  }

  private open(out: Output): void {
    this.currentIndent += 1;
    this.hasValue = false;
    out.write("(");
  }

  private close(out: Output): void {
    this.currentIndent -= 1;
    if (this.hasValue) {
      this.newline(out);
    }
    out.write(")");
  }

  private newline(out: Output): void {
    out.write("\n");
    out.write(this.indent.repeat(this.currentIndent));
  }
}
