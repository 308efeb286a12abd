export enum Byte {
  Tab = 0x09,
  Newline = 0x0a,
  CarriageReturn = 0x0d,
  Space = 0x20,
  Quote = 0x22,
  Hash = 0x23,
  OpenParen = 0x28,
  CloseParen = 0x29,
  Minus = 0x2d,
  Dot = 0x2e,
  Slash = 0x2f,
  Zero = 0x30,
  Nine = 0x39,
  Colon = 0x3a,
  Backslash = 0x5c,
}

export const isWhitespace = (byte: number): boolean =>
  byte === Byte.Space || byte === Byte.Newline || byte === Byte.Tab || byte === Byte.CarriageReturn;

export const isDigit = (byte: number | null): byte is number =>
  byte !== null && byte >= Byte.Zero && byte <= Byte.Nine;

export const isLetter = (byte: number): boolean =>
  (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);

/** Ends a bare symbol or keyword. */
export const isDelimiter = (byte: number): boolean =>
  isWhitespace(byte) || byte === Byte.OpenParen || byte === Byte.CloseParen || byte === Byte.Quote;

export const hexValue = (byte: number): number => {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
};
