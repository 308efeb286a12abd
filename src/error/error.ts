/**
 * Errors raised while decoding or encoding S-expressions.
 *
 * Every failure surfaces as a {@link SexpError}. The error carries a code,
 * a category derived from the code, and a one-based line/column when the
 * decoder knew where it was. Errors raised away from the cursor (custom
 * messages from shapes, IO failures) start without a position and get one
 * when they pass back through the decoder.
 */

export enum Category {
  Io = "io",
  Syntax = "syntax",
  Data = "data",
  Eof = "eof",
}

export enum ErrorCode {
  Message = "Message",
  Io = "Io",
  EofWhileParsingList = "EofWhileParsingList",
  EofWhileParsingAlist = "EofWhileParsingAlist",
  EofWhileParsingString = "EofWhileParsingString",
  EofWhileParsingValue = "EofWhileParsingValue",
  ExpectedPairDot = "ExpectedPairDot",
  ExpectedListEltOrEnd = "ExpectedListEltOrEnd",
  ExpectedPairOrEnd = "ExpectedPairOrEnd",
  ExpectedList = "ExpectedList",
  ExpectedSomeIdent = "ExpectedSomeIdent",
  ExpectedSomeValue = "ExpectedSomeValue",
  ExpectedSomeString = "ExpectedSomeString",
  InvalidEscape = "InvalidEscape",
  InvalidNumber = "InvalidNumber",
  NumberOutOfRange = "NumberOutOfRange",
  InvalidUnicodeCodePoint = "InvalidUnicodeCodePoint",
  KeyMustBeAString = "KeyMustBeAString",
  LoneLeadingSurrogateInHexEscape = "LoneLeadingSurrogateInHexEscape",
  TrailingCharacters = "TrailingCharacters",
  UnexpectedEndOfHexEscape = "UnexpectedEndOfHexEscape",
  RecursionLimitExceeded = "RecursionLimitExceeded",
}

const DESCRIPTIONS: Record<Exclude<ErrorCode, ErrorCode.Message | ErrorCode.Io>, string> = {
  [ErrorCode.EofWhileParsingList]: "EOF while parsing a list",
  [ErrorCode.EofWhileParsingAlist]: "EOF while parsing an alist",
  [ErrorCode.EofWhileParsingString]: "EOF while parsing a string",
  [ErrorCode.EofWhileParsingValue]: "EOF while parsing a value",
  [ErrorCode.ExpectedPairDot]: "expected `.`",
  [ErrorCode.ExpectedListEltOrEnd]: "expected ` ` or `)`",
  [ErrorCode.ExpectedPairOrEnd]: "expected `.` or `)`",
  [ErrorCode.ExpectedList]: "expected `(`",
  [ErrorCode.ExpectedSomeIdent]: "expected ident",
  [ErrorCode.ExpectedSomeValue]: "expected value",
  [ErrorCode.ExpectedSomeString]: "expected string",
  [ErrorCode.InvalidEscape]: "invalid escape",
  [ErrorCode.InvalidNumber]: "invalid number",
  [ErrorCode.NumberOutOfRange]: "number out of range",
  [ErrorCode.InvalidUnicodeCodePoint]: "invalid unicode code point",
  [ErrorCode.KeyMustBeAString]: "key must be a string",
  [ErrorCode.LoneLeadingSurrogateInHexEscape]: "lone leading surrogate in hex escape",
  [ErrorCode.TrailingCharacters]: "trailing characters",
  [ErrorCode.UnexpectedEndOfHexEscape]: "unexpected end of hex escape",
  [ErrorCode.RecursionLimitExceeded]: "recursion limit exceeded",
};

export const categoryOf = (code: ErrorCode): Category => {
  switch (code) {
    case ErrorCode.Message:
    case ErrorCode.KeyMustBeAString:
      return Category.Data;
    case ErrorCode.Io:
      return Category.Io;
    case ErrorCode.EofWhileParsingList:
    case ErrorCode.EofWhileParsingAlist:
    case ErrorCode.EofWhileParsingString:
    case ErrorCode.EofWhileParsingValue:
      return Category.Eof;
    default:
      return Category.Syntax;
  }
};

const describeCode = (code: ErrorCode, detail: string | undefined): string => {
  if (code === ErrorCode.Message || code === ErrorCode.Io) {
    return detail ?? code;
  }
  return DESCRIPTIONS[code];
};

type SexpErrorOptions = {
  detail?: string;
  cause?: unknown;
};

export class SexpError extends Error {
  readonly code: ErrorCode;
  /** One-based line, or 0 when the position is unknown. */
  readonly line: number;
  /** One-based column, or 0 when the position is unknown. */
  readonly column: number;
  readonly detail: string | undefined;

  constructor(code: ErrorCode, line = 0, column = 0, options: SexpErrorOptions = {}) {
    const description = describeCode(code, options.detail);
    super(
      line === 0 ? description : `${description} at line ${line} column ${column}`,
      options.cause === undefined ? undefined : { cause: options.cause }
    );
    this.name = "SexpError";
    this.code = code;
    this.line = line;
    this.column = column;
    this.detail = options.detail;
  }

  static syntax(code: ErrorCode, line: number, column: number): SexpError {
    return new SexpError(code, line, column);
  }

  static io(cause: unknown): SexpError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new SexpError(ErrorCode.Io, 0, 0, { detail, cause });
  }

  static custom(message: string): SexpError {
    return new SexpError(ErrorCode.Message, 0, 0, { detail: message });
  }

  static keyMustBeAString(): SexpError {
    return new SexpError(ErrorCode.KeyMustBeAString);
  }

  classify(): Category {
    return categoryOf(this.code);
  }

  isIo(): boolean {
    return this.classify() === Category.Io;
  }

  isSyntax(): boolean {
    return this.classify() === Category.Syntax;
  }

  isData(): boolean {
    return this.classify() === Category.Data;
  }

  /**
   * Callers decoding partial input may retry once more bytes are available.
   */
  isEof(): boolean {
    return this.classify() === Category.Eof;
  }

  /**
   * Returns a copy positioned at `line`/`column`, or this error unchanged
   * when it already carries a position. The first reported position wins.
   */
  withPosition(line: number, column: number): SexpError {
    if (this.line !== 0) {
      return this;
    }
    return new SexpError(this.code, line, column, {
      detail: this.detail,
      cause: this.cause,
    });
  }
}
