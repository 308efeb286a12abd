export type AtomKind = "symbol" | "keyword" | "string";

const KEYWORD_MARKER = "#:";

const isQuoted = (text: string): boolean =>
  text.length >= 2 &&
  ((text.startsWith('"') && text.endsWith('"')) ||
    (text.startsWith("'") && text.endsWith("'")));

/**
 * A leaf value: a bare symbol, a `#:keyword` or a quoted string.
 *
 * Two atoms are equal when both the kind and the payload text match, so the
 * symbol `a` and the string `"a"` are different atoms.
 */
export class Atom {
  private constructor(
    readonly kind: AtomKind,
    readonly text: string
  ) {}

  static symbol(text: string): Atom {
    return new Atom("symbol", text);
  }

  static keyword(text: string): Atom {
    return new Atom("keyword", text);
  }

  static string(text: string): Atom {
    return new Atom("string", text);
  }

  /**
   * Picks the kind from the token text: `#:name` is a keyword, a payload
   * wrapped in matching quotes is a string, anything else is a symbol.
   */
  static discriminate(text: string): Atom {
    if (text.startsWith(KEYWORD_MARKER)) {
      return Atom.keyword(text.slice(KEYWORD_MARKER.length));
    }
    if (isQuoted(text)) {
      return Atom.string(text.slice(1, -1));
    }
    return Atom.symbol(text);
  }

  isSymbol(): boolean {
    return this.kind === "symbol";
  }

  isKeyword(): boolean {
    return this.kind === "keyword";
  }

  isString(): boolean {
    return this.kind === "string";
  }

  equals(other: Atom): boolean {
    return this.kind === other.kind && this.text === other.text;
  }

  toString(): string {
    return this.text;
  }
}
