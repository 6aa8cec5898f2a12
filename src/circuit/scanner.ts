/**
 * Lexer for circuit definition files.
 *
 * Supports:
 *   keywords (DEVICES, CONNECT, MONITOR, END and the device kinds),
 *   names, decimal digit strings, and the punctuation , ; : . >
 *
 * `#` comments run to end of line; `!` opens a block comment that the next `!` closes.
 */

import type { NameTable } from "./names.js";

export type TokenKind =
  | "KEYWORD"
  | "NAME"
  | "NUMBER"
  | "COMMA" // ,
  | "SEMICOLON" // ;
  | "COLON" // :
  | "DOT" // .
  | "ARROW" // >
  | "EOF"
  | "INVALID";

export interface Token {
  kind: TokenKind;
  text: string;
  /** Interned id for KEYWORD and NAME tokens. */
  id?: number;
  line: number;
  column: number;
  /** Set on the INVALID token emitted for a `!` comment that never closes. */
  unterminatedComment?: boolean;
}

export const SECTION_KEYWORDS = ["DEVICES", "CONNECT", "MONITOR", "END"] as const;
export const DEVICE_KEYWORDS = ["CLOCK", "SWITCH", "AND", "NAND", "OR", "NOR", "DTYPE", "XOR", "RC", "SIGGEN"] as const;

const KEYWORDS: ReadonlySet<string> = new Set<string>([...SECTION_KEYWORDS, ...DEVICE_KEYWORDS]);

const PUNCTUATION: Record<string, TokenKind> = {
  ",": "COMMA",
  ";": "SEMICOLON",
  ":": "COLON",
  ".": "DOT",
  ">": "ARROW",
};

const isWordChar = (c: string) => /[A-Za-z0-9_]/.test(c);

export class Scanner implements Iterable<Token> {
  private pos = 0;
  private line = 1;
  private column = 1;
  private done = false;
  private readonly lines: string[];

  constructor(
    private readonly source: string,
    private readonly names: NameTable,
  ) {
    this.lines = source.split(/\r?\n/);
  }

  /** Text of a 1-based source line, without its line break. */
  lineText(line: number): string {
    return this.lines[line - 1] ?? "";
  }

  next(): Token {
    if (this.done) return this.token("EOF", "", this.line, this.column);

    const skipped = this.skipWhitespaceAndComments();
    if (skipped) return skipped;

    if (this.pos >= this.source.length) {
      this.done = true;
      return this.token("EOF", "", this.line, this.column);
    }

    const line = this.line;
    const column = this.column;
    const c = this.source[this.pos];

    if (isWordChar(c)) {
      let word = "";
      while (this.pos < this.source.length && isWordChar(this.source[this.pos])) {
        word += this.source[this.pos];
        this.advance();
      }
      if (/^\d+$/.test(word)) return this.token("NUMBER", word, line, column);
      const kind: TokenKind = KEYWORDS.has(word) ? "KEYWORD" : "NAME";
      return { ...this.token(kind, word, line, column), id: this.names.intern(word) };
    }

    const punct = PUNCTUATION[c];
    if (punct) {
      this.advance();
      return this.token(punct, c, line, column);
    }
    // One INVALID token per code point, so astral characters count as a single column.
    const point = String.fromCodePoint(this.source.codePointAt(this.pos) ?? 0xfffd);
    this.column++;
    this.pos += point.length;
    return this.token("INVALID", point, line, column);
  }

  *[Symbol.iterator](): Iterator<Token> {
    while (true) {
      const t = this.next();
      yield t;
      if (t.kind === "EOF") return;
    }
  }

  /** Skips blanks and comments; returns an INVALID token if a block comment never closes. */
  private skipWhitespaceAndComments(): Token | undefined {
    while (this.pos < this.source.length) {
      const c = this.source[this.pos];
      if (/\s/.test(c)) {
        this.advance();
        continue;
      }
      if (c === "#") {
        while (this.pos < this.source.length && this.source[this.pos] !== "\n") this.advance();
        continue;
      }
      if (c === "!") {
        const line = this.line;
        const column = this.column;
        this.advance();
        while (this.pos < this.source.length && this.source[this.pos] !== "!") this.advance();
        if (this.pos >= this.source.length) {
          this.done = true;
          return { ...this.token("INVALID", "!", line, column), unterminatedComment: true };
        }
        this.advance();
        continue;
      }
      break;
    }
    return undefined;
  }

  private advance(): void {
    if (this.source[this.pos] === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos++;
  }

  private token(kind: TokenKind, text: string, line: number, column: number): Token {
    return { kind, text, line, column };
  }
}
