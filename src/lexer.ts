import { isDirectiveLetter } from "./directives.js";
import { PatternError, type Span } from "./error.js";

export interface Token {
  kind: TokenKind;
  span: Span;
}

export type TokenKind =
  | { type: "letters"; letter: string; count: number }
  | { type: "literal"; text: string }
  | { type: "optionalStart" }
  | { type: "optionalEnd" };

const QUOTE = "'";

export function tokenize(pattern: string): Token[] {
  const lexer = new Lexer(pattern);
  return lexer.tokenize();
}

class Lexer {
  private input: string;
  private pos: number;

  constructor(input: string) {
    this.input = input;
    this.pos = 0;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (this.pos < this.input.length) {
      const start = this.pos;
      const ch = this.input[this.pos];

      if (ch === QUOTE) {
        tokens.push(this.lexQuoted());
        continue;
      }

      if (ch === "[") {
        this.pos++;
        tokens.push({ kind: { type: "optionalStart" }, span: { start, end: this.pos } });
        continue;
      }

      if (ch === "]") {
        this.pos++;
        tokens.push({ kind: { type: "optionalEnd" }, span: { start, end: this.pos } });
        continue;
      }

      if (isAlpha(ch)) {
        tokens.push(this.lexLetters());
        continue;
      }

      this.pos++;
      tokens.push({ kind: { type: "literal", text: ch }, span: { start, end: this.pos } });
    }
    return tokens;
  }

  private lexLetters(): Token {
    const start = this.pos;
    const letter = this.input[this.pos];
    while (this.pos < this.input.length && this.input[this.pos] === letter) {
      this.pos++;
    }
    const span = { start, end: this.pos };
    if (!isDirectiveLetter(letter)) {
      throw new PatternError(`unknown pattern letter '${letter}'`, span, this.input);
    }
    return {
      kind: { type: "letters", letter, count: this.pos - start },
      span,
    };
  }

  private lexQuoted(): Token {
    const start = this.pos;
    this.pos++; // opening quote

    // '' outside a quoted run is an escaped quote
    if (this.input[this.pos] === QUOTE) {
      this.pos++;
      return { kind: { type: "literal", text: QUOTE }, span: { start, end: this.pos } };
    }

    let text = "";
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos];
      if (ch === QUOTE) {
        if (this.input[this.pos + 1] === QUOTE) {
          text += QUOTE;
          this.pos += 2;
          continue;
        }
        this.pos++;
        return { kind: { type: "literal", text }, span: { start, end: this.pos } };
      }
      text += ch;
      this.pos++;
    }

    throw new PatternError(
      "unterminated quoted literal",
      { start, end: this.input.length },
      this.input,
    );
  }
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}
