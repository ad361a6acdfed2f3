import {
  T, Tok, kwByLength, symbols, STRING_DELIMS,
  isDigit, asciiDigit, isPoint, isHorizontalSpace, isIdPart,
} from "./tokens.js";
import { LexicalError } from "./errors.js";

export class Lexer {
  private i = 0; private line = 1; private col = 1;
  constructor(private src: string) {}

  lex(): Tok[] {
    const out: Tok[] = [];
    while (!this.eof()) {
      this.skipWS();
      if (this.eof()) break;
      const line = this.line, col = this.col;
      const c = this.peek();

      if (c === "\n") { this.advance(); out.push({ t: T.Newline, lex: "\n", line, col }); continue; }

      const close = STRING_DELIMS.get(c);
      if (close !== undefined) { out.push(this.string(close, line, col)); continue; }

      if (isDigit(c)) { out.push(this.number(line, col)); continue; }

      const sym = symbols.get(c);
      if (sym !== undefined) { this.advance(); out.push({ t: sym, lex: c, line, col }); continue; }

      if (isIdPart(c)) { out.push(this.word(line, col)); continue; }

      throw new LexicalError(line, col, `unexpected character '${c}'`);
    }
    out.push({ t: T.EOF, lex: "", line: this.line, col: this.col });
    return out;
  }

  private eof() { return this.i >= this.src.length; }
  private peek() { return this.src[this.i] ?? "\0"; }
  private peekN(n: number) { return this.src[this.i + n] ?? "\0"; }
  private advance() {
    const ch = this.src[this.i++];
    if (ch === "\n") { this.line++; this.col = 1; } else this.col++;
    return ch;
  }

  private skipWS() {
    while (!this.eof() && isHorizontalSpace(this.peek())) this.advance();
  }

  // No escapes: everything up to the closing delimiter is taken as is.
  private string(close: string, line: number, col: number): Tok {
    const open = this.advance();
    let v = "";
    while (!this.eof() && this.peek() !== close) v += this.advance();
    if (this.eof()) throw new LexicalError(line, col, `unterminated string literal opened with '${open}'`);
    this.advance();
    return { t: T.String, lex: `${open}${v}${close}`, lit: v, line, col };
  }

  private number(line: number, col: number): Tok {
    let lex = "", s = "", point = false;
    for (;;) {
      const c = this.peek();
      if (isDigit(c)) { lex += c; s += asciiDigit(c); this.advance(); continue; }
      if (isPoint(c) && !point && isDigit(this.peekN(1))) { point = true; lex += c; s += "."; this.advance(); continue; }
      break;
    }
    return point
      ? { t: T.Float, lex, lit: Number(s), line, col }
      : { t: T.Integer, lex, lit: BigInt(s), line, col };
  }

  // Longest keyword phrase first; only then a plain identifier.
  private word(line: number, col: number): Tok {
    for (const [phrase, t] of kwByLength) {
      if (this.src.startsWith(phrase, this.i)) {
        for (let k = 0; k < phrase.length; k++) this.advance();
        return { t, lex: phrase, line, col };
      }
    }
    let s = "";
    while (!this.eof() && isIdPart(this.peek())) s += this.advance();
    return { t: T.Identifier, lex: s, lit: s, line, col };
  }
}

/** Text to tokens, always terminated by EOF. */
export function tokenize(text: string): Tok[] {
  return new Lexer(text).lex();
}
