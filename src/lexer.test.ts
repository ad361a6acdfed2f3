import { describe, it, expect } from "vitest";
import { tokenize } from "./lexer.js";
import { T } from "./tokens.js";
import { LexicalError } from "./errors.js";

const kinds = (src: string) => tokenize(src).map(t => t.t);

function lexError(src: string): LexicalError {
  try {
    tokenize(src);
  } catch (e) {
    if (e instanceof LexicalError) return e;
    throw e;
  }
  throw new Error(`no LexicalError for ${src}`);
}

describe("Lexer", () => {
  it("scans an assignment", () => {
    const toks = tokenize("x ← 5");
    expect(toks.map(t => t.t)).toEqual([T.Identifier, T.Assign, T.Integer, T.EOF]);
    expect(toks[0].lit).toBe("x");
    expect(toks[2].lit).toBe(5n);
  });

  it("prefers the longest keyword phrase", () => {
    expect(kinds("を実行し")).toEqual([T.AND_EXECUTE, T.EOF]);
    expect(kinds("を実行する")).toEqual([T.EXECUTE, T.EOF]);
    expect(kinds("を表示する")).toEqual([T.DISPLAY, T.EOF]);
    expect(kinds("と定義する")).toEqual([T.DEFINE, T.EOF]);
    expect(kinds("と 1")).toEqual([T.AND, T.Integer, T.EOF]);
    expect(kinds("を 1 増やす")).toEqual([T.WO, T.Integer, T.INCREASE, T.EOF]);
    expect(kinds("ずつ増やしながら")).toEqual([T.BY, T.INC_LOOP, T.EOF]);
    expect(kinds("そうでなくもし")).toEqual([T.ELIF, T.EOF]);
  });

  it("recognizes the external input phrase", () => {
    expect(kinds("x ← 【外部からの入力】")).toEqual([T.Identifier, T.Assign, T.INPUT, T.EOF]);
  });

  it("tells integers from floats and reads full-width digits", () => {
    const [f] = tokenize("3.14");
    expect(f.t).toBe(T.Float);
    expect(f.lit).toBe(3.14);
    const [n] = tokenize("１２");
    expect(n.t).toBe(T.Integer);
    expect(n.lit).toBe(12n);
    expect(() => tokenize("1.5.2")).toThrow("[LEX] unexpected character '.' at 1:4");
  });

  it("takes string contents verbatim from either delimiter pair", () => {
    expect(tokenize("「こんにちは」")[0].lit).toBe("こんにちは");
    expect(tokenize('"abc"')[0].lit).toBe("abc");
    expect(tokenize("「a\\nb」")[0].lit).toBe("a\\nb");
    expect(tokenize("「a」")[0]).toMatchObject({ t: T.String, lex: "「a」" });
  });

  it("fails on an unterminated string", () => {
    expect(() => tokenize("「abc")).toThrow(LexicalError);
    expect(lexError("x ← 「abc")).toMatchObject({ line: 1, col: 5 });
  });

  it("fails on an unrecognized character", () => {
    expect(() => tokenize("x ← @")).toThrow("[LEX] unexpected character '@' at 1:5");
  });

  it("maps ASCII and full-width operators to the same kinds", () => {
    expect(kinds("＋ + － - × * ／ / ÷ ％ %")).toEqual([
      T.Plus, T.Plus, T.Minus, T.Minus, T.Star, T.Star, T.Slash, T.Slash, T.IntSlash, T.Percent, T.Percent, T.EOF,
    ]);
    expect(kinds("＝ = ≠ ＞ ≧ ＜ ≦")).toEqual([T.Eq, T.Eq, T.NotEq, T.Gt, T.GtEq, T.Lt, T.LtEq, T.EOF]);
    expect(kinds("（）［］｛｝，、")).toEqual([
      T.LParen, T.RParen, T.LBracket, T.RBracket, T.LBrace, T.RBrace, T.Comma, T.Comma, T.EOF,
    ]);
  });

  it("emits line breaks and tracks positions", () => {
    const toks = tokenize("a\n  bc");
    expect(toks.map(t => t.t)).toEqual([T.Identifier, T.Newline, T.Identifier, T.EOF]);
    expect(toks[2]).toMatchObject({ lex: "bc", line: 2, col: 3 });
    expect(toks[3]).toMatchObject({ line: 2, col: 5 });
  });

  it("reads identifiers with underscores, digits and Japanese letters", () => {
    const toks = tokenize("kosu_1 合計 Tokuten[2]");
    expect(toks.map(t => t.lex)).toEqual(["kosu_1", "合計", "Tokuten", "[", "2", "]", ""]);
  });

  it("skips the ideographic space", () => {
    expect(kinds("x　←　1")).toEqual([T.Identifier, T.Assign, T.Integer, T.EOF]);
  });
});
