import { T, Tok, kindName } from "./tokens.js";
import type { BinOp, Block, Expr, Program, Stmt } from "./ast.js";
import { DnclSyntaxError } from "./errors.js";

const COMPARISONS = new Map<T, BinOp>([
  [T.Eq, "="], [T.NotEq, "!="], [T.Gt, ">"], [T.GtEq, ">="], [T.Lt, "<"], [T.LtEq, "<="],
]);
const ADDITIVE = new Map<T, BinOp>([[T.Plus, "+"], [T.Minus, "-"]]);
const MULTIPLICATIVE = new Map<T, BinOp>([[T.Star, "*"], [T.Slash, "/"], [T.IntSlash, "//"], [T.Percent, "%"]]);

/**
 * Recursive descent over the keyword-phrase grammar.
 *
 * Layout carries no meaning, so line breaks are dropped up front. A statement that
 * starts with an identifier cannot be classified from its first tokens alone; the
 * parser reads ahead speculatively and, when no assignment-like form matches, moves
 * the cursor back to the identifier and reads the statement as an expression
 * statement instead. Each position may be rewound to at most once.
 */
export class Parser {
  private i = 0;
  private readonly toks: readonly Tok[];
  private readonly rewound = new Set<number>();

  constructor(toks: readonly Tok[]) {
    this.toks = toks.filter(t => t.t !== T.Newline);
  }

  parse(): Program {
    const body: Stmt[] = [];
    while (!this.is(T.EOF)) body.push(this.stmt());
    return { body };
  }

  /* -------- Statements -------- */
  private stmt(): Stmt {
    if (this.is(T.FUNCTION)) return this.fnDecl();
    if (this.is(T.IF)) return this.ifStmt();
    if (this.is(T.DO_REPEAT)) return this.doUntilStmt();
    if (this.try(T.RETURN_BARE)) return { k: "Return" };
    if (this.is(T.Identifier)) return this.identStmt();
    return this.exprStmt();
  }

  // Parses statements until one of `terms` (not consumed) or EOF.
  private block(...terms: T[]): Block {
    const body: Stmt[] = [];
    while (!terms.some(t => this.is(t)) && !this.is(T.EOF)) body.push(this.stmt());
    return body;
  }

  private identStmt(): Stmt {
    const mark = this.i;
    const n = this.advance().lex;

    // Tokuten のすべての要素に 0 を代入する
    if (this.try(T.ALL_ELEMENTS)) {
      const v = this.expr();
      this.expect(T.ASSIGN_TO);
      return { k: "Fill", n, v };
    }

    // Tokuten[i] ← v, otherwise an element read opening an expression statement
    if (this.is(T.LBracket)) {
      const idx = this.indices();
      if (this.try(T.Assign)) return { k: "Assign", n, idx, v: this.expr() };
      this.rewind(mark);
      return this.exprStmt();
    }

    if (this.try(T.Assign)) return { k: "Assign", n, v: this.expr() };

    // i を 1 から …, kosu を 1 増やす, kosu を 1 減らす
    if (this.try(T.WO)) {
      const v = this.expr();
      if (this.try(T.FROM)) return this.forRest(n, v);
      if (this.try(T.INCREASE)) return { k: "Step", n, by: v, dir: "inc" };
      if (this.try(T.DECREASE)) return { k: "Step", n, by: v, dir: "dec" };
    }

    this.rewind(mark);
    return this.exprStmt();
  }

  private exprStmt(): Stmt {
    const e = this.expr();

    if (this.try(T.WHILE)) {
      this.skipCommas();
      const body = this.block(T.REPEAT);
      this.expect(T.REPEAT, "'を繰り返す'");
      return { k: "While", c: e, body };
    }

    const parts: Expr[] = [e];
    while (this.try(T.AND)) parts.push(this.expr());
    if (this.try(T.DISPLAY)) return { k: "Display", parts };
    if (parts.length > 1) throw this.err("'を表示する'");

    if (this.try(T.RETURN)) return { k: "Return", v: e };
    if (e.k === "Call") return { k: "CallS", n: e.n, args: e.args };
    throw this.err("'の間', 'を表示する' or 'を返す'");
  }

  private ifStmt(): Stmt {
    this.expect(T.IF);
    const c = this.expr();
    this.expect(T.THEN, "'ならば'");
    this.skipCommas();
    const then = this.block(T.EXECUTE, T.AND_EXECUTE);

    const elifs: { c: Expr; body: Block }[] = [];
    let otherwise: Block | undefined;
    if (this.try(T.AND_EXECUTE)) {
      this.skipCommas();
      while (this.try(T.ELIF)) {
        const ec = this.expr();
        this.expect(T.THEN, "'ならば'");
        this.skipCommas();
        elifs.push({ c: ec, body: this.block(T.EXECUTE, T.AND_EXECUTE) });
        if (!this.try(T.AND_EXECUTE)) break;
        this.skipCommas();
      }
      if (this.try(T.ELSE)) {
        this.skipCommas();
        otherwise = this.block(T.EXECUTE);
      }
    }
    // one closing phrase for the whole chain
    this.expect(T.EXECUTE, "'を実行する'");
    return { k: "If", c, then, elifs, else: otherwise };
  }

  // 繰り返し、 body を、 cond になるまで実行する
  private doUntilStmt(): Stmt {
    this.expect(T.DO_REPEAT);
    this.skipCommas();
    const body = this.block(T.WO);
    this.expect(T.WO, "'を'");
    this.skipCommas();
    const c = this.expr();
    this.expect(T.UNTIL, "'になるまで実行する'");
    return { k: "DoUntil", body, c };
  }

  // i を <from> から <to> まで <by> ずつ 増やしながら|減らしながら、 body を繰り返す
  private forRest(n: string, from: Expr): Stmt {
    const to = this.expr();
    this.expect(T.TO, "'まで'");
    const by = this.expr();
    this.expect(T.BY, "'ずつ'");
    let dir: "inc" | "dec";
    if (this.try(T.INC_LOOP)) dir = "inc";
    else if (this.try(T.DEC_LOOP)) dir = "dec";
    else throw this.err("'増やしながら' or '減らしながら'");
    this.skipCommas();
    const body = this.block(T.REPEAT);
    this.expect(T.REPEAT, "'を繰り返す'");
    return { k: "For", n, from, to, by, dir, body };
  }

  // 関数 name(params) を body と定義する; the name is every token up to '('
  private fnDecl(): Stmt {
    this.expect(T.FUNCTION);
    let n = "";
    while (!this.is(T.LParen)) {
      if (this.is(T.EOF)) throw this.err("'('");
      n += this.advance().lex;
    }
    if (n === "") throw this.err("function name");
    this.expect(T.LParen);
    const params: string[] = [];
    if (!this.is(T.RParen)) {
      do { params.push(this.expect(T.Identifier, "parameter name").lex); }
      while (this.try(T.Comma));
    }
    this.expect(T.RParen, "')'");
    this.expect(T.WO, "'を'");
    const body = this.block(T.DEFINE);
    this.expect(T.DEFINE, "'と定義する'");
    return { k: "Fun", n, params, body };
  }

  private indices(): Expr[] {
    this.expect(T.LBracket);
    const idx = [this.expr()];
    while (this.try(T.Comma)) idx.push(this.expr());
    this.expect(T.RBracket, "']'");
    return idx;
  }

  /* -------- Expressions -------- */
  private expr(): Expr { return this.or(); }

  private or(): Expr {
    let e = this.and();
    while (this.try(T.LOGICAL_OR)) e = { k: "Binary", l: e, op: "or", r: this.and() };
    return e;
  }

  private and(): Expr {
    let e = this.not();
    while (this.try(T.LOGICAL_AND)) e = { k: "Binary", l: e, op: "and", r: this.not() };
    return e;
  }

  private not(): Expr {
    if (this.try(T.LOGICAL_NOT)) return { k: "Unary", op: "not", r: this.not() };
    return this.comparison();
  }

  // at most one comparison per expression
  private comparison(): Expr {
    const l = this.additive();
    const op = COMPARISONS.get(this.peek().t);
    if (op === undefined) return l;
    this.advance();
    return { k: "Binary", l, op, r: this.additive() };
  }

  private additive(): Expr {
    let e = this.multiplicative();
    for (let op = ADDITIVE.get(this.peek().t); op !== undefined; op = ADDITIVE.get(this.peek().t)) {
      this.advance();
      e = { k: "Binary", l: e, op, r: this.multiplicative() };
    }
    return e;
  }

  private multiplicative(): Expr {
    let e = this.unary();
    for (let op = MULTIPLICATIVE.get(this.peek().t); op !== undefined; op = MULTIPLICATIVE.get(this.peek().t)) {
      this.advance();
      e = { k: "Binary", l: e, op, r: this.unary() };
    }
    return e;
  }

  private unary(): Expr {
    if (this.try(T.Minus)) return { k: "Unary", op: "-", r: this.unary() };
    return this.primary();
  }

  private primary(): Expr {
    const tok = this.peek();
    switch (tok.t) {
      case T.Integer: this.advance(); return { k: "Int", v: BigInt(tok.lit ?? 0) };
      case T.Float: this.advance(); return { k: "Float", v: Number(tok.lit) };
      case T.String: this.advance(); return { k: "Str", v: String(tok.lit) };
      case T.TRUE: this.advance(); return { k: "Bool", v: true };
      case T.FALSE: this.advance(); return { k: "Bool", v: false };
      case T.INPUT: this.advance(); return { k: "Call", n: "外部からの入力", args: [] };
      case T.LParen: {
        this.advance();
        const e = this.expr();
        this.expect(T.RParen, "')'");
        return e;
      }
      case T.LBrace: {
        this.advance();
        const items: Expr[] = [];
        if (!this.is(T.RBrace)) {
          do { items.push(this.expr()); } while (this.try(T.Comma));
        }
        this.expect(T.RBrace, "'}'");
        return { k: "ArrayLit", items };
      }
      case T.Identifier: {
        this.advance();
        if (this.is(T.LBracket)) return { k: "Index", n: tok.lex, idx: this.indices() };
        if (this.try(T.LParen)) {
          const args: Expr[] = [];
          if (!this.is(T.RParen)) {
            do { args.push(this.expr()); } while (this.try(T.Comma));
          }
          this.expect(T.RParen, "')'");
          return { k: "Call", n: tok.lex, args };
        }
        return { k: "Var", n: tok.lex };
      }
    }
    throw this.err("expression");
  }

  /* -------- helpers -------- */
  private is(t: T) { return this.peek().t === t; }
  private try(t: T) { if (this.is(t)) { this.i++; return true; } return false; }
  private expect(t: T, expected = kindName(t)): Tok { if (this.is(t)) return this.advance(); throw this.err(expected); }
  private skipCommas() { while (this.try(T.Comma)); }
  private peek(): Tok { return this.toks[Math.min(this.i, this.toks.length - 1)]; }
  private advance(): Tok {
    const tok = this.peek();
    if (tok.t !== T.EOF) this.i++;
    return tok;
  }
  private rewind(mark: number) {
    if (this.rewound.has(mark)) throw this.err("a statement that parses without a second rewind");
    this.rewound.add(mark);
    this.i = mark;
  }
  private err(expected: string) {
    const p = this.peek();
    const found = p.t === T.EOF ? "end of input" : `${kindName(p.t)} '${p.lex}'`;
    return new DnclSyntaxError(p.line, p.col, expected, found);
  }
}

/** Tokens to program; newline tokens are ignored. */
export function parseTokens(toks: readonly Tok[]): Program {
  return new Parser(toks).parse();
}
