import readlineSync from "readline-sync";
import type { Block, Expr, Program, Stmt } from "./ast.js";
import { ArityError, ArithmeticError, DnclTypeError, IndexError, NameError } from "./errors.js";
import {
  type Value, NONE, int, float, str, bool, arr,
  truthy, show, binary, compare, negate, expectNum, toInt, toFloat, arith,
} from "./values.js";

/* Outcome of running a statement: fall through, or leave the enclosing function. */
type Completion = { k: "Normal" } | { k: "Return"; v: Value };
const NORMAL: Completion = { k: "Normal" };

/* Scope frame */
export class Env {
  private m = new Map<string, Value>();
  constructor(readonly parent?: Env) {}
  def(n: string, v: Value): void { this.m.set(n, v); }
  get(n: string): Value {
    const v = this.m.get(n);
    if (v !== undefined) return v;
    if (this.parent) return this.parent.get(n);
    throw new NameError(n);
  }
  /** Writes where the name is bound; an unbound name lands in the outermost frame. */
  assign(n: string, v: Value): void {
    if (this.m.has(n) || !this.parent) { this.m.set(n, v); return; }
    this.parent.assign(n, v);
  }
  names(): string[] { return [...this.m.keys()]; }
}

export type Builtin = {
  arity: number;
  call(args: Value[]): Value;
};

export type UserFun = Extract<Stmt, { k: "Fun" }>;

/** Host hooks, in place of terminal and randomness dependencies. */
export type InterpreterOptions = {
  input?: () => string;
  print?: (line: string) => void;
  random?: () => number;
};

/* ---------------- Interpreter ---------------- */
export class Interpreter {
  readonly globals = new Env();
  readonly functions = new Map<string, UserFun>();
  readonly output: string[] = [];
  private readonly builtins = new Map<string, Builtin>();
  private readonly input: () => string;
  private readonly print: (line: string) => void;
  private readonly random: () => number;

  constructor(opts: InterpreterOptions = {}) {
    this.input = opts.input ?? (() => readlineSync.question(""));
    this.print = opts.print ?? (line => console.log(line));
    this.random = opts.random ?? Math.random;
    this.installBuiltins();
  }

  /** Runs top-level statements against the global frame; a top-level return ends the run. */
  run(program: Program): void {
    this.block(program.body, this.globals);
  }

  private block(stmts: Block, env: Env): Completion {
    for (const s of stmts) {
      const c = this.exec(s, env);
      if (c.k === "Return") return c;
    }
    return NORMAL;
  }

  private exec(s: Stmt, env: Env): Completion {
    switch (s.k) {
      case "Assign": {
        const v = this.eval(s.v, env);
        if (s.idx) this.store(s.n, s.idx, v, env);
        else env.def(s.n, v);
        return NORMAL;
      }
      case "Fill": {
        const v = this.eval(s.v, env);
        const target = this.array(s.n, env);
        target.items.forEach((item, i) => {
          if (item.k === "Arr") item.items.fill(v);
          else target.items[i] = v;
        });
        return NORMAL;
      }
      case "Step": {
        const cur = env.get(s.n);
        const by = this.eval(s.by, env);
        env.assign(s.n, arith(s.dir === "inc" ? "+" : "-", cur, by));
        return NORMAL;
      }
      case "Display": {
        const line = s.parts.map(p => show(this.eval(p, env))).join("");
        this.output.push(line);
        this.print(line);
        return NORMAL;
      }
      case "If": {
        if (truthy(this.eval(s.c, env))) return this.block(s.then, env);
        for (const branch of s.elifs) {
          if (truthy(this.eval(branch.c, env))) return this.block(branch.body, env);
        }
        return s.else ? this.block(s.else, env) : NORMAL;
      }
      case "While": {
        while (truthy(this.eval(s.c, env))) {
          const c = this.block(s.body, env);
          if (c.k === "Return") return c;
        }
        return NORMAL;
      }
      case "DoUntil": {
        for (;;) {
          const c = this.block(s.body, env);
          if (c.k === "Return") return c;
          if (truthy(this.eval(s.c, env))) return NORMAL;
        }
      }
      case "For": {
        // The variable is an ordinary binding: the body may move it.
        const from = this.eval(s.from, env);
        const to = expectNum(this.eval(s.to, env), "loop bound");
        const by = this.eval(s.by, env);
        env.def(s.n, expectNum(from, "loop start"));
        const op = s.dir === "inc" ? "+" : "-";
        const inRange = () => compare(s.dir === "inc" ? "<=" : ">=", expectNum(env.get(s.n), "loop variable"), to);
        while (inRange()) {
          const c = this.block(s.body, env);
          if (c.k === "Return") return c;
          env.def(s.n, arith(op, env.get(s.n), by));
        }
        return NORMAL;
      }
      case "Fun":
        this.functions.set(s.n, s);
        return NORMAL;
      case "CallS":
        this.call(s.n, s.args, env);
        return NORMAL;
      case "Return":
        return { k: "Return", v: s.v ? this.eval(s.v, env) : NONE };
    }
  }

  eval(e: Expr, env: Env): Value {
    switch (e.k) {
      case "Int": return int(e.v);
      case "Float": return float(e.v);
      case "Str": return str(e.v);
      case "Bool": return bool(e.v);
      case "Var": return env.get(e.n);
      case "ArrayLit": return arr(e.items.map(x => this.eval(x, env)));
      case "Index": return this.load(e.n, e.idx, env);
      case "Unary": {
        const r = this.eval(e.r, env);
        return e.op === "not" ? bool(!truthy(r)) : negate(r);
      }
      case "Binary": {
        const l = this.eval(e.l, env);
        const r = this.eval(e.r, env);
        return binary(e.op, l, r);
      }
      case "Call": return this.call(e.n, e.args, env);
    }
  }

  /* ---------- Calls ---------- */
  private call(n: string, argExprs: readonly Expr[], env: Env): Value {
    const args = argExprs.map(a => this.eval(a, env));

    const fn = this.functions.get(n);
    if (fn) {
      if (fn.params.length !== args.length) throw new ArityError(n, fn.params.length, args.length);
      // callee sees globals and its own frame only, never the caller's locals
      const frame = new Env(this.globals);
      fn.params.forEach((p, i) => frame.def(p, args[i]));
      const c = this.block(fn.body, frame);
      return c.k === "Return" ? c.v : NONE;
    }

    const builtin = this.builtins.get(n);
    if (!builtin) throw new NameError(n, "function");
    if (builtin.arity !== args.length) throw new ArityError(n, builtin.arity, args.length);
    return builtin.call(args);
  }

  /* ---------- Arrays ---------- */
  private array(n: string, env: Env): Extract<Value, { k: "Arr" }> {
    const v = env.get(n);
    if (v.k !== "Arr") throw new DnclTypeError(`'${n}' is not an array`);
    return v;
  }

  // Resolves all but the last index; returns the row that holds the addressed cell.
  private row(n: string, idx: readonly Expr[], env: Env): { items: Value[]; at: number } {
    if (idx.length < 1 || idx.length > 2) throw new IndexError(`'${n}' takes one or two indices, got ${idx.length}`);
    let items = this.array(n, env).items;
    const at = idx.map(x => Number(toInt(this.eval(x, env), "array index")));
    if (at.length === 2) {
      const inner = items[this.bounded(n, items, at[0])];
      if (inner.k !== "Arr") throw new IndexError(`'${n}' has no second dimension`);
      items = inner.items;
    }
    return { items, at: at[at.length - 1] };
  }

  private bounded(n: string, items: Value[], i: number): number {
    if (i < 0 || i >= items.length) throw new IndexError(`index ${i} out of range for '${n}' (length ${items.length})`);
    return i;
  }

  private load(n: string, idx: readonly Expr[], env: Env): Value {
    const { items, at } = this.row(n, idx, env);
    return items[this.bounded(n, items, at)];
  }

  // Writing one past the end appends.
  private store(n: string, idx: readonly Expr[], v: Value, env: Env): void {
    const { items, at } = this.row(n, idx, env);
    if (at === items.length) { items.push(v); return; }
    items[this.bounded(n, items, at)] = v;
  }

  /* ---------- Builtins ---------- */
  private installBuiltins() {
    const def = (name: string, arity: number, call: (args: Value[]) => Value) =>
      this.builtins.set(name, { arity, call });

    def("乱数", 2, ([lo, hi]) => {
      const m = toInt(lo, "乱数"), n = toInt(hi, "乱数");
      if (m > n) throw new ArithmeticError(`乱数: empty range ${m}..${n}`);
      return int(m + BigInt(Math.floor(this.random() * Number(n - m + 1n))));
    });
    def("奇数", 1, ([x]) => bool(toInt(x, "奇数") % 2n !== 0n));
    def("二乗", 1, ([x]) => arith("*", x, x));
    def("べき乗", 2, ([b, e]) => {
      const base = expectNum(b, "べき乗"), exp = expectNum(e, "べき乗");
      if (toFloat(base) === 0 && toFloat(exp) < 0) throw new ArithmeticError("zero raised to a negative power");
      if (base.k === "Int" && exp.k === "Int" && exp.v >= 0n) return int(base.v ** exp.v);
      return float(Math.pow(toFloat(base), toFloat(exp)));
    });
    def("外部からの入力", 0, () => str(this.input()));
  }
}
