import type { BinOp } from "./ast.js";
import { ArithmeticError, DnclTypeError } from "./errors.js";

/* Runtime values: one tagged union, every coercion spelled out below. Integers are exact (bigint). */
export type Value =
  | { k: "Int"; v: bigint }
  | { k: "Float"; v: number }
  | { k: "Str"; v: string }
  | { k: "Bool"; v: boolean }
  | { k: "Arr"; items: Value[] }   // mutable, shared by reference
  | { k: "None" }                  // result of a function that never returned a value
  ;

export type Num = Extract<Value, { k: "Int" | "Float" }>;

export const NONE: Value = { k: "None" };
export const int = (v: bigint): Value => ({ k: "Int", v });
export const float = (v: number): Value => ({ k: "Float", v });
export const str = (v: string): Value => ({ k: "Str", v });
export const bool = (v: boolean): Value => ({ k: "Bool", v });
export const arr = (items: Value[]): Value => ({ k: "Arr", items });

export const isNum = (x: Value): x is Num => x.k === "Int" || x.k === "Float";

/** Numeric value as a float; integers past 2^53 lose precision here. */
export const toFloat = (x: Num): number => (x.k === "Int" ? Number(x.v) : x.v);

export function typeName(x: Value): string {
  switch (x.k) {
    case "Int": return "integer";
    case "Float": return "float";
    case "Str": return "string";
    case "Bool": return "boolean";
    case "Arr": return "array";
    case "None": return "no value";
  }
}

export function truthy(x: Value): boolean {
  switch (x.k) {
    case "Bool": return x.v;
    case "Int": return x.v !== 0n;
    case "Float": return x.v !== 0;
    case "Str": return x.v.length > 0;
    case "Arr": return x.items.length > 0;
    case "None": return false;
  }
}

// Shortest round-trip digits; exponent form below 1e-4 and from 1e16 up, always a fractional part otherwise.
function showFloat(v: number): string {
  if (Number.isNaN(v)) return "nan";
  if (!Number.isFinite(v)) return v > 0 ? "inf" : "-inf";
  if (Object.is(v, -0)) return "-0.0";
  const abs = Math.abs(v);
  if (abs >= 1e16 || (abs !== 0 && abs < 1e-4)) {
    const [mantissa, e] = v.toExponential().split("e");
    const exp = Number(e);
    return `${mantissa}e${exp < 0 ? "-" : "+"}${String(Math.abs(exp)).padStart(2, "0")}`;
  }
  return Number.isInteger(v) ? `${v}.0` : String(v);
}

/** Text a display statement prints for a value. */
export function show(x: Value): string {
  switch (x.k) {
    case "Int": return x.v.toString();
    case "Float": return showFloat(x.v);
    case "Str": return x.v;
    case "Bool": return x.v ? "真" : "偽";
    case "Arr": return `[${x.items.map(show).join(", ")}]`;
    case "None": return "なし";
  }
}

export function expectNum(x: Value, what: string): Num {
  if (!isNum(x)) throw new DnclTypeError(`${what} needs a number, got ${typeName(x)}`);
  return x;
}

/** Index and floor-division operands: numbers truncated toward zero. */
export function toInt(x: Value, what: string): bigint {
  const n = expectNum(x, what);
  if (n.k === "Int") return n.v;
  if (!Number.isFinite(n.v)) throw new ArithmeticError(`${what}: cannot truncate ${showFloat(n.v)} to an integer`);
  return BigInt(Math.trunc(n.v));
}

// Quotient and remainder rounded toward negative infinity.
function floorDiv(x: bigint, y: bigint): bigint {
  const q = x / y;
  return x % y !== 0n && (x < 0n) !== (y < 0n) ? q - 1n : q;
}

function floorMod(x: bigint, y: bigint): bigint {
  const r = x % y;
  return r !== 0n && (r < 0n) !== (y < 0n) ? r + y : r;
}

export function arith(op: "+" | "-" | "*" | "/" | "//" | "%", a: Value, b: Value): Value {
  if (op === "+" && a.k === "Str" && b.k === "Str") return str(a.v + b.v);
  if (!isNum(a) || !isNum(b)) {
    throw new DnclTypeError(`'${op}' is not defined for ${typeName(a)} and ${typeName(b)}`);
  }
  // Int op Int stays Int; a Float on either side makes a Float.
  const ints = a.k === "Int" && b.k === "Int" ? [a.v, b.v] as const : undefined;
  switch (op) {
    case "+": return ints ? int(ints[0] + ints[1]) : float(toFloat(a) + toFloat(b));
    case "-": return ints ? int(ints[0] - ints[1]) : float(toFloat(a) - toFloat(b));
    case "*": return ints ? int(ints[0] * ints[1]) : float(toFloat(a) * toFloat(b));
    case "/": {
      const y = toFloat(b);
      if (y === 0) throw new ArithmeticError("division by zero");
      return float(toFloat(a) / y);
    }
    case "//": {
      const y = toInt(b, "'//'");
      if (y === 0n) throw new ArithmeticError("integer division by zero");
      return int(floorDiv(toInt(a, "'//'"), y));
    }
    case "%": {
      const y = toInt(b, "'%'");
      if (y === 0n) throw new ArithmeticError("modulo by zero");
      return int(floorMod(toInt(a, "'%'"), y));
    }
  }
}

export function negate(x: Value): Value {
  const n = expectNum(x, "unary '-'");
  return n.k === "Int" ? int(-n.v) : float(-n.v);
}

function numOrder(a: Num, b: Num): number {
  if (a.k === "Int" && b.k === "Int") return a.v < b.v ? -1 : a.v > b.v ? 1 : 0;
  const x = toFloat(a), y = toFloat(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

// By Unicode code point, not UTF-16 unit.
function strOrder(a: string, b: string): number {
  const xs = [...a], ys = [...b];
  for (let i = 0; i < xs.length && i < ys.length; i++) {
    const d = (xs[i].codePointAt(0) ?? 0) - (ys[i].codePointAt(0) ?? 0);
    if (d !== 0) return d;
  }
  return xs.length - ys.length;
}

export function equals(a: Value, b: Value): boolean {
  if (isNum(a) && isNum(b)) {
    return a.k === "Int" && b.k === "Int" ? a.v === b.v : toFloat(a) === toFloat(b);
  }
  if (a.k === "Str" && b.k === "Str") return a.v === b.v;
  if (a.k === "Bool" && b.k === "Bool") return a.v === b.v;
  if (a.k === "None" && b.k === "None") return true;
  if (a.k === "Arr" && b.k === "Arr") {
    return a.items.length === b.items.length && a.items.every((x, i) => equals(x, b.items[i]));
  }
  throw new DnclTypeError(`cannot compare ${typeName(a)} with ${typeName(b)}`);
}

function order(a: Value, b: Value): number {
  if (isNum(a) && isNum(b)) return numOrder(a, b);
  if (a.k === "Str" && b.k === "Str") return strOrder(a.v, b.v);
  if (a.k === "Bool" && b.k === "Bool") return Number(a.v) - Number(b.v);
  throw new DnclTypeError(`cannot order ${typeName(a)} and ${typeName(b)}`);
}

export function compare(op: "=" | "!=" | ">" | ">=" | "<" | "<=", a: Value, b: Value): boolean {
  switch (op) {
    case "=": return equals(a, b);
    case "!=": return !equals(a, b);
    case ">": return order(a, b) > 0;
    case ">=": return order(a, b) >= 0;
    case "<": return order(a, b) < 0;
    case "<=": return order(a, b) <= 0;
  }
}

/** Evaluated operands to result, both sides already evaluated (no short-circuit). */
export function binary(op: BinOp, a: Value, b: Value): Value {
  switch (op) {
    case "and": return bool(truthy(a) && truthy(b));
    case "or": return bool(truthy(a) || truthy(b));
    case "=": case "!=": case ">": case ">=": case "<": case "<=":
      return bool(compare(op, a, b));
    default:
      return arith(op, a, b);
  }
}
