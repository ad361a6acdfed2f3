import { describe, it, expect } from "vitest";
import { int, float, str, bool, arr, NONE, truthy, show, arith, compare, binary, negate } from "./values.js";
import { ArithmeticError, DnclTypeError } from "./errors.js";

describe("truthiness", () => {
  it("follows the value kind", () => {
    expect(truthy(int(0n))).toBe(false);
    expect(truthy(int(-3n))).toBe(true);
    expect(truthy(float(0))).toBe(false);
    expect(truthy(float(0.1))).toBe(true);
    expect(truthy(str(""))).toBe(false);
    expect(truthy(str("a"))).toBe(true);
    expect(truthy(bool(false))).toBe(false);
    expect(truthy(arr([]))).toBe(false);
    expect(truthy(NONE)).toBe(false);
  });
});

describe("show", () => {
  it("formats every kind", () => {
    expect(show(int(42n))).toBe("42");
    expect(show(float(2))).toBe("2.0");
    expect(show(float(0.25))).toBe("0.25");
    expect(show(str("あ"))).toBe("あ");
    expect(show(bool(true))).toBe("真");
    expect(show(arr([int(1n), arr([str("a"), float(1.5)])]))).toBe("[1, [a, 1.5]]");
    expect(show(NONE)).toBe("なし");
  });

  it("switches floats to exponent form at the extremes", () => {
    expect(show(float(1e16))).toBe("1e+16");
    expect(show(float(1e15))).toBe("1000000000000000.0");
    expect(show(float(1.5e-7))).toBe("1.5e-07");
    expect(show(float(0.0001))).toBe("0.0001");
    expect(show(float(-0))).toBe("-0.0");
  });
});

describe("arith", () => {
  it("keeps integers exact and promotes on a float operand", () => {
    expect(arith("+", int(2n), int(3n))).toEqual(int(5n));
    expect(arith("*", int(2n), float(1.5))).toEqual(float(3));
    expect(arith("-", float(1), int(1n))).toEqual(float(0));
  });

  it("keeps integers exact past the float range", () => {
    expect(arith("*", int(99999999999n), int(99999999999n))).toEqual(int(9999999999800000000001n));
    expect(show(arith("+", int(9007199254740993n), int(0n)))).toBe("9007199254740993");
    expect(arith("//", int(100000000000000000001n), int(-3n))).toEqual(int(-33333333333333333334n));
    expect(arith("%", int(100000000000000000001n), int(-3n))).toEqual(int(-1n));
  });

  it("always divides to a float with '/'", () => {
    expect(arith("/", int(4n), int(2n))).toEqual(float(2));
    expect(arith("/", int(1n), int(4n))).toEqual(float(0.25));
  });

  it("floors integer division and modulo after truncating operands", () => {
    expect(arith("//", int(7n), int(2n))).toEqual(int(3n));
    expect(arith("//", int(-7n), int(2n))).toEqual(int(-4n));
    expect(arith("//", float(7.9), float(2.5))).toEqual(int(3n));
    expect(arith("%", int(-7n), int(3n))).toEqual(int(2n));
    expect(arith("%", int(7n), int(-3n))).toEqual(int(-2n));
  });

  it("rejects a zero divisor", () => {
    expect(() => arith("//", int(1n), int(0n))).toThrow(ArithmeticError);
    expect(() => arith("%", int(1n), float(0.5))).toThrow(ArithmeticError);
    expect(() => arith("/", int(1n), float(0))).toThrow(ArithmeticError);
  });

  it("concatenates two strings and rejects other mixes", () => {
    expect(arith("+", str("a"), str("b"))).toEqual(str("ab"));
    expect(() => arith("+", str("a"), int(1n))).toThrow(DnclTypeError);
    expect(() => arith("*", bool(true), int(1n))).toThrow("'*' is not defined for boolean and integer");
  });

  it("negates numbers only", () => {
    expect(negate(int(3n))).toEqual(int(-3n));
    expect(negate(float(1.5))).toEqual(float(-1.5));
    expect(() => negate(str("a"))).toThrow(DnclTypeError);
  });
});

describe("compare", () => {
  it("orders numbers across kinds, strings and booleans", () => {
    expect(compare("=", int(1n), float(1))).toBe(true);
    expect(compare("<", int(1n), float(1.5))).toBe(true);
    expect(compare(">=", str("b"), str("a"))).toBe(true);
    expect(compare("<", bool(false), bool(true))).toBe(true);
    expect(compare("<", str("～"), str("😀"))).toBe(true);
    expect(compare(">", str("ab"), str("a"))).toBe(true);
  });

  it("compares arrays structurally for equality only", () => {
    expect(compare("=", arr([int(1n), int(2n)]), arr([int(1n), float(2)]))).toBe(true);
    expect(compare("!=", arr([int(1n)]), arr([int(1n), int(2n)]))).toBe(true);
    expect(() => compare("<", arr([]), arr([]))).toThrow(DnclTypeError);
  });

  it("rejects incompatible operand types", () => {
    expect(() => compare("=", int(1n), str("1"))).toThrow("cannot compare integer with string");
    expect(() => compare(">", arr([]), int(0n))).toThrow("cannot order array and integer");
  });
});

describe("binary", () => {
  it("coerces logical operands to booleans", () => {
    expect(binary("and", int(1n), str("x"))).toEqual(bool(true));
    expect(binary("or", int(0n), str(""))).toEqual(bool(false));
    expect(binary("<=", int(2n), int(2n))).toEqual(bool(true));
  });
});
