/* Error taxonomy. Every stage fails fast; nothing here is caught inside the core. */

export class DnclError extends Error {
  constructor(name: string, message: string) {
    super(message);
    this.name = name;
  }
}

export class LexicalError extends DnclError {
  constructor(public readonly line: number, public readonly col: number, detail: string) {
    super("LexicalError", `[LEX] ${detail} at ${line}:${col}`);
  }
}

/** Unmet parser expectation. Named `SyntaxError` at run time; the class is prefixed so the global one stays usable. */
export class DnclSyntaxError extends DnclError {
  constructor(
    public readonly line: number,
    public readonly col: number,
    public readonly expected: string,
    public readonly found: string,
  ) {
    super("SyntaxError", `[PARSE] expected ${expected}, found ${found} at ${line}:${col}`);
  }
}

export class NameError extends DnclError {
  constructor(public readonly ident: string, what: "variable" | "function" = "variable") {
    super("NameError", `${what} '${ident}' is not defined`);
  }
}

export class ArityError extends DnclError {
  constructor(public readonly callee: string, public readonly expected: number, public readonly got: number) {
    super("ArityError", `'${callee}' expects ${expected} argument(s), got ${got}`);
  }
}

export class DnclTypeError extends DnclError {
  constructor(message: string) {
    super("TypeError", message);
  }
}

export class ArithmeticError extends DnclError {
  constructor(message: string) {
    super("ArithmeticError", message);
  }
}

export class IndexError extends DnclError {
  constructor(message: string) {
    super("IndexError", message);
  }
}
