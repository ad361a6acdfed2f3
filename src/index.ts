// Barrel: the two entry points hosts need are `parse` and `Interpreter.run`.

export { Lexer, tokenize } from "./lexer.js";
export { Parser, parseTokens } from "./parser.js";
export { parse } from "./compile.js";
export { Interpreter, Env } from "./runtime.js";
export type { InterpreterOptions, Builtin, UserFun } from "./runtime.js";
export * from "./tokens.js";
export * from "./ast.js";
export * from "./values.js";
export * from "./errors.js";
