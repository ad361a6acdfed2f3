import { tokenize } from "./lexer.js";
import { Parser } from "./parser.js";
import type { Program } from "./ast.js";

/**
 * parse: text → Program.
 * Lexing and parsing only; throws LexicalError or DnclSyntaxError.
 */
export function parse(source: string): Program {
  return new Parser(tokenize(source)).parse();
}
