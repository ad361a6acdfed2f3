import * as readline from "readline";
import { parse } from "./compile.js";
import { DnclSyntaxError, LexicalError } from "./errors.js";
import type { Interpreter } from "./runtime.js";

// Block-opening phrases and the phrases that close them.
const OPENERS = ["もし", "繰り返し", "の間", "ながら", "関数"];
const CLOSERS = ["を実行する", "になるまで実行する", "を繰り返す", "と定義する"];

const count = (src: string, phrase: string) => src.split(phrase).length - 1;

/**
 * Whether buffered REPL input closes every block it opens.
 * A heuristic: phrases inside string literals are counted too.
 */
export function isCompleteInput(src: string): boolean {
  // そうでなくもし continues an open もし rather than opening a new one
  const opened = OPENERS.reduce((n, p) => n + count(src, p), 0) - count(src, "そうでなくもし");
  const closed = CLOSERS.reduce((n, p) => n + count(src, p), 0);
  return opened <= closed;
}

export function describeError(e: unknown): string {
  if (e instanceof LexicalError || e instanceof DnclSyntaxError) return `構文エラー: ${e.message}`;
  return `実行エラー: ${e instanceof Error ? e.message : String(e)}`;
}

const EXIT_WORDS = new Set(["exit", "quit", "exit()", "quit()"]);

/** Prompt loop over one interpreter; an error is reported and the session goes on. */
export async function startRepl(
  interp: Interpreter,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<void> {
  const rl = readline.createInterface({ input, output, prompt: ">>> " });
  let buf = "";
  rl.prompt();
  for await (const line of rl) {
    if (buf === "" && EXIT_WORDS.has(line.trim().toLowerCase())) break;
    if (buf !== "" || line.trim() !== "") buf += line + "\n";
    if (buf !== "" && isCompleteInput(buf)) {
      try { interp.run(parse(buf)); }
      catch (e) { output.write(describeError(e) + "\n"); }
      buf = "";
    }
    rl.setPrompt(buf === "" ? ">>> " : "... ");
    rl.prompt();
  }
  rl.close();
}
