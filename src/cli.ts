#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import { tokenize } from "./lexer.js";
import { Parser } from "./parser.js";
import { Interpreter } from "./runtime.js";
import { describeError, startRepl } from "./repl.js";
import { kindName } from "./tokens.js";

function runFile(interp: Interpreter, file: string, verbose: boolean) {
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    console.error(`エラー: ファイル '${file}' が見つかりません`);
    process.exitCode = 1;
    return;
  }
  const src = fs.readFileSync(abs, "utf8");
  try {
    const toks = tokenize(src);
    if (verbose) {
      console.log("=== トークン ===");
      for (const t of toks) console.log(`  ${kindName(t.t)} ${JSON.stringify(t.lex)} ${t.line}:${t.col}`);
    }
    const program = new Parser(toks).parse();
    if (verbose) console.log(`=== 文: ${program.body.length} ===`);
    interp.run(program);
  } catch (e) {
    console.error(describeError(e));
    process.exitCode = 1;
  }
}

/* --- argv & start --- */
const args = process.argv.slice(2);
const verbose = args.includes("-v") || args.includes("--verbose");
const file = args.find(a => !a.startsWith("-"));

const interp = new Interpreter();

if (file) runFile(interp, file, verbose);
else await startRepl(interp);
