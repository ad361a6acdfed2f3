import { describe, it, expect } from "vitest";
import { Readable, Writable } from "stream";
import { isCompleteInput, describeError, startRepl } from "./repl.js";
import { Interpreter } from "./runtime.js";
import { ArithmeticError, DnclSyntaxError, LexicalError } from "./errors.js";

describe("isCompleteInput", () => {
  it("accepts plain statements", () => {
    expect(isCompleteInput("x ← 1\n")).toBe(true);
  });

  it("waits for the closing phrase of every opened block", () => {
    expect(isCompleteInput("もし x ＞ 0 ならば\n")).toBe(false);
    expect(isCompleteInput("もし x ＞ 0 ならば\n「a」を表示する\nを実行し，そうでなくもし x ＜ 0 ならば\n")).toBe(false);
    expect(isCompleteInput("もし x ＞ 0 ならば\n「a」を表示する\nを実行し，そうでなくもし x ＜ 0 ならば\n「b」を表示する\nを実行する\n")).toBe(true);
    expect(isCompleteInput("i を 1 から 3 まで 1 ずつ増やしながら，\n")).toBe(false);
    expect(isCompleteInput("関数 f() を\n  1 を返す\n")).toBe(false);
    expect(isCompleteInput("関数 f() を\n  1 を返す\nと定義する\n")).toBe(true);
    expect(isCompleteInput("繰り返し，\nを，x ＝ 1 になるまで実行する\n")).toBe(true);
  });
});

describe("describeError", () => {
  it("labels lexical and syntax errors apart from runtime errors", () => {
    expect(describeError(new LexicalError(1, 2, "oops"))).toBe("構文エラー: [LEX] oops at 1:2");
    expect(describeError(new DnclSyntaxError(3, 4, "expression", "end of input")))
      .toBe("構文エラー: [PARSE] expected expression, found end of input at 3:4");
    expect(describeError(new ArithmeticError("division by zero"))).toBe("実行エラー: division by zero");
    expect(describeError("boom")).toBe("実行エラー: boom");
  });
});

describe("startRepl", () => {
  async function session(lines: string[]) {
    const printed: string[] = [];
    let written = "";
    const output = new Writable({
      write(chunk: Buffer | string, _enc, done) { written += chunk.toString(); done(); },
    });
    const interp = new Interpreter({ print: line => printed.push(line) });
    await startRepl(interp, Readable.from(lines.map(l => l + "\n")), output);
    return { printed, written };
  }

  it("keeps bindings between entries and buffers open blocks", async () => {
    const { printed } = await session([
      "x ← 2",
      "もし x ＞ 1 ならば",
      "  x を表示する",
      "を実行する",
    ]);
    expect(printed).toEqual(["2"]);
  });

  it("reports an error and carries on", async () => {
    const { printed, written } = await session(["y ← 1 ÷ 0", "「続く」を表示する"]);
    expect(written).toContain("実行エラー: integer division by zero\n");
    expect(printed).toEqual(["続く"]);
  });

  it("stops at an exit word", async () => {
    const { printed } = await session(["1 を表示する", "exit", "2 を表示する"]);
    expect(printed).toEqual(["1"]);
  });
});
