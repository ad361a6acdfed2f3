/* Syntax tree. Plain immutable data: the parser builds it, the interpreter only reads it. */

export type BinOp = "+" | "-" | "*" | "/" | "//" | "%" | "=" | "!=" | ">" | ">=" | "<" | "<=" | "and" | "or";
export type UnOp = "-" | "not";

export type Expr =
  | { readonly k: "Int"; readonly v: bigint }
  | { readonly k: "Float"; readonly v: number }
  | { readonly k: "Str"; readonly v: string }
  | { readonly k: "Bool"; readonly v: boolean }
  | { readonly k: "Var"; readonly n: string }
  | { readonly k: "Index"; readonly n: string; readonly idx: readonly Expr[] }    // a[i] / m[i, j]
  | { readonly k: "ArrayLit"; readonly items: readonly Expr[] }
  | { readonly k: "Binary"; readonly l: Expr; readonly op: BinOp; readonly r: Expr }
  | { readonly k: "Unary"; readonly op: UnOp; readonly r: Expr }
  | { readonly k: "Call"; readonly n: string; readonly args: readonly Expr[] }
  ;

export type Block = readonly Stmt[];

export type Stmt =
  | { readonly k: "Assign"; readonly n: string; readonly idx?: readonly Expr[]; readonly v: Expr }
  | { readonly k: "Fill"; readonly n: string; readonly v: Expr }
  | { readonly k: "Step"; readonly n: string; readonly by: Expr; readonly dir: "inc" | "dec" }
  | { readonly k: "Display"; readonly parts: readonly Expr[] }
  | { readonly k: "If"; readonly c: Expr; readonly then: Block; readonly elifs: readonly { readonly c: Expr; readonly body: Block }[]; readonly else?: Block }
  | { readonly k: "While"; readonly c: Expr; readonly body: Block }
  | { readonly k: "DoUntil"; readonly body: Block; readonly c: Expr }
  | { readonly k: "For"; readonly n: string; readonly from: Expr; readonly to: Expr; readonly by: Expr; readonly dir: "inc" | "dec"; readonly body: Block }
  | { readonly k: "Fun"; readonly n: string; readonly params: readonly string[]; readonly body: Block }
  | { readonly k: "CallS"; readonly n: string; readonly args: readonly Expr[] }
  | { readonly k: "Return"; readonly v?: Expr }
  ;

export type Program = { readonly body: Block };

type Node = Expr | Stmt | Program | Block;

/** Structural equality over syntax trees (absent and `undefined` fields are the same). */
export function nodeEquals(a: Node, b: Node): boolean {
  return sameShape(a, b);
}

function sameShape(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((x, i) => sameShape(x, b[i]));
  }
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (!sameShape(Reflect.get(a, key), Reflect.get(b, key))) return false;
  }
  return true;
}
