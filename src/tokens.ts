/* Tokens, keyword phrases and character helpers */

export enum T {
  // Punctuation
  LParen, RParen, LBrace, RBrace, LBracket, RBracket, Comma,

  // Operators
  Assign,                               // ←
  Plus, Minus, Star, Slash, IntSlash, Percent,
  Eq, NotEq, Gt, GtEq, Lt, LtEq,

  // Atoms
  Identifier, Integer, Float, String,

  // Keyword phrases
  IF, THEN, ELSE, ELIF,                 // もし / ならば / そうでなければ / そうでなくもし
  EXECUTE, AND_EXECUTE,                 // を実行する / を実行し
  WHILE, REPEAT,                        // の間 / を繰り返す
  DO_REPEAT, UNTIL,                     // 繰り返し / になるまで実行する
  WO,                                   // を
  FROM, TO, BY,                         // から / まで / ずつ
  INC_LOOP, DEC_LOOP,                   // 増やしながら / 減らしながら
  DISPLAY, AND,                         // を表示する / と
  FUNCTION, DEFINE,                     // 関数 / と定義する
  ALL_ELEMENTS, ASSIGN_TO,              // のすべての要素に / を代入する
  INCREASE, DECREASE,                   // 増やす / 減らす
  LOGICAL_AND, LOGICAL_OR, LOGICAL_NOT, // かつ / または / でない
  INPUT,                                // 【外部からの入力】
  RETURN, RETURN_BARE,                  // を返す / 戻る
  TRUE, FALSE,                          // 真 / 偽

  Newline,
  EOF,
}

export type Tok = { t: T; lex: string; lit?: number | bigint | string; line: number; col: number };

export const kw = new Map<string, T>([
  ["もし", T.IF],
  ["ならば", T.THEN],
  ["そうでなければ", T.ELSE],
  ["そうでなくもし", T.ELIF],
  ["を実行する", T.EXECUTE],
  ["を実行し", T.AND_EXECUTE],
  ["の間", T.WHILE],
  ["を繰り返す", T.REPEAT],
  ["繰り返し", T.DO_REPEAT],
  ["になるまで実行する", T.UNTIL],
  ["を", T.WO],
  ["から", T.FROM],
  ["まで", T.TO],
  ["ずつ", T.BY],
  ["増やしながら", T.INC_LOOP],
  ["減らしながら", T.DEC_LOOP],
  ["を表示する", T.DISPLAY],
  ["と", T.AND],
  ["関数", T.FUNCTION],
  ["と定義する", T.DEFINE],
  ["のすべての要素に", T.ALL_ELEMENTS],
  ["を代入する", T.ASSIGN_TO],
  ["増やす", T.INCREASE],
  ["減らす", T.DECREASE],
  ["かつ", T.LOGICAL_AND],
  ["または", T.LOGICAL_OR],
  ["でない", T.LOGICAL_NOT],
  ["【外部からの入力】", T.INPUT],
  ["を返す", T.RETURN],
  ["戻る", T.RETURN_BARE],
  ["真", T.TRUE],
  ["偽", T.FALSE],
]);

/** Keyword phrases, longest first; ties keep table order. */
export const kwByLength: [string, T][] = [...kw.entries()].sort((a, b) => b[0].length - a[0].length);

/** Single-character operators and punctuation, ASCII and full-width alike. */
export const symbols = new Map<string, T>([
  ["(", T.LParen], ["（", T.LParen],
  [")", T.RParen], ["）", T.RParen],
  ["[", T.LBracket], ["［", T.LBracket],
  ["]", T.RBracket], ["］", T.RBracket],
  ["{", T.LBrace], ["｛", T.LBrace],
  ["}", T.RBrace], ["｝", T.RBrace],
  [",", T.Comma], ["，", T.Comma], ["、", T.Comma],
  ["←", T.Assign],
  ["+", T.Plus], ["＋", T.Plus],
  ["-", T.Minus], ["－", T.Minus],
  ["*", T.Star], ["＊", T.Star], ["×", T.Star],
  ["/", T.Slash], ["／", T.Slash],
  ["÷", T.IntSlash],
  ["%", T.Percent], ["％", T.Percent],
  ["=", T.Eq], ["＝", T.Eq],
  ["≠", T.NotEq],
  [">", T.Gt], ["＞", T.Gt],
  ["≧", T.GtEq], ["≥", T.GtEq],
  ["<", T.Lt], ["＜", T.Lt],
  ["≦", T.LtEq], ["≤", T.LtEq],
]);

export const STRING_DELIMS = new Map<string, string>([
  ["「", "」"],
  ['"', '"'],
]);

export const isHorizontalSpace = (ch: string) => ch === " " || ch === "\t" || ch === "\r" || ch === "　";

/** ASCII and full-width decimal digits. */
export const isDigit = (ch: string) => /[0-9０-９]/u.test(ch);
export const asciiDigit = (ch: string) => {
  const code = ch.charCodeAt(0);
  return code >= 0xff10 && code <= 0xff19 ? String.fromCharCode(code - 0xff10 + 0x30) : ch;
};
export const isPoint = (ch: string) => ch === "." || ch === "．";

export const isIdPart = (ch: string) => {
  if (ch === "\n" || isHorizontalSpace(ch)) return false;
  if (symbols.has(ch) || STRING_DELIMS.has(ch) || ch === "」") return false;
  return /[\p{L}\p{N}_]/u.test(ch) || ch.charCodeAt(0) > 0x7f;
};

/** Human-readable token kind for diagnostics. */
export const kindName = (t: T) => T[t];
