import { LexError } from "./errors";

export type ComparisonOperator = ">" | ">=" | "<" | "<=" | "==" | "!=";

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "^";

export type Punctuation = "(" | ")" | "," | "=" | ":";

export type Token =
  | { type: "number"; value: number; text: string; position: number }
  | { type: "identifier"; text: string; position: number }
  | { type: "operator"; text: ArithmeticOperator | ComparisonOperator; position: number }
  | { type: "punct"; text: Punctuation; position: number }
  | { type: "eof"; text: ""; position: number };

const TWO_CHAR_OPERATORS: Record<string, ComparisonOperator> = {
  ">=": ">=",
  "<=": "<=",
  "==": "==",
  "!=": "!=",
};

const ONE_CHAR_OPERATORS: Record<string, ArithmeticOperator | ComparisonOperator> = {
  "+": "+",
  "-": "-",
  "*": "*",
  "/": "/",
  "^": "^",
  ">": ">",
  "<": "<",
};

const PUNCTUATION: Record<string, Punctuation> = {
  "(": "(",
  ")": ")",
  ",": ",",
  "=": "=",
  ":": ":",
};

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

function isSpace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function readNumber(src: string, start: number, end: number): number {
  let i = start;
  while (i < end && isDigit(src[i])) i += 1;
  if (i < end && src[i] === ".") {
    i += 1;
    while (i < end && isDigit(src[i])) i += 1;
  }
  if (i < end && (src[i] === "e" || src[i] === "E")) {
    let j = i + 1;
    if (j < end && (src[j] === "+" || src[j] === "-")) j += 1;
    // Without digits the "e" starts an identifier instead ("2e" is 2 then e).
    if (j < end && isDigit(src[j])) {
      while (j < end && isDigit(src[j])) j += 1;
      i = j;
    }
  }
  return i;
}

/**
 * Splits `src[start, end)` into tokens. Positions are offsets into `src`, and
 * the list always ends with a single `eof` token positioned at `end`.
 */
export function tokenize(src: string, start = 0, end = src.length): Token[] {
  const tokens: Token[] = [];
  let i = start;
  while (i < end) {
    const ch = src[i];
    if (isSpace(ch)) {
      i += 1;
      continue;
    }

    if (isDigit(ch) || (ch === "." && i + 1 < end && isDigit(src[i + 1]))) {
      const stop = readNumber(src, i, end);
      const text = src.slice(i, stop);
      tokens.push({ type: "number", value: Number(text), text, position: i });
      i = stop;
      continue;
    }

    if (isIdentStart(ch)) {
      let stop = i + 1;
      while (stop < end && isIdentPart(src[stop])) stop += 1;
      tokens.push({ type: "identifier", text: src.slice(i, stop), position: i });
      i = stop;
      continue;
    }

    const pair = i + 1 < end ? TWO_CHAR_OPERATORS[src.slice(i, i + 2)] : undefined;
    if (pair) {
      tokens.push({ type: "operator", text: pair, position: i });
      i += 2;
      continue;
    }

    const single = ONE_CHAR_OPERATORS[ch];
    if (single) {
      tokens.push({ type: "operator", text: single, position: i });
      i += 1;
      continue;
    }

    const punct = PUNCTUATION[ch];
    if (punct) {
      tokens.push({ type: "punct", text: punct, position: i });
      i += 1;
      continue;
    }

    throw new LexError(i, ch);
  }
  tokens.push({ type: "eof", text: "", position: end });
  return tokens;
}

export function describeToken(token: Token): string {
  return token.type === "eof" ? "end of input" : `'${token.text}'`;
}
