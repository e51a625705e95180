export type SqlTokenKind =
  | "whitespace"
  | "lineComment"
  | "blockComment"
  | "string"
  | "quotedIdentifier"
  | "semicolon"
  | "openParen"
  | "closeParen"
  | "word"
  | "symbol";

export type SqlToken = {
  kind: SqlTokenKind;
  text: string;
  // 0-based offset into the tokenized source.
  start: number;
  // false for a literal, quoted identifier or block comment that runs off the end of the input.
  terminated: boolean;
};

const CLOSING_QUOTE: Record<string, string> = {
  "'": "'",
  '"': '"',
  "`": "`",
  "[": "]",
};

const WHITESPACE = /\s/;
const WORD_CHAR = /[\p{L}\p{N}_$]/u;

/**
 * Lexes SQLite-flavoured SQL into a flat token stream without interpreting it.
 * Concatenating every token's text reproduces the input exactly.
 */
export function tokenizeSql(source: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  const n = source.length;
  let i = 0;

  const push = (kind: SqlTokenKind, start: number, end: number, terminated = true) => {
    tokens.push({ kind, text: source.slice(start, end), start, terminated });
  };

  while (i < n) {
    const ch = source.charAt(i);
    const next = source.charAt(i + 1);
    const start = i;

    if (WHITESPACE.test(ch)) {
      while (i < n && WHITESPACE.test(source.charAt(i))) i++;
      push("whitespace", start, i);
      continue;
    }

    if (ch === "-" && next === "-") {
      const newline = source.indexOf("\n", i + 2);
      i = newline === -1 ? n : newline;
      push("lineComment", start, i);
      continue;
    }

    if (ch === "/" && next === "*") {
      const close = source.indexOf("*/", i + 2);
      if (close === -1) {
        i = n;
        push("blockComment", start, i, false);
      } else {
        i = close + 2;
        push("blockComment", start, i);
      }
      continue;
    }

    const closing = CLOSING_QUOTE[ch];
    if (closing) {
      // '' inside '...' (and "" / `` likewise) is an escaped quote; [..] has no escape.
      const escapable = ch !== "[";
      let terminated = false;
      i++;
      while (i < n) {
        if (source.charAt(i) === closing) {
          if (escapable && source.charAt(i + 1) === closing) {
            i += 2;
            continue;
          }
          i++;
          terminated = true;
          break;
        }
        i++;
      }
      push(ch === "'" ? "string" : "quotedIdentifier", start, i, terminated);
      continue;
    }

    if (ch === ";") {
      i++;
      push("semicolon", start, i);
      continue;
    }
    if (ch === "(") {
      i++;
      push("openParen", start, i);
      continue;
    }
    if (ch === ")") {
      i++;
      push("closeParen", start, i);
      continue;
    }

    if (WORD_CHAR.test(ch)) {
      while (i < n && WORD_CHAR.test(source.charAt(i))) i++;
      push("word", start, i);
      continue;
    }

    i++;
    push("symbol", start, i);
  }

  return tokens;
}

export function isCommentToken(token: SqlToken): boolean {
  return token.kind === "lineComment" || token.kind === "blockComment";
}
