import { isCommentToken, tokenizeSql } from "./tokenize";

// Zero-width space/non-joiner/joiner and the BOM; invisible, so they can smuggle text past keyword checks.
const ZERO_WIDTH = /[\u200B-\u200D\uFEFF]/g;

export type ReadOnlyCheck =
  | { accepted: true; keyword: "select" | "with" }
  | { accepted: false; reason: string };

/**
 * Replaces every comment with a single space so the tokens on either side never fuse.
 * Comment markers inside literals and quoted identifiers are left alone.
 */
export function stripComments(sql: string): string {
  return tokenizeSql(sql)
    .map((token) => (isCommentToken(token) ? " " : token.text))
    .join("");
}

/**
 * Canonical text form of a submission: NFKC, no zero-width characters, no comments,
 * single-spaced. `normalize(normalize(s)) === normalize(s)`.
 */
export function normalize(text: string): string {
  // Zero-width removal must precede NFKC, otherwise removing them could expose a new composable pair.
  const visible = String(text ?? "").replace(ZERO_WIDTH, "");
  const composed = visible.normalize("NFKC");
  const uncommented = stripComments(composed);
  const lines = uncommented.split(/\r?\n/).map((line) => line.trim());
  return lines.join("\n").replace(/\s+/g, " ").trim();
}

/**
 * Splits on statement-terminating semicolons. Semicolons inside literals, quoted
 * identifiers and comments do not split. Blank and comment-only pieces are dropped.
 */
export function splitStatements(text: string): string[] {
  const statements: string[] = [];
  let current = "";
  let hasContent = false;

  const flush = () => {
    if (hasContent) {
      const trimmed = current.trim();
      if (trimmed) statements.push(trimmed);
    }
    current = "";
    hasContent = false;
  };

  for (const token of tokenizeSql(String(text ?? ""))) {
    if (token.kind === "semicolon") {
      flush();
      continue;
    }
    current += token.text;
    if (token.kind !== "whitespace" && !isCommentToken(token)) hasContent = true;
  }
  flush();

  return statements;
}

/**
 * The only entry point for turning raw input into an executable statement.
 * Anything after the first statement is discarded, so stacked payloads never run.
 */
export function firstStatement(text: string): string {
  return splitStatements(normalize(text))[0] ?? "";
}

/**
 * Accepts statements whose leading keyword is SELECT or WITH. Expects text that has
 * already been through `firstStatement`; it does not clean its input again.
 */
export function enforceReadOnly(statement: string): ReadOnlyCheck {
  const trimmed = statement.trim();
  if (!trimmed) return { accepted: false, reason: "Empty query" };

  const keyword = /^[A-Za-z_]+/.exec(trimmed)?.[0]?.toLowerCase() ?? "";
  if (keyword === "select" || keyword === "with") {
    return { accepted: true, keyword };
  }

  const shown = keyword ? keyword.toUpperCase() : trimmed.slice(0, 20);
  return {
    accepted: false,
    reason: `Only read-only queries are allowed: the statement must start with SELECT or WITH, not "${shown}".`,
  };
}
