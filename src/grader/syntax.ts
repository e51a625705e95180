import { tokenizeSql } from "./tokenize";

export type SyntaxCheck = { ok: true } | { ok: false; message: string };

/**
 * Structural sanity check that never touches the database: literals and quoted
 * identifiers must be closed and parentheses must balance.
 */
export function checkSyntax(statement: string): SyntaxCheck {
  let depth = 0;

  for (const token of tokenizeSql(statement)) {
    const at = token.start + 1;
    if (!token.terminated) {
      if (token.kind === "string") {
        return { ok: false, message: `Parse error: unterminated string literal starting at character ${at}.` };
      }
      if (token.kind === "quotedIdentifier") {
        return { ok: false, message: `Parse error: unterminated quoted identifier starting at character ${at}.` };
      }
      return { ok: false, message: `Parse error: unterminated comment starting at character ${at}.` };
    }
    if (token.kind === "openParen") depth++;
    if (token.kind === "closeParen") {
      depth--;
      if (depth < 0) {
        return { ok: false, message: `Parse error: unexpected ")" at character ${at}.` };
      }
    }
  }

  if (depth > 0) {
    return { ok: false, message: `Parse error: ${depth} unclosed "(" (missing closing parenthesis).` };
  }
  return { ok: true };
}
