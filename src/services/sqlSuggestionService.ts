import { z } from "zod";
import { enforceReadOnly, firstStatement } from "../grader/sanitize";
import { createAnthropicCompletion } from "../infra/llm/anthropic";
import { tryParseJson } from "../utils/jsonParser";
import { trace, traceText } from "../utils/trace";

export const INSUFFICIENT_INFO_SQL = "SELECT 'INSUFFICIENT_INFO'";

export const SQL_SUGGESTION_SYSTEM_PROMPT = `
You write safe, syntactically correct SQL for SQLite.
Answer with a single JSON object and nothing else:
{ "sql": "<one SELECT or WITH statement>", "explanation": "<one or two sentences for a learner>" }
Do not use code fences. Do not write INSERT, UPDATE, DELETE, DDL or PRAGMA statements.
If the question cannot be answered from the schema, use "SELECT 'INSUFFICIENT_INFO'" as the sql.
`;

/** The explanation travels next to the SQL rather than in any shared state. */
export type SqlSuggestion = {
  sql: string;
  explanation: string;
};

export type CompletionFn = (opts: { system: string; user: string }) => Promise<string>;

const RawSuggestionSchema = z.object({
  sql: z.string(),
  explanation: z.string().optional().default(""),
});

export function buildSuggestionPrompt(question: string, schemaMarkdown: string): string {
  return `User question:
${question.trim()}

Database schema (SQLite):
${schemaMarkdown}

Rules:
- Exactly one read-only query.
- No comments inside the SQL.`;
}

function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return trimmed;
  return trimmed
    .split(/\r?\n/)
    .filter((line) => !line.trim().startsWith("```"))
    .join("\n")
    .trim();
}

/**
 * Reduces model output to one sanitized read-only statement. Plain SQL is accepted as
 * well as the requested JSON shape; anything unsafe becomes the INSUFFICIENT_INFO sentinel.
 */
export function coerceSuggestion(rawText: string): SqlSuggestion {
  let sqlText = stripCodeFences(rawText);
  let explanation = "";

  if (sqlText.startsWith("{")) {
    try {
      const parsed = RawSuggestionSchema.safeParse(tryParseJson(sqlText));
      if (parsed.success) {
        sqlText = parsed.data.sql;
        explanation = parsed.data.explanation.trim();
      }
    } catch (err) {
      trace("suggest.json_unparsed", { error: err instanceof Error ? err.message : String(err) });
    }
  }

  // A bare "sql" label line is a common model habit.
  sqlText = sqlText.replace(/^sql\s*\n/i, "");
  const statement = firstStatement(sqlText);
  if (!enforceReadOnly(statement).accepted) {
    return { sql: INSUFFICIENT_INFO_SQL, explanation: "" };
  }
  return { sql: statement, explanation };
}

export async function suggestSql(
  question: string,
  schemaMarkdown: string,
  complete: CompletionFn = createAnthropicCompletion
): Promise<SqlSuggestion> {
  const user = buildSuggestionPrompt(question, schemaMarkdown);
  traceText("suggest.prompt", user);
  const raw = await complete({ system: SQL_SUGGESTION_SYSTEM_PROMPT, user });
  traceText("suggest.response", raw);
  const suggestion = coerceSuggestion(raw);
  trace("suggest.result", { sentinel: suggestion.sql === INSUFFICIENT_INFO_SQL });
  return suggestion;
}
