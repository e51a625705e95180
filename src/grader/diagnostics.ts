export type ExecutionFailureKind =
  | "unknown_table"
  | "unknown_column"
  | "ambiguous_column"
  | "unknown_function"
  | "foreign_key"
  | "syntax_near"
  | "incomplete"
  | "read_only"
  | "generic";

export type ExecutionDiagnosis = {
  kind: ExecutionFailureKind;
  identifier?: string;
  hint: string;
};

type FailurePattern = {
  kind: ExecutionFailureKind;
  pattern: RegExp;
  hint: (identifier: string) => string;
};

export const GENERIC_EXECUTION_HINT = "SQL execution failed. Check your query syntax.";

// Matched against SQLite's error text, first match wins.
const FAILURE_PATTERNS: FailurePattern[] = [
  {
    kind: "unknown_table",
    pattern: /no such table:\s*([^\s,]+)/i,
    hint: (id) => `Table "${id}" does not exist. Check the table name against the schema.`,
  },
  {
    kind: "unknown_column",
    pattern: /no such column:\s*([^\s,]+)/i,
    hint: (id) => `Column "${id}" does not exist. Check the column name and which table it belongs to.`,
  },
  {
    kind: "ambiguous_column",
    pattern: /ambiguous column name:\s*([^\s,]+)/i,
    hint: (id) => `Column "${id}" is ambiguous. Qualify it with a table name or alias.`,
  },
  {
    kind: "unknown_function",
    pattern: /no such function:\s*([^\s,]+)/i,
    hint: (id) => `Function "${id}" is not available in SQLite.`,
  },
  {
    kind: "foreign_key",
    pattern: /FOREIGN KEY constraint failed/i,
    hint: () => "A foreign key constraint was violated. Check that the referenced rows exist.",
  },
  {
    kind: "syntax_near",
    pattern: /near "([^"]*)":\s*syntax error/i,
    hint: (id) => `Syntax error near "${id}". Check keywords, commas and quotes around it.`,
  },
  {
    kind: "incomplete",
    pattern: /incomplete input/i,
    hint: () => "The query ends unexpectedly. Check for a missing clause, parenthesis or quote.",
  },
  {
    kind: "read_only",
    pattern: /attempt to write a readonly database|readonly/i,
    hint: () => "Only read-only queries (SELECT or WITH) are allowed.",
  },
];

/**
 * Turns raw engine error text into a player-facing hint. Only the classified
 * categories are ever surfaced; unmatched text collapses to a generic message.
 */
export function diagnoseExecutionError(message: string): ExecutionDiagnosis {
  for (const { kind, pattern, hint } of FAILURE_PATTERNS) {
    const m = pattern.exec(message);
    if (!m) continue;
    const identifier = m[1];
    if (identifier !== undefined) {
      return { kind, identifier, hint: hint(identifier) };
    }
    return { kind, hint: hint("") };
  }
  return { kind: "generic", hint: GENERIC_EXECUTION_HINT };
}

export function errorMessageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
