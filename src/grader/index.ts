import type Database from "better-sqlite3";
import type { FailureVerdict, GradedVerdict } from "../contracts/verdict";
import { ExecutionRejectedError } from "../errors";
import { trace, truncate } from "../utils/trace";
import { canonicalizeTable, canonicalTablesEqual } from "./canonical";
import { diagnoseExecutionError, errorMessageOf } from "./diagnostics";
import { executeReadOnly, rollbackIfDirty, withQueryOnly } from "./execute";
import { multisetEquals, multisetOverlap } from "./multiset";
import { enforceReadOnly, firstStatement } from "./sanitize";
import { checkSyntax } from "./syntax";
import type { ResultTable } from "./table";
import { projectTable } from "./table";

export type GradeResult =
  | { verdict: GradedVerdict; statement: string; table: ResultTable }
  | { verdict: FailureVerdict; statement: string; message: string };

type Execution = { ok: true; table: ResultTable } | { ok: false; error: unknown };

function run(db: Database.Database, statement: string): Execution {
  try {
    return { ok: true, table: executeReadOnly(db, statement) };
  } catch (error) {
    rollbackIfDirty(db);
    return { ok: false, error };
  }
}

function playerFacingFailure(error: unknown): string {
  if (error instanceof ExecutionRejectedError) return error.message;
  return diagnoseExecutionError(errorMessageOf(error)).hint;
}

/**
 * Results-only comparison of two successfully executed tables:
 * exact canonical match, then same-shape multiset match, then partial overlap
 * on the columns both tables share.
 */
export function compareTables(candidate: ResultTable, reference: ResultTable): GradedVerdict {
  const u = canonicalizeTable(candidate);
  const g = canonicalizeTable(reference);

  if (canonicalTablesEqual(u, g)) return "correct";

  // Labels may differ cosmetically (aliases); the values still have to line up as a multiset.
  if (u.columns.length === g.columns.length && u.rows.length === g.rows.length) {
    if (multisetEquals(u.rows, g.rows)) return "correct";
  }

  const referenceNames = new Set(g.columns);
  const common = Array.from(new Set(u.columns.filter((name) => referenceNames.has(name))));
  if (common.length > 0) {
    const uSub = canonicalizeTable(projectTable(candidate, common));
    const gSub = canonicalizeTable(projectTable(reference, common));
    if (multisetOverlap(uSub.rows, gSub.rows) > 0) return "partial";
  }

  return "incorrect";
}

function gradeStatements(db: Database.Database, statement: string, reference: string): GradeResult {
  const candidateRun = run(db, statement);
  if (!candidateRun.ok) {
    trace("grader.candidate_failed", { error: truncate(errorMessageOf(candidateRun.error), 500) });
    return { verdict: "syntax_error", statement, message: playerFacingFailure(candidateRun.error) };
  }

  const referenceRun = run(db, reference);
  if (!referenceRun.ok) {
    const detail = errorMessageOf(referenceRun.error);
    trace("grader.reference_failed", { error: truncate(detail, 500) });
    return { verdict: "error", statement, message: `Reference query failed: ${detail}` };
  }

  const verdict = compareTables(candidateRun.table, referenceRun.table);
  return { verdict, statement, table: candidateRun.table };
}

/**
 * Grades a raw player submission against a scene's reference query on one connection.
 * Never throws: every failure becomes a `syntax_error` (player's fault) or an
 * `error` (reference/content fault). The returned `statement` is the exact text
 * that was executed and is what callers should log.
 */
export function gradeSql(db: Database.Database, candidateSql: string, referenceSql: string): GradeResult {
  const statement = firstStatement(candidateSql);
  const reference = firstStatement(referenceSql);

  if (!statement) return { verdict: "syntax_error", statement, message: "Empty query" };
  if (!reference) return { verdict: "error", statement, message: "Reference SQL missing" };

  const guard = enforceReadOnly(statement);
  if (!guard.accepted) return { verdict: "syntax_error", statement, message: guard.reason };

  const syntax = checkSyntax(statement);
  if (!syntax.ok) return { verdict: "syntax_error", statement, message: syntax.message };

  let result: GradeResult;
  try {
    result = withQueryOnly(db, () => gradeStatements(db, statement, reference));
  } catch (err) {
    // Only the pragma toggling can land here (e.g. a closed connection).
    rollbackIfDirty(db);
    result = { verdict: "error", statement, message: `Grading failed: ${errorMessageOf(err)}` };
  }

  trace("grader.verdict", {
    verdict: result.verdict,
    statementLen: statement.length,
    ...("table" in result ? { rows: result.table.rows.length } : {}),
  });
  return result;
}

export { enforceReadOnly, firstStatement, normalize, splitStatements } from "./sanitize";
export type { ResultTable, Scalar } from "./table";
