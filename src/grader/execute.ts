import type Database from "better-sqlite3";
import { ExecutionRejectedError } from "../errors";
import { trace } from "../utils/trace";
import { errorMessageOf } from "./diagnostics";
import type { ResultTable } from "./table";
import { toScalar } from "./table";

/**
 * Prepares and runs one statement, materializing every row. better-sqlite3 compiles
 * the statement at prepare time, so schema errors surface before anything runs.
 */
export function executeReadOnly(db: Database.Database, statement: string): ResultTable {
  const stmt = db.prepare(statement);
  if (!stmt.readonly) {
    throw new ExecutionRejectedError("Only read-only queries (SELECT or WITH) are allowed.", { kind: "write" });
  }
  if (!stmt.reader) {
    throw new ExecutionRejectedError("The statement does not return any rows.", { kind: "no_rows" });
  }

  const columns = stmt.columns().map((c) => c.name);
  const raw: unknown[] = stmt.raw(true).safeIntegers(true).all();
  const rows = raw.map((row) => (Array.isArray(row) ? row.map((value: unknown) => toScalar(value)) : []));
  return { columns, rows };
}

/** Leaves the connection outside any transaction so the next call starts clean. */
export function rollbackIfDirty(db: Database.Database): void {
  if (!db.inTransaction) return;
  try {
    db.exec("ROLLBACK");
    trace("grader.rollback", {});
  } catch (err) {
    trace("grader.rollback_failed", { error: errorMessageOf(err) });
  }
}

/**
 * Runs `fn` with SQLite's query_only pragma on, restoring the previous setting afterwards.
 * Writes fail at the engine even if they get past every other check.
 */
export function withQueryOnly<T>(db: Database.Database, fn: () => T): T {
  const wasQueryOnly = db.pragma("query_only", { simple: true }) === 1;
  if (!wasQueryOnly) db.pragma("query_only = ON");
  try {
    return fn();
  } finally {
    if (!wasQueryOnly) db.pragma("query_only = OFF");
  }
}
