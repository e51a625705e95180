import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { isRecord } from "../utils/records";
import { createCaseSchema, seedCaseData } from "./seed";

export { createCaseSchema, defaultBaseDate, seedCaseData } from "./seed";

export const CASE_TABLES = ["products", "suppliers", "warehouses", "shipments", "inventory"] as const;

function ensureParentDir(dbPath: string): void {
  if (dbPath === ":memory:") return;
  const resolved = path.isAbsolute(dbPath) ? dbPath : path.resolve(dbPath);
  const dir = path.dirname(resolved);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/** Read-write handle used once at startup to create and seed the case database. */
export function initializeCaseDatabase(dbPath: string, baseDate?: Date): void {
  ensureParentDir(dbPath);
  const db = new Database(dbPath);
  try {
    createCaseSchema(db);
    seedCaseData(db, baseDate);
  } finally {
    db.close();
  }
}

/**
 * A fresh read-only connection for a single grading call. Connections are never
 * shared between concurrent graders because rollback is connection-scoped.
 */
export function openGradingConnection(dbPath: string): Database.Database {
  return new Database(dbPath, { readonly: true, fileMustExist: true });
}

type ColumnInfo = { name: string; type: string; pk: number };

function isColumnInfo(v: unknown): v is ColumnInfo {
  return isRecord(v) && typeof v.name === "string" && typeof v.type === "string" && typeof v.pk === "number";
}

/** Markdown summary of the case tables, used to ground SQL suggestions. */
export function describeCaseSchema(db: Database.Database): string {
  const sections = CASE_TABLES.map((table) => {
    const cols = db
      .prepare(`PRAGMA table_info(${table})`)
      .all()
      .filter(isColumnInfo)
      .map((c) => `- ${c.name} ${c.type || "ANY"}${c.pk ? " (primary key)" : ""}`);
    return [`### ${table}`, ...cols].join("\n");
  });
  return sections.join("\n\n");
}
