import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import type { GradedVerdict } from "./contracts/verdict";

export function openAppDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const resolved = path.isAbsolute(dbPath) ? dbPath : path.resolve(dbPath);
    const dir = path.dirname(resolved);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  initializeAppDatabase(db);
  return db;
}

// Kept in its own file, apart from the case tables, so player queries can never read it.
export function initializeAppDatabase(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS attempts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      player_id TEXT NOT NULL,
      scene_id INTEGER NOT NULL,
      statement TEXT NOT NULL,
      verdict TEXT NOT NULL,
      points INTEGER NOT NULL,
      idempotency_key TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      UNIQUE (player_id, idempotency_key)
    )
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_attempts_player ON attempts(player_id, created_at)`);
}

export interface DBAttempt {
  id: number;
  player_id: string;
  scene_id: number;
  statement: string;
  verdict: GradedVerdict;
  points: number;
  idempotency_key: string | null;
  created_at: string;
}

export type AttemptInput = {
  playerId: string;
  sceneId: number;
  // The sanitized statement that was actually executed.
  statement: string;
  verdict: GradedVerdict;
  points: number;
  idempotencyKey?: string;
};

export type RecordOutcome = { id: number | null; duplicate: boolean };

export type AttemptDb = ReturnType<typeof createAttemptDb>;

export function createAttemptDb(db: Database.Database) {
  return {
    /**
     * Inserts one graded attempt. A key the same player already used is ignored, so a
     * resubmitted request is neither logged nor scored twice. Keys are scoped per player.
     */
    record: (input: AttemptInput): RecordOutcome => {
      const stmt = db.prepare(
        `INSERT OR IGNORE INTO attempts (player_id, scene_id, statement, verdict, points, idempotency_key)
         VALUES (?, ?, ?, ?, ?, ?)`
      );
      const result = stmt.run(
        input.playerId,
        input.sceneId,
        input.statement,
        input.verdict,
        input.points,
        input.idempotencyKey ?? null
      );
      if (result.changes === 0) return { id: null, duplicate: true };
      return { id: Number(result.lastInsertRowid), duplicate: false };
    },

    findByPlayer: (playerId: string, limit: number = 50): DBAttempt[] => {
      const stmt = db.prepare(
        `SELECT * FROM attempts WHERE player_id = ? ORDER BY created_at DESC, id DESC LIMIT ?`
      );
      return stmt.all(playerId, limit) as DBAttempt[];
    },
  };
}
