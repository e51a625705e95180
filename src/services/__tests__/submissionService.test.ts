import Database from "better-sqlite3";
import { beforeEach, describe, it, expect } from "vitest";
import { createCaseSchema, seedCaseData } from "../../casefile";
import { loadScenes } from "../../contracts/scene";
import type { AttemptDb } from "../../database";
import { createAttemptDb, initializeAppDatabase } from "../../database";
import { InvalidSubmissionError, SceneNotFoundError } from "../../errors";
import { initialProgress } from "../../game/progress";
import type { SubmissionDeps } from "../submissionService";
import { SubmissionSchema, submitAnswer } from "../submissionService";

const BASE_DATE = new Date("2024-03-10T00:00:00Z");

function openCaseDb(): Database.Database {
  const db = new Database(":memory:");
  createCaseSchema(db);
  seedCaseData(db, BASE_DATE);
  return db;
}

describe("submissionService.ts", () => {
  let attempts: AttemptDb;
  let deps: SubmissionDeps;

  beforeEach(() => {
    const appDb = new Database(":memory:");
    initializeAppDatabase(appDb);
    attempts = createAttemptDb(appDb);
    deps = { scenes: loadScenes(), openGradingConnection: openCaseDb, attempts };
  });

  it("grades, scores and logs a correct answer", () => {
    const response = submitAnswer(deps, 1, {
      sql: "SELECT stock FROM inventory WHERE inventory_id = 1",
      playerId: "player-1",
    });

    expect(response).toEqual({
      sceneId: 1,
      verdict: "correct",
      statement: "SELECT stock FROM inventory WHERE inventory_id = 1",
      columns: ["stock"],
      rows: [[200]],
      points: 2,
      duplicate: false,
      scored: true,
      progress: { score: 12, strikes: 0, level: 1, difficulty: 2, status: "playing" },
    });
    const logged = attempts.findByPlayer("player-1");
    expect(logged).toHaveLength(1);
    expect(logged[0]?.verdict).toBe("correct");
    expect(logged[0]?.points).toBe(2);
  });

  it("does not score a retried request twice", () => {
    const submission = {
      sql: "SELECT stock FROM inventory WHERE inventory_id = 1",
      playerId: "player-1",
      idempotencyKey: "retry-key",
    };
    submitAnswer(deps, 1, submission);
    const retried = submitAnswer(deps, 1, submission);

    expect(retried.duplicate).toBe(true);
    expect(retried.points).toBe(0);
    expect(retried.progress).toEqual(initialProgress());
    expect(attempts.findByPlayer("player-1")).toHaveLength(1);
  });

  it("adds a strike for a wrong answer", () => {
    const response = submitAnswer(deps, 2, {
      sql: "SELECT capacity FROM warehouses WHERE location = 'New York'",
      progress: { score: 12, strikes: 0, level: 1, difficulty: 2, status: "playing" },
    });
    expect(response.verdict).toBe("incorrect");
    expect(response.points).toBe(0);
    expect(response.progress).toEqual({ score: 12, strikes: 1, level: 1, difficulty: 1, status: "playing" });
  });

  it("only advances on the scene at the current level", () => {
    const solveSceneOne = { sql: "SELECT stock FROM inventory WHERE inventory_id = 1", playerId: "player-1" };
    const first = submitAnswer(deps, 1, solveSceneOne);
    expect(first.progress.level).toBe(1);

    const replay = submitAnswer(deps, 1, { ...solveSceneOne, progress: first.progress });
    expect(replay.verdict).toBe("correct");
    expect(replay.scored).toBe(false);
    expect(replay.points).toBe(0);
    expect(replay.progress).toEqual(first.progress);
  });

  it("does not let a solved scene win the game by repetition", () => {
    const sql = "SELECT stock FROM inventory WHERE inventory_id = 1";
    let progress = initialProgress();
    for (let i = 0; i < 5; i++) {
      progress = submitAnswer(deps, 1, { sql, progress }).progress;
    }
    expect(progress).toEqual({ score: 12, strikes: 0, level: 1, difficulty: 2, status: "playing" });
  });

  it("ignores a wrong answer to another scene", () => {
    const response = submitAnswer(deps, 3, { sql: "SELECT 1", progress: initialProgress() });
    expect(response.verdict).toBe("incorrect");
    expect(response.scored).toBe(false);
    expect(response.progress).toEqual(initialProgress());
  });

  it("requires a player for an idempotency key", () => {
    const submission = { sql: "SELECT stock FROM inventory WHERE inventory_id = 1", idempotencyKey: "k1" };
    expect(() => submitAnswer(deps, 1, submission)).toThrow(InvalidSubmissionError);

    const parsed = SubmissionSchema.safeParse(submission);
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.error.issues[0]?.path).toEqual(["idempotencyKey"]);
  });

  it("scopes idempotency keys to the player", () => {
    const sql = "SELECT stock FROM inventory WHERE inventory_id = 1";
    const first = submitAnswer(deps, 1, { sql, playerId: "player-1", idempotencyKey: "k1" });
    const second = submitAnswer(deps, 1, { sql, playerId: "player-2", idempotencyKey: "k1" });

    expect(first.duplicate).toBe(false);
    expect(second.duplicate).toBe(false);
    expect(second.points).toBe(2);
    expect(attempts.findByPlayer("player-1")).toHaveLength(1);
    expect(attempts.findByPlayer("player-2")).toHaveLength(1);
  });

  it("neither logs nor scores a syntax error", () => {
    const response = submitAnswer(deps, 1, { sql: "SELEC stock", playerId: "player-1" });
    expect(response.verdict).toBe("syntax_error");
    expect(response.points).toBe(0);
    expect(response.progress).toEqual(initialProgress());
    expect(response.rows).toBeUndefined();
    expect(attempts.findByPlayer("player-1")).toHaveLength(0);
  });

  it("throws for an unknown scene", () => {
    expect(() => submitAnswer(deps, 99, { sql: "SELECT 1" })).toThrow(SceneNotFoundError);
  });
});
