import type Database from "better-sqlite3";
import { z } from "zod";
import type { GameProgress } from "../contracts/progress";
import { GameProgressSchema } from "../contracts/progress";
import type { Scene } from "../contracts/scene";
import type { Verdict } from "../contracts/verdict";
import { POINTS_BY_VERDICT } from "../contracts/verdict";
import type { AttemptDb } from "../database";
import { InvalidSubmissionError, SceneNotFoundError } from "../errors";
import { applyVerdict, initialProgress, isCurrentScene } from "../game/progress";
import type { GradeResult } from "../grader";
import { gradeSql } from "../grader";
import type { DisplayValue } from "../grader/table";
import { toDisplayRows } from "../grader/table";
import { trace } from "../utils/trace";

export const MAX_SUBMISSION_LENGTH = 20_000;

const IDEMPOTENCY_NEEDS_PLAYER = "An idempotency key needs a playerId.";

export const SubmissionSchema = z
  .object({
    sql: z.string().max(MAX_SUBMISSION_LENGTH),
    playerId: z.string().trim().min(1).max(120).optional(),
    // Client-generated, scoped to the player; a retried request is graded but not logged or scored again.
    idempotencyKey: z.string().trim().min(1).max(200).optional(),
    progress: GameProgressSchema.optional(),
  })
  .refine((s) => s.idempotencyKey === undefined || s.playerId !== undefined, {
    message: IDEMPOTENCY_NEEDS_PLAYER,
    path: ["idempotencyKey"],
  });

export type Submission = z.infer<typeof SubmissionSchema>;

export type SubmissionResponse = {
  sceneId: number;
  verdict: Verdict;
  statement: string;
  columns?: string[];
  rows?: DisplayValue[][];
  message?: string;
  points: number;
  duplicate: boolean;
  // False when the scene is not the one at the player's current level.
  scored: boolean;
  progress: GameProgress;
};

export type SubmissionDeps = {
  scenes: Scene[];
  openGradingConnection: () => Database.Database;
  attempts: AttemptDb;
};

export function findScene(scenes: Scene[], sceneId: number): Scene {
  const scene = scenes.find((s) => s.id === sceneId);
  if (!scene) throw new SceneNotFoundError(sceneId);
  return scene;
}

export function submitAnswer(deps: SubmissionDeps, sceneId: number, submission: Submission): SubmissionResponse {
  const scene = findScene(deps.scenes, sceneId);
  if (submission.idempotencyKey !== undefined && submission.playerId === undefined) {
    throw new InvalidSubmissionError("idempotencyKey", IDEMPOTENCY_NEEDS_PLAYER);
  }

  // One connection per grading call, closed before returning.
  const db = deps.openGradingConnection();
  let result: GradeResult;
  try {
    result = gradeSql(db, submission.sql, scene.answerSql);
  } finally {
    db.close();
  }

  const before = submission.progress ?? initialProgress();
  const scored = isCurrentScene(
    before,
    deps.scenes.map((s) => s.id),
    scene.id
  );

  if (!("table" in result)) {
    if (result.verdict === "error") {
      // Authoring fault: flag the scene, never the player.
      console.error(`Reference query for scene ${scene.id} failed:`, result.message);
    }
    return {
      sceneId: scene.id,
      verdict: result.verdict,
      statement: result.statement,
      message: result.message,
      points: 0,
      duplicate: false,
      scored: false,
      progress: before,
    };
  }

  const points = scored ? POINTS_BY_VERDICT[result.verdict] : 0;
  let duplicate = false;
  if (submission.playerId) {
    const recorded = deps.attempts.record({
      playerId: submission.playerId,
      sceneId: scene.id,
      statement: result.statement,
      verdict: result.verdict,
      points,
      idempotencyKey: submission.idempotencyKey,
    });
    duplicate = recorded.duplicate;
    trace("submission.recorded", { sceneId: scene.id, verdict: result.verdict, duplicate, scored });
  }

  return {
    sceneId: scene.id,
    verdict: result.verdict,
    statement: result.statement,
    columns: result.table.columns,
    rows: toDisplayRows(result.table),
    points: duplicate ? 0 : points,
    duplicate,
    scored,
    progress: duplicate || !scored ? before : applyVerdict(before, result.verdict, deps.scenes.length),
  };
}
