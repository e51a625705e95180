import type { GameProgress } from "../contracts/progress";
import { MAX_DIFFICULTY, MAX_STRIKES, STARTING_SCORE } from "../contracts/progress";
import type { Verdict } from "../contracts/verdict";
import { POINTS_BY_VERDICT } from "../contracts/verdict";

export function initialProgress(): GameProgress {
  return { score: STARTING_SCORE, strikes: 0, level: 0, difficulty: 1, status: "playing" };
}

/**
 * Score/strike/level bookkeeping for one graded submission.
 * Errors of either kind leave the game untouched; a finished game ignores verdicts.
 */
export function applyVerdict(progress: GameProgress, verdict: Verdict, sceneCount: number): GameProgress {
  if (progress.status !== "playing") return progress;

  switch (verdict) {
    case "correct": {
      const level = progress.level + 1;
      return {
        ...progress,
        score: progress.score + POINTS_BY_VERDICT.correct,
        level,
        difficulty: adjustDifficulty(progress.difficulty, verdict),
        status: level >= sceneCount ? "won" : "playing",
      };
    }
    case "partial":
      return { ...progress, score: progress.score + POINTS_BY_VERDICT.partial };
    case "incorrect": {
      const strikes = progress.strikes + 1;
      return {
        ...progress,
        strikes,
        difficulty: adjustDifficulty(progress.difficulty, verdict),
        status: strikes >= MAX_STRIKES ? "lost" : "playing",
      };
    }
    case "syntax_error":
    case "error":
      return progress;
  }
}

/**
 * Only the scene at the player's current level counts toward progress; answers to
 * any other scene are graded as practice.
 */
export function isCurrentScene(progress: GameProgress, sceneIds: readonly number[], sceneId: number): boolean {
  return progress.status === "playing" && sceneIds[progress.level] === sceneId;
}

/** Difficulty nudge: up after a correct answer, down after an incorrect one, clamped to 1..5. */
export function adjustDifficulty(current: number, lastVerdict: Verdict): number {
  if (lastVerdict === "correct") return Math.min(current + 1, MAX_DIFFICULTY);
  if (lastVerdict === "incorrect") return Math.max(current - 1, 1);
  return current;
}
