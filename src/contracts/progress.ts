import { z } from "zod";

export const GameStatusSchema = z.enum(["playing", "won", "lost"]);
export type GameStatus = z.infer<typeof GameStatusSchema>;

export const GameProgressSchema = z
  .object({
    score: z.number().int(),
    strikes: z.number().int().min(0),
    // 0-based index into the scene catalog.
    level: z.number().int().min(0),
    difficulty: z.number().int().min(1).max(5),
    status: GameStatusSchema,
  })
  .strict();

export type GameProgress = z.infer<typeof GameProgressSchema>;

export const STARTING_SCORE = 10;
export const MAX_STRIKES = 3;
export const MAX_DIFFICULTY = 5;
