import { z } from "zod";

export const VerdictSchema = z.enum(["correct", "partial", "incorrect", "syntax_error", "error"]);
export type Verdict = z.infer<typeof VerdictSchema>;

// Outcomes of a candidate that executed; these always carry a result table.
export type GradedVerdict = Extract<Verdict, "correct" | "partial" | "incorrect">;
// Player-side failure vs. authoring/content failure.
export type FailureVerdict = Extract<Verdict, "syntax_error" | "error">;

export const POINTS_BY_VERDICT: Record<GradedVerdict, number> = {
  correct: 2,
  partial: 1,
  incorrect: 0,
};
