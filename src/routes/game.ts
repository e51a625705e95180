import { Router } from "express";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { Scene } from "../contracts/scene";
import { publicScene } from "../contracts/scene";
import { InvalidSubmissionError, SceneNotFoundError, SuggestionUnavailableError } from "../errors";
import type { SubmissionDeps } from "../services/submissionService";
import { SubmissionSchema, findScene, submitAnswer } from "../services/submissionService";
import type { SqlSuggestion } from "../services/sqlSuggestionService";
import { withTraceContext } from "../utils/traceContext";

export type GameRouterDeps = SubmissionDeps & {
  // Absent when no LLM is configured.
  suggestSql?: (question: string) => Promise<SqlSuggestion>;
};

const SuggestBodySchema = z.object({
  question: z.string().trim().min(1).max(1000),
});

function parseSceneId(raw: string | undefined): number | null {
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid request body.";
  const where = issue.path.length ? `${issue.path.join(".")}: ` : "";
  return `${where}${issue.message}`;
}

export function createGameRouter(deps: GameRouterDeps): Router {
  const router = Router();

  router.get("/scenes", (_req, res) => {
    res.json({ scenes: deps.scenes.map((s: Scene) => publicScene(s)) });
  });

  router.get("/scenes/:id", (req, res) => {
    const id = parseSceneId(req.params.id);
    if (id === null) return res.status(400).json({ error: "Invalid scene id." });
    try {
      return res.json({ scene: publicScene(findScene(deps.scenes, id)) });
    } catch (err) {
      if (err instanceof SceneNotFoundError) return res.status(404).json({ error: err.message });
      console.error("Error in GET /scenes/:id:", err);
      return res.status(500).json({ error: "Failed to load scene." });
    }
  });

  router.post("/scenes/:id/submit", (req, res) => {
    const id = parseSceneId(req.params.id);
    if (id === null) return res.status(400).json({ error: "Invalid scene id." });

    const parsed = SubmissionSchema.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ error: firstIssue(parsed.error) });
    const submission = parsed.data;

    try {
      const ctx = { requestId: randomUUID(), playerId: submission.playerId };
      const result = withTraceContext(ctx, () => submitAnswer(deps, id, submission));
      return res.json(result);
    } catch (err) {
      if (err instanceof SceneNotFoundError) return res.status(404).json({ error: err.message });
      if (err instanceof InvalidSubmissionError) return res.status(400).json({ error: `${err.field}: ${err.message}` });
      console.error("Error in POST /scenes/:id/submit:", err);
      return res.status(500).json({ error: "Failed to grade submission." });
    }
  });

  router.post("/suggest", async (req, res) => {
    const parsed = SuggestBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ error: firstIssue(parsed.error) });

    if (!deps.suggestSql) {
      return res.status(503).json({ error: "SQL suggestions are not configured." });
    }

    try {
      const suggestion = await deps.suggestSql(parsed.data.question);
      return res.json(suggestion);
    } catch (err) {
      if (err instanceof SuggestionUnavailableError) return res.status(503).json({ error: err.message });
      console.error("Error in POST /suggest:", err);
      return res.status(502).json({ error: "Failed to generate a SQL suggestion." });
    }
  });

  return router;
}
