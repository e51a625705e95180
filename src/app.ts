import express from "express";
import cors from "cors";
import type { GameRouterDeps } from "./routes/game";
import { createGameRouter } from "./routes/game";

export function createApp(deps: GameRouterDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(createGameRouter(deps));

  return app;
}
