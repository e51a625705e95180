import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const DATA_DIR = path.join(__dirname, "..", "data");

const flag = z
  .string()
  .optional()
  .transform((v) => v === "1");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  DETECTIVE_CASE_DB_PATH: z.string().trim().min(1).default(path.join(DATA_DIR, "casefile.db")),
  DETECTIVE_APP_DB_PATH: z.string().trim().min(1).default(path.join(DATA_DIR, "app.db")),
  DETECTIVE_TRACE: flag,
  DETECTIVE_TRACE_FULL: flag,
  ANTHROPIC_API_KEY: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined)),
  // NOTE: must match a model id your Anthropic account can use.
  CLAUDE_MODEL: z.string().trim().min(1).default("claude-haiku-4-5-20251001"),
  DETECTIVE_SUGGEST_MAX_TOKENS: z.coerce.number().int().positive().max(4000).default(512),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}

/** Drops the cached config so the next read sees the current environment. */
export function resetConfig(): void {
  cached = null;
}
