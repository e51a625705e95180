import fs from "fs";
import path from "path";
import { z } from "zod";

export const SceneSchema = z
  .object({
    id: z.number().int().positive(),
    title: z.string().trim().min(1).max(120),
    story: z.string().trim().min(1),
    hint: z.string().trim().min(1),
    question: z.string().trim().min(1),
    // Reference query; trusted author content, never sent to players.
    answerSql: z.string().trim().min(1),
  })
  .strict();

export type Scene = z.infer<typeof SceneSchema>;
export type PublicScene = Omit<Scene, "answerSql">;

export const SceneCatalogSchema = z
  .array(SceneSchema)
  .min(1)
  .superRefine((scenes, ctx) => {
    const seen = new Set<number>();
    scenes.forEach((scene, index) => {
      if (seen.has(scene.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "id"],
          message: `Duplicate scene id ${scene.id}.`,
        });
      }
      seen.add(scene.id);
    });
  });

export const DEFAULT_SCENES_PATH = path.join(__dirname, "..", "..", "data", "scenes.json");

export function loadScenes(filePath: string = DEFAULT_SCENES_PATH): Scene[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const parsed = SceneCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : "unknown issue";
    throw new Error(`Invalid scene catalog at ${filePath} (${where}).`);
  }
  return [...parsed.data].sort((a, b) => a.id - b.id);
}

export function publicScene(scene: Scene): PublicScene {
  const { answerSql: _answerSql, ...rest } = scene;
  return rest;
}
