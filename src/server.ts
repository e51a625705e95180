import type Database from "better-sqlite3";
import { createApp } from "./app";
import { describeCaseSchema, initializeCaseDatabase, openGradingConnection } from "./casefile";
import { getConfig } from "./config";
import { loadScenes } from "./contracts/scene";
import { createAttemptDb, openAppDatabase } from "./database";
import { suggestSql } from "./services/sqlSuggestionService";

const config = getConfig();

initializeCaseDatabase(config.DETECTIVE_CASE_DB_PATH);

const scenes = loadScenes();
const appDb = openAppDatabase(config.DETECTIVE_APP_DB_PATH);

const schemaDb = openGradingConnection(config.DETECTIVE_CASE_DB_PATH);
const schemaMarkdown = describeCaseSchema(schemaDb);
schemaDb.close();

const app = createApp({
  scenes,
  openGradingConnection: (): Database.Database => openGradingConnection(config.DETECTIVE_CASE_DB_PATH),
  attempts: createAttemptDb(appDb),
  ...(config.ANTHROPIC_API_KEY
    ? { suggestSql: (question: string) => suggestSql(question, schemaMarkdown) }
    : {}),
});

app.listen(config.PORT, () => {
  console.log(`Query Detective backend listening on port ${config.PORT}`);
});
