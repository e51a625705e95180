import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";

describe("config.ts", () => {
  it("fills defaults from an empty environment", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(4000);
    expect(config.DETECTIVE_TRACE).toBe(false);
    expect(config.ANTHROPIC_API_KEY).toBeUndefined();
    expect(config.DETECTIVE_SUGGEST_MAX_TOKENS).toBe(512);
    expect(config.DETECTIVE_CASE_DB_PATH.endsWith("casefile.db")).toBe(true);
  });

  it("reads overrides", () => {
    const config = loadConfig({ PORT: "5050", DETECTIVE_TRACE: "1", ANTHROPIC_API_KEY: " test-secret " });
    expect(config.PORT).toBe(5050);
    expect(config.DETECTIVE_TRACE).toBe(true);
    expect(config.ANTHROPIC_API_KEY).toBe("test-secret");
  });

  it("rejects a bad port", () => {
    expect(() => loadConfig({ PORT: "nope" })).toThrow(/^Invalid environment configuration: PORT: /);
  });
});
