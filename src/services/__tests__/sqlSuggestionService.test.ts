import { describe, it, expect } from "vitest";
import type { CompletionFn } from "../sqlSuggestionService";
import {
  INSUFFICIENT_INFO_SQL,
  SQL_SUGGESTION_SYSTEM_PROMPT,
  coerceSuggestion,
  suggestSql,
} from "../sqlSuggestionService";

describe("sqlSuggestionService.ts", () => {
  describe("coerceSuggestion", () => {
    it("reads the requested JSON shape", () => {
      expect(coerceSuggestion('{"sql": "SELECT name FROM products;", "explanation": " Lists names. "}')).toEqual({
        sql: "SELECT name FROM products",
        explanation: "Lists names.",
      });
    });

    it("accepts plain SQL inside a code fence", () => {
      expect(coerceSuggestion("```sql\nSELECT 1;\n```")).toEqual({ sql: "SELECT 1", explanation: "" });
    });

    it("drops a leading sql label", () => {
      expect(coerceSuggestion("sql\nSELECT 3").sql).toBe("SELECT 3");
    });

    it("accepts lenient JSON", () => {
      expect(coerceSuggestion("{sql: 'SELECT 2', explanation: 'two'}")).toEqual({ sql: "SELECT 2", explanation: "two" });
    });

    it("keeps only the first statement", () => {
      expect(coerceSuggestion('{"sql": "SELECT 1; DROP TABLE products"}')).toEqual({ sql: "SELECT 1", explanation: "" });
    });

    it("replaces writes with the sentinel", () => {
      expect(coerceSuggestion("DROP TABLE products")).toEqual({ sql: INSUFFICIENT_INFO_SQL, explanation: "" });
      expect(coerceSuggestion('{"sql": "UPDATE products SET name = 1", "explanation": "x"}')).toEqual({
        sql: INSUFFICIENT_INFO_SQL,
        explanation: "",
      });
    });
  });

  describe("suggestSql", () => {
    it("sends the schema and question to the completion function", async () => {
      const calls: Array<{ system: string; user: string }> = [];
      const complete: CompletionFn = async (opts) => {
        calls.push(opts);
        return '{"sql": "SELECT COUNT(*) FROM warehouses", "explanation": "Counts warehouses."}';
      };

      const suggestion = await suggestSql("How many warehouses are there?", "### warehouses\n- location TEXT", complete);

      expect(suggestion).toEqual({ sql: "SELECT COUNT(*) FROM warehouses", explanation: "Counts warehouses." });
      expect(calls).toHaveLength(1);
      expect(calls[0]?.system).toBe(SQL_SUGGESTION_SYSTEM_PROMPT);
      expect(calls[0]?.user).toContain("How many warehouses are there?");
      expect(calls[0]?.user).toContain("### warehouses\n- location TEXT");
    });
  });
});
