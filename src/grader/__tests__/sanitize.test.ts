import { describe, it, expect } from "vitest";
import { enforceReadOnly, firstStatement, normalize, splitStatements, stripComments } from "../sanitize";
import { checkSyntax } from "../syntax";

describe("sanitize.ts", () => {
  describe("normalize", () => {
    it("collapses whitespace across lines", () => {
      expect(normalize("  SELECT   *\n   FROM   t  \n")).toBe("SELECT * FROM t");
    });

    it("strips line and block comments without fusing tokens", () => {
      expect(normalize("SELECT 1 -- trailing\nFROM t")).toBe("SELECT 1 FROM t");
      expect(normalize("SELECT/*x*/1")).toBe("SELECT 1");
      expect(normalize("SELECT 1 /* never closed")).toBe("SELECT 1");
    });

    it("keeps comment markers inside literals and quoted identifiers", () => {
      expect(normalize("SELECT '--not a comment' AS c")).toBe("SELECT '--not a comment' AS c");
      expect(normalize('SELECT "a/*b*/" FROM t')).toBe('SELECT "a/*b*/" FROM t');
    });

    it("removes zero-width characters anywhere", () => {
      expect(normalize("SEL\u200BECT\uFEFF 1\u200D")).toBe("SELECT 1");
    });

    it("applies NFKC so full-width keywords become ASCII", () => {
      expect(normalize("\uFF33\uFF25\uFF2C\uFF25\uFF23\uFF34 \uFF11")).toBe("SELECT 1");
    });

    it("is idempotent", () => {
      const inputs = [
        "  SELECT  a,\n b FROM t -- c\n WHERE x = 'y  z' ;",
        "-/**/-x",
        "/*/**/*/ SELECT 1",
        "e\u200B\u0301",
        "SELECT 'unterminated -- still a literal",
        "\uFF33\uFF25\uFF2C\uFF25\uFF23\uFF34\u3000*\u00A0FROM [my table]",
        "",
      ];
      for (const input of inputs) {
        const once = normalize(input);
        expect(normalize(once)).toBe(once);
      }
    });
  });

  describe("stripComments", () => {
    it("replaces each comment with one space", () => {
      expect(stripComments("a/*x*/b--y\nc")).toBe("a b \nc");
    });
  });

  describe("splitStatements", () => {
    it("splits on top-level semicolons", () => {
      expect(splitStatements("SELECT 1; DROP TABLE x;")).toEqual(["SELECT 1", "DROP TABLE x"]);
    });

    it("ignores semicolons inside literals and comments", () => {
      expect(splitStatements("SELECT 'a;b'; SELECT 2 /* ; */")).toEqual(["SELECT 'a;b'", "SELECT 2 /* ; */"]);
      expect(splitStatements("SELECT [a;b] FROM t")).toEqual(["SELECT [a;b] FROM t"]);
    });

    it("drops blank and comment-only pieces", () => {
      expect(splitStatements("SELECT 1; -- done")).toEqual(["SELECT 1"]);
      expect(splitStatements(";;  ;")).toEqual([]);
    });
  });

  describe("firstStatement", () => {
    it("truncates stacked statements to the first", () => {
      expect(firstStatement("SELECT 1; DROP TABLE x;")).toBe("SELECT 1");
    });

    it("returns an empty string when nothing is left", () => {
      expect(firstStatement("   ")).toBe("");
      expect(firstStatement("-- just a note")).toBe("");
      expect(firstStatement(";;;")).toBe("");
    });
  });

  describe("enforceReadOnly", () => {
    it("accepts SELECT and WITH in any case", () => {
      expect(enforceReadOnly("SELECT 1")).toEqual({ accepted: true, keyword: "select" });
      expect(enforceReadOnly("select 1")).toEqual({ accepted: true, keyword: "select" });
      expect(enforceReadOnly("With x AS (SELECT 1) SELECT * FROM x")).toEqual({ accepted: true, keyword: "with" });
    });

    it("accepts after leading whitespace and comments are sanitized away", () => {
      expect(enforceReadOnly(firstStatement("  /* note */ -- more\n  select 1"))).toEqual({
        accepted: true,
        keyword: "select",
      });
    });

    it("rejects writes and attachment", () => {
      for (const sql of [
        "INSERT INTO t VALUES (1)",
        "UPDATE t SET a = 1",
        "DELETE FROM t",
        "DROP TABLE t",
        "ATTACH DATABASE 'x.db' AS x",
      ]) {
        expect(enforceReadOnly(sql).accepted).toBe(false);
      }
    });

    it("names the rejected keyword", () => {
      expect(enforceReadOnly("drop table t")).toEqual({
        accepted: false,
        reason: 'Only read-only queries are allowed: the statement must start with SELECT or WITH, not "DROP".',
      });
    });

    it("rejects empty input and look-alike words", () => {
      expect(enforceReadOnly("")).toEqual({ accepted: false, reason: "Empty query" });
      expect(enforceReadOnly("selected_rows").accepted).toBe(false);
    });
  });

  describe("checkSyntax", () => {
    it("passes balanced statements", () => {
      expect(checkSyntax("SELECT (1 + 2) * 3, 'a)b' FROM t")).toEqual({ ok: true });
    });

    it("reports an unterminated literal with its position", () => {
      expect(checkSyntax("SELECT 'abc")).toEqual({
        ok: false,
        message: "Parse error: unterminated string literal starting at character 8.",
      });
    });

    it("reports unbalanced parentheses", () => {
      expect(checkSyntax("SELECT (1")).toEqual({
        ok: false,
        message: 'Parse error: 1 unclosed "(" (missing closing parenthesis).',
      });
      expect(checkSyntax("SELECT 1)")).toEqual({
        ok: false,
        message: 'Parse error: unexpected ")" at character 9.',
      });
    });
  });
});
