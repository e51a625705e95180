import JSON5 from "json5";
import { jsonrepair } from "jsonrepair";

// strict, then lenient, then repaired
const PARSERS: Array<(text: string) => unknown> = [
  (text) => JSON.parse(text),
  (text) => JSON5.parse(text),
  (text) => JSON.parse(jsonrepair(text)),
];

function tryParseCandidate(candidate: string): unknown {
  let lastError: unknown = new Error("No JSON parser accepted the input.");
  for (const parse of PARSERS) {
    try {
      return parse(candidate);
    } catch (err) {
      lastError = err;
    }
  }
  throw lastError;
}

/**
 * Lenient JSON extraction for LLM output: strips markdown fences, then tries strict JSON,
 * JSON5 and a repaired copy, first on the whole text and then on its outermost {...} block.
 * Throws the last parse error when nothing works.
 */
export function tryParseJson(text: string): unknown {
  const cleaned = text.trim().replace(/```json/gi, "").replace(/```/g, "").trim();

  try {
    return tryParseCandidate(cleaned);
  } catch (err) {
    const start = cleaned.indexOf("{");
    const end = cleaned.lastIndexOf("}");
    if (start !== -1 && end > start) {
      return tryParseCandidate(cleaned.slice(start, end + 1));
    }
    throw err;
  }
}
