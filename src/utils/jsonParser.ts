import JSON5 from "json5";
import { jsonrepair } from "jsonrepair";

// Strictest first, so a well-formed response never goes through repair.
const PARSERS: ReadonlyArray<(text: string) => unknown> = [
  (text) => JSON.parse(text),
  (text) => JSON5.parse(text),
  (text) => JSON.parse(jsonrepair(text)),
];

function stripFences(text: string): string {
  return text
    .trim()
    .replace(/```json/gi, "")
    .replace(/```/g, "")
    .trim();
}

function outermost(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

function parseCandidate(candidate: string): unknown {
  let lastError: unknown;
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
 * Lenient JSON parser for model output. Tries the whole text with fences
 * stripped, then the outermost `{...}` block, then the outermost `[...]`
 * block. Throws the error from the whole-text attempt when nothing parses.
 */
export function tryParseJson(text: string): unknown {
  const cleaned = stripFences(text);
  const candidates = [cleaned, outermost(cleaned, "{", "}"), outermost(cleaned, "[", "]")];

  let firstError: unknown;
  for (const candidate of candidates) {
    if (candidate === null) continue;
    try {
      return parseCandidate(candidate);
    } catch (err) {
      firstError ??= err;
    }
  }
  throw firstError;
}
