/**
 * JSON Extractor Utility
 *
 * Pulls a JSON value out of model output that may be wrapped in a markdown
 * code block or surrounded by conversational text.
 */

import { log } from "./telemetry.js";

export type ExtractionMethod = "fast_path" | "code_block" | "bracket_matching";

export interface JsonExtractionResult {
  json: unknown;
  extractionMethod: ExtractionMethod;
}

export interface JsonExtractionOptions {
  /** Label for log lines (e.g., "find_occurrence_records") */
  task?: string;
}

/**
 * Extract JSON from a model response.
 *
 * Strategy (in order):
 * 1. Parse the trimmed content as-is
 * 2. Parse each ```json fenced block
 * 3. Bracket-match from each `{` / `[` until a valid structure parses
 *
 * @throws Error if no valid JSON can be extracted
 */
export function extractJsonFromResponse(
  content: string,
  options: JsonExtractionOptions = {},
): JsonExtractionResult {
  const trimmed = content.trim();

  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    const parsed = tryParseJson(trimmed);
    if (parsed) {
      return { json: parsed.json, extractionMethod: "fast_path" };
    }
  }

  const codeBlockRegex = /```(?:json)?\s*([\s\S]*?)```/g;
  let codeBlockMatch: RegExpExecArray | null;
  while ((codeBlockMatch = codeBlockRegex.exec(trimmed)) !== null) {
    const parsed = tryParseJson((codeBlockMatch[1] ?? "").trim());
    if (parsed) {
      log.debug({ ...options, extraction_method: "code_block" }, "JSON extracted from markdown code block");
      return { json: parsed.json, extractionMethod: "code_block" };
    }
  }

  let candidates = 0;
  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] !== "{" && trimmed[i] !== "[") continue;
    candidates++;
    const result = extractJsonWithBracketMatching(trimmed, i);
    if (result) {
      log.debug(
        { ...options, extraction_method: "bracket_matching", preamble_length: i },
        "JSON extraction required - model returned text around the JSON",
      );
      return { json: result.json, extractionMethod: "bracket_matching" };
    }
  }

  if (candidates === 0) {
    throw new Error("No JSON structure found in response: missing opening delimiter");
  }
  throw new Error(`Failed to extract valid JSON from response: tried ${candidates} candidate position(s)`);
}

/**
 * Scan from `startIndex`, counting brackets outside of strings, and parse the
 * first balanced structure.
 */
function extractJsonWithBracketMatching(
  content: string,
  startIndex: number,
): { json: unknown; content: string } | null {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      const jsonStr = content.slice(startIndex, i + 1);
      const parsed = tryParseJson(jsonStr);
      return parsed ? { json: parsed.json, content: jsonStr } : null;
    }
  }

  return null;
}

function tryParseJson(text: string): { json: unknown } | null {
  try {
    return { json: JSON.parse(text) };
  } catch {
    return null;
  }
}
