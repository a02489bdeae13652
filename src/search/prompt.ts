/**
 * System prompt assembly for search parameter generation.
 *
 * A prompt is the operation's own instructions, the query format reference
 * from resources/, a field list rendered from the query schema, and worked
 * request/envelope examples.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { Envelope } from "../schemas/envelope.js";
import { log } from "../utils/telemetry.js";

export type ResourceName = "records_query_format.md" | "occurrence_records_examples.md";

// Loaded resource files (cleared on process restart)
const resourceCache = new Map<ResourceName, string>();

function getResourceDir(): string {
  return join(process.cwd(), "resources");
}

/**
 * Read a prompt resource file.
 *
 * @throws Error if the file does not exist
 */
export function loadResource(name: ResourceName): string {
  const cached = resourceCache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const filePath = join(getResourceDir(), name);
  if (!existsSync(filePath)) {
    log.error({ resource: name, filePath }, "Prompt resource not found");
    throw new Error(`Prompt resource not found: ${filePath}`);
  }

  const text = readFileSync(filePath, "utf-8").trim();
  resourceCache.set(name, text);
  return text;
}

export function clearResourceCache(): void {
  resourceCache.clear();
}

export interface PromptExample<P> {
  request: string;
  response: Envelope<P>;
}

/**
 * Worked examples as conversation-style turns, numbered from 1. Responses are
 * compact JSON with only the keys each example sets.
 */
export function renderExamples<P>(examples: ReadonlyArray<PromptExample<P>>): string {
  return examples
    .map(
      (example, index) =>
        `# Example ${index + 1}\n\nUser: ${example.request}\n\nYou: ${JSON.stringify(example.response)}`,
    )
    .join("\n\n");
}

export const ENVELOPE_INSTRUCTIONS = `\
# Output format

Respond with one JSON object and nothing else:

{"plan": string, "search_parameters": object, "artifact_description": string}

- "plan" is always required. Briefly explain which API parameters you will use, or why the request cannot be met.
- "search_parameters" holds the API parameters described above. Leave it out to abort.
- "artifact_description" is a short characterization of the data that will be retrieved. Include it exactly when \
"search_parameters" is present and leave it out when you abort.`;

export const LIST_OR_TIP = `\
- Searching by lists performs an OR operation. For example, a search for "genus":["Ursus","Puffinus"] returns Ursus \
records and ALSO Puffinus records; it does NOT return co-occurrences of Ursus and Puffinus.`;

export const NO_RELATIONS_TIP = `\
- The iDigBio API can NOT perform searches that relate records to each other. For example, it cannot retrieve records \
that are near other records unless the locations of those records can be given as search parameters.`;

export const NO_PARTIAL_MATCH_TIP = `\
- Do not choose search parameters that only partially fulfill the user's request. Abort instead (leave \
"search_parameters" out) and explain why in "plan".`;

export interface SystemPromptParts<P> {
  /** One-line statement of the target API */
  intro: string;
  /** Rendered field list for the query objects the operation accepts */
  fieldDocs: string;
  /** Description of the operation's parameter object */
  parametersDoc: string;
  includeRecordsExamples?: boolean;
  tips: string[];
  examples: ReadonlyArray<PromptExample<P>>;
}

export function buildSystemPrompt<P>(parts: SystemPromptParts<P>): string {
  const sections = [
    parts.intro,
    "# Query format",
    "Here is a description of how iDigBio queries are formatted:",
    `[BEGIN QUERY FORMAT DOC]\n\n${loadResource("records_query_format.md")}\n\n[END QUERY FORMAT DOC]`,
    `# Query fields\n\n${parts.fieldDocs}`,
    `# Search parameters\n\n${parts.parametersDoc}`,
  ];

  if (parts.includeRecordsExamples) {
    sections.push(`# General rq object examples\n\n${loadResource("occurrence_records_examples.md")}`);
  }

  sections.push(`# Tips\n\n${parts.tips.join("\n\n")}`, ENVELOPE_INSTRUCTIONS, renderExamples(parts.examples));

  return sections.join("\n\n").trim();
}
