/**
 * Structured generation of search parameters.
 *
 * The model is asked for a parameter envelope as JSON. Each response is
 * extracted, null-stripped and validated against the operation's envelope
 * schema. Invalid output is fed back to the model and retried up to the
 * attempt ceiling; a terminal validation issue stops the loop at once.
 */

import type { z } from "zod";
import { isUpstreamError } from "../adapters/llm/errors.js";
import { getAdapter } from "../adapters/llm/router.js";
import type { ChatMessage, LLMAdapter } from "../adapters/llm/types.js";
import { config } from "../config/index.js";
import { HTTP_CLIENT_TIMEOUT_MS } from "../config/timeouts.js";
import { findPairingViolation, stripNulls, type Envelope } from "../schemas/envelope.js";
import { findTerminalIssue } from "../schemas/query.js";
import { extractJsonFromResponse, type ExtractionMethod } from "../utils/json-extractor.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

export type GenerationFailureKind = "terminal" | "exhausted" | "upstream";

/**
 * No usable envelope could be generated. `message` is meant for the user.
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly kind: GenerationFailureKind,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export interface GenerationResult<P> {
  plan: string;
  /** Unset when the model deliberately aborted */
  searchParameters?: P;
  artifactDescription?: string;
}

export interface GenerateOptions {
  /** Defaults to the configured provider */
  adapter?: LLMAdapter;
  requestId?: string;
  /** Telemetry label */
  entrypoint?: string;
  maxAttempts?: number;
  temperature?: number;
  abortSignal?: AbortSignal;
}

export type EnvelopeSchema<P> = z.ZodType<Envelope<P>, z.ZodTypeDef, unknown>;

type ParseOutcome<P> =
  | { ok: true; envelope: Envelope<P>; extractionMethod: ExtractionMethod }
  | { ok: false; terminal?: string; feedback: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `- ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}

function parseEnvelope<P>(content: string, schema: EnvelopeSchema<P>, entrypoint?: string): ParseOutcome<P> {
  let json: unknown;
  let extractionMethod: ExtractionMethod;
  try {
    ({ json, extractionMethod } = extractJsonFromResponse(content, { task: entrypoint }));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      feedback: `Your previous response could not be read as JSON (${reason}). Respond with a single JSON object.`,
    };
  }

  const candidate = stripNulls(json);

  // Checked before the schema so a malformed parameter object cannot hide it.
  const pairing = findPairingViolation(candidate);
  if (pairing !== undefined) {
    return { ok: false, terminal: pairing, feedback: pairing };
  }

  const result = schema.safeParse(candidate);
  if (result.success) {
    return { ok: true, envelope: result.data, extractionMethod };
  }

  const feedback =
    `Your previous response failed validation:\n${formatIssues(result.error)}\n\n` +
    "Fix the errors and respond again with a single JSON object.";
  const terminal = findTerminalIssue(result.error);
  return terminal ? { ok: false, terminal: terminal.message, feedback } : { ok: false, feedback };
}

/**
 * Generate and validate a parameter envelope for `request`.
 *
 * @throws GenerationError on a terminal validation issue, after the last
 *   failed attempt, or when the model provider call fails
 */
export async function generateSearchParameters<P>(
  request: string,
  systemPrompt: string,
  schema: EnvelopeSchema<P>,
  options: GenerateOptions = {},
): Promise<GenerationResult<P>> {
  const adapter = options.adapter ?? getAdapter();
  const maxAttempts = options.maxAttempts ?? config.generation.maxAttempts;
  const temperature = options.temperature ?? config.generation.temperature;
  const requestId = options.requestId ?? "unknown";
  const entrypoint = options.entrypoint;
  const startTime = Date.now();

  emit(TelemetryEvents.GenerationStarted, {
    request_id: requestId,
    entrypoint,
    provider: adapter.name,
    model: adapter.model,
  });

  const messages: ChatMessage[] = [{ role: "user", content: request }];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let content: string;
    try {
      const completion = await adapter.complete(
        {
          system: systemPrompt,
          messages,
          temperature,
          jsonMode: config.llm.jsonMode,
          maxTokens: config.llm.maxTokens,
        },
        { requestId, timeoutMs: HTTP_CLIENT_TIMEOUT_MS, abortSignal: options.abortSignal },
      );
      content = completion.content;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      emit(TelemetryEvents.GenerationFailed, {
        request_id: requestId,
        entrypoint,
        kind: "upstream",
        attempt,
        provider: isUpstreamError(error) ? error.provider : undefined,
        error: reason,
        latency_ms: Date.now() - startTime,
      });
      throw new GenerationError(`Language model request failed: ${reason}`, "upstream", attempt, { cause: error });
    }

    const outcome = parseEnvelope(content, schema, entrypoint);

    if (outcome.ok) {
      const { plan, search_parameters, artifact_description } = outcome.envelope;
      emit(
        search_parameters === undefined ? TelemetryEvents.GenerationAborted : TelemetryEvents.GenerationSucceeded,
        {
          request_id: requestId,
          entrypoint,
          attempts: attempt,
          extraction_method: outcome.extractionMethod,
          latency_ms: Date.now() - startTime,
        },
      );
      return { plan, searchParameters: search_parameters, artifactDescription: artifact_description };
    }

    if (outcome.terminal !== undefined) {
      emit(TelemetryEvents.GenerationFailed, {
        request_id: requestId,
        entrypoint,
        kind: "terminal",
        attempt,
        error: outcome.terminal,
        latency_ms: Date.now() - startTime,
      });
      throw new GenerationError(outcome.terminal, "terminal", attempt);
    }

    if (attempt < maxAttempts) {
      emit(TelemetryEvents.GenerationRetry, { request_id: requestId, entrypoint, attempt });
      log.debug({ request_id: requestId, attempt, feedback: outcome.feedback }, "Retrying generation with feedback");
    }

    messages.push({ role: "assistant", content }, { role: "user", content: outcome.feedback });
  }

  emit(TelemetryEvents.GenerationFailed, {
    request_id: requestId,
    entrypoint,
    kind: "exhausted",
    attempt: maxAttempts,
    latency_ms: Date.now() - startTime,
  });
  throw new GenerationError(
    `AI failed to generate valid output after ${maxAttempts} attempts.`,
    "exhausted",
    maxAttempts,
  );
}
