import OpenAI from "openai";
import { HTTP_CLIENT_TIMEOUT_MS } from "../../config/timeouts.js";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import type { LLMAdapter, CompleteArgs, CompleteResult, CallOpts } from "./types.js";
import { UpstreamTimeoutError, UpstreamHTTPError } from "./errors.js";
import { makeIdempotencyKey } from "./idempotency.js";
import "./http-dispatcher.js";

// Lazy initialization to allow testing without API key
let client: OpenAI | null = null;

function getClient(): OpenAI {
  const apiKey = config.llm.openaiApiKey;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required but not set");
  }
  if (!client) {
    client = new OpenAI({ apiKey, baseURL: config.llm.openaiBaseUrl });
  }
  return client;
}

const TIMEOUT_MS = HTTP_CLIENT_TIMEOUT_MS;

/**
 * OpenAI adapter implementing the LLMAdapter interface.
 * Uses OpenAI's chat completion API with JSON mode for structured outputs.
 */
export class OpenAIAdapter implements LLMAdapter {
  readonly name = "openai" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || config.llm.model || "gpt-4.1";
  }

  async complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult> {
    const idempotencyKey = makeIdempotencyKey();
    const startTime = Date.now();
    const timeoutMs = opts.timeoutMs || TIMEOUT_MS;

    log.info(
      {
        request_id: opts.requestId,
        message_count: args.messages.length,
        model: this.model,
        provider: "openai",
        idempotency_key: idempotencyKey,
      },
      "calling OpenAI for completion"
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);
    const onCallerAbort = () => abortController.abort();
    opts.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await getClient().chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: args.system },
            ...args.messages.map((message) => ({ role: message.role, content: message.content })),
          ],
          temperature: args.temperature,
          ...(args.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
          ...(args.maxTokens ? { max_tokens: args.maxTokens } : {}),
        },
        {
          signal: abortController.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        log.error({ request_id: opts.requestId, finish_reason: response.choices[0]?.finish_reason }, "OpenAI returned empty content");
        throw new Error("openai_empty_response");
      }

      return {
        content,
        usage: {
          input_tokens: response.usage?.prompt_tokens || 0,
          output_tokens: response.usage?.completion_tokens || 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: timeoutMs, elapsed_ms: elapsedMs }, "OpenAI completion timed out");
        throw new UpstreamTimeoutError("OpenAI completion timed out", "openai", "complete", "body", elapsedMs, error);
      }

      if (error instanceof OpenAI.APIError && typeof error.status === "number") {
        const requestId = error.headers?.["x-request-id"] ?? undefined;
        log.error(
          { status: error.status, request_id: requestId, elapsed_ms: elapsedMs },
          "OpenAI API returned non-2xx status"
        );
        throw new UpstreamHTTPError(
          `OpenAI completion failed: ${error.message || "unknown error"}`,
          "openai",
          error.status,
          error.code ?? error.type,
          requestId,
          elapsedMs,
          error
        );
      }

      log.error({ error }, "OpenAI completion failed");
      throw error;
    } finally {
      clearTimeout(timeoutId);
      opts.abortSignal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
