import Anthropic from "@anthropic-ai/sdk";
import { HTTP_CLIENT_TIMEOUT_MS } from "../../config/timeouts.js";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import type { LLMAdapter, CompleteArgs, CompleteResult, CallOpts } from "./types.js";
import { UpstreamTimeoutError, UpstreamHTTPError } from "./errors.js";
import { makeIdempotencyKey } from "./idempotency.js";
import "./http-dispatcher.js";

// Lazy initialization to allow testing without API key
let client: Anthropic | null = null;

function getClient(): Anthropic {
  const apiKey = config.llm.anthropicApiKey;
  if (!apiKey) {
    throw new Error("ANTHROPIC_API_KEY environment variable is required but not set");
  }
  if (!client) {
    client = new Anthropic({ apiKey });
  }
  return client;
}

const DEFAULT_MAX_TOKENS = 2048;

// Anthropic has no JSON response mode; the instruction goes into the system text instead.
const JSON_ONLY_INSTRUCTION = "Respond with a single JSON object and nothing else.";

export class AnthropicAdapter implements LLMAdapter {
  readonly name = "anthropic" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || config.llm.model || "claude-3-5-sonnet-20241022";
  }

  async complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult> {
    const idempotencyKey = makeIdempotencyKey();
    const startTime = Date.now();
    const timeoutMs = opts.timeoutMs || HTTP_CLIENT_TIMEOUT_MS;

    log.info(
      {
        request_id: opts.requestId,
        message_count: args.messages.length,
        model: this.model,
        provider: "anthropic",
        idempotency_key: idempotencyKey,
      },
      "calling Anthropic for completion"
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);
    const onCallerAbort = () => abortController.abort();
    opts.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await getClient().messages.create(
        {
          model: this.model,
          max_tokens: args.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: args.temperature,
          system: args.jsonMode ? `${args.system}\n\n${JSON_ONLY_INSTRUCTION}` : args.system,
          messages: args.messages.map((message) => ({ role: message.role, content: message.content })),
        },
        {
          signal: abortController.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        }
      );

      const content = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("")
        .trim();
      if (!content) {
        log.error({ request_id: opts.requestId, stop_reason: response.stop_reason }, "Anthropic returned empty content");
        throw new Error("anthropic_empty_response");
      }

      return {
        content,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: timeoutMs, elapsed_ms: elapsedMs }, "Anthropic call timed out and was aborted");
        throw new UpstreamTimeoutError(
          "Anthropic completion timed out",
          "anthropic",
          "complete",
          "body",
          elapsedMs,
          error
        );
      }

      if (error instanceof Anthropic.APIError && typeof error.status === "number") {
        const requestId = error.headers?.["request-id"] ?? undefined;
        log.error(
          { status: error.status, request_id: requestId, elapsed_ms: elapsedMs },
          "Anthropic API returned non-2xx status"
        );
        throw new UpstreamHTTPError(
          `Anthropic completion failed: ${error.message || "unknown error"}`,
          "anthropic",
          error.status,
          error.name,
          requestId,
          elapsedMs,
          error
        );
      }

      log.error({ error }, "Anthropic completion failed");
      throw error;
    } finally {
      clearTimeout(timeoutId);
      opts.abortSignal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
