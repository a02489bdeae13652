/**
 * LLM provider router.
 *
 * Selects the adapter named by LLM_PROVIDER (openai | anthropic | fixtures)
 * and caches one instance per provider/model pair.
 */

import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { AnthropicAdapter } from "./anthropic.js";
import { OpenAIAdapter } from "./openai.js";
import type { CallOpts, CompleteArgs, CompleteResult, LLMAdapter, LLMProvider } from "./types.js";

/**
 * Offline adapter. Replays queued completions in order, then falls back to a
 * plan-only envelope so every operation aborts without touching the network.
 */
export class FixturesAdapter implements LLMAdapter {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  private readonly queue: string[];

  constructor(completions: string[] = []) {
    this.queue = [...completions];
  }

  /** Queue raw completion text for the next calls */
  enqueue(...completions: string[]): void {
    this.queue.push(...completions);
  }

  async complete(_args: CompleteArgs, _opts: CallOpts): Promise<CompleteResult> {
    const content =
      this.queue.shift() ??
      JSON.stringify({ plan: "The fixtures provider does not generate search parameters." });
    return { content, usage: { input_tokens: 0, output_tokens: 0 } };
  }
}

// Adapter instances cache
const adapters: Map<string, LLMAdapter> = new Map();

function getAdapterInstance(provider: LLMProvider, model?: string): LLMAdapter {
  const cacheKey = `${provider}:${model || "default"}`;

  const cached = adapters.get(cacheKey);
  if (cached) {
    return cached;
  }

  let adapter: LLMAdapter;

  switch (provider) {
    case "anthropic":
      adapter = new AnthropicAdapter(model);
      break;
    case "openai":
      adapter = new OpenAIAdapter(model);
      break;
    case "fixtures":
      adapter = new FixturesAdapter();
      break;
  }

  adapters.set(cacheKey, adapter);
  log.info(
    { provider: adapter.name, model: adapter.model, cache_key: cacheKey },
    "Created LLM adapter instance"
  );

  return adapter;
}

/**
 * Adapter for the configured provider.
 *
 * ```typescript
 * const adapter = getAdapter();
 * const { content } = await adapter.complete(args, opts);
 * ```
 */
export function getAdapter(): LLMAdapter {
  return getAdapterInstance(config.llm.provider, config.llm.model);
}

/**
 * Get adapter for a specific provider (useful for testing).
 */
export function getAdapterForProvider(provider: LLMProvider, model?: string): LLMAdapter {
  return getAdapterInstance(provider, model);
}

/**
 * Reset adapter cache (useful for testing).
 */
export function resetAdapterCache(): void {
  adapters.clear();
}
