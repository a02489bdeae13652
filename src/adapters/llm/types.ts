/**
 * Provider-agnostic LLM adapter interface.
 *
 * Every provider (OpenAI, Anthropic, fixtures) exposes the same single
 * chat-completion call; structured output handling lives above this layer.
 */

/**
 * Usage metrics returned by LLM calls for telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface CompleteArgs {
  system: string;
  messages: ChatMessage[];
  temperature: number;
  /** Ask the provider for a JSON object response where it supports one */
  jsonMode: boolean;
  maxTokens?: number;
}

export interface CompleteResult {
  content: string;
  usage: UsageMetrics;
}

/**
 * Call options passed to adapter methods for request tracking and timeouts.
 */
export interface CallOpts {
  requestId: string;
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

export type LLMProvider = "openai" | "anthropic" | "fixtures";

export interface LLMAdapter {
  readonly name: LLMProvider;

  /**
   * Model identifier (provider-specific, e.g. "gpt-4.1", "claude-3-5-sonnet-20241022").
   */
  readonly model: string;

  /**
   * Run one chat completion.
   *
   * @throws UpstreamTimeoutError when the call exceeds opts.timeoutMs
   * @throws UpstreamHTTPError when the provider answers with a non-2xx status
   */
  complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult>;
}
