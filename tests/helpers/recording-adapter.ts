/**
 * Recording LLM adapter for tests
 *
 * Replays queued completions like the fixtures provider and keeps a copy of
 * every request it receives, since the generation loop keeps appending to
 * the same messages array between attempts.
 */

import { FixturesAdapter } from "../../src/adapters/llm/router.js";
import type { CallOpts, CompleteArgs, CompleteResult } from "../../src/adapters/llm/types.js";

export class RecordingAdapter extends FixturesAdapter {
  readonly calls: Array<{ args: CompleteArgs; opts: CallOpts }> = [];

  override async complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult> {
    this.calls.push({ args: { ...args, messages: [...args.messages] }, opts });
    return super.complete(args, opts);
  }
}

/**
 * Serialize an envelope the way a model would return it.
 */
export function envelope(value: Record<string, unknown>): string {
  return JSON.stringify(value);
}
