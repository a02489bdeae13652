import { randomUUID } from "node:crypto";

/**
 * Idempotency key for LLM API requests, sent as the Idempotency-Key header
 * so provider logs can be matched to a single logical call.
 */
export function makeIdempotencyKey(): string {
  return randomUUID();
}
