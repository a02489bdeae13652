import { randomUUID } from "node:crypto";
import type { FastifyRequest } from "fastify";

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

const SAFE_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Whether a caller-supplied request ID is safe to echo into logs and headers
 */
export function isRequestIdSafe(value: string): boolean {
  return SAFE_REQUEST_ID.test(value);
}

/**
 * Fastify `genReqId` hook: reuse a safe incoming X-Request-Id, else a UUID.
 */
export function generateRequestId(req: { headers: Record<string, string | string[] | undefined> }): string {
  const incoming = req.headers[REQUEST_ID_HEADER_LOWER];
  if (typeof incoming === "string") {
    const trimmed = incoming.trim();
    if (isRequestIdSafe(trimmed)) {
      return trimmed;
    }
  }
  return randomUUID();
}

export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return "unknown";
  }
  return request.id || "unknown";
}
