import { ZodError } from "zod";
import type { FastifyRequest } from "fastify";
import { getRequestId } from "./request-id.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "RATE_LIMITED" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string,
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    {
      validation_errors: error.flatten(),
    },
    requestId,
  );
}

function readStatusCode(error: Error): number | undefined {
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function sanitizeMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, "[path]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
}

/**
 * Convert any error to ErrorV1 (never leaks stack traces)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof Error) {
    const statusCode = readStatusCode(error);

    if (statusCode === 429) {
      return buildErrorV1("RATE_LIMITED", "Too many requests", undefined, requestId);
    }

    if (statusCode === 404) {
      return buildErrorV1("NOT_FOUND", sanitizeMessage(error.message), undefined, requestId);
    }

    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1("BAD_INPUT", sanitizeMessage(error.message), undefined, requestId);
    }

    return buildErrorV1(
      "INTERNAL",
      sanitizeMessage(error.message || "An unexpected error occurred"),
      undefined,
      requestId,
    );
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "RATE_LIMITED":
      return 429;
    case "INTERNAL":
    default:
      return 500;
  }
}
