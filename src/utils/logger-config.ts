/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino redaction paths, shared by the Fastify
 * logger (server.ts) and the standalone logger (telemetry.ts).
 */

/**
 * Paths to redact from all log output (Pino path syntax).
 */
export const REDACT_PATHS = [
  "*.apiKey",
  "*.api_key",
  "*.apikey",
  "*.authorization",
  "*.token",
  "*.secret",
  "*.password",
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",
  "*.email",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
