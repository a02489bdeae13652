import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction.
 *
 * Redaction paths live in src/utils/logger-config.ts so the Fastify logger
 * and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type Event = Record<string, unknown>;

type TestSink = (eventName: string, data: Event) => void;

let testSink: TestSink | null = null;

/**
 * Capture emitted events in tests. Refuses to install outside a test run.
 */
export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Telemetry event names. Dashboards key on these strings.
 */
export const TelemetryEvents = {
  AgentRunRequested: "agent.run.requested",
  AgentRunCompleted: "agent.run.completed",

  GenerationStarted: "search.generation.started",
  GenerationSucceeded: "search.generation.succeeded",
  GenerationRetry: "search.generation.retry",
  GenerationFailed: "search.generation.failed",
  GenerationAborted: "search.generation.aborted",

  SearchApiRequested: "search.api.requested",
  SearchApiFailed: "search.api.failed",
  SearchApiSucceeded: "search.api.succeeded",

  ArtifactCreated: "search.artifact.created",
  SummaryCapReached: "search.summary.cap_reached",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

let statsdClient: StatsD | null = null;

if (env.STATSD_HOST) {
  statsdClient = new StatsD({
    host: env.STATSD_HOST,
    port: Number(env.STATSD_PORT) || 8125,
    prefix: "occurrence_search.",
    globalTags: {
      service: env.STATSD_SERVICE || "occurrence-search-agent",
      env: env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "StatsD error");
    },
  });
  log.info({ statsd_host: env.STATSD_HOST }, "StatsD client initialized");
}

function tagValue(value: unknown): string {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : "unknown";
}

/**
 * Emit a telemetry event (structured log line, test sink, StatsD counter).
 */
export function emit(event: TelemetryEventName, data: Event): void {
  if (testSink) {
    testSink(event, data);
  }

  log.info({ event, ...data });

  if (!statsdClient) return;

  try {
    statsdClient.increment(event, 1, { entrypoint: tagValue(data.entrypoint) });
    if (typeof data.latency_ms === "number") {
      statsdClient.histogram(`${event}.latency_ms`, data.latency_ms, {
        entrypoint: tagValue(data.entrypoint),
      });
    }
  } catch (error) {
    log.warn({ error, event }, "Failed to send StatsD metric");
  }
}
