// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import agentRouteV1 from "./routes/agent.v1.js";
import { getAdapter } from "./adapters/llm/router.js";
import { SERVICE_VERSION } from "./version.js";
import { generateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { HTTP_CLIENT_TIMEOUT_MS, ROUTE_TIMEOUT_MS } from "./config/timeouts.js";
import { config, isProduction } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { ENTRYPOINTS } from "./search/agent.js";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function resolveAllowedOrigins(): string[] {
  const origins = config.server.allowedOrigins ?? DEFAULT_ORIGINS;

  if (isProduction() && origins.some((origin) => origin === "*" || origin === '"*"')) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build() {
  // Fail-fast: Verify LLM provider and API key configuration
  const llmProvider = config.llm.provider;
  if (llmProvider === "openai" && !config.llm.openaiApiKey) {
    throw new Error("FATAL: LLM_PROVIDER=openai but OPENAI_API_KEY is not set");
  }
  if (llmProvider === "anthropic" && !config.llm.anthropicApiKey) {
    throw new Error("FATAL: LLM_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set");
  }

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId: generateRequestId,
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  await app.register(helmet, {
    contentSecurityPolicy: false, // Not relevant for JSON API
    crossOriginEmbedderPolicy: false, // Would break CORS for API clients
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000, // 1 year
      includeSubDomains: true,
    },
  });

  const globalRateLimitRpm = config.rateLimits.defaultRpm;

  await app.register(rateLimit, {
    global: true,
    max: globalRateLimitRpm,
    timeWindow: "1 minute",
    addHeadersOnExceeding: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
    },
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn(
        {
          event: "rate_limit_hit",
          max: globalRateLimitRpm,
          request_id: requestId,
        },
        "Rate limit exceeded"
      );

      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error(
        {
          error,
          request_id: errorV1.request_id,
          method: request.method,
          url: request.url,
        },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      app.log.warn(
        {
          request_id: errorV1.request_id,
          code: errorV1.code,
          method: request.method,
          url: request.url,
        },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.get("/healthz", async () => {
    const adapter = getAdapter();

    return {
      ok: true,
      service: "occurrence-search-agent",
      version: SERVICE_VERSION,
      provider: adapter.name,
      model: adapter.model,
      entrypoints: ENTRYPOINTS.map((entrypoint) => entrypoint.id),
      idigbio: {
        search_base_url: config.idigbio.searchBaseUrl,
        portal_base_url: config.idigbio.portalBaseUrl,
        timeout_ms: config.idigbio.timeoutMs,
      },
      generation: {
        max_attempts: config.generation.maxAttempts,
      },
      timeouts: {
        route_ms: ROUTE_TIMEOUT_MS,
        http_client_ms: HTTP_CLIENT_TIMEOUT_MS,
      },
    };
  });

  await agentRouteV1(app);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      const adapter = getAdapter();

      app.log.info(
        {
          service: "occurrence-search-agent",
          version: SERVICE_VERSION,
          provider: adapter.name,
          model: adapter.model,
          global_rate_limit_rpm: config.rateLimits.defaultRpm,
          body_limit_kb: Math.round(config.server.bodyLimitBytes / 1024),
          cors_origins: resolveAllowedOrigins(),
          idigbio_search_base_url: config.idigbio.searchBaseUrl,
          route_timeout_ms: ROUTE_TIMEOUT_MS,
          http_client_timeout_ms: HTTP_CLIENT_TIMEOUT_MS,
        },
        "Occurrence search agent starting"
      );

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
