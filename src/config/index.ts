/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to environment variables. Parsed lazily on
 * first access so tests can stub the environment before anything reads it.
 */

import { z } from "zod";

/**
 * Boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    return true;
  });

/**
 * URL string that treats empty/undefined as the given default
 */
const urlWithDefault = (fallback: string) =>
  z
    .union([z.string(), z.undefined()])
    .transform((val) => (val === undefined || val.trim() === "" ? fallback : val.trim()))
    .pipe(z.string().url())
    .transform((val) => val.replace(/\/+$/, ""));

const Environment = z.enum(["development", "test", "production"]);

const LLMProvider = z.enum(["anthropic", "openai", "fixtures"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(64 * 1024),
    allowedOrigins: z
      .string()
      .transform((val) => val.split(",").map((o) => o.trim()).filter((o) => o.length > 0))
      .optional(),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    openaiBaseUrl: z.string().url().optional(),
    maxTokens: z.coerce.number().int().positive().default(2048),
    jsonMode: booleanString.default(true),
  }),

  generation: z.object({
    maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    temperature: z.coerce.number().min(0).max(2).default(0),
  }),

  idigbio: z.object({
    searchBaseUrl: urlWithDefault("https://search.idigbio.org"),
    portalBaseUrl: urlWithDefault("https://portal.idigbio.org"),
    timeoutMs: z.coerce.number().int().positive().default(30_000),
  }),

  rateLimits: z.object({
    defaultRpm: z.coerce.number().int().positive().default(60),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      openaiApiKey: env.OPENAI_API_KEY,
      openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
      maxTokens: env.LLM_MAX_TOKENS,
      jsonMode: env.LLM_JSON_MODE,
    },
    generation: {
      maxAttempts: env.GENERATION_MAX_ATTEMPTS,
      temperature: env.GENERATION_TEMPERATURE,
    },
    idigbio: {
      searchBaseUrl: env.IDIGBIO_SEARCH_BASE_URL,
      portalBaseUrl: env.IDIGBIO_PORTAL_BASE_URL,
      timeoutMs: env.IDIGBIO_TIMEOUT_MS,
    },
    rateLimits: {
      defaultRpm: env.GLOBAL_RATE_LIMIT_RPM,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    console.error("❌ Configuration validation failed:");
    console.error(JSON.stringify(result.error.issues, null, 2));
    throw new Error("Invalid configuration. Please check environment variables.");
  }
  return result.data;
}

let _cachedConfig: Config | null = null;

function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Lazy-initialized configuration.
 *
 * ```
 * import { config } from './config/index.js';
 * const attempts = config.generation.maxAttempts;
 * ```
 */
export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(getConfig(), prop);
  },
  ownKeys() {
    return Reflect.ownKeys(getConfig());
  },
  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(getConfig(), prop);
  },
  has(_target, prop) {
    return prop in getConfig();
  },
});

/**
 * Reset config cache (tests only)
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}
