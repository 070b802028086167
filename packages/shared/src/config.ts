// =============================================================================
// @tidewire/shared: Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// Required variables throw on missing. Optional variables fall back to
// documented defaults. API_KEYS is validated as JSON, PUBLISH_PLATFORMS as a
// comma-separated list of known platforms.
// =============================================================================

import { z } from "zod";
import { PLATFORMS, type Platform } from "./types.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * JSON string that parses to a map of API key -> client ID.
 * Example: '{"test-key-1": "mcp-agent", "test-key-2": "scheduler"}'
 */
const apiKeysSchema = z.string().transform((val, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(val);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "API_KEYS must be valid JSON",
    });
    return z.NEVER;
  }

  const result = z.record(z.string()).safeParse(parsed);
  if (!result.success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "API_KEYS must be a JSON object mapping key strings to client ID strings",
    });
    return z.NEVER;
  }
  return result.data;
});

const platformListSchema = z.string().transform((val, ctx) => {
  const names = val
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  const platforms: Platform[] = [];
  for (const name of names) {
    const parsed = z.enum(PLATFORMS).safeParse(name);
    if (!parsed.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `PUBLISH_PLATFORMS contains unknown platform "${name}" (expected one of ${PLATFORMS.join(", ")})`,
      });
      return z.NEVER;
    }
    if (!platforms.includes(parsed.data)) platforms.push(parsed.data);
  }
  return platforms;
});

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  // Required
  NEO4J_URI: z.string().min(1, "NEO4J_URI is required"),
  NEO4J_USER: z.string().min(1, "NEO4J_USER is required"),
  NEO4J_PASSWORD: z.string().min(1, "NEO4J_PASSWORD is required"),
  GEMINI_API_KEY: z.string().min(1, "GEMINI_API_KEY is required"),
  ANTHROPIC_API_KEY: z.string().min(1, "ANTHROPIC_API_KEY is required"),
  API_KEYS: apiKeysSchema,

  // Server
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  CORS_ORIGINS: z.string().default("*"),
  RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(100),

  // Models
  EMBEDDING_DIMENSIONS: z.coerce.number().int().min(1).default(768),
  EMBEDDING_MODEL: z.string().default("gemini-embedding-001"),
  ANALYSIS_MODEL: z.string().default("claude-sonnet-4-20250514"),

  // Ingestion
  SOURCES_FILE: z.string().default("config/sources.json"),
  BODY_MAX_CHARS: z.coerce.number().int().min(100).default(10_000),
  DEDUP_WINDOW_SIZE: z.coerce.number().int().min(1).default(500),
  DEDUP_WINDOW_DAYS: z.coerce.number().int().min(1).default(30),
  SEMANTIC_DEDUP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  SEMANTIC_WINDOW_DAYS: z.coerce.number().int().min(1).default(30),

  // Analysis & signals
  MIN_BRIEFING_RELEVANCE: z.coerce.number().int().min(1).max(5).default(3),
  SIGNAL_CLUSTER_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  ARCHIVE_AFTER_DAYS: z.coerce.number().int().min(1).default(90),

  // Publishing
  PUBLISH_PLATFORMS: platformListSchema.default("devto,linkedin"),
  PUBLISH_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  PUBLISH_BACKOFF_BASE_MS: z.coerce.number().int().min(1).default(300_000),
  PUBLISH_BACKOFF_FACTOR: z.coerce.number().min(1).default(4),
  PUBLISH_BACKOFF_CAP_MS: z.coerce.number().int().min(1).default(21_600_000),
  PUBLISH_CLAIM_TIMEOUT_MS: z.coerce.number().int().min(1).default(900_000),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().min(1).default(180_000),

  // Platform credentials (a platform without credentials is left queued)
  DEVTO_API_KEY: z.string().optional(),
  HASHNODE_API_KEY: z.string().optional(),
  HASHNODE_PUBLICATION_ID: z.string().optional(),
  MEDIUM_INTEGRATION_TOKEN: z.string().optional(),
  LINKEDIN_ACCESS_TOKEN: z.string().optional(),

  // Scheduler
  CRON_ENABLED: booleanFlag.default("true"),
  CRON_SCRAPE: z.string().default("0 5 * * *"),
  CRON_ANALYZE: z.string().default("30 5 * * *"),
  CRON_PUBLISH: z.string().default("*/15 * * * *"),
  CRON_MAINTENANCE: z.string().default("0 3 * * *"),
});

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = z.infer<typeof configSchema>;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return configSchema.parse(env);
}
