// @tidewire/shared: shared types, persistence, clients and pipeline logic
export * from "./types.js";
export * from "./errors.js";
export * from "./timeout.js";
export * from "./logger.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./vectors.js";
export type * from "./stores.js";
export * from "./neo4j/index.js";
export * from "./anthropic/client.js";

export * from "./ingest/normalize.js";
export * from "./ingest/dedup-window.js";
export * from "./ingest/deduplicator.js";
export * from "./ingest/sources.js";
export * from "./ingest/scrape.js";

export * from "./analysis/schemas.js";
export * from "./analysis/stage1.js";
export * from "./analysis/stage2.js";
export * from "./analysis/analyzer.js";

export * from "./signals/clusterer.js";
export * from "./signals/momentum.js";
export * from "./signals/sources.js";

export * from "./publish/backoff.js";
export * from "./publish/adapters/index.js";
export * from "./publish/queue-manager.js";

// Embeddings re-exported selectively to avoid HealthCheckResult name collision
export {
  type TaskType,
  type EmbeddingClient,
  type Embedder,
  type HealthCheckResult as EmbeddingHealthCheckResult,
  createEmbeddingClient,
  createGeminiEmbedder,
  embedText,
  embeddingHealthCheck,
} from "./embeddings/index.js";
