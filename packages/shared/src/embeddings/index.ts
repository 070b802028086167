export {
  type TaskType,
  type EmbeddingClient,
  type Embedder,
  type HealthCheckResult,
  createEmbeddingClient,
  createGeminiEmbedder,
  embedText,
  embeddingHealthCheck,
} from "./gemini.js";
