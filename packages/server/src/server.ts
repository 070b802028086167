// =============================================================================
// @tidewire/server: MCP server factory + Express app + Streamable HTTP transport
// =============================================================================
// Creates an Express application with health checks, authentication, rate
// limiting, and a stateless MCP Streamable HTTP endpoint. Tool modules
// register themselves through addToolRegistrar.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import express, {
  type Express,
  type Request,
  type Response,
  type RequestHandler,
} from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type AdapterRegistry,
  type Config,
  type Driver,
  type Embedder,
  type EmbeddingHealthCheckResult,
  type HealthCheckResult,
  type LlmClient,
  type Logger,
  type SourceDefinition,
  type SourceFetcher,
  type Stores,
  closeDriver,
  createAdapters,
  createAnthropicClient,
  createAnthropicLlm,
  createDriver,
  createEmbeddingClient,
  createGeminiEmbedder,
  createLogger,
  createNeo4jStores,
  createRssFetcher,
  embeddingHealthCheck,
  errorMessage,
  healthCheck,
  loadConfig,
  loadSources,
} from "@tidewire/shared";
import {
  SCHEDULER_OPERATOR,
  createAuthMiddleware,
  createRateLimiter,
  requestOperator,
} from "./auth.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Callback that registers MCP tools on a per-request McpServer instance.
 */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

/**
 * Everything the cycles and tools need. Tests build this from in-memory
 * stores and fakes.
 */
export interface AppDependencies {
  stores: Stores;
  /** Storage connectivity check */
  checkStorage: () => Promise<HealthCheckResult>;
  embedder: Embedder;
  llm: LlmClient;
  adapters: AdapterRegistry;
  fetcher: SourceFetcher;
  sources: SourceDefinition[];
  logger: Logger;
  config: Config;
  /** Aborted on shutdown; in-flight publish drains release their claim */
  shutdownSignal: AbortSignal;
  clock: () => Date;
  /** Who runs the work: an API client id, or "scheduler" */
  operator: string;
}

export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  driver: Driver;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Graceful shutdown: abort drains, stop the rate limiter, close HTTP and Neo4j. */
  shutdown: () => Promise<void>;
}

export interface HealthReport {
  status: "ok" | "degraded" | "unhealthy";
  neo4j: HealthCheckResult;
  gemini: EmbeddingHealthCheckResult;
  uptime: number;
}

/** Dependencies for one MCP request, acting as `operator` */
export function forOperator(deps: AppDependencies, operator: string): AppDependencies {
  return { ...deps, operator, logger: deps.logger.child({ clientId: operator }) };
}

// ---------------------------------------------------------------------------
// CORS middleware (inline, no external dependency)
// ---------------------------------------------------------------------------

function createCorsMiddleware(origins: string): RequestHandler {
  return (req: Request, res: Response, next) => {
    res.setHeader("Access-Control-Allow-Origin", origins);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization",
    );

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

/** Neo4j and Gemini checked in parallel; one of two up is "degraded" */
export async function checkHealth(
  deps: Pick<AppDependencies, "checkStorage" | "embedder">,
): Promise<HealthReport> {
  const [neo4j, gemini] = await Promise.all([
    deps.checkStorage(),
    embeddingHealthCheck(deps.embedder),
  ]);
  const allOk = neo4j.ok && gemini.ok;
  const anyOk = neo4j.ok || gemini.ok;
  return {
    status: allOk ? "ok" : anyOk ? "degraded" : "unhealthy",
    neo4j,
    gemini,
    uptime: process.uptime(),
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export async function createApp(
  env?: Record<string, string | undefined>,
): Promise<AppInstance> {
  // --- Configuration & dependencies ---
  const config = loadConfig(env);
  const logger = createLogger({ level: config.LOG_LEVEL });
  const sources = await loadSources(path.resolve(config.SOURCES_FILE));
  const driver = createDriver(config);
  const embedder = createGeminiEmbedder(
    createEmbeddingClient(config.GEMINI_API_KEY, {
      dimensions: config.EMBEDDING_DIMENSIONS,
      model: config.EMBEDDING_MODEL,
    }),
  );
  const llm = createAnthropicLlm(
    createAnthropicClient(config.ANTHROPIC_API_KEY),
    config.ANALYSIS_MODEL,
  );
  const shutdownController = new AbortController();

  const deps: AppDependencies = {
    stores: createNeo4jStores(driver),
    checkStorage: () => healthCheck(driver),
    embedder,
    llm,
    adapters: createAdapters(config),
    fetcher: createRssFetcher(),
    sources,
    logger,
    config,
    shutdownSignal: shutdownController.signal,
    clock: () => new Date(),
    operator: SCHEDULER_OPERATOR,
  };

  const toolRegistrars: ToolRegistrar[] = [];

  // --- Express app ---
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(createCorsMiddleware(config.CORS_ORIGINS));

  // --- Health endpoint (unauthenticated) ---
  app.get("/health", async (_req: Request, res: Response) => {
    try {
      const report = await checkHealth(deps);
      res.status(report.status === "unhealthy" ? 503 : 200).json(report);
    } catch (err) {
      logger.error("Health check failed", { error: errorMessage(err) });
      res.status(503).json({
        status: "unhealthy",
        neo4j: { ok: false, latencyMs: 0, error: "check failed" },
        gemini: { ok: false, latencyMs: 0, error: "check failed" },
        uptime: process.uptime(),
      });
    }
  });

  // --- Auth + Rate limiter for MCP routes ---
  const authMiddleware = createAuthMiddleware(config.API_KEYS, logger);
  const rateLimiter = createRateLimiter(config.RATE_LIMIT_PER_MIN, logger);

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  app.post(
    "/mcp",
    authMiddleware,
    rateLimiter,
    async (req: Request, res: Response) => {
      try {
        const server = new McpServer({ name: "tidewire", version: "0.1.0" });
        const callerDeps = forOperator(deps, requestOperator(req));
        for (const registrar of toolRegistrars) {
          registrar(server, callerDeps);
        }

        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined, // stateless
        });
        res.on("close", () => {
          transport.close().catch((err: unknown) => {
            logger.warn("MCP transport close failed", { error: errorMessage(err) });
          });
        });

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        logger.error("MCP request failed", {
          clientId: req.clientId,
          error: errorMessage(err),
        });
        if (!res.headersSent) {
          res.status(500).json({ error: "Internal server error" });
        }
      }
    },
  );

  // Reject GET and DELETE for stateless server
  app.get("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  // --- HTTP server ---
  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    shutdownController.abort();
    rateLimiter.shutdown();

    await new Promise<void>((resolve, reject) => {
      if (!httpServer.listening) {
        resolve();
        return;
      }
      httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    await closeDriver(driver);

    logger.info("Shutdown complete");
  }

  return {
    app,
    httpServer,
    driver,
    deps,
    addToolRegistrar: (registrar: ToolRegistrar) => {
      toolRegistrars.push(registrar);
    },
    shutdown,
  };
}
