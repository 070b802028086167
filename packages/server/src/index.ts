// =============================================================================
// @tidewire/server: Entry point
// =============================================================================
// Loads config, creates the Express + MCP server, seeds the schema, starts
// the scheduler and listens.
// =============================================================================

import { errorMessage, seedDatabase } from "@tidewire/shared";
import { createApp } from "./server.js";
import { registerAdminTools } from "./tools/admin.js";
import { registerArticleTools } from "./tools/articles.js";
import { registerBriefingTools } from "./tools/briefings.js";
import { registerPipelineTools } from "./tools/pipeline.js";
import { registerQueueTools } from "./tools/queue.js";
import { registerSignalTools } from "./tools/signals.js";
import { startScheduler, type SchedulerHandle } from "./scheduler.js";

const instance = await createApp();
const { httpServer, deps, shutdown } = instance;
const { config, logger } = deps;

// Register MCP tools
instance.addToolRegistrar(registerAdminTools);
instance.addToolRegistrar(registerArticleTools);
instance.addToolRegistrar(registerBriefingTools);
instance.addToolRegistrar(registerSignalTools);
instance.addToolRegistrar(registerQueueTools);
instance.addToolRegistrar(registerPipelineTools);

// Constraints and indexes are created with IF NOT EXISTS, so seeding runs
// on every boot; the scheduler starts either way.
let scheduler: SchedulerHandle | undefined;

seedDatabase(instance.driver, { dimensions: config.EMBEDDING_DIMENSIONS }, logger)
  .then((result) => {
    logger.info("Database seed complete", { ...result });
    scheduler = startScheduler(deps);
  })
  .catch((err: unknown) => {
    logger.error("Database seed failed (non-fatal)", { error: errorMessage(err) });
    scheduler = startScheduler(deps);
  });

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("Tidewire MCP server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGINS,
    rateLimitPerMin: config.RATE_LIMIT_PER_MIN,
    sources: deps.sources.length,
    platforms: Object.keys(deps.adapters),
  });
});

// Signal handlers live here, not in createApp, so tests can create many apps
function handleShutdown() {
  scheduler?.stop();
  shutdown()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error("Shutdown error", { error: errorMessage(err) });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);
