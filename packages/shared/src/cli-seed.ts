#!/usr/bin/env node
// =============================================================================
// @tidewire/shared: CLI seed script
// =============================================================================
// Creates the constraints, lookup indexes and article vector index.
//
// Usage:
//   NEO4J_URI=neo4j://localhost:7687 NEO4J_USER=neo4j NEO4J_PASSWORD=... \
//     node dist/packages/shared/src/cli-seed.js
// =============================================================================

import { z } from "zod";
import { createDriver } from "./neo4j/driver.js";
import { seedDatabase } from "./neo4j/seed.js";

const env = z
  .object({
    NEO4J_URI: z.string().min(1),
    NEO4J_USER: z.string().min(1).default("neo4j"),
    NEO4J_PASSWORD: z.string().min(1),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().min(1).default(768),
  })
  .safeParse(process.env);

if (!env.success) {
  console.error("Missing required env vars: NEO4J_URI and NEO4J_PASSWORD must be set.");
  console.error(env.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n"));
  process.exit(1);
}

console.log(`Connecting to ${env.data.NEO4J_URI} as ${env.data.NEO4J_USER}...`);

const driver = createDriver(env.data);

try {
  await driver.verifyConnectivity();
  console.log("Connected to Neo4j.\n");

  const result = await seedDatabase(driver, {
    dimensions: env.data.EMBEDDING_DIMENSIONS,
  });

  console.log("\nSeed summary:");
  console.log(`  Constraints:   ${result.constraints}`);
  console.log(`  Indexes:       ${result.indexes}`);
  console.log(`  VectorIndexes: ${result.vectorIndexes}`);
} catch (err) {
  console.error("Seed failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
} finally {
  await driver.close();
}
