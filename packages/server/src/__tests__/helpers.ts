// =============================================================================
// Test helpers: in-process dependencies and an MCP client over an in-memory
// transport
// =============================================================================

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { loadConfig, silentLogger } from "@tidewire/shared";
import {
  FakeEmbedder,
  FakeLlm,
  FakeSourceFetcher,
  createMemoryStores,
  type MemoryStores,
} from "@tidewire/shared/testing";
import type { AppDependencies, ToolRegistrar } from "../server.js";

export const TEST_NOW = new Date("2026-01-10T08:00:00.000Z");

export const TEST_ENV: Record<string, string> = {
  NEO4J_URI: "bolt://localhost:7687",
  NEO4J_USER: "test-user",
  NEO4J_PASSWORD: "test-secret",
  GEMINI_API_KEY: "test-key",
  ANTHROPIC_API_KEY: "test-key",
  API_KEYS: '{"test-key":"tester"}',
  CRON_ENABLED: "false",
};

export type TestDependencies = AppDependencies & {
  stores: MemoryStores;
  embedder: FakeEmbedder;
  llm: FakeLlm;
};

export function testDeps(overrides: Partial<TestDependencies> = {}): TestDependencies {
  return {
    stores: createMemoryStores(),
    checkStorage: async () => ({ ok: true, latencyMs: 1 }),
    embedder: new FakeEmbedder([], [1, 0, 0]),
    llm: new FakeLlm(),
    adapters: {},
    fetcher: new FakeSourceFetcher({}),
    sources: [],
    logger: silentLogger,
    config: loadConfig(TEST_ENV),
    shutdownSignal: new AbortController().signal,
    clock: () => TEST_NOW,
    operator: "tester",
    ...overrides,
  };
}

export async function createTestClient(
  deps: AppDependencies,
  registrars: ToolRegistrar[],
): Promise<Client> {
  const server = new McpServer({ name: "tidewire-test", version: "0.1.0" });
  for (const register of registrars) register(server, deps);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.1.0" });
  await client.connect(clientTransport);
  return client;
}

export interface ToolResult {
  text: string;
  isError: boolean;
  parsed: unknown;
}

/** Calls a tool and parses its text response as JSON where it is JSON */
export async function callTool(
  client: Client,
  name: string,
  args: Record<string, unknown> = {},
): Promise<ToolResult> {
  const result = await client.callTool({ name, arguments: args });

  const content = result.content as Array<{ type: string; text?: string }>;
  const text = content.find((c) => c.type === "text")?.text ?? "";

  let parsed: unknown = text;
  if (!result.isError) parsed = JSON.parse(text);

  return { text, isError: result.isError === true, parsed };
}
