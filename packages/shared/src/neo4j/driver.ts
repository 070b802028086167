import neo4j, { type Driver, type Session } from "neo4j-driver";
import { z } from "zod";
import type { Config } from "../config.js";
import { StorageError, errorMessage } from "../errors.js";

export type { Driver, Session };

export interface HealthCheckResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export function createDriver(
  config: Pick<Config, "NEO4J_URI" | "NEO4J_USER" | "NEO4J_PASSWORD">,
): Driver {
  return neo4j.driver(
    config.NEO4J_URI,
    neo4j.auth.basic(config.NEO4J_USER, config.NEO4J_PASSWORD),
    {
      maxConnectionPoolSize: 30,
      connectionLivenessCheckTimeout: 300000,
    },
  );
}

export async function healthCheck(driver: Driver): Promise<HealthCheckResult> {
  const start = performance.now();
  try {
    await driver.getServerInfo();
    return { ok: true, latencyMs: performance.now() - start };
  } catch (err) {
    return {
      ok: false,
      latencyMs: performance.now() - start,
      error: errorMessage(err),
    };
  }
}

export async function closeDriver(driver: Driver): Promise<void> {
  await driver.close();
}

/**
 * Runs `fn` on a fresh session and always closes it. Driver and query
 * failures surface as StorageError.
 */
export async function withSession<T>(
  driver: Driver,
  operation: string,
  fn: (session: Session) => Promise<T>,
): Promise<T> {
  const session = driver.session();
  try {
    return await fn(session);
  } catch (error) {
    if (error instanceof StorageError) throw error;
    throw new StorageError(`${operation}: ${errorMessage(error)}`, { cause: error });
  } finally {
    await session.close();
  }
}

// ---------------------------------------------------------------------------
// Value conversion
// ---------------------------------------------------------------------------

/** Neo4j integers arrive as Integer objects; everything else passes through */
export function toNumber(value: unknown): number {
  if (neo4j.isInt(value)) return value.toNumber();
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return 0;
}

/** Integer parameter; plain JS numbers reach Cypher as floats */
export function int(value: number): ReturnType<typeof neo4j.int> {
  return neo4j.int(Math.trunc(value));
}

export function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function asStringArray(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((v): v is string => typeof v === "string")
    : [];
}

export function asVector(value: unknown): number[] | undefined {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  return value.map(toNumber);
}

/** Validated enum property, or `fallback` when the stored value is unknown */
export function asEnum<T extends string>(
  values: readonly T[],
  value: unknown,
  fallback: T,
): T {
  const match = values.find((v) => v === value);
  return match ?? fallback;
}

export function asOptionalEnum<T extends string>(
  values: readonly T[],
  value: unknown,
): T | undefined {
  return values.find((v) => v === value);
}

/** JSON property parsed against `schema`; `fallback` when absent or invalid */
export function parseJsonProperty<T>(
  value: unknown,
  schema: z.ZodType<T>,
  fallback: T,
): T {
  if (typeof value !== "string" || value === "") return fallback;
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : fallback;
}

/** Node properties of `key` in a result record */
export function nodeProperties(
  record: { get(key: string): unknown },
  key: string,
): Record<string, unknown> {
  const node = record.get(key);
  if (typeof node === "object" && node !== null && "properties" in node) {
    const props = node.properties;
    if (typeof props === "object" && props !== null) {
      return Object.fromEntries(Object.entries(props));
    }
  }
  throw new StorageError(`Result column "${key}" is not a node`);
}
