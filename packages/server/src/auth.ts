// =============================================================================
// @tidewire/server: API-key auth and per-client rate limiting for /mcp
// =============================================================================
// API_KEYS maps each key to a client id. The id is the operator of every
// tool call made with that key: it is bound to the request logger, stored
// on the runs a tool starts and on skip log entries, and keys the limiter.
// =============================================================================

import type { RequestHandler, Request, Response, NextFunction } from "express";
import { err, ok, type Logger, type Result } from "@tidewire/shared";

declare global {
  namespace Express {
    interface Request {
      clientId?: string;
    }
  }
}

/** Operator recorded for cron-driven work */
export const SCHEDULER_OPERATOR = "scheduler";

const WINDOW_MS = 60_000;

/** Key from an `Authorization: Bearer <key>` header */
export function readBearerKey(header: string | undefined): Result<string, string> {
  if (!header) return err("Missing Authorization header");
  const match = /^Bearer (\S+)$/.exec(header);
  if (!match?.[1]) return err("Invalid Authorization format. Expected: Bearer <key>");
  return ok(match[1]);
}

export function createAuthMiddleware(
  apiKeys: Record<string, string>,
  logger: Logger,
): RequestHandler {
  const clients = new Map(Object.entries(apiKeys));

  return (req: Request, res: Response, next: NextFunction) => {
    const key = readBearerKey(req.headers.authorization);
    const clientId = key.ok ? clients.get(key.value) : undefined;
    if (clientId === undefined) {
      const reason = key.ok ? "Invalid API key" : key.error;
      logger.warn("Rejected MCP request", { reason, ip: req.ip });
      res.status(401).json({ error: reason });
      return;
    }

    req.clientId = clientId;
    next();
  };
}

/** Client id set by the auth middleware; throws on an unauthenticated route */
export function requestOperator(req: Request): string {
  if (req.clientId === undefined) {
    throw new Error("No client id on request; is the auth middleware mounted?");
  }
  return req.clientId;
}

export function createRateLimiter(
  maxPerMinute: number,
  logger: Logger,
): RequestHandler & { shutdown: () => void } {
  // Request times per client inside the current window, oldest first
  const recent = new Map<string, number[]>();
  const inWindow = (times: number[], now: number) => times.filter((t) => now - t < WINDOW_MS);

  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [clientId, times] of recent) {
      const kept = inWindow(times, now);
      if (kept.length === 0) recent.delete(clientId);
      else recent.set(clientId, kept);
    }
  }, WINDOW_MS).unref();

  const limit = (req: Request, res: Response, next: NextFunction): void => {
    const clientId = req.clientId;
    if (clientId === undefined) {
      next();
      return;
    }

    const now = Date.now();
    const times = inWindow(recent.get(clientId) ?? [], now);
    if (times.length >= maxPerMinute) {
      const retryAfterMs = (times[0] ?? now) + WINDOW_MS - now;
      logger.warn("Rate limit exceeded", { clientId, retryAfterMs });
      res.setHeader("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json({ error: "Rate limit exceeded", retryAfterMs });
      return;
    }

    times.push(now);
    recent.set(clientId, times);
    next();
  };

  return Object.assign(limit, { shutdown: () => clearInterval(sweep) });
}
