import { describe, it, expect, vi, afterEach } from "vitest";
import type { Request, Response } from "express";
import { silentLogger } from "@tidewire/shared";
import {
  createAuthMiddleware,
  createRateLimiter,
  readBearerKey,
  requestOperator,
} from "../auth.js";

interface FakeResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
}

function fakeRequest(authorization?: string, clientId?: string): Request {
  const req = { path: "/mcp", headers: { authorization }, clientId };
  return req as unknown as Request;
}

function fakeResponse(): { res: Response; sent: FakeResponse } {
  const sent: FakeResponse = { statusCode: 200, body: undefined, headers: {} };
  interface ResponseLike {
    status(code: number): ResponseLike;
    json(body: unknown): ResponseLike;
    setHeader(name: string, value: string): ResponseLike;
  }
  const res: ResponseLike = {
    status(code: number) {
      sent.statusCode = code;
      return res;
    },
    json(body: unknown) {
      sent.body = body;
      return res;
    },
    setHeader(name: string, value: string) {
      sent.headers[name] = value;
      return res;
    },
  };
  return { res: res as unknown as Response, sent };
}

describe("readBearerKey", () => {
  it("takes the single token after Bearer", () => {
    expect(readBearerKey("Bearer test-key")).toEqual({ ok: true, value: "test-key" });
    expect(readBearerKey("Bearer test-key extra")).toEqual({
      ok: false,
      error: "Invalid Authorization format. Expected: Bearer <key>",
    });
    expect(readBearerKey("")).toEqual({ ok: false, error: "Missing Authorization header" });
  });
});

describe("createAuthMiddleware", () => {
  const auth = createAuthMiddleware({ "test-key": "tester" }, silentLogger);

  it.each([
    [undefined, "Missing Authorization header"],
    ["Basic test-key", "Invalid Authorization format. Expected: Bearer <key>"],
    ["Bearer wrong-key", "Invalid API key"],
  ])("rejects %s", (header, error) => {
    const next = vi.fn();
    const { res, sent } = fakeResponse();

    auth(fakeRequest(header), res, next);

    expect(sent).toMatchObject({ statusCode: 401, body: { error } });
    expect(next).not.toHaveBeenCalled();
  });

  it("attaches the client id for a known key", () => {
    const next = vi.fn();
    const req = fakeRequest("Bearer test-key");

    auth(req, fakeResponse().res, next);

    expect(next).toHaveBeenCalledOnce();
    expect(req.clientId).toBe("tester");
    expect(requestOperator(req)).toBe("tester");
  });

  it("logs the rejection reason without the key", () => {
    const warn = vi.fn();
    const logged = createAuthMiddleware({ "test-key": "tester" }, { ...silentLogger, warn });

    logged(fakeRequest("Bearer wrong-key"), fakeResponse().res, vi.fn());

    expect(warn).toHaveBeenCalledWith("Rejected MCP request", {
      reason: "Invalid API key",
      ip: undefined,
    });
  });
});

describe("requestOperator", () => {
  it("refuses a request the auth middleware never saw", () => {
    expect(() => requestOperator(fakeRequest())).toThrow(
      "No client id on request; is the auth middleware mounted?",
    );
  });
});

describe("createRateLimiter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("allows the per-minute budget, then answers 429 with Retry-After", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-10T08:00:00.000Z"));
    const limiter = createRateLimiter(2, silentLogger);
    const next = vi.fn();

    limiter(fakeRequest(undefined, "tester"), fakeResponse().res, next);
    limiter(fakeRequest(undefined, "tester"), fakeResponse().res, next);
    const { res, sent } = fakeResponse();
    limiter(fakeRequest(undefined, "tester"), res, next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(sent).toMatchObject({
      statusCode: 429,
      headers: { "Retry-After": "60" },
      body: { error: "Rate limit exceeded", retryAfterMs: 60_000 },
    });

    vi.setSystemTime(new Date("2026-01-10T08:01:00.000Z"));
    limiter(fakeRequest(undefined, "tester"), fakeResponse().res, next);
    expect(next).toHaveBeenCalledTimes(3);

    limiter.shutdown();
  });

  it("passes requests without a client id through", () => {
    const limiter = createRateLimiter(1, silentLogger);
    const next = vi.fn();

    limiter(fakeRequest(), fakeResponse().res, next);
    limiter(fakeRequest(), fakeResponse().res, next);

    expect(next).toHaveBeenCalledTimes(2);
    limiter.shutdown();
  });
});
