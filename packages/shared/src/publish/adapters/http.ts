// =============================================================================
// @tidewire/shared: HTTP transport shared by the platform adapters
// =============================================================================
// Maps every way a platform call can go wrong onto a PublishFailure. A 429
// with a short Retry-After is waited out once here; anything longer goes back
// to the queue as a retryable rate_limit failure.
// =============================================================================

import { setTimeout as delay } from "node:timers/promises";
import { TimeoutError, errorMessage } from "../../errors.js";
import { withTimeout } from "../../timeout.js";
import { err, ok, type Result } from "../../types.js";
import type { AdapterOptions, FailureKind, PublishFailure } from "./types.js";

/** Longest Retry-After honoured inside a single publish call */
export const MAX_INLINE_RETRY_AFTER_S = 10;

export interface JsonResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

export function failure(kind: FailureKind, message: string): PublishFailure {
  const retryable =
    kind === "rate_limit" ||
    kind === "network" ||
    kind === "timeout" ||
    kind === "server";
  return { retryable, kind, message };
}

/** Failure kind for a non-2xx HTTP status */
export function classifyStatus(status: number): FailureKind {
  if (status === 429) return "rate_limit";
  if (status === 408) return "timeout";
  if (status >= 500) return "server";
  if (status === 401 || status === 403) return "auth";
  if (status === 451) return "content_policy";
  return "payload";
}

/** Retry-After in seconds; only the delta-seconds form is understood */
export function parseRetryAfter(value: string | null): number | null {
  if (value === null) return null;
  const seconds = Number(value.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${errorMessage(error)}>`;
  }
}

export async function requestJson(
  platform: string,
  url: string,
  init: RequestInit,
  options: AdapterOptions,
): Promise<Result<JsonResponse, PublishFailure>> {
  const fetchFn = options.fetchFn ?? fetch;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));

  for (let attempt = 1; ; attempt++) {
    // A timed-out request is cancelled, not just abandoned
    const deadline = new AbortController();
    const signal = init.signal
      ? AbortSignal.any([init.signal, deadline.signal])
      : deadline.signal;
    let response: Response;
    try {
      response = await withTimeout(
        fetchFn(url, { ...init, signal }),
        options.timeoutMs,
        `${platform} ${init.method ?? "GET"}`,
        () => deadline.abort(),
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return err(failure("timeout", error.message));
      }
      return err(failure("network", `${platform}: ${errorMessage(error)}`));
    }

    if (response.ok) {
      const text = await readBody(response);
      try {
        const body: unknown = text ? JSON.parse(text) : null;
        return ok({ status: response.status, headers: response.headers, body });
      } catch {
        // Published or not is unknown here; retrying could post twice.
        return err({
          retryable: false,
          kind: "server",
          message: `${platform} HTTP ${response.status}: response is not JSON`,
        });
      }
    }

    const kind = classifyStatus(response.status);
    const text = await readBody(response);

    if (kind === "rate_limit" && attempt === 1) {
      const retryAfter = parseRetryAfter(response.headers.get("retry-after"));
      if (retryAfter !== null && retryAfter <= MAX_INLINE_RETRY_AFTER_S) {
        await sleep(retryAfter * 1000);
        continue;
      }
    }

    return err(
      failure(kind, `${platform} HTTP ${response.status}: ${text.slice(0, 300)}`),
    );
  }
}

/** Failure for a 2xx whose body does not have the expected shape */
export function unexpectedResponse(platform: string, detail: string): PublishFailure {
  return {
    retryable: false,
    kind: "server",
    message: `${platform} returned an unexpected response: ${detail}`,
  };
}
