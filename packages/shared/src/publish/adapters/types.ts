import type { Platform, Result } from "../../types.js";

export type FailureKind =
  | "rate_limit"
  | "network"
  | "timeout"
  | "server"
  | "auth"
  | "payload"
  | "content_policy";

export interface PublishFailure {
  retryable: boolean;
  kind: FailureKind;
  message: string;
}

export interface PublishRequest {
  title?: string;
  body: string;
  language: string;
}

export interface PublishSuccess {
  platformId: string;
}

export type PublishResult = Result<PublishSuccess, PublishFailure>;

/**
 * One external platform. Adapters hold credentials only; nothing carries
 * over between calls. `signal` aborts an in-flight request.
 */
export interface PlatformAdapter {
  readonly platform: Platform;
  publish(request: PublishRequest, signal?: AbortSignal): Promise<PublishResult>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface AdapterOptions {
  timeoutMs: number;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}
