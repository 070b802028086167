import type { Config } from "../../config.js";
import type { Platform } from "../../types.js";
import { createDevtoAdapter } from "./devto.js";
import { createHashnodeAdapter } from "./hashnode.js";
import { createLinkedinAdapter } from "./linkedin.js";
import { createMediumAdapter } from "./medium.js";
import type { FetchFn, PlatformAdapter } from "./types.js";

export type AdapterRegistry = Partial<Record<Platform, PlatformAdapter>>;

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Adapters for every platform that has credentials. Queue items for a
 * platform missing here stay queued.
 */
export function createAdapters(
  config: Pick<
    Config,
    | "EXTERNAL_CALL_TIMEOUT_MS"
    | "DEVTO_API_KEY"
    | "HASHNODE_API_KEY"
    | "HASHNODE_PUBLICATION_ID"
    | "MEDIUM_INTEGRATION_TOKEN"
    | "LINKEDIN_ACCESS_TOKEN"
  >,
  fetchFn?: FetchFn,
): AdapterRegistry {
  const options = { timeoutMs: config.EXTERNAL_CALL_TIMEOUT_MS, fetchFn };
  const adapters: AdapterRegistry = {};

  if (present(config.DEVTO_API_KEY)) {
    adapters.devto = createDevtoAdapter(config.DEVTO_API_KEY, options);
  }
  if (present(config.HASHNODE_API_KEY) && present(config.HASHNODE_PUBLICATION_ID)) {
    adapters.hashnode = createHashnodeAdapter(
      {
        apiKey: config.HASHNODE_API_KEY,
        publicationId: config.HASHNODE_PUBLICATION_ID,
      },
      options,
    );
  }
  if (present(config.MEDIUM_INTEGRATION_TOKEN)) {
    adapters.medium = createMediumAdapter(config.MEDIUM_INTEGRATION_TOKEN, options);
  }
  if (present(config.LINKEDIN_ACCESS_TOKEN)) {
    adapters.linkedin = createLinkedinAdapter(config.LINKEDIN_ACCESS_TOKEN, options);
  }

  return adapters;
}

export { createDevtoAdapter, createHashnodeAdapter, createLinkedinAdapter, createMediumAdapter };
export { classifyGraphqlErrors } from "./hashnode.js";
export { classifyStatus, failure, parseRetryAfter, MAX_INLINE_RETRY_AFTER_S } from "./http.js";
export type {
  AdapterOptions,
  FailureKind,
  FetchFn,
  PlatformAdapter,
  PublishFailure,
  PublishRequest,
  PublishResult,
  PublishSuccess,
} from "./types.js";
