// =============================================================================
// @tidewire/shared: Error taxonomy
// =============================================================================
// Per-source and per-item errors are normally carried as Result values and
// aggregated into run reports. These classes give those values a name, and
// the few unrecoverable ones (storage, configuration) are thrown.
// =============================================================================

export class TidewireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One source failed to fetch; the batch continues without it */
export class SourceFetchError extends TidewireError {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${source}] ${message}`, options);
  }
}

/** Embedding was unavailable, so only the exact check ran */
export class DedupAmbiguousError extends TidewireError {}

export class AnalysisParseError extends TidewireError {
  constructor(
    readonly stage: 1 | 2,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Stage ${stage}: ${message}`, options);
  }
}

export class PublishPlatformError extends TidewireError {
  constructor(
    readonly platform: string,
    readonly retryable: boolean,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Another drain already holds the item; callers treat this as a no-op */
export class ClaimConflictError extends TidewireError {
  constructor(readonly itemId: string) {
    super(`Queue item ${itemId} is already claimed`);
  }
}

export class TimeoutError extends TidewireError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/** Storage is unreachable or rejected a write; aborts the current cycle */
export class StorageError extends TidewireError {}

export class ConfigError extends TidewireError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
