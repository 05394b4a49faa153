/**
 * Error taxonomy for a sync run.
 *
 * Errors flagged `runFatal` abort the whole run; everything else is caught by
 * the pipeline and recorded against the article being processed.
 */

export type ExternalService = "freshrss" | "llm" | "github";

export class SyncError extends Error {
  readonly runFatal: boolean;

  constructor(message: string, options: { runFatal?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SyncError";
    this.runFatal = options.runFatal ?? false;
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string) {
    super(message, { runFatal: true });
    this.name = "ConfigurationError";
  }
}

export class AuthenticationError extends SyncError {
  constructor(
    public readonly service: ExternalService,
    message: string,
    cause?: unknown
  ) {
    super(message, { runFatal: true, cause });
    this.name = "AuthenticationError";
  }
}

export class NetworkError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "NetworkError";
  }
}

export class TimeoutError extends SyncError {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "TimeoutError";
  }
}

export class ParseError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ParseError";
  }
}

export class ProviderError extends SyncError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "ProviderError";
  }
}

export class RepositoryError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, { runFatal: true, cause });
    this.name = "RepositoryError";
  }
}

export class PushError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, { runFatal: true, cause });
    this.name = "PushError";
  }
}

export function isRunFatal(err: unknown): boolean {
  return err instanceof SyncError && err.runFatal;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
