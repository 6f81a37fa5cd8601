/**
 * Invalid input to a domain operation. Raised before anything is written,
 * so the caller can retry with corrected input.
 */
export class ValidationError extends Error {
  override name = "ValidationError";
}

export class NotJoinedError extends Error {
  override name = "NotJoinedError";

  constructor(readonly mission_id: string) {
    super(`Not joined to mission ${mission_id}. Run: mcollab mission:join ${mission_id} --role <role>`);
  }
}

export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Queue append or clock persistence could not complete (disk full, EACCES, ...). */
export class LocalIoError extends Error {
  override name = "LocalIoError";

  constructor(
    message: string,
    readonly file_path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Timeout, connection failure or a retryable HTTP status from the ingestion service. */
export class TransientDeliveryError extends Error {
  override name = "TransientDeliveryError";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ReplayAuthError extends Error {
  override name = "ReplayAuthError";

  constructor(readonly status: number) {
    super(`Ingestion service refused credentials (HTTP ${status})`);
  }
}

/** Errors the CLI reports as a single line without a stack trace. */
export function isUserFacingError(e: unknown): boolean {
  return e instanceof ValidationError || e instanceof NotJoinedError || e instanceof ConfigError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
