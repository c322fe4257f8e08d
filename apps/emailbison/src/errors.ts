import type { DebugInfo } from "./integrations/http.js";
import type { WorkflowStepResult } from "./models.js";

export class EmailBisonError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmailBisonError";
  }
}

export class ConfigError extends EmailBisonError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Base for failures raised by the transport. `debug` describes the attempt
 * (URL, status if a response arrived) so callers can still audit it.
 */
export class TransportError extends EmailBisonError {
  constructor(
    message: string,
    public readonly debug: DebugInfo | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class NetworkError extends TransportError {
  constructor(message: string, debug: DebugInfo | null, options?: { cause?: unknown }) {
    super(message, debug, options);
    this.name = "NetworkError";
  }
}

export class AuthError extends TransportError {
  constructor(message: string, debug: DebugInfo | null) {
    super(message, debug);
    this.name = "AuthError";
  }
}

export class ApiError extends TransportError {
  constructor(
    message: string,
    public readonly statusCode: number | null,
    public readonly details: unknown,
    debug: DebugInfo | null,
    public readonly retryAfter: string | null = null
  ) {
    super(message, debug);
    this.name = "ApiError";
  }

  get isRateLimited(): boolean {
    return this.statusCode === 429;
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }
}

/** A locally detected precondition failure. */
export class WorkflowValidationError extends EmailBisonError {
  constructor(message: string) {
    super(message);
    this.name = "WorkflowValidationError";
  }
}

export class LeadListTimeoutError extends WorkflowValidationError {
  constructor(
    public readonly leadListId: number,
    public readonly timeoutMs: number
  ) {
    super(`Timed out waiting for lead list ${leadListId} to finish processing.`);
    this.name = "LeadListTimeoutError";
  }
}

/** An expected field was absent from an otherwise successful response. */
export class ExtractionError extends EmailBisonError {
  constructor(
    message: string,
    public readonly raw: unknown
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

/**
 * Terminal failure of a single-campaign workflow, carrying how far it got.
 */
export class CampaignWorkflowError extends EmailBisonError {
  constructor(
    public readonly cause: Error,
    public readonly campaignId: number | null,
    public readonly steps: WorkflowStepResult[],
    public readonly runId: string | null = null
  ) {
    super(cause.message, { cause });
    this.name = "CampaignWorkflowError";
  }
}

export type ErrorDescription = {
  type: string;
  message: string;
  status_code?: number | null;
  details?: unknown;
};

function unwrap(err: unknown): unknown {
  return err instanceof CampaignWorkflowError ? err.cause : err;
}

export function describeError(err: unknown): ErrorDescription {
  const e = unwrap(err);
  if (e instanceof ApiError) {
    return { type: e.name, message: e.message, status_code: e.statusCode, details: e.details };
  }
  if (e instanceof Error) return { type: e.name, message: e.message };
  return { type: "Error", message: String(e) };
}

export function formatErrorMessage(err: unknown): string {
  const e = unwrap(err);
  if (e instanceof ApiError) {
    return `${e.message} Details: ${JSON.stringify(e.details ?? null, null, 2)}`;
  }
  if (e instanceof EmailBisonError) return e.message;
  if (e instanceof Error) return `Unexpected error: ${e.message}`;
  return `Unexpected error: ${String(e)}`;
}

export function exitCodeFor(err: unknown): number {
  const e = unwrap(err);
  if (e instanceof WorkflowValidationError) return 2;
  if (e instanceof NetworkError) return 4;
  if (e instanceof AuthError || e instanceof ApiError || e instanceof ConfigError) return 3;
  return 5;
}
