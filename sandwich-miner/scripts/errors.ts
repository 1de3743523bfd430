import type { PipelineEvent, PipelineState } from "./types";

export type FailureKind = "fatal" | "content" | "parse" | "retryable" | "other";

export class SandwichError extends Error {
  readonly kind: FailureKind;
  readonly reason: string;

  constructor(message: string, kind: FailureKind, reason: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SandwichError";
    this.kind = kind;
    this.reason = reason;
  }
}

/** Unrecoverable: the session cannot continue (store unreachable, auth rejected). */
export class FatalError extends SandwichError {
  constructor(message: string, reason: string, options?: ErrorOptions) {
    super(message, "fatal", reason, options);
    this.name = "FatalError";
  }
}

/** The fetched material itself is unusable. */
export class ContentError extends SandwichError {
  constructor(message: string, reason: string, options?: ErrorOptions) {
    super(message, "content", reason, options);
    this.name = "ContentError";
  }
}

export class ParseError extends SandwichError {
  constructor(message: string, reason = "parse_failed", options?: ErrorOptions) {
    super(message, "parse", reason, options);
    this.name = "ParseError";
  }
}

/** Raised only once the operation's own retry budget is spent. */
export class RetryableError extends SandwichError {
  constructor(message: string, reason: string, options?: ErrorOptions) {
    super(message, "retryable", reason, options);
    this.name = "RetryableError";
  }
}

export class OtherFailure extends SandwichError {
  constructor(message: string, reason = "unexpected_error", options?: ErrorOptions) {
    super(message, "other", reason, options);
    this.name = "OtherFailure";
  }
}

export class InvalidTransitionError extends Error {
  readonly currentState: PipelineState;
  readonly event: PipelineEvent;
  readonly validEvents: PipelineEvent[];

  constructor(currentState: PipelineState, event: PipelineEvent, validEvents: PipelineEvent[]) {
    super(
      `Invalid transition: ${currentState} + '${event}' (valid events: ${
        validEvents.length > 0 ? validEvents.join(", ") : "none"
      })`,
    );
    this.name = "InvalidTransitionError";
    this.currentState = currentState;
    this.event = event;
    this.validEvents = validEvents;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isStructuralError(error: unknown): boolean {
  return error instanceof InvalidTransitionError || error instanceof ConfigurationError;
}

export function toSandwichError(error: unknown): SandwichError {
  if (error instanceof SandwichError) return error;
  return new OtherFailure(errorMessage(error), "unexpected_error", { cause: error });
}

export function errorForHttpStatus(status: number, message: string): SandwichError {
  if (status === 401 || status === 403) return new FatalError(message, "auth_rejected");
  if (status === 429) return new RetryableError(message, "rate_limited");
  if (status >= 500) return new RetryableError(message, `http_${status}`);
  return new OtherFailure(message, `http_${status}`);
}
