import type { LogDetails } from "./logger.js";

export type HarvestErrorKind =
  | "transport"
  | "extraction"
  | "session"
  | "enrichment"
  | "persistence"
  | "notification"
  | "configuration";

export interface HarvestErrorOptions {
  cause?: unknown;
  details?: LogDetails;
}

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestErrorKind;
  readonly details: LogDetails;
  readonly cause?: unknown;

  constructor(message: string, { cause, details = {} }: HarvestErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.cause = cause;
    this.details = details;
  }
}

// fetch-level failure, already retried by the HTTP client
export class TransportFailure extends HarvestError {
  readonly kind = "transport" as const;
  readonly status?: number;

  constructor(message: string, status?: number, options?: HarvestErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

export class ExtractionFailure extends HarvestError {
  readonly kind = "extraction" as const;
}

// source-wide precondition that makes further progress meaningless
export class SessionFailure extends HarvestError {
  readonly kind = "session" as const;
}

export class EnrichmentFailure extends HarvestError {
  readonly kind = "enrichment" as const;
}

export class PersistenceFailure extends HarvestError {
  readonly kind = "persistence" as const;
}

export class NotificationFailure extends HarvestError {
  readonly kind = "notification" as const;
}

export class ConfigurationFailure extends HarvestError {
  readonly kind = "configuration" as const;
}

export function isHarvestError(e: unknown): e is HarvestError {
  return e instanceof HarvestError;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  return String(e);
}
