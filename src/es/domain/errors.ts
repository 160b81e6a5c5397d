export class EsError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 400,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Payload could not be decoded into a known command. */
export class DecodingError extends EsError {
  constructor(message: string) {
    super(message, "DECODING_ERROR", 400);
  }
}

/** `decide` rejected the command against the current state. */
export class DomainError extends EsError {
  constructor(message: string, public reason: string = "DOMAIN_ERROR") {
    super(message, "DOMAIN_ERROR", 422);
  }
}

/** The stream already holds a final event; nothing more may be appended. */
export class StreamClosedError extends DomainError {
  constructor(message: string, public streamId?: string) {
    super(message, "STREAM_CLOSED");
  }
}

/**
 * The stream advanced past the version the decision was based on.
 * Callers reload and resubmit; nothing retries on their behalf.
 */
export class ConcurrencyError extends EsError {
  constructor(message: string, public streamId?: string, public expectedVersion?: number) {
    super(message, "CONFLICT", 409, true);
  }
}

export class StorageFailureError extends EsError {
  constructor(message: string, public cause?: unknown) {
    super(message, "STORAGE_FAILURE", 503);
  }
}

/** Raised while composing deciders, never at request time. */
export class DeciderConfigurationError extends EsError {
  constructor(message: string) {
    super(message, "DECIDER_CONFIGURATION", 500);
  }
}

export class NotFoundError extends EsError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
  }
}
