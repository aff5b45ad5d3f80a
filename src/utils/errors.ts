export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/** The server rejected the login credentials. */
export class AuthError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, "AUTH_ERROR", cause);
    this.name = "AuthError";
  }
}

/** Transport failure, timeout, or a transient server-side error (5xx, 429). */
export class NetworkError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, "NETWORK_ERROR", cause);
    this.name = "NetworkError";
  }
}

/** The auth token stopped being accepted in the middle of a session. */
export class SessionExpiredError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, "SESSION_EXPIRED", cause);
    this.name = "SessionExpiredError";
  }
}

/** The real-time subscription could not be opened or was terminated. */
export class StreamError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, "STREAM_ERROR", cause);
    this.name = "StreamError";
  }
}

export class TranslationError extends BridgeError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSLATION_ERROR", cause);
    this.name = "TranslationError";
  }
}

/** The server answered a request with a non-retryable 4xx. */
export class RequestRejectedError extends BridgeError {
  constructor(
    message: string,
    public readonly status: number,
    cause?: unknown,
  ) {
    super(message, "REQUEST_REJECTED", cause);
    this.name = "RequestRejectedError";
  }
}

/** An outbound message was given up on. Reported to the sender, never retried. */
export class DeliveryFailure extends BridgeError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, "DELIVERY_FAILURE", cause);
    this.name = "DeliveryFailure";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
