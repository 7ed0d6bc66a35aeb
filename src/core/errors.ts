export type GatewayErrorKind =
  | "configuration"
  | "authentication"
  | "authorization"
  | "upstream_fetch"
  | "streaming";

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings. Fatal at startup. */
export class ConfigurationError extends GatewayError {
  readonly kind = "configuration";

  constructor(message: string, code = "configuration_error", options?: { cause?: unknown }) {
    super(500, code, message, options);
  }
}

/** The caller could not be identified: malformed, expired or unverifiable token. */
export class AuthenticationError extends GatewayError {
  readonly kind = "authentication";

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(401, code, message, options);
  }
}

/** The caller was identified but is not allowed in: wrong tenant, scope or role. */
export class AuthorizationError extends GatewayError {
  readonly kind = "authorization";

  constructor(code: string, message: string) {
    super(403, code, message);
  }
}

export class UpstreamFetchError extends GatewayError {
  readonly kind = "upstream_fetch";

  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(500, "upstream_fetch_failed", message, options);
  }
}

/**
 * Raised by execution code while events are being streamed. Its message is
 * sent to the client in the terminal error frame, so it must not carry
 * internal detail.
 */
export class StreamingFault extends GatewayError {
  readonly kind = "streaming";

  constructor(message: string, options?: { cause?: unknown }) {
    super(500, "execution_error", message, options);
  }
}

export type ValidationFailure = AuthenticationError | AuthorizationError | ConfigurationError;

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}
