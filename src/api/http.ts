import type { IncomingHttpHeaders } from "node:http";
import { ZodError } from "zod";
import { isGatewayError } from "../core/errors.js";
import { createId } from "../lib/id.js";

export function requestIdFromHeaders(headers: IncomingHttpHeaders): string {
  const header = headers["x-request-id"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].trim().length > 0) {
    return header[0];
  }
  return createId("req");
}

export function authHeaderFromHeaders(headers: IncomingHttpHeaders): string | undefined {
  return headers.authorization;
}

export type BearerParseResult =
  | { ok: true; token: string }
  | { ok: false; code: "missing_authorization" | "bearer_token_required"; message: string };

/** Scheme match is case-insensitive; the credential is everything after the first space. */
export function parseBearerToken(header: string | undefined): BearerParseResult {
  if (header === undefined || header.trim().length === 0) {
    return { ok: false, code: "missing_authorization", message: "Authorization header is required." };
  }
  const trimmed = header.trim();
  const separator = trimmed.indexOf(" ");
  const scheme = separator < 0 ? trimmed : trimmed.slice(0, separator);
  const token = separator < 0 ? "" : trimmed.slice(separator + 1).trim();
  if (scheme.toLowerCase() !== "bearer" || token.length === 0) {
    return { ok: false, code: "bearer_token_required", message: "Bearer token required." };
  }
  return { ok: true, token };
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string
  ) {
    super(message);
  }
}

export interface ErrorReply {
  status: (code: number) => { send: (body: unknown) => unknown };
  header: (name: string, value: string) => unknown;
}

export function errorBody(code: string, message: string, requestId?: string) {
  return {
    error: requestId ? { code, message, requestId } : { code, message }
  };
}

export function handleError(error: unknown, reply: ErrorReply, requestId?: string) {
  if (error instanceof ZodError) {
    return reply.status(400).send({
      error: {
        ...errorBody("validation_error", "Invalid request payload.", requestId).error,
        details: error.issues
      }
    });
  }

  if (error instanceof HttpError) {
    return reply.status(error.statusCode).send(errorBody(error.errorCode, error.message, requestId));
  }

  if (isGatewayError(error) && error.kind !== "configuration" && error.kind !== "upstream_fetch") {
    if (error.statusCode === 401) {
      reply.header("www-authenticate", "Bearer");
    }
    return reply.status(error.statusCode).send(errorBody(error.code, error.message, requestId));
  }

  // Framework errors (malformed JSON, body too large) carry a client status.
  const statusCode = clientErrorStatus(error);
  if (statusCode !== null && error instanceof Error) {
    return reply.status(statusCode).send(errorBody("request_error", error.message, requestId));
  }

  return reply.status(500).send(errorBody("internal_error", "Unexpected error.", requestId));
}

function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  const statusCode: unknown = Reflect.get(error, "statusCode");
  return typeof statusCode === "number" && statusCode >= 400 && statusCode <= 499 ? statusCode : null;
}
