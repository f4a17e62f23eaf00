import { GatewayError } from "@ptb/futures-core";
import { BYBIT_RET_CODES } from "./bybit.constants.js";

export type BybitErrorDetails = {
  endpoint: string;
  method: string;
  status?: number;
  retCode?: number;
  responseBody?: unknown;
  cause?: unknown;
};

export class BybitApiError extends GatewayError {
  constructor(
    message: string,
    public readonly details: BybitErrorDetails,
    retryable = false
  ) {
    super(message, {
      operation: `${details.method} ${details.endpoint}`,
      retryable,
      cause: details.cause
    });
    this.name = "BybitApiError";
  }
}

export class BybitAuthError extends BybitApiError {
  constructor(message: string, details: BybitErrorDetails) {
    super(message, details, false);
    this.name = "BybitAuthError";
  }
}

export class BybitRateLimitError extends BybitApiError {
  constructor(message: string, details: BybitErrorDetails) {
    super(message, details, true);
    this.name = "BybitRateLimitError";
  }
}

export class BybitInvalidParamsError extends BybitApiError {
  constructor(message: string, details: BybitErrorDetails) {
    super(message, details, false);
    this.name = "BybitInvalidParamsError";
  }
}

export class BybitReduceOnlyError extends BybitApiError {
  constructor(message: string, details: BybitErrorDetails) {
    super(message, details, false);
    this.name = "BybitReduceOnlyError";
  }
}

function normalize(value: unknown): string {
  return String(value ?? "").trim().toLowerCase();
}

function isAuthCode(code?: number): boolean {
  return (
    code === 401 ||
    code === BYBIT_RET_CODES.invalidApiKey ||
    code === BYBIT_RET_CODES.signatureError ||
    code === BYBIT_RET_CODES.permissionDenied
  );
}

function isRateLimitCode(code?: number): boolean {
  return code === 429 || code === BYBIT_RET_CODES.tooManyVisits || code === BYBIT_RET_CODES.ipRateLimit;
}

function isTransientCode(code?: number): boolean {
  return (
    code === BYBIT_RET_CODES.serverError ||
    code === BYBIT_RET_CODES.timestampOutOfWindow ||
    (code !== undefined && code >= 500 && code < 600)
  );
}

export function toBybitError(params: BybitErrorDetails & { message?: string }): BybitApiError {
  const { message, ...details } = params;
  const normalizedMessage = normalize(message);
  const code = params.retCode ?? params.status;

  if (isAuthCode(code) || normalizedMessage.includes("api key") || normalizedMessage.includes("sign")) {
    return new BybitAuthError(message ?? "Bybit auth error", details);
  }

  if (isRateLimitCode(code) || normalizedMessage.includes("rate limit")) {
    return new BybitRateLimitError(message ?? "Bybit rate limit", details);
  }

  if (code === BYBIT_RET_CODES.reduceOnlyRejected) {
    return new BybitReduceOnlyError(message ?? "Bybit rejected reduce-only order", details);
  }

  if (code === BYBIT_RET_CODES.invalidParams || normalizedMessage.includes("param")) {
    return new BybitInvalidParamsError(message ?? "Bybit invalid params", details);
  }

  return new BybitApiError(message ?? "Bybit request failed", details, isTransientCode(code));
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof GatewayError && error.options.retryable === true;
}
