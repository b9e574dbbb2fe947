import type { JsonValue, RequestSnapshot, ResponseSnapshot } from "./types.js";

export type RocketApiErrorKind = "bad_response" | "not_found" | "request_error";

interface RocketApiErrorParams {
  status?: number;
  payload?: JsonValue;
  request?: RequestSnapshot;
  response?: ResponseSnapshot;
}

export abstract class RocketApiError extends Error {
  abstract readonly kind: RocketApiErrorKind;
  readonly status?: number;
  /** Decoded response JSON, when the response got that far. */
  readonly payload?: JsonValue;
  readonly request?: RequestSnapshot;
  readonly response?: ResponseSnapshot;

  constructor(message: string, params: RocketApiErrorParams = {}) {
    super(message);
    this.name = this.constructor.name;
    if (params.status !== undefined) {
      this.status = params.status;
    }
    if (params.payload !== undefined) {
      this.payload = params.payload;
    }
    if (params.request !== undefined) {
      this.request = params.request;
    }
    if (params.response !== undefined) {
      this.response = params.response;
    }
  }
}

export class RocketApiBadResponseError extends RocketApiError {
  override readonly kind = "bad_response";
}

export class RocketApiNotFoundError extends RocketApiError {
  override readonly kind = "not_found";
}

export class RocketApiRequestError extends RocketApiError {
  override readonly kind = "request_error";
  readonly original: unknown;

  constructor(
    message: string,
    original: unknown,
    params: { request?: RequestSnapshot; response?: ResponseSnapshot } = {},
  ) {
    super(message, params);
    this.original = original;
  }
}

export type RocketApiFailure =
  | RocketApiBadResponseError
  | RocketApiNotFoundError
  | RocketApiRequestError;

export function isRocketApiError(value: unknown): value is RocketApiFailure {
  return (
    value instanceof RocketApiBadResponseError ||
    value instanceof RocketApiNotFoundError ||
    value instanceof RocketApiRequestError
  );
}
