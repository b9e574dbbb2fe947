import type { Logger } from "@rocket-social/observability";
import { encodeRequestPayload } from "./encoding.js";
import { unwrapEnvelope } from "./envelope.js";
import {
  RocketApiBadResponseError,
  RocketApiNotFoundError,
  RocketApiRequestError,
} from "./errors.js";
import type { RocketApiFailure } from "./errors.js";
import { isJsonObject } from "./types.js";
import type {
  Exchange,
  JsonObject,
  JsonValue,
  RequestPayload,
  RequestSnapshot,
  ResponseSnapshot,
} from "./types.js";

export const DEFAULT_BASE_URL = "https://v1.rocketapi.io/";
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface RocketApiClientOptions {
  /** API key from the RocketAPI dashboard. */
  token: string;
  /** Per-request timeout. The service advises against values below 15 seconds. */
  timeoutMs?: number;
  baseUrl?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

export class RocketApiClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger | null;
  private lastRequest: RequestSnapshot | null = null;
  private lastResponse: ResponseSnapshot | null = null;
  private responses = 0;

  constructor(options: RocketApiClientOptions) {
    if (options.token.trim().length === 0) {
      throw new Error("RocketAPI token must not be empty");
    }
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new Error(`RocketAPI timeout must be a positive number of milliseconds: ${timeoutMs}`);
    }
    const baseUrl = withTrailingSlash(options.baseUrl ?? DEFAULT_BASE_URL);
    try {
      new URL(baseUrl);
    } catch (error) {
      throw new Error(`RocketAPI base URL is invalid: ${baseUrl}`, { cause: error });
    }
    this.token = options.token;
    this.baseUrl = baseUrl;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? null;
  }

  lastExchange(): Exchange {
    return { request: this.lastRequest, response: this.lastResponse };
  }

  /** Number of responses received since construction, failed ones included. */
  get requestCount(): number {
    return this.responses;
  }

  async request(method: string, payload: RequestPayload): Promise<JsonObject> {
    // A leading slash would resolve against the host and drop the base path.
    const url = new URL(method.replace(/^\/+/, ""), this.baseUrl);
    const body = encodeRequestPayload(payload);
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      Authorization: `Token ${this.token}`,
    };

    const requestSnapshot: RequestSnapshot = {
      method: "POST",
      url: url.toString(),
      body,
      headers: maskHeaders(headers),
    };

    this.lastRequest = requestSnapshot;
    this.lastResponse = null;
    const startedAt = Date.now();

    let response: Response;
    let bodyText: string;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      bodyText = await response.text();
    } catch (error) {
      throw this.failed(
        method,
        new RocketApiRequestError(`RocketAPI request to ${method} failed`, error, {
          request: requestSnapshot,
        }),
        error,
      );
    }

    this.responses += 1;
    const responseSnapshot: ResponseSnapshot = {
      statusCode: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      body: bodyText,
    };
    this.lastResponse = responseSnapshot;

    this.logger?.debug(
      { method, status: response.status, durationMs: Date.now() - startedAt },
      "rocketapi request completed",
    );

    const context = { status: response.status, request: requestSnapshot, response: responseSnapshot };

    if (response.status === 404) {
      throw this.failed(
        method,
        new RocketApiNotFoundError(`RocketAPI returned 404 for ${method}`, context),
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw this.failed(
        method,
        new RocketApiBadResponseError(`RocketAPI returned ${response.status} for ${method}`, context),
      );
    }

    let envelope: JsonValue;
    try {
      envelope = JSON.parse(bodyText) as JsonValue;
    } catch {
      throw this.failed(
        method,
        new RocketApiBadResponseError(`RocketAPI returned invalid JSON for ${method}`, context),
      );
    }

    const outcome = unwrapEnvelope(envelope);
    if (outcome.kind === "not_found") {
      throw this.failed(
        method,
        new RocketApiNotFoundError(`Resource not found at ${method}`, {
          ...context,
          payload: envelope,
        }),
      );
    }
    if (outcome.kind === "bad_response") {
      throw this.failed(
        method,
        new RocketApiBadResponseError(`Unexpected response from ${method}: ${outcome.reason}`, {
          ...context,
          payload: envelope,
        }),
      );
    }

    if (!isJsonObject(outcome.body)) {
      throw this.failed(
        method,
        new RocketApiBadResponseError(`RocketAPI returned a non-object body for ${method}`, {
          ...context,
          payload: envelope,
        }),
      );
    }
    return outcome.body;
  }

  private failed<E extends RocketApiFailure>(method: string, error: E, cause?: unknown): E {
    const fields = { method, kind: error.kind, status: error.status ?? null };
    this.logger?.debug(
      cause === undefined ? fields : { ...fields, err: cause },
      "rocketapi request failed",
    );
    return error;
  }

  /** Error for a body that decoded fine but lacks what a typed helper needs. */
  unexpectedBody(message: string, body: JsonObject): RocketApiBadResponseError {
    const response = this.lastResponse;
    const request = this.lastRequest;
    return new RocketApiBadResponseError(message, {
      payload: body,
      ...(response ? { status: response.statusCode, response } : {}),
      ...(request ? { request } : {}),
    });
  }
}

function withTrailingSlash(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}

function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === "authorization") {
      masked[key] = "<redacted>";
      continue;
    }
    masked[key] = value;
  }
  return masked;
}
