import { isJsonObject } from "./types.js";
import type { JsonValue } from "./types.js";

/**
 * RocketAPI wraps every upstream answer:
 * `{ "status": "done", "response": { "status_code": 200, "content_type": "application/json", "body": {...} } }`.
 */
export type EnvelopeOutcome =
  | { kind: "ok"; body: JsonValue }
  | { kind: "not_found"; statusCode: number }
  | { kind: "bad_response"; reason: string; statusCode: number | null };

export function unwrapEnvelope(envelope: JsonValue): EnvelopeOutcome {
  if (!isJsonObject(envelope)) {
    return { kind: "bad_response", reason: "envelope is not an object", statusCode: null };
  }

  const status = envelope["status"];
  if (status !== "done") {
    const label = typeof status === "string" ? status : "missing";
    return { kind: "bad_response", reason: `task status is ${label}`, statusCode: null };
  }

  const response = envelope["response"];
  if (!isJsonObject(response)) {
    return { kind: "bad_response", reason: "envelope has no response", statusCode: null };
  }

  const rawStatusCode = response["status_code"];
  const statusCode = typeof rawStatusCode === "number" ? rawStatusCode : 0;
  const rawContentType = response["content_type"];
  const contentType = typeof rawContentType === "string" ? rawContentType : "";

  if (statusCode === 200 && contentType === "application/json") {
    return { kind: "ok", body: response["body"] ?? null };
  }
  if (statusCode === 404) {
    return { kind: "not_found", statusCode };
  }
  return {
    kind: "bad_response",
    reason: `upstream returned ${statusCode} ${contentType || "without content type"}`,
    statusCode,
  };
}
