import type { RequestPayload, RequestPrimitive, RequestValue } from "@rocket-social/rocketapi";

const INTEGER_PATTERN = /^-?\d+$/;

// Cursors go back to the service exactly as it sent them.
function isCursorKey(key: string): boolean {
  return key === "max_id" || key === "min_id" || key.endsWith("_token");
}

function parseScalar(value: string): RequestPrimitive {
  if (INTEGER_PATTERN.test(value)) return BigInt(value);
  if (value === "true") return true;
  if (value === "false") return false;
  return value;
}

function parseFieldValue(value: string): RequestValue {
  const parts = value.split(",").map((part) => part.trim());
  if (parts.length > 1 && parts.every((part) => INTEGER_PATTERN.test(part))) {
    return parts.map((part) => BigInt(part));
  }
  return parseScalar(value);
}

/**
 * Builds a request body from `key=value` pairs. Integers stay exact, `true`/`false`
 * become booleans and comma-separated integers become an id list; the rest are strings.
 * Cursor fields (`max_id`, `min_id`, `*_token`) are always strings.
 */
export function parseFields(values: readonly string[], label: string): RequestPayload {
  const payload: RequestPayload = {};
  values.forEach((entry, index) => {
    const separator = entry.indexOf("=");
    if (separator <= 0) {
      throw new Error(`${label}[${index}] must look like key=value`);
    }
    const key = entry.slice(0, separator).trim();
    if (key.length === 0) {
      throw new Error(`${label}[${index}] must look like key=value`);
    }
    const raw = entry.slice(separator + 1);
    payload[key] = isCursorKey(key) ? raw : parseFieldValue(raw);
  });
  return payload;
}
