import { isJsonObject } from "./types.js";
import type { JsonObject, JsonValue } from "./types.js";

/**
 * Follows a dotted path such as `paging_tokens.downwards` through nested objects.
 * Numeric segments index into arrays.
 */
export function readPath(mapping: JsonObject, keyPath: string): JsonValue | undefined {
  let current: JsonValue | undefined = mapping;
  for (const segment of keyPath.split(".")) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
      continue;
    }
    if (!isJsonObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function chooseCursor(candidates: JsonObject[], keys: readonly string[]): string | null {
  for (const mapping of candidates) {
    for (const key of keys) {
      const value = readPath(mapping, key);
      if (typeof value === "string" && value.length > 0) return value;
      if (typeof value === "number" && Number.isFinite(value)) return String(value);
    }
  }

  return null;
}

export function chooseHasNext(
  candidates: JsonObject[],
  fallbackCursor?: string | null,
): boolean {
  for (const mapping of candidates) {
    for (const key of ["more_available", "has_next_page", "has_more"]) {
      const value = mapping[key];
      if (typeof value === "boolean") return value;
    }
  }

  return Boolean(fallbackCursor);
}
