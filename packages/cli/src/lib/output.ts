import { isRocketApiError } from "@rocket-social/rocketapi";

export function formatJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => (typeof item === "bigint" ? item.toString() : item),
    2,
  );
}

export function exitCodeFor(error: unknown): number {
  if (!isRocketApiError(error)) return 1;
  switch (error.kind) {
    case "not_found":
      return 3;
    case "bad_response":
      return 4;
    case "request_error":
      return 5;
  }
}
