import type { RequestPayload, RequestPrimitive, RequestValue } from "./types.js";

function encodePrimitive(value: RequestPrimitive): string {
  // JSON.stringify rejects bigint; ids are written as bare numbers.
  if (typeof value === "bigint") return value.toString();
  return JSON.stringify(value);
}

function encodeValue(value: RequestValue): string {
  if (typeof value === "object") {
    return `[${value.map(encodePrimitive).join(",")}]`;
  }
  return encodePrimitive(value);
}

export function encodeRequestPayload(payload: RequestPayload): string {
  const fields: string[] = [];
  for (const [key, value] of Object.entries(payload)) {
    if (value === undefined || value === null) continue;
    fields.push(`${JSON.stringify(key)}:${encodeValue(value)}`);
  }
  return `{${fields.join(",")}}`;
}
