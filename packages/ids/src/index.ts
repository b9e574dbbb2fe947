declare const brandSymbol: unique symbol;

export type Brand<T, B extends string> = T & { readonly [brandSymbol]: B };

function asBrand<T, B extends string>(value: T): Brand<T, B> {
  return value as Brand<T, B>;
}

export function parseBigIntId(value: string, label: string): bigint {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`${label} must be a non-empty bigint`);
  }
  try {
    return BigInt(trimmed);
  } catch {
    throw new Error(`Invalid ${label}: ${value}`);
  }
}

/** Like `parseBigIntId`, but zero and negative values are rejected. */
export function parsePositiveBigIntId(value: string, label: string): bigint {
  const parsed = parseBigIntId(value, label);
  if (parsed <= 0n) {
    throw new Error(`${label} must be positive`);
  }
  return parsed;
}

export type InstagramUserId = Brand<bigint, "InstagramUserId">;
export function InstagramUserId(value: bigint): InstagramUserId {
  return asBrand(value);
}
export function parseInstagramUserId(value: string, label = "InstagramUserId"): InstagramUserId {
  return InstagramUserId(parsePositiveBigIntId(value, label));
}

export type MediaId = Brand<bigint, "MediaId">;
export function MediaId(value: bigint): MediaId {
  return asBrand(value);
}
export function parseMediaId(value: string, label = "MediaId"): MediaId {
  return MediaId(parsePositiveBigIntId(value, label));
}

export type CommentId = Brand<bigint, "CommentId">;
export function CommentId(value: bigint): CommentId {
  return asBrand(value);
}

export type GuideId = Brand<bigint, "GuideId">;
export function GuideId(value: bigint): GuideId {
  return asBrand(value);
}

export type LocationId = Brand<bigint, "LocationId">;
export function LocationId(value: bigint): LocationId {
  return asBrand(value);
}

export type HighlightId = Brand<bigint, "HighlightId">;
export function HighlightId(value: bigint): HighlightId {
  return asBrand(value);
}

export type AudioId = Brand<bigint, "AudioId">;
export function AudioId(value: bigint): AudioId {
  return asBrand(value);
}

export type ThreadsUserId = Brand<bigint, "ThreadsUserId">;
export function ThreadsUserId(value: bigint): ThreadsUserId {
  return asBrand(value);
}
export function parseThreadsUserId(value: string, label = "ThreadsUserId"): ThreadsUserId {
  return ThreadsUserId(parsePositiveBigIntId(value, label));
}

export type ThreadId = Brand<bigint, "ThreadId">;
export function ThreadId(value: bigint): ThreadId {
  return asBrand(value);
}
export function parseThreadId(value: string, label = "ThreadId"): ThreadId {
  return ThreadId(parsePositiveBigIntId(value, label));
}
