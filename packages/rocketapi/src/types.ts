import type {
  InstagramUserId,
  MediaId,
  ThreadId,
  ThreadsUserId,
} from "@rocket-social/ids";

export type JsonPrimitive = boolean | null | number | string;
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonArray = JsonValue[];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type RequestPrimitive = boolean | number | string | bigint;
export type RequestValue = RequestPrimitive | readonly RequestPrimitive[];

/** Body of a RocketAPI call. `undefined` and `null` entries are left out of the JSON. */
export type RequestPayload = Record<string, RequestValue | null | undefined>;

export interface RequestSnapshot extends JsonObject {
  method: string;
  url: string;
  body: string;
  headers: Record<string, string>;
}

export interface ResponseSnapshot extends JsonObject {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface Exchange {
  request: RequestSnapshot | null;
  response: ResponseSnapshot | null;
}

export interface InstagramUserProfile {
  userId: InstagramUserId | null;
  username: string | null;
  fullName: string | null;
  biography: string | null;
  externalUrl: string | null;
  profilePicUrl: string | null;
  isPrivate: boolean | null;
  isVerified: boolean | null;
  isBusiness: boolean | null;
  followerCount: number | null;
  followingCount: number | null;
  mediaCount: number | null;
  raw: JsonObject;
}

export interface InstagramMediaData {
  mediaId: MediaId | null;
  shortcode: string | null;
  mediaType: number | null;
  caption: string | null;
  takenAt: Date | null;
  likeCount: number | null;
  commentCount: number | null;
  raw: JsonObject;
}

export interface InstagramMediaPage {
  items: InstagramMediaData[];
  nextMaxId: string | null;
  hasNextPage: boolean;
  rawResponse: JsonObject;
}

export interface ThreadsUserProfile {
  userId: ThreadsUserId | null;
  username: string | null;
  fullName: string | null;
  biography: string | null;
  profilePicUrl: string | null;
  isPrivate: boolean | null;
  isVerified: boolean | null;
  followerCount: number | null;
  raw: JsonObject;
}

export interface ThreadsPostData {
  threadId: ThreadId | null;
  code: string | null;
  text: string | null;
  authorUsername: string | null;
  takenAt: Date | null;
  likeCount: number | null;
  replyCount: number | null;
  raw: JsonObject;
}

export interface ThreadsFeedPage {
  posts: ThreadsPostData[];
  nextMaxId: string | null;
  hasNextPage: boolean;
  rawResponse: JsonObject;
}
