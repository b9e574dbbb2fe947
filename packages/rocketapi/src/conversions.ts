import { InstagramUserId, MediaId, ThreadId, ThreadsUserId } from "@rocket-social/ids";
import { readPath } from "./pagination.js";
import { isJsonObject } from "./types.js";
import type {
  InstagramMediaData,
  InstagramUserProfile,
  JsonObject,
  JsonValue,
  ThreadsPostData,
  ThreadsUserProfile,
} from "./types.js";

function toString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function toBoolean(value: unknown): boolean | null {
  return typeof value === "boolean" ? value : null;
}

function toCount(value: unknown): number | null {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0 ? value : null;
}

function toBigInt(value: unknown): bigint | null {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) return null;
    return BigInt(value);
  }
  if (typeof value === "string") {
    // Composite media ids look like "3141592653589793238_42"; the numeric head is the media id.
    const head = value.split("_")[0]?.trim() ?? "";
    if (!/^\d+$/.test(head)) return null;
    return BigInt(head);
  }
  return null;
}

function toUnixDate(value: unknown): Date | null {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) return null;
  return new Date(value * 1000);
}

function firstOf(mapping: JsonObject, keyPaths: readonly string[]): JsonValue | undefined {
  for (const keyPath of keyPaths) {
    const value = readPath(mapping, keyPath);
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function firstObject(mapping: JsonObject, keyPaths: readonly string[]): JsonObject | null {
  for (const keyPath of keyPaths) {
    const value = readPath(mapping, keyPath);
    if (isJsonObject(value)) return value;
  }
  return null;
}

function firstArray(mapping: JsonObject, keyPaths: readonly string[]): JsonValue[] {
  for (const keyPath of keyPaths) {
    const value = readPath(mapping, keyPath);
    if (Array.isArray(value)) return value;
  }
  return [];
}

function idOf(mapping: JsonObject): bigint | null {
  // `pk` comes last: as a JSON number it may have lost digits in JSON.parse.
  for (const key of ["id", "pk_id", "pk"]) {
    const id = toBigInt(mapping[key]);
    if (id !== null) return id;
  }
  return null;
}

function captionText(mapping: JsonObject): string | null {
  const caption = mapping["caption"];
  if (isJsonObject(caption)) return toString(caption["text"]);
  return toString(caption) ?? toString(readPath(mapping, "edge_media_to_caption.edges.0.node.text"));
}

export function findInstagramUser(body: JsonObject): JsonObject | null {
  return firstObject(body, ["data.user", "user"]);
}

export function convertInstagramUser(user: JsonObject): InstagramUserProfile {
  const userId = idOf(user);
  return {
    userId: userId === null ? null : InstagramUserId(userId),
    username: toString(user["username"]),
    fullName: toString(user["full_name"]),
    biography: toString(user["biography"]),
    externalUrl: toString(user["external_url"]),
    profilePicUrl: toString(firstOf(user, ["profile_pic_url_hd", "profile_pic_url"])),
    isPrivate: toBoolean(user["is_private"]),
    isVerified: toBoolean(user["is_verified"]),
    isBusiness: toBoolean(firstOf(user, ["is_business_account", "is_business"])),
    followerCount: toCount(firstOf(user, ["edge_followed_by.count", "follower_count"])),
    followingCount: toCount(firstOf(user, ["edge_follow.count", "following_count"])),
    mediaCount: toCount(firstOf(user, ["edge_owner_to_timeline_media.count", "media_count"])),
    raw: user,
  };
}

export function convertInstagramMedia(item: JsonObject): InstagramMediaData {
  const mediaId = idOf(item);
  return {
    mediaId: mediaId === null ? null : MediaId(mediaId),
    shortcode: toString(firstOf(item, ["code", "shortcode"])),
    mediaType: toCount(item["media_type"]),
    caption: captionText(item),
    takenAt: toUnixDate(firstOf(item, ["taken_at", "taken_at_timestamp"])),
    likeCount: toCount(firstOf(item, ["like_count", "edge_liked_by.count"])),
    commentCount: toCount(firstOf(item, ["comment_count", "edge_media_to_comment.count"])),
    raw: item,
  };
}

export function findInstagramMediaItems(body: JsonObject): JsonObject[] {
  return firstArray(body, ["items", "data.items"]).filter(isJsonObject);
}

export function findThreadsUser(body: JsonObject): JsonObject | null {
  return firstObject(body, ["data.userData.user", "data.user", "user"]);
}

export function convertThreadsUser(user: JsonObject): ThreadsUserProfile {
  const userId = idOf(user);
  return {
    userId: userId === null ? null : ThreadsUserId(userId),
    username: toString(user["username"]),
    fullName: toString(user["full_name"]),
    biography: toString(user["biography"]),
    profilePicUrl: toString(firstOf(user, ["hd_profile_pic_versions.0.url", "profile_pic_url"])),
    isPrivate: toBoolean(user["text_post_app_is_private"] ?? user["is_private"]),
    isVerified: toBoolean(user["is_verified"]),
    followerCount: toCount(user["follower_count"]),
    raw: user,
  };
}

export function convertThreadsPost(post: JsonObject): ThreadsPostData {
  const threadId = idOf(post);
  const user = post["user"];
  return {
    threadId: threadId === null ? null : ThreadId(threadId),
    code: toString(post["code"]),
    text: captionText(post),
    authorUsername: isJsonObject(user) ? toString(user["username"]) : null,
    takenAt: toUnixDate(post["taken_at"]),
    likeCount: toCount(post["like_count"]),
    replyCount: toCount(readPath(post, "text_post_app_info.direct_reply_count")),
    raw: post,
  };
}

/** Flattens `threads[].thread_items[].post` into the posts it contains, in order. */
export function findThreadsPosts(body: JsonObject): JsonObject[] {
  const threads = firstArray(body, ["data.mediaData.threads", "data.threads", "threads", "items"]);
  const posts: JsonObject[] = [];
  for (const thread of threads) {
    if (!isJsonObject(thread)) continue;
    const items = thread["thread_items"];
    if (!Array.isArray(items)) {
      posts.push(thread);
      continue;
    }
    for (const item of items) {
      if (!isJsonObject(item)) continue;
      const post = item["post"];
      if (isJsonObject(post)) posts.push(post);
    }
  }
  return posts;
}
