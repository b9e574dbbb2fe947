export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, RocketApiClient } from "./client.js";
export type { RocketApiClientOptions } from "./client.js";
export {
  convertInstagramMedia,
  convertInstagramUser,
  convertThreadsPost,
  convertThreadsUser,
  findInstagramMediaItems,
  findInstagramUser,
  findThreadsPosts,
  findThreadsUser,
} from "./conversions.js";
export { encodeRequestPayload } from "./encoding.js";
export {
  RocketApiBadResponseError,
  RocketApiError,
  RocketApiNotFoundError,
  RocketApiRequestError,
  isRocketApiError,
} from "./errors.js";
export type { RocketApiErrorKind, RocketApiFailure } from "./errors.js";
export { InstagramApi } from "./instagram.js";
export type { CommentsPageOptions, CountPageOptions, NumberedPageOptions } from "./instagram.js";
export { chooseCursor, chooseHasNext } from "./pagination.js";
export { ThreadsApi } from "./threads.js";
export type { SearchUsersOptions } from "./threads.js";
export { isJsonObject } from "./types.js";
export type {
  Exchange,
  InstagramMediaData,
  InstagramMediaPage,
  InstagramUserProfile,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  RequestPayload,
  RequestPrimitive,
  RequestSnapshot,
  RequestValue,
  ResponseSnapshot,
  ThreadsFeedPage,
  ThreadsPostData,
  ThreadsUserProfile,
} from "./types.js";
