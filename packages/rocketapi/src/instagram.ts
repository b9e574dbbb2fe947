import type {
  AudioId,
  CommentId,
  GuideId,
  HighlightId,
  InstagramUserId,
  LocationId,
  MediaId,
} from "@rocket-social/ids";
import { RocketApiClient, type RocketApiClientOptions } from "./client.js";
import {
  convertInstagramMedia,
  convertInstagramUser,
  findInstagramMediaItems,
  findInstagramUser,
} from "./conversions.js";
import { chooseCursor, chooseHasNext } from "./pagination.js";
import type {
  Exchange,
  InstagramMediaPage,
  InstagramUserProfile,
  JsonObject,
  RequestPayload,
} from "./types.js";

const DEFAULT_COUNT = 12;

export interface CountPageOptions {
  /** Items per page; the service caps it per endpoint (50 for media, 100 followers, 200 following). */
  count?: number | null;
  /** `next_max_id` from the previous page. */
  maxId?: string | null;
}

export interface NumberedPageOptions {
  /** `next_page` from the previous response; send together with `maxId`. */
  page?: number | null;
  maxId?: string | null;
}

export interface CommentsPageOptions {
  /** `false` returns comments in chronological order. */
  canSupportThreading?: boolean;
  /** `next_min_id` from the previous page. */
  minId?: string | null;
}

/**
 * Instagram endpoints of RocketAPI. Every method is a single POST and resolves to the
 * decoded response body; see https://docs.rocketapi.io/api/ for the body schemas.
 */
export class InstagramApi {
  private readonly api: RocketApiClient;

  constructor(options: RocketApiClientOptions) {
    this.api = new RocketApiClient(options);
  }

  lastExchange(): Exchange {
    return this.api.lastExchange();
  }

  get requestCount(): number {
    return this.api.requestCount;
  }

  /** Searches users, hashtags and places. */
  search(query: string): Promise<JsonObject> {
    return this.api.request("instagram/search", { query });
  }

  getUserInfo(username: string): Promise<JsonObject> {
    return this.api.request("instagram/user/get_info", { username });
  }

  getUserInfoById(userId: InstagramUserId): Promise<JsonObject> {
    return this.api.request("instagram/user/get_info_by_id", { id: userId });
  }

  getUserMedia(userId: InstagramUserId, options: CountPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/user/get_media", countPage(userId, options));
  }

  getUserClips(userId: InstagramUserId, options: CountPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/user/get_clips", countPage(userId, options));
  }

  getUserGuides(userId: InstagramUserId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("instagram/user/get_guides", { id: userId, max_id: maxId });
  }

  getUserTags(userId: InstagramUserId, options: CountPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/user/get_tags", countPage(userId, options));
  }

  getUserFollowing(userId: InstagramUserId, options: CountPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/user/get_following", countPage(userId, options));
  }

  searchUserFollowing(userId: InstagramUserId, query: string): Promise<JsonObject> {
    return this.api.request("instagram/user/get_following", { id: userId, query });
  }

  getUserFollowers(userId: InstagramUserId, options: CountPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/user/get_followers", countPage(userId, options));
  }

  searchUserFollowers(userId: InstagramUserId, query: string): Promise<JsonObject> {
    return this.api.request("instagram/user/get_followers", { id: userId, query });
  }

  /** Stories of up to 4 users per call. */
  getUserStoriesBulk(userIds: readonly InstagramUserId[]): Promise<JsonObject> {
    return this.api.request("instagram/user/get_stories", { ids: userIds });
  }

  getUserStories(userId: InstagramUserId): Promise<JsonObject> {
    return this.getUserStoriesBulk([userId]);
  }

  getUserHighlights(userId: InstagramUserId): Promise<JsonObject> {
    return this.api.request("instagram/user/get_highlights", { id: userId });
  }

  getUserLive(userId: InstagramUserId): Promise<JsonObject> {
    return this.api.request("instagram/user/get_live", { id: userId });
  }

  getUserSimilarAccounts(userId: InstagramUserId): Promise<JsonObject> {
    return this.api.request("instagram/user/get_similar_accounts", { id: userId });
  }

  /** «About this account» details. Only enabled for Enterprise+ plans. */
  getUserAbout(userId: InstagramUserId): Promise<JsonObject> {
    return this.api.request("instagram/user/get_about", { id: userId });
  }

  getMediaInfo(mediaId: MediaId): Promise<JsonObject> {
    return this.api.request("instagram/media/get_info", { id: mediaId });
  }

  getMediaInfoByShortcode(shortcode: string): Promise<JsonObject> {
    return this.api.request("instagram/media/get_info_by_shortcode", { shortcode });
  }

  getMediaLikes(shortcode: string, options: CountPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/media/get_likes", {
      shortcode,
      count: options.count ?? DEFAULT_COUNT,
      max_id: options.maxId,
    });
  }

  getMediaComments(mediaId: MediaId, options: CommentsPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/media/get_comments", {
      media_id: mediaId,
      can_support_threading: options.canSupportThreading ?? true,
      min_id: options.minId,
    });
  }

  getMediaShortcodeById(mediaId: MediaId): Promise<JsonObject> {
    return this.api.request("instagram/media/get_shortcode_by_id", { id: mediaId });
  }

  getMediaIdByShortcode(shortcode: string): Promise<JsonObject> {
    return this.api.request("instagram/media/get_id_by_shortcode", { shortcode });
  }

  getGuideInfo(guideId: GuideId): Promise<JsonObject> {
    return this.api.request("instagram/guide/get_info", { id: guideId });
  }

  getLocationInfo(locationId: LocationId): Promise<JsonObject> {
    return this.api.request("instagram/location/get_info", { id: locationId });
  }

  getLocationMedia(locationId: LocationId, options: NumberedPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/location/get_media", {
      id: locationId,
      page: options.page,
      max_id: options.maxId,
    });
  }

  getHashtagInfo(name: string): Promise<JsonObject> {
    return this.api.request("instagram/hashtag/get_info", { name });
  }

  getHashtagMedia(name: string, options: NumberedPageOptions = {}): Promise<JsonObject> {
    return this.api.request("instagram/hashtag/get_media", {
      name,
      page: options.page,
      max_id: options.maxId,
    });
  }

  getHighlightStoriesBulk(highlightIds: readonly HighlightId[]): Promise<JsonObject> {
    return this.api.request("instagram/highlight/get_stories", { ids: highlightIds });
  }

  getHighlightStories(highlightId: HighlightId): Promise<JsonObject> {
    return this.getHighlightStoriesBulk([highlightId]);
  }

  getCommentLikes(commentId: CommentId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("instagram/comment/get_likes", { id: commentId, max_id: maxId });
  }

  /** Paginate with `next_max_child_cursor` from the previous page. */
  getCommentReplies(
    commentId: CommentId,
    mediaId: MediaId,
    maxId?: string | null,
  ): Promise<JsonObject> {
    return this.api.request("instagram/comment/get_replies", {
      id: commentId,
      media_id: mediaId,
      max_id: maxId,
    });
  }

  getAudioMedia(audioId: AudioId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("instagram/audio/get_media", { id: audioId, max_id: maxId });
  }

  async fetchUserProfile(username: string): Promise<InstagramUserProfile> {
    const body = await this.getUserInfo(username);
    const user = findInstagramUser(body);
    if (!user) {
      throw this.api.unexpectedBody("Instagram user info response missing user", body);
    }
    return convertInstagramUser(user);
  }

  async fetchUserMediaPage(
    userId: InstagramUserId,
    options: CountPageOptions = {},
  ): Promise<InstagramMediaPage> {
    const raw = await this.getUserMedia(userId, options);
    const nextMaxId = chooseCursor([raw], ["next_max_id"]);
    return {
      items: findInstagramMediaItems(raw).map(convertInstagramMedia),
      nextMaxId,
      hasNextPage: chooseHasNext([raw], nextMaxId),
      rawResponse: raw,
    };
  }
}

function countPage(userId: InstagramUserId, options: CountPageOptions): RequestPayload {
  return { id: userId, count: options.count ?? DEFAULT_COUNT, max_id: options.maxId };
}
