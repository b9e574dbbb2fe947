import type { ThreadId, ThreadsUserId } from "@rocket-social/ids";
import { RocketApiClient, type RocketApiClientOptions } from "./client.js";
import {
  convertThreadsPost,
  convertThreadsUser,
  findThreadsPosts,
  findThreadsUser,
} from "./conversions.js";
import { chooseCursor, chooseHasNext } from "./pagination.js";
import type { Exchange, JsonObject, ThreadsFeedPage, ThreadsUserProfile } from "./types.js";

export interface SearchUsersOptions {
  rankToken?: string | null;
  pageToken?: string | null;
}

/**
 * Threads endpoints of RocketAPI. Paginated methods take the `next_max_id` of the
 * previous page; thread replies use `paging_tokens.downwards` instead.
 */
export class ThreadsApi {
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

  searchUsers(query: string, options: SearchUsersOptions = {}): Promise<JsonObject> {
    return this.api.request("threads/search_users", {
      query,
      rank_token: options.rankToken,
      page_token: options.pageToken,
    });
  }

  getUserInfo(userId: ThreadsUserId): Promise<JsonObject> {
    return this.api.request("threads/user/get_info", { id: userId });
  }

  getUserFeed(userId: ThreadsUserId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("threads/user/get_feed", { id: userId, max_id: maxId });
  }

  getUserReplies(userId: ThreadsUserId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("threads/user/get_replies", { id: userId, max_id: maxId });
  }

  getUserFollowers(userId: ThreadsUserId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("threads/user/get_followers", { id: userId, max_id: maxId });
  }

  searchUserFollowers(userId: ThreadsUserId, query: string): Promise<JsonObject> {
    return this.api.request("threads/user/get_followers", { id: userId, query });
  }

  getUserFollowing(userId: ThreadsUserId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("threads/user/get_following", { id: userId, max_id: maxId });
  }

  searchUserFollowing(userId: ThreadsUserId, query: string): Promise<JsonObject> {
    return this.api.request("threads/user/get_following", { id: userId, query });
  }

  getThreadReplies(threadId: ThreadId, maxId?: string | null): Promise<JsonObject> {
    return this.api.request("threads/thread/get_replies", { id: threadId, max_id: maxId });
  }

  getThreadLikes(threadId: ThreadId): Promise<JsonObject> {
    return this.api.request("threads/thread/get_likes", { id: threadId });
  }

  async fetchUserProfile(userId: ThreadsUserId): Promise<ThreadsUserProfile> {
    const body = await this.getUserInfo(userId);
    const user = findThreadsUser(body);
    if (!user) {
      throw this.api.unexpectedBody("Threads user info response missing user", body);
    }
    return convertThreadsUser(user);
  }

  async fetchUserFeedPage(userId: ThreadsUserId, maxId?: string | null): Promise<ThreadsFeedPage> {
    const raw = await this.getUserFeed(userId, maxId);
    const nextMaxId = chooseCursor([raw], ["next_max_id", "data.mediaData.next_max_id"]);
    return {
      posts: findThreadsPosts(raw).map(convertThreadsPost),
      nextMaxId,
      hasNextPage: chooseHasNext([raw], nextMaxId),
      rawResponse: raw,
    };
  }
}
