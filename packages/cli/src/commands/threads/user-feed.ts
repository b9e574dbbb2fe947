import { Command, Flags } from "@oclif/core";
import { loadCliEnv } from "@rocket-social/config";
import { parseThreadsUserId } from "@rocket-social/ids";
import { createLoggerFromEnv, createThreadsApi } from "../../lib/context.js";
import { formatJson } from "../../lib/output.js";

export default class ThreadsUserFeed extends Command {
  static override description = "Fetch one page of a Threads user's feed.";

  static override flags = {
    "user-id": Flags.string({
      description: "Threads user id.",
      required: true,
    }),
    "max-id": Flags.string({
      description: "next_max_id of the previous page.",
    }),
    page: Flags.boolean({
      description: "Print the condensed page instead of the raw body.",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ThreadsUserFeed);
    const userId = parseThreadsUserId(flags["user-id"], "user-id");
    const maxId = flags["max-id"] ?? null;

    const env = loadCliEnv();
    const api = createThreadsApi(env, createLoggerFromEnv(env));

    const result = flags.page
      ? await api.fetchUserFeedPage(userId, maxId)
      : await api.getUserFeed(userId, maxId);
    this.log(formatJson(result));
  }
}
