import { Command, Flags } from "@oclif/core";
import { loadCliEnv } from "@rocket-social/config";
import { parseInstagramUserId } from "@rocket-social/ids";
import type { CountPageOptions } from "@rocket-social/rocketapi";
import { createInstagramApi, createLoggerFromEnv } from "../../lib/context.js";
import { formatJson } from "../../lib/output.js";

export default class InstagramUserMedia extends Command {
  static override description = "Fetch one page of an Instagram user's media.";

  static override flags = {
    "user-id": Flags.string({
      description: "Instagram user id.",
      required: true,
    }),
    count: Flags.integer({
      description: "Items per page (max 50).",
      min: 1,
      max: 50,
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
    const { flags } = await this.parse(InstagramUserMedia);
    const userId = parseInstagramUserId(flags["user-id"], "user-id");
    const options: CountPageOptions = {
      count: flags.count ?? null,
      maxId: flags["max-id"] ?? null,
    };

    const env = loadCliEnv();
    const api = createInstagramApi(env, createLoggerFromEnv(env));

    const result = flags.page
      ? await api.fetchUserMediaPage(userId, options)
      : await api.getUserMedia(userId, options);
    this.log(formatJson(result));
  }
}
