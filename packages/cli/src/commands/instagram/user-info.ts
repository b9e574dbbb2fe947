import { Command, Flags } from "@oclif/core";
import { loadCliEnv } from "@rocket-social/config";
import { parseInstagramUserId } from "@rocket-social/ids";
import { createInstagramApi, createLoggerFromEnv } from "../../lib/context.js";
import { formatJson } from "../../lib/output.js";

export default class InstagramUserInfo extends Command {
  static override description = "Fetch an Instagram user by username or id.";

  static override flags = {
    username: Flags.string({
      description: "Instagram username.",
      exactlyOne: ["username", "user-id"],
    }),
    "user-id": Flags.string({
      description: "Instagram user id.",
      exactlyOne: ["username", "user-id"],
    }),
    profile: Flags.boolean({
      description: "Print the condensed profile instead of the raw body (username lookups only).",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(InstagramUserInfo);

    const env = loadCliEnv();
    const api = createInstagramApi(env, createLoggerFromEnv(env));

    if (flags.username !== undefined) {
      const result = flags.profile
        ? await api.fetchUserProfile(flags.username)
        : await api.getUserInfo(flags.username);
      this.log(formatJson(result));
      return;
    }

    if (flags.profile) {
      this.error("--profile needs --username", { exit: 2 });
    }
    const userId = parseInstagramUserId(flags["user-id"] ?? "", "user-id");
    this.log(formatJson(await api.getUserInfoById(userId)));
  }
}
