import { Command, Flags } from "@oclif/core";
import { loadCliEnv } from "@rocket-social/config";
import { parseThreadsUserId } from "@rocket-social/ids";
import { createLoggerFromEnv, createThreadsApi } from "../../lib/context.js";
import { formatJson } from "../../lib/output.js";

export default class ThreadsUserInfo extends Command {
  static override description = "Fetch a Threads user by id.";

  static override flags = {
    "user-id": Flags.string({
      description: "Threads user id.",
      required: true,
    }),
    profile: Flags.boolean({
      description: "Print the condensed profile instead of the raw body.",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ThreadsUserInfo);
    const userId = parseThreadsUserId(flags["user-id"], "user-id");

    const env = loadCliEnv();
    const api = createThreadsApi(env, createLoggerFromEnv(env));

    const result = flags.profile
      ? await api.fetchUserProfile(userId)
      : await api.getUserInfo(userId);
    this.log(formatJson(result));
  }
}
