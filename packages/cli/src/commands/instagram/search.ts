import { Command, Flags } from "@oclif/core";
import { loadCliEnv } from "@rocket-social/config";
import { createInstagramApi, createLoggerFromEnv } from "../../lib/context.js";
import { formatJson } from "../../lib/output.js";

export default class InstagramSearch extends Command {
  static override description = "Search Instagram users, hashtags and places.";

  static override flags = {
    query: Flags.string({
      description: "Search query.",
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(InstagramSearch);

    const env = loadCliEnv();
    const api = createInstagramApi(env, createLoggerFromEnv(env));

    this.log(formatJson(await api.search(flags.query)));
  }
}
