import { Args, Command, Flags } from "@oclif/core";
import { loadCliEnv } from "@rocket-social/config";
import { RocketApiClient } from "@rocket-social/rocketapi";
import { clientOptionsFromEnv, createLoggerFromEnv } from "../lib/context.js";
import { formatJson } from "../lib/output.js";
import { parseFields } from "../lib/parsers.js";

export default class Call extends Command {
  static override description = "Call any RocketAPI method and print the response body.";

  static override examples = [
    "<%= config.bin %> call instagram/media/get_info --field id=3141592653589793238",
    "<%= config.bin %> call instagram/user/get_stories --field ids=25025320,173560420",
  ];

  static override args = {
    method: Args.string({
      description: "Method path, e.g. instagram/user/get_info.",
      required: true,
    }),
  };

  static override flags = {
    field: Flags.string({
      char: "f",
      description: "Body field as key=value (repeatable).",
      multiple: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Call);
    const payload = parseFields(flags.field ?? [], "field");

    const env = loadCliEnv();
    const logger = createLoggerFromEnv(env);
    const client = new RocketApiClient(clientOptionsFromEnv(env, logger));

    const body = await client.request(args.method, payload);
    this.log(formatJson(body));
  }
}
