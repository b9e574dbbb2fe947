export { loadBaseEnv, loadCliEnv } from "./env.js";
export type { BaseEnv, CliEnv, DeployEnv, LogLevel, NodeEnv, RocketApiConfig } from "./env.js";
