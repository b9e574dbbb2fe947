import type { CliEnv } from "@rocket-social/config";
import { createLogger } from "@rocket-social/observability";
import type { Logger } from "@rocket-social/observability";
import { InstagramApi, ThreadsApi } from "@rocket-social/rocketapi";
import type { RocketApiClientOptions } from "@rocket-social/rocketapi";

export function createLoggerFromEnv(env: { DEPLOY_ENV: string; LOG_LEVEL: string }): Logger {
  return createLogger({
    env: env.DEPLOY_ENV,
    level: env.LOG_LEVEL,
    service: "cli",
    destination: "stderr",
  });
}

export function clientOptionsFromEnv(env: CliEnv, logger: Logger): RocketApiClientOptions {
  return {
    token: env.rocketapi.token,
    baseUrl: env.rocketapi.baseUrl,
    timeoutMs: env.rocketapi.timeoutMs,
    logger,
  };
}

export function createInstagramApi(env: CliEnv, logger: Logger): InstagramApi {
  return new InstagramApi(clientOptionsFromEnv(env, logger));
}

export function createThreadsApi(env: CliEnv, logger: Logger): ThreadsApi {
  return new ThreadsApi(clientOptionsFromEnv(env, logger));
}
