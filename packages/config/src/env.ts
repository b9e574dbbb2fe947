import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const nodeEnvSchema = z.enum(["development", "test", "production"]).default("development");
const deployEnvSchema = z.enum(["development", "staging", "production"]);
const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type NodeEnv = z.infer<typeof nodeEnvSchema>;
export type DeployEnv = z.infer<typeof deployEnvSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;

const rocketApiConfigInputSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

const rocketApiConfigSchema = z
  .object({
    baseUrl: z.string().url().default("https://v1.rocketapi.io/"),
    timeoutMs: z.number().int().positive().default(30_000),
  })
  .strict()
  .default({});

const yamlConfigInputSchema = z
  .object({
    logLevel: logLevelSchema.optional(),
    rocketapi: rocketApiConfigInputSchema,
  })
  .strict();

const yamlConfigSchema = z
  .object({
    logLevel: logLevelSchema.default("info"),
    rocketapi: rocketApiConfigSchema,
  })
  .strict();

type YamlConfig = z.infer<typeof yamlConfigSchema>;

export interface RocketApiConfig {
  token: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface BaseEnv {
  NODE_ENV: NodeEnv;
  DEPLOY_ENV: DeployEnv;
  LOG_LEVEL: LogLevel;
}

export interface CliEnv extends BaseEnv {
  rocketapi: RocketApiConfig;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveRepoRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

function readYamlObject(filePath: string): Record<string, unknown> {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new Error(`Failed to read config file: ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    throw new Error(`Failed to parse YAML: ${filePath}`, { cause: error });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Expected YAML config to be a mapping/object: ${filePath}`);
  }
  return parsed;
}

function deepMerge(
  baseValue: Record<string, unknown>,
  overrideValue: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...baseValue };
  for (const [key, override] of Object.entries(overrideValue)) {
    const base = merged[key];
    if (isPlainObject(base) && isPlainObject(override)) {
      merged[key] = deepMerge(base, override);
      continue;
    }
    merged[key] = override;
  }
  return merged;
}

function loadYamlConfig(params: { deployEnv: DeployEnv; nodeEnv: NodeEnv }): YamlConfig {
  const repoRoot = resolveRepoRoot();
  const basePath = path.join(repoRoot, "config", "base.yaml");
  const envPath = path.join(repoRoot, "config", "env", `${params.deployEnv}.yaml`);

  const baseRaw = yamlConfigInputSchema.parse(readYamlObject(basePath));
  const envRaw =
    params.nodeEnv === "test" ? {} : yamlConfigInputSchema.parse(readYamlObject(envPath));
  return yamlConfigSchema.parse(deepMerge(baseRaw, envRaw));
}

function resolveDeployEnv(params: {
  nodeEnv: NodeEnv;
  deployEnv: DeployEnv | undefined;
}): DeployEnv {
  if (params.deployEnv) return params.deployEnv;
  return params.nodeEnv === "production" ? "production" : "development";
}

const baseEnvSchema = z.object({
  NODE_ENV: nodeEnvSchema,
  DEPLOY_ENV: deployEnvSchema.optional(),
});

const baseOverridesEnvSchema = z.object({ LOG_LEVEL: logLevelSchema.optional() });

const rocketApiOverridesEnvSchema = z
  .object({
    ROCKETAPI_BASE_URL: z.string().url().optional(),
    ROCKETAPI_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  })
  .strip();

const rocketApiSecretsEnvSchema = z.object({
  ROCKETAPI_TOKEN: z.string().min(1),
});

function loadBaseParts(env: NodeJS.ProcessEnv): { base: BaseEnv; yaml: YamlConfig } {
  const parsed = baseEnvSchema.parse(env);
  const deployEnv = resolveDeployEnv({ nodeEnv: parsed.NODE_ENV, deployEnv: parsed.DEPLOY_ENV });
  const yaml = loadYamlConfig({ deployEnv, nodeEnv: parsed.NODE_ENV });
  const overrides = baseOverridesEnvSchema.parse(env);
  return {
    base: {
      NODE_ENV: parsed.NODE_ENV,
      DEPLOY_ENV: deployEnv,
      LOG_LEVEL: overrides.LOG_LEVEL ?? yaml.logLevel,
    },
    yaml,
  };
}

function resolveRocketApiConfig(
  yaml: YamlConfig,
  env: NodeJS.ProcessEnv,
  token: string,
): RocketApiConfig {
  const overrides = rocketApiOverridesEnvSchema.parse(env);
  return {
    token,
    baseUrl: overrides.ROCKETAPI_BASE_URL ?? yaml.rocketapi.baseUrl,
    timeoutMs: overrides.ROCKETAPI_TIMEOUT_MS ?? yaml.rocketapi.timeoutMs,
  };
}

export function loadBaseEnv(env: NodeJS.ProcessEnv = process.env): BaseEnv {
  return loadBaseParts(env).base;
}

export function loadCliEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  const { base, yaml } = loadBaseParts(env);
  const secrets = rocketApiSecretsEnvSchema.parse(env);

  return {
    ...base,
    rocketapi: resolveRocketApiConfig(yaml, env, secrets.ROCKETAPI_TOKEN),
  };
}
