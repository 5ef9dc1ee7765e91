import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import yaml from "js-yaml";
import { ConfigurationError, errorMessage } from "../core/errors";
import { AppConfig, appConfigSchema } from "./types";

export const DEFAULT_CONFIG_PATH = "config.yaml";
export const DEFAULT_ENV_PATH = ".env";

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, { configPath: absolutePath });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid YAML: ${errorMessage(error)}`, {
      configPath: absolutePath,
    });
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError("Config file must contain a mapping at the top level", {
      configPath: absolutePath,
    });
  }
  return parsed;
}

// Unparseable numbers become NaN and fail validation.
function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return Number(value.trim());
}

function toBool(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return undefined;
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function applyEnvOverrides(fileConfig: Record<string, unknown>, env: Env): Record<string, unknown> {
  const fileLlm = isRecord(fileConfig.llm) ? fileConfig.llm : {};

  return {
    ...fileConfig,
    ...definedOnly({
      storePath: env.STORE_PATH,
      outputPath: env.OUTPUT_PATH,
      outputFormat: env.OUTPUT_FORMAT?.trim().toLowerCase(),
      userAgent: env.USER_AGENT,
      requestTimeoutMs: toNumber(env.REQUEST_TIMEOUT_MS),
      ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS),
      politeDelayMs: toNumber(env.POLITE_DELAY_MS),
      articleConcurrency: toNumber(env.ARTICLE_CONCURRENCY),
    }),
    llm: {
      ...fileLlm,
      ...definedOnly({
        provider: env.LLM_PROVIDER?.trim().toLowerCase(),
        model: env.LLM_MODEL,
        maxRetries: toNumber(env.LLM_MAX_RETRIES),
      }),
    },
  };
}

/**
 * Loads the YAML config, layers environment overrides on top and validates
 * the result. Any problem is reported as a single ConfigurationError listing
 * every offending field, before anything touches the ledger.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: Env = process.env): AppConfig {
  const merged = applyEnvOverrides(readConfigFile(configPath), env);
  const parsed = appConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

/**
 * Copies variables from a `.env` file into `env`. Variables already set are
 * left alone. A missing file is not an error. Returns the names it set.
 */
export function loadEnvFile(env: Env = process.env, envPath: string = DEFAULT_ENV_PATH): string[] {
  const absolutePath = path.resolve(envPath);
  if (!fs.existsSync(absolutePath)) {
    return [];
  }

  let parsed: Record<string, string>;
  try {
    parsed = dotenv.parse(fs.readFileSync(absolutePath));
  } catch (error) {
    throw new ConfigurationError(`Cannot read env file ${absolutePath}: ${errorMessage(error)}`, {
      envPath: absolutePath,
    });
  }

  const applied: string[] = [];
  for (const [name, value] of Object.entries(parsed)) {
    if (env[name] === undefined) {
      env[name] = value;
      applied.push(name);
    }
  }
  return applied;
}
