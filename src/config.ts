import { readFileSync, existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import yaml from "yaml";
import dotenv from "dotenv";
import { z } from "zod";
import type { Config, LogLevel } from "./types/index.ts";

// Load environment variables
dotenv.config();

const DEFAULT_CONFIG_PATH = join(homedir(), ".quotescope", "config.yml");

const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export const DEFAULT_CONFIG: Config = {
  source: {
    baseUrl: "https://finance.yahoo.com",
    quotePath: "/quote/{symbol}/",
    chartUrl: "https://query1.finance.yahoo.com/v8/finance/chart/{symbol}",
    timeoutMs: 30_000,
    requestDelayMs: 1_000,
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  },
  retry: {
    maxRetries: 3,
    baseDelayMs: 2_000,
    backoffFactor: 2,
    maxDelayMs: 60_000,
  },
  circuitBreaker: {
    enabled: false,
    failureThreshold: 5,
    recoveryTimeoutMs: 60_000,
  },
  validation: {
    priceMin: 0.01,
    priceMax: 10_000,
    ratioMin: -1_000,
    ratioMax: 1_000,
  },
  ai: {
    apiKey: "",
    baseUrl: "https://api.openai.com/v1",
    model: "gpt-4",
    maxTokens: 2_000,
    temperature: 0.1,
  },
  logging: {
    level: "info",
  },
};

type ConfigOverrides = {
  [K in keyof Config]?: Partial<Config[K]>;
};

const FileConfigSchema = z
  .object({
    source: z.object({
      baseUrl: z.string().url(),
      quotePath: z.string(),
      chartUrl: z.string().url(),
      timeoutMs: z.number().positive(),
      requestDelayMs: z.number().nonnegative(),
      userAgent: z.string(),
    }),
    retry: z.object({
      maxRetries: z.number().int().nonnegative(),
      baseDelayMs: z.number().nonnegative(),
      backoffFactor: z.number().positive(),
      maxDelayMs: z.number().nonnegative(),
    }),
    circuitBreaker: z.object({
      enabled: z.boolean(),
      failureThreshold: z.number().int().positive(),
      recoveryTimeoutMs: z.number().nonnegative(),
    }),
    validation: z.object({
      priceMin: z.number(),
      priceMax: z.number(),
      ratioMin: z.number(),
      ratioMax: z.number(),
    }),
    ai: z.object({
      apiKey: z.string(),
      baseUrl: z.string().url(),
      model: z.string(),
      maxTokens: z.number().int().positive(),
      temperature: z.number(),
    }),
    logging: z.object({
      level: z.enum(["debug", "info", "warn", "error", "silent"]),
    }),
  })
  .deepPartial();

function envString(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

function envNumber(name: string): number | undefined {
  const raw = envString(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function envBoolean(name: string): boolean | undefined {
  const raw = envString(name);
  if (raw === undefined) return undefined;
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

function envLogLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw);
}

function readConfigFile(path: string): ConfigOverrides {
  if (!existsSync(path)) return {};

  try {
    const fileContent = readFileSync(path, "utf-8");
    const parsed = FileConfigSchema.safeParse(yaml.parse(fileContent) ?? {});
    if (!parsed.success) {
      console.warn(`Ignoring invalid config at ${path}: ${parsed.error.message}`);
      return {};
    }
    return parsed.data;
  } catch (error) {
    console.warn(`Failed to load config from ${path}:`, error);
    return {};
  }
}

export function loadConfig(
  configPath?: string,
  overrides?: ConfigOverrides
): Config {
  const path =
    configPath || envString("QUOTESCOPE_CONFIG") || DEFAULT_CONFIG_PATH;
  const file = readConfigFile(path);
  const defaults = DEFAULT_CONFIG;

  // Precedence: overrides > environment > config file > defaults
  const config: Config = {
    source: {
      baseUrl:
        overrides?.source?.baseUrl ??
        envString("QUOTE_BASE_URL") ??
        file.source?.baseUrl ??
        defaults.source.baseUrl,
      quotePath:
        overrides?.source?.quotePath ??
        file.source?.quotePath ??
        defaults.source.quotePath,
      chartUrl:
        overrides?.source?.chartUrl ??
        file.source?.chartUrl ??
        defaults.source.chartUrl,
      timeoutMs:
        overrides?.source?.timeoutMs ??
        envNumber("REQUEST_TIMEOUT_MS") ??
        file.source?.timeoutMs ??
        defaults.source.timeoutMs,
      requestDelayMs:
        overrides?.source?.requestDelayMs ??
        envNumber("REQUEST_DELAY_MS") ??
        file.source?.requestDelayMs ??
        defaults.source.requestDelayMs,
      userAgent:
        overrides?.source?.userAgent ??
        file.source?.userAgent ??
        defaults.source.userAgent,
    },
    retry: {
      maxRetries:
        overrides?.retry?.maxRetries ??
        envNumber("MAX_RETRIES") ??
        file.retry?.maxRetries ??
        defaults.retry.maxRetries,
      baseDelayMs:
        overrides?.retry?.baseDelayMs ??
        envNumber("RETRY_DELAY_MS") ??
        file.retry?.baseDelayMs ??
        defaults.retry.baseDelayMs,
      backoffFactor:
        overrides?.retry?.backoffFactor ??
        file.retry?.backoffFactor ??
        defaults.retry.backoffFactor,
      maxDelayMs:
        overrides?.retry?.maxDelayMs ??
        file.retry?.maxDelayMs ??
        defaults.retry.maxDelayMs,
    },
    circuitBreaker: {
      enabled:
        overrides?.circuitBreaker?.enabled ??
        envBoolean("CIRCUIT_BREAKER") ??
        file.circuitBreaker?.enabled ??
        defaults.circuitBreaker.enabled,
      failureThreshold:
        overrides?.circuitBreaker?.failureThreshold ??
        file.circuitBreaker?.failureThreshold ??
        defaults.circuitBreaker.failureThreshold,
      recoveryTimeoutMs:
        overrides?.circuitBreaker?.recoveryTimeoutMs ??
        file.circuitBreaker?.recoveryTimeoutMs ??
        defaults.circuitBreaker.recoveryTimeoutMs,
    },
    validation: {
      ...defaults.validation,
      ...file.validation,
      ...overrides?.validation,
    },
    ai: {
      apiKey:
        overrides?.ai?.apiKey ||
        envString("OPENAI_API_KEY") ||
        file.ai?.apiKey ||
        defaults.ai.apiKey,
      baseUrl:
        overrides?.ai?.baseUrl ||
        envString("OPENAI_BASE_URL") ||
        file.ai?.baseUrl ||
        defaults.ai.baseUrl,
      model:
        overrides?.ai?.model ||
        envString("OPENAI_MODEL") ||
        file.ai?.model ||
        defaults.ai.model,
      maxTokens:
        overrides?.ai?.maxTokens ??
        envNumber("MAX_TOKENS") ??
        file.ai?.maxTokens ??
        defaults.ai.maxTokens,
      temperature:
        overrides?.ai?.temperature ??
        envNumber("TEMPERATURE") ??
        file.ai?.temperature ??
        defaults.ai.temperature,
    },
    logging: {
      level:
        overrides?.logging?.level ??
        envLogLevel() ??
        file.logging?.level ??
        defaults.logging.level,
    },
  };

  return config;
}

let configInstance: Config | undefined;

export const getConfig = (): Config => {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
};
export const setConfig = (config: Config) => {
  configInstance = config;
};
export const updateConfig = (overrides: ConfigOverrides) => {
  configInstance = loadConfig(undefined, overrides);
};

export function quoteUrl(config: Config, symbol: string): string {
  return (
    config.source.baseUrl +
    config.source.quotePath.replace("{symbol}", encodeURIComponent(symbol))
  );
}

export type { ConfigOverrides };
