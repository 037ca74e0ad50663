import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./log.js";

export const DEFAULT_WEATHER_API_BASE = "https://api.weather.gov";
export const DEFAULT_USER_AGENT = "weather-agent/0.1 (ops@example.com)";
export const DEFAULT_WEATHER_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_ROUNDS = 8;

const envSchema = z.object({
  WEATHER_API_BASE: z.url().default(DEFAULT_WEATHER_API_BASE),
  WEATHER_USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_WEATHER_TIMEOUT_MS),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.url().default("https://api.openai.com/v1"),
  MODEL: z.string().default("gpt-4o-mini"),
  AZURE_OPENAI_ENDPOINT: z.url().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_DEPLOYMENT: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().default("2024-06-01"),
  MAX_AGENT_ROUNDS: z.coerce.number().int().positive().default(DEFAULT_MAX_ROUNDS),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  QUIET: z.string().optional(),
  NO_COLOR: z.string().optional(),
});

export type EngineConfig =
  | { kind: "azure"; endpoint: string; deployment: string; apiVersion: string; apiKey?: string }
  | { kind: "openai"; baseUrl: string; model: string; apiKey?: string };

export interface AppConfig {
  weather: { baseUrl: string; userAgent: string; timeoutMs: number };
  engine: EngineConfig;
  maxRounds: number;
  logLevel: LogLevel;
  color: boolean;
}

/** Parses the process environment once. Blank values count as unset. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const v = env[key]?.trim();
    if (v) present[key] = v;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  const engine: EngineConfig =
    e.AZURE_OPENAI_ENDPOINT && e.AZURE_OPENAI_DEPLOYMENT
      ? {
          kind: "azure",
          endpoint: e.AZURE_OPENAI_ENDPOINT,
          deployment: e.AZURE_OPENAI_DEPLOYMENT,
          apiVersion: e.AZURE_OPENAI_API_VERSION,
          apiKey: e.AZURE_OPENAI_API_KEY,
        }
      : { kind: "openai", baseUrl: e.OPENAI_BASE_URL, model: e.MODEL, apiKey: e.OPENAI_API_KEY };

  return {
    weather: { baseUrl: e.WEATHER_API_BASE, userAgent: e.WEATHER_USER_AGENT, timeoutMs: e.WEATHER_TIMEOUT_MS },
    engine,
    maxRounds: e.MAX_AGENT_ROUNDS,
    logLevel: e.QUIET === "1" ? "silent" : e.LOG_LEVEL,
    color: e.NO_COLOR !== "1",
  };
}

function mask(value: string | undefined): string {
  if (!value) return "not set";
  if (value.length <= 8) return "****";
  return value.slice(0, 4) + "****" + value.slice(-4);
}

export function describeConfig(config: AppConfig): string[] {
  const eng = config.engine;
  const lines = [
    `weather api   : ${config.weather.baseUrl} (timeout ${config.weather.timeoutMs}ms)`,
    `user agent    : ${config.weather.userAgent}`,
  ];
  if (eng.kind === "azure") {
    lines.push(`engine        : azure ${eng.endpoint} deployment=${eng.deployment} api-version=${eng.apiVersion}`);
  } else {
    lines.push(`engine        : openai ${eng.baseUrl} model=${eng.model}`);
  }
  lines.push(`api key       : ${mask(eng.apiKey)}`);
  lines.push(`max rounds    : ${config.maxRounds}`);
  return lines;
}
