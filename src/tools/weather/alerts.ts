import { z } from "zod";
import type { ToolOutcome, ToolSpec } from "../../types/tools.js";
import { defineTool } from "../define.js";
import { errorMessage } from "../../errors.js";
import { silentLogger, type Logger } from "../../log.js";
import { DEFAULT_USER_AGENT, DEFAULT_WEATHER_API_BASE, DEFAULT_WEATHER_TIMEOUT_MS } from "../../config.js";

export const WEATHER_TOOL_NAME = "get_weather_alert_by_code";
export const NO_ALERTS_FOUND = "No alerts found for the given state.";
export const ALERT_SEPARATOR = "\n---\n";

export interface WeatherApiOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

// Fields are rendered as found; only absent or null values get a placeholder.
const alertProperties = z.object({
  event: z.unknown(),
  description: z.unknown(),
  severity: z.unknown(),
  areaDesc: z.unknown(),
  instruction: z.unknown(),
});

const featureCollection = z.object({
  features: z
    .array(z.object({ properties: alertProperties.nullish().catch(null) }))
    .nullish(),
}).nullable();

export type AlertProperties = z.infer<typeof alertProperties>;

function field(value: unknown, placeholder: string): string {
  if (value === undefined || value === null) return placeholder;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function formatAlert(props: Partial<AlertProperties> | null | undefined): string {
  const p: Partial<AlertProperties> = props ?? {};
  return [
    `Event: ${field(p.event, "Unknown")}`,
    `Description: ${field(p.description, "No description available")}`,
    `Severity: ${field(p.severity, "Unknown")}`,
    `Area: ${field(p.areaDesc, "Unknown")}`,
    `Instructions: ${field(p.instruction, "No instructions available")}`,
  ].join("\n");
}

export function alertsUrl(baseUrl: string, code: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/alerts/active/area/${encodeURIComponent(code)}`;
}

/**
 * Looks up the active alerts for one area code on a weather.gov-style API.
 * An empty or missing feature list is a successful lookup answered with
 * {@link NO_ALERTS_FOUND}; network errors, timeouts, non-2xx statuses and
 * unreadable bodies are failures.
 */
export async function fetchWeatherAlerts(code: string, opts: WeatherApiOptions = {}): Promise<ToolOutcome> {
  const log = opts.logger ?? silentLogger;
  const doFetch = opts.fetch ?? fetch;
  const url = alertsUrl(opts.baseUrl ?? DEFAULT_WEATHER_API_BASE, code);
  log.debug(`GET ${url}`);

  let res: Response;
  try {
    res = await doFetch(url, {
      method: "GET",
      headers: {
        "User-Agent": opts.userAgent ?? DEFAULT_USER_AGENT,
        "Accept": "application/geo+json",
      },
      signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_WEATHER_TIMEOUT_MS),
    });
  } catch (e) {
    log.error(`weather alerts request failed for ${code}: ${errorMessage(e)}`);
    return { ok: false, error: { category: "transport", message: errorMessage(e) } };
  }

  if (!res.ok) {
    log.error(`weather alerts HTTP ${res.status} for ${code}`);
    return { ok: false, error: { category: "transport", message: `HTTP ${res.status}` } };
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (e) {
    log.error(`weather alerts body for ${code} is not JSON: ${errorMessage(e)}`);
    return { ok: false, error: { category: "parse", message: "response body is not valid JSON" } };
  }

  const parsed = featureCollection.safeParse(body);
  if (!parsed.success) {
    log.error(`weather alerts body for ${code} is not a feature collection`);
    return { ok: false, error: { category: "parse", message: "response body is not a feature collection" } };
  }

  const features = parsed.data?.features ?? [];
  if (features.length === 0) {
    log.info(`no alerts found for ${code}`);
    return { ok: true, output: NO_ALERTS_FOUND };
  }
  return { ok: true, output: features.map(f => formatAlert(f.properties)).join(ALERT_SEPARATOR) };
}

/** Same lookup, with every failure collapsed to `null`. */
export async function getWeatherAlertsByCode(code: string, opts: WeatherApiOptions = {}): Promise<string | null> {
  const outcome = await fetchWeatherAlerts(code, opts);
  return outcome.ok ? outcome.output : null;
}

export function createWeatherAlertsTool(opts: WeatherApiOptions = {}): ToolSpec {
  return defineTool({
    name: WEATHER_TOOL_NAME,
    description:
      "Get the active weather alerts for a US state. " +
      'Input is the UPPERCASE 2-letter state code, e.g. "CA" for California or "NY" for New York.',
    input_schema: z.object({
      code: z.string().min(1).describe("2-letter US state code, e.g. CA"),
    }),
    run: ({ code }) => fetchWeatherAlerts(code, opts),
  });
}
