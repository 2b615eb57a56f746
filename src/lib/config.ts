/**
 * Runtime configuration
 *
 * Two sources, both validated with zod and loaded once at startup:
 * - environment variables (paths, HTTP client settings)
 * - the airports config file (state, region bands, feed URLs, curated list)
 */

import { readFile } from "fs/promises";
import { resolve } from "path";
import { z } from "zod";
import { REGION_NAMES } from "@/types/airport";
import type { RegionBands } from "@/types/airport";
import type { HttpOptions } from "@/lib/http";
import { getErrorMessage, isFileNotFound } from "@/lib/error-utils";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  STATUS_JSON_PATH: z.string().min(1).default("docs/status.json"),
  AIRPORTS_CONFIG_PATH: z.string().min(1).default("config/airports.json"),
  HTTP_USER_AGENT: z.string().min(1).default("PA-Airport-Status-GitHub/1.0"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  HTTP_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  SLEEP_BETWEEN_REQUESTS_MS: z.coerce.number().int().min(0).default(0),
});

export type EnvConfig = z.infer<typeof envSchema>;

const configuredAirportSchema = z.object({
  code: z.string().regex(/^[A-Za-z0-9]{3,4}$/),
  name: z.string(),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  /** METAR station when it differs from K + code */
  icao: z
    .string()
    .regex(/^[A-Za-z0-9]{4}$/)
    .optional(),
  region: z.enum(REGION_NAMES).optional(),
});

export type ConfiguredAirport = z.infer<typeof configuredAirportSchema>;

const airportsConfigSchema = z
  .object({
    state: z.string().length(2).default("PA"),
    registrySource: z.enum(["stations", "config"]).default("stations"),
    regionBands: z
      .object({
        westMaxLon: z.number(),
        centralMaxLon: z.number(),
      })
      .default({ westMaxLon: -78.5, centralMaxLon: -76.5 }),
    weatherImpacts: z.boolean().default(true),
    metarChunkSize: z.number().int().positive().max(400).default(60),
    feeds: z
      .object({
        stationsUrl: z.string().url(),
        nasStatusUrl: z.string().url(),
        metarUrl: z.string().url(),
      })
      .default({
        stationsUrl:
          "https://aviationweather.gov/adds/dataserver_current/httpparam?dataSource=stations&requestType=retrieve&format=csv&stationString=~&state=PA",
        nasStatusUrl: "https://nasstatus.faa.gov/api/airport-status-information",
        metarUrl: "https://aviationweather.gov/api/data/metar",
      }),
    airports: z.array(configuredAirportSchema).default([]),
  })
  .refine((config) => config.regionBands.westMaxLon < config.regionBands.centralMaxLon, {
    message: "regionBands.westMaxLon must be west of regionBands.centralMaxLon",
    path: ["regionBands"],
  })
  .refine((config) => config.registrySource !== "config" || config.airports.length > 0, {
    message: 'registrySource "config" needs at least one airport',
    path: ["airports"],
  });

export type AirportsConfig = z.infer<typeof airportsConfigSchema>;

export interface AppConfig {
  statusPath: string;
  http: HttpOptions;
  /** Pause between consecutive METAR requests */
  requestPauseMs: number;
  state: string;
  registrySource: AirportsConfig["registrySource"];
  regionBands: RegionBands;
  weatherImpacts: boolean;
  metarChunkSize: number;
  feeds: AirportsConfig["feeds"];
  airports: ConfiguredAirport[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseEnv(env: Record<string, string | undefined>): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseAirportsConfig(data: unknown): AirportsConfig {
  const result = airportsConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid airports config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function buildAppConfig(env: EnvConfig, airports: AirportsConfig): AppConfig {
  return {
    statusPath: resolve(process.cwd(), env.STATUS_JSON_PATH),
    http: {
      userAgent: env.HTTP_USER_AGENT,
      timeoutMs: env.HTTP_TIMEOUT_MS,
      retries: env.HTTP_RETRIES,
      backoffMs: env.HTTP_BACKOFF_MS,
    },
    requestPauseMs: env.SLEEP_BETWEEN_REQUESTS_MS,
    state: airports.state.toUpperCase(),
    registrySource: airports.registrySource,
    regionBands: airports.regionBands,
    weatherImpacts: airports.weatherImpacts,
    metarChunkSize: airports.metarChunkSize,
    feeds: airports.feeds,
    airports: airports.airports,
  };
}

/**
 * Load and validate configuration from the environment and the airports
 * config file. A missing config file falls back to the schema defaults.
 */
export async function loadConfig(
  env: Record<string, string | undefined> = process.env
): Promise<AppConfig> {
  const parsedEnv = parseEnv(env);
  const configPath = resolve(process.cwd(), parsedEnv.AIRPORTS_CONFIG_PATH);

  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(configPath, "utf-8"));
  } catch (error) {
    if (!isFileNotFound(error)) {
      throw new ConfigError(`Cannot read ${configPath}: ${getErrorMessage(error)}`);
    }
    console.warn(`[Config] ${configPath} not found, using defaults`);
  }

  return buildAppConfig(parsedEnv, parseAirportsConfig(raw));
}
