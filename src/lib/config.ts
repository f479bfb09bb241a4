import dotenv from "dotenv";
import { z } from "zod";

import { apiError } from "./errors";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal", "silent"] as const;

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const configSchema = z.object({
  APP_NAME: z.string().min(1).default("pokedex-cache"),
  APP_VERSION: z.string().min(1).default("0.1.0"),
  APP_ENVIRONMENT: z.string().min(1).default("dev"),
  PORT: intFromEnv(8000),
  LOG_LEVEL: z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
  DATABASE_PATH: z.string().min(1).default("./pokedex.db"),
  POKEAPI_BASE_URL: z
    .string()
    .url()
    .transform((s) => s.replace(/\/+$/, ""))
    .default("https://pokeapi.co/api/v2"),
  TOTAL_NUMBER_OF_POKEMONS: intFromEnv(1017, 1),
  FETCH_ATTEMPTS: intFromEnv(3, 1),
  FETCH_RETRY_DELAY_MS: intFromEnv(5000),
  FETCH_TIMEOUT_MS: intFromEnv(15000, 1),
});

export interface AppConfig {
  readonly appName: string;
  readonly appVersion: string;
  readonly environment: string;
  readonly port: number;
  readonly logLevel: (typeof LOG_LEVELS)[number];
  readonly databasePath: string;
  readonly pokeApiBaseUrl: string;
  /** Known size of the upstream catalog; the listing reports it as `count`. */
  readonly totalPokemon: number;
  readonly fetchAttempts: number;
  readonly fetchRetryDelayMs: number;
  readonly fetchTimeoutMs: number;
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  // Empty strings behave like unset variables
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = configSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") ?? "unknown";
    throw apiError("E_INVALID_ARG", `Invalid configuration value for ${variable}: ${issue?.message ?? "invalid"}`);
  }
  const c = parsed.data;
  return Object.freeze({
    appName: c.APP_NAME,
    appVersion: c.APP_VERSION,
    environment: c.APP_ENVIRONMENT,
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    databasePath: c.DATABASE_PATH,
    pokeApiBaseUrl: c.POKEAPI_BASE_URL,
    totalPokemon: c.TOTAL_NUMBER_OF_POKEMONS,
    fetchAttempts: c.FETCH_ATTEMPTS,
    fetchRetryDelayMs: c.FETCH_RETRY_DELAY_MS,
    fetchTimeoutMs: c.FETCH_TIMEOUT_MS,
  });
}

// Reads .env (if present) into process.env, then validates.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  dotenv.config();
  return parseConfig(env);
}
