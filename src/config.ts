import dotenv from "dotenv";
import { UsageError } from "./errors";

export interface AppConfig {
  databasePath: string;
  baseUrl: string;              // must end with "/"
  requestTimeoutMs: number;
  nakalHtmlDir?: string;
  userAgent: string;
}

export const DEFAULT_BASE_URL = "https://jamabandi.nic.in/land%20records/";
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0";

type Env = Record<string, string | undefined>;

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const baseUrl = nonEmpty(env.JAMABANDI_BASE_URL) ?? DEFAULT_BASE_URL;
  return {
    databasePath: nonEmpty(env.DATABASE_PATH) ?? "land_records.db",
    baseUrl: baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`,
    requestTimeoutMs: positiveInt("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS, 40_000),
    nakalHtmlDir: nonEmpty(env.NAKAL_HTML_DIR),
    userAgent: nonEmpty(env.USER_AGENT) ?? DEFAULT_USER_AGENT,
  };
}

/** Reads `.env` into process.env (existing variables win), then builds the config. */
export function loadEnvConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
