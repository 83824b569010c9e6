import fs from "node:fs";
import path from "node:path";
import { LogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides } from "./types";

type Env = Record<string, string | undefined>;

const DEFAULT_CONFIG: AppConfig = {
  sourceDomain: "wikipedia.org",
  languages: ["da", "en"],
  userAgent: "wiki-ingest/0.1 (search content ingestion)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 15_000,
  maxRedirects: 5,
  searchLogPath: "logs/search.log",
  storePath: "data/pages.sqlite",
  snippetLength: 200,
  maxResults: 10,
  logLevel: "info",
  elastic: {
    host: "localhost",
    port: 9200,
    username: undefined,
    password: undefined,
    index: "pages",
    probeAttempts: 3,
    probeDelayMs: 5_000,
    requestTimeoutMs: 10_000,
  },
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    elastic: {
      ...DEFAULT_CONFIG.elastic,
      ...(fileConfig.elastic ?? {}),
    },
  };

  return {
    ...merged,
    sourceDomain: env.SOURCE_DOMAIN ?? merged.sourceDomain,
    languages: toList(env.LANGUAGES, merged.languages),
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxRedirects: toInt(env.MAX_REDIRECTS, merged.maxRedirects),
    searchLogPath: env.SEARCH_LOG_PATH ?? merged.searchLogPath,
    storePath: env.STORE_PATH ?? merged.storePath,
    snippetLength: toInt(env.SNIPPET_LENGTH, merged.snippetLength),
    maxResults: toInt(env.MAX_RESULTS, merged.maxResults),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    elastic: {
      host: env.ES_HOST ?? merged.elastic.host,
      port: toInt(env.ES_PORT, merged.elastic.port),
      username: env.ES_USERNAME ?? merged.elastic.username,
      password: env.ES_PASSWORD ?? merged.elastic.password,
      index: env.ES_INDEX ?? merged.elastic.index,
      probeAttempts: toInt(env.ES_PROBE_ATTEMPTS, merged.elastic.probeAttempts),
      probeDelayMs: toInt(env.ES_PROBE_DELAY_MS, merged.elastic.probeDelayMs),
      requestTimeoutMs: toInt(env.ES_REQUEST_TIMEOUT_MS, merged.elastic.requestTimeoutMs),
    },
  };
}

export { DEFAULT_CONFIG };
