import { LogLevel } from "../observability/types";

export interface ElasticConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
  index: string;
  probeAttempts: number;
  probeDelayMs: number;
  requestTimeoutMs: number;
}

export interface AppConfig {
  sourceDomain: string;
  languages: string[];
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxRedirects: number;
  searchLogPath: string;
  storePath: string;
  snippetLength: number;
  maxResults: number;
  logLevel: LogLevel;
  elastic: ElasticConfig;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "elastic">> & {
  elastic?: Partial<ElasticConfig>;
};
