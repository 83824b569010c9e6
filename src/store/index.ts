import { AppConfig } from "../config";
import { SqliteStore } from "./sqliteStore";
import { ContentStore } from "./types";

export function createStore(config: AppConfig): ContentStore {
  return new SqliteStore(config.storePath);
}

export * from "./ledger";
export * from "./sqliteStore";
export * from "./types";
