// Registry factory — returns the configured JobRegistry implementation.

import { config, type StorageMode } from "../config.ts";
import type { JobRegistry } from "./job-store.ts";
import { JsonRegistry } from "./json-store.ts";
import { SqliteRegistry } from "./sqlite-store.ts";

export function createRegistry(mode: StorageMode = config.storageMode): JobRegistry {
  switch (mode) {
    case "sqlite":
      return new SqliteRegistry(config.sqliteDbPath);
    case "json":
    default:
      return new JsonRegistry(config.cachePath);
  }
}

export { type JobRegistry } from "./job-store.ts";
export { JsonRegistry } from "./json-store.ts";
export { SqliteRegistry } from "./sqlite-store.ts";
