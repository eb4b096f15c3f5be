import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

describe("createRegistry", () => {
  let dir: string;

  // config reads the environment once, at import
  const load = async () => {
    vi.resetModules();
    const { config } = await import("../config.ts");
    const store = await import("./index.ts");
    return { config, ...store };
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "jobgraph-factory-"));
    vi.stubEnv("JOBGRAPH_CACHE", join(dir, "cache.json"));
    vi.stubEnv("JOBGRAPH_DB", join(dir, "cache.db"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  test("returns the JSON registry at the configured cache path", async () => {
    const { config, createRegistry, JsonRegistry } = await load();
    const registry = createRegistry("json");
    expect(registry).toBeInstanceOf(JsonRegistry);
    expect(registry.location).toBe(join(dir, "cache.json"));
    expect(config.cachePath).toBe(join(dir, "cache.json"));
  });

  test("returns the SQLite registry at the configured database path", async () => {
    const { config, createRegistry, SqliteRegistry } = await load();
    const registry = createRegistry("sqlite");
    expect(registry).toBeInstanceOf(SqliteRegistry);
    expect(registry.location).toBe(config.sqliteDbPath);
    expect(config.sqliteDbPath).toBe(join(dir, "cache.db"));
    if (registry instanceof SqliteRegistry) registry.close();
  });

  test("falls back to JSON for an unknown storage mode", async () => {
    vi.stubEnv("JOBGRAPH_STORAGE", "redis");
    const { config, createRegistry, JsonRegistry } = await load();
    expect(config.storageMode).toBe("json");
    expect(createRegistry()).toBeInstanceOf(JsonRegistry);
  });
});
