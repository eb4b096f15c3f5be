// Configuration for jobgraph

import { tmpdir } from "os";
import { join } from "path";

export type StorageMode = "json" | "sqlite";

const storageModes: readonly StorageMode[] = ["json", "sqlite"];

function parseStorageMode(value: string | undefined): StorageMode {
  return storageModes.find((mode) => mode === value) ?? "json";
}

export const config = {
  // CI stages a job may be assigned to
  ciStages: ["build", "test", "report"] as const,

  // Registry document shared across add-job invocations
  cachePath: process.env.JOBGRAPH_CACHE || join(tmpdir(), "jobgraph_cache.json"),

  // Storage (json = single rewritten document, sqlite = transactional table)
  storageMode: parseStorageMode(process.env.JOBGRAPH_STORAGE),
  sqliteDbPath: process.env.JOBGRAPH_DB || join(tmpdir(), "jobgraph_cache.db"),

  // Compiled build file, relative to the working directory
  outputPath: process.env.JOBGRAPH_OUTPUT || "jobgraph.ninja",

  // Line width for the ninja writer
  ninjaWidth: 70,
};
