// run-build: compile the whole registry and write the ninja file

import { compile } from "./compiler.ts";
import { config } from "./config.ts";
import { atomicWriteFileSync } from "./fs-utils.ts";
import { renderNinja } from "./ninja-writer.ts";
import type { JobRegistry } from "./store/index.ts";

export interface BuildSummary {
  jobs: number;
  rules: number;
  builds: number;
  outputPath: string;
}

/**
 * Nothing is written unless every entry compiles; the file itself is
 * replaced atomically so a reader never sees a partial graph.
 */
export function runBuild(
  registry: JobRegistry,
  outputPath: string = config.outputPath,
  width: number = config.ninjaWidth
): BuildSummary {
  const entries = registry.load();
  const graph = compile(entries);
  if (entries.length === 0) {
    console.error(`Warning: no jobs registered in ${registry.location}`);
  }

  atomicWriteFileSync(outputPath, renderNinja(graph, width));

  return {
    jobs: entries.length,
    rules: graph.rules.length,
    builds: graph.builds.length,
    outputPath,
  };
}
