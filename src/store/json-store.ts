// JSON file-based JobRegistry: one document rewritten whole on every append.

import { z } from "zod";
import { config } from "../config.ts";
import { ConcurrentModificationError, MalformedCacheError } from "../errors.ts";
import { atomicWriteFileSync, readFileIfExists } from "../fs-utils.ts";
import type { Job, StoredJob } from "../jobs.ts";
import type { JobRegistry } from "./job-store.ts";

const registryDocumentSchema = z.object({
  jobs: z.array(z.record(z.string(), z.unknown())),
});

export class JsonRegistry implements JobRegistry {
  readonly location: string;

  constructor(path: string = config.cachePath) {
    this.location = path;
  }

  load(): StoredJob[] {
    return this.parse(readFileIfExists(this.location));
  }

  append(job: Job): void {
    const snapshot = readFileIfExists(this.location);
    const jobs = this.parse(snapshot);
    jobs.push(job);

    const content = JSON.stringify({ jobs }, null, 2) + "\n";
    // Refuse to overwrite appends that landed after our read
    atomicWriteFileSync(this.location, content, 0o644, () => {
      if (readFileIfExists(this.location) !== snapshot) {
        throw new ConcurrentModificationError(this.location);
      }
    });
  }

  private parse(content: string | null): StoredJob[] {
    if (content === null) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new MalformedCacheError(this.location, "not valid JSON", { cause: err });
    }

    const result = registryDocumentSchema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new MalformedCacheError(this.location, `expected {"jobs": [...]} (${detail})`);
    }
    return result.data.jobs;
  }
}
