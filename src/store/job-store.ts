// JobRegistry interface — abstracts persistence of the accumulated job list.

import type { Job, StoredJob } from "../jobs.ts";

export interface JobRegistry {
  /** Where the registry lives, for diagnostics. */
  readonly location: string;
  /** All entries in insertion order; an absent registry is empty. */
  load(): StoredJob[];
  /** Append one job after every existing entry and persist. */
  append(job: Job): void;
}
