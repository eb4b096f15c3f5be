// SQLite-based JobRegistry using better-sqlite3 with WAL mode.
// Appends run in an IMMEDIATE transaction, so concurrent add-job calls serialize.

import Database from "better-sqlite3";
import { dirname } from "path";
import { config } from "../config.ts";
import { MalformedCacheError } from "../errors.ts";
import { ensureDirSync } from "../fs-utils.ts";
import type { Job, StoredJob } from "../jobs.ts";
import type { JobRegistry } from "./job-store.ts";

const SCHEMA_VERSION = 1;

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS jobs (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  entry TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL
);
`;

type JobRow = {
  seq: number;
  entry: string;
};

function isPlainObject(value: unknown): value is StoredJob {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SqliteRegistry implements JobRegistry {
  readonly location: string;
  private db: Database.Database;

  constructor(dbPath: string = config.sqliteDbPath) {
    this.location = dbPath;
    ensureDirSync(dirname(dbPath));
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.bootstrap();
  }

  private bootstrap(): void {
    this.db.exec(CREATE_TABLES);

    const row = this.db
      .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM schema_version")
      .get();
    const currentVersion = row?.v ?? 0;

    if (currentVersion < SCHEMA_VERSION) {
      this.db
        .prepare("INSERT OR REPLACE INTO schema_version (version, applied_at) VALUES (?, ?)")
        .run(SCHEMA_VERSION, new Date().toISOString());
    }
  }

  private rowToJob(row: JobRow): StoredJob {
    let entry: unknown;
    try {
      entry = JSON.parse(row.entry);
    } catch (err) {
      throw new MalformedCacheError(this.location, `row ${row.seq} is not valid JSON`, { cause: err });
    }
    if (!isPlainObject(entry)) {
      throw new MalformedCacheError(this.location, `row ${row.seq} is not a job object`);
    }
    return entry;
  }

  load(): StoredJob[] {
    const rows = this.db.prepare<[], JobRow>("SELECT seq, entry FROM jobs ORDER BY seq").all();
    return rows.map((row) => this.rowToJob(row));
  }

  append(job: Job): void {
    const insert = this.db.prepare("INSERT INTO jobs (entry, created_at) VALUES (?, ?)");
    const tx = this.db.transaction(() => {
      // Surface a corrupt registry before adding to it
      this.load();
      insert.run(JSON.stringify(job), new Date().toISOString());
    });
    tx.immediate();
  }

  close(): void {
    this.db.close();
  }
}
