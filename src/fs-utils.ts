// Shared filesystem utilities for atomic writes

import { mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { dirname } from "path";

/**
 * Write file atomically: write to temp file, then rename.
 * rename() is atomic on the same filesystem (POSIX guarantee).
 *
 * `beforeRename` runs once the temp file is complete; if it throws, the
 * temp file is removed and the target is left as it was.
 */
export function atomicWriteFileSync(
  filePath: string,
  data: string,
  mode = 0o644,
  beforeRename?: () => void
): void {
  ensureDirSync(dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  writeFileSync(tmpPath, data, { mode });
  try {
    beforeRename?.();
    renameSync(tmpPath, filePath);
  } catch (err) {
    unlinkSync(tmpPath);
    throw err;
  }
}

export function ensureDirSync(dirPath: string, mode = 0o755): void {
  mkdirSync(dirPath, { recursive: true, mode });
}

/** Read a UTF-8 file, or null if it does not exist. */
export function readFileIfExists(filePath: string): string | null {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
