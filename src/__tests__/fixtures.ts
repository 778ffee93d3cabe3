import type { FileOpener } from "../host.js";
import { Database } from "../database.js";
import type { DatabaseOptions } from "../database.js";
import { stableTieBreaker } from "../solver.js";

export const ROOT = "/repo";

/** In-memory FileOpener over `files` (root-relative path → content), counting reads. */
export function makeFileOpener(files: Record<string, string>): FileOpener & {
  reads: Map<string, number>;
} {
  const byAbsPath = new Map<string, string>();
  for (const [rel, content] of Object.entries(files)) {
    byAbsPath.set(`${ROOT}/${rel}`, content);
  }
  const reads = new Map<string, number>();
  return {
    reads,
    exists: (filePath) => byAbsPath.has(filePath),
    readLines(filePath) {
      const content = byAbsPath.get(filePath);
      if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
      reads.set(filePath, (reads.get(filePath) ?? 0) + 1);
      return content.split("\n");
    },
  };
}

export function makeDatabase(
  files: Record<string, string>,
  opts?: Omit<DatabaseOptions, "fileOpener">,
): Database {
  return new Database(ROOT, {
    fileOpener: makeFileOpener(files),
    tieBreaker: stableTieBreaker,
    ...opts,
  });
}
