import * as fs from "fs";
import * as path from "path";

/** Existence checks and whole-file reads, keyed by absolute path. */
export interface FileOpener {
  exists(filePath: string): boolean;
  readLines(filePath: string): string[];
}

/**
 * Path operations used on both absolute paths and root-relative ones.
 * Relative results follow the convention that the root is "" (never ".").
 */
export interface PathOps {
  join(...parts: string[]): string;
  dirname(p: string): string;
  relative(from: string, to: string): string;
  isAbsolute(p: string): boolean;
  resolve(...parts: string[]): string;
}

function dotToEmpty(p: string): string {
  return p === "." ? "" : p;
}

export const posixPathOps: PathOps = {
  join: (...parts) => dotToEmpty(path.posix.join(...parts)),
  dirname: (p) => dotToEmpty(path.posix.dirname(p)),
  relative: (from, to) => path.posix.relative(from, to),
  isAbsolute: (p) => path.posix.isAbsolute(p),
  resolve: (...parts) => path.posix.resolve(...parts),
};

export const nodeFileOpener: FileOpener = {
  exists(filePath) {
    return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
  },
  readLines(filePath) {
    return fs.readFileSync(filePath, "utf-8").split(/\r?\n/);
  },
};
