import { execFileSync } from "child_process";

function git(cwd: string, args: string[]): string {
  return execFileSync("git", args, { cwd, encoding: "utf-8" }).trim();
}

function splitLines(output: string): string[] {
  return output
    .split("\n")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function findGitRoot(cwd: string = process.cwd()): string {
  try {
    return git(cwd, ["rev-parse", "--show-toplevel"]);
  } catch {
    return cwd;
  }
}

/**
 * Files changed relative to `base` (default HEAD, i.e. staged + unstaged),
 * plus untracked files. Paths are relative to the repo top-level.
 */
export function getChangedFiles(repoRoot: string, base = "HEAD"): string[] {
  const out = new Set<string>();
  for (const p of splitLines(git(repoRoot, ["diff", "--name-only", base]))) out.add(p);
  for (const p of splitLines(git(repoRoot, ["ls-files", "--others", "--exclude-standard"]))) {
    out.add(p);
  }
  return [...out].sort((a, b) => a.localeCompare(b));
}
