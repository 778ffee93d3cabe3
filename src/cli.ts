#!/usr/bin/env node
import { Command } from "commander";
import * as path from "path";
import { Database } from "./database.js";
import { findGitRoot, getChangedFiles } from "./git.js";
import { renderJson, renderText, renderUncovered } from "./renderer.js";
import { randomTieBreaker, stableTieBreaker } from "./solver.js";
import { DEFAULT_OWNERS_FILE } from "./types.js";

interface CommonOptions {
  root?: string;
  ownersFile: string;
  changed?: string | boolean;
  json: boolean;
  verbose: boolean;
}

interface SuggestOptions extends CommonOptions {
  author?: string;
  stable: boolean;
}

interface CheckOptions extends CommonOptions {
  reviewer: string[];
}

/**
 * Collect the files to query as paths relative to `repoRoot`: either the
 * given arguments, or git's changed files with --changed.
 */
function collectFiles(args: string[], repoRoot: string, opts: CommonOptions): string[] {
  let files = args.map((f) => path.resolve(f));
  if (opts.changed !== undefined) {
    const base = typeof opts.changed === "string" ? opts.changed : undefined;
    const gitRoot = findGitRoot(repoRoot);
    files = files.concat(getChangedFiles(gitRoot, base).map((f) => path.resolve(gitRoot, f)));
  }
  return files.map((f) => path.relative(repoRoot, f).split(path.sep).join("/"));
}

function run(action: () => void): void {
  try {
    action();
  } catch (e) {
    process.stderr.write(`Error: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exitCode = 1;
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .option("--root <dir>", "Repo root directory (default: git top-level)")
    .option("--owners-file <name>", "Name of the per-directory owners file", DEFAULT_OWNERS_FILE)
    .option("--changed [base]", "Also query files changed relative to base (default: HEAD)")
    .option("--json", "Output JSON instead of text", false)
    .option("--verbose", "Show progress on stderr", false);
}

const program = new Command();

program
  .name("owners-reviewers")
  .description("Suggest reviewers for a set of changed files from per-directory OWNERS files");

addCommonOptions(
  program
    .command("suggest")
    .description("Suggest a minimal set of reviewers covering the files")
    .argument("[files...]", "Changed files"),
)
  .option("--author <email>", "Change author, never suggested as a reviewer")
  .option("--stable", "Break cost ties by identity instead of at random", false)
  .action((files: string[], opts: SuggestOptions) =>
    run(() => {
      const repoRoot = path.resolve(opts.root ?? findGitRoot());
      const relFiles = collectFiles(files, repoRoot, opts);
      if (opts.verbose) {
        process.stderr.write(`Repo root: ${repoRoot}\n`);
        process.stderr.write(`Files (${relFiles.length}):\n`);
        for (const f of relFiles) process.stderr.write(`  ${f}\n`);
      }

      const db = new Database(repoRoot, {
        verbose: opts.verbose,
        ownersFileName: opts.ownersFile,
        tieBreaker: opts.stable ? stableTieBreaker : randomTieBreaker,
      });
      const suggested = db.reviewerAssignmentFor(relFiles, opts.author);

      const output = opts.json
        ? JSON.stringify(renderJson(suggested), null, 2)
        : renderText(suggested);
      process.stdout.write(output + "\n");
    }),
  );

addCommonOptions(
  program
    .command("check")
    .description("List the files not covered by the given reviewers")
    .argument("[files...]", "Changed files"),
)
  .requiredOption("-r, --reviewer <email...>", "Reviewers already on the change (list files before this option)")
  .action((files: string[], opts: CheckOptions) =>
    run(() => {
      const repoRoot = path.resolve(opts.root ?? findGitRoot());
      const relFiles = collectFiles(files, repoRoot, opts);

      const db = new Database(repoRoot, {
        verbose: opts.verbose,
        ownersFileName: opts.ownersFile,
      });
      const uncovered = db.filesNotCoveredBy(relFiles, opts.reviewer);

      if (opts.json) {
        process.stdout.write(JSON.stringify({ uncovered: [...uncovered].sort() }, null, 2) + "\n");
      } else if (uncovered.size > 0) {
        process.stdout.write(renderUncovered(uncovered) + "\n");
      }
      if (uncovered.size > 0) process.exitCode = 2;
    }),
  );

program.parse();
