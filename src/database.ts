import assert from "assert";
import type { Identity, ParsedDirective, PathGlob, ScopedDirective } from "./types.js";
import { BASIC_EMAIL_REGEXP, DEFAULT_OWNERS_FILE, EVERYONE, OwnersSyntaxError } from "./types.js";
import type { FileOpener, PathOps } from "./host.js";
import { nodeFileOpener, posixPathOps } from "./host.js";
import { parseOwners } from "./parser.js";
import { OwnershipIndex } from "./ownershipIndex.js";
import type { ReviewerSet } from "./reviewerSet.js";
import type { OwnershipView, TieBreaker } from "./solver.js";
import { coveringSetOfOwners, randomTieBreaker } from "./solver.js";

/** A parsed OWNERS file whose entries are not yet recorded. */
interface PendingOwnersFile {
  dirpath: string;
  entries: ParsedDirective[];
  includes: Map<ParsedDirective, string>;
}

export interface DatabaseOptions {
  fileOpener?: FileOpener;
  pathOps?: PathOps;
  verbose?: boolean;
  ownersFileName?: string;
  emailPattern?: RegExp;
  tieBreaker?: TieBreaker;
}

/**
 * A database of OWNERS files for one repository.
 *
 * OWNERS files are read on demand, walking up from the queried paths, and
 * stay loaded for the lifetime of the instance. Not safe for concurrent
 * mutation.
 */
export class Database implements OwnershipView {
  private index = new OwnershipIndex();
  private readFiles = new Set<string>();
  private fileOpener: FileOpener;
  private pathOps: PathOps;
  private verbose: boolean;
  private ownersFileName: string;
  private emailPattern: RegExp;
  private tieBreaker: TieBreaker;

  constructor(
    readonly root: string,
    opts?: DatabaseOptions,
  ) {
    this.fileOpener = opts?.fileOpener ?? nodeFileOpener;
    this.pathOps = opts?.pathOps ?? posixPathOps;
    this.verbose = opts?.verbose ?? false;
    this.ownersFileName = opts?.ownersFileName ?? DEFAULT_OWNERS_FILE;
    this.emailPattern = opts?.emailPattern ?? BASIC_EMAIL_REGEXP;
    this.tieBreaker = opts?.tieBreaker ?? randomTieBreaker;
  }

  /** Absolute paths of the OWNERS files parsed so far. */
  get loadedFiles(): ReadonlySet<string> {
    return this.readFiles;
  }

  reviewersFor(files: readonly string[], author?: Identity): Set<Identity> {
    return new Set(this.reviewerAssignmentFor(files, author).getReviewers());
  }

  /**
   * Suggested reviewers covering `files` (paths relative to the root), and
   * what each should review. The author, if given, is never suggested.
   */
  reviewerAssignmentFor(files: readonly string[], author?: Identity): ReviewerSet {
    this.checkPaths(files);
    this.loadDataNeededFor(files);
    const suggested = coveringSetOfOwners(files, author, this, this.tieBreaker);
    suggested.reduceEveryone();
    return suggested;
  }

  /** Files in `files` that none of `reviewers` (nor the wildcard) may approve. */
  filesNotCoveredBy(files: readonly string[], reviewers: readonly Identity[]): Set<string> {
    this.checkPaths(files);
    this.checkReviewers(reviewers);
    this.loadDataNeededFor(files);
    return new Set(files.filter((f) => !this.isCoveredBy(f, reviewers)));
  }

  /**
   * Read OWNERS files upward from each file's directory until a level that
   * already has owners, or a stop boundary.
   */
  loadDataNeededFor(files: readonly string[]): void {
    for (const f of files) {
      let dirpath = this.pathOps.dirname(f);
      while (this.ownersOf(dirpath).size === 0) {
        this.readOwners(this.pathOps.join(dirpath, this.ownersFileName));
        if (this.isStopBoundary(dirpath)) break;
        dirpath = this.pathOps.dirname(dirpath);
      }
    }
  }

  ownersOf(path: string): Set<Identity> {
    return this.index.ownersOf(path);
  }

  isStopBoundary(path: string): boolean {
    return this.index.isStopBoundary(path);
  }

  parentOf(path: string): string {
    return this.pathOps.dirname(path);
  }

  /**
   * Innermost enclosing path (starting with `path` itself) that has owners.
   * May be a stop boundary without any.
   */
  innermostOwnedAncestor(path: string): PathGlob {
    let dirpath = path;
    while (this.ownersOf(dirpath).size === 0) {
      if (this.isStopBoundary(dirpath)) break;
      dirpath = this.pathOps.dirname(dirpath);
    }
    return dirpath;
  }

  /** Comment from the deepest grant of `owner` at or above `dir`, or "". */
  mostSpecificComment(owner: Identity, dir: PathGlob): string {
    let searchDir = dir;
    while (true) {
      const comment = this.index.commentFor(owner, searchDir);
      if (comment !== undefined) return comment;
      if (!searchDir) return "";
      searchDir = this.pathOps.dirname(searchDir);
    }
  }

  private isCoveredBy(objname: string, reviewers: readonly Identity[]): boolean {
    const candidates = [...reviewers, EVERYONE];
    let current = objname;
    while (true) {
      for (const reviewer of candidates) {
        for (const pattern of this.index.patternsOf(reviewer)) {
          if (this.index.matches(current, pattern)) return true;
        }
      }
      if (this.isStopBoundary(current)) return false;
      current = this.pathOps.dirname(current);
    }
  }

  private checkPaths(files: readonly string[]): void {
    const absRoot = this.pathOps.resolve(this.root);
    for (const f of files) {
      assert(!this.pathOps.isAbsolute(f), `path must be relative to the root: ${f}`);
      const rel = this.pathOps.relative(absRoot, this.pathOps.resolve(absRoot, f));
      assert(
        rel !== ".." && !rel.startsWith("../") && !this.pathOps.isAbsolute(rel),
        `path is outside the root: ${f}`,
      );
    }
  }

  private checkReviewers(reviewers: readonly Identity[]): void {
    for (const reviewer of reviewers) {
      assert(this.emailPattern.test(reviewer), `not a reviewer identity: ${reviewer}`);
    }
  }

  /**
   * Read one OWNERS file (path relative to the root) and everything it
   * includes. Missing and already-read files are skipped. The whole include
   * closure is parsed and resolved before anything is recorded, so a failure
   * leaves the index untouched and the files are read again on the next query.
   */
  private readOwners(relPath: string): void {
    const pending = new Map<string, PendingOwnersFile>();
    this.parseClosure(relPath, pending);
    this.applyOwners(relPath, pending);
  }

  private parseClosure(relPath: string, pending: Map<string, PendingOwnersFile>): void {
    const ownersPath = this.pathOps.join(this.root, relPath);
    if (!this.fileOpener.exists(ownersPath)) return;
    if (this.readFiles.has(ownersPath) || pending.has(ownersPath)) return;

    if (this.verbose) {
      process.stderr.write(`  reading ${relPath}\n`);
    }
    const entries = parseOwners(this.fileOpener.readLines(ownersPath), {
      path: ownersPath,
      emailPattern: this.emailPattern,
    });

    const includes = new Map<ParsedDirective, string>();
    for (const entry of entries) {
      const directive =
        entry.directive.kind === "per-file" ? entry.directive.directive : entry.directive;
      if (directive.kind !== "include") continue;
      const includePath = this.resolveInclude(directive.target, relPath);
      if (includePath === null) {
        throw new OwnersSyntaxError(
          ownersPath,
          entry.lineno,
          `${directive.target} does not refer to an existing file.`,
        );
      }
      includes.set(entry, includePath);
    }

    pending.set(ownersPath, { dirpath: this.pathOps.dirname(relPath), entries, includes });
    for (const includePath of includes.values()) {
      this.parseClosure(includePath, pending);
    }
  }

  /**
   * Record a parsed file's entries in file order. An include is applied when
   * its line is reached, then the included directory's owners recorded so
   * far are propagated.
   */
  private applyOwners(relPath: string, pending: Map<string, PendingOwnersFile>): void {
    const ownersPath = this.pathOps.join(this.root, relPath);
    const file = pending.get(ownersPath);
    if (!file) return;
    pending.delete(ownersPath);
    this.readFiles.add(ownersPath);

    for (const entry of file.entries) {
      const { directive } = entry;
      const includePath = file.includes.get(entry);
      if (includePath !== undefined) this.applyOwners(includePath, pending);
      if (directive.kind === "per-file") {
        const pattern = this.pathOps.join(file.dirpath, directive.glob);
        this.addEntry(pattern, directive.directive, entry, includePath);
      } else {
        this.addEntry(file.dirpath, directive, entry, includePath);
      }
    }
  }

  private addEntry(
    pattern: PathGlob,
    directive: ScopedDirective,
    entry: ParsedDirective,
    includePath: string | undefined,
  ): void {
    switch (directive.kind) {
      case "noparent":
        this.index.addStopBoundary(pattern);
        break;
      case "include":
        if (includePath !== undefined) {
          this.index.propagate(this.pathOps.dirname(includePath), pattern);
        }
        break;
      case "grant":
        this.index.grant(directive.identity, pattern, entry.comment);
        break;
    }
  }

  /**
   * "//a/OWNERS" is relative to the root, anything else to the directory of
   * the including file. Returns the root-relative path, or null if there is
   * no such file.
   */
  private resolveInclude(target: string, includingFile: string): string | null {
    const includePath = target.startsWith("//")
      ? target.slice(2)
      : this.pathOps.join(this.pathOps.dirname(includingFile), target);

    if (!this.fileOpener.exists(this.pathOps.join(this.root, includePath))) {
      return null;
    }
    return includePath;
  }
}

/**
 * Create a Database for `root`, reading files through `fileOpener` and
 * manipulating paths through `pathOps`.
 */
export function newDatabase(
  root: string,
  fileOpener: FileOpener = nodeFileOpener,
  pathOps: PathOps = posixPathOps,
  options?: Omit<DatabaseOptions, "fileOpener" | "pathOps">,
): Database {
  return new Database(root, { ...options, fileOpener, pathOps });
}
