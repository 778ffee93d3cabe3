import assert from "assert";
import { Minimatch } from "minimatch";
import type { Identity, PathGlob } from "./types.js";
import { EVERYONE } from "./types.js";

// Only "*", "?" and "[...]" are special; "*" never crosses "/".
const MATCH_OPTIONS = {
  dot: true,
  nocomment: true,
  nonegate: true,
  nobrace: true,
  noext: true,
  noglobstar: true,
} as const;

/**
 * Bidirectional owner ↔ pattern index built from loaded OWNERS files,
 * plus the stop-inheritance boundaries and grant comments.
 *
 * Every link is written to both directions at once, so ownerToPatterns
 * and patternToOwners always agree.
 */
export class OwnershipIndex {
  private ownerToPatterns = new Map<Identity, Set<PathGlob>>([[EVERYONE, new Set()]]);
  private patternToOwners = new Map<PathGlob, Set<Identity>>();
  private stopBoundaries = new Set<PathGlob>([""]);
  private comments = new Map<Identity, Map<PathGlob, string>>();
  private matchers = new Map<PathGlob, Minimatch>();

  /** Record that identity owns pattern; the comment replaces any earlier one for the same pattern. */
  grant(identity: Identity, pattern: PathGlob, comment: string): void {
    this.link(identity, pattern);
    let byPattern = this.comments.get(identity);
    if (!byPattern) {
      byPattern = new Map();
      this.comments.set(identity, byPattern);
    }
    byPattern.set(pattern, comment);
  }

  /**
   * Give every owner of `from` ownership of `to` as well. Comments and stop
   * boundaries are not carried over.
   */
  propagate(from: PathGlob, to: PathGlob): void {
    const owners = this.patternToOwners.get(from);
    if (!owners) return;
    for (const owner of [...owners]) {
      this.link(owner, to);
    }
  }

  addStopBoundary(pattern: PathGlob): void {
    this.checkPattern(pattern);
    this.stopBoundaries.add(pattern);
  }

  /** Union of the owners of every pattern that matches `path`. No ancestor walk. */
  ownersOf(path: string): Set<Identity> {
    const owners = new Set<Identity>();
    for (const [pattern, patternOwners] of this.patternToOwners) {
      if (this.matches(path, pattern)) {
        for (const owner of patternOwners) owners.add(owner);
      }
    }
    return owners;
  }

  patternsOf(identity: Identity): ReadonlySet<PathGlob> {
    return this.ownerToPatterns.get(identity) ?? new Set();
  }

  isStopBoundary(path: string): boolean {
    for (const boundary of this.stopBoundaries) {
      if (this.matches(path, boundary)) return true;
    }
    return false;
  }

  /** Comment recorded for the first of identity's patterns that matches `path`. */
  commentFor(identity: Identity, path: string): string | undefined {
    const byPattern = this.comments.get(identity);
    if (!byPattern) return undefined;
    const exact = byPattern.get(path);
    if (exact !== undefined) return exact;
    for (const [pattern, comment] of byPattern) {
      if (this.matches(path, pattern)) return comment;
    }
    return undefined;
  }

  owners(): Identity[] {
    return [...this.ownerToPatterns.keys()];
  }

  patterns(): PathGlob[] {
    return [...this.patternToOwners.keys()];
  }

  matches(path: string, pattern: PathGlob): boolean {
    let matcher = this.matchers.get(pattern);
    if (!matcher) {
      matcher = new Minimatch(pattern, MATCH_OPTIONS);
      this.matchers.set(pattern, matcher);
    }
    return matcher.match(path);
  }

  private link(identity: Identity, pattern: PathGlob): void {
    assert(identity.length > 0, "owner identity must not be empty");
    this.checkPattern(pattern);

    let patterns = this.ownerToPatterns.get(identity);
    if (!patterns) {
      patterns = new Set();
      this.ownerToPatterns.set(identity, patterns);
    }
    patterns.add(pattern);

    let owners = this.patternToOwners.get(pattern);
    if (!owners) {
      owners = new Set();
      this.patternToOwners.set(pattern, owners);
    }
    owners.add(identity);
  }

  private checkPattern(pattern: PathGlob): void {
    assert(!pattern.startsWith("/"), `pattern must be root-relative: "${pattern}"`);
  }
}
