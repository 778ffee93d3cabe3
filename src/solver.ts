import assert from "assert";
import type { Identity, PathGlob } from "./types.js";
import { ReviewerSet } from "./reviewerSet.js";

/**
 * Ownership queries the solver needs. Database implements this; tests can
 * supply a hand-built view.
 */
export interface OwnershipView {
  ownersOf(path: string): Set<Identity>;
  isStopBoundary(path: string): boolean;
  parentOf(path: string): string;
  innermostOwnedAncestor(path: string): PathGlob;
  mostSpecificComment(owner: Identity, dir: PathGlob): string;
}

/** A directory an identity could review, and how many levels up the grant was found (1 = the directory itself). */
export interface OwnedDir {
  dir: PathGlob;
  distance: number;
}

export type CandidateMap = Map<Identity, OwnedDir[]>;

/** Picks the primary among owners tied for the lowest cost. */
export type TieBreaker = (tied: readonly Identity[]) => Identity;

export const randomTieBreaker: TieBreaker = (tied) => tied[Math.floor(Math.random() * tied.length)];

export const stableTieBreaker: TieBreaker = (tied) => [...tied].sort()[0];

// Prefers one owner of three directories over three closer owners of one
// each, but not one owner of two over a closer owner of one.
export const COVERAGE_EXPONENT = 1.75;

/**
 * For every directory, walk up to its stop boundary and record each owner
 * found along the way with its distance. The author is never a candidate,
 * and only the closest grant per (owner, directory) is kept.
 */
export function allPossibleOwners(
  dirs: Iterable<PathGlob>,
  author: Identity | undefined,
  view: OwnershipView,
): CandidateMap {
  const candidates: CandidateMap = new Map();
  for (const currentDir of dirs) {
    let dirname = currentDir;
    let distance = 1;
    while (true) {
      for (const owner of view.ownersOf(dirname)) {
        if (author && owner === author) continue;
        let owned = candidates.get(owner);
        if (!owned) {
          owned = [];
          candidates.set(owner, owned);
        }
        if (!owned.some((el) => el.dir === currentDir)) {
          owned.push({ dir: currentDir, distance });
        }
      }
      if (view.isStopBoundary(dirname)) break;
      dirname = view.parentOf(dirname);
      distance++;
    }
  }
  return candidates;
}

/**
 * Cost of each candidate over the still-uncovered directories it owns:
 * total distance / count^COVERAGE_EXPONENT. Candidates owning none of
 * `dirs` are left out.
 */
export function totalCostsByOwner(
  candidates: CandidateMap,
  dirs: ReadonlySet<PathGlob>,
): Map<Identity, number> {
  const costs = new Map<Identity, number>();
  for (const [owner, owned] of candidates) {
    let totalDistance = 0;
    let numDirectoriesOwned = 0;
    for (const { dir, distance } of owned) {
      if (dirs.has(dir)) {
        totalDistance += distance;
        numDirectoriesOwned++;
      }
    }
    if (numDirectoriesOwned > 0) {
      costs.set(owner, totalDistance / Math.pow(numDirectoriesOwned, COVERAGE_EXPONENT));
    }
  }
  return costs;
}

export function lowestCostOwnerWithAlternates(
  candidates: CandidateMap,
  dirs: ReadonlySet<PathGlob>,
  tieBreaker: TieBreaker = randomTieBreaker,
): { primary: Identity; alternates: Set<Identity> } {
  const costs = totalCostsByOwner(candidates, dirs);
  assert(costs.size > 0, `No more owners for dirs ${[...dirs].join(", ")}`);

  const lowestCost = Math.min(...costs.values());
  const tied = [...costs].filter(([, cost]) => cost === lowestCost).map(([owner]) => owner);
  const primary = tieBreaker(tied);
  assert(tied.includes(primary), `tie breaker returned non-candidate ${primary}`);

  return { primary, alternates: new Set(tied.filter((owner) => owner !== primary)) };
}

export function lowestCostOwner(
  candidates: CandidateMap,
  dirs: ReadonlySet<PathGlob>,
  tieBreaker: TieBreaker = randomTieBreaker,
): Identity {
  return lowestCostOwnerWithAlternates(candidates, dirs, tieBreaker).primary;
}

function ownedDirs(candidates: CandidateMap, owner: Identity): Set<PathGlob> {
  return new Set((candidates.get(owner) ?? []).map((el) => el.dir));
}

/**
 * Weighted greedy set cover: group files by their innermost owned
 * directory, then repeatedly assign the cheapest owner every uncovered
 * directory it owns until nothing is left.
 */
export function coveringSetOfOwners(
  files: readonly string[],
  author: Identity | undefined,
  view: OwnershipView,
  tieBreaker: TieBreaker = randomTieBreaker,
): ReviewerSet {
  const dirsToFiles = new Map<PathGlob, string[]>();
  for (const file of files) {
    const dir = view.innermostOwnedAncestor(file);
    let grouped = dirsToFiles.get(dir);
    if (!grouped) {
      grouped = [];
      dirsToFiles.set(dir, grouped);
    }
    grouped.push(file);
  }

  const dirsRemaining = new Set(dirsToFiles.keys());
  const candidates = allPossibleOwners(dirsRemaining, author, view);
  const suggested = new ReviewerSet();

  while (dirsRemaining.size > 0) {
    const { primary, alternates } = lowestCostOwnerWithAlternates(
      candidates,
      dirsRemaining,
      tieBreaker,
    );

    const assigned = [...ownedDirs(candidates, primary)].filter((d) => dirsRemaining.has(d));
    for (const dir of assigned) {
      suggested.add(primary, dir, dirsToFiles.get(dir) ?? [], view.mostSpecificComment(primary, dir));
    }

    // An alternate must be able to take over everything the primary reviews.
    const reviewDirs = suggested.getReviewDirs(primary);
    const finalAlternates = [...alternates].filter((alternate) => {
      const altDirs = ownedDirs(candidates, alternate);
      return [...reviewDirs].every((d) => altDirs.has(d));
    });
    suggested.addAlternates(primary, finalAlternates);

    for (const dir of assigned) dirsRemaining.delete(dir);
  }

  return suggested;
}
