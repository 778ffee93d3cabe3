import type { Identity, PathGlob } from "./types.js";
import { ANYONE, EVERYONE } from "./types.js";

/** What a single chosen reviewer is expected to review. */
export interface ReviewerAssignment {
  /** Comment text → files reviewed under that comment */
  comments: Map<string, string[]>;
  /** Other reviewers who could have been chosen instead */
  alternates: Set<Identity>;
  /** Directories (or per-file keys) under review, any comment */
  dirs: Set<PathGlob>;
}

export interface ReviewerAssignmentJson {
  reviewer: Identity;
  dirs: PathGlob[];
  alternates: Identity[];
  comments: Array<{ comment: string; files: string[] }>;
}

function createAssignment(): ReviewerAssignment {
  return { comments: new Map(), alternates: new Set(), dirs: new Set() };
}

/**
 * The reviewers suggested for one query and what each should review.
 * Built fresh per query.
 */
export class ReviewerSet {
  readonly reviewers = new Map<Identity, ReviewerAssignment>();

  add(primary: Identity, directory: PathGlob, files: readonly string[], comment: string): void {
    const assignment = this.assignmentFor(primary);
    let commented = assignment.comments.get(comment);
    if (!commented) {
      commented = [];
      assignment.comments.set(comment, commented);
    }
    commented.push(...files);
    assignment.dirs.add(directory);
  }

  addAlternates(primary: Identity, alternates: Iterable<Identity>): void {
    const assignment = this.assignmentFor(primary);
    for (const alternate of alternates) assignment.alternates.add(alternate);
  }

  getReviewers(): Identity[] {
    return [...this.reviewers.keys()];
  }

  getReviewDirs(primary: Identity): ReadonlySet<PathGlob> {
    return this.reviewers.get(primary)?.dirs ?? new Set();
  }

  get(primary: Identity): ReviewerAssignment | undefined {
    return this.reviewers.get(primary);
  }

  isEmpty(): boolean {
    return this.reviewers.size === 0;
  }

  /**
   * Fold the wildcard owner: alone it becomes ANYONE, alongside specific
   * reviewers it is dropped.
   */
  reduceEveryone(): void {
    const everyone = this.reviewers.get(EVERYONE);
    if (!everyone) return;
    if (this.reviewers.size === 1) {
      this.reviewers.set(ANYONE, everyone);
    }
    this.reviewers.delete(EVERYONE);
  }

  toJSON(): ReviewerAssignmentJson[] {
    return [...this.reviewers.keys()].sort().map((reviewer) => {
      const assignment = this.assignmentFor(reviewer);
      return {
        reviewer,
        dirs: [...assignment.dirs].sort(),
        alternates: [...assignment.alternates].sort(),
        comments: [...assignment.comments].map(([comment, files]) => ({
          comment,
          files: [...files].sort(),
        })),
      };
    });
  }

  private assignmentFor(primary: Identity): ReviewerAssignment {
    let assignment = this.reviewers.get(primary);
    if (!assignment) {
      assignment = createAssignment();
      this.reviewers.set(primary, assignment);
    }
    return assignment;
  }
}
