import type { ReviewerAssignmentJson, ReviewerSet } from "./reviewerSet.js";

export interface RenderJsonResult {
  reviewers: ReviewerAssignmentJson[];
}

/**
 * Plain-text report: one block per reviewer (sorted), with alternates on
 * the header line and each comment printed above the files it explains.
 */
export function renderText(set: ReviewerSet): string {
  const blocks: string[] = [];
  for (const entry of set.toJSON()) {
    const lines: string[] = [];
    const alternates =
      entry.alternates.length > 0 ? ` (alternates: ${entry.alternates.join(", ")})` : "";
    lines.push(`${entry.reviewer}${alternates}`);

    for (const { comment, files } of entry.comments) {
      if (comment) {
        for (const commentLine of comment.split("\n")) {
          lines.push(`  # ${commentLine}`);
        }
      }
      for (const file of files) {
        lines.push(`  ${file}`);
      }
    }
    blocks.push(lines.join("\n"));
  }
  return blocks.join("\n\n");
}

export function renderJson(set: ReviewerSet): RenderJsonResult {
  return { reviewers: set.toJSON() };
}

export function renderUncovered(files: Iterable<string>): string {
  return [...files].sort().join("\n");
}
