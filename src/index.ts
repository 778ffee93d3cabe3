export { Database, newDatabase } from "./database.js";
export type { DatabaseOptions } from "./database.js";
export { nodeFileOpener, posixPathOps } from "./host.js";
export type { FileOpener, PathOps } from "./host.js";
export { parseOwners, parseOwnersContent } from "./parser.js";
export type { ParseOptions } from "./parser.js";
export { OwnershipIndex } from "./ownershipIndex.js";
export { ReviewerSet } from "./reviewerSet.js";
export type { ReviewerAssignment, ReviewerAssignmentJson } from "./reviewerSet.js";
export {
  COVERAGE_EXPONENT,
  allPossibleOwners,
  coveringSetOfOwners,
  lowestCostOwner,
  lowestCostOwnerWithAlternates,
  randomTieBreaker,
  stableTieBreaker,
  totalCostsByOwner,
} from "./solver.js";
export type { CandidateMap, OwnedDir, OwnershipView, TieBreaker } from "./solver.js";
export { renderJson, renderText, renderUncovered } from "./renderer.js";
export {
  ANYONE,
  BASIC_EMAIL_REGEXP,
  DEFAULT_OWNERS_FILE,
  EVERYONE,
  OwnersSyntaxError,
} from "./types.js";
export type {
  Directive,
  GrantDirective,
  Identity,
  IncludeDirective,
  NoParentDirective,
  ParsedDirective,
  PathGlob,
  PerFileDirective,
  ScopedDirective,
} from "./types.js";
