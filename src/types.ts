/**
 * Identity is a reviewer as written in an OWNERS file: either an
 * email-shaped string ("alice@example.com") or EVERYONE.
 */
export type Identity = string;

/**
 * PathGlob is a path relative to the repository root, possibly containing
 * glob characters (per-file keys such as "docs/*.md"). The root is "".
 */
export type PathGlob = string;

/** Present by itself on a line, this means anyone can review. */
export const EVERYONE: Identity = "*";

/** Placeholder reported when the wildcard is the only reviewer chosen. */
export const ANYONE: Identity = "<anyone>";

/** Recognizes "X@Y" identities. Deliberately simplistic. */
export const BASIC_EMAIL_REGEXP = /^[\w\-+%.]+@[\w\-+%.]+$/;

export const DEFAULT_OWNERS_FILE = "OWNERS";

export interface GrantDirective {
  kind: "grant";
  identity: Identity;
}

export interface NoParentDirective {
  kind: "noparent";
}

export interface IncludeDirective {
  kind: "include";
  /** "//a/OWNERS" is relative to the root, anything else to the including file. */
  target: string;
}

/** A directive that may appear on the right-hand side of a per-file line. */
export type ScopedDirective = GrantDirective | NoParentDirective | IncludeDirective;

export interface PerFileDirective {
  kind: "per-file";
  glob: string;
  directive: ScopedDirective;
}

export type Directive = ScopedDirective | PerFileDirective;

/** One directive together with where it came from and the comment block above it. */
export interface ParsedDirective {
  directive: Directive;
  lineno: number;
  comment: string;
}

export class OwnersSyntaxError extends Error {
  constructor(
    readonly path: string,
    readonly lineno: number,
    readonly msg: string,
  ) {
    super(`${path}:${lineno} syntax error: ${msg}`);
    this.name = "OwnersSyntaxError";
  }
}
