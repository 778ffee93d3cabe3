import type { Directive, ParsedDirective, ScopedDirective } from "./types.js";
import { BASIC_EMAIL_REGEXP, EVERYONE, OwnersSyntaxError } from "./types.js";

export interface ParseOptions {
  /** Path reported in syntax errors. */
  path: string;
  emailPattern?: RegExp;
}

const PER_FILE_RE = /^per-file (.+)=(.+)/;

/**
 * Parse a single directive (the whole line, or the right-hand side of a
 * per-file line). Throws OwnersSyntaxError for anything unrecognized.
 */
function parseScopedDirective(
  text: string,
  lineType: string,
  lineno: number,
  options: ParseOptions,
): ScopedDirective {
  const emailPattern = options.emailPattern ?? BASIC_EMAIL_REGEXP;

  if (text === "set noparent") {
    return { kind: "noparent" };
  }
  if (text.startsWith("file:")) {
    return { kind: "include", target: text.slice("file:".length).trim() };
  }
  if (text === EVERYONE || emailPattern.test(text)) {
    return { kind: "grant", identity: text };
  }
  throw new OwnersSyntaxError(
    options.path,
    lineno,
    `${lineType} is not a "set" directive, file include, "*", or an email address: "${text}"`,
  );
}

/**
 * Parse the lines of one OWNERS file into directives, in file order.
 *
 * A run of "#" lines forms a comment block that is attached to the next
 * directive and then cleared; a blank line clears it without attaching.
 * Whole-directory directives get the block joined with newlines, per-file
 * directives get it joined with spaces.
 */
export function parseOwners(lines: Iterable<string>, options: ParseOptions): ParsedDirective[] {
  const result: ParsedDirective[] = [];
  let comment: string[] = [];
  let inComment = false;
  let lineno = 0;

  for (const rawLine of lines) {
    lineno++;
    const line = rawLine.trim();

    if (line.startsWith("#")) {
      if (!inComment) comment = [];
      comment.push(line.slice(1).trim());
      inComment = true;
      continue;
    }
    inComment = false;

    if (line === "") {
      comment = [];
      continue;
    }

    let directive: Directive;
    let commentText: string;

    const perFile = PER_FILE_RE.exec(line);
    if (line === "set noparent") {
      directive = { kind: "noparent" };
      commentText = comment.join("\n");
    } else if (perFile) {
      const glob = perFile[1].trim();
      if (glob.includes("/") || glob.includes("\\")) {
        throw new OwnersSyntaxError(
          options.path,
          lineno,
          `per-file globs cannot span directories or use escapes: "${glob}"`,
        );
      }
      directive = {
        kind: "per-file",
        glob,
        directive: parseScopedDirective(perFile[2].trim(), "per-file line", lineno, options),
      };
      commentText = comment.join(" ");
    } else if (line.startsWith("set ")) {
      throw new OwnersSyntaxError(
        options.path,
        lineno,
        `unknown option: "${line.slice(4).trim()}"`,
      );
    } else {
      directive = parseScopedDirective(line, "line", lineno, options);
      commentText = comment.join("\n");
    }

    result.push({ directive, lineno, comment: commentText });
    comment = [];
  }

  return result;
}

/**
 * Parse OWNERS file content directly (no file I/O).
 */
export function parseOwnersContent(content: string, options: ParseOptions): ParsedDirective[] {
  return parseOwners(content.split(/\r?\n/), options);
}
