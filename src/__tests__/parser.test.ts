import { describe, it, expect } from "vitest";
import { parseOwners, parseOwnersContent } from "../parser.js";
import { OwnersSyntaxError } from "../types.js";

const opts = { path: "/repo/OWNERS" };

function catchSyntaxError(fn: () => unknown): OwnersSyntaxError {
  try {
    fn();
  } catch (e) {
    if (e instanceof OwnersSyntaxError) return e;
    throw e;
  }
  throw new Error("expected an OwnersSyntaxError");
}

describe("parseOwnersContent: directives", () => {
  it("parses email grants and the wildcard", () => {
    const parsed = parseOwnersContent("alice@x.com\n*\n", opts);
    expect(parsed).toEqual([
      { directive: { kind: "grant", identity: "alice@x.com" }, lineno: 1, comment: "" },
      { directive: { kind: "grant", identity: "*" }, lineno: 2, comment: "" },
    ]);
  });

  it("trims surrounding whitespace", () => {
    const parsed = parseOwnersContent("   bob+ci@x-y.com   ", opts);
    expect(parsed[0].directive).toEqual({ kind: "grant", identity: "bob+ci@x-y.com" });
  });

  it("parses set noparent", () => {
    const parsed = parseOwnersContent("set noparent", opts);
    expect(parsed[0].directive).toEqual({ kind: "noparent" });
  });

  it("parses file includes", () => {
    const parsed = parseOwnersContent("file://shared/OWNERS\nfile:../common/OWNERS", opts);
    expect(parsed.map((p) => p.directive)).toEqual([
      { kind: "include", target: "//shared/OWNERS" },
      { kind: "include", target: "../common/OWNERS" },
    ]);
  });

  it("parses per-file grants, noparent and includes", () => {
    const parsed = parseOwnersContent(
      [
        "per-file *.md=carol@x.com",
        "per-file *.py = set noparent",
        "per-file BUILD=file://build/OWNERS",
      ].join("\n"),
      opts,
    );
    expect(parsed.map((p) => p.directive)).toEqual([
      { kind: "per-file", glob: "*.md", directive: { kind: "grant", identity: "carol@x.com" } },
      { kind: "per-file", glob: "*.py", directive: { kind: "noparent" } },
      { kind: "per-file", glob: "BUILD", directive: { kind: "include", target: "//build/OWNERS" } },
    ]);
  });

  it("accepts a plain array of lines", () => {
    const parsed = parseOwners(["", "dave@x.com"], opts);
    expect(parsed).toHaveLength(1);
    expect(parsed[0].lineno).toBe(2);
  });
});

describe("parseOwnersContent: comments", () => {
  it("attaches a newline-joined block to a whole-directory grant", () => {
    const parsed = parseOwnersContent("# Core team\n#   owns everything\nalice@x.com", opts);
    expect(parsed[0].comment).toBe("Core team\nowns everything");
  });

  it("attaches a space-joined block to a per-file grant", () => {
    const parsed = parseOwnersContent("# Docs\n# writers\nper-file *.md=carol@x.com", opts);
    expect(parsed[0].comment).toBe("Docs writers");
  });

  it("clears the block on a blank line", () => {
    const parsed = parseOwnersContent("# stale\n\nalice@x.com", opts);
    expect(parsed[0].comment).toBe("");
  });

  it("does not carry a block past the directive it was attached to", () => {
    const parsed = parseOwnersContent("# first\nalice@x.com\nbob@x.com", opts);
    expect(parsed.map((p) => p.comment)).toEqual(["first", ""]);
  });

  it("starts a new block after a directive", () => {
    const parsed = parseOwnersContent("# first\nalice@x.com\n# second\nbob@x.com", opts);
    expect(parsed.map((p) => p.comment)).toEqual(["first", "second"]);
  });
});

describe("parseOwnersContent: syntax errors", () => {
  it("rejects per-file globs containing a path separator", () => {
    const err = catchSyntaxError(() =>
      parseOwnersContent("alice@x.com\nper-file sub/*.md=carol@x.com", opts),
    );
    expect(err.path).toBe("/repo/OWNERS");
    expect(err.lineno).toBe(2);
    expect(err.message).toBe(
      '/repo/OWNERS:2 syntax error: per-file globs cannot span directories or use escapes: "sub/*.md"',
    );
  });

  it("rejects per-file globs containing a backslash", () => {
    const err = catchSyntaxError(() => parseOwnersContent("per-file a\\b=carol@x.com", opts));
    expect(err.msg).toBe('per-file globs cannot span directories or use escapes: "a\\b"');
  });

  it("rejects unknown set options", () => {
    const err = catchSyntaxError(() => parseOwnersContent("\n\nset inherit", opts));
    expect(err.lineno).toBe(3);
    expect(err.msg).toBe('unknown option: "inherit"');
  });

  it("rejects unrecognized lines verbatim", () => {
    const err = catchSyntaxError(() => parseOwnersContent("alice at x.com", opts));
    expect(err.msg).toBe(
      'line is not a "set" directive, file include, "*", or an email address: "alice at x.com"',
    );
  });

  it("rejects unrecognized per-file directives", () => {
    const err = catchSyntaxError(() => parseOwnersContent("per-file *.md=writers", opts));
    expect(err.msg).toBe(
      'per-file line is not a "set" directive, file include, "*", or an email address: "writers"',
    );
  });

  it("honors a custom identity pattern", () => {
    const strict = { path: "/repo/OWNERS", emailPattern: /^[a-z]+@example\.com$/ };
    expect(parseOwnersContent("alice@example.com", strict)).toHaveLength(1);
    expect(() => parseOwnersContent("alice@x.com", strict)).toThrow(OwnersSyntaxError);
  });
});
