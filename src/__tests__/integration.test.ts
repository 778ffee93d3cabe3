import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { Database } from "../database.js";
import { renderText } from "../renderer.js";
import { stableTieBreaker } from "../solver.js";
import { OwnersSyntaxError } from "../types.js";

function writeFile(root: string, rel: string, content: string): void {
  const filePath = path.join(root, rel);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

describe("integration: OWNERS tree on disk", () => {
  let tmpDir: string;
  const files = ["src/ui/button.css", "src/ui/view.ts", "src/core.ts", "README.md"];

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "owners-reviewers-test-"));

    writeFile(tmpDir, "OWNERS", "# Fallback\r\nroot@x.com\r\n");
    writeFile(tmpDir, "src/OWNERS", "set noparent\nbob@x.com\ncarol@x.com\n");
    writeFile(tmpDir, "src/ui/OWNERS", "file://src/OWNERS\nper-file *.css=dana@x.com\n");
    writeFile(tmpDir, "broken/OWNERS", "alice@x.com\nset inherit\n");
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("suggests reviewers covering every file", () => {
    const db = new Database(tmpDir, { tieBreaker: stableTieBreaker });
    const result = db.reviewerAssignmentFor(files);

    expect(result.toJSON()).toEqual([
      {
        reviewer: "bob@x.com",
        dirs: ["src", "src/ui", "src/ui/button.css"],
        alternates: ["carol@x.com"],
        comments: [{ comment: "", files: ["src/core.ts", "src/ui/button.css", "src/ui/view.ts"] }],
      },
      {
        reviewer: "root@x.com",
        dirs: [""],
        alternates: [],
        comments: [{ comment: "Fallback", files: ["README.md"] }],
      },
    ]);
    expect(renderText(result)).toBe(
      [
        "bob@x.com (alternates: carol@x.com)",
        "  src/core.ts",
        "  src/ui/button.css",
        "  src/ui/view.ts",
        "",
        "root@x.com",
        "  # Fallback",
        "  README.md",
      ].join("\n"),
    );
  });

  it("reads each OWNERS file once across queries", () => {
    const db = new Database(tmpDir, { tieBreaker: stableTieBreaker });
    db.reviewersFor(files);
    db.reviewersFor(["src/ui/other.ts"]);
    expect([...db.loadedFiles].map((f) => path.relative(tmpDir, f)).sort()).toEqual([
      "OWNERS",
      "src/OWNERS",
      "src/ui/OWNERS",
    ]);
  });

  it("lists files a per-file owner cannot approve", () => {
    const db = new Database(tmpDir);
    expect(db.filesNotCoveredBy(files, ["dana@x.com"])).toEqual(
      new Set(["src/ui/view.ts", "src/core.ts", "README.md"]),
    );
  });

  it("surfaces syntax errors with the file and line", () => {
    const db = new Database(tmpDir);
    const ownersPath = path.join(tmpDir, "broken/OWNERS");
    expect(() => db.reviewersFor(["broken/x.py"])).toThrow(OwnersSyntaxError);
    expect(() => db.reviewersFor(["broken/x.py"])).toThrow(
      `${ownersPath}:2 syntax error: unknown option: "inherit"`,
    );
  });
});
