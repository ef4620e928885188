import { describe, expect, it } from "vitest";
import { applyExcludes, buildBuckets, stableBucketKey } from "../buckets";
import type { ResolvedOwnership } from "../types";

function resolved(path: string, owners: string[], pattern?: string): ResolvedOwnership {
  return {
    path,
    owners,
    rule: pattern ? { index: 0, pattern, source: "CODEOWNERS", line: 1 } : null,
    declaredOwners: owners,
    diagnostics: []
  };
}

describe("applyExcludes", () => {
  it("drops paths matching any exclude glob", () => {
    expect(applyExcludes(["src/a.ts", "dist/a.js", "README.md"], ["dist/**"])).toEqual(["src/a.ts", "README.md"]);
  });

  it("matches dotfiles", () => {
    expect(applyExcludes([".env", "a"], ["*"])).toEqual([]);
  });

  it("returns a copy when there is nothing to exclude", () => {
    const files = ["a"];
    expect(applyExcludes(files, [])).toEqual(["a"]);
    expect(applyExcludes(files, [])).not.toBe(files);
  });
});

describe("stableBucketKey", () => {
  it("sorts owners and strips separators", () => {
    expect(stableBucketKey(["@org/web", "@a"], "__UNOWNED__")).toBe("a|org-web");
  });

  it("uses the unowned key for an empty owner set", () => {
    expect(stableBucketKey([], "__UNOWNED__")).toBe("__UNOWNED__");
  });
});

describe("buildBuckets", () => {
  const results = [
    resolved("a.go", ["@b"], "*.go"),
    resolved("b.txt", []),
    resolved("c.go", ["@b"], "*.go"),
    resolved("d.md", ["@b", "@a"], "*.md")
  ];

  it("groups paths sharing an owner set", () => {
    expect(buildBuckets(results, true, "zz-unowned")).toEqual([
      { key: "a|b", owners: ["@a", "@b"], files: [{ file: "d.md", owners: ["@a", "@b"], rule: "*.md" }] },
      {
        key: "b",
        owners: ["@b"],
        files: [
          { file: "a.go", owners: ["@b"], rule: "*.go" },
          { file: "c.go", owners: ["@b"], rule: "*.go" }
        ]
      },
      { key: "zz-unowned", owners: [], files: [{ file: "b.txt", owners: [], rule: undefined }] }
    ]);
  });

  it("can leave unowned paths out", () => {
    expect(buildBuckets(results, false, "zz-unowned").map((b) => b.key)).toEqual(["a|b", "b"]);
  });
});
