import { describe, expect, it } from "vitest";
import { mergeSources, ownersForFile, parseCodeowners, parseOwnerToken, scopeRuleSet } from "../codeowners";

const CODEOWNERS = [
  "# Default owners",
  "*       @global-owner",
  "",
  "/build/ @org/build-team  # release tooling",
  "*.js @js-owner @org/web dev@example.com",
  "docs/* @docs bad!token",
  "!negated @x",
  "/src/[ab].ts @x",
  "/empty"
].join("\n");

describe("parseOwnerToken", () => {
  it("tags teams and individuals", () => {
    expect(parseOwnerToken("@acme/web")).toEqual({ kind: "team", id: "@acme/web", org: "acme", slug: "web" });
    expect(parseOwnerToken("@alice")).toEqual({ kind: "individual", id: "@alice" });
    expect(parseOwnerToken("dev@example.com")).toEqual({ kind: "individual", id: "dev@example.com" });
  });

  it.each(["alice", "@acme/", "@/web", "@", "@a/b/c"])("rejects %j", (token) => {
    expect(parseOwnerToken(token)).toBeNull();
  });
});

describe("parseCodeowners", () => {
  const set = parseCodeowners({ path: ".github/CODEOWNERS", content: CODEOWNERS });

  it("keeps declaration order and line numbers", () => {
    expect(set.rules.map((r) => [r.index, r.pattern.text, r.line])).toEqual([
      [0, "*", 2],
      [1, "/build/", 4],
      [2, "*.js", 5],
      [3, "docs/*", 6],
      [4, "/empty", 9]
    ]);
    expect(set.sources).toEqual([".github/CODEOWNERS"]);
  });

  it("stops owners at an inline comment", () => {
    expect(set.rules[1].owners).toEqual([{ kind: "team", id: "@org/build-team", org: "org", slug: "build-team" }]);
  });

  it("accepts users, teams and e-mail addresses", () => {
    expect(set.rules[2].owners.map((o) => `${o.kind}:${o.id}`)).toEqual([
      "individual:@js-owner",
      "team:@org/web",
      "individual:dev@example.com"
    ]);
  });

  it("keeps a rule with no owners", () => {
    expect(set.rules[4].owners).toEqual([]);
  });

  it("drops invalid owners and unparseable lines with a diagnostic each", () => {
    expect(set.rules[3].owners).toEqual([{ kind: "individual", id: "@docs" }]);
    expect(set.diagnostics).toEqual([
      {
        kind: "MalformedDeclaration",
        source: ".github/CODEOWNERS",
        line: 6,
        message: 'Invalid owner "bad!token" for pattern "docs/*"'
      },
      {
        kind: "MalformedDeclaration",
        source: ".github/CODEOWNERS",
        line: 7,
        message: 'Negated patterns are not supported: "!negated"'
      },
      {
        kind: "MalformedDeclaration",
        source: ".github/CODEOWNERS",
        line: 8,
        message: 'Character ranges are not supported: "/src/[ab].ts"'
      }
    ]);
  });

  it("handles CRLF line endings", () => {
    const crlf = parseCodeowners({ path: "CODEOWNERS", content: "* @a\r\n*.go @b\r\n" });
    expect(crlf.rules.map((r) => r.owners.map((o) => o.id))).toEqual([["@a"], ["@b"]]);
  });

  it("returns a frozen rule set", () => {
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.rules)).toBe(true);
  });
});

describe("ownersForFile", () => {
  const set = parseCodeowners({ path: "CODEOWNERS", content: "* @a\n*.go @b\ndocs/my\\ file.md @c" });

  it("returns the last matching rule", () => {
    expect(ownersForFile("cmd/main.go", set).rule?.index).toBe(1);
    expect(ownersForFile("main.txt", set).owners).toEqual([{ kind: "individual", id: "@a" }]);
  });

  it("matches escaped spaces", () => {
    expect(ownersForFile("docs/my file.md", set).rule?.line).toBe(3);
  });

  it("returns no rule when nothing matches", () => {
    expect(ownersForFile("x", parseCodeowners({ path: "CODEOWNERS", content: "" }))).toEqual({ owners: [] });
  });
});

describe("mergeSources", () => {
  it("appends nested sources after the root and re-indexes", () => {
    const root = parseCodeowners({ path: "CODEOWNERS", content: "* @a" });
    const nested = scopeRuleSet(parseCodeowners({ path: "services/CODEOWNERS", content: "*.go @b" }), "services");
    const merged = mergeSources([root, nested]);

    expect(merged.rules.map((r) => [r.index, r.pattern.text, r.source])).toEqual([
      [0, "*", "CODEOWNERS"],
      [1, "/services/**/*.go", "services/CODEOWNERS"]
    ]);
    expect(merged.sources).toEqual(["CODEOWNERS", "services/CODEOWNERS"]);
    expect(ownersForFile("services/x.go", merged).rule?.index).toBe(1);
    expect(ownersForFile("main.go", merged).rule?.index).toBe(0);
  });
});
