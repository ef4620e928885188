import { describe, expect, it, vi } from "vitest";
import { parseCodeowners } from "../codeowners";
import { resolveOwners } from "../resolve";
import { OwnersError } from "../types";
import type { MembershipLookup } from "../types";

function rules(content: string) {
  return parseCodeowners({ path: "CODEOWNERS", content });
}

function teams(dir: Record<string, string[]>, delays: Record<string, number> = {}) {
  const members = vi.fn(async (team: string) => {
    const ms = delays[team];
    if (ms) await new Promise((r) => setTimeout(r, ms));
    return dir[team] ?? null;
  });
  const lookup: MembershipLookup = { members };
  return { lookup, members };
}

const none = teams({}).lookup;

describe("resolveOwners", () => {
  it("applies last-match-wins", async () => {
    const res = await resolveOwners(rules("* @a\n*.go @b"), ["main.go", "main.txt"], { membership: none });
    expect(res.get("main.go")?.owners).toEqual(["@b"]);
    expect(res.get("main.go")?.rule?.index).toBe(1);
    expect(res.get("main.txt")?.owners).toEqual(["@a"]);
    expect(res.get("main.txt")?.rule?.index).toBe(0);
  });

  it("distinguishes explicit unassignment from no match", async () => {
    const res = await resolveOwners(rules("* @a\nsecrets/*"), ["secrets/key.pem"], { membership: none });
    expect(res.get("secrets/key.pem")).toEqual({
      path: "secrets/key.pem",
      owners: [],
      rule: { index: 1, pattern: "secrets/*", source: "CODEOWNERS", line: 2 },
      declaredOwners: [],
      diagnostics: []
    });
  });

  it("leaves every path unowned with an empty rule set", async () => {
    const res = await resolveOwners(rules(""), ["any/file.txt"], { membership: none });
    expect(res.get("any/file.txt")).toEqual({
      path: "any/file.txt",
      owners: [],
      rule: null,
      declaredOwners: [],
      diagnostics: []
    });
  });

  it("expands teams and collapses duplicates", async () => {
    const { lookup } = teams({ "@org/team": ["@y", "@x"] });
    const res = await resolveOwners(rules("* @org/team @x"), ["a.txt"], { membership: lookup });
    expect(res.get("a.txt")?.owners).toEqual(["@x", "@y"]);
    expect(res.get("a.txt")?.declaredOwners).toEqual(["@org/team", "@x"]);
  });

  it("drops only the cyclic owner", async () => {
    const { lookup } = teams({ "@org/a": ["@org/b"], "@org/b": ["@org/a"] });
    const r = (await resolveOwners(rules("* @org/a @solo"), ["a.txt"], { membership: lookup })).get("a.txt");
    expect(r?.owners).toEqual(["@solo"]);
    expect(r?.diagnostics.map((d) => d.kind)).toEqual(["MembershipCycle"]);
  });

  it("reports an invalid path without failing the batch", async () => {
    const res = await resolveOwners(rules("* @a"), ["../etc/passwd", "src/a.go"], { membership: none });
    expect(res.get("../etc/passwd")).toEqual({
      path: "../etc/passwd",
      owners: [],
      rule: null,
      declaredOwners: [],
      diagnostics: [
        { kind: "InvalidPath", path: "../etc/passwd", message: 'Path escapes the repository root: "../etc/passwd"' }
      ]
    });
    expect(res.get("src/a.go")?.owners).toEqual(["@a"]);
  });

  it("keys results by the caller's paths in input order", async () => {
    const res = await resolveOwners(rules("* @a"), ["./src/a.go", "README.md", "./src/a.go"], { membership: none });
    expect([...res.keys()]).toEqual(["./src/a.go", "README.md"]);
    expect(res.get("./src/a.go")?.path).toBe("src/a.go");
  });

  it("shares team lookups across a batch", async () => {
    const { lookup, members } = teams({ "@org/team": ["@x"] });
    await resolveOwners(rules("* @org/team"), ["a", "b/c", "d/e/f"], { membership: lookup });
    expect(members).toHaveBeenCalledTimes(1);
  });

  it("is idempotent", async () => {
    const { lookup } = teams({ "@org/team": ["@x", "@org/sub"], "@org/sub": ["@z"] });
    const set = rules("* @org/team\n*.md @docs @org/missing");
    const paths = ["a.go", "README.md", "../bad"];
    const first = await resolveOwners(set, paths, { membership: lookup });
    const second = await resolveOwners(set, paths, { membership: lookup });
    expect(JSON.stringify([...second])).toBe(JSON.stringify([...first]));
  });

  it("orders diagnostics by owner, not by lookup completion", async () => {
    const { lookup } = teams({}, { "@org/slow": 20, "@org/fast": 1 });
    const r = (await resolveOwners(rules("* @org/slow @org/fast"), ["x"], { membership: lookup })).get("x");
    expect(r?.diagnostics.map((d) => (d.kind === "MembershipLookupFailed" ? d.team : d.kind))).toEqual([
      "@org/slow",
      "@org/fast"
    ]);
  });

  it("returns declared owners when team expansion is off", async () => {
    const res = await resolveOwners(rules("* @x @org/team"), ["a"], { expandTeams: false });
    expect(res.get("a")?.owners).toEqual(["@org/team", "@x"]);
  });

  it("requires a membership lookup to expand teams", async () => {
    await expect(resolveOwners(rules("* @a"), ["a"])).rejects.toThrow(OwnersError);
  });

  it("produces no result once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      resolveOwners(rules("* @a"), ["a"], { membership: none, signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
  });

  it("matches anchored and unanchored patterns differently", async () => {
    const anchored = await resolveOwners(rules("/build @root"), ["build", "src/build"], { membership: none });
    expect(anchored.get("build")?.owners).toEqual(["@root"]);
    expect(anchored.get("src/build")?.owners).toEqual([]);

    const floating = await resolveOwners(rules("build @any"), ["build", "src/build"], { membership: none });
    expect(floating.get("build")?.owners).toEqual(["@any"]);
    expect(floating.get("src/build")?.owners).toEqual(["@any"]);
  });
});
