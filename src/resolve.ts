import { ownersForFile } from "./codeowners";
import { createMembershipContext, expandOwner } from "./membership";
import type { MembershipContext } from "./membership";
import { PathError, normalizePath } from "./pattern";
import type { NormalizedPath } from "./pattern";
import { OwnersError } from "./types";
import type { Diagnostic, MembershipLookup, Owner, ResolvedOwnership, RuleSet } from "./types";

export type ResolveOptions = {
  /** Required unless `expandTeams` is false. */
  membership?: MembershipLookup;
  /** When false, team owners are returned as declared. Defaults to true. */
  expandTeams?: boolean;
  maxDepth?: number;
  signal?: AbortSignal;
};

async function resolveOne(ruleSet: RuleSet, raw: string, ctx: MembershipContext | undefined): Promise<ResolvedOwnership> {
  let path: NormalizedPath;
  try {
    path = normalizePath(raw);
  } catch (e) {
    if (!(e instanceof PathError)) throw e;
    return {
      path: raw,
      owners: [],
      rule: null,
      declaredOwners: [],
      diagnostics: [{ kind: "InvalidPath", path: raw, message: e.message }]
    };
  }

  const { owners, rule } = ownersForFile(path, ruleSet);
  if (!rule) return { path: path.path, owners: [], rule: null, declaredOwners: [], diagnostics: [] };

  const declaredOwners = owners.map((o) => o.id);
  const resolved = new Set<Owner>();
  const diagnostics: Diagnostic[] = [];

  if (!ctx) {
    declaredOwners.forEach((o) => resolved.add(o));
  } else {
    const expansions = await Promise.all(owners.map((o) => expandOwner(o, ctx)));
    for (const x of expansions) {
      x.members.forEach((m) => resolved.add(m));
      diagnostics.push(...x.diagnostics);
    }
  }

  return {
    path: path.path,
    owners: [...resolved].sort(),
    rule: { index: rule.index, pattern: rule.pattern.text, source: rule.source, line: rule.line },
    declaredOwners,
    diagnostics
  };
}

/**
 * Resolves each path against the rule set with last-match-wins precedence.
 *
 * The returned map is keyed by the caller's path strings in input order.
 * Every path shares one membership context, so a team is looked up at most
 * once per call. If `signal` aborts, the promise rejects and no partial map
 * is returned.
 */
export async function resolveOwners(
  ruleSet: RuleSet,
  paths: readonly string[],
  options: ResolveOptions = {}
): Promise<Map<string, ResolvedOwnership>> {
  const expandTeams = options.expandTeams ?? true;
  if (expandTeams && !options.membership) {
    throw new OwnersError("Team expansion requires a membership lookup");
  }
  options.signal?.throwIfAborted();

  const ctx =
    expandTeams && options.membership
      ? createMembershipContext(options.membership, { maxDepth: options.maxDepth, signal: options.signal })
      : undefined;

  const unique = [...new Set(paths)];
  const results = await Promise.all(unique.map((p) => resolveOne(ruleSet, p, ctx)));
  options.signal?.throwIfAborted();

  return new Map(unique.map((p, i) => [p, results[i]]));
}
