import path from "node:path";
import { applyExcludes, buildBuckets } from "./buckets";
import { CODEOWNERS_LOCATIONS, mergeSources, parseCodeowners, scopeRuleSet } from "./codeowners";
import { PathError, normalizePath } from "./pattern";
import { resolveOwners } from "./resolve";
import { OwnersError } from "./types";
import type {
  Bucket,
  DeclarationFetcher,
  Diagnostic,
  Logger,
  MembershipLookup,
  RepoRef,
  ResolvedOwnership,
  RuleSet
} from "./types";

export type OwnersDeps = {
  github: DeclarationFetcher &
    MembershipLookup & {
      fileExists: (repo: RepoRef, ref: string, path: string, signal?: AbortSignal) => Promise<boolean>;
      defaultBranch: (repo: RepoRef, signal?: AbortSignal) => Promise<string>;
    };
  logger: Logger;
  maxTeamDepth: number;
};

export type RepoQuery = RepoRef & {
  branch?: string;
  /** Nested, directory-scoped CODEOWNERS files merged after the root one. */
  sources?: string[];
};

export type LoadedRules = {
  ref: string;
  ruleSet: RuleSet;
};

function nestedOrder(sources: readonly string[]): string[] {
  const normalized = sources.map((s) => {
    try {
      return normalizePath(s).path;
    } catch (e) {
      if (e instanceof PathError) throw new OwnersError(`Invalid declaration source: ${e.message}`);
      throw e;
    }
  });
  const depth = (p: string) => p.split("/").length;
  // broadest first so more specific files win under last-match-wins
  return [...new Set(normalized)].sort((a, b) => depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0));
}

export async function loadRuleSet(deps: OwnersDeps, query: RepoQuery, signal?: AbortSignal): Promise<LoadedRules> {
  signal?.throwIfAborted();
  const repo = { owner: query.owner, repo: query.repo };
  const ref = query.branch || (await deps.github.defaultBranch(repo, signal));

  let root: RuleSet | undefined;
  for (const loc of CODEOWNERS_LOCATIONS) {
    const src = await deps.github.fetchDeclaration(repo, ref, loc, signal);
    if (src) {
      root = parseCodeowners(src);
      break;
    }
  }
  if (!root) {
    throw new OwnersError(
      `No CODEOWNERS file found in repo '${repo.owner}/${repo.repo}' on branch '${ref}' (looked in ${CODEOWNERS_LOCATIONS.join(", ")}).`
    );
  }

  const sets: RuleSet[] = [root];
  for (const p of nestedOrder(query.sources ?? [])) {
    if (root.sources.includes(p)) continue;
    const src = await deps.github.fetchDeclaration(repo, ref, p, signal);
    if (!src) {
      throw new OwnersError(`Declaration source '${p}' not found in repo '${repo.owner}/${repo.repo}' on branch '${ref}'.`);
    }
    sets.push(scopeRuleSet(parseCodeowners(src), path.posix.dirname(p)));
  }

  const ruleSet = mergeSources(sets);
  deps.logger.debug(`Parsed ${ruleSet.rules.length} rules from ${ruleSet.sources.join(", ")}`);
  if (ruleSet.diagnostics.length) {
    deps.logger.warn(`CODEOWNERS for ${repo.owner}/${repo.repo}@${ref} has ${ruleSet.diagnostics.length} malformed entries`);
  }
  return { ref, ruleSet };
}

export type FileOwnersResult = {
  ref: string;
  sources: string[];
  results: ResolvedOwnership[];
  diagnostics: Diagnostic[];
};

export async function getFileOwners(
  deps: OwnersDeps,
  query: RepoQuery & { paths: string[]; expandTeams?: boolean },
  signal?: AbortSignal
): Promise<FileOwnersResult> {
  const { ref, ruleSet } = await loadRuleSet(deps, query, signal);
  const resolved = await resolveOwners(ruleSet, query.paths, {
    membership: deps.github,
    expandTeams: query.expandTeams ?? true,
    maxDepth: deps.maxTeamDepth,
    signal
  });
  deps.logger.info(`Resolved ${resolved.size} paths in ${query.owner}/${query.repo}@${ref}`);
  return { ref, sources: [...ruleSet.sources], results: [...resolved.values()], diagnostics: [...ruleSet.diagnostics] };
}

/** Declared owners of the winning rule; unowned paths must exist in the repository. */
export async function getFileOwner(
  deps: OwnersDeps,
  query: RepoQuery & { path: string },
  signal?: AbortSignal
): Promise<string[]> {
  const { ref, ruleSet } = await loadRuleSet(deps, query, signal);
  const resolved = await resolveOwners(ruleSet, [query.path], { expandTeams: false });
  const r = resolved.get(query.path);
  const invalid = r?.diagnostics.find((d) => d.kind === "InvalidPath");
  if (!r || invalid) throw new OwnersError(invalid?.message ?? `Could not resolve '${query.path}'`);

  deps.logger.debug(`Owners for ${r.path}: ${r.declaredOwners.join(", ") || "(none)"}`);
  if (r.declaredOwners.length) return r.declaredOwners;

  const repo = { owner: query.owner, repo: query.repo };
  if (!(await deps.github.fileExists(repo, ref, r.path, signal))) {
    throw new OwnersError(`File '${query.path}' not found in repo '${repo.owner}/${repo.repo}' on branch '${ref}'.`);
  }
  return [];
}

export type GroupResult = {
  /** null when every path was excluded and no lookup was made */
  ref: string | null;
  buckets: Bucket[];
  excluded: string[];
};

export async function groupPathsByOwners(
  deps: OwnersDeps,
  query: RepoQuery & { paths: string[]; exclude?: string[]; includeUnowned?: boolean; unownedKey?: string },
  signal?: AbortSignal
): Promise<GroupResult> {
  const kept = applyExcludes(query.paths, query.exclude ?? []);
  const keptSet = new Set(kept);
  const excluded = query.paths.filter((p) => !keptSet.has(p));
  deps.logger.info(`Grouping paths: ${query.paths.length} (after excludes: ${kept.length})`);

  if (!kept.length) return { ref: query.branch ?? null, buckets: [], excluded };

  const { ref, results } = await getFileOwners(deps, { ...query, paths: kept, expandTeams: true }, signal);
  const buckets = buildBuckets(results, query.includeUnowned ?? true, query.unownedKey || "__UNOWNED__");
  return { ref, buckets, excluded };
}

export type RuleListing = {
  ref: string;
  sources: string[];
  rules: Array<{ index: number; pattern: string; owners: string[]; source: string; line: number }>;
  diagnostics: Diagnostic[];
};

export async function getCodeownersRules(deps: OwnersDeps, query: RepoQuery, signal?: AbortSignal): Promise<RuleListing> {
  const { ref, ruleSet } = await loadRuleSet(deps, query, signal);
  return {
    ref,
    sources: [...ruleSet.sources],
    rules: ruleSet.rules.map((r) => ({
      index: r.index,
      pattern: r.pattern.text,
      owners: r.owners.map((o) => o.id),
      source: r.source,
      line: r.line
    })),
    diagnostics: [...ruleSet.diagnostics]
  };
}
