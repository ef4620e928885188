import { Octokit } from "octokit";
import { TtlCache } from "./cache";
import { parseOwnerToken } from "./codeowners";
import type { DeclarationFetcher, Logger, MembershipLookup, OwnershipDeclarationSource, RepoRef } from "./types";

export type GitHubClient = DeclarationFetcher &
  MembershipLookup & {
    fileExists: (repo: RepoRef, ref: string, path: string, signal?: AbortSignal) => Promise<boolean>;
    defaultBranch: (repo: RepoRef, signal?: AbortSignal) => Promise<string>;
    clearCaches: () => void;
  };

export function getOctokit(token?: string) {
  // anonymous access still works for public repositories
  return new Octokit(token ? { auth: token } : {});
}

export async function getDefaultBranch(octokit: Octokit, repo: RepoRef, signal?: AbortSignal): Promise<string> {
  const res = await octokit.rest.repos.get({ owner: repo.owner, repo: repo.repo, request: { signal } });
  return res.data.default_branch;
}

function hasStatus(e: unknown, status: number) {
  return e instanceof Error && "status" in e && e.status === status;
}

export function createGitHubClient(params: {
  octokit: Octokit;
  cacheTtlMs: number;
  logger: Logger;
  now?: () => number;
}): GitHubClient {
  const { octokit, cacheTtlMs, logger, now } = params;
  const declarations = new TtlCache<OwnershipDeclarationSource | null>(cacheTtlMs, now);
  const teams = new TtlCache<string[] | null>(cacheTtlMs, now);
  const branches = new TtlCache<string>(cacheTtlMs, now);

  async function fetchDeclaration(repo: RepoRef, ref: string, path: string, signal?: AbortSignal) {
    const key = `${repo.owner}/${repo.repo}@${ref}:${path}`;
    const fresh = declarations.get(key);
    if (fresh !== undefined) {
      logger.debug(`Cache hit for ${key}`);
      return fresh;
    }

    const stale = declarations.peek(key);
    logger.debug(`Fetching ${path} from ${repo.owner}/${repo.repo}@${ref}`);
    try {
      const res = await octokit.rest.repos.getContent({
        owner: repo.owner,
        repo: repo.repo,
        path,
        ref,
        headers: stale?.etag ? { "if-none-match": stale.etag } : {},
        request: { signal }
      });
      if (Array.isArray(res.data) || res.data.type !== "file") {
        declarations.set(key, null);
        return null;
      }
      const source = { path, content: Buffer.from(res.data.content, "base64").toString("utf8") };
      declarations.set(key, source, res.headers.etag);
      return source;
    } catch (e) {
      if (hasStatus(e, 304) && stale) {
        logger.debug(`${key} not modified (304)`);
        return declarations.touch(key) ?? null;
      }
      if (hasStatus(e, 404)) {
        declarations.set(key, null);
        return null;
      }
      throw e;
    }
  }

  async function members(team: string, signal?: AbortSignal) {
    const ref = parseOwnerToken(team);
    if (ref?.kind !== "team") return null;

    const fresh = teams.get(team);
    if (fresh !== undefined) return fresh;

    logger.debug(`Listing members of ${team}`);
    try {
      const [users, children] = await Promise.all([
        octokit.paginate(octokit.rest.teams.listMembersInOrg, {
          org: ref.org,
          team_slug: ref.slug,
          per_page: 100,
          request: { signal }
        }),
        octokit.paginate(octokit.rest.teams.listChildInOrg, {
          org: ref.org,
          team_slug: ref.slug,
          per_page: 100,
          request: { signal }
        })
      ]);
      const out = [...users.map((u) => `@${u.login}`), ...children.map((c) => `@${ref.org}/${c.slug}`)];
      teams.set(team, out);
      return out;
    } catch (e) {
      if (hasStatus(e, 404)) {
        teams.set(team, null);
        return null;
      }
      throw e;
    }
  }

  async function fileExists(repo: RepoRef, ref: string, path: string, signal?: AbortSignal) {
    logger.debug(`Checking if ${path} exists in ${repo.owner}/${repo.repo}@${ref}`);
    try {
      await octokit.rest.repos.getContent({ owner: repo.owner, repo: repo.repo, path, ref, request: { signal } });
      return true;
    } catch (e) {
      if (hasStatus(e, 404)) return false;
      throw e;
    }
  }

  async function defaultBranch(repo: RepoRef, signal?: AbortSignal) {
    const key = `${repo.owner}/${repo.repo}`;
    const cached = branches.get(key);
    if (cached !== undefined) return cached;
    const branch = await getDefaultBranch(octokit, repo, signal);
    branches.set(key, branch);
    return branch;
  }

  return {
    fetchDeclaration,
    members,
    fileExists,
    defaultBranch,
    clearCaches: () => {
      declarations.clear();
      teams.clear();
      branches.clear();
    }
  };
}
