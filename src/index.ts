export { compilePattern, matches, normalizePath, PathError, PatternError } from "./pattern";
export type { NormalizedPath } from "./pattern";
export { CODEOWNERS_LOCATIONS, mergeSources, ownersForFile, parseCodeowners, parseOwnerToken, scopeRuleSet } from "./codeowners";
export { createMembershipContext, DEFAULT_MAX_DEPTH, expandOwner } from "./membership";
export type { Expansion, MembershipContext } from "./membership";
export { resolveOwners } from "./resolve";
export type { ResolveOptions } from "./resolve";
export { applyExcludes, buildBuckets } from "./buckets";
export { DEFAULT_MAX_ENTRIES, TtlCache } from "./cache";
export { createGitHubClient, getOctokit } from "./github";
export type { GitHubClient } from "./github";
export { getCodeownersRules, getFileOwner, getFileOwners, groupPathsByOwners, loadRuleSet } from "./app";
export type { OwnersDeps, RepoQuery } from "./app";
export { createServer } from "./server";
export { createHttpApp, listen, serve } from "./transport";
export type { Listening, Stop } from "./transport";
export { createLogger } from "./logger";
export { loadConfig } from "./config";
export { OwnersError } from "./types";
export type {
  Bucket,
  BucketFile,
  DeclarationFetcher,
  Diagnostic,
  Logger,
  MembershipLookup,
  Owner,
  OwnerRef,
  OwnershipDeclarationSource,
  Pattern,
  PatternSegment,
  RepoRef,
  ResolvedOwnership,
  Rule,
  RuleSet,
  RuleSummary,
  ServerConfig
} from "./types";
