export type Owner = string;

export type Logger = {
  debug: (m: string, fields?: Record<string, unknown>) => void;
  info: (m: string, fields?: Record<string, unknown>) => void;
  warn: (m: string, fields?: Record<string, unknown>) => void;
  error: (m: string, fields?: Record<string, unknown>) => void;
};

export type RepoRef = {
  owner: string;
  repo: string;
};

export type OwnershipDeclarationSource = {
  path: string;
  content: string;
};

export type PatternSegment =
  | { type: "literal"; value: string }
  // single-segment wildcard; parts never contain "/"
  | { type: "glob"; parts: GlobPart[] }
  | { type: "globstar" };

export type GlobPart = { type: "text"; value: string } | { type: "star" } | { type: "any" };

export type Pattern = {
  text: string;
  anchored: boolean;
  directoryOnly: boolean;
  /** `docs/*` style: matches entries at that depth only, not their contents. */
  exactDepth: boolean;
  segments: PatternSegment[];
};

export type OwnerRef =
  | { kind: "individual"; id: Owner }
  | { kind: "team"; id: Owner; org: string; slug: string };

export type Rule = {
  index: number;
  pattern: Pattern;
  owners: OwnerRef[];
  source: string;
  line: number;
};

export type RuleSet = {
  readonly rules: readonly Rule[];
  readonly sources: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
};

export type Diagnostic =
  | { kind: "MalformedDeclaration"; source: string; line: number; message: string }
  | { kind: "MembershipCycle"; owner: Owner; cycle: Owner[]; message: string }
  | { kind: "MembershipDepthExceeded"; owner: Owner; depth: number; message: string }
  | { kind: "MembershipLookupFailed"; owner: Owner; team: Owner; message: string }
  | { kind: "InvalidPath"; path: string; message: string };

export type RuleSummary = {
  index: number;
  pattern: string;
  source: string;
  line: number;
};

export type ResolvedOwnership = {
  path: string;
  owners: Owner[];
  rule: RuleSummary | null;
  declaredOwners: Owner[];
  diagnostics: Diagnostic[];
};

/** Direct members of a team, as owner tokens. `null` means the team does not exist. */
export type MembershipLookup = {
  members: (team: Owner, signal?: AbortSignal) => Promise<readonly string[] | null>;
};

export type DeclarationFetcher = {
  fetchDeclaration: (
    repo: RepoRef,
    ref: string,
    path: string,
    signal?: AbortSignal
  ) => Promise<OwnershipDeclarationSource | null>;
};

export type BucketFile = {
  file: string;
  owners: Owner[];
  rule?: string;
};

export type Bucket = {
  key: string;
  owners: Owner[];
  files: BucketFile[];
};

export type TransportKind = "stdio" | "sse" | "streamable-http";

export type ServerConfig = {
  githubToken?: string;
  debug: boolean;
  cacheTtlSecs: number;
  transport: TransportKind;
  host: string;
  port: number;
  maxTeamDepth: number;
  logFormat: "text" | "json";
};

export class OwnersError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OwnersError";
  }
}
