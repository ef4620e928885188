import { parseOwnerToken } from "./codeowners";
import type { Diagnostic, MembershipLookup, Owner, OwnerRef } from "./types";

export const DEFAULT_MAX_DEPTH = 10;

type TeamRef = Extract<OwnerRef, { kind: "team" }>;
type LookupResult = { members: readonly string[] } | { error: string };

/**
 * State for one resolution call. Lookups are memoized by team so a batch
 * requests each team at most once; nothing here outlives the call.
 */
export type MembershipContext = {
  lookup: MembershipLookup;
  maxDepth: number;
  signal?: AbortSignal;
  memo: Map<Owner, Promise<LookupResult>>;
};

export type Expansion = {
  members: Set<Owner>;
  diagnostics: Diagnostic[];
};

type TeamExpansion = Expansion & { fatal: boolean };

export function createMembershipContext(
  lookup: MembershipLookup,
  options: { maxDepth?: number; signal?: AbortSignal } = {}
): MembershipContext {
  return {
    lookup,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    signal: options.signal,
    memo: new Map()
  };
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function lookupMembers(ctx: MembershipContext, team: TeamRef): Promise<LookupResult> {
  const cached = ctx.memo.get(team.id);
  if (cached) return cached;

  const pending = ctx.lookup.members(team.id, ctx.signal).then(
    (members): LookupResult => (members === null ? { error: `Team ${team.id} was not found` } : { members }),
    (e: unknown): LookupResult => {
      if (ctx.signal?.aborted) throw e;
      return { error: `Membership lookup for ${team.id} failed: ${describe(e)}` };
    }
  );
  ctx.memo.set(team.id, pending);
  return pending;
}

async function expandTeam(ctx: MembershipContext, team: TeamRef, chain: Owner[], top: Owner): Promise<TeamExpansion> {
  if (chain.includes(team.id)) {
    const cycle = [...chain.slice(chain.indexOf(team.id)), team.id];
    return {
      members: new Set<Owner>(),
      diagnostics: [{ kind: "MembershipCycle", owner: top, cycle, message: `Membership cycle: ${cycle.join(" -> ")}` }],
      fatal: true
    };
  }

  const depth = chain.length + 1;
  if (depth > ctx.maxDepth) {
    return {
      members: new Set<Owner>(),
      diagnostics: [
        {
          kind: "MembershipDepthExceeded",
          owner: top,
          depth,
          message: `Expanding ${top} exceeded the maximum team depth of ${ctx.maxDepth} at ${team.id}`
        }
      ],
      fatal: true
    };
  }

  ctx.signal?.throwIfAborted();
  const res = await lookupMembers(ctx, team);
  ctx.signal?.throwIfAborted();

  if ("error" in res) {
    return {
      members: new Set<Owner>(),
      diagnostics: [{ kind: "MembershipLookupFailed", owner: top, team: team.id, message: res.error }],
      fatal: false
    };
  }

  const next = [...chain, team.id];
  const parts = await Promise.all(
    res.members.map(async (token): Promise<TeamExpansion> => {
      const ref = parseOwnerToken(token);
      if (!ref) {
        return {
          members: new Set<Owner>(),
          diagnostics: [
            {
              kind: "MembershipLookupFailed",
              owner: top,
              team: team.id,
              message: `Unrecognized member "${token}" in ${team.id}`
            }
          ],
          fatal: false
        };
      }
      if (ref.kind === "individual") return { members: new Set([ref.id]), diagnostics: [], fatal: false };
      return expandTeam(ctx, ref, next, top);
    })
  );

  // joined in member order so the result does not depend on lookup timing
  const out: TeamExpansion = { members: new Set<Owner>(), diagnostics: [], fatal: false };
  for (const p of parts) {
    p.members.forEach((m) => out.members.add(m));
    out.diagnostics.push(...p.diagnostics);
    out.fatal = out.fatal || p.fatal;
  }
  return out;
}

/**
 * Expands an owner into individual identities.
 *
 * A cycle or an over-deep nesting anywhere below a team makes that owner
 * contribute nothing; a failed lookup only drops the team that failed.
 */
export async function expandOwner(owner: OwnerRef, ctx: MembershipContext): Promise<Expansion> {
  if (owner.kind === "individual") return { members: new Set([owner.id]), diagnostics: [] };

  const res = await expandTeam(ctx, owner, [], owner.id);
  return { members: res.fatal ? new Set<Owner>() : res.members, diagnostics: res.diagnostics };
}
