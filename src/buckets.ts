import { minimatch } from "minimatch";
import type { Bucket, BucketFile, Owner, ResolvedOwnership } from "./types";

export function applyExcludes(files: readonly string[], excludePatterns: readonly string[]): string[] {
  if (!excludePatterns.length) return [...files];
  return files.filter((f) => !excludePatterns.some((p) => minimatch(f.replace(/\\/g, "/"), p, { dot: true })));
}

function ownersKey(owners: Owner[]) {
  return owners.slice().sort().join("|");
}

export function stableBucketKey(owners: Owner[], unownedKey: string) {
  if (!owners.length) return unownedKey;
  return ownersKey(owners).replaceAll("@", "").replaceAll("/", "-").replaceAll(" ", "");
}

/** Groups resolved paths by their exact owner set; buckets come back sorted by key. */
export function buildBuckets(
  resolved: Iterable<ResolvedOwnership>,
  includeUnowned: boolean,
  unownedKey: string
): Bucket[] {
  const buckets = new Map<string, Bucket>();

  for (const r of resolved) {
    const owners = r.owners.slice().sort();
    const isUnowned = owners.length === 0;
    if (isUnowned && !includeUnowned) continue;

    const key = stableBucketKey(owners, unownedKey);
    const bf: BucketFile = { file: r.path, owners, rule: r.rule?.pattern };

    const existing = buckets.get(key);
    if (!existing) {
      buckets.set(key, { key, owners, files: [bf] });
    } else {
      existing.files.push(bf);
    }
  }

  return [...buckets.values()].sort((a, b) => a.key.localeCompare(b.key));
}
