import { PatternError, compilePattern, matchesNormalized, normalizePath, rebasePattern } from "./pattern";
import type { NormalizedPath } from "./pattern";
import type { Diagnostic, OwnerRef, OwnershipDeclarationSource, Pattern, Rule, RuleSet } from "./types";

const TEAM_RE = /^@([A-Za-z0-9][A-Za-z0-9-]*)\/([A-Za-z0-9][A-Za-z0-9._-]*)$/;
const USER_RE = /^@[A-Za-z0-9][A-Za-z0-9_-]*$/;
const EMAIL_RE = /^[^\s@/]+@[^\s@/]+\.[^\s@/]+$/;

/** Root CODEOWNERS locations in the order GitHub looks them up. */
export const CODEOWNERS_LOCATIONS = [".github/CODEOWNERS", "CODEOWNERS", "docs/CODEOWNERS"] as const;

export function parseOwnerToken(token: string): OwnerRef | null {
  const team = TEAM_RE.exec(token);
  if (team) return { kind: "team", id: token, org: team[1], slug: team[2] };
  if (USER_RE.test(token) || EMAIL_RE.test(token)) return { kind: "individual", id: token };
  return null;
}

// Splits on whitespace that is not escaped with a backslash; escapes are kept for the pattern compiler.
function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let cur = "";
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === "\\" && i + 1 < line.length) {
      cur += ch + line[++i];
    } else if (/\s/.test(ch)) {
      if (cur) tokens.push(cur);
      cur = "";
    } else {
      cur += ch;
    }
  }
  if (cur) tokens.push(cur);
  return tokens;
}

function freeze(rules: Rule[], sources: string[], diagnostics: Diagnostic[]): RuleSet {
  return Object.freeze({
    rules: Object.freeze(rules),
    sources: Object.freeze(sources),
    diagnostics: Object.freeze(diagnostics)
  });
}

export function parseCodeowners(source: OwnershipDeclarationSource): RuleSet {
  const rules: Rule[] = [];
  const diagnostics: Diagnostic[] = [];
  const lines = source.content.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const lineNo = i + 1;
    const line = raw.trim();
    if (!line || line.startsWith("#")) return;

    const [patternText, ...rest] = tokenize(line);
    const malformed = (message: string) =>
      diagnostics.push({ kind: "MalformedDeclaration", source: source.path, line: lineNo, message });

    let pattern: Pattern;
    try {
      pattern = compilePattern(patternText);
    } catch (e) {
      if (!(e instanceof PatternError)) throw e;
      malformed(e.message);
      return;
    }

    const owners: OwnerRef[] = [];
    for (const token of rest) {
      if (token.startsWith("#")) break;
      const owner = parseOwnerToken(token);
      if (owner) owners.push(owner);
      else malformed(`Invalid owner "${token}" for pattern "${patternText}"`);
    }

    rules.push({ index: rules.length, pattern, owners, source: source.path, line: lineNo });
  });

  return freeze(rules, [source.path], diagnostics);
}

/** Concatenates rule sets broadest first; later rules keep winning under last-match-wins. */
export function mergeSources(sets: readonly RuleSet[]): RuleSet {
  const rules: Rule[] = [];
  for (const set of sets) {
    for (const rule of set.rules) rules.push({ ...rule, index: rules.length });
  }
  return freeze(
    rules,
    sets.flatMap((s) => s.sources),
    sets.flatMap((s) => s.diagnostics)
  );
}

export function scopeRuleSet(set: RuleSet, directory: string): RuleSet {
  return freeze(
    set.rules.map((r) => ({ ...r, pattern: rebasePattern(r.pattern, directory) })),
    [...set.sources],
    [...set.diagnostics]
  );
}

export function ownersForFile(file: string | NormalizedPath, ruleSet: RuleSet): { owners: OwnerRef[]; rule?: Rule } {
  const path = typeof file === "string" ? normalizePath(file) : file;
  for (let i = ruleSet.rules.length - 1; i >= 0; i--) {
    const rule = ruleSet.rules[i];
    if (matchesNormalized(rule.pattern, path)) return { owners: rule.owners, rule }; // last wins
  }
  return { owners: [] };
}
