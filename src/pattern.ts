import type { GlobPart, Pattern, PatternSegment } from "./types";

export class PatternError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PatternError";
  }
}

export class PathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathError";
  }
}

export type NormalizedPath = {
  path: string;
  segments: string[];
  isDirectory: boolean;
};

type Unit = { ch: string; escaped: boolean };

function toUnits(text: string): Unit[] {
  const units: Unit[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\" && i + 1 < text.length) {
      units.push({ ch: text[++i], escaped: true });
    } else {
      units.push({ ch, escaped: false });
    }
  }
  return units;
}

function isSlash(u: Unit) {
  return u.ch === "/" && !u.escaped;
}

function compileSegment(units: Unit[], text: string): PatternSegment {
  if (units.length === 2 && units.every((u) => u.ch === "*" && !u.escaped)) {
    return { type: "globstar" };
  }

  const parts: GlobPart[] = [];
  let wild = false;
  for (const u of units) {
    if (!u.escaped && (u.ch === "[" || u.ch === "]")) {
      throw new PatternError(`Character ranges are not supported: "${text}"`);
    }
    if (!u.escaped && u.ch === "*") {
      wild = true;
      // "a**b" inside a segment is just a run of stars
      if (parts.at(-1)?.type !== "star") parts.push({ type: "star" });
    } else if (!u.escaped && u.ch === "?") {
      wild = true;
      parts.push({ type: "any" });
    } else {
      const last = parts.at(-1);
      if (last?.type === "text") last.value += u.ch;
      else parts.push({ type: "text", value: u.ch });
    }
  }

  if (!wild) return { type: "literal", value: units.map((u) => u.ch).join("") };
  return { type: "glob", parts };
}

function collapseGlobstars(segments: PatternSegment[]): PatternSegment[] {
  return segments.filter((s, i) => !(s.type === "globstar" && segments[i - 1]?.type === "globstar"));
}

/**
 * Compiles a CODEOWNERS pattern into path segments.
 *
 * Unanchored patterns get an implicit leading `**` so they match at any depth.
 */
export function compilePattern(text: string): Pattern {
  if (!text) throw new PatternError("Empty pattern");
  if (text.startsWith("!")) throw new PatternError(`Negated patterns are not supported: "${text}"`);

  const units = toUnits(text);
  const anchored = isSlash(units[0]);
  const directoryOnly = units.length > 1 && isSlash(units[units.length - 1]);

  const raw: Unit[][] = [[]];
  for (const u of units) {
    if (isSlash(u)) raw.push([]);
    else raw[raw.length - 1].push(u);
  }

  const compiled = raw.filter((r) => r.length > 0).map((r) => compileSegment(r, text));
  if (!compiled.length) throw new PatternError(`Pattern has no path segments: "${text}"`);

  const exactDepth = !directoryOnly && compiled.length > 1 && compiled[compiled.length - 1].type === "glob";
  const segments = collapseGlobstars(anchored ? compiled : [{ type: "globstar" }, ...compiled]);
  return { text, anchored, directoryOnly, exactDepth, segments };
}

/** Re-roots a pattern declared in a nested CODEOWNERS file onto that file's directory. */
export function rebasePattern(pattern: Pattern, directory: string): Pattern {
  const base = directory.split("/").filter((s) => s && s !== ".");
  if (!base.length) return pattern;
  const prefix: PatternSegment[] = base.map((value) => ({ type: "literal", value }));
  return {
    text: `/${base.join("/")}${pattern.anchored ? "" : "/**"}/${pattern.text.replace(/^\//, "")}`,
    anchored: true,
    directoryOnly: pattern.directoryOnly,
    exactDepth: pattern.exactDepth,
    segments: collapseGlobstars([...prefix, ...pattern.segments])
  };
}

export function normalizePath(raw: string): NormalizedPath {
  if (raw.includes("\0")) throw new PathError(`Path contains a NUL character: ${JSON.stringify(raw)}`);
  const p = raw.replace(/\\/g, "/");
  const segments = p.split("/").filter((s) => s !== "" && s !== ".");
  if (segments.includes("..")) throw new PathError(`Path escapes the repository root: "${raw}"`);
  if (!segments.length) throw new PathError(`Path is empty: "${raw}"`);
  return { path: segments.join("/"), segments, isDirectory: p.endsWith("/") };
}

function matchGlob(parts: GlobPart[], s: string): boolean {
  // row[j]: parts[i..] matches s[j..]
  let next: boolean[] = new Array<boolean>(s.length + 1).fill(false);
  next[s.length] = true;
  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    const row: boolean[] = new Array<boolean>(s.length + 1).fill(false);
    for (let j = s.length; j >= 0; j--) {
      if (part.type === "star") {
        row[j] = next[j] || (j < s.length && row[j + 1]);
      } else if (part.type === "any") {
        row[j] = j < s.length && next[j + 1];
      } else {
        row[j] = s.startsWith(part.value, j) && next[j + part.value.length];
      }
    }
    next = row;
  }
  return next[0];
}

function matchSegment(seg: PatternSegment, s: string): boolean {
  if (seg.type === "literal") return seg.value === s;
  if (seg.type === "glob") return matchGlob(seg.parts, s);
  return true;
}

function matchSegments(pattern: PatternSegment[], path: string[]): boolean {
  const m = pattern.length;
  const n = path.length;
  let next: boolean[] = new Array<boolean>(n + 1).fill(false);
  next[n] = true;
  for (let i = m - 1; i >= 0; i--) {
    const seg = pattern[i];
    const row: boolean[] = new Array<boolean>(n + 1).fill(false);
    for (let j = n; j >= 0; j--) {
      if (seg.type === "globstar") {
        // a trailing "/**" needs at least one segment below the directory
        row[j] = i === m - 1 && m > 1 ? j < n : next[j] || (j < n && row[j + 1]);
      } else {
        row[j] = j < n && matchSegment(seg, path[j]) && next[j + 1];
      }
    }
    next = row;
  }
  return next[0];
}

/** Matches an already-normalized path; a pattern that matches a directory owns everything beneath it. */
export function matchesNormalized(pattern: Pattern, path: NormalizedPath): boolean {
  const { segments } = path;
  if (pattern.exactDepth) return matchSegments(pattern.segments, segments);
  for (let k = 1; k <= segments.length; k++) {
    const isDir = k < segments.length || path.isDirectory;
    if (pattern.directoryOnly && !isDir) continue;
    if (matchSegments(pattern.segments, segments.slice(0, k))) return true;
  }
  return false;
}

export function matches(pattern: Pattern, path: string): boolean {
  let normalized: NormalizedPath;
  try {
    normalized = normalizePath(path);
  } catch (e) {
    if (e instanceof PathError) return false;
    throw e;
  }
  return matchesNormalized(pattern, normalized);
}
