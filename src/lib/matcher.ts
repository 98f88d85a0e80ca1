import { applicationAliases } from "./desktop-entry.js";
import { ProfileError } from "./errors.js";
import type { ApplicationEntry } from "./types.js";

/** Lowest fuzzy score accepted as a match. */
export const FUZZY_THRESHOLD = 0.45;

export interface ScoredEntry {
  entry: ApplicationEntry;
  score: number;
}

function lowerAliases(entry: ApplicationEntry): string[] {
  return applicationAliases(entry).map((alias) => alias.toLowerCase());
}

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }
  return previous[b.length];
}

/** 2·LCS / (|a| + |b|): symmetric, in [0, 1], 1 for identical strings. */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * longestCommonSubsequence(a, b)) / total;
}

export function findExactMatch(query: string, entries: readonly ApplicationEntry[]): ApplicationEntry | undefined {
  return entries.find((entry) => lowerAliases(entry).includes(query));
}

/** Entries with an alias that contains the query, or is contained by it. */
export function findContainmentMatches(query: string, entries: readonly ApplicationEntry[]): ApplicationEntry[] {
  return entries.filter((entry) =>
    lowerAliases(entry).some((alias) => alias.includes(query) || query.includes(alias))
  );
}

/** Best-scoring entry; ties keep the earlier entry. */
export function rankFuzzy(query: string, entries: readonly ApplicationEntry[]): ScoredEntry | undefined {
  let best: ScoredEntry | undefined;
  for (const entry of entries) {
    const score = Math.max(0, ...lowerAliases(entry).map((alias) => similarityRatio(query, alias)));
    if (!best || score > best.score) {
      best = { entry, score };
    }
  }
  return best;
}

/**
 * Resolve free text to one application: exact alias match when `exact`,
 * otherwise a unique containment hit, otherwise the best fuzzy score among
 * the containment hits (or all entries when there are none).
 */
export function matchApplication(
  query: string,
  entries: readonly ApplicationEntry[],
  exact = false,
): ApplicationEntry {
  const normalized = query.trim().toLowerCase();
  if (!normalized) {
    throw new ProfileError("INVALID_INPUT", "App name cannot be empty.");
  }
  if (entries.length === 0) {
    throw new ProfileError("NOT_FOUND", "No desktop apps detected.");
  }

  if (exact) {
    const hit = findExactMatch(normalized, entries);
    if (!hit) {
      throw new ProfileError("NOT_FOUND", `No exact app match for '${query}'.`);
    }
    return hit;
  }

  const contained = findContainmentMatches(normalized, entries);
  if (contained.length === 1) {
    return contained[0];
  }
  const pool = contained.length > 0 ? contained : entries;

  const best = rankFuzzy(normalized, pool);
  if (!best || best.score < FUZZY_THRESHOLD) {
    throw new ProfileError("NOT_FOUND", `No likely app match for '${query}'.`);
  }
  return best.entry;
}
