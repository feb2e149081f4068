import { factKey, type FactRow } from "../../types/index.js";

export interface DedupeResult {
  facts: FactRow[];
  /** Natural keys that had more than one candidate row */
  collisions: string[];
  dropped: number;
}

function hasPlayerMetrics(row: FactRow): boolean {
  return row.avgPlayers !== null || row.peakPlayers !== null;
}

function filledFields(row: FactRow): number {
  return Object.values(row).filter((value) => value !== null).length;
}

/**
 * Order of preference between two rows for the same (appid, period):
 * player metrics first, then the more complete row, then a fixed
 * tie-break on the serialized row so the winner never depends on input order.
 */
export function compareFactPreference(a: FactRow, b: FactRow): number {
  const metrics = Number(hasPlayerMetrics(b)) - Number(hasPlayerMetrics(a));
  if (metrics !== 0) {
    return metrics;
  }
  const filled = filledFields(b) - filledFields(a);
  if (filled !== 0) {
    return filled;
  }
  const left = JSON.stringify(a);
  const right = JSON.stringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Keep at most one fact per (appid, period).
 */
export function dedupeFacts(facts: readonly FactRow[]): DedupeResult {
  const winners = new Map<string, FactRow>();
  const collisions = new Set<string>();

  for (const fact of facts) {
    const key = factKey(fact);
    const current = winners.get(key);
    if (current === undefined) {
      winners.set(key, fact);
      continue;
    }
    collisions.add(key);
    if (compareFactPreference(fact, current) < 0) {
      winners.set(key, fact);
    }
  }

  const deduped = [...winners.values()].sort(
    (a, b) => a.appid - b.appid || a.period.localeCompare(b.period)
  );

  return {
    facts: deduped,
    collisions: [...collisions].sort(),
    dropped: facts.length - deduped.length,
  };
}
