/**
 * Merge prompt records from every database into one ordered sequence
 */

import type { PromptRecord } from './types.js';

export interface AggregateOptions {
  /** Collapse records with the same timestamp, content and command type */
  dedupe?: boolean;
}

function dedupeKey(record: PromptRecord): string {
  return JSON.stringify([record.timestamp.getTime(), record.commandType, record.content]);
}

/**
 * Concatenate per-database groups and sort most recent first
 *
 * The sort is stable: records with equal timestamps keep discovery order
 * (by database, then by row). With dedupe, the first of each duplicate set
 * survives.
 */
export function aggregate(
  groups: readonly (readonly PromptRecord[])[],
  options: AggregateOptions = {}
): PromptRecord[] {
  const sorted = groups
    .flat()
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());

  if (!(options.dedupe ?? true)) {
    return sorted;
  }

  const seen = new Set<string>();
  return sorted.filter((record) => {
    const key = dedupeKey(record);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * The workspace owning the most records; the first seen wins ties
 */
export function primaryWorkspace(records: readonly PromptRecord[], fallback = 'unknown'): string {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.workspace, (counts.get(record.workspace) ?? 0) + 1);
  }

  let best = fallback;
  let bestCount = 0;
  for (const [workspace, count] of counts) {
    if (count > bestCount) {
      best = workspace;
      bestCount = count;
    }
  }
  return best;
}
