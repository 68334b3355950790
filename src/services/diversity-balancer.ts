// Category-balanced selection over a ranked candidate list (greedy round-robin
// with score priority). The globally best candidate always stays first; a
// single-category pool comes back in its original order.
import { primaryCategory, scoreValue, type RankedCandidate } from '@/types/catalog';

export interface BalanceOptions<T> {
  categoryOf: (item: T) => string;
  /**
   * Candidates failing this never claim a diversity slot; they only backfill,
   * in rank order, once qualifying candidates run out.
   */
  isQualifying?: (item: T) => boolean;
}

interface Partition<T> {
  items: { item: T; rank: number }[];
  cursor: number;
  picks: number;
}

/**
 * Picks up to `k` items from `ranked` (best first). At each step the category
 * with the fewest picks so far gives up its best remaining item; ties go to
 * the category whose next item ranks higher globally.
 */
export function balanceByCategory<T>(ranked: readonly T[], k: number, options: BalanceOptions<T>): T[] {
  const limit = Math.min(Math.floor(k), ranked.length);
  if (!(limit > 0)) return [];

  const isQualifying = options.isQualifying ?? (() => true);
  const partitions = new Map<string, Partition<T>>();
  const backfill: T[] = [];

  ranked.forEach((item, rank) => {
    if (!isQualifying(item)) {
      backfill.push(item);
      return;
    }
    const category = options.categoryOf(item);
    let partition = partitions.get(category);
    if (!partition) {
      partition = { items: [], cursor: 0, picks: 0 };
      partitions.set(category, partition);
    }
    partition.items.push({ item, rank });
  });

  const picked: T[] = [];
  while (picked.length < limit) {
    let next: Partition<T> | null = null;
    for (const partition of partitions.values()) {
      if (partition.cursor >= partition.items.length) continue;
      if (
        next === null ||
        partition.picks < next.picks ||
        (partition.picks === next.picks &&
          partition.items[partition.cursor].rank < next.items[next.cursor].rank)
      ) {
        next = partition;
      }
    }
    if (next === null) break;
    picked.push(next.items[next.cursor].item);
    next.cursor++;
    next.picks++;
  }

  for (const item of backfill) {
    if (picked.length >= limit) break;
    picked.push(item);
  }
  return picked;
}

/** Balances ranked catalog candidates by primary category. */
export function balanceCandidates(
  candidates: readonly RankedCandidate[],
  k: number,
  minScore = 0,
): RankedCandidate[] {
  return balanceByCategory(candidates, k, {
    categoryOf: (c) => primaryCategory(c.record),
    isQualifying: (c) => scoreValue(c.score) > minScore,
  });
}
