import type { CanonicalValue } from "./canonical";
import { rowKey } from "./canonical";

export type RowMultiset = Map<string, number>;

export function countRows(rows: CanonicalValue[][]): RowMultiset {
  const counts: RowMultiset = new Map();
  for (const row of rows) {
    const key = rowKey(row);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/** Equal as multisets: every row must occur the same number of times on both sides. */
export function multisetEquals(a: CanonicalValue[][], b: CanonicalValue[][]): boolean {
  if (a.length !== b.length) return false;
  const left = countRows(a);
  const right = countRows(b);
  if (left.size !== right.size) return false;
  for (const [key, count] of left) {
    if (right.get(key) !== count) return false;
  }
  return true;
}

/** Size of the multiset intersection (sum over rows of the smaller multiplicity). */
export function multisetOverlap(a: CanonicalValue[][], b: CanonicalValue[][]): number {
  const left = countRows(a);
  const right = countRows(b);
  let overlap = 0;
  for (const [key, count] of left) {
    overlap += Math.min(count, right.get(key) ?? 0);
  }
  return overlap;
}
