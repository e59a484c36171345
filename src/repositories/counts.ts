// src/repositories/counts.ts
import type { CountsBy } from "../domain/types";

/** Grouped counts with every key present, missing groups as 0. */
export function zeroFilledCounts<K extends string>(
  keys: readonly K[],
  rows: Iterable<{ key: string; count: number }>
): CountsBy<K> {
  const totals = new Map<string, number>();
  for (const row of rows) totals.set(row.key, (totals.get(row.key) ?? 0) + row.count);

  return keys.reduce<CountsBy<K>>(
    (counts, key) => ({ ...counts, [key]: totals.get(key) ?? 0 }),
    Object.create(null)
  );
}
