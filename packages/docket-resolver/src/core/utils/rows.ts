/**
 * Remove exact duplicates, keeping the first occurrence. Rows come out of
 * the same schema, so their key order matches.
 */
export function dropDuplicateRows<T>(rows: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const row of rows) {
    const identity = JSON.stringify(row);
    if (seen.has(identity)) continue;
    seen.add(identity);
    out.push(row);
  }
  return out;
}
