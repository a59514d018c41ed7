/**
 * Counts occurrences of each key. The result is built with
 * `Object.fromEntries`, so open-ended keys such as `constructor` or
 * `__proto__` become ordinary own properties.
 */
export function tally(keys: Iterable<string>): Record<string, number> {
  const counts = new Map<string, number>();
  for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1);
  return Object.fromEntries(counts);
}

// Reads a tag-keyed number without falling through to Object.prototype.
export function ownNumber(table: Readonly<Record<string, number>>, key: string): number {
  return Object.hasOwn(table, key) ? table[key] : 0;
}
