import { InvalidInputError, periodOf, type NotebookRecord, type TimelineBucket } from "@persona/contracts";

/**
 * Sparse monthly activity series for one user: only months with at least one
 * notebook appear, ascending by period. Filling gaps for a continuous chart
 * axis is left to the renderer.
 */
export function aggregateTimeline(records: readonly NotebookRecord[]): TimelineBucket[] {
  if (!records.length) return [];
  const userId = records[0].userId;
  const counts = new Map<string, number>();
  for (const record of records) {
    if (record.userId !== userId) {
      throw new InvalidInputError(`Timeline records mix users: ${userId} and ${record.userId}`, {
        userIds: [userId, record.userId]
      });
    }
    const period = periodOf(record.createdAt);
    counts.set(period, (counts.get(period) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([period, count]) => ({ userId, period, count }));
}

export function busiestPeriod(timeline: readonly TimelineBucket[]): TimelineBucket | null {
  let best: TimelineBucket | null = null;
  for (const bucket of timeline) {
    if (!best || bucket.count > best.count) best = bucket;
  }
  return best;
}
