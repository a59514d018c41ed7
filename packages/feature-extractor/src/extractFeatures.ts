import {
  InvalidInputError,
  NotebookRecordSchema,
  UNCATEGORIZED_TAG,
  compareTimestamps,
  monthIndex,
  periodOf,
  tally,
  type NotebookRecord,
  type UserFeatureVector
} from "@persona/contracts";

/**
 * The tag a record is counted under. Only the first non-blank tag counts, so
 * every record lands in exactly one bucket.
 */
export function primaryTag(record: NotebookRecord): string {
  const tag = record.tags.find((t) => t.trim().length > 0);
  return tag ? tag.trim() : UNCATEGORIZED_TAG;
}

export function assertSingleUser(records: readonly NotebookRecord[]): string {
  if (records.length === 0) {
    throw new InvalidInputError("Feature extraction needs at least one notebook record");
  }
  const userId = records[0].userId;
  const strangers = records.filter((record) => record.userId !== userId);
  if (strangers.length) {
    throw new InvalidInputError(`Records mix users: expected only ${userId}`, {
      userIds: [userId, ...new Set(strangers.map((record) => record.userId))]
    });
  }
  return userId;
}

function assertWellFormed(records: readonly NotebookRecord[]) {
  records.forEach((record, idx) => {
    const parsed = NotebookRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new InvalidInputError(`Notebook record ${idx} for user ${record.userId} is malformed`, {
        row: idx,
        fields: parsed.error.issues.map((issue) => issue.path.join("."))
      });
    }
  });
}

export function extractFeatures(records: readonly NotebookRecord[]): UserFeatureVector {
  const userId = assertSingleUser(records);
  assertWellFormed(records);
  const total = records.length;

  const categoryCounts = tally(records.map(primaryTag));
  const languageCounts = tally(records.map((record) => record.language.trim() || "unknown"));
  let totalVotes = 0;
  let totalForks = 0;
  let first = records[0];
  let last = records[0];
  let minMonth = Number.POSITIVE_INFINITY;
  let maxMonth = Number.NEGATIVE_INFINITY;

  for (const record of records) {
    totalVotes += record.votes;
    totalForks += record.forks;

    if (compareTimestamps(record.createdAt, first.createdAt) < 0) first = record;
    if (compareTimestamps(record.createdAt, last.createdAt) > 0) last = record;

    const month = monthIndex(periodOf(record.createdAt));
    minMonth = Math.min(minMonth, month);
    maxMonth = Math.max(maxMonth, month);
  }

  const categoryRatios = Object.fromEntries(
    Object.entries(categoryCounts).map(([tag, count]) => [tag, count / total])
  );

  return {
    userId,
    totalNotebooks: total,
    categoryCounts,
    categoryRatios,
    totalVotes,
    meanVotes: totalVotes / total,
    totalForks,
    meanForks: totalForks / total,
    activeMonthSpan: maxMonth - minMonth,
    firstActivityAt: first.createdAt,
    lastActivityAt: last.createdAt,
    languageCounts
  };
}
