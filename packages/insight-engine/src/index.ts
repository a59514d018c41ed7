import {
  compareTimestamps,
  ownNumber,
  type ArchetypeCatalog,
  type NotebookRecord,
  type PersonaAssignment,
  type TimelineBucket,
  type UserFeatureVector,
  type UserProfileSummary
} from "@persona/contracts";
import { busiestPeriod } from "@persona/timeline-aggregator";

const RECOMMENDATION_LIMIT = 3;

export type ProfileInput = {
  records: readonly NotebookRecord[];
  features: UserFeatureVector;
  timeline: readonly TimelineBucket[];
  assignment?: PersonaAssignment;
};

export class InsightEngine {
  constructor(private readonly catalog: ArchetypeCatalog) {}

  summarize({ records, features, timeline, assignment }: ProfileInput): UserProfileSummary {
    const lengths = records.flatMap((rec) => (rec.cellCount === undefined ? [] : [rec.cellCount]));
    const top = this.mostVoted(records);
    return {
      userId: features.userId,
      totalNotebooks: features.totalNotebooks,
      totalVotes: features.totalVotes,
      totalViews: records.reduce((sum, rec) => sum + (rec.views ?? 0), 0),
      totalForks: features.totalForks,
      mostVotedNotebook: top ? { notebookId: top.notebookId, title: top.title ?? null, votes: top.votes } : null,
      mostActiveMonth: busiestPeriod(timeline)?.period ?? null,
      averageNotebookLength: lengths.length ? lengths.reduce((a, b) => a + b, 0) / lengths.length : null,
      medals: {
        gold: records.filter((rec) => rec.medal === "gold").length,
        silver: records.filter((rec) => rec.medal === "silver").length,
        bronze: records.filter((rec) => rec.medal === "bronze").length
      },
      topicShares: this.topicShares(features),
      recommendedTopics: this.recommendTopics(features, assignment)
    };
  }

  private mostVoted(records: readonly NotebookRecord[]): NotebookRecord | undefined {
    return [...records].sort(
      (a, b) =>
        b.votes - a.votes ||
        compareTimestamps(a.createdAt, b.createdAt) ||
        (a.notebookId < b.notebookId ? -1 : a.notebookId > b.notebookId ? 1 : 0)
    )[0];
  }

  private topicShares(features: UserFeatureVector): Record<string, number> {
    return Object.fromEntries(
      Object.entries(features.categoryRatios).map(([tag, ratio]) => [tag, Math.round(ratio * 10_000) / 100])
    );
  }

  /**
   * Catalog topics the user has not written about yet, the ones their persona
   * weighs most first.
   */
  private recommendTopics(features: UserFeatureVector, assignment?: PersonaAssignment): string[] {
    const persona = this.catalog.archetypes.find((archetype) => archetype.label === assignment?.persona);
    const weightOf = (tag: string) => (persona ? ownNumber(persona.weights, tag) : 0);
    return this.catalog.vocabulary
      .filter((tag) => !Object.hasOwn(features.categoryCounts, tag))
      .sort((a, b) => weightOf(b) - weightOf(a) || (a < b ? -1 : a > b ? 1 : 0))
      .slice(0, RECOMMENDATION_LIMIT);
  }
}
