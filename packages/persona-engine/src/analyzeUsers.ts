import type {
  ArchetypeCatalog,
  NotebookRecord,
  PersonaAssignment,
  PrecomputedPersona,
  TimelineBucket,
  UserProfileSummary
} from "@persona/contracts";
import { extractFeatures, parsePrecomputedPersonas } from "@persona/feature-extractor";
import { scorePersona } from "@persona/persona-scorer";
import { aggregateTimeline } from "@persona/timeline-aggregator";
import { InsightEngine } from "@persona/insight-engine";

export type UserErrorDecision = "skip" | "throw";
export type UserErrorPolicy = (userId: string, error: unknown) => UserErrorDecision;

export type AnalyzeUsersInput = {
  records: readonly NotebookRecord[];
  catalog: ArchetypeCatalog;
  precomputed?: readonly PrecomputedPersona[];
  onUserError?: UserErrorPolicy;
};

export type SkippedUser = {
  userId: string;
  error: unknown;
};

export type AnalysisResult = {
  assignments: Map<string, PersonaAssignment>;
  timelines: Map<string, TimelineBucket[]>;
  profiles: Map<string, UserProfileSummary>;
  skipped: SkippedUser[];
};

const rethrow: UserErrorPolicy = () => "throw";

export function groupByUser(records: readonly NotebookRecord[]): Map<string, NotebookRecord[]> {
  const groups = new Map<string, NotebookRecord[]>();
  for (const record of records) {
    const list = groups.get(record.userId) ?? [];
    list.push(record);
    groups.set(record.userId, list);
  }
  return groups;
}

function fromPrecomputed(row: PrecomputedPersona): PersonaAssignment {
  return {
    userId: row.userId,
    persona: row.persona.trim(),
    confidence: row.confidence ?? null,
    topFeatures: row.topFeatures ?? [],
    source: "precomputed"
  };
}

/**
 * Runs extraction, scoring and timeline aggregation for every user in the
 * batch. Users in the precomputed table keep their stored persona and bypass
 * the scorer. Per-user failures go to `onUserError`; the default re-throws.
 */
export function analyzeUsers({ records, catalog, precomputed = [], onUserError = rethrow }: AnalyzeUsersInput): AnalysisResult {
  const table = parsePrecomputedPersonas(precomputed);
  const groups = groupByUser(records);
  const insights = new InsightEngine(catalog);
  const result: AnalysisResult = {
    assignments: new Map(),
    timelines: new Map(),
    profiles: new Map(),
    skipped: []
  };

  for (const [userId, userRecords] of groups) {
    try {
      const features = extractFeatures(userRecords);
      const timeline = aggregateTimeline(userRecords);
      const stored = table.get(userId);
      const assignment = stored ? fromPrecomputed(stored) : scorePersona(features, catalog);
      result.assignments.set(userId, assignment);
      result.timelines.set(userId, timeline);
      result.profiles.set(userId, insights.summarize({ records: userRecords, features, timeline, assignment }));
    } catch (err) {
      if (onUserError(userId, err) === "throw") throw err;
      result.skipped.push({ userId, error: err });
    }
  }

  for (const [userId, row] of table) {
    if (groups.has(userId)) continue;
    result.assignments.set(userId, fromPrecomputed(row));
    result.timelines.set(userId, []);
  }

  return result;
}
