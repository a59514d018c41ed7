import { z } from "zod";
import { parseTimestamp } from "./period";

export const UNCATEGORIZED_TAG = "Uncategorized" as const;

/**
 * Shared enums
 */
export const MedalEnum = z.enum(["gold", "silver", "bronze"]);
export const AssignmentSourceEnum = z.enum(["computed", "precomputed"]);

export const TimestampSchema = z
  .string()
  .refine((value) => parseTimestamp(value) !== null, "expected an ISO-8601 date or date-time with a real calendar date");

const CountField = z.number().int().nonnegative();

/**
 * Notebook records
 */
export const NotebookRecordSchema = z.object({
  userId: z.string().min(1),
  notebookId: z.string().min(1),
  createdAt: TimestampSchema,
  tags: z.array(z.string()),
  votes: CountField,
  forks: CountField,
  language: z.string(),
  title: z.string().optional(),
  views: CountField.optional(),
  cellCount: CountField.optional(),
  medal: MedalEnum.optional()
});

const IdField = z.union([z.string().min(1), z.number().int()]).transform((value) => String(value));
const NumericField = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().int().nonnegative());

/**
 * Raw tabular row as it arrives from a dataset or an HTTP payload.
 */
export const RawNotebookRowSchema = z.object({
  userId: IdField,
  notebookId: IdField,
  createdAt: TimestampSchema,
  category: z.union([z.string(), z.array(z.string())]).nullish(),
  votes: NumericField,
  forks: NumericField,
  language: z.string(),
  title: z.string().nullish(),
  views: NumericField.nullish(),
  cellCount: NumericField.nullish(),
  medal: MedalEnum.nullish()
});

/**
 * Feature vectors
 */
export const UserFeatureVectorSchema = z.object({
  userId: z.string(),
  totalNotebooks: CountField,
  categoryCounts: z.record(CountField),
  categoryRatios: z.record(z.number().min(0).max(1)),
  totalVotes: CountField,
  meanVotes: z.number().nonnegative(),
  totalForks: CountField,
  meanForks: z.number().nonnegative(),
  activeMonthSpan: CountField,
  firstActivityAt: z.string().nullable(),
  lastActivityAt: z.string().nullable(),
  languageCounts: z.record(CountField)
});

/**
 * Archetypes
 */
export const ArchetypeDefinitionSchema = z.object({
  label: z.string().trim().min(1),
  weights: z.record(z.number()),
  description: z.string().optional(),
  color: z.string().optional(),
  icon: z.string().optional()
});

// Entries are validated one by one so errors can name the offending archetype.
export const ArchetypeCatalogFileSchema = z.object({
  archetypes: z.array(z.unknown())
});

/**
 * Assignments
 */
export const FeatureContributionSchema = z.object({
  tag: z.string(),
  contribution: z.number()
});

export const PersonaAssignmentSchema = z.object({
  userId: z.string(),
  persona: z.string().min(1),
  confidence: z.number().min(0).max(1).nullable(),
  topFeatures: z.array(FeatureContributionSchema),
  source: AssignmentSourceEnum
});

export const PrecomputedPersonaSchema = z.object({
  userId: IdField,
  persona: z.string().trim().min(1),
  confidence: z.number().min(0).max(1).nullish(),
  topFeatures: z.array(FeatureContributionSchema).nullish()
});

/**
 * Timeline
 */
export const TimelineBucketSchema = z.object({
  userId: z.string(),
  period: z.string().regex(/^\d{4}-\d{2}$/),
  count: z.number().int().positive()
});

/**
 * Profile summary
 */
export const UserProfileSummarySchema = z.object({
  userId: z.string(),
  totalNotebooks: CountField,
  totalVotes: CountField,
  totalViews: CountField,
  totalForks: CountField,
  mostVotedNotebook: z
    .object({
      notebookId: z.string(),
      title: z.string().nullable(),
      votes: CountField
    })
    .nullable(),
  mostActiveMonth: z.string().nullable(),
  averageNotebookLength: z.number().nullable(),
  medals: z.object({
    gold: CountField,
    silver: CountField,
    bronze: CountField
  }),
  topicShares: z.record(z.number()),
  recommendedTopics: z.array(z.string())
});

export type Medal = z.infer<typeof MedalEnum>;
export type AssignmentSource = z.infer<typeof AssignmentSourceEnum>;
export type NotebookRecord = z.infer<typeof NotebookRecordSchema>;
export type RawNotebookRow = z.input<typeof RawNotebookRowSchema>;
export type UserFeatureVector = z.infer<typeof UserFeatureVectorSchema>;
export type ArchetypeDefinition = z.infer<typeof ArchetypeDefinitionSchema>;
export type FeatureContribution = z.infer<typeof FeatureContributionSchema>;
export type PersonaAssignment = z.infer<typeof PersonaAssignmentSchema>;
export type PrecomputedPersona = z.infer<typeof PrecomputedPersonaSchema>;
export type TimelineBucket = z.infer<typeof TimelineBucketSchema>;
export type UserProfileSummary = z.infer<typeof UserProfileSummarySchema>;

export type PersonaArchetype = Readonly<{
  label: string;
  weights: Readonly<Record<string, number>>;
  magnitude: number;
  description?: string;
  color?: string;
  icon?: string;
}>;

export type ArchetypeCatalog = Readonly<{
  archetypes: readonly PersonaArchetype[];
  vocabulary: readonly string[];
}>;

export * from "./errors";
export * from "./period";
export * from "./tally";
export * from "./wire";
