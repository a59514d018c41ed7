import {
  ownNumber,
  type ArchetypeCatalog,
  type PersonaArchetype,
  type PersonaAssignment,
  type TimelineBucket,
  type UserFeatureVector,
  type UserProfileSummary
} from "@persona/contracts";
import { badge } from "./classes";

export const FALLBACK_BADGE_COLOR = "#888888";
const DEFAULT_SEARCH_LIMIT = 10;

export type PersonaBadge = {
  label: string;
  color: string;
  className: string;
};

export type RadarPoint = {
  axis: string;
  value: number;
};

function findArchetype(label: string, catalog: ArchetypeCatalog): PersonaArchetype | undefined {
  const wanted = label.trim();
  return (
    catalog.archetypes.find((archetype) => archetype.label === wanted) ??
    catalog.archetypes.find((archetype) => wanted.includes(archetype.label)) ??
    catalog.archetypes.find((archetype) => (archetype.icon ? wanted.startsWith(archetype.icon) : false))
  );
}

/**
 * Stored persona labels sometimes carry a leading emoji ("📊 EDA Specialist")
 * or a variant name ("📊 EDA-Focused"), so a label that contains an
 * archetype's name or starts with its icon still matches it.
 */
export function personaBadge(label: string, catalog: ArchetypeCatalog): PersonaBadge {
  const archetype = findArchetype(label, catalog);
  return {
    label,
    color: archetype?.color ?? FALLBACK_BADGE_COLOR,
    className: badge({ variant: archetype ? "persona" : "unknown" })
  };
}

export function personaExplainer(label: string, catalog: ArchetypeCatalog): string | null {
  return findArchetype(label, catalog)?.description ?? null;
}

export function radarSeries(features: UserFeatureVector, axes: readonly string[]): RadarPoint[] {
  return axes.map((axis) => ({
    axis,
    value: Math.round(ownNumber(features.categoryRatios, axis) * 10_000) / 100
  }));
}

export function plainLabel(label: string): string {
  return label.replace(/[^\p{L}\p{N}\s]/gu, "").trim();
}

export function personaCardLines(summary: UserProfileSummary, assignment: PersonaAssignment): string[] {
  const top = summary.mostVotedNotebook;
  return [
    "NOTEBOOK PERSONA CARD",
    "",
    `USER ID: ${summary.userId}`,
    `PERSONA: ${plainLabel(assignment.persona)}`,
    `TOP NOTEBOOK: ${top ? `${top.title ?? top.notebookId} (${top.votes} votes)` : "n/a"}`,
    `ACTIVE MONTH: ${summary.mostActiveMonth ?? "n/a"}`,
    `AVG LENGTH: ${summary.averageNotebookLength === null ? "n/a" : `${summary.averageNotebookLength.toFixed(2)} cells`}`,
    `NOTEBOOKS: ${summary.totalNotebooks}`,
    `VIEWS: ${summary.totalViews}`,
    `VOTES: ${summary.totalVotes}`
  ];
}

export function exportUserStats(input: {
  assignment: PersonaAssignment;
  profile?: UserProfileSummary;
  timeline: readonly TimelineBucket[];
}): string {
  return JSON.stringify(
    {
      userId: input.assignment.userId,
      persona: input.assignment.persona,
      confidence: input.assignment.confidence,
      topFeatures: input.assignment.topFeatures,
      profile: input.profile ?? null,
      timeline: input.timeline.map(({ period, count }) => ({ period, count }))
    },
    null,
    2
  );
}

/**
 * Case-insensitive substring search over user ids; a blank term lists the
 * first `limit` ids.
 */
export function filterUserIds(ids: readonly string[], term: string, limit = DEFAULT_SEARCH_LIMIT): string[] {
  const needle = term.trim().toLowerCase();
  const matches = needle ? ids.filter((id) => id.toLowerCase().includes(needle)) : ids;
  return matches.slice(0, limit);
}
