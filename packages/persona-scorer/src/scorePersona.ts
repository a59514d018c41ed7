import {
  InsufficientDataError,
  ownNumber,
  type ArchetypeCatalog,
  type FeatureContribution,
  type PersonaArchetype,
  type PersonaAssignment,
  type UserFeatureVector
} from "@persona/contracts";

const TOP_FEATURE_LIMIT = 3;

export type ArchetypeScore = {
  label: string;
  score: number;
};

/**
 * Dot product of the user's category ratios with the archetype weights,
 * divided by the archetype's weight magnitude. Tags the archetype does not
 * weight contribute nothing.
 */
export function similarity(ratios: Readonly<Record<string, number>>, archetype: PersonaArchetype): number {
  let dot = 0;
  for (const [tag, ratio] of Object.entries(ratios)) {
    dot += ratio * ownNumber(archetype.weights, tag);
  }
  return dot / archetype.magnitude;
}

function assertActive(features: UserFeatureVector) {
  if (features.totalNotebooks <= 0) {
    throw new InsufficientDataError(`User ${features.userId} has no notebooks to score`, { userId: features.userId });
  }
}

export function scoreAllPersonas(features: UserFeatureVector, catalog: ArchetypeCatalog): ArchetypeScore[] {
  assertActive(features);
  return catalog.archetypes.map((archetype) => ({
    label: archetype.label,
    score: similarity(features.categoryRatios, archetype)
  }));
}

export function topContributions(
  ratios: Readonly<Record<string, number>>,
  archetype: PersonaArchetype,
  limit = TOP_FEATURE_LIMIT
): FeatureContribution[] {
  return Object.entries(ratios)
    .map(([tag, ratio]) => ({ tag, contribution: ratio * ownNumber(archetype.weights, tag) }))
    .sort((a, b) => b.contribution - a.contribution || (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0))
    .slice(0, limit);
}

/**
 * Picks the best matching archetype. Only a strictly higher score displaces
 * the current best, so exact ties resolve to the earlier catalog entry.
 */
export function scorePersona(features: UserFeatureVector, catalog: ArchetypeCatalog): PersonaAssignment {
  const scores = scoreAllPersonas(features, catalog);

  let bestIndex = 0;
  for (let idx = 1; idx < scores.length; idx += 1) {
    if (scores[idx].score > scores[bestIndex].score) bestIndex = idx;
  }
  const winner = catalog.archetypes[bestIndex];

  return {
    userId: features.userId,
    persona: winner.label,
    confidence: Math.max(0, Math.min(1, scores[bestIndex].score)),
    topFeatures: topContributions(features.categoryRatios, winner),
    source: "computed"
  };
}
