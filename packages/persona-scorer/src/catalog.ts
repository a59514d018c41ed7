import {
  ArchetypeCatalogFileSchema,
  ArchetypeDefinitionSchema,
  ConfigurationError,
  type ArchetypeCatalog,
  type ArchetypeDefinition,
  type PersonaArchetype
} from "@persona/contracts";
import bundledCatalog from "../catalog/archetypes.json";

function magnitudeOf(weights: Record<string, number>): number {
  return Math.sqrt(Object.values(weights).reduce((sum, w) => sum + w * w, 0));
}

function toArchetype(raw: unknown, index: number): PersonaArchetype {
  const parsed = ArchetypeDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Archetype #${index} is malformed: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  const definition: ArchetypeDefinition = parsed.data;
  const label = definition.label.trim();
  for (const [tag, weight] of Object.entries(definition.weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError(`Archetype "${label}" has an invalid weight for "${tag}": ${weight}`, { label, tag });
    }
  }
  const magnitude = magnitudeOf(definition.weights);
  if (magnitude === 0) {
    throw new ConfigurationError(`Archetype "${label}" has no positive weight`, { label });
  }
  return Object.freeze({
    label,
    weights: Object.freeze({ ...definition.weights }),
    magnitude,
    description: definition.description,
    color: definition.color,
    icon: definition.icon
  });
}

/**
 * Validates archetype definitions into an immutable catalog. Catalog order is
 * significant: it decides ties between equally scored archetypes.
 */
export function loadArchetypeCatalog(definitions: readonly unknown[]): ArchetypeCatalog {
  if (!definitions.length) {
    throw new ConfigurationError("Archetype catalog is empty");
  }
  const archetypes = definitions.map((definition, idx) => toArchetype(definition, idx));

  const seen = new Set<string>();
  for (const archetype of archetypes) {
    if (seen.has(archetype.label)) {
      throw new ConfigurationError(`Archetype "${archetype.label}" is defined twice`, { label: archetype.label });
    }
    seen.add(archetype.label);
  }

  const vocabulary = [...new Set(archetypes.flatMap((archetype) => Object.keys(archetype.weights)))].sort();
  return Object.freeze({
    archetypes: Object.freeze(archetypes),
    vocabulary: Object.freeze(vocabulary)
  });
}

/**
 * Parses a catalog document of the form `{ "archetypes": [...] }`.
 */
export function parseArchetypeCatalog(document: unknown): ArchetypeCatalog {
  const parsed = ArchetypeCatalogFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError("Archetype catalog document must hold an \"archetypes\" array");
  }
  return loadArchetypeCatalog(parsed.data.archetypes);
}

export function defaultArchetypeCatalog(): ArchetypeCatalog {
  return parseArchetypeCatalog(bundledCatalog);
}
