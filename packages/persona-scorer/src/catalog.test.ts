import { ConfigurationError } from "@persona/contracts";
import { defaultArchetypeCatalog, loadArchetypeCatalog, parseArchetypeCatalog } from "./catalog";

describe("loadArchetypeCatalog", () => {
  it("builds a frozen catalog with magnitudes and a sorted vocabulary", () => {
    const catalog = loadArchetypeCatalog([
      { label: "EDA Specialist", weights: { EDA: 3, CV: 4 } },
      { label: " CV Enthusiast ", weights: { CV: 1, NLP: 0 } }
    ]);
    expect(catalog.archetypes.map((a) => a.label)).toEqual(["EDA Specialist", "CV Enthusiast"]);
    expect(catalog.archetypes[0].magnitude).toBe(5);
    expect(catalog.vocabulary).toEqual(["CV", "EDA", "NLP"]);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.archetypes)).toBe(true);
    expect(Object.isFrozen(catalog.archetypes[0].weights)).toBe(true);
  });

  it("rejects an empty catalog", () => {
    expect(() => loadArchetypeCatalog([])).toThrow(ConfigurationError);
  });

  it("rejects negative weights", () => {
    expect(() => loadArchetypeCatalog([{ label: "Odd", weights: { EDA: -0.1 } }])).toThrow(/invalid weight for "EDA"/);
  });

  it("rejects an archetype without any positive weight", () => {
    expect(() => loadArchetypeCatalog([{ label: "Empty", weights: { EDA: 0 } }])).toThrow(/no positive weight/);
    expect(() => loadArchetypeCatalog([{ label: "Empty", weights: {} }])).toThrow(ConfigurationError);
  });

  it("rejects blank and duplicated labels", () => {
    expect(() => loadArchetypeCatalog([{ label: "  ", weights: { EDA: 1 } }])).toThrow(ConfigurationError);
    expect(() =>
      loadArchetypeCatalog([
        { label: "Twin", weights: { EDA: 1 } },
        { label: "Twin", weights: { NLP: 1 } }
      ])
    ).toThrow(/defined twice/);
  });

  it("rejects malformed entries", () => {
    expect(() => loadArchetypeCatalog([{ label: "No weights" }])).toThrow(/Archetype #0 is malformed/);
    expect(() => loadArchetypeCatalog(["EDA"])).toThrow(ConfigurationError);
  });
});

describe("parseArchetypeCatalog", () => {
  it("requires an archetypes array", () => {
    expect(() => parseArchetypeCatalog({})).toThrow(ConfigurationError);
    expect(() => parseArchetypeCatalog({ archetypes: "none" })).toThrow(ConfigurationError);
  });

  it("loads the bundled catalog", () => {
    const catalog = defaultArchetypeCatalog();
    expect(catalog.archetypes.map((a) => a.label)).toEqual([
      "Generalist",
      "NLP Specialist",
      "EDA Specialist",
      "CV Enthusiast",
      "ML Practitioner",
      "DL Researcher",
      "Time-Series Analyst"
    ]);
    expect(catalog.vocabulary).toEqual([
      "Computer Vision",
      "Deep Learning",
      "EDA",
      "Machine Learning",
      "NLP",
      "Other",
      "Time Series"
    ]);
  });
});
