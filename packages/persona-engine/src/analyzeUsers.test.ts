import { InvalidInputError, type NotebookRecord } from "@persona/contracts";
import { defaultArchetypeCatalog } from "@persona/persona-scorer";
import { analyzeUsers, groupByUser } from "./analyzeUsers";

function record(userId: string, notebookId: string, tag: string, createdAt = "2023-04-01T12:00:00Z"): NotebookRecord {
  return { userId, notebookId, createdAt, tags: [tag], votes: 1, forks: 0, language: "Python" };
}

const catalog = defaultArchetypeCatalog();

const records: NotebookRecord[] = [
  record("u1", "n1", "EDA", "2023-01-05T10:00:00Z"),
  record("u2", "n2", "Computer Vision"),
  record("u1", "n3", "EDA", "2023-03-05T10:00:00Z"),
  record("u3", "n4", "NLP"),
  record("u1", "n5", "EDA", "2023-03-09T10:00:00Z"),
  record("u2", "n6", "Computer Vision")
];

describe("groupByUser", () => {
  it("keeps first-appearance order", () => {
    const groups = groupByUser(records);
    expect([...groups.keys()]).toEqual(["u1", "u2", "u3"]);
    expect(groups.get("u1")?.map((r) => r.notebookId)).toEqual(["n1", "n3", "n5"]);
  });
});

describe("analyzeUsers", () => {
  it("scores every user and aggregates their timelines", () => {
    const result = analyzeUsers({ records, catalog });
    expect(result.assignments.get("u1")?.persona).toBe("EDA Specialist");
    expect(result.assignments.get("u2")?.persona).toBe("CV Enthusiast");
    expect(result.assignments.get("u3")?.persona).toBe("NLP Specialist");
    expect(result.timelines.get("u1")).toEqual([
      { userId: "u1", period: "2023-01", count: 1 },
      { userId: "u1", period: "2023-03", count: 2 }
    ]);
    expect(result.profiles.get("u1")?.mostActiveMonth).toBe("2023-03");
    expect(result.skipped).toEqual([]);
  });

  it("uses precomputed personas in place of the scorer", () => {
    const result = analyzeUsers({
      records,
      catalog,
      precomputed: [
        { userId: "u3", persona: "📊 EDA Specialist" },
        { userId: "u4", persona: "DL Researcher", confidence: 0.4 }
      ]
    });
    expect(result.assignments.get("u3")).toEqual({
      userId: "u3",
      persona: "📊 EDA Specialist",
      confidence: null,
      topFeatures: [],
      source: "precomputed"
    });
    expect(result.timelines.get("u3")).toEqual([{ userId: "u3", period: "2023-04", count: 1 }]);
    expect(result.assignments.get("u4")).toEqual({
      userId: "u4",
      persona: "DL Researcher",
      confidence: 0.4,
      topFeatures: [],
      source: "precomputed"
    });
    expect(result.timelines.get("u4")).toEqual([]);
    expect(result.profiles.has("u4")).toBe(false);
    expect(result.assignments.get("u1")?.source).toBe("computed");
  });

  it("re-throws per-user failures by default", () => {
    const broken = [...records, { ...record("u2", "n7", "EDA"), createdAt: "yesterday" }];
    expect(() => analyzeUsers({ records: broken, catalog })).toThrow(InvalidInputError);
  });

  it("lets the caller skip users that fail", () => {
    const broken = [...records, { ...record("u2", "n7", "EDA"), createdAt: "yesterday" }];
    const onUserError = jest.fn().mockReturnValue("skip");
    const result = analyzeUsers({ records: broken, catalog, onUserError });

    expect(onUserError).toHaveBeenCalledTimes(1);
    expect(onUserError).toHaveBeenCalledWith("u2", expect.any(InvalidInputError));
    expect(result.skipped.map((entry) => entry.userId)).toEqual(["u2"]);
    expect(result.assignments.has("u2")).toBe(false);
    expect(result.timelines.has("u2")).toBe(false);
    expect(result.assignments.get("u1")?.persona).toBe("EDA Specialist");
  });

  it("never assigns a default persona to a skipped user", () => {
    const broken = [{ ...record("u9", "n1", "EDA"), votes: -1 }];
    const result = analyzeUsers({ records: broken, catalog, onUserError: () => "skip" });
    expect(result.assignments.size).toBe(0);
    expect(result.skipped).toHaveLength(1);
  });
});
