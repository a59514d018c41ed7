import { InvalidInputError } from "@persona/contracts";
import { parseNotebookRecord, parseNotebookRecords, parsePrecomputedPersonas } from "./parse";

const baseRow = {
  userId: 42,
  notebookId: 7,
  createdAt: "2023-05-01T10:00:00+02:00",
  category: "EDA|NLP",
  votes: "12",
  forks: 0,
  language: "Python",
  title: null,
  medal: "gold"
};

describe("parseNotebookRecord", () => {
  it("normalizes ids, counts and tags", () => {
    const record = parseNotebookRecord(baseRow);
    expect(record).toEqual({
      userId: "42",
      notebookId: "7",
      createdAt: "2023-05-01T10:00:00+02:00",
      tags: ["EDA", "NLP"],
      votes: 12,
      forks: 0,
      language: "Python",
      medal: "gold"
    });
    expect("title" in record).toBe(false);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("accepts an array category and drops blank tags", () => {
    expect(parseNotebookRecord({ ...baseRow, category: [" Computer Vision ", "", "  "] }).tags).toEqual(["Computer Vision"]);
  });

  it("treats a missing category as no tags", () => {
    const { category, ...row } = baseRow;
    expect(category).toBe("EDA|NLP");
    expect(parseNotebookRecord(row).tags).toEqual([]);
    expect(parseNotebookRecord({ ...baseRow, category: null }).tags).toEqual([]);
  });

  it("rejects a row missing a required field", () => {
    const { createdAt, ...row } = baseRow;
    expect(createdAt).toBeDefined();
    expect(() => parseNotebookRecord(row, 3)).toThrow(InvalidInputError);
    try {
      parseNotebookRecord(row, 3);
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.code).toBe("invalid_input");
        expect(err.details).toEqual({ row: 3, fields: ["createdAt"] });
      }
    }
  });

  it("rejects negative or non-numeric counts and malformed timestamps", () => {
    expect(() => parseNotebookRecord({ ...baseRow, votes: -1 })).toThrow(InvalidInputError);
    expect(() => parseNotebookRecord({ ...baseRow, forks: "many" })).toThrow(InvalidInputError);
    expect(() => parseNotebookRecord({ ...baseRow, createdAt: "May 2023" })).toThrow(InvalidInputError);
  });

  it("accepts timestamps as Postgres prints them", () => {
    for (const createdAt of ["2023-01-15 10:00:00+00", "2023-01-15 10:00:00.123+00", "2023-01-15 10:00:00+05:30"]) {
      expect(parseNotebookRecord({ ...baseRow, createdAt }).createdAt).toBe(createdAt);
    }
  });

  it("rejects impossible calendar dates and times", () => {
    expect(() => parseNotebookRecord({ ...baseRow, createdAt: "2023-02-30" })).toThrow(InvalidInputError);
    expect(() => parseNotebookRecord({ ...baseRow, createdAt: "2023-13-01" })).toThrow(InvalidInputError);
    expect(() => parseNotebookRecord({ ...baseRow, createdAt: "2023-01-15T24:10" })).toThrow(InvalidInputError);
    expect(parseNotebookRecord({ ...baseRow, createdAt: "2024-02-29" }).createdAt).toBe("2024-02-29");
  });

  it("reports the index of the failing row in a batch", () => {
    expect(() => parseNotebookRecords([baseRow, { ...baseRow, language: undefined }])).toThrow(
      /row 1: language/
    );
  });
});

describe("parsePrecomputedPersonas", () => {
  it("indexes rows by user id", () => {
    const table = parsePrecomputedPersonas([
      { userId: 1, persona: "EDA Specialist", confidence: 0.5 },
      { userId: "2", persona: "CV Enthusiast" }
    ]);
    expect([...table.keys()]).toEqual(["1", "2"]);
    expect(table.get("1")?.confidence).toBe(0.5);
  });

  it("rejects blank personas and duplicate users", () => {
    expect(() => parsePrecomputedPersonas([{ userId: "1", persona: "  " }])).toThrow(InvalidInputError);
    expect(() =>
      parsePrecomputedPersonas([
        { userId: "1", persona: "EDA Specialist" },
        { userId: 1, persona: "CV Enthusiast" }
      ])
    ).toThrow(/lists user 1 twice/);
  });
});
