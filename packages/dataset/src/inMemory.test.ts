import { InvalidInputError } from "@persona/contracts";
import { InMemoryNotebookDataset } from "./inMemory";

const rows = [
  { userId: 1001, notebookId: 1, createdAt: "2023-01-05", category: "EDA", votes: "3", forks: 0, language: "Python" },
  { userId: "AB7", notebookId: 2, createdAt: "2023-02-05", category: null, votes: 1, forks: 0, language: "R" },
  { userId: 1010, notebookId: 3, createdAt: "2023-02-07", category: "NLP", votes: 0, forks: 1, language: "Python" },
  { userId: 1001, notebookId: 4, createdAt: "2023-03-01", category: "EDA", votes: 2, forks: 0, language: "Python" }
];

describe("InMemoryNotebookDataset", () => {
  const dataset = new InMemoryNotebookDataset({
    rows,
    precomputed: [{ userId: 1010, persona: "NLP Specialist", confidence: 0.8 }]
  });

  it("validates rows into notebook records", async () => {
    const records = await dataset.listRecords();
    expect(records).toHaveLength(4);
    expect(records[0]).toEqual({
      userId: "1001",
      notebookId: "1",
      createdAt: "2023-01-05",
      tags: ["EDA"],
      votes: 3,
      forks: 0,
      language: "Python"
    });
  });

  it("lists one user's records", async () => {
    const records = await dataset.listUserRecords("1001");
    expect(records.map((record) => record.notebookId)).toEqual(["1", "4"]);
  });

  it("lists precomputed personas", async () => {
    await expect(dataset.listPrecomputed()).resolves.toEqual([
      { userId: "1010", persona: "NLP Specialist", confidence: 0.8 }
    ]);
  });

  it("searches user ids case-insensitively", async () => {
    await expect(dataset.searchUserIds("10", 10)).resolves.toEqual(["1001", "1010"]);
    await expect(dataset.searchUserIds("ab", 10)).resolves.toEqual(["AB7"]);
    await expect(dataset.searchUserIds("", 2)).resolves.toEqual(["1001", "AB7"]);
  });

  it("refuses malformed seed rows", () => {
    expect(() => new InMemoryNotebookDataset({ rows: [{ userId: "x" }] })).toThrow(InvalidInputError);
  });
});
