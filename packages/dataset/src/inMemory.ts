import type { NotebookRecord, PrecomputedPersona } from "@persona/contracts";
import { parseNotebookRecords, parsePrecomputedPersonas } from "@persona/feature-extractor";
import type { NotebookDataset } from "./types";

export type InMemoryDatasetSeed = {
  rows?: readonly unknown[];
  precomputed?: readonly unknown[];
};

export class InMemoryNotebookDataset implements NotebookDataset {
  private readonly records: NotebookRecord[];
  private readonly precomputed: PrecomputedPersona[];

  constructor({ rows = [], precomputed = [] }: InMemoryDatasetSeed = {}) {
    this.records = parseNotebookRecords(rows);
    this.precomputed = [...parsePrecomputedPersonas(precomputed).values()];
  }

  async listRecords(): Promise<NotebookRecord[]> {
    return [...this.records];
  }

  async listUserRecords(userId: string): Promise<NotebookRecord[]> {
    return this.records.filter((record) => record.userId === userId);
  }

  async listPrecomputed(): Promise<PrecomputedPersona[]> {
    return [...this.precomputed];
  }

  async searchUserIds(term: string, limit: number): Promise<string[]> {
    const ids = [...new Set(this.records.map((record) => record.userId))];
    const needle = term.trim().toLowerCase();
    return ids.filter((id) => id.toLowerCase().includes(needle)).slice(0, limit);
  }
}
