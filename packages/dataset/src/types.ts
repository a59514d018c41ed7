import type { NotebookRecord, PrecomputedPersona } from "@persona/contracts";

/**
 * Read-only source of notebook records and stored persona assignments.
 */
export interface NotebookDataset {
  listRecords(): Promise<NotebookRecord[]>;
  listUserRecords(userId: string): Promise<NotebookRecord[]>;
  listPrecomputed(): Promise<PrecomputedPersona[]>;
  searchUserIds(term: string, limit: number): Promise<string[]>;
  close?(): Promise<void>;
}
