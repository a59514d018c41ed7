import { Pool } from "pg";
import type { NotebookRecord, PrecomputedPersona } from "@persona/contracts";
import { parseNotebookRecord, parsePrecomputedPersonas } from "@persona/feature-extractor";
import type { NotebookDataset } from "./types";

// created_at is stored as text so the original offset survives the round trip.
const NOTEBOOK_COLUMNS = `
  user_id AS "userId",
  notebook_id AS "notebookId",
  created_at::text AS "createdAt",
  category,
  votes,
  forks,
  language,
  title,
  views,
  cell_count AS "cellCount",
  medal
`;

type NotebookRow = {
  userId: string;
  notebookId: string;
  createdAt: string;
  category: string | null;
  votes: number | string;
  forks: number | string;
  language: string;
  title: string | null;
  views: number | string | null;
  cellCount: number | string | null;
  medal: string | null;
};

type PersonaRow = {
  userId: string;
  persona: string;
  confidence: number | null;
};

export type PostgresNotebookDatasetConfig = {
  connectionString: string;
  notebooksTable?: string;
  personasTable?: string;
};

export class PostgresNotebookDataset implements NotebookDataset {
  private readonly pool: Pool;
  private readonly notebooksTable: string;
  private readonly personasTable: string;

  constructor(config: PostgresNotebookDatasetConfig) {
    this.pool = new Pool({ connectionString: config.connectionString });
    this.notebooksTable = quoteIdent(config.notebooksTable ?? "notebooks");
    this.personasTable = quoteIdent(config.personasTable ?? "persona_assignments");
  }

  async listRecords(): Promise<NotebookRecord[]> {
    const { rows } = await this.pool.query<NotebookRow>(
      `SELECT ${NOTEBOOK_COLUMNS} FROM ${this.notebooksTable} ORDER BY user_id, created_at, notebook_id`
    );
    return rows.map((row, idx) => parseNotebookRecord(row, idx));
  }

  async listUserRecords(userId: string): Promise<NotebookRecord[]> {
    const { rows } = await this.pool.query<NotebookRow>(
      `SELECT ${NOTEBOOK_COLUMNS} FROM ${this.notebooksTable} WHERE user_id = $1 ORDER BY created_at, notebook_id`,
      [userId]
    );
    return rows.map((row, idx) => parseNotebookRecord(row, idx));
  }

  async listPrecomputed(): Promise<PrecomputedPersona[]> {
    const { rows } = await this.pool.query<PersonaRow>(
      `SELECT user_id AS "userId", persona, confidence::float8 AS confidence FROM ${this.personasTable}`
    );
    return [...parsePrecomputedPersonas(rows).values()];
  }

  async searchUserIds(term: string, limit: number): Promise<string[]> {
    const { rows } = await this.pool.query<{ userId: string }>(
      `SELECT DISTINCT user_id AS "userId" FROM ${this.notebooksTable}
       WHERE user_id ILIKE $1
       ORDER BY user_id
       LIMIT $2`,
      [`%${term.trim()}%`, limit]
    );
    return rows.map((row) => row.userId);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function quoteIdent(name: string): string {
  return name
    .split(".")
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join(".");
}
