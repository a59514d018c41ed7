import {
  RawNotebookRowSchema,
  PrecomputedPersonaSchema,
  InvalidInputError,
  type NotebookRecord,
  type PrecomputedPersona
} from "@persona/contracts";
import type { ZodIssue } from "zod";

function normalizeTags(category: string | string[] | null | undefined): string[] {
  if (category == null) return [];
  const list = Array.isArray(category) ? category : category.split("|");
  return list.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}

function describeIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`).join("; ");
}

/**
 * Validates one raw dataset row into a NotebookRecord. A `category` cell may
 * hold a single tag, a `|`-separated list or an array.
 */
export function parseNotebookRecord(raw: unknown, index = 0): NotebookRecord {
  const parsed = RawNotebookRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid notebook record at row ${index}: ${describeIssues(parsed.error.issues)}`, {
      row: index,
      fields: parsed.error.issues.map((issue) => issue.path.join("."))
    });
  }
  const row = parsed.data;
  const record: NotebookRecord = {
    userId: row.userId,
    notebookId: row.notebookId,
    createdAt: row.createdAt,
    tags: normalizeTags(row.category),
    votes: row.votes,
    forks: row.forks,
    language: row.language
  };
  if (row.title != null) record.title = row.title;
  if (row.views != null) record.views = row.views;
  if (row.cellCount != null) record.cellCount = row.cellCount;
  if (row.medal != null) record.medal = row.medal;
  return Object.freeze(record);
}

export function parseNotebookRecords(rows: readonly unknown[]): NotebookRecord[] {
  return rows.map((row, idx) => parseNotebookRecord(row, idx));
}

/**
 * Validates a precomputed persona table; a user listed twice is rejected
 * rather than resolved by row order.
 */
export function parsePrecomputedPersonas(rows: readonly unknown[]): Map<string, PrecomputedPersona> {
  const table = new Map<string, PrecomputedPersona>();
  rows.forEach((row, idx) => {
    const parsed = PrecomputedPersonaSchema.safeParse(row);
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid precomputed persona at row ${idx}`, {
        row: idx,
        fields: parsed.error.issues.map((issue) => issue.path.join("."))
      });
    }
    if (table.has(parsed.data.userId)) {
      throw new InvalidInputError(`Precomputed persona table lists user ${parsed.data.userId} twice`, {
        row: idx,
        userId: parsed.data.userId
      });
    }
    table.set(parsed.data.userId, parsed.data);
  });
  return table;
}
