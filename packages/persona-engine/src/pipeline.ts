import crypto from "node:crypto";
import {
  isPersonaEngineError,
  type ArchetypeCatalog,
  type NotebookRecord,
  type PrecomputedPersona
} from "@persona/contracts";
import { defaultEventBus } from "@persona/event-bus";
import type { NotebookDataset } from "@persona/dataset";
import { analyzeUsers, type AnalysisResult, type UserErrorPolicy } from "./analyzeUsers";

export type PersonaPipelineDeps = {
  dataset: NotebookDataset;
  catalog: ArchetypeCatalog;
  eventBus?: typeof defaultEventBus;
  onUserError?: UserErrorPolicy;
};

export type PipelineRun = AnalysisResult & { runId: string };

export class PersonaPipeline {
  private readonly dataset;
  private readonly catalog;
  private readonly bus;
  private readonly onUserError;

  constructor({ dataset, catalog, eventBus = defaultEventBus, onUserError }: PersonaPipelineDeps) {
    this.dataset = dataset;
    this.catalog = catalog;
    this.bus = eventBus;
    this.onUserError = onUserError;
  }

  async run(): Promise<PipelineRun> {
    const [records, precomputed] = await Promise.all([this.dataset.listRecords(), this.dataset.listPrecomputed()]);
    return this.analyze(records, precomputed);
  }

  /**
   * Analyzes a single user. Resolves to null when the dataset knows nothing
   * about them.
   */
  async runForUser(userId: string): Promise<PipelineRun | null> {
    const [records, precomputed] = await Promise.all([
      this.dataset.listUserRecords(userId),
      this.dataset.listPrecomputed()
    ]);
    const stored = precomputed.filter((row) => row.userId === userId);
    if (!records.length && !stored.length) return null;
    return this.analyze(records, stored);
  }

  private async analyze(records: NotebookRecord[], precomputed: PrecomputedPersona[]): Promise<PipelineRun> {
    const runId = crypto.randomUUID();
    const users = new Set(records.map((record) => record.userId));
    await this.bus.publish("dataset.loaded", { run_id: runId, record_count: records.length, user_count: users.size });

    const result = analyzeUsers({ records, precomputed, catalog: this.catalog, onUserError: this.onUserError });

    for (const [userId, assignment] of result.assignments) {
      await this.bus.publish("persona.assigned", { run_id: runId, assignment, profile: result.profiles.get(userId) });
      await this.bus.publish("timeline.ready", { run_id: runId, user_id: userId, buckets: result.timelines.get(userId) ?? [] });
    }
    for (const { userId, error } of result.skipped) {
      await this.bus.publish("persona.skipped", {
        run_id: runId,
        user_id: userId,
        reason: error instanceof Error ? error.message : String(error),
        code: isPersonaEngineError(error) ? error.code : undefined
      });
    }
    console.log(`[persona-pipeline] run ${runId}: ${result.assignments.size} assigned, ${result.skipped.length} skipped`);
    await this.bus.publish("run.completed", {
      run_id: runId,
      assigned: result.assignments.size,
      skipped: result.skipped.length
    });
    return { ...result, runId };
  }
}
