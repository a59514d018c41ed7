import fs from "node:fs";
import { z } from "zod";
import { InMemoryNotebookDataset, PostgresNotebookDataset, type NotebookDataset } from "@persona/dataset";
import { defaultArchetypeCatalog, parseArchetypeCatalog } from "@persona/persona-scorer";
import { defaultEventBus } from "@persona/event-bus";
import { loadConfig } from "./config";
import { createBridgeServer } from "./server";

// Either a bare list of notebook rows or `{ rows, precomputed }`.
const SeedFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ rows: z.array(z.unknown()).optional(), precomputed: z.array(z.unknown()).optional() })
]);

const config = loadConfig();

const catalog = config.catalogPath
  ? parseArchetypeCatalog(JSON.parse(fs.readFileSync(config.catalogPath, "utf8")))
  : defaultArchetypeCatalog();

function seedDataset(path: string | undefined): NotebookDataset {
  if (!path) return new InMemoryNotebookDataset();
  const seed = SeedFileSchema.parse(JSON.parse(fs.readFileSync(path, "utf8")));
  return new InMemoryNotebookDataset(Array.isArray(seed) ? { rows: seed } : seed);
}

const dataset: NotebookDataset = config.databaseUrl
  ? new PostgresNotebookDataset({ connectionString: config.databaseUrl })
  : seedDataset(config.seedPath);

defaultEventBus.subscribe("dataset.loaded", ({ run_id, record_count, user_count }) => {
  console.log(`[runner] run ${run_id}: ${record_count} notebooks across ${user_count} users`);
});
defaultEventBus.subscribe("persona.assigned", ({ assignment }) => {
  console.log("[runner] persona:", assignment.userId, assignment.persona, assignment.confidence);
});
defaultEventBus.subscribe("persona.skipped", ({ user_id, code, reason }) => {
  console.log("[runner] skipped:", user_id, code ?? "unknown", reason);
});

const server = createBridgeServer({ dataset, catalog });

server.listen(config.port, () => {
  console.log(`[runner] persona bridge listening on http://localhost:${config.port}`);
  console.log(`[runner] catalog: ${catalog.archetypes.map((archetype) => archetype.label).join(", ")}`);
});

function shutdown() {
  server.close(() => {
    (dataset.close?.() ?? Promise.resolve())
      .catch((err: unknown) => console.error("[runner] failed to close dataset", err))
      .finally(() => process.exit(0));
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
