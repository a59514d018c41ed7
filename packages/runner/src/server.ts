import http from "node:http";
import { z } from "zod";
import {
  InvalidInputError,
  isPersonaEngineError,
  type AnalyzeResponse,
  type ArchetypeCatalog,
  type CatalogResponse,
  type ErrorResponse,
  type UserPersonaResponse,
  type UserSearchResponse
} from "@persona/contracts";
import { parseNotebookRecords, parsePrecomputedPersonas } from "@persona/feature-extractor";
import { analyzeUsers, PersonaPipeline, type UserErrorPolicy } from "@persona/persona-engine";
import type { NotebookDataset } from "@persona/dataset";
import { filterUserIds, personaBadge, personaCardLines, personaExplainer } from "@persona/ui";

const MAX_SEARCH_LIMIT = 100;
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const AnalyzeRequestSchema = z.object({
  records: z.array(z.unknown()),
  precomputed: z.array(z.unknown()).optional()
});

export type BridgeDeps = {
  dataset: NotebookDataset;
  catalog: ArchetypeCatalog;
  pipeline?: PersonaPipeline;
  maxBodyBytes?: number;
};

class HttpError extends Error {
  constructor(readonly status: number, readonly code: string, message?: string) {
    super(message ?? code);
  }
}

// Engine errors are per-user outcomes here: the user is reported as skipped.
const skipEngineErrors: UserErrorPolicy = (_userId, error) => (isPersonaEngineError(error) ? "skip" : "throw");

export function createBridgeServer({
  dataset,
  catalog,
  pipeline,
  maxBodyBytes = DEFAULT_MAX_BODY_BYTES
}: BridgeDeps): http.Server {
  const personas = pipeline ?? new PersonaPipeline({ dataset, catalog, onUserError: skipEngineErrors });

  async function handle(req: http.IncomingMessage): Promise<{ status: number; body: unknown }> {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "POST" && url.pathname === "/personas/analyze") {
      return { status: 200, body: await analyzePosted(await readJson(req, maxBodyBytes)) };
    }

    const userMatch = /^\/personas\/([^/]+)$/.exec(url.pathname);
    if (req.method === "GET" && userMatch) {
      return { status: 200, body: await describeUser(decodeURIComponent(userMatch[1])) };
    }

    if (req.method === "GET" && url.pathname === "/users") {
      const term = url.searchParams.get("search") ?? "";
      const limit = Math.min(MAX_SEARCH_LIMIT, Math.max(1, Number(url.searchParams.get("limit") ?? 10) || 10));
      const body: UserSearchResponse = { userIds: filterUserIds(await dataset.searchUserIds(term, limit), term, limit) };
      return { status: 200, body };
    }

    if (req.method === "GET" && url.pathname === "/catalog") {
      const body: CatalogResponse = {
        archetypes: catalog.archetypes.map((archetype) => ({
          label: archetype.label,
          description: archetype.description ?? null,
          color: archetype.color ?? null,
          icon: archetype.icon ?? null
        }))
      };
      return { status: 200, body };
    }

    throw new HttpError(404, "not_found");
  }

  async function analyzePosted(payload: unknown): Promise<AnalyzeResponse> {
    const request = AnalyzeRequestSchema.safeParse(payload);
    if (!request.success) throw new HttpError(400, "invalid_payload", "expected { records: [], precomputed?: [] }");
    const records = parseNotebookRecords(request.data.records);
    const result = analyzeUsers({
      records,
      catalog,
      precomputed: request.data.precomputed ? parsePrecomputedRows(request.data.precomputed) : [],
      onUserError: skipEngineErrors
    });
    return {
      assignments: [...result.assignments.values()],
      timelines: Object.fromEntries(result.timelines),
      profiles: Object.fromEntries(result.profiles),
      skipped: result.skipped.map(({ userId, error }) => ({
        userId,
        code: isPersonaEngineError(error) ? error.code : "invalid_input",
        reason: error instanceof Error ? error.message : String(error)
      }))
    };
  }

  async function describeUser(userId: string): Promise<UserPersonaResponse> {
    const run = await personas.runForUser(userId);
    const assignment = run?.assignments.get(userId);
    if (!run || !assignment) {
      const skipped = run?.skipped.find((entry) => entry.userId === userId);
      if (skipped && isPersonaEngineError(skipped.error)) {
        throw new HttpError(422, skipped.error.code, skipped.error.message);
      }
      throw new HttpError(404, "not_found", `No notebooks or stored persona for user ${userId}`);
    }
    const profile = run.profiles.get(userId) ?? null;
    return {
      assignment,
      timeline: run.timelines.get(userId) ?? [],
      profile,
      badge: personaBadge(assignment.persona, catalog),
      explainer: personaExplainer(assignment.persona, catalog),
      card: profile ? personaCardLines(profile, assignment) : []
    };
  }

  return http.createServer((req, res) => {
    handle(req)
      .then(({ status, body }) => send(res, status, body))
      .catch((err: unknown) => {
        if (err instanceof HttpError) {
          send(res, err.status, errorBody(err.code, err.message));
          return;
        }
        if (err instanceof InvalidInputError) {
          send(res, 400, errorBody(err.code, err.message));
          return;
        }
        console.error(`[runner] ${req.method} ${req.url} failed`, err);
        send(res, 500, errorBody("internal_error"));
      });
  });
}

function parsePrecomputedRows(rows: unknown[]) {
  return [...parsePrecomputedPersonas(rows).values()];
}

function errorBody(error: string, message?: string): ErrorResponse {
  return message && message !== error ? { error, message } : { error };
}

function send(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

async function readJson(req: http.IncomingMessage, limit: number): Promise<unknown> {
  const raw = await readBody(req, limit);
  try {
    return JSON.parse(raw || "{}");
  } catch {
    throw new HttpError(400, "invalid_json");
  }
}

// Past the limit the rest of the body is drained and discarded.
function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      if (size > limit) return;
      size += chunk.length;
      if (size > limit) {
        chunks.length = 0;
        reject(new HttpError(413, "payload_too_large", `Request body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}
