import { z } from "zod";
import { ConfigurationError } from "@persona/contracts";

const EnvSchema = z.object({
  PERSONA_BRIDGE_PORT: z.coerce.number().int().min(0).max(65535).default(4320),
  PERSONA_PG_URL: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  PERSONA_CATALOG_PATH: z.string().min(1).optional(),
  PERSONA_SEED_PATH: z.string().min(1).optional()
});

export type RunnerConfig = {
  port: number;
  databaseUrl?: string;
  catalogPath?: string;
  seedPath?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationError(`Invalid environment: ${fields.join(", ")}`, { fields });
  }
  const vars = parsed.data;
  return {
    port: vars.PERSONA_BRIDGE_PORT,
    databaseUrl: vars.PERSONA_PG_URL ?? vars.DATABASE_URL,
    catalogPath: vars.PERSONA_CATALOG_PATH,
    seedPath: vars.PERSONA_SEED_PATH
  };
}
