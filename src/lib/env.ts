import { z } from "zod";

const EnvSchema = z.object({
  // NL-to-SQL provider (without an API key only the local templates run)
  SQL_PROVIDER_API_KEY: z.string().min(1).optional(),
  SQL_PROVIDER_MODE: z.enum(["playground", "direct"]).default("playground"),
  SQL_PROVIDER_DATASET_ID: z.string().min(1).optional(),
  SQL_PROVIDER_BASE_URL: z.string().url().default("https://api.snowleopard.ai"),
  SQL_PROVIDER_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(30000),

  DATABASE_PATH: z.string().min(1).default("database/incidents.db"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

const rawEnv = {
  SQL_PROVIDER_API_KEY: process.env.SQL_PROVIDER_API_KEY || undefined,
  SQL_PROVIDER_MODE: process.env.SQL_PROVIDER_MODE || undefined,
  SQL_PROVIDER_DATASET_ID: process.env.SQL_PROVIDER_DATASET_ID || undefined,
  SQL_PROVIDER_BASE_URL: process.env.SQL_PROVIDER_BASE_URL || undefined,
  SQL_PROVIDER_TIMEOUT_MS: process.env.SQL_PROVIDER_TIMEOUT_MS || undefined,

  DATABASE_PATH: process.env.DATABASE_PATH || undefined,
  LOG_LEVEL: process.env.LOG_LEVEL || undefined,
};

const parsed = EnvSchema.safeParse(rawEnv);
const isBuild = process.env.NEXT_PHASE === "phase-production-build";

if (!parsed.success && !isBuild) {
  throw parsed.error;
}

export const env: Env = parsed.success ? parsed.data : EnvSchema.parse({});
