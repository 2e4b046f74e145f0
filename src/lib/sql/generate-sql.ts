import { env } from "@/lib/env";
import { errorFields, logger as defaultLogger, type Logger } from "@/lib/logger";
import { generateFallbackSql } from "@/lib/sql/fallback";
import { generateDirect, retrievePlayground, type ProviderConfig, type SqlRequest } from "@/lib/sql/provider";
import type { ProviderMode, SchemaDescription, SqlResult } from "@/lib/types";

export type SqlTier = {
  name: ProviderMode;
  generate: (req: SqlRequest) => Promise<SqlResult>;
};

export type GenerateSqlOptions = {
  context?: string;
  config?: ProviderConfig;
  logger?: Logger;
  /** Replaces the external tiers, mainly for tests. */
  tiers?: SqlTier[];
};

export type SqlGenerator = (question: string, schema: SchemaDescription, mode: ProviderMode, context?: string) => Promise<SqlResult>;

export function providerConfigFromEnv(): ProviderConfig {
  return {
    apiKey: env.SQL_PROVIDER_API_KEY,
    datasetId: env.SQL_PROVIDER_DATASET_ID,
    baseUrl: env.SQL_PROVIDER_BASE_URL,
    timeoutMs: env.SQL_PROVIDER_TIMEOUT_MS,
  };
}

/** Primary mode first, then the other one. */
export function providerTiers(mode: ProviderMode, config: ProviderConfig): SqlTier[] {
  const playground: SqlTier = { name: "playground", generate: (req) => retrievePlayground(req, config) };
  const direct: SqlTier = { name: "direct", generate: (req) => generateDirect(req, config) };
  return mode === "playground" ? [playground, direct] : [direct, playground];
}

/**
 * Tries each external tier once, in order, and falls back to the local
 * templates. Never rejects.
 */
export async function generateSql(
  question: string,
  schema: SchemaDescription,
  mode: ProviderMode,
  options: GenerateSqlOptions = {}
): Promise<SqlResult> {
  const log = options.logger ?? defaultLogger;
  const tiers = options.tiers ?? providerTiers(mode, options.config ?? providerConfigFromEnv());
  const req: SqlRequest = { question, schema, context: options.context ?? "" };

  for (const tier of tiers) {
    try {
      const result = await tier.generate(req);
      log.info("SQL generated by provider", { component: "sql-provider", tier: tier.name, question, source: result.source });
      return result;
    } catch (e) {
      log.warn("SQL provider tier failed", { component: "sql-provider", tier: tier.name, question, error: errorFields(e) });
    }
  }

  const fallback = generateFallbackSql(question);
  log.info("SQL generated by local templates", { component: "sql-provider", question });
  return fallback;
}
