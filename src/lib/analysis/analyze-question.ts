import { buildCharts } from "@/lib/analysis/charts";
import { classifyIntent } from "@/lib/analysis/classify-intent";
import { synthesizeInsight } from "@/lib/analysis/insights";
import { buildMapLayers } from "@/lib/analysis/map-layers";
import { computeMetrics } from "@/lib/analysis/metrics";
import { planStrategy } from "@/lib/analysis/plan-strategy";
import { executeQuery, type QueryExecutor } from "@/lib/db";
import { env } from "@/lib/env";
import { QueryError } from "@/lib/errors";
import { errorFields, logger as defaultLogger, withFields, type Logger } from "@/lib/logger";
import { INCIDENT_SCHEMA } from "@/lib/schema";
import { generateFallbackSql } from "@/lib/sql/fallback";
import { generateSql, type SqlGenerator } from "@/lib/sql/generate-sql";
import type { AnalysisCategory, AnalysisResponse, ProviderMode, RankedResult, Row, SchemaDescription, SqlResult } from "@/lib/types";

export const MAX_TOP_NEIGHBORHOODS = 10;
export const MAX_RAW_ROWS = 20;

export type AnalyzeDeps = {
  generateSql: SqlGenerator;
  executeQuery: QueryExecutor;
  logger: Logger;
  mode: ProviderMode;
  schema: SchemaDescription;
  now: () => Date;
};

function defaultDeps(logger: Logger): AnalyzeDeps {
  return {
    generateSql: (question, schema, mode, context) => generateSql(question, schema, mode, { context, logger }),
    executeQuery: (sql) => executeQuery(sql),
    logger,
    mode: env.SQL_PROVIDER_MODE,
    schema: INCIDENT_SCHEMA,
    now: () => new Date(),
  };
}

type Fetched = { sqlResult: SqlResult; rows: Row[] };

/**
 * Runs provider SQL; when it fails and did not already come from the local
 * templates, the template SQL gets one attempt before the request fails.
 */
function fetchRows(question: string, category: AnalysisCategory, sqlResult: SqlResult, deps: AnalyzeDeps): Fetched {
  if (sqlResult.rows) return { sqlResult, rows: sqlResult.rows };

  try {
    return { sqlResult, rows: deps.executeQuery(sqlResult.sql) };
  } catch (e) {
    const cause = e instanceof QueryError ? e.cause : e;
    deps.logger.error("Query execution failed", {
      component: "query-executor",
      question,
      category,
      source: sqlResult.source,
      error: errorFields(cause),
    });
    if (sqlResult.source === "fallback") throw new QueryError(cause, category);
  }

  const fallback = generateFallbackSql(question);
  try {
    return { sqlResult: fallback, rows: deps.executeQuery(fallback.sql) };
  } catch (e) {
    const cause = e instanceof QueryError ? e.cause : e;
    deps.logger.error("Template query execution failed", {
      component: "query-executor",
      question,
      category,
      source: fallback.source,
      error: errorFields(cause),
    });
    throw new QueryError(cause, category);
  }
}

function topNeighborhoods(result: RankedResult) {
  return result.locations.slice(0, MAX_TOP_NEIGHBORHOODS).map((l) => ({
    name: l.name,
    metrics: result.ranked ? { ...l.raw_counts, score: l.derived_score } : { ...l.raw_counts },
  }));
}

export async function analyzeQuestion(question: string, overrides: Partial<AnalyzeDeps> = {}): Promise<AnalysisResponse> {
  const deps = { ...defaultDeps(overrides.logger ?? defaultLogger), ...overrides };

  const category = classifyIntent(question);
  const strategy = planStrategy(category);
  deps.logger.info("Question classified", { component: "intent-classifier", question, category });

  const generated = await deps.generateSql(question, deps.schema, deps.mode, strategy.context);
  const { sqlResult, rows } = fetchRows(question, category, generated, deps);

  const log = withFields(deps.logger, { question, category });
  const result = computeMetrics(category, rows, log);
  const insight = synthesizeInsight(result, rows.length);

  return {
    analysis_type: category,
    timestamp: deps.now().toISOString(),
    sql_used: sqlResult.sql,
    sql_source: sqlResult.source,
    sql_explanation: sqlResult.explanation ?? "",
    sql_confidence: sqlResult.confidence ?? null,
    insight_summary: insight.summary,
    insights: insight.details,
    risk_assessment: result.risk,
    top_neighborhoods: topNeighborhoods(result),
    map_layers: buildMapLayers(rows, result),
    chart_data: { charts: buildCharts(result, rows, log) },
    raw_rows: rows.slice(0, MAX_RAW_ROWS),
  };
}
