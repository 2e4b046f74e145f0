import { z } from "zod";
import { ProviderError } from "@/lib/errors";
import { fetchWithTimeout, type FetchedBody } from "@/lib/fetch";
import { toRow } from "@/lib/rows";
import { describeSchema } from "@/lib/schema";
import type { ProviderMode, SchemaDescription, SqlResult } from "@/lib/types";

export type ProviderConfig = {
  apiKey?: string;
  datasetId?: string;
  baseUrl: string;
  timeoutMs: number;
};

export type SqlRequest = {
  question: string;
  schema: SchemaDescription;
  context: string;
};

const RowsSchema = z.array(z.record(z.unknown()));

const PlaygroundSummarySchema = z.union([
  z.string(),
  z
    .object({
      non_technical_explanation: z.string().optional(),
      technical_details: z.string().optional(),
    })
    .passthrough(),
]);

const PlaygroundItemSchema = z.object({
  query: z.string().trim().min(1),
  rows: RowsSchema.nullable().optional(),
  querySummary: PlaygroundSummarySchema.nullable().optional(),
});

const PlaygroundResponseSchema = z.object({
  data: z.array(z.record(z.unknown())).min(1),
});

const DirectResponseSchema = z.object({
  sql: z.string().trim().min(1),
  explanation: z.string().nullable().optional(),
  confidence: z.number().min(0).max(1).nullable().optional(),
  rows: RowsSchema.nullable().optional(),
});

function isAbort(e: unknown) {
  return typeof e === "object" && e !== null && "name" in e && e.name === "AbortError";
}

async function postJson(tier: ProviderMode, url: URL, body: unknown, config: ProviderConfig) {
  let res: FetchedBody;
  try {
    res = await fetchWithTimeout(url, {
      method: "POST",
      timeoutMs: config.timeoutMs,
      headers: {
        "Authorization": `Bearer ${config.apiKey}`,
        "Content-Type": "application/json",
        "Accept": "application/json",
      },
      body: JSON.stringify(body),
    });
  } catch (e) {
    throw new ProviderError(tier, isAbort(e) ? `timed out after ${config.timeoutMs}ms` : e instanceof Error ? e.message : String(e));
  }

  if (!res.ok) {
    throw new ProviderError(tier, `HTTP ${res.status}`);
  }

  try {
    const json: unknown = JSON.parse(res.body);
    return json;
  } catch {
    throw new ProviderError(tier, "response is not valid JSON");
  }
}

function explanationFrom(summary: z.infer<typeof PlaygroundSummarySchema> | null | undefined) {
  if (!summary) return undefined;
  if (typeof summary === "string") return summary;
  return summary.non_technical_explanation ?? summary.technical_details;
}

/**
 * Playground mode: the provider answers against a dataset it has already
 * indexed and usually returns the result rows along with the SQL.
 */
export async function retrievePlayground(req: SqlRequest, config: ProviderConfig): Promise<SqlResult> {
  if (!config.apiKey) throw new ProviderError("playground", "no API key configured");
  if (!config.datasetId) throw new ProviderError("playground", "no dataset id configured");

  const url = new URL(`datafiles/${encodeURIComponent(config.datasetId)}/retrieve`, withSlash(config.baseUrl));
  const json = await postJson("playground", url, { userQuery: `${req.context}\n\nQuestion: ${req.question}` }, config);

  const envelope = PlaygroundResponseSchema.safeParse(json);
  if (!envelope.success) throw new ProviderError("playground", "response has no data items");

  const first = envelope.data.data[0];
  if (first && "error" in first) {
    const detail = typeof first.error === "string" ? first.error : "provider reported an error";
    throw new ProviderError("playground", detail.slice(0, 200));
  }

  const item = PlaygroundItemSchema.safeParse(first);
  if (!item.success) throw new ProviderError("playground", "data item lacks a query");

  const rows = item.data.rows?.map(toRow);
  return {
    sql: item.data.query,
    source: rows ? "provider_with_data" : "provider",
    explanation: explanationFrom(item.data.querySummary) ?? `Generated from the indexed dataset for: ${req.question}`,
    rows,
    confidence: 0.9,
  };
}

/** Direct mode: schema-aware SQL generation, rows only if the provider executed it. */
export async function generateDirect(req: SqlRequest, config: ProviderConfig): Promise<SqlResult> {
  if (!config.apiKey) throw new ProviderError("direct", "no API key configured");

  const url = new URL("v1/generate-sql", withSlash(config.baseUrl));
  const json = await postJson(
    "direct",
    url,
    {
      question: req.question,
      schema: describeSchema(req.schema),
      dialect: "sqlite",
      context: req.context,
    },
    config
  );

  const parsed = DirectResponseSchema.safeParse(json);
  if (!parsed.success) throw new ProviderError("direct", "response has no sql");

  const rows = parsed.data.rows?.map(toRow);
  return {
    sql: parsed.data.sql,
    source: rows ? "provider_with_data" : "provider",
    explanation: parsed.data.explanation ?? undefined,
    rows,
    confidence: parsed.data.confidence ?? undefined,
  };
}

function withSlash(baseUrl: string) {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}
