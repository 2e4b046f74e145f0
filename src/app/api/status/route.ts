import { NextResponse } from "next/server";
import { env } from "@/lib/env";
import { INCIDENT_SCHEMA } from "@/lib/schema";

const SERVICE_NAME = "incident-insights";
const SERVICE_VERSION = "0.1.0";

export function GET() {
  return NextResponse.json({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    provider_mode: env.SQL_PROVIDER_MODE,
    dataset_id: env.SQL_PROVIDER_DATASET_ID ?? null,
    api_key_configured: Boolean(env.SQL_PROVIDER_API_KEY),
    database_path: env.DATABASE_PATH,
    tables_count: INCIDENT_SCHEMA.tables.length,
  });
}
