import { NextResponse } from "next/server";
import { pingDatabase } from "@/lib/db";
import { env } from "@/lib/env";
import { errorFields, logger } from "@/lib/logger";

export const runtime = "nodejs";

function databaseStatus() {
  try {
    return pingDatabase() ? "connected" : "error";
  } catch (e) {
    logger.warn("Health check could not reach the database", { component: "api/health", error: errorFields(e) });
    return "error";
  }
}

export function GET() {
  const database = databaseStatus();
  return NextResponse.json({
    database,
    agent: database === "connected" ? "ready" : "degraded",
    provider_mode: env.SQL_PROVIDER_MODE,
    api_key_configured: Boolean(env.SQL_PROVIDER_API_KEY),
  });
}
