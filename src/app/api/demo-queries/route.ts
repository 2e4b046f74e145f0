import { NextResponse } from "next/server";
import demoQueries from "@/data/demo-queries.json";

export function GET() {
  return NextResponse.json({ queries: demoQueries.queries });
}
