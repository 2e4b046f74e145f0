import { NextResponse } from "next/server";
import { INCIDENT_SCHEMA } from "@/lib/schema";

export function GET() {
  return NextResponse.json(INCIDENT_SCHEMA);
}
