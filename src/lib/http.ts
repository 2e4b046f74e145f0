import { NextResponse } from "next/server";
import { ZodError } from "zod";
import { AppError, ValidationError } from "@/lib/errors";
import { errorFields, logger, type LogFields } from "@/lib/logger";
import type { ErrorResponse } from "@/lib/types";

const GENERIC_DETAIL = "Something went wrong while analyzing the question.";

export function toAppError(e: unknown): AppError | null {
  if (e instanceof AppError) return e;
  if (e instanceof ZodError) {
    return new ValidationError(
      e.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "),
      e.issues.map((i) => ({ field: i.path.join("."), message: i.message })),
    );
  }
  return null;
}

/** Maps a thrown value to the error envelope. Unknown errors are logged and never echoed. */
export function errorResponse(e: unknown, fields: LogFields = {}) {
  const appError = toAppError(e);
  if (appError) {
    const body: ErrorResponse = { ok: false, error: { code: appError.code, detail: appError.message } };
    return NextResponse.json(body, { status: appError.statusCode });
  }

  logger.error("Unhandled error in route", { ...fields, error: errorFields(e) });
  const body: ErrorResponse = { ok: false, error: { code: "INTERNAL_ERROR", detail: GENERIC_DETAIL } };
  return NextResponse.json(body, { status: 500 });
}

export async function readJson(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new ValidationError("Body must be valid JSON");
  }
}
