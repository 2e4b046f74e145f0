import { NextResponse } from "next/server";
import { z } from "zod";
import { analyzeQuestion } from "@/lib/analysis/analyze-question";
import { RateLimitError } from "@/lib/errors";
import { errorResponse, readJson } from "@/lib/http";
import { clientIp, rateLimit } from "@/lib/rate-limit";

export const runtime = "nodejs";

const BodySchema = z.object({
  question: z.string().trim().min(3).max(500),
  mode: z.enum(["playground", "direct"]).optional(),
});

const RATE_LIMIT = { limit: 30, windowMs: 60_000 };

export async function POST(req: Request) {
  let question: string | undefined;
  try {
    const limited = rateLimit(clientIp(req), RATE_LIMIT);
    if (!limited.ok) throw new RateLimitError();

    const body = BodySchema.parse(await readJson(req));
    question = body.question;

    const response = await analyzeQuestion(body.question, body.mode ? { mode: body.mode } : {});
    return NextResponse.json(response);
  } catch (e) {
    return errorResponse(e, { component: "api/analyze", question });
  }
}
