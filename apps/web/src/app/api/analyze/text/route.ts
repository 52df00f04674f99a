/**
 * POST /api/analyze/text - analysis of pasted content, a question, keywords, or any mix
 */

import { NextResponse } from "next/server";
import { getAnalysisOrchestrator } from "@/lib/analysis-service";
import { TextRequestSchema, analysisResponse, readJsonBody } from "@/lib/api-response";
import { getAnalysisConfig } from "@/lib/config-loader";

export const runtime = "nodejs";

export async function POST(req: Request) {
  const body = await readJsonBody(req, TextRequestSchema);
  if (!body.ok) return body.response;

  const { text, question, keywords } = body.data;
  if (text && text.trim() && text.trim().length < getAnalysisConfig().minTextChars) {
    return NextResponse.json({ error: "Content too short for analysis" }, { status: 400 });
  }

  const result = await getAnalysisOrchestrator().analyzeText(text, question, keywords);
  return analysisResponse(text || question || keywords || "", result);
}
