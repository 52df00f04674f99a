/**
 * POST /api/analyze/question - strategic analysis of a business question
 */

import { getAnalysisOrchestrator } from "@/lib/analysis-service";
import { QuestionRequestSchema, analysisResponse, readJsonBody } from "@/lib/api-response";

export const runtime = "nodejs";

export async function POST(req: Request) {
  const body = await readJsonBody(req, QuestionRequestSchema);
  if (!body.ok) return body.response;

  const { question, keywords } = body.data;
  const result = await getAnalysisOrchestrator().analyzeQuestion(question, keywords ?? "");
  return analysisResponse(question, result);
}
