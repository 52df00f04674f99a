/**
 * POST /api/analyze/comprehensive - pasted text and/or a page, with caller-supplied brands
 */

import { getAnalysisOrchestrator } from "@/lib/analysis-service";
import { ComprehensiveRequestSchema, analysisResponse, readJsonBody } from "@/lib/api-response";

export const runtime = "nodejs";

export async function POST(req: Request) {
  const body = await readJsonBody(req, ComprehensiveRequestSchema);
  if (!body.ok) return body.response;

  const { text, url, brands, keywords } = body.data;
  const result = await getAnalysisOrchestrator().analyzeComprehensive(text, url, keywords);
  return analysisResponse(text || url || "", result, { brands });
}
