/**
 * POST /api/analyze/url - fetch a public web page and analyze its text
 */

import { getAnalysisOrchestrator } from "@/lib/analysis-service";
import { UrlRequestSchema, analysisResponse, readJsonBody } from "@/lib/api-response";

export const runtime = "nodejs";

export async function POST(req: Request) {
  const body = await readJsonBody(req, UrlRequestSchema);
  if (!body.ok) return body.response;

  const { url, question, keywords } = body.data;
  const result = await getAnalysisOrchestrator().analyzeUrl(url, question, keywords);
  return analysisResponse(url, result);
}
