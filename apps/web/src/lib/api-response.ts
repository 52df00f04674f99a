/**
 * Shared request/response helpers for the analysis routes.
 *
 * @module api-response
 */

import { NextResponse } from "next/server";
import { z } from "zod";
import type { ErrorCategory } from "./error-classification";
import { buildAnalysisReport, type AnalysisReport, type AnalysisReportOptions } from "./analyzer/analysis-report";
import type { AnalysisResult } from "./analyzer/types";

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

export const QuestionRequestSchema = z.object({
  question: z.string(),
  keywords: z.string().optional(),
});

export const TextRequestSchema = z.object({
  text: z.string().optional(),
  question: z.string().optional(),
  keywords: z.string().optional(),
});

export const UrlRequestSchema = z.object({
  url: z.string().min(1, "url is required"),
  question: z.string().optional(),
  keywords: z.string().optional(),
});

export const ComprehensiveRequestSchema = z.object({
  text: z.string().optional(),
  url: z.string().optional(),
  brands: z.array(z.string()).optional(),
  keywords: z.string().optional(),
});

export type ParsedBody<T> = { ok: true; data: T } | { ok: false; response: NextResponse };

export function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

/**
 * Read and validate a JSON request body. Failures come back as a ready 400 response.
 */
export async function readJsonBody<T>(req: Request, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ParsedBody<T>> {
  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    return { ok: false, response: NextResponse.json({ error: "Invalid JSON body" }, { status: 400 }) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      response: NextResponse.json({ error: `Invalid request: ${formatZodIssues(parsed.error)}` }, { status: 400 }),
    };
  }
  return { ok: true, data: parsed.data };
}

// ============================================================================
// RESPONSES
// ============================================================================

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  input_error: 400,
  extraction_error: 400,
  rate_limit: 429,
  provider_outage: 502,
  timeout: 504,
  unknown: 500,
};

export function statusForResult(result: AnalysisResult): number {
  if (result.error === null) return 200;
  return STATUS_BY_CATEGORY[result.errorCategory ?? "unknown"];
}

export interface AnalysisResponseBody {
  result: Omit<AnalysisResult, "sourceText">;
  report: AnalysisReport;
}

/**
 * Result plus summary report. The report reads the acquired page or document
 * text when the orchestrator supplies it, else `fallbackSource`. The source
 * text itself is not echoed back.
 */
export function analysisResponse(
  fallbackSource: string,
  result: AnalysisResult,
  options: Pick<AnalysisReportOptions, "brands"> = {},
): NextResponse<AnalysisResponseBody> {
  const { sourceText, ...publicResult } = result;
  const report = buildAnalysisReport(sourceText || fallbackSource, result, options);
  return NextResponse.json({ result: publicResult, report }, { status: statusForResult(result) });
}
