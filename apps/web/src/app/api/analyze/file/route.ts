/**
 * POST /api/analyze/file - multipart upload (field "file"), analyzed with the fixed file question
 */

import { NextResponse } from "next/server";
import { getAnalysisOrchestrator } from "@/lib/analysis-service";
import { analysisResponse } from "@/lib/api-response";

export const runtime = "nodejs";

export async function POST(req: Request) {
  let form: FormData;
  try {
    form = await req.formData();
  } catch {
    return NextResponse.json({ error: "Expected multipart form data" }, { status: 400 });
  }

  const file = form.get("file");
  if (!file || typeof file === "string" || file.size === 0) {
    return NextResponse.json({ error: "No file provided" }, { status: 400 });
  }

  const bytes = new Uint8Array(await file.arrayBuffer());
  const result = await getAnalysisOrchestrator().analyzeFile({
    bytes,
    filename: file.name,
    contentType: file.type || undefined,
  });
  return analysisResponse(file.name, result);
}
