import { NextResponse } from "next/server";
import { PROVIDER_API_KEY_ENV } from "@/lib/analysis-service";
import { getEnv } from "@/lib/auth";
import { getAnalysisConfig } from "@/lib/config-loader";
import { normalizeProvider } from "@/lib/analyzer/llm";
import { APP_VERSION, SERVICE_NAME } from "@/lib/version";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  const provider = normalizeProvider(getAnalysisConfig().llmProvider);
  const apiKeyEnv = PROVIDER_API_KEY_ENV[provider];
  const apiKeyPresent = getEnv(apiKeyEnv) !== "";

  return NextResponse.json(
    {
      ok: apiKeyPresent,
      service: SERVICE_NAME,
      version: APP_VERSION,
      llm_provider: provider,
      checks: { [`${apiKeyEnv}_present`]: apiKeyPresent },
      now_utc: new Date().toISOString(),
    },
    { status: apiKeyPresent ? 200 : 503 },
  );
}
