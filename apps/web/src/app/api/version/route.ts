import { NextResponse } from "next/server";
import { APP_VERSION, SERVICE_NAME } from "@/lib/version";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function GET() {
  const gitSha = process.env.VERCEL_GIT_COMMIT_SHA || process.env.GIT_SHA || process.env.SOURCE_VERSION || null;

  return NextResponse.json({
    service: SERVICE_NAME,
    version: APP_VERSION,
    node_env: process.env.NODE_ENV ?? null,
    git_sha: gitSha,
    now_utc: new Date().toISOString(),
  });
}
