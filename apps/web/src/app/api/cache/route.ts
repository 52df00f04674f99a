/**
 * Reply Cache Control
 *
 * GET /api/cache - cache statistics
 * DELETE /api/cache - evict every cached model reply
 */

import { NextResponse } from "next/server";
import { checkAdminKey } from "@/lib/auth";
import { defaultReplyCache } from "@/lib/reply-cache";

export const runtime = "nodejs";

export async function GET(req: Request) {
  if (!checkAdminKey(req)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }
  return NextResponse.json(defaultReplyCache.getStats());
}

export async function DELETE(req: Request) {
  if (!checkAdminKey(req)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }
  const evicted = defaultReplyCache.clear();
  return NextResponse.json({ success: true, evicted });
}
