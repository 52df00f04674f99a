import { describe, it, expect, afterEach, vi } from "vitest";
import { defaultReplyCache } from "@/lib/reply-cache";

function request(method: string, key?: string): Request {
  const headers = new Headers();
  if (key) headers.set("x-admin-key", key);
  return new Request("http://localhost/api/cache", { method, headers });
}

afterEach(() => {
  vi.unstubAllEnvs();
  defaultReplyCache.clear();
});

describe("/api/cache", () => {
  it("requires the admin key when one is configured", async () => {
    vi.stubEnv("TL_ADMIN_KEY", "test-secret");
    const { GET, DELETE } = await import("@/app/api/cache/route");

    expect((await GET(request("GET"))).status).toBe(401);
    expect((await DELETE(request("DELETE", "wrong"))).status).toBe(401);
  });

  it("reports stats and clears the shared reply cache", async () => {
    vi.stubEnv("TL_ADMIN_KEY", "test-secret");
    const { GET, DELETE } = await import("@/app/api/cache/route");
    await defaultReplyCache.getOrCreate("cached prompt", async () => "cached reply");

    const stats = await (await GET(request("GET", "test-secret"))).json();
    expect(stats.entries).toBe(1);

    const cleared = await DELETE(request("DELETE", "test-secret"));
    expect(await cleared.json()).toEqual({ success: true, evicted: 1 });
    expect(defaultReplyCache.size).toBe(0);
  });
});
