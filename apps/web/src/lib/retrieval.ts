/**
 * URL Retrieval Module
 *
 * Fetches a web page and reduces it to plain text:
 * - HTML pages and PDF documents (via document-extraction)
 * - other text/* bodies as-is
 *
 * Only public http(s) hosts are fetched; redirects are followed manually so each
 * hop is re-checked.
 */

import dns from "dns/promises";
import net from "net";
import { ExtractionError, toErrorMessage } from "./error-classification";
import { extractPdfText, extractTextFromHtml } from "./document-extraction";

const MAX_REDIRECTS = 5;
const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_BYTES = 2_000_000;
const DEFAULT_USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

export const TEXT_CAP_MARKER = "...";

export interface FetchPageOptions {
  timeoutMs?: number;
  maxBytes?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  resolveHost?: (hostname: string) => Promise<string[]>;
}

export type PageFetcher = (url: string, options?: FetchPageOptions) => Promise<string>;

// ============================================================================
// HOST CHECKS
// ============================================================================

export function isPrivateIp(ip: string): boolean {
  // IPv4
  if (net.isIP(ip) === 4) {
    const [a, b] = ip.split(".").map((x) => parseInt(x, 10));
    if (a === 0) return true;
    if (a === 10) return true;
    if (a === 127) return true;
    if (a === 169 && b === 254) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    if (a === 192 && b === 168) return true;
    if (a === 100 && b >= 64 && b <= 127) return true; // CGNAT 100.64.0.0/10
    if (a >= 224) return true; // multicast/reserved/broadcast
    return false;
  }
  // IPv6 (coarse)
  if (net.isIP(ip) === 6) {
    const lower = ip.toLowerCase();
    if (lower === "::1" || lower === "::") return true;
    if (lower.startsWith("fe80:")) return true; // link-local
    if (lower.startsWith("fc") || lower.startsWith("fd")) return true; // unique local
    return false;
  }
  return true;
}

async function defaultResolveHost(hostname: string): Promise<string[]> {
  const addrs = await dns.lookup(hostname, { all: true });
  return addrs.map((a) => a.address);
}

function validateUrlForFetch(url: URL): void {
  if (!["http:", "https:"].includes(url.protocol)) {
    throw new Error("Only http/https URLs are allowed");
  }
  if (url.username || url.password) {
    throw new Error("URLs with embedded credentials are not allowed");
  }
}

async function checkHost(url: URL, resolveHost: (hostname: string) => Promise<string[]>): Promise<void> {
  const hostLower = url.hostname.toLowerCase();
  if (hostLower === "localhost" || hostLower.endsWith(".localhost")) {
    throw new Error("Blocked URL host (localhost)");
  }

  // URL keeps brackets around IPv6 literals
  const literal = hostLower.replace(/^\[|\]$/g, "");
  if (net.isIP(literal)) {
    if (isPrivateIp(literal)) {
      throw new Error("Blocked URL host (private/loopback address)");
    }
    return;
  }

  for (const address of await resolveHost(url.hostname)) {
    if (isPrivateIp(address)) {
      throw new Error("Blocked URL host (private/loopback address)");
    }
  }
}

// ============================================================================
// FETCHING
// ============================================================================

async function fetchWithSafeRedirects(
  initialUrl: URL,
  options: Required<FetchPageOptions>,
  signal: AbortSignal,
): Promise<Response> {
  let current = new URL(initialUrl.toString());

  for (let i = 0; i <= MAX_REDIRECTS; i++) {
    validateUrlForFetch(current);
    await checkHost(current, options.resolveHost);

    let res: Response;
    try {
      res = await options.fetchImpl(current.toString(), {
        redirect: "manual",
        signal,
        headers: {
          "User-Agent": options.userAgent,
          Accept: "text/html,application/xhtml+xml,application/pdf,text/plain;q=0.9,*/*;q=0.8",
        },
      });
    } catch (err) {
      if (signal.aborted) {
        throw timeoutError(options.timeoutMs);
      }
      throw err;
    }

    if (res.status >= 300 && res.status < 400) {
      const location = res.headers.get("location");
      if (!location) throw new Error("Redirect without location header");
      current = new URL(location, current);
      continue;
    }

    return res;
  }

  throw new Error("Too many redirects");
}

function timeoutError(timeoutMs: number): Error {
  return new Error(`Fetch timed out after ${timeoutMs}ms`);
}

/**
 * Read the body up to maxBytes. A stalled body is abandoned once the fetch deadline passes.
 */
async function readBody(res: Response, maxBytes: number, signal: AbortSignal, timeoutMs: number): Promise<Buffer> {
  const reader = res.body?.getReader();
  if (!reader) throw new Error("No response body");

  let onAbort = (): void => undefined;
  const deadline = new Promise<never>((_, reject) => {
    onAbort = () => reject(timeoutError(timeoutMs));
  });
  if (signal.aborted) onAbort();
  else signal.addEventListener("abort", onAbort, { once: true });

  let total = 0;
  const chunks: Uint8Array[] = [];
  try {
    while (true) {
      const { done, value } = await Promise.race([reader.read(), deadline]);
      if (done) break;
      if (value) {
        total += value.length;
        if (total > maxBytes) {
          throw new Error("Response too large");
        }
        chunks.push(value);
      }
    }
  } catch (err) {
    await reader.cancel().catch((cancelErr: unknown) => {
      console.warn(`[Retrieval] Failed to cancel response body: ${toErrorMessage(cancelErr)}`);
    });
    throw signal.aborted ? timeoutError(timeoutMs) : err;
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
  return Buffer.concat(chunks);
}

// ============================================================================
// TEXT EXTRACTION
// ============================================================================

/**
 * Hard-truncate to limit characters, appending "..." when cut.
 */
export function capText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return text.slice(0, limit) + TEXT_CAP_MARKER;
}

function isPdf(url: URL, contentType: string): boolean {
  if (contentType.includes("application/pdf")) return true;
  return url.pathname.toLowerCase().endsWith(".pdf");
}

/**
 * Fetch a URL and return its readable text. Failures raise ExtractionError("url").
 */
export async function fetchPageText(urlStr: string, options: FetchPageOptions = {}): Promise<string> {
  const resolved: Required<FetchPageOptions> = {
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxBytes: options.maxBytes ?? DEFAULT_MAX_BYTES,
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    fetchImpl: options.fetchImpl ?? fetch,
    resolveHost: options.resolveHost ?? defaultResolveHost,
  };

  // One deadline covers redirects, headers and the body.
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), resolved.timeoutMs);

  try {
    const url = new URL(urlStr);
    validateUrlForFetch(url);

    const res = await fetchWithSafeRedirects(url, resolved, ac.signal);
    if (!res.ok) throw new Error(`Fetch failed: ${res.status}`);

    const contentType = (res.headers.get("content-type") ?? "").toLowerCase();
    const body = await readBody(res, resolved.maxBytes, ac.signal, resolved.timeoutMs);

    let text: string;
    if (isPdf(url, contentType)) {
      text = await extractPdfText(body);
    } else if (contentType.includes("html") || contentType === "") {
      text = extractTextFromHtml(body.toString("utf-8"));
    } else if (contentType.startsWith("text/")) {
      text = body.toString("utf-8").replace(/\s+/g, " ").trim();
    } else {
      throw new Error(`Unsupported content type: ${contentType.split(";")[0]}`);
    }

    console.log(`[Retrieval] Extracted ${text.length} chars from ${url.hostname}`);
    return text;
  } catch (err) {
    const message = toErrorMessage(err);
    console.error(`[Retrieval] Failed to fetch ${urlStr}: ${message}`);
    throw new ExtractionError(message, "url");
  } finally {
    clearTimeout(timer);
  }
}
