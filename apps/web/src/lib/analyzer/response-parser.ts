/**
 * Response Parser
 *
 * Turns a model reply into keywords plus per-keyword insight lists.
 * Three layouts are recognized, tried in order:
 *
 * 1. standard    - "KEYWORDS IDENTIFIED" marker, "KEYWORD n: name" sections with
 *                  INSIGHTS / ACTIONS blocks. Parsed line-by-line by a small state machine.
 * 2. alternative - a "Keywords:" line with a numbered list; sections are lines that
 *                  mention a keyword and end with a colon, actions are dash items.
 * 3. fallback    - keywords picked from a fixed shortlist, paired with paragraphs.
 *
 * parseResponse never throws. Keys of insightsByKeyword are taken from the reply
 * as written and may not match the keyword list exactly.
 *
 * @module analyzer/response-parser
 */

import type { KeywordInsights, ParsedAnalysis, ReplyFormat } from "./types";

// ============================================================================
// CONSTANTS
// ============================================================================

export const STANDARD_FORMAT_MARKER = "KEYWORDS IDENTIFIED";

/** Fallback keyword candidates, in selection order. */
export const FALLBACK_KEYWORD_SHORTLIST = [
  "Market",
  "Growth",
  "Customer",
  "Revenue",
  "Innovation",
  "Technology",
  "Competition",
  "Strategy",
] as const;

/** Titles used when the reply layout carries none. */
export const PLACEHOLDER_TITLES = ["Strategic Overview", "Key Opportunities", "Recommended Actions"] as const;

const MAX_FALLBACK_KEYWORDS = 5;
const FALLBACK_PARAGRAPH_CHARS = 500;

// ============================================================================
// LINE CLASSIFICATION
// ============================================================================

export type ParserState = "idle" | "collecting-keywords" | "collecting-titles" | "collecting-actions";

export type MarkerKind = "keywords" | "keyword-header" | "insights" | "actions" | "other";

export type LineTag =
  | { kind: "blank" }
  | { kind: "marker"; marker: MarkerKind; value: string; line: string }
  | { kind: "numbered-item"; text: string; line: string }
  | { kind: "dash-item"; text: string; line: string }
  | { kind: "plain"; text: string; line: string };

/**
 * Remove bold markers and a leading markdown heading prefix.
 */
export function stripEmphasis(line: string): string {
  return line.replace(/\*\*/g, "").replace(/^#+\s*/, "").trim();
}

export function classifyLine(rawLine: string): LineTag {
  const line = rawLine.trim();
  if (!line) return { kind: "blank" };

  const bare = stripEmphasis(line);

  const keywordsMarker = /^KEYWORDS IDENTIFIED\s*:?\s*(.*)$/i.exec(bare);
  if (keywordsMarker) {
    return { kind: "marker", marker: "keywords", value: keywordsMarker[1].trim(), line };
  }

  const header = /^KEYWORD\s*\d+\s*:\s*(.*)$/i.exec(bare);
  if (header) {
    return { kind: "marker", marker: "keyword-header", value: header[1].trim(), line };
  }

  if (/^INSIGHTS\s*:/i.test(bare)) {
    return { kind: "marker", marker: "insights", value: "", line };
  }
  if (/^ACTIONS\s*:/i.test(bare)) {
    return { kind: "marker", marker: "actions", value: "", line };
  }

  const numbered = /^\d+\.\s*(.*)$/.exec(line);
  if (numbered) {
    return { kind: "numbered-item", text: numbered[1].trim(), line };
  }

  const dash = /^-\s+(.*)$/.exec(line);
  if (dash) {
    return { kind: "dash-item", text: dash[1].trim(), line };
  }

  if (line.startsWith("**") || line.startsWith("#")) {
    return { kind: "marker", marker: "other", value: bare, line };
  }

  return { kind: "plain", text: line, line };
}

/**
 * Split a keyword list line on commas after removing square brackets.
 */
export function splitKeywordLine(line: string): string[] {
  return line
    .replace(/[[\]]/g, "")
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

// ============================================================================
// STANDARD FORMAT (state machine)
// ============================================================================

interface KeywordSection {
  name: string;
  titles: string[];
  actions: string[];
}

interface StandardParseContext {
  state: ParserState;
  keywords: string[];
  insights: Map<string, KeywordInsights>;
  current: KeywordSection | null;
}

function flushSection(ctx: StandardParseContext): void {
  const section = ctx.current;
  if (section && (section.titles.length > 0 || section.actions.length > 0)) {
    ctx.insights.set(section.name, { titles: section.titles, actions: section.actions });
  }
}

function onMarker(ctx: StandardParseContext, marker: MarkerKind, value: string): void {
  switch (marker) {
    case "keywords":
      if (value) {
        ctx.keywords = splitKeywordLine(value);
        ctx.state = "idle";
      } else {
        ctx.state = "collecting-keywords";
      }
      return;
    case "keyword-header":
      flushSection(ctx);
      ctx.current = value ? { name: value, titles: [], actions: [] } : null;
      ctx.state = "idle";
      return;
    case "insights":
      ctx.state = "collecting-titles";
      return;
    case "actions":
      ctx.state = "collecting-actions";
      return;
    case "other":
      return;
  }
}

function onItem(ctx: StandardParseContext, text: string, line: string): void {
  if (ctx.state === "collecting-keywords") {
    ctx.keywords = splitKeywordLine(line);
    ctx.state = "idle";
    return;
  }
  if (!ctx.current || !text) return;
  if (ctx.state === "collecting-titles") {
    ctx.current.titles.push(text);
  } else if (ctx.state === "collecting-actions") {
    ctx.current.actions.push(text);
  }
}

function onPlain(ctx: StandardParseContext, text: string): void {
  if (ctx.state === "collecting-keywords") {
    ctx.keywords = splitKeywordLine(text);
    ctx.state = "idle";
    return;
  }
  if (ctx.state === "collecting-actions" && ctx.current && ctx.current.actions.length > 0) {
    const actions = ctx.current.actions;
    actions[actions.length - 1] += " " + text;
  }
}

/**
 * Apply one classified line to the parse context.
 */
export function applyLine(ctx: StandardParseContext, tag: LineTag): void {
  switch (tag.kind) {
    case "blank":
      return;
    case "marker":
      onMarker(ctx, tag.marker, tag.value);
      return;
    case "numbered-item":
    case "dash-item":
      onItem(ctx, tag.text, tag.line);
      return;
    case "plain":
      onPlain(ctx, tag.text);
      return;
  }
}

export function parseStandardFormat(reply: string): ParsedAnalysis {
  const ctx: StandardParseContext = {
    state: "idle",
    keywords: [],
    insights: new Map(),
    current: null,
  };

  for (const rawLine of reply.split(/\r?\n/)) {
    applyLine(ctx, classifyLine(rawLine));
  }
  flushSection(ctx);

  return { keywords: ctx.keywords, insightsByKeyword: Object.fromEntries(ctx.insights) };
}

// ============================================================================
// ALTERNATIVE FORMAT
// ============================================================================

const KEYWORDS_LINE = /^keywords\s*:\s*(.*)$/i;

function cleanKeyword(raw: string): string {
  return raw.trim().replace(/[\s:(),;]+$/, "");
}

/**
 * Extract keywords from the remainder of a "Keywords:" line.
 * "1. Alpha 2. Beta:" yields ["Alpha", "Beta"]; without numbering, commas split.
 */
export function extractNumberedKeywords(remainder: string): string[] {
  const numbered = Array.from(remainder.matchAll(/\d+\.\s*(.+?)(?=\s*\d+\.|$)/g), (m) => cleanKeyword(m[1]));
  const keywords = numbered.length > 0 ? numbered : remainder.split(",").map(cleanKeyword);
  return keywords.filter((k) => k.length > 0);
}

function findKeywordsLine(lines: string[]): number {
  return lines.findIndex((line) => KEYWORDS_LINE.test(stripEmphasis(line)));
}

export function parseAlternativeFormat(reply: string): ParsedAnalysis {
  const lines = reply.split(/\r?\n/);
  const keywordsIndex = findKeywordsLine(lines);
  if (keywordsIndex < 0) {
    return { keywords: [], insightsByKeyword: {} };
  }

  const match = KEYWORDS_LINE.exec(stripEmphasis(lines[keywordsIndex]));
  const keywords = extractNumberedKeywords(match ? match[1] : "");
  const needles = keywords.map((k) => k.toLowerCase());

  const insights = new Map<string, KeywordInsights>();
  let current: { name: string; actions: string[] } | null = null;

  const flush = () => {
    if (current) {
      insights.set(current.name, { titles: [...PLACEHOLDER_TITLES], actions: current.actions });
    }
  };

  for (const rawLine of lines.slice(keywordsIndex + 1)) {
    const line = rawLine.trim();
    if (!line) continue;

    const bare = stripEmphasis(line);
    const lower = bare.toLowerCase();
    if (bare.endsWith(":") && needles.some((k) => lower.includes(k))) {
      flush();
      current = { name: bare.slice(0, -1).trim(), actions: [] };
      continue;
    }

    const dash = /^-\s+(.*)$/.exec(line);
    if (current && dash && dash[1].trim()) {
      current.actions.push(dash[1].trim());
    }
  }
  flush();

  return { keywords, insightsByKeyword: Object.fromEntries(insights) };
}

// ============================================================================
// FALLBACK FORMAT
// ============================================================================

export function parseFallbackFormat(reply: string): ParsedAnalysis {
  const lower = reply.toLowerCase();
  const keywords: string[] = FALLBACK_KEYWORD_SHORTLIST.filter((term) => lower.includes(term.toLowerCase())).slice(
    0,
    MAX_FALLBACK_KEYWORDS,
  );

  const paragraphs = reply
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const insights = new Map<string, KeywordInsights>();
  keywords.forEach((keyword, i) => {
    const paragraph = paragraphs[i];
    if (paragraph) {
      insights.set(keyword, {
        titles: [...PLACEHOLDER_TITLES],
        actions: [paragraph.slice(0, FALLBACK_PARAGRAPH_CHARS)],
      });
    }
  });

  return { keywords, insightsByKeyword: Object.fromEntries(insights) };
}

// ============================================================================
// ENTRY POINT
// ============================================================================

export function detectReplyFormat(reply: string): ReplyFormat {
  if (reply.includes(STANDARD_FORMAT_MARKER)) return "standard";
  if (findKeywordsLine(reply.split(/\r?\n/)) >= 0) return "alternative";
  return "fallback";
}

/**
 * Parse a model reply. Never throws; internal failures yield an empty result.
 */
export function parseResponse(reply: string): ParsedAnalysis {
  try {
    if (typeof reply !== "string") {
      return { keywords: [], insightsByKeyword: {} };
    }

    const format = detectReplyFormat(reply);
    const parsed =
      format === "standard"
        ? parseStandardFormat(reply)
        : format === "alternative"
          ? parseAlternativeFormat(reply)
          : parseFallbackFormat(reply);

    console.log(
      `[Parser] ${format} format: ${parsed.keywords.length} keywords, ${Object.keys(parsed.insightsByKeyword).length} sections`,
    );
    return parsed;
  } catch (err) {
    console.error("[Parser] Error parsing response:", err);
    return { keywords: [], insightsByKeyword: {} };
  }
}
