/**
 * Safe accessor for a single title or action in an analysis result.
 * Returns the entry, or an "Error: ..." string describing why it is unavailable.
 *
 * @module analyzer/insight-lookup
 */

import type { AnalysisResult, KeywordInsights } from "./types";

export type InsightKind = keyof KeywordInsights;

const LOOKUP_ERROR_PREFIX = "Error: ";

export function isInsightLookupError(value: string): boolean {
  return value.startsWith(LOOKUP_ERROR_PREFIX);
}

export function safeGetInsight(
  result: Pick<AnalysisResult, "insights"> | null | undefined,
  keyword: string,
  kind: InsightKind = "actions",
  index: number = 0,
): string {
  if (!result) {
    return "Error: analysis result is empty";
  }

  const insights = result.insights ?? {};
  const keys = Object.keys(insights);
  if (keys.length === 0) {
    return "Error: No insights found";
  }

  const entry = Object.prototype.hasOwnProperty.call(insights, keyword) ? insights[keyword] : undefined;
  if (!entry) {
    return `Error: Keyword '${keyword}' not found. Available: ${keys.join(", ")}`;
  }

  const items = entry[kind];
  if (!Array.isArray(items)) {
    return `Error: Missing '${kind}' data`;
  }
  if (index < 0 || index >= items.length) {
    return `Error: Index ${index} out of range (total: ${items.length})`;
  }
  return items[index];
}
