/**
 * Prompt Builder - composes the analysis prompt from a question, keyword hints,
 * and optional source content.
 *
 * Pure: no I/O.
 */

import { getBusinessInsightsBasePrompt, getContentAnalysisBasePrompt } from "./base/business-insights-base";

export const DEFAULT_CONTENT_BUDGET_CHARS = 1000;
export const TRUNCATION_MARKER = "...";

/**
 * Cut content to the budget, appending the truncation marker when anything was dropped.
 */
export function truncateContent(content: string, budget: number = DEFAULT_CONTENT_BUDGET_CHARS): string {
  if (content.length <= budget) return content;
  return content.slice(0, budget) + TRUNCATION_MARKER;
}

/**
 * Build the model prompt. Content-aware when content is supplied (non-empty),
 * content-free otherwise.
 */
export function buildPrompt(
  question: string,
  keywordHint: string = "",
  content?: string,
  contentBudget: number = DEFAULT_CONTENT_BUDGET_CHARS,
): string {
  if (content) {
    return getContentAnalysisBasePrompt({
      question,
      keywordHint,
      content: truncateContent(content, contentBudget),
    });
  }
  return getBusinessInsightsBasePrompt({ question, keywordHint });
}
