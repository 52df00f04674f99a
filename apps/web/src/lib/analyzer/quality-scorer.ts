/**
 * Insight Quality Scoring
 *
 * Scores action paragraphs on a 0-100 scale and averages across every action
 * of every keyword. Per action:
 *
 * - words   (max 70): full inside [150, 200] words; linear ramp below
 *                     (70 * words / 150), inverse falloff above (70 * 200 / words)
 * - length  (max 10): 10 * min(chars / 900, 1)
 * - content (max 20): +10 financial figures, +6 market terms, +4 execution terms
 *
 * @module analyzer/quality-scorer
 */

import type { InsightsByKeyword } from "./types";

export const IDEAL_WORD_RANGE = { min: 150, max: 200 } as const;

const WORD_POINTS = 70;
const LENGTH_POINTS = 10;
const LENGTH_FULL_CREDIT_CHARS = 900;

const CONTENT_SIGNALS: Array<{ points: number; terms: string[] }> = [
  { points: 10, terms: ["$", "%", "million", "billion", "revenue", "roi"] },
  { points: 6, terms: ["market", "customer", "competitive", "growth"] },
  { points: 4, terms: ["strategy", "implementation", "timeline"] },
];

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function wordCountComponent(words: number): number {
  if (words <= 0) return 0;
  if (words < IDEAL_WORD_RANGE.min) return (WORD_POINTS * words) / IDEAL_WORD_RANGE.min;
  if (words <= IDEAL_WORD_RANGE.max) return WORD_POINTS;
  return (WORD_POINTS * IDEAL_WORD_RANGE.max) / words;
}

export function lengthComponent(chars: number): number {
  return LENGTH_POINTS * Math.min(chars / LENGTH_FULL_CREDIT_CHARS, 1);
}

export function contentComponent(text: string): number {
  const lower = text.toLowerCase();
  return CONTENT_SIGNALS.reduce(
    (sum, signal) => (signal.terms.some((term) => lower.includes(term)) ? sum + signal.points : sum),
    0,
  );
}

/**
 * Score a single action paragraph, 0-100.
 */
export function scoreAction(action: string): number {
  const text = action.trim();
  const score = wordCountComponent(countWords(text)) + lengthComponent(text.length) + contentComponent(text);
  return Math.min(100, score);
}

/**
 * Mean action score across all keywords, rounded to two decimals. Empty input scores 0.
 */
export function scoreInsights(insightsByKeyword: InsightsByKeyword): number {
  const scores: number[] = [];
  for (const insights of Object.values(insightsByKeyword)) {
    for (const action of insights.actions) {
      scores.push(scoreAction(action));
    }
  }
  if (scores.length === 0) return 0;

  const mean = scores.reduce((a, b) => a + b, 0) / scores.length;
  return Math.round(mean * 100) / 100;
}
