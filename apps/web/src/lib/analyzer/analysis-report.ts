/**
 * Analysis Report
 *
 * Summary view returned by the API next to the raw AnalysisResult. Signals
 * (sentiment, hashtags, brands) come from the source text; keywords, sections,
 * lead actions and the quality score come from the model analysis when it succeeded.
 *
 * @module analyzer/analysis-report
 */

import { isInsightLookupError, safeGetInsight } from "./insight-lookup";
import { countWords, scoreInsights } from "./quality-scorer";
import { analyzeSentiment, extractBrandMentions, extractHashtags } from "./text-signals";
import type { AnalysisResult } from "./types";

const SUMMARY_REPLY_CHARS = 300;
const SUMMARY_SOURCE_CHARS = 200;
const MAX_KEY_INSIGHTS = 5;
const MAX_RECOMMENDATIONS = 4;

export const DEFAULT_RECOMMENDATIONS = [
  "Monitor trending hashtags for engagement opportunities",
  "Track sentiment changes over time",
  "Engage with positive sentiment content",
  "Address any negative sentiment concerns",
] as const;

export interface AnalysisReport {
  summary: string;
  sentiment: string;
  hashtags: string[];
  brandMentions: Record<string, number>;
  keyInsights: string[];
  recommendations: string[];
  /** First action of each recommended section that has one */
  topActions: string[];
  qualityScore: number;
  wordCount: number;
  analysisTime: string;
}

export interface AnalysisReportOptions {
  brands?: string[];
  now?: () => Date;
}

export function buildAnalysisReport(
  source: string,
  result: AnalysisResult,
  options: AnalysisReportOptions = {},
): AnalysisReport {
  const now = options.now ?? (() => new Date());
  const succeeded = result.error === null;

  const sentiment = analyzeSentiment(source);
  const hashtags = extractHashtags(source);
  const brandMentions = extractBrandMentions(source, options.brands);

  const keywords = succeeded ? result.keywords.slice(0, MAX_KEY_INSIGHTS) : [];
  const sections = succeeded ? Object.keys(result.insights).slice(0, MAX_RECOMMENDATIONS) : [];

  const keyInsights =
    keywords.length > 0
      ? keywords
      : [
          `Sentiment analysis shows ${sentiment.sentiment.toLowerCase()} sentiment`,
          `Identified ${hashtags.length} key topics for trend monitoring`,
          `Found ${Object.keys(brandMentions).length} brand mentions in the content`,
          "Content analysis completed successfully",
        ];

  let summary: string;
  if (succeeded && result.fullResponse) {
    summary = result.fullResponse.slice(0, SUMMARY_REPLY_CHARS) + "...";
  } else {
    summary = source.length > SUMMARY_SOURCE_CHARS ? source.slice(0, SUMMARY_SOURCE_CHARS) + "..." : source;
  }

  const topActions = sections
    .map((section) => safeGetInsight(result, section))
    .filter((action) => !isInsightLookupError(action));

  return {
    summary,
    sentiment: `${sentiment.sentiment} (polarity: ${sentiment.polarity})`,
    hashtags,
    brandMentions,
    keyInsights,
    recommendations: sections.length > 0 ? sections : [...DEFAULT_RECOMMENDATIONS],
    topActions,
    qualityScore: succeeded ? scoreInsights(result.insights) : 0,
    wordCount: countWords(source),
    analysisTime: now().toISOString(),
  };
}
