/**
 * Analyzer - Shared Types
 *
 * Value objects passed between prompt building, the model gateway, the
 * response parser, and the orchestrator. None of them outlive one request.
 *
 * @module analyzer/types
 */

import type { ErrorCategory } from "../error-classification";

// ============================================================================
// MODEL GATEWAY
// ============================================================================

/** Reply shape of the text-generation service: first segment carries the text. */
export interface GenerationReply {
  content?: Array<{ text?: string }>;
}

export type TextGenerator = (prompt: string) => Promise<GenerationReply>;

// ============================================================================
// REQUESTS
// ============================================================================

/** Uploaded document handed to the document extractor. */
export interface DocumentInput {
  bytes: Uint8Array;
  filename?: string;
  contentType?: string;
}

// ============================================================================
// PARSED REPLY
// ============================================================================

export interface KeywordInsights {
  /** Short strategic-focus labels */
  titles: string[];
  /** Long-form recommendation paragraphs */
  actions: string[];
}

export type InsightsByKeyword = Record<string, KeywordInsights>;

export type ReplyFormat = "standard" | "alternative" | "fallback";

/**
 * Parser output. Keys of insightsByKeyword are the section headers as written;
 * they need not match entries in keywords.
 */
export interface ParsedAnalysis {
  keywords: string[];
  insightsByKeyword: InsightsByKeyword;
}

// ============================================================================
// RESULT
// ============================================================================

/**
 * Always-populated result of every public analysis operation.
 * When error is set, keywords is [] and insights is {}.
 */
export interface AnalysisResult {
  keywords: string[];
  insights: InsightsByKeyword;
  fullResponse: string;
  error: string | null;
  errorCategory?: ErrorCategory;
  analysisId: string | null;
  url?: string;
  filename?: string;
  /** Page or document text the analysis ran on (URL, file and comprehensive analysis). */
  sourceText?: string;
}
