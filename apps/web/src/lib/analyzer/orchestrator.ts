/**
 * Analysis Orchestrator
 *
 * The public analysis operations (question, text, file, URL, comprehensive).
 * Each one funnels into runPipeline: build prompt -> gateway -> parse.
 *
 * No operation throws. Every failure becomes an AnalysisResult with `error`
 * set, empty keywords and empty insights.
 *
 * @module analyzer/orchestrator
 */

import crypto from "crypto";
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from "../config-schemas";
import {
  AnalysisInputError,
  ExtractionError,
  UpstreamModelError,
  classifyError,
  toErrorMessage,
} from "../error-classification";
import { extractDocumentText, type DocumentExtractor } from "../document-extraction";
import { capText, fetchPageText, type PageFetcher } from "../retrieval";
import { debugLog } from "./debug";
import { ModelGateway, isGatewayError } from "./model-gateway";
import { buildPrompt } from "./prompts/prompt-builder";
import { parseResponse } from "./response-parser";
import type { AnalysisResult, DocumentInput } from "./types";

export const FILE_ANALYSIS_QUESTION = "extract strategic business insights and market opportunities";
export const URL_ANALYSIS_QUESTION = "Analyze this web content";
export const COMPREHENSIVE_ANALYSIS_QUESTION = "Provide comprehensive market trend analysis";

export interface AnalysisOrchestratorOptions {
  gateway: ModelGateway;
  config?: AnalysisConfig;
  fetchPage?: PageFetcher;
  extractDocument?: DocumentExtractor;
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

type ResultExtras = Pick<AnalysisResult, "url" | "filename" | "sourceText">;

async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

function hasContent(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Short correlation id: first 8 hex chars of md5("<question>_<keywordHint>").
 */
export function computeAnalysisId(question: string, keywordHint: string = ""): string {
  return crypto.createHash("md5").update(`${question}_${keywordHint}`).digest("hex").slice(0, 8);
}

/**
 * Effective question and keyword hint for text analysis.
 * Precedence: text+question > text+keywords > text > question > keywords.
 */
export function resolveTextQuestion(
  text: string | undefined,
  question: string | undefined,
  keywordHint: string | undefined,
): { question: string; keywordHint: string } {
  const hasText = hasContent(text);
  const hint = hasContent(keywordHint) ? keywordHint : "";

  if (hasText && hasContent(question)) {
    return { question: `Based on the content, ${question}`, keywordHint: hint };
  }
  if (hasText && hint) {
    return { question: `Analyze content focusing on ${hint}`, keywordHint: hint };
  }
  if (hasText) {
    return { question: "Analyze content for business opportunities", keywordHint: hint };
  }
  if (hasContent(question)) {
    return { question, keywordHint: hint };
  }
  return { question: `Analyze ${hint}`, keywordHint: hint };
}

/**
 * Build an error result. The invariant (error => no keywords, no insights) holds by construction.
 */
export function errorResult(
  error: unknown,
  options: { message?: string; fullResponse?: string; analysisId?: string | null; extras?: ResultExtras } = {},
): AnalysisResult {
  return {
    keywords: [],
    insights: {},
    fullResponse: options.fullResponse ?? "",
    error: options.message ?? toErrorMessage(error),
    errorCategory: classifyError(error).category,
    analysisId: options.analysisId ?? null,
    ...options.extras,
  };
}

export class AnalysisOrchestrator {
  private readonly gateway: ModelGateway;
  private readonly config: AnalysisConfig;
  private readonly fetchPage: PageFetcher;
  private readonly extractDocument: DocumentExtractor;

  constructor(options: AnalysisOrchestratorOptions) {
    this.gateway = options.gateway;
    this.config = options.config ?? DEFAULT_ANALYSIS_CONFIG;
    this.fetchPage =
      options.fetchPage ??
      ((url) =>
        fetchPageText(url, {
          timeoutMs: this.config.fetchTimeoutMs,
          maxBytes: this.config.fetchMaxBytes,
          userAgent: this.config.userAgent,
        }));
    this.extractDocument =
      options.extractDocument ?? ((input) => extractDocumentText(input, { maxFileBytes: this.config.maxFileBytes }));
  }

  async analyzeQuestion(question: string, keywordHint: string = ""): Promise<AnalysisResult> {
    try {
      if (!hasContent(question)) {
        return errorResult(new AnalysisInputError("Question cannot be empty"));
      }
      return await this.runPipeline(question, keywordHint ?? "");
    } catch (err) {
      console.error("[Orchestrator] analyzeQuestion failed:", err);
      return errorResult(err, { message: `Error analyzing question: ${toErrorMessage(err)}` });
    }
  }

  async analyzeText(text?: string, question?: string, keywordHint?: string): Promise<AnalysisResult> {
    try {
      if (!hasContent(text) && !hasContent(question) && !hasContent(keywordHint)) {
        return errorResult(new AnalysisInputError("At least one of text, question or keywords must be provided"));
      }
      const effective = resolveTextQuestion(text, question, keywordHint);
      return await this.runPipeline(effective.question, effective.keywordHint, hasContent(text) ? text : undefined);
    } catch (err) {
      console.error("[Orchestrator] analyzeText failed:", err);
      return errorResult(err, { message: `Error: ${toErrorMessage(err)}` });
    }
  }

  async analyzeFile(file: DocumentInput): Promise<AnalysisResult> {
    const extras: ResultExtras = file.filename ? { filename: file.filename } : {};
    try {
      const extracted = await attempt(() => this.extractDocument(file));
      if (!extracted.ok) {
        console.warn(`[Orchestrator] File extraction failed: ${toErrorMessage(extracted.error)}`);
        return errorResult(extracted.error, { message: `Error: ${toErrorMessage(extracted.error)}`, extras });
      }
      const result = await this.analyzeText(extracted.value, FILE_ANALYSIS_QUESTION);
      return { ...result, ...extras, sourceText: extracted.value };
    } catch (err) {
      console.error("[Orchestrator] analyzeFile failed:", err);
      return errorResult(err, { message: `Error: ${toErrorMessage(err)}`, extras });
    }
  }

  async analyzeUrl(url: string, question?: string, keywordHint?: string): Promise<AnalysisResult> {
    const extras: ResultExtras = { url };
    try {
      if (!hasContent(url)) {
        return errorResult(new AnalysisInputError("URL cannot be empty"), { extras });
      }

      const fetched = await attempt(() => this.fetchPage(url.trim()));
      if (!fetched.ok) {
        return errorResult(fetched.error, {
          message: `Error analyzing URL: ${toErrorMessage(fetched.error)}`,
          extras,
        });
      }

      const text = capText(fetched.value.trim(), this.config.urlTextLimitChars);
      if (!text) {
        const empty = new ExtractionError("Insufficient content extracted from URL", "url");
        return errorResult(empty, { message: `Error analyzing URL: ${empty.message}`, extras });
      }

      const result = await this.analyzeText(text, hasContent(question) ? question : URL_ANALYSIS_QUESTION, keywordHint);
      return { ...result, ...extras, sourceText: text };
    } catch (err) {
      console.error("[Orchestrator] analyzeUrl failed:", err);
      return errorResult(err, { message: `Error analyzing URL: ${toErrorMessage(err)}`, extras });
    }
  }

  /**
   * Pasted text merged with an optional page's text, analyzed with the fixed
   * comprehensive question. A failed fetch is tolerated when text was supplied.
   */
  async analyzeComprehensive(text?: string, url?: string, keywordHint?: string): Promise<AnalysisResult> {
    const target = hasContent(url) ? url.trim() : "";
    const extras: ResultExtras = target ? { url: target } : {};
    try {
      if (!hasContent(text) && !target) {
        return errorResult(new AnalysisInputError("Text or URL is required"));
      }

      let merged = hasContent(text) ? text.trim() : "";
      if (target) {
        const fetched = await attempt(() => this.fetchPage(target));
        if (fetched.ok) {
          merged = `${merged} ${capText(fetched.value.trim(), this.config.urlTextLimitChars)}`.trim();
        } else if (!merged) {
          return errorResult(fetched.error, {
            message: `Failed to extract content from URL: ${toErrorMessage(fetched.error)}`,
            extras,
          });
        } else {
          console.warn(`[Orchestrator] Continuing without page text: ${toErrorMessage(fetched.error)}`);
        }
      }

      if (merged.length < this.config.minTextChars) {
        return errorResult(new AnalysisInputError("Content too short for analysis"), { extras });
      }

      const result = await this.analyzeText(merged, COMPREHENSIVE_ANALYSIS_QUESTION, keywordHint);
      return { ...result, ...extras, sourceText: merged };
    } catch (err) {
      console.error("[Orchestrator] analyzeComprehensive failed:", err);
      return errorResult(err, { message: `Error: ${toErrorMessage(err)}`, extras });
    }
  }

  clearCache(): number {
    return this.gateway.clearCache();
  }

  private async runPipeline(question: string, keywordHint: string, content?: string): Promise<AnalysisResult> {
    const analysisId = computeAnalysisId(question, keywordHint);
    const prompt = buildPrompt(question, keywordHint, content, this.config.contentBudgetChars);

    debugLog(`[Orchestrator] Starting analysis ${analysisId}`, {
      question: question.slice(0, 50),
      withContent: content !== undefined,
    });

    const reply = await this.gateway.invoke(prompt);
    if (isGatewayError(reply)) {
      return errorResult(new UpstreamModelError(reply, this.gateway.providerName), {
        fullResponse: reply,
        analysisId,
      });
    }

    const parsed = parseResponse(reply);
    return {
      keywords: parsed.keywords,
      insights: parsed.insightsByKeyword,
      fullResponse: reply,
      error: null,
      analysisId,
    };
  }
}
