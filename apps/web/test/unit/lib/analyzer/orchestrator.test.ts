/**
 * Analysis Orchestrator Tests
 *
 * Uses a real ModelGateway over a fake text generator; fetcher and extractor
 * are injected fakes. Nothing leaves the process.
 */

import crypto from "crypto";
import { describe, it, expect, vi } from "vitest";
import {
  AnalysisOrchestrator,
  computeAnalysisId,
  resolveTextQuestion,
} from "@/lib/analyzer/orchestrator";
import { ModelGateway } from "@/lib/analyzer/model-gateway";
import { DEFAULT_ANALYSIS_CONFIG } from "@/lib/config-schemas";
import { ExtractionError } from "@/lib/error-classification";
import type { GenerationReply } from "@/lib/analyzer/types";
import { STANDARD_INSIGHTS, STANDARD_REPLY } from "@test/helpers/sample-replies";

function setup(overrides: { reply?: GenerationReply; failWith?: Error; contentBudgetChars?: number } = {}) {
  const generate = vi.fn(async (_prompt: string): Promise<GenerationReply> => {
    if (overrides.failWith) throw overrides.failWith;
    return overrides.reply ?? { content: [{ text: STANDARD_REPLY }] };
  });
  const fetchPage = vi.fn(async (_url: string) => "Quarterly revenue grew across every retail region.");
  const extractDocument = vi.fn(async () => "Annual report: subscription revenue doubled in the enterprise segment.");
  const orchestrator = new AnalysisOrchestrator({
    gateway: new ModelGateway({ generate, providerName: "Claude" }),
    config: { ...DEFAULT_ANALYSIS_CONFIG, contentBudgetChars: overrides.contentBudgetChars ?? 1000 },
    fetchPage,
    extractDocument,
  });
  const promptSent = (): string => generate.mock.calls[0][0];
  return { orchestrator, generate, fetchPage, extractDocument, promptSent };
}

describe("AnalysisOrchestrator", () => {
  describe("analyzeQuestion", () => {
    it("returns parsed keywords and insights", async () => {
      const { orchestrator, promptSent } = setup();
      const result = await orchestrator.analyzeQuestion("How do we grow in Europe?", "expansion");

      expect(result.error).toBeNull();
      expect(result.keywords).toEqual(["Market Expansion", "Customer Retention"]);
      expect(result.insights).toEqual(STANDARD_INSIGHTS);
      expect(result.fullResponse).toBe(STANDARD_REPLY);
      expect(promptSent()).toContain("Question: How do we grow in Europe?\nKeywords: expansion");
      expect(promptSent()).not.toContain("Content:");
    });

    it("derives the analysis id from question and keyword hint", async () => {
      const { orchestrator } = setup();
      const result = await orchestrator.analyzeQuestion("How do we grow in Europe?", "expansion");
      const expected = crypto.createHash("md5").update("How do we grow in Europe?_expansion").digest("hex").slice(0, 8);
      expect(result.analysisId).toBe(expected);
      expect(computeAnalysisId("How do we grow in Europe?", "expansion")).toBe(expected);
    });

    it("rejects a blank question without calling the model", async () => {
      const { orchestrator, generate } = setup();
      expect((await orchestrator.analyzeQuestion("")).error).toBe("Question cannot be empty");
      const result = await orchestrator.analyzeQuestion("   ");

      expect(result).toEqual({
        keywords: [],
        insights: {},
        fullResponse: "",
        error: "Question cannot be empty",
        errorCategory: "input_error",
        analysisId: null,
      });
      expect(generate).not.toHaveBeenCalled();
    });

    it("turns gateway failures into an error result", async () => {
      const { orchestrator } = setup({ failWith: new Error("service overloaded") });
      const result = await orchestrator.analyzeQuestion("Where next?");

      expect(result.error).toBe("Error calling Claude: service overloaded");
      expect(result.fullResponse).toBe("Error calling Claude: service overloaded");
      expect(result.errorCategory).toBe("rate_limit");
      expect(result.keywords).toEqual([]);
      expect(result.insights).toEqual({});
      expect(result.analysisId).toBe(computeAnalysisId("Where next?", ""));
    });

    it("reports an empty model reply as a provider failure", async () => {
      const { orchestrator } = setup({ reply: { content: [] } });
      const result = await orchestrator.analyzeQuestion("Where next?");
      expect(result.error).toBe("Error: Empty response from Claude");
      expect(result.errorCategory).toBe("provider_outage");
    });
  });

  describe("analyzeText", () => {
    it("builds a content-aware prompt when text and question are given", async () => {
      const { orchestrator, promptSent } = setup();
      const result = await orchestrator.analyzeText("Our churn doubled last quarter.", "what should we fix?");

      expect(result.error).toBeNull();
      expect(promptSent()).toContain("Question: Based on the content, what should we fix?");
      expect(promptSent()).toContain("Content: Our churn doubled last quarter.");
    });

    it("truncates content to the configured budget", async () => {
      const { orchestrator, promptSent } = setup({ contentBudgetChars: 10 });
      await orchestrator.analyzeText("abcdefghijklmnopqrstuvwxyz");
      expect(promptSent()).toContain("Content: abcdefghij...\n");
    });

    it("falls back to a keyword-only question", async () => {
      const { orchestrator, promptSent } = setup();
      await orchestrator.analyzeText(undefined, undefined, "pricing");
      expect(promptSent()).toContain("Question: Analyze pricing\nKeywords: pricing");
      expect(promptSent()).not.toContain("Content:");
    });

    it("requires at least one input", async () => {
      const { orchestrator, generate } = setup();
      const result = await orchestrator.analyzeText("  ", "", undefined);
      expect(result.error).toBe("At least one of text, question or keywords must be provided");
      expect(result.errorCategory).toBe("input_error");
      expect(generate).not.toHaveBeenCalled();
    });
  });

  describe("resolveTextQuestion", () => {
    it("applies text/question/keyword precedence", () => {
      expect(resolveTextQuestion("body", "why?", "k")).toEqual({ question: "Based on the content, why?", keywordHint: "k" });
      expect(resolveTextQuestion("body", undefined, "k")).toEqual({ question: "Analyze content focusing on k", keywordHint: "k" });
      expect(resolveTextQuestion("body", " ", undefined)).toEqual({
        question: "Analyze content for business opportunities",
        keywordHint: "",
      });
      expect(resolveTextQuestion(undefined, "why?", undefined)).toEqual({ question: "why?", keywordHint: "" });
      expect(resolveTextQuestion("", undefined, "k")).toEqual({ question: "Analyze k", keywordHint: "k" });
    });
  });

  describe("analyzeFile", () => {
    it("analyzes extracted text with the fixed file question", async () => {
      const { orchestrator, extractDocument, promptSent } = setup();
      const file = { bytes: new Uint8Array([1, 2, 3]), filename: "report.pdf", contentType: "application/pdf" };
      const result = await orchestrator.analyzeFile(file);

      expect(extractDocument).toHaveBeenCalledWith(file);
      expect(result.error).toBeNull();
      expect(result.filename).toBe("report.pdf");
      expect(result.sourceText).toBe("Annual report: subscription revenue doubled in the enterprise segment.");
      expect(promptSent()).toContain(
        "Question: Based on the content, extract strategic business insights and market opportunities",
      );
      expect(promptSent()).toContain("Content: Annual report: subscription revenue doubled");
    });

    it("returns an extraction error without calling the model", async () => {
      const { orchestrator, generate, extractDocument } = setup();
      extractDocument.mockRejectedValueOnce(new ExtractionError("File type not supported: .pptx", "file"));

      const result = await orchestrator.analyzeFile({ bytes: new Uint8Array([1]), filename: "deck.pptx" });

      expect(result).toEqual({
        keywords: [],
        insights: {},
        fullResponse: "",
        error: "Error: File type not supported: .pptx",
        errorCategory: "extraction_error",
        analysisId: null,
        filename: "deck.pptx",
      });
      expect(generate).not.toHaveBeenCalled();
    });
  });

  describe("analyzeUrl", () => {
    it("fetches the page and analyzes its text", async () => {
      const { orchestrator, fetchPage, promptSent } = setup();
      const result = await orchestrator.analyzeUrl("https://example.com/news", undefined, "retail");

      expect(fetchPage).toHaveBeenCalledWith("https://example.com/news");
      expect(result.url).toBe("https://example.com/news");
      expect(result.error).toBeNull();
      expect(result.sourceText).toBe("Quarterly revenue grew across every retail region.");
      expect(promptSent()).toContain("Question: Based on the content, Analyze this web content\nKeywords: retail");
      expect(promptSent()).toContain("Content: Quarterly revenue grew across every retail region.");
    });

    it("uses the caller's question when given", async () => {
      const { orchestrator, promptSent } = setup();
      await orchestrator.analyzeUrl("https://example.com/news", "Who are the competitors?");
      expect(promptSent()).toContain("Question: Based on the content, Who are the competitors?");
    });

    it("caps page text before building the prompt", async () => {
      const { orchestrator, fetchPage, promptSent } = setup({ contentBudgetChars: 5000 });
      fetchPage.mockResolvedValueOnce("a".repeat(3000));
      await orchestrator.analyzeUrl("https://example.com/long");
      expect(promptSent()).toContain(`Content: ${"a".repeat(2500)}...\n`);
    });

    it("reports fetch failures with the URL attached", async () => {
      const { orchestrator, generate, fetchPage } = setup();
      fetchPage.mockRejectedValueOnce(new ExtractionError("Fetch failed: 404", "url"));

      const result = await orchestrator.analyzeUrl("https://example.com/missing");

      expect(result.error).toBe("Error analyzing URL: Fetch failed: 404");
      expect(result.errorCategory).toBe("extraction_error");
      expect(result.url).toBe("https://example.com/missing");
      expect(generate).not.toHaveBeenCalled();
    });

    it("reports pages without text", async () => {
      const { orchestrator, fetchPage } = setup();
      fetchPage.mockResolvedValueOnce("   ");
      const result = await orchestrator.analyzeUrl("https://example.com/blank");
      expect(result.error).toBe("Error analyzing URL: Insufficient content extracted from URL");
      expect(result.keywords).toEqual([]);
    });
  });

  describe("analyzeComprehensive", () => {
    it("merges pasted text with the page text", async () => {
      const { orchestrator, fetchPage, promptSent } = setup();
      const result = await orchestrator.analyzeComprehensive("Notes on Acme.", " https://example.com/news ", "retail");

      expect(fetchPage).toHaveBeenCalledWith("https://example.com/news");
      expect(result.error).toBeNull();
      expect(result.url).toBe("https://example.com/news");
      expect(result.sourceText).toBe("Notes on Acme. Quarterly revenue grew across every retail region.");
      expect(promptSent()).toContain("Question: Based on the content, Provide comprehensive market trend analysis\nKeywords: retail");
    });

    it("analyzes text alone without fetching", async () => {
      const { orchestrator, fetchPage } = setup();
      const result = await orchestrator.analyzeComprehensive("Churn fell after the pricing change.");
      expect(fetchPage).not.toHaveBeenCalled();
      expect(result.error).toBeNull();
      expect(result.url).toBeUndefined();
    });

    it("continues with the text when the page cannot be fetched", async () => {
      const { orchestrator, fetchPage } = setup();
      fetchPage.mockRejectedValueOnce(new ExtractionError("Fetch failed: 500", "url"));

      const result = await orchestrator.analyzeComprehensive("Churn fell after the pricing change.", "https://example.com/down");

      expect(result.error).toBeNull();
      expect(result.sourceText).toBe("Churn fell after the pricing change.");
    });

    it("fails when only a URL was given and it cannot be fetched", async () => {
      const { orchestrator, generate, fetchPage } = setup();
      fetchPage.mockRejectedValueOnce(new ExtractionError("Fetch failed: 500", "url"));

      const result = await orchestrator.analyzeComprehensive(undefined, "https://example.com/down");

      expect(result.error).toBe("Failed to extract content from URL: Fetch failed: 500");
      expect(result.errorCategory).toBe("extraction_error");
      expect(result.url).toBe("https://example.com/down");
      expect(generate).not.toHaveBeenCalled();
    });

    it("requires text or a URL", async () => {
      const { orchestrator } = setup();
      const result = await orchestrator.analyzeComprehensive("  ", "");
      expect(result.error).toBe("Text or URL is required");
      expect(result.errorCategory).toBe("input_error");
    });

    it("rejects merged content under the minimum length", async () => {
      const { orchestrator, generate } = setup();
      const result = await orchestrator.analyzeComprehensive("tiny");
      expect(result.error).toBe("Content too short for analysis");
      expect(generate).not.toHaveBeenCalled();
    });
  });

  it("clears the gateway cache", async () => {
    const { orchestrator, generate } = setup();
    await orchestrator.analyzeQuestion("Same question");
    expect(orchestrator.clearCache()).toBe(1);
    await orchestrator.analyzeQuestion("Same question");
    expect(generate).toHaveBeenCalledTimes(2);
  });
});
