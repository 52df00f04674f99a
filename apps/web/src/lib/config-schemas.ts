/**
 * Configuration Schemas
 *
 * Zod schema and defaults for the analysis configuration.
 * The loader (config-loader.ts) overlays environment overrides on these defaults.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

export const LLM_PROVIDERS = ["anthropic", "openai", "google", "mistral"] as const;

export type LlmProvider = (typeof LLM_PROVIDERS)[number];

// ============================================================================
// ANALYSIS CONFIG SCHEMA
// ============================================================================

export const AnalysisConfigSchema = z.object({
  // Model invocation
  llmProvider: z.enum(LLM_PROVIDERS),
  modelName: z.string().min(1).nullable().describe("Model override; null uses the provider default"),
  temperature: z.number().min(0).max(1),
  topK: z.number().int().min(1).max(500),
  topP: z.number().gt(0).max(1),
  maxOutputTokens: z.number().int().min(100).max(8192),

  // Prompt construction
  contentBudgetChars: z.number().int().min(100).max(20000).describe("Source content kept in content-aware prompts"),

  // Retrieval
  urlTextLimitChars: z.number().int().min(100).max(50000),
  fetchTimeoutMs: z.number().int().min(1000).max(120000),
  fetchMaxBytes: z.number().int().min(10_000).max(20_000_000),
  userAgent: z.string().min(1),

  // Uploads
  maxFileBytes: z.number().int().min(1024).max(64 * 1024 * 1024),
  minTextChars: z.number().int().min(1).max(1000),

  replyCacheEnabled: z.boolean(),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  llmProvider: "anthropic",
  modelName: null,
  temperature: 0.3,
  topK: 150,
  topP: 0.9,
  maxOutputTokens: 2500,
  contentBudgetChars: 1000,
  urlTextLimitChars: 2500,
  fetchTimeoutMs: 15_000,
  fetchMaxBytes: 2_000_000,
  userAgent: "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36",
  maxFileBytes: 16 * 1024 * 1024,
  minTextChars: 10,
  replyCacheEnabled: true,
};
