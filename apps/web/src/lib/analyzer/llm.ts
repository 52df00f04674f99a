/**
 * Analyzer - LLM Provider Selection
 *
 * Resolves the configured provider/model and adapts the AI SDK's generateText
 * to the reply shape the model gateway consumes.
 *
 * @module analyzer/llm
 */

import { generateText } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import type { AnalysisConfig, LlmProvider } from "../config-schemas";
import type { GenerationReply, TextGenerator } from "./types";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: LlmProvider;
  modelName: string;
  model: ReturnType<typeof openai> | ReturnType<typeof anthropic> | ReturnType<typeof google> | ReturnType<typeof mistral>;
}

export function normalizeProvider(raw: string): LlmProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  return "openai";
}

export function defaultModelName(provider: LlmProvider): string {
  switch (provider) {
    case "anthropic":
      return "claude-sonnet-4-20250514";
    case "google":
      return "gemini-1.5-pro";
    case "mistral":
      return "mistral-large-latest";
    case "openai":
    default:
      return "gpt-4o";
  }
}

/**
 * Human-facing provider name used in gateway error strings.
 */
export function providerDisplayName(provider: LlmProvider): string {
  switch (provider) {
    case "anthropic":
      return "Claude";
    case "google":
      return "Gemini";
    case "mistral":
      return "Mistral";
    case "openai":
    default:
      return "OpenAI";
  }
}

function buildModelInfo(provider: LlmProvider, modelName: string): ModelInfo {
  if (provider === "anthropic") {
    return { provider, modelName, model: anthropic(modelName) };
  }
  if (provider === "google") {
    return { provider, modelName, model: google(modelName) };
  }
  if (provider === "mistral") {
    return { provider, modelName, model: mistral(modelName) };
  }
  return { provider: "openai", modelName, model: openai(modelName) };
}

/**
 * Get the LLM model based on configuration
 */
export function getModel(config: Pick<AnalysisConfig, "llmProvider" | "modelName">): ModelInfo {
  const provider = normalizeProvider(config.llmProvider);
  const modelName = config.modelName ?? defaultModelName(provider);
  return buildModelInfo(provider, modelName);
}

// ============================================================================
// TEXT GENERATION
// ============================================================================

/**
 * Build the production text generator: one generateText call per prompt with
 * the fixed sampling parameters from config. Failed calls are not retried.
 */
export function createAiSdkGenerator(config: AnalysisConfig): TextGenerator {
  return async (prompt: string): Promise<GenerationReply> => {
    const modelInfo = getModel(config);
    console.log(`[LLM] Calling ${modelInfo.provider}/${modelInfo.modelName} (${prompt.length} chars)`);

    const result = await generateText({
      model: modelInfo.model,
      messages: [{ role: "user", content: prompt }],
      temperature: config.temperature,
      topK: config.topK,
      topP: config.topP,
      maxOutputTokens: config.maxOutputTokens,
      maxRetries: 0,
    });

    return { content: result.text ? [{ text: result.text }] : [] };
  };
}
