/**
 * Analysis Service
 *
 * Process-wide wiring for the route handlers: config -> AI SDK generator ->
 * model gateway (backed by the shared reply cache) -> orchestrator.
 *
 * @module analysis-service
 */

import type { AnalysisConfig, LlmProvider } from "./config-schemas";
import { getAnalysisConfig } from "./config-loader";
import { ReplyCache, defaultReplyCache } from "./reply-cache";
import { createAiSdkGenerator, normalizeProvider, providerDisplayName } from "./analyzer/llm";
import { ModelGateway } from "./analyzer/model-gateway";
import { AnalysisOrchestrator } from "./analyzer/orchestrator";

/** Environment variable each AI SDK provider reads its key from. */
export const PROVIDER_API_KEY_ENV: Record<LlmProvider, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
  mistral: "MISTRAL_API_KEY",
};

let orchestrator: AnalysisOrchestrator | null = null;

export function createAnalysisOrchestrator(
  config: AnalysisConfig = getAnalysisConfig(),
  cache: ReplyCache = defaultReplyCache,
): AnalysisOrchestrator {
  cache.setEnabled(config.replyCacheEnabled);
  const provider = normalizeProvider(config.llmProvider);
  const gateway = new ModelGateway({
    generate: createAiSdkGenerator(config),
    cache,
    providerName: providerDisplayName(provider),
  });
  return new AnalysisOrchestrator({ gateway, config });
}

export function getAnalysisOrchestrator(): AnalysisOrchestrator {
  if (!orchestrator) {
    orchestrator = createAnalysisOrchestrator();
  }
  return orchestrator;
}

export function resetAnalysisOrchestrator(): void {
  orchestrator = null;
}
