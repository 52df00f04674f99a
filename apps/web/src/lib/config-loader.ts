/**
 * Configuration Loader
 *
 * Resolves the analysis config from defaults plus TL_* environment overrides.
 * Invalid overrides are dropped field-by-field with a warning; loading never throws.
 *
 * @module config-loader
 * @version 1.0.0
 */

import {
  AnalysisConfigSchema,
  DEFAULT_ANALYSIS_CONFIG,
  type AnalysisConfig,
} from "./config-schemas";

// Re-export types for convenience
export type { AnalysisConfig, LlmProvider } from "./config-schemas";
export { DEFAULT_ANALYSIS_CONFIG } from "./config-schemas";

type EnvSource = Record<string, string | undefined>;

interface EnvOverride {
  envVar: string;
  key: keyof AnalysisConfig;
  parse: (raw: string) => unknown;
}

// ============================================================================
// ENV PARSERS
// ============================================================================

function parseNumber(raw: string): number {
  return Number(raw);
}

function parseBoolean(raw: string): boolean | string {
  const v = raw.toLowerCase();
  if (v === "true" || v === "1" || v === "on") return true;
  if (v === "false" || v === "0" || v === "off") return false;
  return raw;
}

function parseProvider(raw: string): string {
  const p = raw.toLowerCase();
  if (p === "claude") return "anthropic";
  if (p === "gemini") return "google";
  return p;
}

const ENV_OVERRIDES: EnvOverride[] = [
  { envVar: "TL_LLM_PROVIDER", key: "llmProvider", parse: parseProvider },
  { envVar: "TL_LLM_MODEL", key: "modelName", parse: (raw) => raw },
  { envVar: "TL_LLM_TEMPERATURE", key: "temperature", parse: parseNumber },
  { envVar: "TL_LLM_TOP_K", key: "topK", parse: parseNumber },
  { envVar: "TL_LLM_TOP_P", key: "topP", parse: parseNumber },
  { envVar: "TL_LLM_MAX_OUTPUT_TOKENS", key: "maxOutputTokens", parse: parseNumber },
  { envVar: "TL_CONTENT_BUDGET_CHARS", key: "contentBudgetChars", parse: parseNumber },
  { envVar: "TL_URL_TEXT_LIMIT_CHARS", key: "urlTextLimitChars", parse: parseNumber },
  { envVar: "TL_FETCH_TIMEOUT_MS", key: "fetchTimeoutMs", parse: parseNumber },
  { envVar: "TL_MAX_FILE_BYTES", key: "maxFileBytes", parse: parseNumber },
  { envVar: "TL_REPLY_CACHE_ENABLED", key: "replyCacheEnabled", parse: parseBoolean },
];

function envVarFor(key: string): string {
  return ENV_OVERRIDES.find((o) => o.key === key)?.envVar ?? key;
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Build the effective config from an environment map.
 */
export function loadAnalysisConfig(env: EnvSource = process.env): AnalysisConfig {
  const overrides: Record<string, unknown> = {};

  for (const override of ENV_OVERRIDES) {
    const raw = env[override.envVar]?.trim();
    if (!raw) continue;
    overrides[override.key] = override.parse(raw);
  }

  let parsed = AnalysisConfigSchema.safeParse({ ...DEFAULT_ANALYSIS_CONFIG, ...overrides });
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const key = String(issue.path[0] ?? "");
      console.warn(`[Config] Ignoring invalid ${envVarFor(key)}: ${issue.message}`);
      delete overrides[key];
    }
    parsed = AnalysisConfigSchema.safeParse({ ...DEFAULT_ANALYSIS_CONFIG, ...overrides });
  }

  if (!parsed.success) {
    console.warn("[Config] Falling back to default analysis config");
    return { ...DEFAULT_ANALYSIS_CONFIG };
  }
  return parsed.data;
}

// ============================================================================
// PROCESS-WIDE CONFIG
// ============================================================================

let cachedConfig: AnalysisConfig | null = null;

export function getAnalysisConfig(): AnalysisConfig {
  if (!cachedConfig) {
    cachedConfig = loadAnalysisConfig();
    console.log(
      `[Config] Loaded analysis config (provider=${cachedConfig.llmProvider}, model=${cachedConfig.modelName ?? "default"})`,
    );
  }
  return cachedConfig;
}

/**
 * Drop the memoized config so the next read re-evaluates the environment.
 */
export function invalidateAnalysisConfig(): void {
  cachedConfig = null;
}
