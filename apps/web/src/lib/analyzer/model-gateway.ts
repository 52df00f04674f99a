/**
 * Model Gateway
 *
 * Text-in/text-out access to the text-generation service.
 * Never rejects: every failure comes back as a string starting with "Error".
 * Failures are cached like successes, until the cache is cleared.
 *
 * @module analyzer/model-gateway
 */

import { ReplyCache } from "../reply-cache";
import { toErrorMessage } from "../error-classification";
import type { GenerationReply, TextGenerator } from "./types";

export const EMPTY_PROMPT_ERROR = "Error: Empty prompt provided";

export interface ModelGatewayOptions {
  generate: TextGenerator;
  cache?: ReplyCache;
  /** Name used in error strings, e.g. "Claude" */
  providerName?: string;
}

/**
 * True for any string the gateway produces on failure.
 */
export function isGatewayError(reply: string): boolean {
  return reply.startsWith("Error:") || reply.startsWith("Error calling ");
}

export class ModelGateway {
  private readonly generate: TextGenerator;
  private readonly cache: ReplyCache;
  readonly providerName: string;

  constructor(options: ModelGatewayOptions) {
    this.generate = options.generate;
    this.cache = options.cache ?? new ReplyCache();
    this.providerName = options.providerName ?? "Claude";
  }

  async invoke(prompt: string): Promise<string> {
    if (!prompt || !prompt.trim()) {
      return EMPTY_PROMPT_ERROR;
    }
    return this.cache.getOrCreate(prompt, () => this.callUpstream(prompt));
  }

  /**
   * Empty the reply cache. Returns the number of evicted replies.
   */
  clearCache(): number {
    return this.cache.clear();
  }

  getCache(): ReplyCache {
    return this.cache;
  }

  private async callUpstream(prompt: string): Promise<string> {
    const started = Date.now();
    try {
      const reply = await this.generate(prompt);
      const text = this.firstSegment(reply);
      console.log(`[Gateway] ${this.providerName} replied in ${Date.now() - started}ms (${text.length} chars)`);
      return text;
    } catch (err) {
      const message = toErrorMessage(err);
      console.error(`[Gateway] Error calling ${this.providerName}: ${message}`);
      return `Error calling ${this.providerName}: ${message}`;
    }
  }

  private firstSegment(reply: GenerationReply | null | undefined): string {
    if (!reply || !Array.isArray(reply.content)) {
      return `Error: Invalid response structure from ${this.providerName}`;
    }
    const text = reply.content[0]?.text;
    if (typeof text !== "string" || !text.trim()) {
      return `Error: Empty response from ${this.providerName}`;
    }
    return text;
  }
}
