/**
 * Text Signals
 *
 * Lexicon heuristics computed locally beside the model analysis:
 * sentiment, hashtag suggestions, and brand mention counts.
 *
 * @module analyzer/text-signals
 */

export type SentimentLabel = "Positive" | "Negative" | "Neutral";

export interface SentimentResult {
  sentiment: SentimentLabel;
  polarity: number;
  subjectivity: number;
  confidence: number;
}

const POSITIVE_WORDS = ["good", "great", "excellent", "amazing", "positive", "love", "best"];
const NEGATIVE_WORDS = ["bad", "terrible", "awful", "hate", "worst", "negative", "poor"];

const STOP_WORDS = new Set(["the", "and", "or", "but", "in", "on", "at", "to", "for", "of", "with", "by"]);

export const DEFAULT_BRANDS = ["Apple", "Google", "Microsoft", "Amazon", "Meta", "Tesla", "Netflix"];

/**
 * Count lexicon words present in the text (substring presence, each word once).
 */
export function analyzeSentiment(text: string): SentimentResult {
  const lower = text.toLowerCase();
  const positive = POSITIVE_WORDS.filter((w) => lower.includes(w)).length;
  const negative = NEGATIVE_WORDS.filter((w) => lower.includes(w)).length;

  if (positive > negative) {
    return { sentiment: "Positive", polarity: 0.5, subjectivity: 0.6, confidence: 0.6 };
  }
  if (negative > positive) {
    return { sentiment: "Negative", polarity: -0.5, subjectivity: 0.6, confidence: 0.6 };
  }
  return { sentiment: "Neutral", polarity: 0, subjectivity: 0.5, confidence: 0.3 };
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Most frequent words (4+ letters, stop words removed) as capitalized hashtags.
 * Ties keep first-appearance order.
 */
export function extractHashtags(text: string, maxHashtags: number = 15): string[] {
  const words = text.toLowerCase().match(/\b[a-z]{3,}\b/g) ?? [];
  const counts = new Map<string, number>();
  for (const word of words) {
    if (word.length <= 3 || STOP_WORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxHashtags)
    .map(([word]) => capitalize(word));
}

/**
 * Case-insensitive occurrence counts per brand; brands with no mention are omitted.
 */
export function extractBrandMentions(text: string, brands: string[] = DEFAULT_BRANDS): Record<string, number> {
  const lower = text.toLowerCase();
  const mentions: Record<string, number> = {};
  for (const brand of brands) {
    const needle = brand.toLowerCase();
    if (!needle) continue;
    const count = lower.split(needle).length - 1;
    if (count > 0) {
      mentions[brand] = count;
    }
  }
  return mentions;
}
