/**
 * Base prompt templates for business-insight analysis
 *
 * Both templates ask for the same reply layout; response-parser.ts depends on it:
 * a KEYWORDS IDENTIFIED line, then five KEYWORD n sections, each with an
 * INSIGHTS block (numbered short titles) and an ACTIONS block (numbered paragraphs).
 */

export const KEYWORD_SECTION_COUNT = 5;

function getReplyLayoutInstructions(): string {
  const sections = Array.from({ length: KEYWORD_SECTION_COUNT }, (_, i) => {
    const n = i + 1;
    return `**KEYWORD ${n}: [Keyword ${n}]**
**INSIGHTS:**
1. [Short strategic focus title]
2. [Short strategic focus title]
3. [Short strategic focus title]
**ACTIONS:**
1. [Recommendation paragraph of 150-200 words]
2. [Recommendation paragraph of 150-200 words]
3. [Recommendation paragraph of 150-200 words]`;
  }).join("\n\n");

  return `Respond in exactly this format:

**KEYWORDS IDENTIFIED:**
[Keyword 1], [Keyword 2], [Keyword 3], [Keyword 4], [Keyword 5]

**STRATEGIC ANALYSIS:**

${sections}

Rules:
- Identify exactly ${KEYWORD_SECTION_COUNT} keywords and list them comma-separated on the line after KEYWORDS IDENTIFIED.
- Use the same keyword names in the KEYWORD headers as in the list.
- Each INSIGHTS item is a short title (under 10 words).
- Each ACTIONS item is one paragraph of 150-200 words covering investment, timeline, and success metrics.
- Provide specific numbers, percentages, dollar amounts, and timeframes in every action item.`;
}

export function getBusinessInsightsBasePrompt(variables: {
  question: string;
  keywordHint: string;
}): string {
  const { question, keywordHint } = variables;

  return `You are a business analyst. Provide strategic insights for this question.

Question: ${question}
Keywords: ${keywordHint}

${getReplyLayoutInstructions()}`;
}

export function getContentAnalysisBasePrompt(variables: {
  question: string;
  keywordHint: string;
  content: string;
}): string {
  const { question, keywordHint, content } = variables;

  return `You are a business analyst. Analyze this content and provide business insights.

Question: ${question}
Keywords: ${keywordHint}
Content: ${content}

Base the keywords and recommendations on the content above.

${getReplyLayoutInstructions()}`;
}
