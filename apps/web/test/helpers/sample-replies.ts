/**
 * Model replies used across parser, orchestrator and report tests.
 */

import type { InsightsByKeyword } from "@/lib/analyzer/types";

export const STANDARD_REPLY = `**KEYWORDS IDENTIFIED:**
Market Expansion, Customer Retention

**STRATEGIC ANALYSIS:**

**KEYWORD 1: Market Expansion**
**INSIGHTS:**
1. Enter adjacent regions
2. Partner with local distributors
**ACTIONS:**
1. Allocate $2 million to a pilot in two regions.
2. Build a distributor scorecard with quarterly targets.

**KEYWORD 2: Customer Retention**
**INSIGHTS:**
1. Reduce churn in year one
**ACTIONS:**
1. Launch an onboarding program for new accounts.
This program should run for 90 days.`;

export const STANDARD_INSIGHTS: InsightsByKeyword = {
  "Market Expansion": {
    titles: ["Enter adjacent regions", "Partner with local distributors"],
    actions: [
      "Allocate $2 million to a pilot in two regions.",
      "Build a distributor scorecard with quarterly targets.",
    ],
  },
  "Customer Retention": {
    titles: ["Reduce churn in year one"],
    actions: ["Launch an onboarding program for new accounts. This program should run for 90 days."],
  },
};

export const ALTERNATIVE_REPLY = `Here is my analysis.
Keywords: 1. Pricing 2. Retention:

Pricing strategy:
- Raise list prices by 5%
- Bundle support plans

Retention plan:
- Call every churned account`;

export const FALLBACK_REPLY = `Growth depends on the market.

Second paragraph about customers.`;

/**
 * Render insights in the layout the prompt asks for.
 */
export function formatStandardReply(keywords: string[], insights: InsightsByKeyword): string {
  const sections = Object.entries(insights).map(([name, entry], i) => {
    const titles = entry.titles.map((t, j) => `${j + 1}. ${t}`).join("\n");
    const actions = entry.actions.map((a, j) => `${j + 1}. ${a}`).join("\n");
    return `**KEYWORD ${i + 1}: ${name}**\n**INSIGHTS:**\n${titles}\n**ACTIONS:**\n${actions}`;
  });
  return `**KEYWORDS IDENTIFIED:**\n${keywords.join(", ")}\n\n**STRATEGIC ANALYSIS:**\n\n${sections.join("\n\n")}`;
}
