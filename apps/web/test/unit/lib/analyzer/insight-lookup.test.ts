import { describe, it, expect } from "vitest";
import { isInsightLookupError, safeGetInsight } from "@/lib/analyzer/insight-lookup";
import { STANDARD_INSIGHTS } from "@test/helpers/sample-replies";

const result = { insights: STANDARD_INSIGHTS };

describe("safeGetInsight", () => {
  it("returns the requested action by default", () => {
    expect(safeGetInsight(result, "Market Expansion")).toBe("Allocate $2 million to a pilot in two regions.");
  });

  it("returns titles by index", () => {
    expect(safeGetInsight(result, "Market Expansion", "titles", 1)).toBe("Partner with local distributors");
  });

  it("reports an empty result", () => {
    expect(safeGetInsight(null, "x")).toBe("Error: analysis result is empty");
    expect(safeGetInsight({ insights: {} }, "x")).toBe("Error: No insights found");
  });

  it("lists available keywords when the keyword is unknown", () => {
    expect(safeGetInsight(result, "Pricing")).toBe(
      "Error: Keyword 'Pricing' not found. Available: Market Expansion, Customer Retention",
    );
  });

  it("reports an out-of-range index", () => {
    expect(safeGetInsight(result, "Customer Retention", "actions", 3)).toBe("Error: Index 3 out of range (total: 1)");
    expect(safeGetInsight(result, "Customer Retention", "titles", -1)).toBe("Error: Index -1 out of range (total: 1)");
  });

  it("tells lookup errors apart from entries", () => {
    expect(isInsightLookupError(safeGetInsight(result, "Pricing"))).toBe(true);
    expect(isInsightLookupError(safeGetInsight(result, "Market Expansion"))).toBe(false);
  });
});
