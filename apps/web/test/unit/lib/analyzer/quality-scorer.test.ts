import { describe, it, expect } from "vitest";
import {
  contentComponent,
  countWords,
  lengthComponent,
  scoreAction,
  scoreInsights,
  wordCountComponent,
} from "@/lib/analyzer/quality-scorer";

function words(word: string, count: number): string {
  return Array(count).fill(word).join(" ");
}

describe("quality-scorer", () => {
  describe("components", () => {
    it("gives full word credit inside 150-200 words", () => {
      expect(wordCountComponent(150)).toBe(70);
      expect(wordCountComponent(200)).toBe(70);
    });

    it("ramps up below and falls off above the ideal range", () => {
      expect(wordCountComponent(0)).toBe(0);
      expect(wordCountComponent(75)).toBe(35);
      expect(wordCountComponent(400)).toBe(35);
    });

    it("caps the length component at 900 characters", () => {
      expect(lengthComponent(450)).toBe(5);
      expect(lengthComponent(5000)).toBe(10);
    });

    it("awards each content signal group once", () => {
      expect(contentComponent("Revenue up 5% with $2 million")).toBe(10);
      expect(contentComponent("market growth")).toBe(6);
      expect(contentComponent("A timeline")).toBe(4);
      expect(contentComponent("Revenue in a new market on a timeline")).toBe(20);
      expect(contentComponent("nothing here")).toBe(0);
    });

    it("counts whitespace-separated words", () => {
      expect(countWords("  one two\nthree  ")).toBe(3);
      expect(countWords("   ")).toBe(0);
    });
  });

  describe("scoreAction", () => {
    it("scores an empty action as 0", () => {
      expect(scoreAction("")).toBe(0);
    });

    it("combines words, length and content", () => {
      // 180 words, 1259 chars, market signal
      expect(scoreAction(words("growth", 180))).toBe(86);
    });

    it("reaches 100 for an ideal action", () => {
      const action = `${words("growth", 170)} $5 million strategy`;
      expect(scoreAction(action)).toBe(100);
    });
  });

  describe("scoreInsights", () => {
    it("averages across every action of every keyword", () => {
      const score = scoreInsights({
        A: { titles: [], actions: [words("growth", 180)] },
        B: { titles: [], actions: [words("growth", 300)] },
      });
      // (86 + 62.666...) / 2
      expect(score).toBe(74.33);
    });

    it("does not decrease as actions move into the ideal band", () => {
      const short = words("plan", 60);
      const ideal = words("plan", 175);
      const none = scoreInsights({ A: { titles: [], actions: [short, short] } });
      const one = scoreInsights({ A: { titles: [], actions: [ideal, short] } });
      const both = scoreInsights({ A: { titles: [], actions: [ideal, ideal] } });
      expect(one).toBeGreaterThanOrEqual(none);
      expect(both).toBeGreaterThanOrEqual(one);
    });

    it("returns 0 when there are no actions", () => {
      expect(scoreInsights({})).toBe(0);
      expect(scoreInsights({ A: { titles: ["t"], actions: [] } })).toBe(0);
    });
  });
});
