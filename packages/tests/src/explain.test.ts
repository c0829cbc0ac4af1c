import { describe, it, expect } from "vitest";
import { ruleRegistry } from "@rubric/rules";
import { Template, evaluateWithExplanations, interpretScore } from "@rubric/scoring";

const support = new Template({
  name: "support",
  rules: [
    ruleRegistry.construct("contains_phrase", 2.0, { phrase: "help" }),
    ruleRegistry.construct("word_count", 1.0, { min_words: 3, max_words: 10 }),
  ],
});

describe("interpretScore", () => {
  it("maps scores to bands", () => {
    expect(interpretScore(0.95)).toMatch(/^Excellent/);
    expect(interpretScore(0.7)).toMatch(/^Good/);
    expect(interpretScore(0.5)).toMatch(/^Moderate/);
    expect(interpretScore(0.3)).toMatch(/^Poor/);
    expect(interpretScore(0.1)).toMatch(/^Very Poor/);
    expect(interpretScore(undefined)).toMatch(/^Unscorable/);
  });
});

describe("evaluateWithExplanations", () => {
  it("lists strengths for a passing text", () => {
    const report = evaluateWithExplanations(support, "I can help you now");
    expect(report.overall).toBe(1);
    expect(report.strengths).toEqual([
      'contains_phrase: Text contains "help"',
      "word_count: Word count 5 is within 3-10",
    ]);
    expect(report.weaknesses).toEqual([]);
    expect(report.suggestions).toEqual([]);
    expect(report.interpretation).toMatch(/^Excellent/);
  });

  it("lists weaknesses and suggestions for a failing text", () => {
    const report = evaluateWithExplanations(support, "no");
    expect(report.weaknesses).toEqual([
      'contains_phrase: Text does not contain "help"',
      "word_count: Word count 1 is outside 3-10",
    ]);
    expect(report.suggestions).toEqual(['Include the phrase "help"', "Expand the text to at least 3 words"]);
    expect(report.rules.map((r) => r.explanation?.score)).toEqual([0, 0]);
  });

  it("deduplicates suggestions", () => {
    const twice = support.withRule(ruleRegistry.construct("contains_phrase", 1.0, { phrase: "help" }));
    const report = evaluateWithExplanations(twice, "no");
    expect(report.suggestions.filter((s) => s === 'Include the phrase "help"')).toHaveLength(1);
  });

  it("reports an empty template", () => {
    const report = evaluateWithExplanations(new Template({ name: "empty" }), "text");
    expect(report.overall).toBeUndefined();
    expect(report.weaknesses).toEqual(["No evaluation rules defined"]);
    expect(report.interpretation).toMatch(/^Unscorable/);
  });

  it("keeps rules without explanations in the report", () => {
    const plain = new Template({
      name: "plain",
      rules: [{ type: "constant", weight: 1, params: {}, evaluate: () => 0.9 }],
    });
    const report = evaluateWithExplanations(plain, "x");
    expect(report.rules[0].explanation).toBeUndefined();
    expect(report.rules[0].rawScore).toBe(0.9);
    expect(report.strengths).toEqual([]);
  });
});
