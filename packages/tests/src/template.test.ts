import { describe, it, expect } from "vitest";
import { UnscorableTextError, type Rule } from "@rubric/core";
import { ruleRegistry } from "@rubric/rules";
import { Template, score, scoreDetailed } from "@rubric/scoring";

const phraseRule = () => ruleRegistry.construct("contains_phrase", 2.0, { phrase: "help" });
const lengthRule = () => ruleRegistry.construct("word_count", 1.0, { min_words: 3, max_words: 10 });

const support = new Template({ name: "support", rules: [phraseRule(), lengthRule()] });

function fixedRule(type: string, weight: number, evaluate: (text: string) => number): Rule {
  return { type, weight, params: {}, evaluate };
}

describe("Template.evaluateDetailed", () => {
  it("weights each rule's raw score", () => {
    const b = support.evaluateDetailed("I can help you now");
    expect(b.perRule.map((r) => r.rawScore)).toEqual([1, 1]);
    expect(b.perRule.map((r) => r.weight)).toEqual([2, 1]);
    expect(b.totalWeight).toBe(3);
    expect(b.overall).toBe(1);
  });

  it("scores a text that fails every rule at 0", () => {
    const b = support.evaluateDetailed("no");
    expect(b.perRule.map((r) => r.rawScore)).toEqual([0, 0]);
    expect(b.overall).toBe(0);
  });

  it("takes the weighted mean for mixed results", () => {
    expect(support.evaluate("help")).toBeCloseTo(2 / 3, 10);
    expect(support.evaluate("you can do it")).toBeCloseTo(1 / 3, 10);
  });

  it("does not depend on rule order", () => {
    const reversed = new Template({ name: "support", rules: [lengthRule(), phraseRule()] });
    for (const text of ["help", "you can do it", "I can help you now", ""]) {
      expect(reversed.evaluate(text)).toBeCloseTo(support.evaluate(text) ?? Number.NaN, 12);
    }
  });

  it("returns undefined for a template without rules", () => {
    const empty = new Template({ name: "empty" });
    expect(empty.evaluate("anything")).toBeUndefined();
    expect(empty.evaluateDetailed("anything")).toEqual({ overall: undefined, totalWeight: 0, perRule: [] });
  });

  it("isolates a throwing rule", () => {
    const t = new Template({
      name: "partial",
      rules: [
        phraseRule(),
        fixedRule("broken", 5, () => {
          throw new Error("kaboom");
        }),
      ],
    });
    const b = t.evaluateDetailed("help");
    expect(b.overall).toBe(1);
    expect(b.totalWeight).toBe(2);
    expect(b.perRule[1]).toEqual({
      index: 1,
      ruleType: "broken",
      weight: 0,
      configuredWeight: 5,
      rawScore: 0,
      weightedScore: 0,
      error: "kaboom",
    });
  });

  it("treats a non-finite score as a failure", () => {
    const t = new Template({ name: "nan", rules: [fixedRule("nan", 1, () => Number.NaN), phraseRule()] });
    const b = t.evaluateDetailed("no");
    expect(b.perRule[0].error).toBe("rule returned a non-finite score (NaN)");
    expect(b.overall).toBe(0);
  });

  it("is undefined when every rule fails", () => {
    const t = new Template({ name: "dead", rules: [fixedRule("nan", 1, () => Number.NaN)] });
    expect(t.evaluate("text")).toBeUndefined();
  });

  it("clamps out-of-range rule scores", () => {
    const t = new Template({ name: "wild", rules: [fixedRule("high", 1, () => 1.7), fixedRule("low", 1, () => -3)] });
    const b = t.evaluateDetailed("x");
    expect(b.perRule.map((r) => r.rawScore)).toEqual([1, 0]);
    expect(b.overall).toBe(0.5);
  });

  it("keeps overall within [0, 1] for arbitrary input", () => {
    const inputs = ["", " ", "help ".repeat(10_000), "😀 help ✓", "\u0000\u0001"];
    for (const text of inputs) {
      const overall = support.evaluate(text);
      expect(overall).toBeGreaterThanOrEqual(0);
      expect(overall).toBeLessThanOrEqual(1);
    }
  });

  it("stays finite when the weight sum overflows", () => {
    const huge = new Template({
      name: "huge",
      rules: [
        ruleRegistry.construct("contains_phrase", 1e308, { phrase: "help" }),
        ruleRegistry.construct("contains_phrase", 1e308, { phrase: "now" }),
      ],
    });
    expect(huge.evaluate("help now")).toBe(1);
    expect(huge.evaluate("help")).toBe(0.5);
    expect(huge.evaluate("neither")).toBe(0);
  });
});

describe("Template.requireScore", () => {
  it("returns the score or throws when unscorable", () => {
    expect(support.requireScore("I can help you now")).toBe(1);
    expect(() => new Template({ name: "empty" }).requireScore("x")).toThrow(UnscorableTextError);
  });
});

describe("Template immutability", () => {
  it("freezes the template and its rule list", () => {
    expect(Object.isFrozen(support)).toBe(true);
    expect(Object.isFrozen(support.rules)).toBe(true);
  });

  it("edits return new templates", () => {
    const added = support.withRule(ruleRegistry.construct("sentiment_positive", 1));
    expect(added.rules).toHaveLength(3);
    expect(support.rules).toHaveLength(2);

    const removed = added.withoutRule(0);
    expect(removed.rules.map((r) => r.type)).toEqual(["word_count", "sentiment_positive"]);

    const renamed = support.withName("renamed").withDescription("new");
    expect(renamed.name).toBe("renamed");
    expect(renamed.description).toBe("new");
    expect(support.name).toBe("support");
  });

  it("compares by value", () => {
    const same = new Template({ name: "support", rules: [phraseRule(), lengthRule()] });
    expect(same.equals(support)).toBe(true);
    expect(same.withName("other").equals(support)).toBe(false);
    const heavier = new Template({
      name: "support",
      rules: [ruleRegistry.construct("contains_phrase", 3.0, { phrase: "help" }), lengthRule()],
    });
    expect(heavier.equals(support)).toBe(false);
  });
});

describe("score helpers", () => {
  it("delegate to the template", () => {
    expect(score("help", support)).toBe(support.evaluate("help"));
    expect(scoreDetailed("help", support)).toEqual(support.evaluateDetailed("help"));
  });
});
