import { describe, it, expect } from "vitest";
import { RuleConfigError, UnknownRuleType, type Rule } from "@rubric/core";
import {
  RuleRegistry,
  fleschKincaidGrade,
  registerBuiltinRules,
  ruleRegistry,
  sentences,
  terms,
  words,
} from "@rubric/rules";

const make = (type: string, params: Record<string, unknown> = {}, weight = 1): Rule =>
  ruleRegistry.construct(type, weight, params);

describe("text helpers", () => {
  it("splits words on whitespace", () => {
    expect(words("  I can\thelp you\nnow ")).toEqual(["I", "can", "help", "you", "now"]);
    expect(words("")).toEqual([]);
  });

  it("terms drop punctuation and lowercase", () => {
    expect(terms("Hello, World! It's fine.")).toEqual(["hello", "world", "it's", "fine"]);
  });

  it("sentences skip punctuation-only fragments", () => {
    expect(sentences("One. Two! ... Three?")).toEqual(["One.", "Two!", "Three?"]);
  });
});

describe("contains_phrase", () => {
  const rule = make("contains_phrase", { phrase: "Help" });

  it("matches case-insensitively", () => {
    expect(rule.evaluate("I can HELP you")).toBe(1);
    expect(rule.evaluate("no")).toBe(0);
  });

  it("matches inside longer words", () => {
    expect(rule.evaluate("That was helpful")).toBe(1);
  });

  it("requires a phrase", () => {
    expect(() => make("contains_phrase")).toThrow(RuleConfigError);
    expect(() => make("contains_phrase", { phrase: "   " })).toThrow(RuleConfigError);
  });
});

describe("word_count", () => {
  const rule = make("word_count", { min_words: 2, max_words: 4 });

  it("scores 1 inside the bounds, inclusive", () => {
    expect(rule.evaluate("a b")).toBe(1);
    expect(rule.evaluate("a b c d")).toBe(1);
  });

  it("scores 0 outside the bounds", () => {
    expect(rule.evaluate("a")).toBe(0);
    expect(rule.evaluate("a b c d e")).toBe(0);
  });

  it("is unbounded by default", () => {
    expect(make("word_count").evaluate("")).toBe(1);
    expect(make("word_count", { min_words: 1 }).evaluate("word ".repeat(5000))).toBe(1);
  });

  it("rejects min above max", () => {
    expect(() => make("word_count", { min_words: 5, max_words: 2 })).toThrow(RuleConfigError);
  });

  it("rejects non-integer and negative bounds", () => {
    expect(() => make("word_count", { min_words: 1.5 })).toThrow(RuleConfigError);
    expect(() => make("word_count", { max_words: -1 })).toThrow(RuleConfigError);
    expect(() => make("word_count", { max_words: "ten" })).toThrow(RuleConfigError);
  });
});

describe("sentiment_positive", () => {
  const rule = make("sentiment_positive");

  it("scores neutral text at the midpoint", () => {
    expect(rule.evaluate("The meeting is on Tuesday")).toBe(0.5);
    expect(rule.evaluate("")).toBe(0.5);
  });

  it("scores by polarity balance", () => {
    expect(rule.evaluate("great and helpful")).toBe(1);
    expect(rule.evaluate("terrible and broken")).toBe(0);
    expect(rule.evaluate("great but terrible")).toBe(0.5);
    expect(rule.evaluate("good, great, awful")).toBeCloseTo(0.5 + 0.5 * (1 / 3), 10);
  });

  it("accepts extra lexicon words", () => {
    const custom = make("sentiment_positive", { positive_words: ["Stellar"], negative_words: ["meh"] });
    expect(custom.evaluate("stellar")).toBe(1);
    expect(custom.evaluate("meh")).toBe(0);
  });

  it("rejects a non-list lexicon", () => {
    expect(() => make("sentiment_positive", { positive_words: "yay" })).toThrow(RuleConfigError);
  });
});

describe("regex_match", () => {
  it("is case-insensitive by default", () => {
    const rule = make("regex_match", { pattern: "^hello\\b" });
    expect(rule.evaluate("Hello world")).toBe(1);
    expect(rule.evaluate("well, hello")).toBe(0);
  });

  it("honours explicit flags", () => {
    expect(make("regex_match", { pattern: "^hello", flags: "" }).evaluate("Hello")).toBe(0);
  });

  it("gives the same answer on repeated calls", () => {
    const rule = make("regex_match", { pattern: "a" });
    expect([rule.evaluate("a"), rule.evaluate("a"), rule.evaluate("a")]).toEqual([1, 1, 1]);
  });

  it("rejects bad patterns and stateful flags", () => {
    expect(() => make("regex_match", { pattern: "(" })).toThrow(RuleConfigError);
    expect(() => make("regex_match", { pattern: "a", flags: "g" })).toThrow(RuleConfigError);
    expect(() => make("regex_match")).toThrow(RuleConfigError);
  });
});

describe("cosine_sim", () => {
  const rule = make("cosine_sim", { target: "The cat sat" });

  it("is 1 for the same terms and 0 for disjoint ones", () => {
    expect(rule.evaluate("the CAT sat!")).toBeCloseTo(1, 10);
    expect(rule.evaluate("dogs bark")).toBe(0);
    expect(rule.evaluate("")).toBe(0);
  });

  it("is partial for overlapping text", () => {
    // dot = 1, |a| = sqrt(2), |b| = sqrt(3)
    expect(rule.evaluate("the dog")).toBeCloseTo(1 / Math.sqrt(6), 10);
  });

  it("rejects a target with no words", () => {
    for (const target of ["😀", "---", "?!"]) {
      expect(() => make("cosine_sim", { target })).toThrow(RuleConfigError);
    }
  });
});

describe("argument_structure", () => {
  const rule = make("argument_structure");

  it("rewards claims, evidence and counter-arguments", () => {
    expect(rule.evaluate("Therefore we act, because the data shows it. However, risks remain.")).toBeCloseTo(1, 10);
  });

  it("scores a lone claim at 0.3", () => {
    expect(rule.evaluate("Therefore it rains.")).toBeCloseTo(0.3, 10);
  });

  it("adds a bonus when claims have support", () => {
    expect(rule.evaluate("Therefore it rains, because clouds gather.")).toBeCloseTo(0.8, 10);
  });

  it("explains what is missing", () => {
    const explanation = rule.explain?.("Cats sleep.");
    expect(explanation?.score).toBe(0);
    expect(explanation?.suggestions).toHaveLength(3);
    expect(explanation?.reasoning).toBe("Text lacks clear argumentative structure");
  });
});

describe("domain_expertise", () => {
  const rule = make("domain_expertise", { domain: "systems", expertise_terms: ["API", "latency"] });

  it("combines density and coverage", () => {
    expect(rule.evaluate("The api has low latency")).toBe(1);
    expect(rule.evaluate("hello there")).toBe(0);
  });

  it("scores partial coverage", () => {
    // 1 of 2 terms in 20 words: density 0.05, coverage 0.5
    const text = `latency ${"word ".repeat(19)}`.trim();
    expect(rule.evaluate(text)).toBeCloseTo((0.05 * 10 + 0.5) / 2, 10);
  });

  it("requires at least one term", () => {
    expect(() => make("domain_expertise", { expertise_terms: [] })).toThrow(RuleConfigError);
    expect(() => make("domain_expertise")).toThrow(RuleConfigError);
  });

  it("names the domain in its reasoning", () => {
    expect(rule.explain?.("The api has low latency").reasoning).toBe("Text demonstrates strong systems domain expertise");
  });
});

describe("citation_quality", () => {
  const rule = make("citation_quality");

  it("scores 0 with no citations", () => {
    expect(rule.evaluate("Plain words only.")).toBe(0);
  });

  it("steps through density bands", () => {
    expect(rule.evaluate(`${"word ".repeat(149)}[1]`)).toBe(0.3);
    expect(rule.evaluate(`${"word ".repeat(49)}[1]`)).toBe(0.7);
    expect(rule.evaluate("See (Smith, 2020) for details.")).toBe(1);
  });

  it("recognises urls and dois", () => {
    const explanation = rule.explain?.("Read https://example.org/paper and doi:10.1000/xyz today");
    expect(explanation?.evidence[0]).toBe("Citations found: 2");
  });
});

describe("readability", () => {
  it("computes the Flesch-Kincaid grade", () => {
    // 3 one-syllable words in 1 sentence
    expect(fleschKincaidGrade("The cat sat.")).toBeCloseTo(0.39 * 3 + 11.8 - 15.59, 10);
    expect(fleschKincaidGrade("")).toBeUndefined();
  });

  it("scores within tolerance on a linear slope", () => {
    const rule = make("readability", { target_grade_level: 0, tolerance: 3 });
    const diff = Math.abs(0.39 * 3 + 11.8 - 15.59);
    expect(rule.evaluate("The cat sat.")).toBeCloseTo(1 - (diff / 3) * 0.3, 10);
  });

  it("falls to 0 far from the target", () => {
    expect(make("readability").evaluate("The cat sat.")).toBe(0);
  });

  it("scores 0 without sentences", () => {
    expect(make("readability").evaluate("   ")).toBe(0);
  });

  it("rejects a non-positive tolerance", () => {
    expect(() => make("readability", { tolerance: 0 })).toThrow(RuleConfigError);
  });
});

describe("semantic_coherence", () => {
  const rule = make("semantic_coherence");

  it("handles empty and single-sentence text", () => {
    expect(rule.evaluate("")).toBe(0);
    expect(rule.evaluate("One sentence here.")).toBe(0.8);
  });

  it("scores repeated topics high and unrelated sentences low", () => {
    expect(rule.evaluate("The cat sat. The cat sat.")).toBeCloseTo(1, 10);
    expect(rule.evaluate("Cats purr. Rockets launch.")).toBe(0);
  });
});

describe("explainable rules", () => {
  const texts = ["", "Therefore it works, because tests pass. However, see [1].", "Short."];
  const rules = [
    make("argument_structure"),
    make("domain_expertise", { expertise_terms: ["tests"] }),
    make("citation_quality"),
    make("readability"),
    make("semantic_coherence"),
  ];

  it("evaluate agrees with explain().score", () => {
    for (const rule of rules) {
      for (const text of texts) {
        expect(rule.explain?.(text).score).toBe(rule.evaluate(text));
      }
    }
  });
});

describe("rule params", () => {
  it("are copied and frozen at construction", () => {
    const params = { phrase: "help" };
    const rule = make("contains_phrase", params);
    params.phrase = "other";
    expect(rule.params).toEqual({ phrase: "help" });
    expect(Object.isFrozen(rule.params)).toBe(true);
  });
});

describe("RuleRegistry", () => {
  it("lists every built-in rule type", () => {
    expect(ruleRegistry.list()).toEqual([
      "contains_phrase",
      "word_count",
      "sentiment_positive",
      "regex_match",
      "cosine_sim",
      "argument_structure",
      "domain_expertise",
      "citation_quality",
      "readability",
      "semantic_coherence",
    ]);
  });

  it("rejects unknown types with the available list", () => {
    try {
      make("nope");
      expect.unreachable("construct should throw");
    } catch (e) {
      expect(e).toBeInstanceOf(UnknownRuleType);
      if (e instanceof UnknownRuleType) {
        expect(e.ruleType).toBe("nope");
        expect(e.available).toContain("word_count");
      }
    }
  });

  it("rejects non-positive weights", () => {
    for (const w of [0, -1, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(() => make("contains_phrase", { phrase: "x" }, w)).toThrow(RuleConfigError);
    }
  });

  it("accepts new rule types without touching the built-ins", () => {
    const reg = new RuleRegistry();
    registerBuiltinRules(reg);
    reg.register("always_half", (weight, params) => ({ type: "always_half", weight, params, evaluate: () => 0.5 }));
    expect(reg.construct("always_half", 2).evaluate("anything")).toBe(0.5);
    expect(ruleRegistry.has("always_half")).toBe(false);
  });
});
