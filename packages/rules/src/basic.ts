/**
 * Built-in basic rules: phrase, length, polarity, pattern and similarity.
 */
import { RuleConfigError, type RuleExplanation, type RuleParams } from "@rubric/core";
import lexicon from "../data/sentiment-lexicon.json" with { type: "json" };
import { BaseRule, optionalNumber, optionalString, optionalStringArray, requireString } from "./base.js";
import { containsPhrase, cosine, termCounts, terms, words } from "./text.js";

// ── contains_phrase ────────────────────────────────────────────────────────

export class ContainsPhraseRule extends BaseRule {
  private readonly phrase: string;

  constructor(weight: number, params: RuleParams) {
    super("contains_phrase", weight, params);
    this.phrase = requireString(this.type, params, "phrase");
  }

  protected score(text: string): number {
    return containsPhrase(text.toLowerCase(), this.phrase) ? 1 : 0;
  }

  override explain(text: string): RuleExplanation {
    const hit = this.evaluate(text) === 1;
    return {
      ruleType: this.type,
      score: hit ? 1 : 0,
      reasoning: hit ? `Text contains "${this.phrase}"` : `Text does not contain "${this.phrase}"`,
      evidence: [`phrase: "${this.phrase}"`],
      confidence: 1,
      suggestions: hit ? [] : [`Include the phrase "${this.phrase}"`],
    };
  }
}

// ── word_count ─────────────────────────────────────────────────────────────

export class WordCountRule extends BaseRule {
  private readonly min: number;
  private readonly max: number;

  constructor(weight: number, params: RuleParams) {
    super("word_count", weight, params);
    this.min = optionalNumber(this.type, params, "min_words", 0, { min: 0, integer: true });
    this.max = optionalNumber(this.type, params, "max_words", Number.POSITIVE_INFINITY, { min: 0, integer: true });
    if (this.min > this.max) {
      throw new RuleConfigError({
        message: `${this.type}: min_words (${this.min}) must not exceed max_words (${this.max})`,
        ruleType: this.type,
        param: "min_words",
      });
    }
  }

  protected score(text: string): number {
    const n = words(text).length;
    return n >= this.min && n <= this.max ? 1 : 0;
  }

  override explain(text: string): RuleExplanation {
    const n = words(text).length;
    const ok = n >= this.min && n <= this.max;
    const bounds = Number.isFinite(this.max) ? `${this.min}-${this.max}` : `>= ${this.min}`;
    let suggestions: string[] = [];
    if (n < this.min) suggestions = [`Expand the text to at least ${this.min} words`];
    else if (n > this.max) suggestions = [`Shorten the text to at most ${this.max} words`];
    return {
      ruleType: this.type,
      score: ok ? 1 : 0,
      reasoning: ok ? `Word count ${n} is within ${bounds}` : `Word count ${n} is outside ${bounds}`,
      evidence: [`words: ${n}`],
      confidence: 1,
      suggestions,
    };
  }
}

// ── sentiment_positive ─────────────────────────────────────────────────────

const POSITIVE: ReadonlySet<string> = new Set(lexicon.positive);
const NEGATIVE: ReadonlySet<string> = new Set(lexicon.negative);

/**
 * Lexicon polarity. Texts with no polarity hits score the neutral midpoint 0.5.
 */
export class SentimentPositiveRule extends BaseRule {
  private readonly positive: ReadonlySet<string>;
  private readonly negative: ReadonlySet<string>;

  constructor(weight: number, params: RuleParams) {
    super("sentiment_positive", weight, params);
    const extraPos = optionalStringArray(this.type, params, "positive_words").map((w) => w.toLowerCase());
    const extraNeg = optionalStringArray(this.type, params, "negative_words").map((w) => w.toLowerCase());
    this.positive = extraPos.length ? new Set([...POSITIVE, ...extraPos]) : POSITIVE;
    this.negative = extraNeg.length ? new Set([...NEGATIVE, ...extraNeg]) : NEGATIVE;
  }

  private hits(text: string): { pos: number; neg: number } {
    let pos = 0;
    let neg = 0;
    for (const t of terms(text)) {
      if (this.positive.has(t)) pos++;
      else if (this.negative.has(t)) neg++;
    }
    return { pos, neg };
  }

  protected score(text: string): number {
    const { pos, neg } = this.hits(text);
    if (pos + neg === 0) return 0.5;
    return 0.5 + (0.5 * (pos - neg)) / (pos + neg);
  }

  override explain(text: string): RuleExplanation {
    const { pos, neg } = this.hits(text);
    const score = this.evaluate(text);
    let reasoning = "No polarity signal; scored as neutral";
    if (pos + neg > 0) {
      reasoning = score > 0.5 ? "Tone is predominantly positive" : score < 0.5 ? "Tone is predominantly negative" : "Tone is mixed";
    }
    return {
      ruleType: this.type,
      score,
      reasoning,
      evidence: [`positive terms: ${pos}`, `negative terms: ${neg}`],
      confidence: pos + neg > 0 ? 0.7 : 0.4,
      suggestions: score < 0.5 ? ["Use more constructive, positive wording"] : [],
    };
  }
}

// ── regex_match ────────────────────────────────────────────────────────────

const ALLOWED_FLAGS = /^[imsu]*$/;

export class RegexMatchRule extends BaseRule {
  private readonly re: RegExp;

  constructor(weight: number, params: RuleParams) {
    super("regex_match", weight, params);
    const pattern = requireString(this.type, params, "pattern");
    const flags = optionalString(this.type, params, "flags", "i");
    if (!ALLOWED_FLAGS.test(flags)) {
      throw new RuleConfigError({
        message: `${this.type}: flags may only contain "i", "m", "s", "u", got "${flags}"`,
        ruleType: this.type,
        param: "flags",
      });
    }
    try {
      this.re = new RegExp(pattern, flags);
    } catch (e) {
      throw new RuleConfigError({
        message: `${this.type}: invalid pattern ${JSON.stringify(pattern)}: ${e instanceof Error ? e.message : String(e)}`,
        ruleType: this.type,
        param: "pattern",
      });
    }
  }

  protected score(text: string): number {
    return this.re.test(text) ? 1 : 0;
  }
}

// ── cosine_sim ─────────────────────────────────────────────────────────────

export class CosineSimRule extends BaseRule {
  private readonly target: ReadonlyMap<string, number>;

  constructor(weight: number, params: RuleParams) {
    super("cosine_sim", weight, params);
    const target = requireString(this.type, params, "target");
    this.target = termCounts(terms(target));
    if (this.target.size === 0) {
      throw new RuleConfigError({
        message: `${this.type}: param "target" must contain at least one word, got ${JSON.stringify(target)}`,
        ruleType: this.type,
        param: "target",
      });
    }
  }

  protected score(text: string): number {
    return cosine(termCounts(terms(text)), this.target);
  }

  override explain(text: string): RuleExplanation {
    const score = this.evaluate(text);
    return {
      ruleType: this.type,
      score,
      reasoning: score >= 0.7 ? "Text closely matches the reference" : score >= 0.3 ? "Text partially overlaps the reference" : "Text has little overlap with the reference",
      evidence: [`similarity: ${score.toFixed(3)}`],
      confidence: 0.6,
      suggestions: score < 0.3 ? ["Use vocabulary closer to the reference text"] : [],
    };
  }
}
