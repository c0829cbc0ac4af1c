/**
 * Explainable rules: each derives its score from a full `RuleExplanation`,
 * so `evaluate(text) === explain(text).score` always holds.
 */
import { RuleConfigError, type RuleExplanation, type RuleParams } from "@rubric/core";
import { BaseRule, optionalNumber, optionalString, optionalStringArray } from "./base.js";
import { clamp01, containsPhrase, cosine, countSyllables, sentences, termCounts, terms, words } from "./text.js";

abstract class ExplainedRule extends BaseRule {
  protected abstract analyze(text: string): Omit<RuleExplanation, "ruleType">;

  protected score(text: string): number {
    return this.analyze(text).score;
  }

  override explain(text: string): RuleExplanation {
    const a = this.analyze(text);
    return { ...a, ruleType: this.type, score: clamp01(a.score) };
  }
}

// ── argument_structure ─────────────────────────────────────────────────────

const CLAIM_MARKERS = ["therefore", "thus", "hence", "consequently", "as a result"];
const EVIDENCE_MARKERS = ["because", "since", "given that", "due to", "for example", "such as"];
const COUNTER_MARKERS = ["however", "but", "although", "despite", "on the other hand"];

export class ArgumentStructureRule extends ExplainedRule {
  constructor(weight: number, params: RuleParams) {
    super("argument_structure", weight, params);
  }

  protected analyze(text: string) {
    const lower = text.toLowerCase();
    const count = (markers: string[]) => markers.filter((m) => containsPhrase(lower, m)).length;
    const claims = count(CLAIM_MARKERS);
    const support = count(EVIDENCE_MARKERS);
    const counters = count(COUNTER_MARKERS);

    let score = 0;
    const evidence: string[] = [];
    const suggestions: string[] = [];
    if (claims > 0) {
      score += 0.3;
      evidence.push(`Found ${claims} claim indicators`);
    } else {
      suggestions.push("Add clear conclusions or claims (use 'therefore', 'thus', etc.)");
    }
    if (support > 0) {
      score += 0.4;
      evidence.push(`Found ${support} evidence indicators`);
    } else {
      suggestions.push("Provide supporting evidence (use 'because', 'for example', etc.)");
    }
    if (counters > 0) {
      score += 0.3;
      evidence.push(`Found ${counters} counter-argument indicators`);
    } else {
      suggestions.push("Consider counter-arguments (use 'however', 'although', etc.)");
    }
    if (claims > 0 && support > 0) score = Math.min(1, score + 0.1);

    const reasoning =
      score >= 0.8
        ? "Text demonstrates strong argumentative structure"
        : score >= 0.5
          ? "Text shows moderate argumentative structure"
          : "Text lacks clear argumentative structure";
    return { score, reasoning, evidence, confidence: 0.7, suggestions };
  }
}

// ── domain_expertise ───────────────────────────────────────────────────────

export class DomainExpertiseRule extends ExplainedRule {
  private readonly domain: string;
  private readonly terms: readonly string[];

  constructor(weight: number, params: RuleParams) {
    super("domain_expertise", weight, params);
    this.domain = optionalString(this.type, params, "domain", "general");
    this.terms = optionalStringArray(this.type, params, "expertise_terms");
    if (this.terms.length === 0) {
      throw new RuleConfigError({
        message: `${this.type}: param "expertise_terms" must list at least one term`,
        ruleType: this.type,
        param: "expertise_terms",
      });
    }
  }

  protected analyze(text: string) {
    const lower = text.toLowerCase();
    const found = this.terms.filter((t) => containsPhrase(lower, t));
    const n = words(text).length;
    const density = n > 0 ? found.length / n : 0;
    const coverage = found.length / this.terms.length;
    const score = Math.min(1, (density * 10 + coverage) / 2);

    let reasoning: string;
    let suggestions: string[];
    if (score >= 0.7) {
      reasoning = `Text demonstrates strong ${this.domain} domain expertise`;
      suggestions = [];
    } else if (score >= 0.4) {
      reasoning = `Text shows moderate ${this.domain} domain knowledge`;
      suggestions = [`Include more ${this.domain}-specific terminology`, "Reference domain-specific concepts or frameworks"];
    } else {
      reasoning = `Text lacks ${this.domain} domain expertise indicators`;
      suggestions = [`Research and include ${this.domain}-specific terms`, "Add technical depth and specificity"];
    }
    return {
      score,
      reasoning,
      evidence: [
        `Domain expertise terms found: ${found.length}/${this.terms.length}`,
        `Term density: ${density.toFixed(4)}`,
        `Found terms: ${found.length ? found.join(", ") : "None"}`,
      ],
      confidence: 0.8,
      suggestions,
    };
  }
}

// ── citation_quality ───────────────────────────────────────────────────────

const CITATION_PATTERNS = [
  /\([A-Za-z]+,?\s+\d{4}\)/g, // (Author, 2023)
  /\[[0-9]+\]/g, // [1]
  /https?:\/\/\S+/g,
  /doi:\s*\S+/gi,
];

export class CitationQualityRule extends ExplainedRule {
  constructor(weight: number, params: RuleParams) {
    super("citation_quality", weight, params);
  }

  protected analyze(text: string) {
    const found = CITATION_PATTERNS.flatMap((re) => text.match(re) ?? []);
    const n = words(text).length;
    const density = n > 0 ? found.length / n : 0;

    let score: number;
    let reasoning: string;
    let suggestions: string[];
    if (found.length === 0) {
      score = 0;
      reasoning = "No citations found in text";
      suggestions = ["Add credible sources to support claims", "Cite relevant research or documentation"];
    } else if (density < 0.01) {
      score = 0.3;
      reasoning = "Very few citations relative to text length";
      suggestions = ["Cite sources for key claims and statistics"];
    } else if (density < 0.05) {
      score = 0.7;
      reasoning = "Moderate citation density";
      suggestions = ["Consider adding more sources for comprehensive coverage"];
    } else {
      score = 1;
      reasoning = "Good citation density and source support";
      suggestions = [];
    }
    return {
      score,
      reasoning,
      evidence: [
        `Citations found: ${found.length}`,
        `Citation density: ${density.toFixed(4)} per word`,
        `Sample citations: ${found.length ? found.slice(0, 3).join(", ") : "None"}`,
      ],
      confidence: 0.9,
      suggestions,
    };
  }
}

// ── readability ────────────────────────────────────────────────────────────

/** Flesch-Kincaid grade level, or undefined when the text has no sentences. */
export function fleschKincaidGrade(text: string): number | undefined {
  const sents = sentences(text);
  const ws = terms(text);
  if (sents.length === 0 || ws.length === 0) return undefined;
  const syllables = ws.reduce((sum, w) => sum + countSyllables(w), 0);
  return 0.39 * (ws.length / sents.length) + 11.8 * (syllables / ws.length) - 15.59;
}

export class ReadabilityRule extends ExplainedRule {
  private readonly target: number;
  private readonly tolerance: number;

  constructor(weight: number, params: RuleParams) {
    super("readability", weight, params);
    this.target = optionalNumber(this.type, params, "target_grade_level", 8);
    this.tolerance = optionalNumber(this.type, params, "tolerance", 2, { min: 0, exclusiveMin: true });
  }

  protected analyze(text: string) {
    const grade = fleschKincaidGrade(text);
    if (grade === undefined) {
      return {
        score: 0,
        reasoning: "Text has no sentences to assess",
        evidence: [],
        confidence: 0.9,
        suggestions: ["Write at least one complete sentence"],
      };
    }
    const diff = Math.abs(grade - this.target);
    const score =
      diff <= this.tolerance ? 1 - (diff / this.tolerance) * 0.3 : Math.max(0, 0.7 - (diff - this.tolerance) * 0.1);

    let reasoning: string;
    let suggestions: string[];
    if (diff <= this.tolerance) {
      reasoning = `Text readability is appropriate for target audience (grade ${this.target})`;
      suggestions = [];
    } else if (grade > this.target) {
      reasoning = `Text is too complex for target audience (grade ${grade.toFixed(1)} vs ${this.target})`;
      suggestions = ["Use shorter sentences", "Replace complex words with simpler alternatives"];
    } else {
      reasoning = `Text may be too simple for target audience (grade ${grade.toFixed(1)} vs ${this.target})`;
      suggestions = ["Add more sophisticated vocabulary", "Include more complex sentence structures"];
    }
    return {
      score,
      reasoning,
      evidence: [`Flesch-Kincaid Grade Level: ${grade.toFixed(1)}`, `Target Grade Level: ${this.target}`],
      confidence: 0.8,
      suggestions,
    };
  }
}

// ── semantic_coherence ─────────────────────────────────────────────────────

export class SemanticCoherenceRule extends ExplainedRule {
  constructor(weight: number, params: RuleParams) {
    super("semantic_coherence", weight, params);
  }

  protected analyze(text: string) {
    const sents = sentences(text);
    if (sents.length === 0) {
      return { score: 0, reasoning: "Text has no sentences to assess", evidence: [], confidence: 0.9, suggestions: [] };
    }
    if (sents.length === 1) {
      return {
        score: 0.8,
        reasoning: "Single sentence - coherence not applicable",
        evidence: ["Text contains 1 sentence"],
        confidence: 0.9,
        suggestions: [],
      };
    }
    const vectors = sents.map((s) => termCounts(terms(s)));
    let total = 0;
    for (let i = 1; i < vectors.length; i++) total += cosine(vectors[i - 1], vectors[i]);
    const mean = total / (vectors.length - 1);
    const score = Math.min(1, 2 * mean);

    let reasoning: string;
    let suggestions: string[];
    if (score >= 0.7) {
      reasoning = "Text shows strong semantic coherence between sentences";
      suggestions = [];
    } else if (score >= 0.4) {
      reasoning = "Text shows moderate semantic coherence with some topic drift";
      suggestions = ["Strengthen connections between sentences", "Use more consistent terminology"];
    } else {
      reasoning = "Text lacks semantic coherence - sentences seem disconnected";
      suggestions = ["Focus on a single main topic", "Use consistent vocabulary throughout"];
    }
    return {
      score,
      reasoning,
      evidence: [`Average adjacent-sentence similarity: ${mean.toFixed(3)}`, `Sentences analyzed: ${sents.length}`],
      confidence: 0.6,
      suggestions,
    };
  }
}
