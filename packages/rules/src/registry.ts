/**
 * Process-wide rule registry, populated with the built-in rule types.
 */
import { Registry, RuleConfigError, UnknownRuleType, type Rule, type RuleParams } from "@rubric/core";
import {
  ArgumentStructureRule,
  CitationQualityRule,
  DomainExpertiseRule,
  ReadabilityRule,
  SemanticCoherenceRule,
} from "./advanced.js";
import { ContainsPhraseRule, CosineSimRule, RegexMatchRule, SentimentPositiveRule, WordCountRule } from "./basic.js";

export type RuleFactory = (weight: number, params: RuleParams) => Rule;

export class RuleRegistry {
  private readonly registry = new Registry<Rule, [number, RuleParams]>("rules", {
    missing: (name, available) =>
      new UnknownRuleType({
        message: `Unknown rule type "${name}". Available: ${available.join(", ")}`,
        ruleType: name,
        available,
      }),
  });

  register(type: string, factory: RuleFactory): void {
    this.registry.register(type, factory);
  }

  /**
   * Build a rule. Throws `UnknownRuleType` for an unregistered type and
   * `RuleConfigError` for a bad weight or params.
   */
  construct(type: string, weight: number, params: RuleParams = {}): Rule {
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
      throw new RuleConfigError({
        message: `${type}: weight must be a finite number > 0, got ${String(weight)}`,
        ruleType: type,
        param: "weight",
      });
    }
    return this.registry.get(type, weight, params);
  }

  has(type: string): boolean {
    return this.registry.has(type);
  }

  list(): string[] {
    return this.registry.list();
  }
}

export function registerBuiltinRules(registry: RuleRegistry): void {
  registry.register("contains_phrase", (w, p) => new ContainsPhraseRule(w, p));
  registry.register("word_count", (w, p) => new WordCountRule(w, p));
  registry.register("sentiment_positive", (w, p) => new SentimentPositiveRule(w, p));
  registry.register("regex_match", (w, p) => new RegexMatchRule(w, p));
  registry.register("cosine_sim", (w, p) => new CosineSimRule(w, p));
  registry.register("argument_structure", (w, p) => new ArgumentStructureRule(w, p));
  registry.register("domain_expertise", (w, p) => new DomainExpertiseRule(w, p));
  registry.register("citation_quality", (w, p) => new CitationQualityRule(w, p));
  registry.register("readability", (w, p) => new ReadabilityRule(w, p));
  registry.register("semantic_coherence", (w, p) => new SemanticCoherenceRule(w, p));
}

export const ruleRegistry = new RuleRegistry();
registerBuiltinRules(ruleRegistry);
