export { BaseRule, requireString, optionalString, optionalNumber, optionalStringArray } from "./base.js";
export { ContainsPhraseRule, WordCountRule, SentimentPositiveRule, RegexMatchRule, CosineSimRule } from "./basic.js";
export {
  ArgumentStructureRule,
  DomainExpertiseRule,
  CitationQualityRule,
  ReadabilityRule,
  SemanticCoherenceRule,
  fleschKincaidGrade,
} from "./advanced.js";
export { RuleRegistry, registerBuiltinRules, ruleRegistry, type RuleFactory } from "./registry.js";
export { words, terms, sentences, cosine, termCounts } from "./text.js";
