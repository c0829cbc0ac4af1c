/**
 * Human-facing feedback built on top of the per-rule breakdown.
 */
import { errorMessage, type RuleExplanation } from "@rubric/core";
import type { ScoreBreakdown, Template } from "./template.js";

export interface RuleReport {
  readonly index: number;
  readonly ruleType: string;
  readonly weight: number;
  readonly rawScore: number;
  readonly weightedScore: number;
  readonly explanation?: RuleExplanation;
  readonly error?: string;
}

export interface TemplateReport {
  readonly template: string;
  readonly overall: number | undefined;
  readonly totalWeight: number;
  readonly rules: readonly RuleReport[];
  readonly strengths: readonly string[];
  readonly weaknesses: readonly string[];
  readonly suggestions: readonly string[];
  readonly interpretation: string;
}

export function interpretScore(overall: number | undefined): string {
  if (overall === undefined) return "Unscorable - no rule produced a score";
  if (overall >= 0.9) return "Excellent - text meets or exceeds all quality criteria";
  if (overall >= 0.7) return "Good - text meets most quality criteria with minor areas for improvement";
  if (overall >= 0.5) return "Moderate - text meets some criteria but has significant room for improvement";
  if (overall >= 0.3) return "Poor - text fails to meet most quality criteria and needs substantial revision";
  return "Very Poor - text fails to meet basic quality standards and requires complete revision";
}

export function evaluateWithExplanations(template: Template, text: string): TemplateReport {
  const breakdown: ScoreBreakdown = template.evaluateDetailed(text);
  const strengths: string[] = [];
  const weaknesses: string[] = [];
  const suggestions = new Set<string>();

  const rules = breakdown.perRule.map((entry): RuleReport => {
    const rule = template.rules[entry.index];
    if (entry.error !== undefined || !rule?.explain) return { ...entry };
    let explanation: RuleExplanation;
    try {
      explanation = rule.explain(text);
    } catch (e) {
      return { ...entry, error: errorMessage(e) };
    }
    if (entry.rawScore >= 0.7) strengths.push(`${entry.ruleType}: ${explanation.reasoning}`);
    else if (entry.rawScore < 0.4) weaknesses.push(`${entry.ruleType}: ${explanation.reasoning}`);
    for (const s of explanation.suggestions) suggestions.add(s);
    return { ...entry, explanation };
  });

  if (template.rules.length === 0) {
    weaknesses.push("No evaluation rules defined");
    suggestions.add("Add scoring rules to evaluate text quality");
  }

  return {
    template: template.name,
    overall: breakdown.overall,
    totalWeight: breakdown.totalWeight,
    rules,
    strengths,
    weaknesses,
    suggestions: [...suggestions],
    interpretation: interpretScore(breakdown.overall),
  };
}
