/**
 * Template: a named, ordered list of weighted rules, and the aggregation
 * that turns it into a single score.
 */
import { UnscorableTextError, canonicalJson, errorMessage, type Rule } from "@rubric/core";

export interface RuleScore {
  readonly index: number;
  readonly ruleType: string;
  /** Weight that counted toward the aggregate; 0 for a failed rule. */
  readonly weight: number;
  readonly configuredWeight: number;
  readonly rawScore: number;
  readonly weightedScore: number;
  readonly error?: string;
}

export interface ScoreBreakdown {
  /** Weighted mean over rules that produced a score; undefined when none did. */
  readonly overall: number | undefined;
  readonly totalWeight: number;
  readonly perRule: readonly RuleScore[];
}

export interface TemplateInit {
  readonly name: string;
  readonly description?: string;
  readonly rules?: readonly Rule[];
}

export class Template {
  readonly name: string;
  readonly description: string;
  readonly rules: readonly Rule[];

  constructor(init: TemplateInit) {
    this.name = init.name;
    this.description = init.description ?? "";
    this.rules = Object.freeze([...(init.rules ?? [])]);
    Object.freeze(this);
  }

  evaluate(text: string): number | undefined {
    return this.evaluateDetailed(text).overall;
  }

  evaluateDetailed(text: string): ScoreBreakdown {
    const perRule: RuleScore[] = [];
    // Weights are accumulated relative to the largest one so the sums stay finite.
    const scale = this.rules.reduce((m, r) => Math.max(m, r.weight), 0);
    let totalWeight = 0;
    let normWeight = 0;
    let weighted = 0;

    this.rules.forEach((rule, index) => {
      let raw: number;
      try {
        raw = rule.evaluate(text);
        if (!Number.isFinite(raw)) throw new Error(`rule returned a non-finite score (${raw})`);
      } catch (e) {
        perRule.push(
          Object.freeze({
            index,
            ruleType: rule.type,
            weight: 0,
            configuredWeight: rule.weight,
            rawScore: 0,
            weightedScore: 0,
            error: errorMessage(e),
          }),
        );
        return;
      }
      const clamped = Math.max(0, Math.min(1, raw));
      totalWeight += rule.weight;
      normWeight += rule.weight / scale;
      weighted += (rule.weight / scale) * clamped;
      perRule.push(
        Object.freeze({
          index,
          ruleType: rule.type,
          weight: rule.weight,
          configuredWeight: rule.weight,
          rawScore: clamped,
          weightedScore: rule.weight * clamped,
        }),
      );
    });

    const overall = normWeight > 0 ? Math.max(0, Math.min(1, weighted / normWeight)) : undefined;
    return Object.freeze({ overall, totalWeight, perRule: Object.freeze(perRule) });
  }

  /** Like `evaluate`, but an unscorable text is an error. */
  requireScore(text: string): number {
    const overall = this.evaluate(text);
    if (overall === undefined) {
      throw new UnscorableTextError({
        message: `Template "${this.name}" produced no score (no rule succeeded)`,
        template: this.name,
      });
    }
    return overall;
  }

  equals(other: Template): boolean {
    return (
      this.name === other.name &&
      this.description === other.description &&
      this.rules.length === other.rules.length &&
      this.rules.every((r, i) => rulesEqual(r, other.rules[i]))
    );
  }

  withRule(rule: Rule): Template {
    return new Template({ ...this, rules: [...this.rules, rule] });
  }

  withoutRule(index: number): Template {
    return new Template({ ...this, rules: this.rules.filter((_, i) => i !== index) });
  }

  withName(name: string): Template {
    return new Template({ ...this, name });
  }

  withDescription(description: string): Template {
    return new Template({ ...this, description });
  }
}

export function rulesEqual(a: Rule, b: Rule | undefined): boolean {
  return (
    b !== undefined && a.type === b.type && a.weight === b.weight && canonicalJson(a.params) === canonicalJson(b.params)
  );
}

export function score(text: string, template: Template): number | undefined {
  return template.evaluate(text);
}

export function scoreDetailed(text: string, template: Template): ScoreBreakdown {
  return template.evaluateDetailed(text);
}
