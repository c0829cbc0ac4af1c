/**
 * Rule base class and parameter readers.
 *
 * Parameter readers throw `RuleConfigError` so a bad template fails while it
 * is being loaded, never while it is scoring.
 */
import { RuleConfigError, type Rule, type RuleExplanation, type RuleParams } from "@rubric/core";
import { clamp01 } from "./text.js";

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

export abstract class BaseRule implements Rule {
  readonly type: string;
  readonly weight: number;
  readonly params: RuleParams;

  constructor(type: string, weight: number, params: RuleParams) {
    this.type = type;
    this.weight = weight;
    this.params = deepFreeze(structuredClone(params));
  }

  /** Raw strategy score; may stray outside [0, 1], `evaluate` clamps it. */
  protected abstract score(text: string): number;

  evaluate(text: string): number {
    return clamp01(this.score(text));
  }

  explain(text: string): RuleExplanation {
    const score = this.evaluate(text);
    return {
      ruleType: this.type,
      score,
      reasoning: score >= 1 ? `${this.type} satisfied` : score <= 0 ? `${this.type} not satisfied` : `${this.type} partially satisfied`,
      evidence: [`score: ${score.toFixed(3)}`],
      confidence: 0.8,
      suggestions: [],
    };
  }
}

// ── Param readers ──────────────────────────────────────────────────────────

export function requireString(type: string, params: RuleParams, key: string): string {
  const v = params[key];
  if (typeof v !== "string" || v.trim().length === 0) {
    throw new RuleConfigError({
      message: `${type}: param "${key}" must be a non-empty string`,
      ruleType: type,
      param: key,
    });
  }
  return v;
}

export function optionalString(type: string, params: RuleParams, key: string, fallback: string): string {
  const v = params[key];
  if (v === undefined || v === null) return fallback;
  if (typeof v !== "string") {
    throw new RuleConfigError({ message: `${type}: param "${key}" must be a string`, ruleType: type, param: key });
  }
  return v;
}

export function optionalNumber(
  type: string,
  params: RuleParams,
  key: string,
  fallback: number,
  opts: { min?: number; exclusiveMin?: boolean; integer?: boolean } = {},
): number {
  const v = params[key];
  if (v === undefined || v === null) return fallback;
  const bad = (why: string) =>
    new RuleConfigError({ message: `${type}: param "${key}" ${why}, got ${JSON.stringify(v)}`, ruleType: type, param: key });
  if (typeof v !== "number" || Number.isNaN(v)) throw bad("must be a number");
  if (opts.integer && !Number.isInteger(v)) throw bad("must be an integer");
  if (opts.min !== undefined) {
    if (opts.exclusiveMin ? v <= opts.min : v < opts.min) {
      throw bad(`must be ${opts.exclusiveMin ? ">" : ">="} ${opts.min}`);
    }
  }
  return v;
}

export function optionalStringArray(type: string, params: RuleParams, key: string): string[] {
  const v = params[key];
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v) || !v.every((s): s is string => typeof s === "string")) {
    throw new RuleConfigError({ message: `${type}: param "${key}" must be a list of strings`, ruleType: type, param: key });
  }
  return v.filter((s) => s.trim().length > 0);
}
