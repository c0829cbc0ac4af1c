/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** A rule's own parameters are structurally invalid. Raised at construction. */
export class RuleConfigError extends Data.TaggedError("RuleConfigError")<{
  readonly message: string;
  readonly ruleType: string;
  readonly param?: string;
}> {}

export class UnknownRuleType extends Data.TaggedError("UnknownRuleType")<{
  readonly message: string;
  readonly ruleType: string;
  readonly available: readonly string[];
}> {}

export interface TemplateIssue {
  /** Zero-based position of the offending rule, absent for document-level issues. */
  readonly index?: number;
  readonly ruleType?: string;
  readonly reason: string;
}

export class TemplateLoadError extends Data.TaggedError("TemplateLoadError")<{
  readonly message: string;
  readonly issues: readonly TemplateIssue[];
  readonly cause?: unknown;
}> {}

/** No rule produced a score: the text cannot be scored by this template. */
export class UnscorableTextError extends Data.TaggedError("UnscorableTextError")<{
  readonly message: string;
  readonly template: string;
}> {}

export class ModelError extends Data.TaggedError("ModelError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class TrainError extends Data.TaggedError("TrainError")<{
  readonly message: string;
  readonly step?: number;
  readonly cause?: unknown;
}> {}

export class CheckpointError extends Data.TaggedError("CheckpointError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class LedgerError extends Data.TaggedError("LedgerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Format an issue list as `rules[1] (word_count): min_words must be ...` lines. */
export function formatIssues(issues: readonly TemplateIssue[]): string {
  return issues
    .map((issue) => {
      const where = issue.index === undefined ? "template" : `rules[${issue.index}]`;
      const type = issue.ruleType ? ` (${issue.ruleType})` : "";
      return `${where}${type}: ${issue.reason}`;
    })
    .join("\n");
}

/** Best-effort message extraction for values caught from arbitrary code. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
