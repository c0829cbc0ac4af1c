/**
 * Template YAML serializer.
 *
 * Every problem in a document is collected into a single `TemplateLoadError`
 * so an author sees all of them at once, each tagged with its rule index.
 */
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { dump, load } from "js-yaml";
import {
  RuleConfigError,
  TemplateLoadError,
  UnknownRuleType,
  errorMessage,
  formatIssues,
  type Rule,
  type RuleParams,
  type TemplateDocument,
  type TemplateIssue,
} from "@rubric/core";
import { ruleRegistry, type RuleRegistry } from "@rubric/rules";
import { Template } from "./template.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function loadError(issues: TemplateIssue[], cause?: unknown): TemplateLoadError {
  return new TemplateLoadError({
    message: `Invalid template:\n${formatIssues(issues)}`,
    issues,
    cause,
  });
}

function buildRule(raw: unknown, index: number, registry: RuleRegistry, issues: TemplateIssue[]): Rule | undefined {
  if (!isRecord(raw)) {
    issues.push({ index, reason: "rule must be a mapping with a 'type' field" });
    return undefined;
  }
  const type = raw.type;
  if (typeof type !== "string" || type.length === 0) {
    issues.push({ index, reason: "'type' must be a non-empty string" });
    return undefined;
  }
  let ok = true;
  const weight = raw.weight ?? 1.0;
  if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
    issues.push({ index, ruleType: type, reason: `'weight' must be a number > 0, got ${JSON.stringify(weight)}` });
    ok = false;
  }
  const params = raw.params ?? {};
  if (!isRecord(params)) {
    issues.push({ index, ruleType: type, reason: "'params' must be a mapping" });
    ok = false;
  }
  if (!registry.has(type)) {
    issues.push({ index, ruleType: type, reason: `unknown rule type; available: ${registry.list().join(", ")}` });
    return undefined;
  }
  if (!ok || typeof weight !== "number" || !isRecord(params)) return undefined;
  try {
    return registry.construct(type, weight, params);
  } catch (e) {
    const reason = e instanceof RuleConfigError || e instanceof UnknownRuleType ? e.message : errorMessage(e);
    issues.push({ index, ruleType: type, reason });
    return undefined;
  }
}

/** Validate a parsed document and build the template it describes. */
export function templateFromDocument(
  doc: unknown,
  registry: RuleRegistry = ruleRegistry,
): Effect.Effect<Template, TemplateLoadError> {
  return Effect.suspend(() => {
    if (!isRecord(doc)) {
      return Effect.fail(loadError([{ reason: "document must be a mapping" }]));
    }
    const issues: TemplateIssue[] = [];
    const name = doc.name;
    if (typeof name !== "string" || name.trim().length === 0) {
      issues.push({ reason: "'name' must be a non-empty string" });
    }
    const description = doc.description ?? "";
    if (typeof description !== "string") {
      issues.push({ reason: "'description' must be a string" });
    }
    const rawRules = doc.rules ?? [];
    const rules: Rule[] = [];
    if (!Array.isArray(rawRules)) {
      issues.push({ reason: "'rules' must be a list" });
    } else {
      rawRules.forEach((raw: unknown, i) => {
        const rule = buildRule(raw, i, registry, issues);
        if (rule) rules.push(rule);
      });
    }
    if (issues.length > 0 || typeof name !== "string" || typeof description !== "string") {
      return Effect.fail(loadError(issues));
    }
    return Effect.succeed(new Template({ name, description, rules }));
  });
}

/** Parse YAML text into a template. */
export function loadTemplate(source: string, registry: RuleRegistry = ruleRegistry): Effect.Effect<Template, TemplateLoadError> {
  return Effect.try({
    try: (): unknown => load(source),
    catch: (e) => loadError([{ reason: `YAML parse error: ${errorMessage(e)}` }], e),
  }).pipe(Effect.flatMap((doc) => templateFromDocument(doc, registry)));
}

export function templateToDocument(template: Template): TemplateDocument {
  return {
    name: template.name,
    description: template.description,
    rules: template.rules.map((r) => ({ type: r.type, weight: r.weight, params: cloneParams(r.params) })),
  };
}

function cloneParams(params: RuleParams): Record<string, unknown> {
  return structuredClone({ ...params });
}

export function dumpTemplate(template: Template): string {
  return dump(templateToDocument(template), { noRefs: true, sortKeys: false, lineWidth: 100 });
}

export function readTemplateFile(path: string, registry: RuleRegistry = ruleRegistry): Effect.Effect<Template, TemplateLoadError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (e) => loadError([{ reason: `cannot read ${path}: ${errorMessage(e)}` }], e),
  }).pipe(
    Effect.flatMap((source) => loadTemplate(source, registry)),
    Effect.tap((t) => Effect.logDebug(`Loaded template "${t.name}" (${t.rules.length} rules) from ${path}`)),
  );
}

export function writeTemplateFile(path: string, template: Template): Effect.Effect<void, TemplateLoadError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, dumpTemplate(template), "utf-8");
    },
    catch: (e) => loadError([{ reason: `cannot write ${path}: ${errorMessage(e)}` }], e),
  });
}
