/**
 * Command: rubric score
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError, errorMessage } from "@rubric/core";
import { parseLogLevel, runLogged, withSpan } from "@rubric/effect-runtime";
import { evaluateWithExplanations, readTemplateFile, type ScoreBreakdown, type TemplateReport } from "@rubric/scoring";
import { boolArg, parseKV, requireArg } from "../parse.js";

function fmt(n: number | undefined): string {
  return n === undefined ? "undefined" : n.toFixed(4);
}

export function formatBreakdown(b: ScoreBreakdown): string {
  const lines = [`Overall: ${fmt(b.overall)} (total weight ${b.totalWeight})`];
  for (const r of b.perRule) {
    const tail = r.error !== undefined ? `  ERROR: ${r.error}` : "";
    lines.push(
      `  [${r.index}] ${r.ruleType.padEnd(20)} weight=${r.configuredWeight} raw=${r.rawScore.toFixed(4)} weighted=${r.weightedScore.toFixed(4)}${tail}`,
    );
  }
  return lines.join("\n");
}

export function formatReport(report: TemplateReport): string {
  const lines = [`Overall: ${fmt(report.overall)}`, `Interpretation: ${report.interpretation}`];
  for (const r of report.rules) {
    lines.push(``, `[${r.index}] ${r.ruleType} — ${r.rawScore.toFixed(4)} (weight ${r.weight})`);
    if (r.error !== undefined) lines.push(`  error: ${r.error}`);
    if (r.explanation) {
      lines.push(`  ${r.explanation.reasoning}`);
      for (const e of r.explanation.evidence) lines.push(`    - ${e}`);
    }
  }
  const section = (title: string, items: readonly string[]) => {
    if (items.length === 0) return;
    lines.push(``, `${title}:`);
    for (const item of items) lines.push(`  • ${item}`);
  };
  section("Strengths", report.strengths);
  section("Weaknesses", report.weaknesses);
  section("Suggestions", report.suggestions);
  return lines.join("\n");
}

export async function scoreCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const templatePath = requireArg(kv, "template", "path to a template YAML file");
  const detailed = boolArg(kv, "detailed", false);
  const explain = boolArg(kv, "explain", false);
  const json = boolArg(kv, "json", false);

  const program = withSpan("score", Effect.gen(function* () {
    const template = yield* readTemplateFile(templatePath);
    const text = yield* Effect.tryPromise({
      try: async () => {
        if (kv["text"] !== undefined) return kv["text"];
        if (kv["file"]) return readFile(kv["file"], "utf-8");
        throw new Error("pass --text=<string> or --file=<path>");
      },
      catch: (e) => new ConfigError({ message: errorMessage(e), cause: e }),
    });
    yield* Effect.logDebug(`Scoring ${text.length} chars with "${template.name}"`);
    return { template, text };
  }));

  const { template, text } = await runLogged(program, parseLogLevel(kv["log"] ?? process.env.RUBRIC_LOG_LEVEL));

  if (explain) {
    const report = evaluateWithExplanations(template, text);
    console.log(json ? JSON.stringify(report, null, 2) : formatReport(report));
    return;
  }
  const breakdown = template.evaluateDetailed(text);
  if (json) {
    console.log(JSON.stringify(detailed ? { template: template.name, ...breakdown } : { template: template.name, overall: breakdown.overall ?? null }, null, 2));
  } else if (detailed) {
    console.log(`Template: ${template.name}`);
    console.log(formatBreakdown(breakdown));
  } else {
    console.log(fmt(breakdown.overall));
  }
}
