#!/usr/bin/env -S npx tsx
/**
 * rubric CLI — the main entry point.
 *
 * Commands: score, train, sample, runs, rules, create-template
 */
import { scoreCmd } from "./commands/score.js";
import { trainCmd } from "./commands/train.js";
import { sampleCmd } from "./commands/sample.js";
import { runsCmd } from "./commands/runs.js";
import { rulesCmd } from "./commands/rules.js";
import { createTemplateCmd } from "./commands/create-template.js";
import { loadEnvFile } from "./env.js";

const USAGE = `
rubric — score text against weighted rubrics and train policies on the score

Commands:
  score            Score text with a template
  train            Run a reward-driven training job
  sample           Generate from a policy and score the output
  runs list        List recorded training runs
  runs show        Show one run in detail
  rules            List registered rule types
  create-template  Write a starter template YAML

Options:
  --log=<level>    debug | info | warn | error (or RUBRIC_LOG_LEVEL)
  --db=<url>       Run ledger URL (or RUBRIC_DB_URL; default file:runs/ledger.db)
  --help, -h       Show this help

Examples:
  rubric score --template=templates/customer-support.yaml --text="I can help you now" --detailed
  rubric score --template=templates/academic-writing.yaml --file=essay.txt --explain
  rubric train --template=templates/customer-support.yaml --steps=20 --batch=8 --lr=0.05
  rubric sample --model=runs/<run_id>/policy.bin --template=templates/customer-support.yaml --count=5
  rubric runs list --limit=10
  rubric runs show --id=customer_support_20260101120000000_1a2b3c4d
  rubric create-template --name="Code Review" --out=templates/code-review.yaml
`.trim();

async function main() {
  loadEnvFile();
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "score") {
    await scoreCmd(args.slice(1));
  } else if (command === "train") {
    await trainCmd(args.slice(1));
  } else if (command === "sample") {
    await sampleCmd(args.slice(1));
  } else if (command === "runs") {
    await runsCmd(args.slice(1));
  } else if (command === "rules") {
    await rulesCmd(args.slice(1));
  } else if (command === "create-template") {
    await createTemplateCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : err);
  process.exit(1);
});
