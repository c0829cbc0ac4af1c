/**
 * Command: rubric sample
 *
 * Usage:
 *   rubric sample --model=runs/<run>/policy.bin --template=templates/customer-support.yaml
 *   rubric sample --model=... --template=... --prompt="Help me understand" --count=5 --temperature=0.7
 *
 * Generates from a saved (or freshly built) policy and scores each sample with
 * the template, the same way the trainer rewards them.
 */
import { Effect } from "effect";
import { SeededRng, type GenerateOptions, type Policy, type Rng } from "@rubric/core";
import { parseLogLevel, runLogged, withSpan } from "@rubric/effect-runtime";
import { readTemplateFile, type ScoreBreakdown, type Template } from "@rubric/scoring";
import { FileCheckpoint, defaultTrainingOptions, loadPolicy, policyRegistry } from "@rubric/train";
import { boolArg, floatArg, intArg, parseKV, requireArg, strArg } from "../parse.js";
import { formatBreakdown } from "./score.js";

export interface SampleResult {
  prompt: string;
  text: string;
  breakdown: ScoreBreakdown;
}

/** One generation per prompt, each scored with `template`. */
export function sampleAndScore(
  policy: Policy,
  template: Template,
  prompts: readonly string[],
  rng: Rng,
  opts: GenerateOptions,
): SampleResult[] {
  return prompts.map((prompt) => {
    const { text } = policy.generate(prompt, rng, opts);
    return { prompt, text, breakdown: template.evaluateDetailed(text) };
  });
}

export function formatSample(result: SampleResult, index: number): string {
  return [`--- sample ${index + 1} ---`, `prompt: ${result.prompt}`, `text:   ${result.text}`, formatBreakdown(result.breakdown)].join(
    "\n",
  );
}

export async function sampleCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const model = requireArg(kv, "model", "policy name or path to a saved policy");
  const templatePath = requireArg(kv, "template", "path to a template YAML file");
  const prompt = strArg(kv, "prompt", defaultTrainingOptions.prompts[0]);
  const count = intArg(kv, "count", 3);
  const seed = intArg(kv, "seed", defaultTrainingOptions.seed);
  const json = boolArg(kv, "json", false);
  const opts: GenerateOptions = {
    maxNewTokens: intArg(kv, "maxTokens", defaultTrainingOptions.maxNewTokens),
    temperature: floatArg(kv, "temperature", defaultTrainingOptions.temperature),
    topk: intArg(kv, "topk", defaultTrainingOptions.topk),
  };
  const checkpoint = new FileCheckpoint();

  const program = withSpan(
    "sample",
    Effect.gen(function* () {
      const template = yield* readTemplateFile(templatePath);
      const policy = yield* loadPolicy(model, { seed, corpus: [prompt] }, checkpoint);
      if (!policyRegistry.has(model)) {
        const saved = yield* checkpoint.load(model);
        yield* Effect.logInfo(`Loaded ${saved.policy.kind} policy from step ${saved.step} (config ${saved.configHash})`);
      }
      yield* Effect.logDebug(`Sampling ${count} x "${prompt}" at temperature ${opts.temperature}`);
      return { template, policy };
    }),
  );

  const { template, policy } = await runLogged(program, parseLogLevel(kv["log"] ?? process.env.RUBRIC_LOG_LEVEL));
  const results = sampleAndScore(policy, template, Array.from({ length: count }, () => prompt), new SeededRng(seed), opts);

  if (json) {
    console.log(JSON.stringify({ template: template.name, model, samples: results }, null, 2));
    return;
  }
  console.log(`Template: ${template.name} | model: ${model} (${policy.kind}, vocab ${policy.vocabSize})`);
  results.forEach((r, i) => console.log(`\n${formatSample(r, i)}`));
}
