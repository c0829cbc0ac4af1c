/**
 * Training configuration: defaults, validation and the plain-JSON form
 * stored in the run ledger.
 */
import {
  ConfigError,
  type OptimizerName,
  type RewardNormalization,
  type SerializedTrainingConfig,
} from "@rubric/core";
import { templateToDocument, type Template } from "@rubric/scoring";

export const DEFAULT_PROMPTS: readonly string[] = [
  "Write a helpful explanation about",
  "Provide clear guidance on",
  "Give me advice about",
  "Explain in simple terms",
  "Help me understand",
  "What is the best way to",
  "Can you clarify",
  "Please describe how to",
];

export interface TrainingConfig {
  readonly modelIdentifier: string;
  readonly template: Template;
  readonly templatePath?: string;
  readonly steps: number;
  readonly learningRate: number;
  readonly batchSize: number;
  readonly outputPath: string;
  /** Save a checkpoint every N steps; 0 disables. */
  readonly checkpointEvery: number;
  readonly maxNewTokens: number;
  readonly temperature: number;
  readonly topk: number;
  readonly seed: number;
  readonly optimizer: OptimizerName;
  readonly rewardNormalization: RewardNormalization;
  readonly prompts: readonly string[];
}

/** Required fields plus any subset of the defaulted ones. */
export type TrainingConfigInput = Pick<
  TrainingConfig,
  "modelIdentifier" | "template" | "steps" | "learningRate" | "batchSize" | "outputPath"
> &
  Partial<Omit<TrainingConfig, "modelIdentifier" | "template" | "steps" | "learningRate" | "batchSize" | "outputPath">>;

export const defaultTrainingOptions = {
  checkpointEvery: 5,
  maxNewTokens: 24,
  temperature: 1.0,
  topk: 0,
  seed: 42,
  optimizer: "adamw",
  rewardNormalization: "center",
  prompts: DEFAULT_PROMPTS,
} as const satisfies Partial<TrainingConfig>;

const OPTIMIZERS: readonly OptimizerName[] = ["adamw", "sgd"];
const NORMALIZATIONS: readonly RewardNormalization[] = ["none", "center", "standardize"];

/** Apply defaults and check every field; fails with `ConfigError` listing all problems. */
export function validateTrainingConfig(input: TrainingConfigInput): TrainingConfig {
  const d = defaultTrainingOptions;
  const c: TrainingConfig = {
    modelIdentifier: input.modelIdentifier,
    template: input.template,
    templatePath: input.templatePath,
    steps: input.steps,
    learningRate: input.learningRate,
    batchSize: input.batchSize,
    outputPath: input.outputPath,
    checkpointEvery: input.checkpointEvery ?? d.checkpointEvery,
    maxNewTokens: input.maxNewTokens ?? d.maxNewTokens,
    temperature: input.temperature ?? d.temperature,
    topk: input.topk ?? d.topk,
    seed: input.seed ?? d.seed,
    optimizer: input.optimizer ?? d.optimizer,
    rewardNormalization: input.rewardNormalization ?? d.rewardNormalization,
    prompts: input.prompts ?? d.prompts,
  };
  const problems: string[] = [];
  const posInt = (name: string, v: number) => {
    if (!Number.isInteger(v) || v <= 0) problems.push(`${name} must be a positive integer, got ${v}`);
  };
  if (c.modelIdentifier.trim().length === 0) problems.push("modelIdentifier must not be empty");
  if (c.outputPath.trim().length === 0) problems.push("outputPath must not be empty");
  posInt("steps", c.steps);
  posInt("batchSize", c.batchSize);
  posInt("maxNewTokens", c.maxNewTokens);
  if (!Number.isFinite(c.learningRate) || c.learningRate <= 0) {
    problems.push(`learningRate must be > 0, got ${c.learningRate}`);
  }
  if (!Number.isInteger(c.checkpointEvery) || c.checkpointEvery < 0) {
    problems.push(`checkpointEvery must be a non-negative integer, got ${c.checkpointEvery}`);
  }
  if (!Number.isFinite(c.temperature) || c.temperature < 0) problems.push(`temperature must be >= 0, got ${c.temperature}`);
  if (!Number.isInteger(c.topk) || c.topk < 0) problems.push(`topk must be a non-negative integer, got ${c.topk}`);
  if (!Number.isInteger(c.seed)) problems.push(`seed must be an integer, got ${c.seed}`);
  if (!OPTIMIZERS.includes(c.optimizer)) problems.push(`optimizer must be one of ${OPTIMIZERS.join(", ")}`);
  if (!NORMALIZATIONS.includes(c.rewardNormalization)) {
    problems.push(`rewardNormalization must be one of ${NORMALIZATIONS.join(", ")}`);
  }
  if (c.prompts.length === 0) problems.push("prompts must not be empty");
  if (problems.length > 0) {
    throw new ConfigError({ message: `Invalid training config:\n  ${problems.join("\n  ")}` });
  }
  return Object.freeze({ ...c, prompts: Object.freeze([...c.prompts]) });
}

export function serializeConfig(config: TrainingConfig): SerializedTrainingConfig {
  const { template, templatePath, ...rest } = config;
  const out: SerializedTrainingConfig = {
    ...rest,
    prompts: [...config.prompts],
    template: templateToDocument(template),
  };
  return templatePath === undefined ? out : { ...out, templatePath };
}
