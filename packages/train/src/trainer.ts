/**
 * Reward-driven training loop.
 *
 * Pure orchestration over services (policy, optimizer, checkpoint, ledger).
 * Each step samples a batch of generations, scores them with the template,
 * and applies one policy-gradient update. The run record is appended to the
 * ledger after every step, so the ledger always reflects the last completed
 * step.
 */
import { join } from "node:path";
import { Effect, Either } from "effect";
import {
  SeededRng,
  TrainError,
  errorMessage,
  hashConfig,
  runId as makeRunId,
  type Checkpoint,
  type CheckpointRef,
  type CheckpointState,
  type ModelError,
  type Policy,
  type RunLedger,
  type RunRecord,
} from "@rubric/core";
import type { Template } from "@rubric/scoring";
import { FileCheckpoint } from "./checkpoint.js";
import { serializeConfig, validateTrainingConfig, type TrainingConfig, type TrainingConfigInput } from "./config.js";
import { createOptimizerRegistry } from "./optimizers.js";
import { loadPolicy as defaultLoadPolicy, type PolicyInit } from "./policy.js";
import { RewardAdapter, advantages, mean } from "./reward.js";

export type TrainerState = "idle" | "initializing" | "running" | "completed" | "failed";

export interface SampleRecord {
  prompt: string;
  text: string;
  reward: number;
}

export interface StepMetrics {
  runId: string;
  step: number;
  meanReward: number;
  minReward: number;
  maxReward: number;
  gradNorm: number;
  meanLogProb: number;
  elapsed_ms: number;
  samples: SampleRecord[];
}

export interface TrainerDeps {
  ledger: RunLedger;
  loadPolicy?: (identifier: string, init: PolicyInit, checkpoint: Checkpoint) => Effect.Effect<Policy, ModelError>;
  checkpoint?: Checkpoint;
  onState?: (state: TrainerState) => void;
  onStep?: (metrics: StepMetrics) => void;
  onCheckpoint?: (info: { step: number; path: string; runId: string }) => void;
  /** Progress lines; defaults to console.log. */
  log?: (line: string) => void;
  now?: () => Date;
}

/** Run an Effect and surface its typed failure as the rejection value. */
async function runOrThrow<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) throw result.left;
  return result.right;
}

/** Every string a rule is configured with, so the policy can learn to say it. */
function templateCorpus(template: Template): string[] {
  const out: string[] = [];
  const visit = (v: unknown): void => {
    if (typeof v === "string") out.push(v);
    else if (Array.isArray(v)) v.forEach(visit);
  };
  for (const rule of template.rules) Object.values(rule.params).forEach(visit);
  return out;
}

function slug(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "").slice(0, 32);
}

function checkpointState(policy: Policy, configHash: string, step: number): CheckpointState {
  return { policy: policy.state(), configHash, step };
}

/**
 * Train a policy against `input.template`.
 *
 * Rejects when the run cannot start (bad config, unknown model, ledger
 * unreachable); nothing is written in that case. Once the run exists, a step
 * failure resolves with a `failed` record holding the rewards of every
 * completed step.
 */
export async function runTraining(input: TrainingConfigInput, deps: TrainerDeps): Promise<RunRecord> {
  const log = deps.log ?? ((line: string) => console.log(line));
  const now = deps.now ?? (() => new Date());
  const setState = (s: TrainerState) => deps.onState?.(s);
  const checkpoint = deps.checkpoint ?? new FileCheckpoint();
  const resolvePolicy = deps.loadPolicy ?? defaultLoadPolicy;

  setState("idle");
  setState("initializing");

  let config: TrainingConfig;
  let policy: Policy;
  let record: RunRecord;
  try {
    config = validateTrainingConfig(input);
    const corpus = [...config.prompts, ...templateCorpus(config.template)];
    policy = await runOrThrow(resolvePolicy(config.modelIdentifier, { seed: config.seed, corpus }, checkpoint));
    const serialized = serializeConfig(config);
    const configHash = hashConfig(serialized);
    record = {
      runId: makeRunId(slug(config.template.name) || undefined, now()),
      configHash,
      config: serialized,
      status: "running",
      stepRewards: [],
      checkpoints: [],
      startedAt: now().toISOString(),
    };
    await deps.ledger.append(record);
  } catch (e) {
    setState("failed");
    throw e;
  }

  const rid = record.runId;
  const runDir = join(config.outputPath, rid);
  const rng = new SeededRng(config.seed);
  const optimizer = createOptimizerRegistry(config.learningRate).get(config.optimizer);
  const reward = new RewardAdapter(config.template);
  const genOpts = { maxNewTokens: config.maxNewTokens, temperature: config.temperature, topk: config.topk };

  log(`── rubric training ──`);
  log(`run_id: ${rid}`);
  log(`config_hash: ${record.configHash}`);
  log(`template: ${config.template.name} (${config.template.rules.length} rules) | model: ${config.modelIdentifier} (${policy.kind}, vocab ${policy.vocabSize})`);
  log(`steps: ${config.steps} | batch: ${config.batchSize} | lr: ${config.learningRate} | optimizer: ${optimizer.name} | normalize: ${config.rewardNormalization}`);
  log(``);

  setState("running");
  const startTime = performance.now();
  let step = 0;

  try {
    for (step = 1; step <= config.steps; step++) {
      const stepStart = performance.now();
      const prompts = Array.from(
        { length: config.batchSize },
        (_, b) => config.prompts[((step - 1) * config.batchSize + b) % config.prompts.length],
      );
      const generations = prompts.map((p) => policy.generate(p, rng, genOpts));
      const rewards = reward.rewardBatch(generations.map((g) => g.text));
      const bad = rewards.findIndex((r) => !Number.isFinite(r));
      if (bad >= 0) throw new TrainError({ message: `non-finite reward for sample ${bad}`, step });

      const stats = policy.update(generations, advantages(rewards, config.rewardNormalization), optimizer);
      if (!Number.isFinite(stats.gradNorm)) throw new TrainError({ message: "non-finite gradient", step });

      const meanReward = mean(rewards);
      let checkpoints: readonly CheckpointRef[] = record.checkpoints;
      if (config.checkpointEvery > 0 && step % config.checkpointEvery === 0) {
        const path = join(runDir, `checkpoint-${step}.bin`);
        await runOrThrow(checkpoint.save(path, checkpointState(policy, record.configHash, step)));
        checkpoints = [...checkpoints, { step, path }];
        log(`  checkpoint saved: ${path}`);
        deps.onCheckpoint?.({ step, path, runId: rid });
      }

      const next: RunRecord = { ...record, stepRewards: [...record.stepRewards, meanReward], checkpoints };
      await deps.ledger.append(next);
      record = next;

      const metrics: StepMetrics = {
        runId: rid,
        step,
        meanReward,
        minReward: Math.min(...rewards),
        maxReward: Math.max(...rewards),
        gradNorm: stats.gradNorm,
        meanLogProb: stats.meanLogProb,
        elapsed_ms: performance.now() - stepStart,
        samples: generations.map((g, i) => ({ prompt: g.prompt, text: g.text, reward: rewards[i] })),
      };
      log(
        `step ${step}/${config.steps} | reward=${meanReward.toFixed(4)} ` +
          `[${metrics.minReward.toFixed(2)}, ${metrics.maxReward.toFixed(2)}] | ` +
          `grad_norm=${stats.gradNorm.toFixed(4)} | logp=${stats.meanLogProb.toFixed(3)} | ${metrics.elapsed_ms.toFixed(0)}ms`,
      );
      deps.onStep?.(metrics);
    }
    step = config.steps;

    const artifactPath = join(runDir, "policy.bin");
    await runOrThrow(checkpoint.save(artifactPath, checkpointState(policy, record.configHash, config.steps)));
    const rewards = record.stepRewards;
    record = {
      ...record,
      status: "completed",
      completedAt: now().toISOString(),
      artifactPath,
      averageReward: mean(rewards),
      finalReward: rewards[rewards.length - 1],
    };
  } catch (e) {
    const message = errorMessage(e);
    record = {
      ...record,
      status: "failed",
      completedAt: now().toISOString(),
      failureReason: message,
      failedAtStep: step,
    };
    try {
      await deps.ledger.append(record);
    } catch (ledgerErr) {
      log(`could not record failure of run ${rid}: ${errorMessage(ledgerErr)}`);
    }
    log(`\n── training failed at step ${step}: ${message} ──`);
    setState("failed");
    return record;
  }

  await deps.ledger.append(record);
  log(`\n── training complete ──`);
  log(`total time: ${((performance.now() - startTime) / 1000).toFixed(1)}s`);
  log(`average reward: ${record.averageReward?.toFixed(4)} | final reward: ${record.finalReward?.toFixed(4)}`);
  log(`artifact: ${record.artifactPath}`);
  setState("completed");
  return record;
}
