/**
 * Core value types shared across packages.
 */

// ── Rules & templates ──────────────────────────────────────────────────────

export type RuleParams = Readonly<Record<string, unknown>>;

/** The serialized form of one rule, as it appears in a template document. */
export interface RuleSpec {
  readonly type: string;
  readonly weight: number;
  readonly params: RuleParams;
}

/** The stable on-disk shape of a template. */
export interface TemplateDocument {
  readonly name: string;
  readonly description: string;
  readonly rules: readonly RuleSpec[];
}

// ── Training ───────────────────────────────────────────────────────────────

export type OptimizerName = "adamw" | "sgd";

/** How a batch of rewards becomes the policy-gradient signal. */
export type RewardNormalization = "none" | "center" | "standardize";

/** A training configuration flattened to plain JSON for the run ledger. */
export interface SerializedTrainingConfig {
  readonly modelIdentifier: string;
  readonly template: TemplateDocument;
  readonly templatePath?: string;
  readonly steps: number;
  readonly learningRate: number;
  readonly batchSize: number;
  readonly outputPath: string;
  readonly checkpointEvery: number;
  readonly maxNewTokens: number;
  readonly temperature: number;
  readonly topk: number;
  readonly seed: number;
  readonly optimizer: OptimizerName;
  readonly rewardNormalization: RewardNormalization;
  readonly prompts: readonly string[];
}

// ── Runs ───────────────────────────────────────────────────────────────────

export type RunStatus = "running" | "completed" | "failed";

export interface CheckpointRef {
  readonly step: number;
  readonly path: string;
}

export interface RunRecord {
  readonly runId: string;
  readonly configHash: string;
  readonly config: SerializedTrainingConfig;
  readonly status: RunStatus;
  /** Mean batch reward per completed step, in step order. */
  readonly stepRewards: readonly number[];
  readonly checkpoints: readonly CheckpointRef[];
  /** ISO-8601 timestamps. */
  readonly startedAt: string;
  readonly completedAt?: string;
  readonly failureReason?: string;
  readonly failedAtStep?: number;
  readonly artifactPath?: string;
  readonly averageReward?: number;
  readonly finalReward?: number;
}
