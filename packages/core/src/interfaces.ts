/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context, Effect } from "effect";
import type { CheckpointError } from "./errors.js";
import type { RuleParams, RunRecord } from "./types.js";

// ── Rule ───────────────────────────────────────────────────────────────────

export interface RuleExplanation {
  readonly ruleType: string;
  readonly score: number;
  readonly reasoning: string;
  readonly evidence: readonly string[];
  readonly confidence: number;
  readonly suggestions: readonly string[];
}

/**
 * A single weighted evaluation strategy.
 *
 * `evaluate` returns a score in [0, 1] and must not throw for any string;
 * invalid params are rejected when the rule is constructed.
 */
export interface Rule {
  readonly type: string;
  readonly weight: number;
  readonly params: RuleParams;
  evaluate(text: string): number;
  explain?(text: string): RuleExplanation;
}

// ── Tokenizer ──────────────────────────────────────────────────────────────

export interface Tokenizer {
  readonly name: string;
  readonly vocabSize: number;
  encode(text: string): Int32Array;
  decode(tokens: ArrayLike<number>): string;
}

// ── RNG ────────────────────────────────────────────────────────────────────

export interface Rng {
  next(): number;
  nextInt(n: number): number;
  nextGauss(): number;
  seed(s: number): void;
}

// ── Optimizer ──────────────────────────────────────────────────────────────

export interface Optimizer {
  readonly name: string;
  /** Gradient descent: parameters move against `grads`. */
  step(params: Map<string, Float32Array>, grads: Map<string, Float32Array>): void;
}

// ── Policy ─────────────────────────────────────────────────────────────────

export interface GenerateOptions {
  readonly maxNewTokens: number;
  readonly temperature: number;
  /** Keep only the k most likely tokens; 0 disables. */
  readonly topk: number;
}

export interface Generation {
  readonly prompt: string;
  readonly text: string;
  /** Context token followed by every sampled token, in order. */
  readonly tokens: Int32Array;
  readonly temperature: number;
}

export interface UpdateStats {
  readonly gradNorm: number;
  readonly meanLogProb: number;
}

export interface PolicyTensor {
  readonly shape: readonly number[];
  readonly data: Float32Array;
}

export interface PolicyState {
  readonly kind: string;
  readonly vocab: readonly string[];
  readonly params: Readonly<Record<string, PolicyTensor>>;
}

/** A trainable text-generation policy. */
export interface Policy {
  readonly kind: string;
  readonly vocabSize: number;
  generate(prompt: string, rng: Rng, opts: GenerateOptions): Generation;
  /** One policy-gradient update from a batch of generations and their advantages. */
  update(batch: readonly Generation[], advantages: readonly number[], optimizer: Optimizer): UpdateStats;
  parameters(): Map<string, Float32Array>;
  state(): PolicyState;
  /** Load weights from a saved state; the vocabulary must match. */
  restore(state: PolicyState): void;
}

// ── Checkpoint ─────────────────────────────────────────────────────────────

/** Policy weights plus the provenance of the run that produced them. */
export interface CheckpointState {
  readonly policy: PolicyState;
  readonly configHash: string;
  readonly step: number;
}

export interface Checkpoint {
  save(path: string, state: CheckpointState): Effect.Effect<void, CheckpointError>;
  load(path: string): Effect.Effect<CheckpointState, CheckpointError>;
}

export class CheckpointService extends Context.Tag("CheckpointService")<
  CheckpointService,
  Checkpoint
>() {}

// ── Run ledger ─────────────────────────────────────────────────────────────

/**
 * Durable store of run records. `append` is an upsert keyed by run id, so
 * the trainer may re-append the same record after every step.
 */
export interface RunLedger {
  append(record: RunRecord): Promise<void>;
  listRuns(opts?: { limit?: number }): Promise<RunRecord[]>;
  get(runId: string): Promise<RunRecord | null>;
}

export class LedgerService extends Context.Tag("LedgerService")<
  LedgerService,
  RunLedger
>() {}
