/**
 * Bigram policy: a word-level softmax over the next word given the previous
 * one, trained with REINFORCE.
 *
 * Parameters are a single V×V logit table, `bigram.logits`, where row `i`
 * holds the next-word logits after word `i`. Ids 0 (`<s>`) and 1 (`<unk>`)
 * are never sampled.
 */
import { Effect } from "effect";
import {
  ModelError,
  Registry,
  SeededRng,
  TrainError,
  type Checkpoint,
  type Generation,
  type GenerateOptions,
  type Optimizer,
  type Policy,
  type PolicyState,
  type Rng,
  type UpdateStats,
} from "@rubric/core";
import seedCorpus from "../data/corpus.json" with { type: "json" };
import { FileCheckpoint } from "./checkpoint.js";
import { WordTokenizer } from "./tokenizer.js";

const PARAM = "bigram.logits";
const RESERVED = 2;

export interface PolicyInit {
  /** Seed for the initial weights. */
  readonly seed: number;
  /** Extra text whose words join the vocabulary (prompts, rubric phrases). */
  readonly corpus?: readonly string[];
}

// ── Sampling helpers ───────────────────────────────────────────────────────

/** Softmax of `row / temperature` with reserved ids masked out. */
function softmaxRow(row: Float32Array, temperature: number, topk = 0): Float64Array {
  const V = row.length;
  const t = temperature > 0 ? temperature : 1;
  const probs = new Float64Array(V);
  let allowed: Set<number> | undefined;
  if (topk > 0 && topk < V - RESERVED) {
    const order = Array.from({ length: V - RESERVED }, (_, i) => i + RESERVED).sort((a, b) => row[b] - row[a] || a - b);
    allowed = new Set(order.slice(0, topk));
  }
  let max = -Infinity;
  for (let j = RESERVED; j < V; j++) {
    if (allowed && !allowed.has(j)) continue;
    max = Math.max(max, row[j] / t);
  }
  let sum = 0;
  for (let j = RESERVED; j < V; j++) {
    if (allowed && !allowed.has(j)) continue;
    const e = Math.exp(row[j] / t - max);
    probs[j] = e;
    sum += e;
  }
  for (let j = RESERVED; j < V; j++) probs[j] /= sum;
  return probs;
}

function argmax(row: Float32Array): number {
  let best = RESERVED;
  for (let j = RESERVED + 1; j < row.length; j++) if (row[j] > row[best]) best = j;
  return best;
}

function sampleFrom(probs: Float64Array, rng: Rng): number {
  const r = rng.next();
  let acc = 0;
  let last = RESERVED;
  for (let j = RESERVED; j < probs.length; j++) {
    if (probs[j] === 0) continue;
    acc += probs[j];
    last = j;
    if (r < acc) return j;
  }
  return last;
}

// ── Policy ─────────────────────────────────────────────────────────────────

export class BigramPolicy implements Policy {
  readonly kind = "bigram";
  private readonly tokenizer: WordTokenizer;
  private readonly logits: Float32Array;

  private constructor(tokenizer: WordTokenizer, logits: Float32Array) {
    this.tokenizer = tokenizer;
    this.logits = logits;
  }

  /** Fresh policy over `corpus` with small Gaussian initial logits. */
  static create(corpus: readonly string[], seed: number, maxWords?: number): Effect.Effect<BigramPolicy, ModelError> {
    const tokenizer = new WordTokenizer();
    return tokenizer.build(corpus, maxWords).pipe(
      Effect.map(() => {
        const V = tokenizer.vocabSize;
        const rng = new SeededRng(seed);
        const logits = new Float32Array(V * V);
        for (let i = 0; i < logits.length; i++) logits[i] = rng.nextGauss() * 0.02;
        return new BigramPolicy(tokenizer, logits);
      }),
    );
  }

  /** Rebuild a policy from a saved state. */
  static fromState(state: PolicyState): Effect.Effect<BigramPolicy, ModelError> {
    return Effect.try({
      try: () => {
        if (state.kind !== "bigram") throw new Error(`expected a bigram policy, got "${state.kind}"`);
        const tokenizer = new WordTokenizer();
        tokenizer.loadVocab(state.vocab);
        const policy = new BigramPolicy(tokenizer, new Float32Array(tokenizer.vocabSize * tokenizer.vocabSize));
        policy.restore(state);
        return policy;
      },
      catch: (e) =>
        e instanceof ModelError ? e : new ModelError({ message: `Cannot restore policy: ${e instanceof Error ? e.message : String(e)}`, cause: e }),
    });
  }

  get vocabSize(): number {
    return this.tokenizer.vocabSize;
  }

  get vocab(): readonly string[] {
    return this.tokenizer.vocab;
  }

  private row(i: number): Float32Array {
    const V = this.vocabSize;
    return this.logits.subarray(i * V, (i + 1) * V);
  }

  generate(prompt: string, rng: Rng, opts: GenerateOptions): Generation {
    const known = Array.from(this.tokenizer.encode(prompt)).filter((id) => id >= RESERVED);
    let ctx = known.length > 0 ? known[known.length - 1] : 0;
    const tokens = [ctx];
    for (let i = 0; i < opts.maxNewTokens; i++) {
      const row = this.row(ctx);
      ctx = opts.temperature <= 0 ? argmax(row) : sampleFrom(softmaxRow(row, opts.temperature, opts.topk), rng);
      tokens.push(ctx);
    }
    return {
      prompt,
      text: this.tokenizer.decode(tokens.slice(1)),
      tokens: new Int32Array(tokens),
      temperature: opts.temperature,
    };
  }

  /**
   * One REINFORCE step. The loss is `-mean_b(A_b * Σ_t log π(x_t | x_{t-1}))`;
   * its gradient with respect to a logit row is `-A (onehot - p) / T`.
   */
  update(batch: readonly Generation[], advantages: readonly number[], optimizer: Optimizer): UpdateStats {
    if (batch.length !== advantages.length) {
      throw new TrainError({ message: `batch has ${batch.length} samples but ${advantages.length} advantages` });
    }
    if (batch.length === 0) return { gradNorm: 0, meanLogProb: 0 };
    const V = this.vocabSize;
    const grad = new Float32Array(V * V);
    let logProbSum = 0;
    let transitions = 0;

    batch.forEach((gen, b) => {
      const adv = advantages[b];
      if (!Number.isFinite(adv)) throw new TrainError({ message: `non-finite advantage for sample ${b}: ${adv}` });
      const t = gen.temperature > 0 ? gen.temperature : 1;
      for (let k = 1; k < gen.tokens.length; k++) {
        const prev = gen.tokens[k - 1];
        const next = gen.tokens[k];
        const probs = softmaxRow(this.row(prev), t);
        logProbSum += Math.log(Math.max(probs[next], 1e-12));
        transitions++;
        if (adv === 0) continue;
        const scale = adv / (t * batch.length);
        const off = prev * V;
        for (let j = RESERVED; j < V; j++) {
          grad[off + j] -= scale * ((j === next ? 1 : 0) - probs[j]);
        }
      }
    });

    let sq = 0;
    for (let i = 0; i < grad.length; i++) sq += grad[i] * grad[i];
    const gradNorm = Math.sqrt(sq);
    if (!Number.isFinite(gradNorm)) throw new TrainError({ message: `non-finite gradient norm: ${gradNorm}` });

    optimizer.step(this.parameters(), new Map([[PARAM, grad]]));

    for (let i = 0; i < this.logits.length; i++) {
      if (!Number.isFinite(this.logits[i])) throw new TrainError({ message: "policy parameters became non-finite" });
    }
    return { gradNorm, meanLogProb: transitions > 0 ? logProbSum / transitions : 0 };
  }

  parameters(): Map<string, Float32Array> {
    return new Map([[PARAM, this.logits]]);
  }

  state(): PolicyState {
    const V = this.vocabSize;
    return {
      kind: this.kind,
      vocab: [...this.tokenizer.vocab],
      params: { [PARAM]: { shape: [V, V], data: new Float32Array(this.logits) } },
    };
  }

  restore(state: PolicyState): void {
    const V = this.vocabSize;
    const saved = state.params[PARAM];
    if (state.vocab.length !== V || state.vocab.some((w, i) => w !== this.tokenizer.vocab[i])) {
      throw new ModelError({ message: "Saved vocabulary does not match this policy" });
    }
    if (!saved || saved.data.length !== V * V) {
      throw new ModelError({ message: `Saved state lacks a ${V}x${V} "${PARAM}" tensor` });
    }
    this.logits.set(saved.data);
  }
}

// ── Registry ───────────────────────────────────────────────────────────────

export type PolicyFactory = (init: PolicyInit) => Effect.Effect<Policy, ModelError>;

export const policyRegistry = new Registry<Effect.Effect<Policy, ModelError>, [PolicyInit]>("policy", {
  missing: (name, available) =>
    new ModelError({ message: `Unknown model "${name}". Available: ${available.join(", ")}, or a path to a saved policy` }),
});

policyRegistry.register("bigram", (init) => BigramPolicy.create([...seedCorpus, ...(init.corpus ?? [])], init.seed));
policyRegistry.register("bigram-small", (init) => BigramPolicy.create([...seedCorpus, ...(init.corpus ?? [])], init.seed, 64));

function looksLikePath(identifier: string): boolean {
  return identifier.includes("/") || identifier.includes("\\") || identifier.endsWith(".bin");
}

/**
 * Resolve a model identifier: a registered policy name, or a path to a
 * checkpoint or policy artifact whose weights seed a new policy.
 */
export function loadPolicy(
  identifier: string,
  init: PolicyInit,
  checkpoint: Checkpoint = new FileCheckpoint(),
): Effect.Effect<Policy, ModelError> {
  if (policyRegistry.has(identifier)) return policyRegistry.get(identifier, init);
  if (looksLikePath(identifier)) {
    return checkpoint.load(identifier).pipe(
      Effect.mapError((e) => new ModelError({ message: `Cannot load model "${identifier}": ${e.message}`, cause: e })),
      Effect.flatMap((state) => BigramPolicy.fromState(state.policy)),
      Effect.tap(() => Effect.logDebug(`Loaded policy weights from ${identifier}`)),
    );
  }
  return Effect.suspend(() =>
    Effect.fail(
      new ModelError({
        message: `Unknown model "${identifier}". Available: ${policyRegistry.list().join(", ")}, or a path to a saved policy`,
      }),
    ),
  );
}
