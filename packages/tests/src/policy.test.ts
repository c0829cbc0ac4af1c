import { describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { ModelError, SeededRng, TrainError, type Generation } from "@rubric/core";
import { AdamW, BigramPolicy, FileCheckpoint, SGD, loadPolicy } from "@rubric/train";

const CORPUS = ["help me now.", "thank you kindly."];
// <s> <unk> . help kindly me now thank you
const HELP = 3;
const ME = 5;
const NOW = 6;

function create(seed = 1): Promise<BigramPolicy> {
  return Effect.runPromise(BigramPolicy.create(CORPUS, seed));
}

function logits(policy: BigramPolicy): Float32Array {
  const p = policy.parameters().get("bigram.logits");
  if (!p) throw new Error("missing logits");
  return p;
}

const opts = { maxNewTokens: 8, temperature: 1, topk: 0 };

describe("BigramPolicy.generate", () => {
  it("builds the vocabulary from the corpus", async () => {
    const policy = await create();
    expect(policy.vocab).toEqual(["<s>", "<unk>", ".", "help", "kindly", "me", "now", "thank", "you"]);
  });

  it("is reproducible for the same rng seed", async () => {
    const policy = await create();
    const a = policy.generate("please help", new SeededRng(3), opts);
    const b = policy.generate("please help", new SeededRng(3), opts);
    expect(a.text).toBe(b.text);
    expect(Array.from(a.tokens)).toEqual(Array.from(b.tokens));
  });

  it("starts from the last known prompt word and never samples markers", async () => {
    const policy = await create();
    const gen = policy.generate("please help", new SeededRng(4), opts);
    expect(gen.tokens.length).toBe(opts.maxNewTokens + 1);
    expect(gen.tokens[0]).toBe(HELP);
    expect(Array.from(gen.tokens.slice(1)).every((t) => t >= 2)).toBe(true);
    expect(gen.prompt).toBe("please help");
  });

  it("starts from <s> when the prompt has no known words", async () => {
    const policy = await create();
    expect(policy.generate("zebra", new SeededRng(1), opts).tokens[0]).toBe(0);
  });

  it("is greedy at temperature 0 and with top-1 sampling", async () => {
    const policy = await create();
    const greedy = { maxNewTokens: 6, temperature: 0, topk: 0 };
    const a = policy.generate("help", new SeededRng(1), greedy);
    const b = policy.generate("help", new SeededRng(99), greedy);
    const top1 = policy.generate("help", new SeededRng(7), { maxNewTokens: 6, temperature: 1, topk: 1 });
    expect(a.text).toBe(b.text);
    expect(top1.text).toBe(a.text);
  });
});

describe("BigramPolicy.update", () => {
  const sample = (tokens: number[]): Generation => ({ prompt: "", text: "", tokens: new Int32Array(tokens), temperature: 1 });

  it("raises the logit of a rewarded transition", async () => {
    const policy = await create();
    const V = policy.vocabSize;
    const w = logits(policy);
    const before = { target: w[HELP * V + ME], other: w[HELP * V + NOW], marker: w[HELP * V], row: w[ME * V + NOW] };

    const stats = policy.update([sample([HELP, ME])], [1], new SGD(1));

    expect(w[HELP * V + ME]).toBeGreaterThan(before.target);
    expect(w[HELP * V + NOW]).toBeLessThan(before.other);
    expect(w[HELP * V]).toBe(before.marker);
    expect(w[ME * V + NOW]).toBe(before.row);
    expect(stats.gradNorm).toBeGreaterThan(0);
    expect(stats.meanLogProb).toBeLessThan(0);
  });

  it("lowers the logit of a penalised transition", async () => {
    const policy = await create();
    const V = policy.vocabSize;
    const before = logits(policy)[HELP * V + ME];
    policy.update([sample([HELP, ME])], [-1], new SGD(1));
    expect(logits(policy)[HELP * V + ME]).toBeLessThan(before);
  });

  it("does not move with zero advantages", async () => {
    const policy = await create();
    const before = Array.from(logits(policy));
    const stats = policy.update([sample([HELP, ME])], [0], new AdamW({ lr: 0.1 }));
    expect(stats.gradNorm).toBe(0);
    expect(Array.from(logits(policy))).toEqual(before);
  });

  it("rejects mismatched or non-finite advantages", async () => {
    const policy = await create();
    expect(() => policy.update([sample([HELP, ME])], [], new SGD(1))).toThrow(TrainError);
    expect(() => policy.update([sample([HELP, ME])], [Number.NaN], new SGD(1))).toThrow(TrainError);
  });

  it("makes a rewarded continuation the greedy choice", async () => {
    const policy = await create();
    const opt = new SGD(0.5);
    for (let i = 0; i < 20; i++) policy.update([sample([HELP, ME])], [1], opt);
    const gen = policy.generate("help", new SeededRng(1), { maxNewTokens: 1, temperature: 0, topk: 0 });
    expect(gen.text).toBe("me");
  });
});

describe("policy state", () => {
  it("restores into an equal policy", async () => {
    const policy = await create();
    policy.update([{ prompt: "", text: "", tokens: new Int32Array([HELP, NOW]), temperature: 1 }], [1], new SGD(1));
    const copy = await Effect.runPromise(BigramPolicy.fromState(policy.state()));
    expect(Array.from(logits(copy))).toEqual(Array.from(logits(policy)));
  });

  it("rejects a foreign vocabulary", async () => {
    const policy = await create();
    const other = await Effect.runPromise(BigramPolicy.create(["different words here."], 1));
    expect(() => policy.restore(other.state())).toThrow(ModelError);
  });

  it("rejects another policy kind", async () => {
    const policy = await create();
    const err = await Effect.runPromise(Effect.flip(BigramPolicy.fromState({ ...policy.state(), kind: "transformer" })));
    expect(err).toBeInstanceOf(ModelError);
  });
});

describe("loadPolicy", () => {
  it("builds registered models with the extra corpus", async () => {
    const policy = await Effect.runPromise(loadPolicy("bigram", { seed: 1, corpus: ["zebra crossing"] }));
    expect(policy.kind).toBe("bigram");
    expect(policy.state().vocab).toContain("zebra");
  });

  it("caps the small model's vocabulary", async () => {
    const policy = await Effect.runPromise(loadPolicy("bigram-small", { seed: 1 }));
    expect(policy.vocabSize).toBeLessThanOrEqual(66);
  });

  it("rejects unknown names", async () => {
    const err = await Effect.runPromise(Effect.flip(loadPolicy("gpt-huge", { seed: 1 })));
    expect(err).toBeInstanceOf(ModelError);
    expect(err.message).toMatch(/^Unknown model "gpt-huge"/);
  });

  it("loads saved weights from a path", async () => {
    const dir = await mkdtemp(join(tmpdir(), "rubric-policy-"));
    try {
      const source = await create(5);
      const path = join(dir, "policy.bin");
      const checkpoint = new FileCheckpoint();
      await Effect.runPromise(
        checkpoint.save(path, {
          policy: source.state(),
          configHash: "00000000",
          step: 0,
        }),
      );
      const loaded = await Effect.runPromise(loadPolicy(path, { seed: 1 }, checkpoint));
      expect(loaded.state()).toEqual(source.state());

      const missing = await Effect.runPromise(Effect.flip(loadPolicy(join(dir, "missing.bin"), { seed: 1 }, checkpoint)));
      expect(missing.message).toMatch(/^Cannot load model /);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
