/**
 * Reward adapter: turns a template score into a bounded scalar reward and a
 * batch of rewards into the policy-gradient signal.
 */
import type { RewardNormalization } from "@rubric/core";
import type { Template } from "@rubric/scoring";

export interface RewardOptions {
  readonly min?: number;
  readonly max?: number;
  /** Multiplier applied to the template score before clamping. */
  readonly scale?: number;
}

export class RewardAdapter {
  readonly template: Template;
  readonly min: number;
  readonly max: number;
  readonly scale: number;

  constructor(template: Template, opts: RewardOptions = {}) {
    this.template = template;
    this.min = opts.min ?? 0;
    this.max = opts.max ?? 1;
    this.scale = opts.scale ?? 1;
    if (!(this.min <= this.max)) throw new RangeError(`reward min (${this.min}) must not exceed max (${this.max})`);
  }

  /** An unscorable text earns 0 before scaling. */
  reward(text: string): number {
    const overall = this.template.evaluate(text);
    const base = overall !== undefined && Number.isFinite(overall) ? overall : 0;
    const scaled = base * this.scale;
    return Math.max(this.min, Math.min(this.max, Number.isFinite(scaled) ? scaled : 0));
  }

  rewardBatch(texts: readonly string[]): number[] {
    return texts.map((t) => this.reward(t));
  }

  advantages(rewards: readonly number[], mode: RewardNormalization): number[] {
    return advantages(rewards, mode);
  }
}

export function mean(xs: readonly number[]): number {
  if (xs.length === 0) return 0;
  let s = 0;
  for (const x of xs) s += x;
  return s / xs.length;
}

/** Per-sample advantages for one batch of rewards. */
export function advantages(rewards: readonly number[], mode: RewardNormalization): number[] {
  if (mode === "none") return [...rewards];
  const mu = mean(rewards);
  const centered = rewards.map((r) => r - mu);
  if (mode === "center") return centered;
  if (rewards.length < 2) return rewards.map(() => 0);
  const variance = mean(centered.map((c) => c * c));
  if (variance === 0) return rewards.map(() => 0);
  const std = Math.sqrt(variance) + 1e-8;
  return centered.map((c) => c / std);
}
