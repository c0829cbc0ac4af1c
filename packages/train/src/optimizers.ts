/**
 * Optimizers: AdamW and SGD over named Float32Array parameters.
 */
import type { Optimizer } from "@rubric/core";
import { Registry } from "@rubric/core";

// ── AdamW ──────────────────────────────────────────────────────────────────

export interface AdamWConfig {
  lr: number;
  beta1: number;
  beta2: number;
  eps: number;
}

export class AdamW implements Optimizer {
  readonly name = "adamw";
  private _beta1Pow = 1;
  private _beta2Pow = 1;
  private _m = new Map<string, Float32Array>();
  private _v = new Map<string, Float32Array>();
  private readonly config: AdamWConfig;

  constructor(config: Partial<AdamWConfig> = {}) {
    this.config = {
      lr: config.lr ?? 3e-4,
      beta1: config.beta1 ?? 0.9,
      beta2: config.beta2 ?? 0.999,
      eps: config.eps ?? 1e-8,
    };
  }

  step(params: Map<string, Float32Array>, grads: Map<string, Float32Array>): void {
    const { lr, beta1, beta2, eps } = this.config;
    this._beta1Pow *= beta1;
    this._beta2Pow *= beta2;
    const bc1 = 1 - this._beta1Pow;
    const bc2 = 1 - this._beta2Pow;

    for (const [name, pData] of params) {
      const gData = grads.get(name);
      if (!gData) continue;
      let m = this._m.get(name);
      let v = this._v.get(name);
      if (!m || !v) {
        m = new Float32Array(pData.length);
        v = new Float32Array(pData.length);
        this._m.set(name, m);
        this._v.set(name, v);
      }
      for (let i = 0; i < pData.length; i++) {
        const g = gData[i];
        m[i] = beta1 * m[i] + (1 - beta1) * g;
        v[i] = beta2 * v[i] + (1 - beta2) * g * g;
        const mHat = m[i] / bc1;
        const vHat = v[i] / bc2;
        pData[i] -= (lr * mHat) / (Math.sqrt(vHat) + eps);
      }
    }
  }
}

// ── SGD ────────────────────────────────────────────────────────────────────

export class SGD implements Optimizer {
  readonly name = "sgd";
  private readonly lr: number;

  constructor(lr = 0.01) {
    this.lr = lr;
  }

  step(params: Map<string, Float32Array>, grads: Map<string, Float32Array>): void {
    for (const [name, pData] of params) {
      const gData = grads.get(name);
      if (!gData) continue;
      for (let i = 0; i < pData.length; i++) {
        pData[i] -= this.lr * gData[i];
      }
    }
  }
}

// ── Registry ───────────────────────────────────────────────────────────────

export function createOptimizerRegistry(lr: number) {
  const registry = new Registry<Optimizer>("optimizer");
  registry.register("adamw", () => new AdamW({ lr }));
  registry.register("sgd", () => new SGD(lr));
  return registry;
}
