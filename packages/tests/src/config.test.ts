import { describe, it, expect } from "vitest";
import { ConfigError, hashConfig } from "@rubric/core";
import { ruleRegistry } from "@rubric/rules";
import { Template } from "@rubric/scoring";
import { DEFAULT_PROMPTS, serializeConfig, validateTrainingConfig } from "@rubric/train";

const template = new Template({
  name: "support",
  rules: [ruleRegistry.construct("contains_phrase", 2, { phrase: "help" })],
});

const input = {
  modelIdentifier: "bigram",
  template,
  steps: 3,
  learningRate: 0.05,
  batchSize: 2,
  outputPath: "runs",
};

describe("validateTrainingConfig", () => {
  it("fills in defaults and freezes the result", () => {
    const config = validateTrainingConfig(input);
    expect(config).toMatchObject({
      checkpointEvery: 5,
      maxNewTokens: 24,
      temperature: 1,
      topk: 0,
      seed: 42,
      optimizer: "adamw",
      rewardNormalization: "center",
    });
    expect(config.prompts).toEqual(DEFAULT_PROMPTS);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects bad optional fields", () => {
    expect(() => validateTrainingConfig({ ...input, temperature: -1 })).toThrow("temperature must be >= 0, got -1");
    expect(() => validateTrainingConfig({ ...input, prompts: [] })).toThrow("prompts must not be empty");
    expect(() => validateTrainingConfig({ ...input, checkpointEvery: -2 })).toThrow(ConfigError);
    expect(() => validateTrainingConfig({ ...input, modelIdentifier: " " })).toThrow("modelIdentifier must not be empty");
  });
});

describe("serializeConfig", () => {
  it("stores the template as a document", () => {
    const json = serializeConfig(validateTrainingConfig(input));
    expect(json.template).toEqual({
      name: "support",
      description: "",
      rules: [{ type: "contains_phrase", weight: 2, params: { phrase: "help" } }],
    });
    expect("templatePath" in json).toBe(false);
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });

  it("keeps the template path when known", () => {
    const json = serializeConfig(validateTrainingConfig({ ...input, templatePath: "templates/support.yaml" }));
    expect(json.templatePath).toBe("templates/support.yaml");
  });

  it("hashes equal configs equally", () => {
    const a = hashConfig(serializeConfig(validateTrainingConfig(input)));
    const b = hashConfig(serializeConfig(validateTrainingConfig({ ...input })));
    const c = hashConfig(serializeConfig(validateTrainingConfig({ ...input, seed: 1 })));
    expect(a).toBe(b);
    expect(a).not.toBe(c);
  });
});
