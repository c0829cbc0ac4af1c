export { AdamW, SGD, createOptimizerRegistry, type AdamWConfig } from "./optimizers.js";
export { FileCheckpoint, decodeCheckpoint } from "./checkpoint.js";
export { WordTokenizer, splitWords, BOS, UNK } from "./tokenizer.js";
export { BigramPolicy, policyRegistry, loadPolicy, type PolicyInit, type PolicyFactory } from "./policy.js";
export { RewardAdapter, advantages, mean, type RewardOptions } from "./reward.js";
export {
  DEFAULT_PROMPTS,
  defaultTrainingOptions,
  validateTrainingConfig,
  serializeConfig,
  type TrainingConfig,
  type TrainingConfigInput,
} from "./config.js";
export {
  runTraining,
  type TrainerDeps,
  type TrainerState,
  type StepMetrics,
  type SampleRecord,
} from "./trainer.js";
