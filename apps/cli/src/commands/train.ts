/**
 * Command: rubric train
 */
import { readFile } from "node:fs/promises";
import { Effect, Layer } from "effect";
import { CheckpointService, LedgerService, TrainError, errorMessage } from "@rubric/core";
import { LibsqlLedger } from "@rubric/db";
import { CheckpointFrom, LedgerFrom, parseLogLevel, runLogged, withSpan } from "@rubric/effect-runtime";
import { readTemplateFile } from "@rubric/scoring";
import { FileCheckpoint, runTraining, type TrainingConfigInput } from "@rubric/train";
import { choiceArg, floatArg, intArg, loadConfig, parseKV, requireArg, strArg } from "../parse.js";

async function readPrompts(path: string): Promise<string[]> {
  const raw = await readFile(path, "utf-8");
  return raw.split("\n").map((l) => l.trim()).filter((l) => l.length > 0 && !l.startsWith("#"));
}

export async function trainCmd(args: string[]): Promise<void> {
  let kv = parseKV(args);
  kv = await loadConfig(kv);
  const level = parseLogLevel(kv["log"] ?? process.env.RUBRIC_LOG_LEVEL);

  const templatePath = requireArg(kv, "template", "path to a template YAML file");
  const template = await runLogged(readTemplateFile(templatePath), level);
  const prompts = kv["prompts"] ? await readPrompts(kv["prompts"]) : undefined;

  const input: TrainingConfigInput = {
    modelIdentifier: strArg(kv, "model", "bigram"),
    template,
    templatePath,
    steps: intArg(kv, "steps", 20),
    learningRate: floatArg(kv, "lr", 0.05),
    batchSize: intArg(kv, "batch", 8),
    outputPath: strArg(kv, "out", "runs"),
    checkpointEvery: kv["checkpointEvery"] ? intArg(kv, "checkpointEvery", 5) : undefined,
    maxNewTokens: kv["maxTokens"] ? intArg(kv, "maxTokens", 24) : undefined,
    temperature: kv["temperature"] ? floatArg(kv, "temperature", 1) : undefined,
    topk: kv["topk"] ? intArg(kv, "topk", 0) : undefined,
    seed: kv["seed"] ? intArg(kv, "seed", 42) : undefined,
    optimizer: choiceArg(kv, "optim", ["adamw", "sgd"] as const),
    rewardNormalization: choiceArg(kv, "normalize", ["none", "center", "standardize"] as const),
    prompts,
  };

  const ledger = await LibsqlLedger.open({ url: kv["db"] });
  const services = Layer.merge(LedgerFrom(ledger), CheckpointFrom(new FileCheckpoint()));

  const program = withSpan("train", Effect.gen(function* () {
    const runLedger = yield* LedgerService;
    const checkpoint = yield* CheckpointService;
    yield* Effect.logDebug(`Training against "${template.name}" from ${templatePath}`);
    return yield* Effect.tryPromise({
      try: () => runTraining(input, { ledger: runLedger, checkpoint }),
      catch: (e) => (e instanceof Error ? e : new TrainError({ message: errorMessage(e), cause: e })),
    });
  })).pipe(Effect.provide(services));

  try {
    const record = await runLogged(program, level);
    console.log(`\nrun ${record.runId}: ${record.status}`);
    if (record.status === "failed") {
      console.error(`failed at step ${record.failedAtStep}: ${record.failureReason}`);
      process.exitCode = 1;
    }
  } finally {
    ledger.close();
  }
}
