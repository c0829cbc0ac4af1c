/**
 * Command: rubric runs list | show
 */
import { Effect } from "effect";
import { LedgerError, LedgerService, errorMessage, type RunLedger, type RunRecord } from "@rubric/core";
import { LibsqlLedger } from "@rubric/db";
import { LedgerFrom, parseLogLevel, runLogged } from "@rubric/effect-runtime";
import { intArg, parseKV, positionals, requireArg } from "../parse.js";

function fmt(n: number | undefined): string {
  return n === undefined ? "-" : n.toFixed(4);
}

export function formatRunRow(r: RunRecord): string {
  return [
    r.runId.padEnd(44),
    r.status.padEnd(9),
    `${r.stepRewards.length}/${r.config.steps}`.padEnd(9),
    fmt(r.averageReward).padEnd(8),
    r.config.template.name,
  ].join(" ");
}

export function formatRunDetail(r: RunRecord): string {
  const lines = [
    `run_id:       ${r.runId}`,
    `status:       ${r.status}`,
    `config_hash:  ${r.configHash}`,
    `template:     ${r.config.template.name}${r.config.templatePath ? ` (${r.config.templatePath})` : ""}`,
    `model:        ${r.config.modelIdentifier}`,
    `steps:        ${r.stepRewards.length}/${r.config.steps} | batch ${r.config.batchSize} | lr ${r.config.learningRate} | ${r.config.optimizer}`,
    `started_at:   ${r.startedAt}`,
  ];
  if (r.completedAt) lines.push(`completed_at: ${r.completedAt}`);
  if (r.status === "failed") lines.push(`failed:       step ${r.failedAtStep}: ${r.failureReason}`);
  if (r.averageReward !== undefined) lines.push(`reward:       avg ${fmt(r.averageReward)} | final ${fmt(r.finalReward)}`);
  if (r.artifactPath) lines.push(`artifact:     ${r.artifactPath}`);
  if (r.stepRewards.length > 0) {
    lines.push(`step rewards:`);
    r.stepRewards.forEach((v, i) => lines.push(`  ${String(i + 1).padStart(4)}  ${v.toFixed(4)}`));
  }
  for (const c of r.checkpoints) lines.push(`checkpoint:   step ${c.step} → ${c.path}`);
  return lines.join("\n");
}

function ledgerCall<A>(label: string, f: (ledger: RunLedger) => Promise<A>) {
  return Effect.gen(function* () {
    const ledger = yield* LedgerService;
    return yield* Effect.tryPromise({
      try: () => f(ledger),
      catch: (e) => (e instanceof LedgerError ? e : new LedgerError({ message: `${label}: ${errorMessage(e)}`, cause: e })),
    });
  });
}

export async function runsCmd(args: string[]): Promise<void> {
  const [sub = "list"] = positionals(args);
  const kv = parseKV(args);
  const level = parseLogLevel(kv["log"] ?? process.env.RUBRIC_LOG_LEVEL);
  const ledger = await LibsqlLedger.open({ url: kv["db"] });

  try {
    if (sub === "list") {
      const limit = intArg(kv, "limit", 20);
      const runs = await runLogged(ledgerCall("list runs", (l) => l.listRuns({ limit })).pipe(Effect.provide(LedgerFrom(ledger))), level);
      if (runs.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      console.log(`${"RUN".padEnd(44)} ${"STATUS".padEnd(9)} ${"STEPS".padEnd(9)} ${"AVG".padEnd(8)} TEMPLATE`);
      for (const r of runs) console.log(formatRunRow(r));
    } else if (sub === "show") {
      const id = kv["id"] ?? positionals(args)[1] ?? requireArg(kv, "id", "run id");
      const record = await runLogged(ledgerCall("show run", (l) => l.get(id)).pipe(Effect.provide(LedgerFrom(ledger))), level);
      if (!record) {
        console.error(`No run with id "${id}"`);
        process.exitCode = 1;
        return;
      }
      console.log(formatRunDetail(record));
    } else {
      console.error(`Unknown runs subcommand: ${sub} (expected list or show)`);
      process.exitCode = 1;
    }
  } finally {
    ledger.close();
  }
}
