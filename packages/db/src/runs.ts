/**
 * CRUD operations for the runs, step_rewards and checkpoints tables.
 */
import type { Client, InStatement, Row } from "@libsql/client";
import type {
  CheckpointRef,
  OptimizerName,
  RewardNormalization,
  RuleSpec,
  RunRecord,
  RunStatus,
  SerializedTrainingConfig,
  TemplateDocument,
} from "@rubric/core";

// ── Row readers ────────────────────────────────────────────────────────────

function str(row: Row, col: string): string {
  const v = row[col];
  if (typeof v !== "string") throw new Error(`column ${col}: expected text, got ${v === null ? "null" : typeof v}`);
  return v;
}

function optStr(row: Row, col: string): string | undefined {
  const v = row[col];
  return typeof v === "string" ? v : undefined;
}

function optNum(row: Row, col: string): number | undefined {
  const v = row[col];
  if (typeof v === "number") return v;
  if (typeof v === "bigint") return Number(v);
  return undefined;
}

function num(row: Row, col: string): number {
  const v = optNum(row, col);
  if (v === undefined) throw new Error(`column ${col}: expected a number`);
  return v;
}

function status(row: Row): RunStatus {
  const s = str(row, "status");
  if (s === "running" || s === "completed" || s === "failed") return s;
  throw new Error(`column status: unexpected value "${s}"`);
}

// ── Stored config ──────────────────────────────────────────────────────────

function fields(v: unknown, what: string): Map<string, unknown> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) throw new Error(`${what} must be an object`);
  return new Map(Object.entries(v));
}

function text(m: Map<string, unknown>, key: string, what: string): string {
  const v = m.get(key);
  if (typeof v !== "string") throw new Error(`${what}.${key} must be a string`);
  return v;
}

function finite(m: Map<string, unknown>, key: string, what: string): number {
  const v = m.get(key);
  if (typeof v !== "number" || !Number.isFinite(v)) throw new Error(`${what}.${key} must be a finite number`);
  return v;
}

function ruleSpec(v: unknown, i: number): RuleSpec {
  const what = `config.template.rules[${i}]`;
  const m = fields(v, what);
  const params = m.get("params") ?? {};
  if (typeof params !== "object" || params === null || Array.isArray(params)) throw new Error(`${what}.params must be an object`);
  return { type: text(m, "type", what), weight: finite(m, "weight", what), params: Object.fromEntries(Object.entries(params)) };
}

function templateDocument(v: unknown): TemplateDocument {
  const m = fields(v, "config.template");
  const rules = m.get("rules");
  if (!Array.isArray(rules)) throw new Error("config.template.rules must be a list");
  return {
    name: text(m, "name", "config.template"),
    description: text(m, "description", "config.template"),
    rules: rules.map(ruleSpec),
  };
}

function optimizerName(v: string): OptimizerName {
  if (v === "adamw" || v === "sgd") return v;
  throw new Error(`config.optimizer: unexpected value "${v}"`);
}

function normalization(v: string): RewardNormalization {
  if (v === "none" || v === "center" || v === "standardize") return v;
  throw new Error(`config.rewardNormalization: unexpected value "${v}"`);
}

function stringList(m: Map<string, unknown>, key: string, what: string): string[] {
  const v = m.get(key);
  if (!Array.isArray(v) || !v.every((p): p is string => typeof p === "string")) {
    throw new Error(`${what}.${key} must be a list of strings`);
  }
  return v;
}

function optText(m: Map<string, unknown>, key: string, what: string): string | undefined {
  return m.get(key) === undefined ? undefined : text(m, key, what);
}

/** Parse and check the JSON stored in `runs.config`. Fields are checked in declaration order. */
export function parseStoredConfig(raw: string): SerializedTrainingConfig {
  const m = fields(JSON.parse(raw), "config");
  const modelIdentifier = text(m, "modelIdentifier", "config");
  const template = templateDocument(m.get("template"));
  const templatePath = optText(m, "templatePath", "config");
  return {
    modelIdentifier,
    template,
    ...(templatePath !== undefined ? { templatePath } : {}),
    steps: finite(m, "steps", "config"),
    learningRate: finite(m, "learningRate", "config"),
    batchSize: finite(m, "batchSize", "config"),
    outputPath: text(m, "outputPath", "config"),
    checkpointEvery: finite(m, "checkpointEvery", "config"),
    maxNewTokens: finite(m, "maxNewTokens", "config"),
    temperature: finite(m, "temperature", "config"),
    topk: finite(m, "topk", "config"),
    seed: finite(m, "seed", "config"),
    optimizer: optimizerName(text(m, "optimizer", "config")),
    rewardNormalization: normalization(text(m, "rewardNormalization", "config")),
    prompts: stringList(m, "prompts", "config"),
  };
}

// ── Writes ─────────────────────────────────────────────────────────────────

/**
 * Statements that upsert a run and replace its step rewards and checkpoints.
 * Run them in one write batch so a reader never sees a half-written record.
 */
export function upsertRunStatements(record: RunRecord): InStatement[] {
  const c = record.config;
  const stmts: InStatement[] = [
    {
      sql: `INSERT INTO runs (
        id, config_hash, template_name, model, total_steps, batch_size, lr, seed, optimizer,
        config, status, started_at, completed_at, failure_reason, failed_at_step,
        artifact_path, average_reward, final_reward, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, datetime('now'))
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        completed_at = excluded.completed_at,
        failure_reason = excluded.failure_reason,
        failed_at_step = excluded.failed_at_step,
        artifact_path = excluded.artifact_path,
        average_reward = excluded.average_reward,
        final_reward = excluded.final_reward,
        updated_at = datetime('now')`,
      args: [
        record.runId,
        record.configHash,
        c.template.name,
        c.modelIdentifier,
        c.steps,
        c.batchSize,
        c.learningRate,
        c.seed,
        c.optimizer,
        JSON.stringify(c),
        record.status,
        record.startedAt,
        record.completedAt ?? null,
        record.failureReason ?? null,
        record.failedAtStep ?? null,
        record.artifactPath ?? null,
        record.averageReward ?? null,
        record.finalReward ?? null,
      ],
    },
    { sql: "DELETE FROM step_rewards WHERE run_id = ?", args: [record.runId] },
    { sql: "DELETE FROM checkpoints WHERE run_id = ?", args: [record.runId] },
  ];
  record.stepRewards.forEach((reward, i) => {
    stmts.push({
      sql: "INSERT INTO step_rewards (run_id, step, reward) VALUES (?, ?, ?)",
      args: [record.runId, i + 1, reward],
    });
  });
  for (const ck of record.checkpoints) {
    stmts.push({
      sql: "INSERT INTO checkpoints (run_id, step, file_path) VALUES (?, ?, ?)",
      args: [record.runId, ck.step, ck.path],
    });
  }
  return stmts;
}

export async function upsertRun(client: Client, record: RunRecord): Promise<void> {
  await client.batch(upsertRunStatements(record), "write");
}

// ── Reads ──────────────────────────────────────────────────────────────────

function toRecord(row: Row, stepRewards: number[], checkpoints: CheckpointRef[]): RunRecord {
  const id = str(row, "id");
  let config: SerializedTrainingConfig;
  try {
    config = parseStoredConfig(str(row, "config"));
  } catch (e) {
    throw new Error(`run ${id}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const completedAt = optStr(row, "completed_at");
  const failureReason = optStr(row, "failure_reason");
  const failedAtStep = optNum(row, "failed_at_step");
  const artifactPath = optStr(row, "artifact_path");
  const averageReward = optNum(row, "average_reward");
  const finalReward = optNum(row, "final_reward");
  return {
    runId: id,
    configHash: str(row, "config_hash"),
    config,
    status: status(row),
    stepRewards,
    checkpoints,
    startedAt: str(row, "started_at"),
    ...(completedAt !== undefined ? { completedAt } : {}),
    ...(failureReason !== undefined ? { failureReason } : {}),
    ...(failedAtStep !== undefined ? { failedAtStep } : {}),
    ...(artifactPath !== undefined ? { artifactPath } : {}),
    ...(averageReward !== undefined ? { averageReward } : {}),
    ...(finalReward !== undefined ? { finalReward } : {}),
  };
}

async function loadChildren(client: Client, ids: string[]): Promise<{
  rewards: Map<string, number[]>;
  checkpoints: Map<string, CheckpointRef[]>;
}> {
  const rewards = new Map<string, number[]>(ids.map((id) => [id, []]));
  const checkpoints = new Map<string, CheckpointRef[]>(ids.map((id) => [id, []]));
  if (ids.length === 0) return { rewards, checkpoints };
  const marks = ids.map(() => "?").join(", ");
  const [r, c] = await client.batch(
    [
      { sql: `SELECT run_id, step, reward FROM step_rewards WHERE run_id IN (${marks}) ORDER BY run_id, step`, args: ids },
      { sql: `SELECT run_id, step, file_path FROM checkpoints WHERE run_id IN (${marks}) ORDER BY run_id, step`, args: ids },
    ],
    "read",
  );
  for (const row of r.rows) rewards.get(str(row, "run_id"))?.push(num(row, "reward"));
  for (const row of c.rows) {
    checkpoints.get(str(row, "run_id"))?.push({ step: num(row, "step"), path: str(row, "file_path") });
  }
  return { rewards, checkpoints };
}

export async function getRun(client: Client, id: string): Promise<RunRecord | null> {
  const result = await client.execute({
    sql: "SELECT * FROM runs WHERE id = ?",
    args: [id],
  });
  const row = result.rows[0];
  if (!row) return null;
  const { rewards, checkpoints } = await loadChildren(client, [id]);
  return toRecord(row, rewards.get(id) ?? [], checkpoints.get(id) ?? []);
}

/** Newest first. */
export async function listRuns(
  client: Client,
  opts?: { status?: RunStatus; limit?: number },
): Promise<RunRecord[]> {
  const where = opts?.status ? "WHERE status = ?" : "";
  const args = opts?.status ? [opts.status] : [];
  const limit = opts?.limit ?? 100;

  const result = await client.execute({
    sql: `SELECT * FROM runs ${where} ORDER BY started_at DESC, rowid DESC LIMIT ?`,
    args: [...args, limit],
  });
  const ids = result.rows.map((row) => str(row, "id"));
  const { rewards, checkpoints } = await loadChildren(client, ids);
  return result.rows.map((row, i) => toRecord(row, rewards.get(ids[i]) ?? [], checkpoints.get(ids[i]) ?? []));
}
