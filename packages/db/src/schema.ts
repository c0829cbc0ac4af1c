/**
 * Database schema migrations.
 *
 * Each entry is a migration version. The migrate runner applies them
 * sequentially and tracks the current version in schema_version.
 */

export const migrations: string[][] = [
  // Version 1: runs and per-step rewards
  [
    `CREATE TABLE IF NOT EXISTS runs (
      id              TEXT PRIMARY KEY,
      config_hash     TEXT NOT NULL,
      template_name   TEXT NOT NULL,
      model           TEXT NOT NULL,
      total_steps     INTEGER NOT NULL,
      batch_size      INTEGER NOT NULL,
      lr              REAL NOT NULL,
      seed            INTEGER NOT NULL,
      optimizer       TEXT NOT NULL,
      config          TEXT NOT NULL,
      status          TEXT NOT NULL DEFAULT 'running'
                      CHECK(status IN ('running','completed','failed')),
      started_at      TEXT NOT NULL,
      completed_at    TEXT,
      failure_reason  TEXT,
      failed_at_step  INTEGER,
      artifact_path   TEXT,
      average_reward  REAL,
      final_reward    REAL,
      updated_at      TEXT NOT NULL DEFAULT (datetime('now'))
    )`,

    `CREATE TABLE IF NOT EXISTS step_rewards (
      run_id  TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
      step    INTEGER NOT NULL,
      reward  REAL NOT NULL,
      PRIMARY KEY (run_id, step)
    ) WITHOUT ROWID`,

    `CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status)`,
    `CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC)`,
  ],

  // Version 2: checkpoints written during a run
  [
    `CREATE TABLE IF NOT EXISTS checkpoints (
      run_id    TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
      step      INTEGER NOT NULL,
      file_path TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (run_id, step)
    ) WITHOUT ROWID`,
  ],
];
