/**
 * Durable run ledger over libsql.
 */
import type { Client } from "@libsql/client";
import { LedgerError, errorMessage, type RunLedger, type RunRecord } from "@rubric/core";
import { createDb, type DbOptions } from "./client.js";
import { getRun, listRuns, upsertRun } from "./runs.js";

export class LibsqlLedger implements RunLedger {
  constructor(private readonly client: Client) {}

  /** Open (and migrate) the database at `opts.url`, or the configured default. */
  static async open(opts?: DbOptions): Promise<LibsqlLedger> {
    try {
      return new LibsqlLedger(await createDb(opts));
    } catch (e) {
      throw new LedgerError({ message: `Cannot open run ledger: ${errorMessage(e)}`, cause: e });
    }
  }

  async append(record: RunRecord): Promise<void> {
    try {
      await upsertRun(this.client, record);
    } catch (e) {
      throw new LedgerError({ message: `Cannot append run ${record.runId}: ${errorMessage(e)}`, cause: e });
    }
  }

  async listRuns(opts?: { limit?: number }): Promise<RunRecord[]> {
    try {
      return await listRuns(this.client, opts);
    } catch (e) {
      throw new LedgerError({ message: `Cannot list runs: ${errorMessage(e)}`, cause: e });
    }
  }

  async get(runId: string): Promise<RunRecord | null> {
    try {
      return await getRun(this.client, runId);
    } catch (e) {
      throw new LedgerError({ message: `Cannot read run ${runId}: ${errorMessage(e)}`, cause: e });
    }
  }

  close(): void {
    this.client.close();
  }
}
