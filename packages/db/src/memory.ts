/**
 * In-process run ledger for tests and dry runs.
 */
import type { RunLedger, RunRecord } from "@rubric/core";

export class MemoryLedger implements RunLedger {
  private readonly runs = new Map<string, { seq: number; record: RunRecord }>();
  private seq = 0;

  async append(record: RunRecord): Promise<void> {
    const existing = this.runs.get(record.runId);
    this.runs.set(record.runId, { seq: existing?.seq ?? this.seq++, record: structuredClone(record) });
  }

  /** Newest first. */
  async listRuns(opts?: { limit?: number }): Promise<RunRecord[]> {
    const all = [...this.runs.values()]
      .sort((a, b) => (a.record.startedAt < b.record.startedAt ? 1 : a.record.startedAt > b.record.startedAt ? -1 : b.seq - a.seq))
      .map((e) => structuredClone(e.record));
    return all.slice(0, opts?.limit ?? 100);
  }

  async get(runId: string): Promise<RunRecord | null> {
    const entry = this.runs.get(runId);
    return entry ? structuredClone(entry.record) : null;
  }
}
