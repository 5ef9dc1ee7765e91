import { StorageError } from "../core/errors";
import { ItemType, SeenRecord } from "../types";
import { Ledger, LedgerStats, RunRecord, RunStatus, SeenEntry, emptyTypeCounts } from "./types";

/** Ledger kept in process memory. Used by `run --dry-run` and tests. */
export class InMemoryLedger implements Ledger {
  private readonly seen = new Map<string, SeenRecord>();
  private readonly runs = new Map<string, RunRecord>();
  private closed = false;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async hasSeen(url: string): Promise<boolean> {
    this.assertOpen();
    return this.seen.has(url);
  }

  async recordSeen(url: string, itemType: ItemType): Promise<void> {
    this.assertOpen();
    const timestamp = this.now().toISOString();
    const existing = this.seen.get(url);
    if (existing) {
      existing.lastUpdated = timestamp;
      return;
    }
    this.seen.set(url, { url, itemType, firstSeen: timestamp, lastUpdated: timestamp });
  }

  async recordSeenMany(entries: readonly SeenEntry[]): Promise<void> {
    this.assertOpen();
    for (const entry of entries) {
      await this.recordSeen(entry.url, entry.itemType);
    }
  }

  async listByType(itemType: ItemType, limit: number): Promise<SeenRecord[]> {
    this.assertOpen();
    return this.records()
      .filter((record) => record.itemType === itemType)
      .reverse()
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  async listFirstSeenBetween(fromIso: string, toIso: string): Promise<SeenRecord[]> {
    this.assertOpen();
    return this.records()
      .filter((record) => record.firstSeen >= fromIso && record.firstSeen < toIso)
      .map((record) => ({ ...record }));
  }

  async getStats(): Promise<LedgerStats> {
    this.assertOpen();
    const byType = emptyTypeCounts();
    for (const record of this.seen.values()) {
      byType[record.itemType] += 1;
    }
    return { total: this.seen.size, byType };
  }

  async pruneFirstSeenBefore(cutoffIso: string): Promise<number> {
    this.assertOpen();
    let removed = 0;
    for (const [url, record] of this.seen) {
      if (record.firstSeen < cutoffIso) {
        this.seen.delete(url);
        removed += 1;
      }
    }
    return removed;
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.assertOpen();
    this.runs.set(runId, { runId, startedAt, status: "running" });
  }

  async finishRun(
    runId: string,
    status: Exclude<RunStatus, "running">,
    finishedAt: string,
    summary?: Record<string, unknown>,
  ): Promise<void> {
    this.assertOpen();
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, status, finishedAt, summary });
    }
  }

  async listRecentRuns(limit: number): Promise<RunRecord[]> {
    this.assertOpen();
    return [...this.runs.values()].sort((a, b) => b.startedAt.localeCompare(a.startedAt)).slice(0, limit);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private records(): SeenRecord[] {
    // Map iteration follows insertion order; the stable sort keeps it for equal timestamps.
    return [...this.seen.values()].sort((a, b) => a.firstSeen.localeCompare(b.firstSeen));
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError("Ledger is closed");
    }
  }
}
