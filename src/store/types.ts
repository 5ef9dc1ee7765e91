import { ItemType, SeenRecord } from "../types";

export type RunStatus = "running" | "completed" | "failed" | "aborted";

export interface SeenEntry {
  url: string;
  itemType: ItemType;
}

/** The part of a ledger the fetch-and-extract stages read and write. */
export type SeenLedger = Pick<Ledger, "hasSeen" | "recordSeen">;

export interface LedgerStats {
  total: number;
  byType: Record<ItemType, number>;
}

export interface RunRecord {
  runId: string;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus;
  summary?: Record<string, unknown>;
}

/**
 * Durable set of URLs the pipeline has already paid for. A URL is recorded
 * once, under the item type it was first processed as; later writes only
 * refresh `lastUpdated`.
 *
 * Implementations throw StorageError when the backing store is unusable.
 */
export interface Ledger {
  hasSeen(url: string): Promise<boolean>;
  recordSeen(url: string, itemType: ItemType): Promise<void>;
  /** Records every entry in one transaction; either all are written or none. */
  recordSeenMany(entries: readonly SeenEntry[]): Promise<void>;
  listByType(itemType: ItemType, limit: number): Promise<SeenRecord[]>;
  /** Records with `from <= firstSeen < to`, oldest first. */
  listFirstSeenBetween(fromIso: string, toIso: string): Promise<SeenRecord[]>;
  getStats(): Promise<LedgerStats>;
  /** Administrative only; the pipeline never deletes. */
  pruneFirstSeenBefore(cutoffIso: string): Promise<number>;
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(
    runId: string,
    status: Exclude<RunStatus, "running">,
    finishedAt: string,
    summary?: Record<string, unknown>,
  ): Promise<void>;
  listRecentRuns(limit: number): Promise<RunRecord[]>;
  close(): Promise<void>;
}

export function emptyTypeCounts(): Record<ItemType, number> {
  return { article: 0, company: 0, person: 0 };
}
