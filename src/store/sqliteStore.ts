import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StorageError, errorMessage } from "../core/errors";
import { ITEM_TYPES, ItemType, SeenRecord } from "../types";
import { Ledger, LedgerStats, RunRecord, RunStatus, SeenEntry, emptyTypeCounts } from "./types";

type SeenRow = {
  url: string;
  itemType: string;
  firstSeen: string;
  lastUpdated: string;
};

type RunRow = {
  runId: string;
  startedAt: string;
  finishedAt: string | null;
  status: string;
  summary: string | null;
};

const RUN_STATUSES: readonly RunStatus[] = ["running", "completed", "failed", "aborted"];

function toItemType(value: string): ItemType {
  const match = ITEM_TYPES.find((itemType) => itemType === value);
  if (!match) {
    throw new StorageError(`Unknown item type in ledger: ${value}`, { itemType: value });
  }
  return match;
}

function toRunStatus(value: string): RunStatus {
  return RUN_STATUSES.find((status) => status === value) ?? "failed";
}

function parseSummary(raw: string | null): Record<string, unknown> | undefined {
  if (!raw) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    return { unreadable: errorMessage(error) };
  }
  return undefined;
}

function toSeenRecord(row: SeenRow): SeenRecord {
  return {
    url: row.url,
    itemType: toItemType(row.itemType),
    firstSeen: row.firstSeen,
    lastUpdated: row.lastUpdated,
  };
}

function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS seen_urls (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      url TEXT NOT NULL UNIQUE,
      itemType TEXT NOT NULL,
      firstSeen TEXT NOT NULL,
      lastUpdated TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS runs (
      runId TEXT PRIMARY KEY,
      startedAt TEXT NOT NULL,
      finishedAt TEXT NULL,
      status TEXT NOT NULL,
      summary TEXT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_seen_urls_item_type ON seen_urls(itemType);
    CREATE INDEX IF NOT EXISTS idx_seen_urls_first_seen ON seen_urls(firstSeen);
  `);
}

export interface SqliteLedgerOptions {
  now?: () => Date;
}

export class SqliteLedger implements Ledger {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(
    private readonly dbPath: string,
    options: SqliteLedgerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    const absolutePath = path.resolve(dbPath);
    let db: Database.Database | undefined;
    try {
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      db = new Database(absolutePath);
      db.pragma("journal_mode = WAL");
      initializeSchema(db);
    } catch (error) {
      db?.close();
      throw new StorageError(`Cannot open ledger at ${absolutePath}: ${errorMessage(error)}`, { dbPath }, error);
    }
    this.db = db;
  }

  async hasSeen(url: string): Promise<boolean> {
    return this.guard("hasSeen", () => {
      const row = this.db.prepare<[string], { found: number }>("SELECT 1 AS found FROM seen_urls WHERE url = ?").get(url);
      return row !== undefined;
    });
  }

  async recordSeen(url: string, itemType: ItemType): Promise<void> {
    await this.recordSeenMany([{ url, itemType }]);
  }

  async recordSeenMany(entries: readonly SeenEntry[]): Promise<void> {
    const timestamp = this.now().toISOString();
    this.guard("recordSeen", () => {
      const upsert = this.db.prepare(`
        INSERT INTO seen_urls (url, itemType, firstSeen, lastUpdated)
        VALUES (@url, @itemType, @timestamp, @timestamp)
        ON CONFLICT(url) DO UPDATE SET
          lastUpdated = excluded.lastUpdated
      `);
      this.db.transaction(() => {
        for (const entry of entries) {
          upsert.run({ url: entry.url, itemType: entry.itemType, timestamp });
        }
      })();
    });
  }

  async listByType(itemType: ItemType, limit: number): Promise<SeenRecord[]> {
    return this.guard("listByType", () =>
      this.db
        .prepare<[string, number], SeenRow>(
          `
          SELECT url, itemType, firstSeen, lastUpdated
          FROM seen_urls
          WHERE itemType = ?
          ORDER BY firstSeen DESC, id DESC
          LIMIT ?
        `,
        )
        .all(itemType, limit)
        .map(toSeenRecord),
    );
  }

  async listFirstSeenBetween(fromIso: string, toIso: string): Promise<SeenRecord[]> {
    return this.guard("listFirstSeenBetween", () =>
      this.db
        .prepare<[string, string], SeenRow>(
          `
          SELECT url, itemType, firstSeen, lastUpdated
          FROM seen_urls
          WHERE firstSeen >= ? AND firstSeen < ?
          ORDER BY firstSeen ASC, id ASC
        `,
        )
        .all(fromIso, toIso)
        .map(toSeenRecord),
    );
  }

  async getStats(): Promise<LedgerStats> {
    return this.guard("getStats", () => {
      const rows = this.db
        .prepare<[], { itemType: string; count: number }>(
          "SELECT itemType, COUNT(*) AS count FROM seen_urls GROUP BY itemType",
        )
        .all();
      const byType = emptyTypeCounts();
      let total = 0;
      for (const row of rows) {
        byType[toItemType(row.itemType)] = row.count;
        total += row.count;
      }
      return { total, byType };
    });
  }

  async pruneFirstSeenBefore(cutoffIso: string): Promise<number> {
    return this.guard("pruneFirstSeenBefore", () => {
      const result = this.db.prepare("DELETE FROM seen_urls WHERE firstSeen < ?").run(cutoffIso);
      return result.changes;
    });
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.guard("startRun", () => {
      this.db
        .prepare(
          `
          INSERT INTO runs (runId, startedAt, finishedAt, status, summary)
          VALUES (@runId, @startedAt, NULL, 'running', NULL)
          ON CONFLICT(runId) DO UPDATE SET
            startedAt = excluded.startedAt,
            finishedAt = NULL,
            status = 'running',
            summary = NULL
        `,
        )
        .run({ runId, startedAt });
    });
  }

  async finishRun(
    runId: string,
    status: Exclude<RunStatus, "running">,
    finishedAt: string,
    summary?: Record<string, unknown>,
  ): Promise<void> {
    this.guard("finishRun", () => {
      this.db
        .prepare(
          `
          UPDATE runs
          SET
            status = @status,
            finishedAt = @finishedAt,
            summary = @summary
          WHERE runId = @runId
        `,
        )
        .run({
          runId,
          status,
          finishedAt,
          summary: summary ? JSON.stringify(summary) : null,
        });
    });
  }

  async listRecentRuns(limit: number): Promise<RunRecord[]> {
    return this.guard("listRecentRuns", () =>
      this.db
        .prepare<[number], RunRow>(
          `
          SELECT runId, startedAt, finishedAt, status, summary
          FROM runs
          ORDER BY startedAt DESC
          LIMIT ?
        `,
        )
        .all(limit)
        .map((row) => ({
          runId: row.runId,
          startedAt: row.startedAt,
          finishedAt: row.finishedAt ?? undefined,
          status: toRunStatus(row.status),
          summary: parseSummary(row.summary),
        })),
    );
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`Ledger ${operation} failed: ${errorMessage(error)}`, { operation, dbPath: this.dbPath }, error);
    }
  }
}
