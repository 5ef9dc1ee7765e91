import { ItemType } from "../types";
import { Ledger, SeenEntry, SeenLedger } from "./types";

/**
 * Write-behind view of a ledger for one run. `hasSeen` answers for committed
 * and staged URLs alike; `recordSeen` only stages. Nothing reaches the ledger
 * until `commit()`, which writes every staged URL in one transaction.
 */
export class StagedLedger implements SeenLedger {
  private readonly staged = new Map<string, ItemType>();

  constructor(private readonly ledger: Ledger) {}

  async hasSeen(url: string): Promise<boolean> {
    return this.staged.has(url) || this.ledger.hasSeen(url);
  }

  async recordSeen(url: string, itemType: ItemType): Promise<void> {
    if (!this.staged.has(url)) {
      this.staged.set(url, itemType);
    }
  }

  /** Drops staged URLs so the next run processes them again. Returns the ones dropped. */
  release(urls: Iterable<string>): string[] {
    const released: string[] = [];
    for (const url of urls) {
      if (this.staged.delete(url)) {
        released.push(url);
      }
    }
    return released;
  }

  get size(): number {
    return this.staged.size;
  }

  async commit(): Promise<number> {
    const entries: SeenEntry[] = [...this.staged].map(([url, itemType]) => ({ url, itemType }));
    if (entries.length > 0) {
      await this.ledger.recordSeenMany(entries);
    }
    this.staged.clear();
    return entries.length;
  }
}
