import { AppConfig } from "../config";
import { Ledger } from "./types";
import { InMemoryLedger } from "./memoryStore";
import { SqliteLedger } from "./sqliteStore";

export function createLedger(config: AppConfig, options: { dryRun?: boolean } = {}): Ledger {
  if (options.dryRun) {
    return new InMemoryLedger();
  }
  return new SqliteLedger(config.storePath);
}

export * from "./types";
export { InMemoryLedger } from "./memoryStore";
export { SqliteLedger } from "./sqliteStore";
export { StagedLedger } from "./stagedLedger";
