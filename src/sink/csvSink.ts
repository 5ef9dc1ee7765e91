import { ScoredCandidate } from "../types";
import { BaseSink } from "./baseSink";
import { toOutputRow } from "./outputRow";
import { OUTPUT_COLUMNS } from "./types";

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(candidates: readonly ScoredCandidate[]): string {
  const lines = [OUTPUT_COLUMNS.join(",")];
  for (const candidate of candidates) {
    const row = toOutputRow(candidate);
    lines.push(OUTPUT_COLUMNS.map((column) => escapeCsvField(row[column])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

/** Replaces the output file with this run's ranked candidates. */
export class CsvSink extends BaseSink {
  protected async writeCandidates(candidates: readonly ScoredCandidate[]): Promise<void> {
    await this.replaceFile(toCsv(candidates));
  }
}
