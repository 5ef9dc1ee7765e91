import { ScoredCandidate } from "../types";
import { BaseSink } from "./baseSink";
import { toOutputRow } from "./outputRow";

/** Appends one JSON line per candidate, tagged with the run id. */
export class LocalJsonlSink extends BaseSink {
  constructor(
    outputPath: string,
    private readonly runId: string,
  ) {
    super(outputPath);
  }

  protected async writeCandidates(candidates: readonly ScoredCandidate[]): Promise<void> {
    if (candidates.length === 0) {
      return;
    }

    const content =
      candidates
        .map((candidate, index) => JSON.stringify({ runId: this.runId, rank: index + 1, ...toOutputRow(candidate) }))
        .join("\n") + "\n";
    await this.appendFile(content);
  }
}
