import fs from "node:fs";
import path from "node:path";
import { OutputError, ScoutError, errorMessage } from "../core/errors";
import { ScoredCandidate } from "../types";
import { OutputSink } from "./types";

export abstract class BaseSink implements OutputSink {
  readonly location: string;

  constructor(outputPath: string) {
    this.location = path.resolve(outputPath);
  }

  async write(candidates: readonly ScoredCandidate[]): Promise<void> {
    try {
      await this.writeCandidates(candidates);
    } catch (error) {
      if (error instanceof ScoutError) {
        throw error;
      }
      throw new OutputError(`Failed to write ${this.location}: ${errorMessage(error)}`, { location: this.location }, error);
    }
  }

  protected abstract writeCandidates(candidates: readonly ScoredCandidate[]): Promise<void>;

  /** Writes beside the target and renames, so readers never see a half-written file. */
  protected async replaceFile(content: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    const tempPath = `${this.location}.part`;
    try {
      await fs.promises.writeFile(tempPath, content, "utf-8");
      await fs.promises.rename(tempPath, this.location);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }

  protected async appendFile(content: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    await fs.promises.appendFile(this.location, content, "utf-8");
  }
}
