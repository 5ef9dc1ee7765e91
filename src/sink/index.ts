import { AppConfig } from "../config";
import { CsvSink } from "./csvSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { OutputSink } from "./types";

export function createSink(config: Pick<AppConfig, "outputFormat" | "outputPath">, runId: string): OutputSink {
  switch (config.outputFormat) {
    case "csv":
      return new CsvSink(config.outputPath);
    case "jsonl":
      return new LocalJsonlSink(config.outputPath, runId);
  }
}

export * from "./baseSink";
export * from "./csvSink";
export * from "./localJsonlSink";
export * from "./outputRow";
export * from "./types";
