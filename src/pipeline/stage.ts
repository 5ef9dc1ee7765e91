import { ErrorCode, ScoutError, errorMessage, isFatalError } from "../core/errors";
import { processWithConcurrency } from "../core/concurrency";
import { Result } from "../core/result";
import { Logger, MetricsRegistry, StageMetricPrefix } from "../observability";
import { SeenLedger } from "../store";
import { ItemType } from "../types";

export interface FailureEntry {
  stage: string;
  url?: string;
  subject?: string;
  kind: ErrorCode | "UNEXPECTED_ERROR";
  message: string;
}

export interface StageSuccess<I, R> {
  item: I;
  value: R;
}

export interface StageResult<I, R> {
  /** Successful items in source order. */
  succeeded: StageSuccess<I, R>[];
  skipped: I[];
  failures: FailureEntry[];
}

export interface FetchAndExtractOptions<I extends { url: string }, R> {
  stage: string;
  items: readonly I[];
  itemType: ItemType;
  ledger: SeenLedger;
  logger: Logger;
  metrics?: MetricsRegistry;
  metricPrefix?: StageMetricPrefix;
  maxItems?: number;
  concurrency?: number;
  /** Label carried into failure entries, e.g. the company a team page belongs to. */
  subject?: (item: I) => string | undefined;
  worker: (item: I) => Promise<Result<R>>;
}

export function toFailureEntry(stage: string, error: unknown, target: { url?: string; subject?: string }): FailureEntry {
  return {
    stage,
    ...target,
    kind: error instanceof ScoutError ? error.code : "UNEXPECTED_ERROR",
    message: errorMessage(error),
  };
}

/** Items whose URL is not in the ledger yet, in input order. */
export async function filterUnseen<I extends { url: string }>(
  items: readonly I[],
  ledger: Pick<SeenLedger, "hasSeen">,
): Promise<{ unseen: I[]; seen: I[] }> {
  const unseen: I[] = [];
  const seen: I[] = [];
  for (const item of items) {
    if (await ledger.hasSeen(item.url)) {
      seen.push(item);
    } else {
      unseen.push(item);
    }
  }
  return { unseen, seen };
}

/**
 * Runs `worker` over every item whose URL the ledger has not seen and
 * records each URL only after its worker succeeds. A failed item leaves the
 * ledger untouched and does not stop the batch; StorageError and
 * ConfigurationError propagate.
 */
export async function runFetchAndExtract<I extends { url: string }, R>(
  options: FetchAndExtractOptions<I, R>,
): Promise<StageResult<I, R>> {
  const { stage, itemType, ledger, logger, metrics, metricPrefix } = options;

  const batch: I[] = [];
  const inBatch = new Set<string>();
  for (const item of options.items.slice(0, options.maxItems ?? options.items.length)) {
    if (inBatch.has(item.url)) {
      continue;
    }
    inBatch.add(item.url);
    batch.push(item);
  }

  const { unseen, seen } = await filterUnseen(batch, ledger);
  for (const item of seen) {
    logger.debug(`${stage}_skipped_seen`, { url: item.url });
  }
  if (metricPrefix) {
    metrics?.incrementCounter(`${metricPrefix}_skipped_seen`, seen.length);
  }

  const outcomes: Array<StageSuccess<I, R> | undefined> = new Array(unseen.length).fill(undefined);
  const failures: Array<FailureEntry | undefined> = new Array(unseen.length).fill(undefined);

  await processWithConcurrency(unseen, options.concurrency ?? 1, async (item, index) => {
    const target = { url: item.url, subject: options.subject?.(item) };
    let result: Result<R>;
    try {
      result = await options.worker(item);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      result = {
        ok: false,
        error: error instanceof ScoutError ? error : new ScoutError("EXTRACTION_ERROR", errorMessage(error), target, { cause: error }),
      };
    }

    if (!result.ok) {
      const failure: ScoutError = result.error;
      if (isFatalError(result.error)) {
        throw result.error;
      }
      failures[index] = toFailureEntry(stage, result.error, target);
      if (metricPrefix) {
        metrics?.incrementCounter(`${metricPrefix}_failed`);
      }
      logger.warn(`${stage}_failed`, { url: item.url, kind: failure.code, error: failure.message });
      return;
    }

    await ledger.recordSeen(item.url, itemType);
    outcomes[index] = { item, value: result.value };
    if (metricPrefix) {
      metrics?.incrementCounter(`${metricPrefix}_ok`);
    }
    logger.info(`${stage}_ok`, { url: item.url });
  });

  return {
    succeeded: outcomes.filter((outcome): outcome is StageSuccess<I, R> => outcome !== undefined),
    skipped: seen,
    failures: failures.filter((failure): failure is FailureEntry => failure !== undefined),
  };
}
