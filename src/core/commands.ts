import { AppConfig } from "../config";
import { HttpPageFetcher } from "../crawl/pageFetcher";
import { createExtractionSuite } from "../extract";
import { RssFeedSource } from "../feed/rssFeed";
import { LlmProvider, StructuredExtractor } from "../llm";
import { Logger, MetricsRegistry } from "../observability";
import { RunReport, ScoutPipeline } from "../pipeline/orchestrator";
import { createSink } from "../sink";
import { Ledger } from "../store";
import { ITEM_TYPES } from "../types";
import { closeFetchDispatchers } from "./fetch";
import { RateLimiter } from "./rateLimiter";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  ledger: Ledger;
  logger: Logger;
  metrics: MetricsRegistry;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export async function runScout(ctx: CommandContext, provider: LlmProvider): Promise<RunReport> {
  const { config, ledger, logger, metrics, runId } = ctx;
  const limiter = new RateLimiter({ minDelayMs: config.politeDelayMs });
  const fetcher = new HttpPageFetcher(config, limiter, metrics);
  const llm = new StructuredExtractor({
    provider,
    logger,
    metrics,
    limiter,
    maxRetries: config.llm.maxRetries,
  });

  logger.info("scout_start", {
    feeds: config.feeds.length,
    provider: provider.name,
    model: provider.model,
    outputFormat: config.outputFormat,
  });

  try {
    const pipeline = new ScoutPipeline({
      config,
      ledger,
      feedSource: new RssFeedSource(fetcher),
      fetcher,
      extractors: createExtractionSuite(config, fetcher, llm),
      sink: createSink(config, runId),
      logger,
      metrics,
      runId,
    });
    const report = await pipeline.run();

    logger.info("scout_complete", {
      state: report.state,
      qualified: report.candidates.length,
      failures: report.failures.length,
      outputLocation: report.outputLocation,
      outputError: report.outputError,
      abortReason: report.abortReason,
    });
    for (const failure of report.failures) {
      logger.info("run_failure", { ...failure });
    }
    return report;
  } finally {
    await closeFetchDispatchers();
  }
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const stats = await ctx.ledger.getStats();
  const recentRuns = await ctx.ledger.listRecentRuns(5);
  const latestByType = Object.fromEntries(
    await Promise.all(
      ITEM_TYPES.map(async (itemType) => {
        const [latest] = await ctx.ledger.listByType(itemType, 1);
        return [itemType, latest?.firstSeen ?? null] as const;
      }),
    ),
  );
  ctx.logger.info("status_complete", { stats, latestByType, recentRuns });
}

export async function runPrune(ctx: CommandContext, olderThanDays: number, now: Date = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - olderThanDays * DAY_MS).toISOString();
  ctx.logger.info("prune_start", { olderThanDays, cutoff });
  const removed = await ctx.ledger.pruneFirstSeenBefore(cutoff);
  ctx.logger.info("prune_complete", { removed, cutoff });
  return removed;
}
