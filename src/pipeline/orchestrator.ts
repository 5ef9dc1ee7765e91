import { AppConfig } from "../config";
import { OutputError, errorMessage, isFatalError } from "../core/errors";
import { Result, fail, ok } from "../core/result";
import { PageFetcher } from "../crawl/pageFetcher";
import { TeamUrlFinder } from "../crawl/teamUrlFinder";
import { ExtractionSuite } from "../extract";
import { FeedSource } from "../feed/rssFeed";
import { Logger, MetricsRegistry } from "../observability";
import { identityKey, mergeCandidatePair } from "../resolve/identity";
import { PersonResolver } from "../resolve/personResolver";
import { Scorer, createScorer, passesResponseGate, passesScoreThreshold } from "../scoring/scorer";
import { OutputSink } from "../sink";
import { Ledger, StagedLedger } from "../store";
import { Article, CompanyMention, FeedItem, PersonCandidate, RelevanceVerdict, ScoredCandidate } from "../types";
import { FailureEntry, filterUnseen, runFetchAndExtract, toFailureEntry } from "./stage";

export type PipelineState =
  | "FETCH_FEEDS"
  | "DEDUP_FILTER"
  | "EXTRACT_ARTICLES"
  | "RESOLVE_COMPANIES_AND_PEOPLE"
  | "GATE_AND_SCORE"
  | "WRITE_OUTPUT"
  | "DONE"
  | "ABORTED";

type ActiveState = Exclude<PipelineState, "DONE" | "ABORTED">;

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  FETCH_FEEDS: ["DEDUP_FILTER", "ABORTED"],
  DEDUP_FILTER: ["EXTRACT_ARTICLES", "ABORTED"],
  EXTRACT_ARTICLES: ["RESOLVE_COMPANIES_AND_PEOPLE", "ABORTED"],
  RESOLVE_COMPANIES_AND_PEOPLE: ["GATE_AND_SCORE", "ABORTED"],
  GATE_AND_SCORE: ["WRITE_OUTPUT", "ABORTED"],
  WRITE_OUTPUT: ["DONE", "ABORTED"],
  DONE: [],
  ABORTED: [],
};

export interface RunCounts {
  feedsFetched: number;
  feedsFailed: number;
  feedItems: number;
  articlesSkippedSeen: number;
  articlesProcessed: number;
  articlesFailed: number;
  articlesRelevant: number;
  companies: number;
  peopleFromArticles: number;
  peopleFromTeamPages: number;
  teamPagesProcessed: number;
  teamPagesSkipped: number;
  teamPagesFailed: number;
  peopleVetted: number;
  vettingFailed: number;
  rejectedByVetting: number;
  failedResponseGate: number;
  failedScoreThreshold: number;
  qualified: number;
  urlsRecorded: number;
  urlsReleased: number;
}

export interface RunReport {
  runId: string;
  state: PipelineState;
  startedAt: string;
  finishedAt?: string;
  counts: RunCounts;
  failures: FailureEntry[];
  /** Qualified candidates, ranked by total score. */
  candidates: ScoredCandidate[];
  outputLocation?: string;
  outputError?: string;
  abortReason?: string;
}

export interface ScoutPipelineDeps {
  config: AppConfig;
  ledger: Ledger;
  feedSource: FeedSource;
  fetcher: PageFetcher;
  extractors: ExtractionSuite;
  sink: OutputSink;
  logger: Logger;
  metrics: MetricsRegistry;
  runId: string;
  now?: () => Date;
  scorer?: Scorer;
  teamUrls?: TeamUrlFinder;
}

interface CompanyOutcome {
  company: CompanyMention;
  /** Tier 1 people, found while the article was being processed. */
  articlePeople: PersonCandidate[];
}

interface ArticleOutcome {
  article: Article;
  verdict: RelevanceVerdict;
  companies: CompanyOutcome[];
}

interface ResolvedPerson {
  person: PersonCandidate;
  company: CompanyMention;
  article: Article;
}

function emptyCounts(): RunCounts {
  return {
    feedsFetched: 0,
    feedsFailed: 0,
    feedItems: 0,
    articlesSkippedSeen: 0,
    articlesProcessed: 0,
    articlesFailed: 0,
    articlesRelevant: 0,
    companies: 0,
    peopleFromArticles: 0,
    peopleFromTeamPages: 0,
    teamPagesProcessed: 0,
    teamPagesSkipped: 0,
    teamPagesFailed: 0,
    peopleVetted: 0,
    vettingFailed: 0,
    rejectedByVetting: 0,
    failedResponseGate: 0,
    failedScoreThreshold: 0,
    qualified: 0,
    urlsRecorded: 0,
    urlsReleased: 0,
  };
}

/** Highest total first; equal totals keep discovery order. */
export function rankCandidates(candidates: readonly ScoredCandidate[]): ScoredCandidate[] {
  return [...candidates].sort((a, b) => b.totalScore - a.totalScore);
}

/**
 * One pass over the configured feeds. Each article and team page is paid for
 * at most once across runs: URLs already in the ledger are skipped before any
 * fetch or LLM call, and a URL is recorded only after its work succeeded.
 *
 * Successful URLs are staged during the run and committed once the output is
 * written, so a run that dies or cannot deliver its candidates leaves them to
 * the next run. A vetting failure releases the URLs its person came from.
 */
export class ScoutPipeline {
  private state: PipelineState = "FETCH_FEEDS";
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly scorer: Scorer;
  private readonly resolver: PersonResolver;
  private readonly staged: StagedLedger;

  constructor(private readonly deps: ScoutPipelineDeps) {
    this.staged = new StagedLedger(deps.ledger);
    this.logger = deps.logger.child("pipeline");
    this.now = deps.now ?? (() => new Date());
    this.scorer = deps.scorer ?? createScorer(deps.config.preferences, deps.config.scoringWeights);
    this.resolver = new PersonResolver({
      people: deps.extractors.people,
      teamUrls:
        deps.teamUrls ??
        new TeamUrlFinder({
          fetcher: deps.fetcher,
          websites: deps.extractors.websites,
          logger: deps.logger,
          maxCandidates: deps.config.limits.maxTeamPageCandidates,
        }),
      fetcher: deps.fetcher,
      ledger: this.staged,
      logger: deps.logger,
      metrics: deps.metrics,
      maxPeoplePerCompany: deps.config.limits.maxPeoplePerCompany,
    });
  }

  get currentState(): PipelineState {
    return this.state;
  }

  async run(): Promise<RunReport> {
    const { ledger, runId } = this.deps;
    const report: RunReport = {
      runId,
      state: this.state,
      startedAt: this.now().toISOString(),
      counts: emptyCounts(),
      failures: [],
      candidates: [],
    };

    try {
      await ledger.startRun(runId, report.startedAt);
      this.logger.info("run_start", { state: this.state });

      const feedItems = await this.fetchFeeds(report);

      this.transition("DEDUP_FILTER");
      const unseen = await this.filterSeen(feedItems, report);

      this.transition("EXTRACT_ARTICLES");
      const articles = await this.extractArticles(unseen, report);

      this.transition("RESOLVE_COMPANIES_AND_PEOPLE");
      const people = await this.resolvePeople(articles, report);

      this.transition("GATE_AND_SCORE");
      report.candidates = rankCandidates(await this.gateAndScore(people, report));

      this.transition("WRITE_OUTPUT");
      await this.writeOutput(report);
      await this.commitLedger(report);

      report.finishedAt = this.now().toISOString();
      await ledger.finishRun(
        runId,
        report.outputError ? "failed" : "completed",
        report.finishedAt,
        this.summarize({ ...report, state: "DONE" }),
      );
      this.transition("DONE");
      report.state = this.state;
      this.logger.info("run_complete", { state: this.state, ...report.counts, failures: report.failures.length });
      return report;
    } catch (error) {
      if (!isFatalError(error)) {
        await this.recordFinish(report, "failed");
        throw error;
      }
      this.transition("ABORTED");
      report.state = this.state;
      report.abortReason = error.message;
      report.finishedAt = this.now().toISOString();
      this.logger.error("run_aborted", { kind: error.code, error: error.message, ...report.counts });
      await this.recordFinish(report, "aborted");
      return report;
    }
  }

  private transition(next: PipelineState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.state} -> ${next}`);
    }
    this.logger.debug("state_transition", { from: this.state, state: next });
    this.state = next;
  }

  private async recordFinish(report: RunReport, status: "failed" | "aborted"): Promise<void> {
    try {
      await this.deps.ledger.finishRun(
        report.runId,
        status,
        report.finishedAt ?? this.now().toISOString(),
        this.summarize(report),
      );
    } catch (error) {
      this.logger.error("run_finish_record_failed", { error: errorMessage(error) });
    }
  }

  private summarize(report: RunReport): Record<string, unknown> {
    return {
      state: report.state,
      counts: report.counts,
      failures: report.failures.length,
      outputLocation: report.outputLocation,
      outputError: report.outputError,
      abortReason: report.abortReason,
    };
  }

  private stageFailed(report: RunReport, state: ActiveState, entry: FailureEntry): void {
    report.failures.push(entry);
    this.logger.debug("failure_recorded", { state, stage: entry.stage, url: entry.url, kind: entry.kind });
  }

  private async fetchFeeds(report: RunReport): Promise<FeedItem[]> {
    const { config, feedSource, metrics } = this.deps;
    const items: FeedItem[] = [];

    for (const feed of config.feeds) {
      const stopTimer = metrics.startTimer("feed_fetch_ms");
      try {
        const feedItems = (await feedSource.fetchFeed(feed)).slice(0, config.limits.maxArticlesPerFeed);
        items.push(...feedItems);
        report.counts.feedsFetched += 1;
        report.counts.feedItems += feedItems.length;
        metrics.incrementCounter("feeds_fetched");
        metrics.incrementCounter("feed_items", feedItems.length);
        this.logger.info("feed_fetched", { feed: feed.name, url: feed.url, items: feedItems.length });
      } catch (error) {
        if (isFatalError(error)) {
          throw error;
        }
        report.counts.feedsFailed += 1;
        metrics.incrementCounter("feeds_failed");
        this.stageFailed(report, "FETCH_FEEDS", toFailureEntry("feed", error, { url: feed.url, subject: feed.name }));
        this.logger.warn("feed_failed", { feed: feed.name, url: feed.url, error: errorMessage(error) });
      } finally {
        stopTimer();
      }
    }

    return items;
  }

  private async filterSeen(items: readonly FeedItem[], report: RunReport): Promise<FeedItem[]> {
    const distinct = new Map<string, FeedItem>();
    for (const item of items) {
      if (!distinct.has(item.url)) {
        distinct.set(item.url, item);
      }
    }

    const { unseen, seen } = await filterUnseen([...distinct.values()], this.staged);
    report.counts.articlesSkippedSeen = seen.length;
    this.deps.metrics.incrementCounter("articles_skipped_seen", seen.length);
    for (const item of seen) {
      this.logger.debug("article_skipped_seen", { url: item.url });
    }
    this.logger.info("dedup_complete", { candidates: distinct.size, unseen: unseen.length, seen: seen.length });
    return unseen;
  }

  private async extractArticles(items: readonly FeedItem[], report: RunReport): Promise<ArticleOutcome[]> {
    const { config, extractors, metrics } = this.deps;

    const stage = await runFetchAndExtract({
      stage: "article",
      items,
      itemType: "article",
      ledger: this.staged,
      logger: this.logger,
      metrics,
      metricPrefix: "articles",
      concurrency: config.articleConcurrency,
      worker: async (item): Promise<Result<ArticleOutcome>> => {
        const article = await extractors.articles.fetchArticle(item);
        const verdict = await extractors.relevance.check(article);
        if (!verdict.ok) {
          return fail(verdict.error);
        }
        if (!verdict.value.isRelevant) {
          this.logger.debug("article_irrelevant", { url: article.url, reason: verdict.value.reason });
          return ok({ article, verdict: verdict.value, companies: [] });
        }
        const companies = await extractors.companies.extract(article);
        if (!companies.ok) {
          return fail(companies.error);
        }
        const outcomes: CompanyOutcome[] = [];
        for (const company of companies.value) {
          const articlePeople = await this.resolver.fromArticle(company, article);
          if (!articlePeople.ok) {
            return fail(articlePeople.error);
          }
          outcomes.push({ company, articlePeople: articlePeople.value });
        }
        return ok({ article, verdict: verdict.value, companies: outcomes });
      },
    });

    for (const failure of stage.failures) {
      this.stageFailed(report, "EXTRACT_ARTICLES", failure);
    }
    report.counts.articlesSkippedSeen += stage.skipped.length;
    report.counts.articlesProcessed = stage.succeeded.length;
    report.counts.articlesFailed = stage.failures.length;

    const relevant = stage.succeeded.map((success) => success.value).filter((outcome) => outcome.verdict.isRelevant);
    report.counts.articlesRelevant = relevant.length;
    report.counts.companies = relevant.reduce((total, outcome) => total + outcome.companies.length, 0);
    return relevant;
  }

  private async resolvePeople(articles: readonly ArticleOutcome[], report: RunReport): Promise<ResolvedPerson[]> {
    const byIdentity = new Map<string, ResolvedPerson>();

    for (const { article, companies } of articles) {
      for (const { company, articlePeople } of companies) {
        const resolved = await this.resolver.resolve(company, article, articlePeople);
        report.counts.peopleFromArticles += resolved.fromArticle;
        report.counts.peopleFromTeamPages += resolved.fromTeamPages;
        report.counts.teamPagesProcessed += resolved.teamPages.processed;
        report.counts.teamPagesSkipped += resolved.teamPages.skipped;
        report.counts.teamPagesFailed += resolved.teamPages.failed;
        for (const failure of resolved.failures) {
          this.stageFailed(report, "RESOLVE_COMPANIES_AND_PEOPLE", failure);
        }

        for (const person of resolved.people) {
          const key = identityKey(person);
          const existing = byIdentity.get(key);
          if (existing) {
            existing.person = mergeCandidatePair(existing.person, person);
            continue;
          }
          byIdentity.set(key, { person, company, article });
        }
      }
    }

    return [...byIdentity.values()];
  }

  private async gateAndScore(people: readonly ResolvedPerson[], report: RunReport): Promise<ScoredCandidate[]> {
    const { config, extractors, metrics } = this.deps;
    const qualified: ScoredCandidate[] = [];

    for (const { person, company, article } of people) {
      report.counts.peopleVetted += 1;
      metrics.incrementCounter("people_vetted");
      const vetting = await extractors.vetter.vet(person);
      if (!vetting.ok) {
        report.counts.vettingFailed += 1;
        this.stageFailed(
          report,
          "GATE_AND_SCORE",
          toFailureEntry("vetting", vetting.error, { url: person.sourceUrl, subject: person.name }),
        );
        const released = this.staged.release(person.sourceUrls);
        report.counts.urlsReleased += released.length;
        this.logger.info("sources_released", { person: person.name, urls: released });
        continue;
      }

      if (!vetting.value.matchesCriteria && !config.debugKeepNonmatching) {
        report.counts.rejectedByVetting += 1;
        this.logger.debug("person_not_matching", { person: person.name, company: company.name });
        continue;
      }

      const response = this.scorer.responseScore(vetting.value, company);
      if (!passesResponseGate(response.score, config.limits)) {
        report.counts.failedResponseGate += 1;
        this.logger.debug("person_failed_response_gate", { person: person.name, responseScore: response.score });
        continue;
      }

      const fit = this.scorer.fitScore(vetting.value);
      const totalScore = fit.score + response.score;
      if (!passesScoreThreshold(totalScore, config.limits)) {
        report.counts.failedScoreThreshold += 1;
        this.logger.debug("person_failed_score_threshold", { person: person.name, totalScore });
        continue;
      }

      qualified.push({
        person,
        companyName: company.name,
        vetting: vetting.value,
        fitScore: fit.score,
        fitReasons: fit.reasons,
        responseScore: response.score,
        responseReasons: response.reasons,
        totalScore,
        sourceArticleUrl: article.url,
        discoveredAt: this.now().toISOString(),
      });
    }

    report.counts.qualified = qualified.length;
    metrics.incrementCounter("candidates_qualified", qualified.length);
    return qualified;
  }

  private async commitLedger(report: RunReport): Promise<void> {
    if (report.outputError) {
      this.logger.warn("ledger_commit_skipped", { staged: this.staged.size, reason: "output not written" });
      return;
    }
    report.counts.urlsRecorded = await this.staged.commit();
    this.logger.info("ledger_committed", { urls: report.counts.urlsRecorded });
  }

  private async writeOutput(report: RunReport): Promise<void> {
    const { sink } = this.deps;
    if (report.candidates.length === 0) {
      this.logger.warn("no_qualified_candidates", {
        hint: "lower limits.minResponseThreshold or limits.minScoreThreshold, broaden preferences, or set debugKeepNonmatching",
      });
      return;
    }

    try {
      await sink.write(report.candidates);
      report.outputLocation = sink.location;
      this.logger.info("output_written", { location: sink.location, rows: report.candidates.length });
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      const outputError =
        error instanceof OutputError ? error : new OutputError(errorMessage(error), { location: sink.location }, error);
      report.outputError = outputError.message;
      this.logger.error("output_failed", { location: sink.location, error: outputError.message });
    }
  }
}
