import { describe, expect, it, vi } from "vitest";
import { AppConfig } from "../src/config";
import { OutputError, StorageError } from "../src/core/errors";
import { createExtractionSuite } from "../src/extract";
import { StructuredExtractor } from "../src/llm";
import { MetricsRegistry } from "../src/observability";
import { RunReport, ScoutPipeline, rankCandidates } from "../src/pipeline/orchestrator";
import { Scorer } from "../src/scoring/scorer";
import { OutputSink } from "../src/sink";
import { InMemoryLedger, Ledger, SeenEntry } from "../src/store";
import { ScoredCandidate } from "../src/types";
import { FakeFeedSource, FakeFetcher, ScriptedLlm, feedItem, htmlPage, makeConfig, silentLogger } from "./helpers/fakes";

const FEED_URL = "https://feeds.test/startups.xml";
const A1 = "https://news.test/a1";
const A2 = "https://news.test/a2";
const A3 = "https://news.test/a3";
const TEAM_URL = "https://acme.test/team";
const NOW = "2024-05-01T12:00:00.000Z";

const VETTING_MATCH = JSON.stringify({
  role_category: "Engineering",
  seniority_level: "C-level",
  location: "Remote",
  industry_experience: ["developer tools"],
  matches_criteria: true,
  reasoning: "Technical founder",
});

class RecordingSink implements OutputSink {
  readonly location = "memory://output";
  readonly writes: ScoredCandidate[][] = [];

  constructor(private readonly failure?: Error) {}

  async write(candidates: readonly ScoredCandidate[]): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.writes.push([...candidates]);
  }
}

class FailingLedger extends InMemoryLedger {
  async recordSeenMany(_entries: readonly SeenEntry[]): Promise<void> {
    throw new StorageError("disk full");
  }
}

function scoutConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...makeConfig({
      preferences: { roles: ["engineering"], industries: ["developer tools"], locations: ["Remote"] },
    }),
    ...overrides,
  };
}

function acmeFetcher(): FakeFetcher {
  return new FakeFetcher()
    .ok(A1, htmlPage("<article><p>Acme raised a seed round. Jane Doe is CTO.</p></article>"))
    .set(A2, { status: 503, content: "" })
    .ok(TEAM_URL, htmlPage("<h1>Team</h1><p>Jane Doe, CTO</p>"));
}

function acmeLlm(): ScriptedLlm {
  return new ScriptedLlm()
    .on("relevance", '{"is_relevant": true, "reason": "funding", "confidence": 0.9}')
    .on("companies", JSON.stringify({ companies: [{ name: "Acme", team_page_url: TEAM_URL }] }))
    .on("article_people", JSON.stringify({ people: [{ full_name: "Jane Doe", title: "Co-founder", linkedin_url: "li.com/jane" }] }))
    .on("team_people", JSON.stringify({ people: [{ full_name: "Jane Doe", title: "CTO", linkedin_url: "https://li.com/jane/" }] }))
    .on("vetting", VETTING_MATCH);
}

interface Harness {
  config?: AppConfig;
  ledger: Ledger;
  fetcher: FakeFetcher;
  llm: ScriptedLlm;
  sink?: RecordingSink;
  feedItems?: ReturnType<typeof feedItem>[];
  scorer?: Scorer;
  runId?: string;
}

function runPipeline(harness: Harness): Promise<RunReport> {
  const config = harness.config ?? scoutConfig();
  const structured = new StructuredExtractor({ provider: harness.llm, logger: silentLogger(), maxRetries: 0 });
  const pipeline = new ScoutPipeline({
    config,
    ledger: harness.ledger,
    feedSource: new FakeFeedSource({
      [FEED_URL]: harness.feedItems ?? [feedItem(A1, "Acme raises a seed round"), feedItem(A2, "Globex news")],
    }),
    fetcher: harness.fetcher,
    extractors: createExtractionSuite(config, harness.fetcher, structured),
    sink: harness.sink ?? new RecordingSink(),
    logger: silentLogger(),
    metrics: new MetricsRegistry(),
    runId: harness.runId ?? "run-1",
    now: () => new Date(NOW),
    scorer: harness.scorer,
  });
  return pipeline.run();
}

describe("ScoutPipeline", () => {
  it("finds, merges and scores people while isolating a failed article", async () => {
    const ledger = new InMemoryLedger();
    const sink = new RecordingSink();
    const llm = acmeLlm();

    const report = await runPipeline({ ledger, fetcher: acmeFetcher(), llm, sink });

    expect(report.state).toBe("DONE");
    expect(report.failures).toEqual([
      { stage: "article", url: A2, kind: "FETCH_ERROR", message: `HTTP 503 while fetching ${A2}` },
    ]);
    expect(report.counts).toMatchObject({
      feedsFetched: 1,
      feedItems: 2,
      articlesProcessed: 1,
      articlesFailed: 1,
      articlesRelevant: 1,
      companies: 1,
      peopleFromArticles: 1,
      peopleFromTeamPages: 1,
      teamPagesProcessed: 1,
      peopleVetted: 1,
      qualified: 1,
    });

    expect(sink.writes).toHaveLength(1);
    const [candidate] = sink.writes[0];
    expect(candidate.companyName).toBe("Acme");
    expect(candidate.person).toMatchObject({
      name: "Jane Doe",
      title: "CTO",
      linkedinUrl: "https://li.com/jane/",
      source: "team_page",
      sourceUrls: [A1, TEAM_URL],
    });
    expect(candidate.responseScore).toBeCloseTo(0.5);
    expect(candidate.fitScore).toBeCloseTo(2.3);
    expect(candidate.totalScore).toBeCloseTo(2.8);
    expect(candidate.sourceArticleUrl).toBe(A1);
    expect(candidate.discoveredAt).toBe(NOW);
    expect(report.outputLocation).toBe("memory://output");

    expect(llm.prompts).toHaveLength(5);
    expect(await ledger.hasSeen(A1)).toBe(true);
    expect(await ledger.hasSeen(TEAM_URL)).toBe(true);
    expect(await ledger.hasSeen(A2)).toBe(false);
    expect((await ledger.getStats()).byType).toEqual({ article: 1, company: 1, person: 0 });
    const [run] = await ledger.listRecentRuns(1);
    expect(run.status).toBe("completed");
  });

  it("does not pay twice for work already in the ledger", async () => {
    const ledger = new InMemoryLedger();
    const fetcher = acmeFetcher();
    await runPipeline({ ledger, fetcher, llm: acmeLlm(), runId: "run-1" });

    const secondLlm = acmeLlm();
    const sink = new RecordingSink();
    const report = await runPipeline({ ledger, fetcher, llm: secondLlm, sink, runId: "run-2" });

    expect(report.state).toBe("DONE");
    expect(report.counts.articlesSkippedSeen).toBe(1);
    expect(report.counts.articlesProcessed).toBe(0);
    expect(secondLlm.prompts).toEqual([]);
    expect(fetcher.callsTo(A1)).toBe(1);
    expect(fetcher.callsTo(TEAM_URL)).toBe(1);
    expect(fetcher.callsTo(A2)).toBe(2);
    expect(sink.writes).toEqual([]);
  });

  it("retries a failed article on the next run and records it even when irrelevant", async () => {
    const ledger = new InMemoryLedger();
    const fetcher = acmeFetcher();
    await runPipeline({ ledger, fetcher, llm: acmeLlm(), runId: "run-1" });

    fetcher.ok(A2, htmlPage("<p>Globex opens a new office.</p>"));
    const retryLlm = new ScriptedLlm().on("relevance", '{"is_relevant": false, "reason": "not startup news"}');
    const report = await runPipeline({ ledger, fetcher, llm: retryLlm, runId: "run-2" });

    expect(report.failures).toEqual([]);
    expect(report.counts.articlesProcessed).toBe(1);
    expect(report.counts.articlesRelevant).toBe(0);
    expect(retryLlm.callsOf("relevance")).toBe(1);
    expect(retryLlm.prompts).toHaveLength(1);
    expect(await ledger.hasSeen(A2)).toBe(true);

    const thirdLlm = new ScriptedLlm();
    await runPipeline({ ledger, fetcher, llm: thirdLlm, runId: "run-3" });
    expect(thirdLlm.prompts).toEqual([]);
  });

  it("aborts the run when the ledger cannot be written", async () => {
    const ledger = new FailingLedger();
    const sink = new RecordingSink();

    const report = await runPipeline({ ledger, fetcher: acmeFetcher(), llm: acmeLlm(), sink });

    expect(report.state).toBe("ABORTED");
    expect(report.abortReason).toBe("disk full");
    expect(sink.writes).toHaveLength(1);
    expect(await ledger.hasSeen(A1)).toBe(false);
    const [run] = await ledger.listRecentRuns(1);
    expect(run.status).toBe("aborted");
  });

  it("leaves an article unrecorded when its people cannot be extracted", async () => {
    const ledger = new InMemoryLedger();
    const fetcher = acmeFetcher();
    const failingLlm = acmeLlm().on("article_people", new Error("overloaded"));

    const first = await runPipeline({ ledger, fetcher, llm: failingLlm, runId: "run-1" });

    expect(first.failures).toEqual([
      { stage: "article", url: A1, kind: "EXTRACTION_ERROR", message: "LLM call failed for article_people: overloaded" },
      { stage: "article", url: A2, kind: "FETCH_ERROR", message: `HTTP 503 while fetching ${A2}` },
    ]);
    expect(first.counts.articlesFailed).toBe(2);
    expect(fetcher.callsTo(TEAM_URL)).toBe(0);
    expect(await ledger.hasSeen(A1)).toBe(false);

    const llm = acmeLlm();
    const second = await runPipeline({ ledger, fetcher, llm, runId: "run-2" });

    expect(llm.callsOf("article_people")).toBe(1);
    expect(second.counts.qualified).toBe(1);
    expect(second.candidates.map((candidate) => candidate.person.name)).toEqual(["Jane Doe"]);
    expect(await ledger.hasSeen(A1)).toBe(true);
  });

  it("records nothing when the run dies before its output is written", async () => {
    const ledger = new InMemoryLedger();
    const fetcher = acmeFetcher();
    const crashing: Scorer = {
      responseScore: () => {
        throw new Error("scorer crashed");
      },
      fitScore: () => ({ score: 0, reasons: "" }),
    };

    await expect(runPipeline({ ledger, fetcher, llm: acmeLlm(), scorer: crashing, runId: "run-1" })).rejects.toThrow(
      "scorer crashed",
    );
    expect(await ledger.hasSeen(A1)).toBe(false);
    expect(await ledger.hasSeen(TEAM_URL)).toBe(false);
    const [crashed] = await ledger.listRecentRuns(1);
    expect(crashed.status).toBe("failed");

    const sink = new RecordingSink();
    const report = await runPipeline({ ledger, fetcher, llm: acmeLlm(), sink, runId: "run-2" });

    expect(report.counts.qualified).toBe(1);
    expect(sink.writes[0].map((candidate) => candidate.person.name)).toEqual(["Jane Doe"]);
    expect(fetcher.callsTo(TEAM_URL)).toBe(2);
    expect(report.counts.urlsRecorded).toBe(2);
  });

  it("scrapes a team page once when two articles point to it", async () => {
    const ledger = new InMemoryLedger();
    const fetcher = acmeFetcher().ok(A3, htmlPage("<p>Acme hires a head of sales. Jane Doe is CTO.</p>"));
    const llm = acmeLlm();

    const report = await runPipeline({
      ledger,
      fetcher,
      llm,
      feedItems: [feedItem(A1, "Acme raises a seed round"), feedItem(A3, "Acme is hiring")],
    });

    expect(fetcher.callsTo(TEAM_URL)).toBe(1);
    expect(llm.callsOf("article_people")).toBe(2);
    expect(llm.callsOf("team_people")).toBe(1);
    expect(report.counts).toMatchObject({
      articlesProcessed: 2,
      companies: 2,
      teamPagesProcessed: 1,
      teamPagesSkipped: 1,
      peopleVetted: 1,
      qualified: 1,
      urlsRecorded: 3,
    });
    expect((await ledger.getStats()).byType).toEqual({ article: 2, company: 1, person: 0 });
  });

  it("applies the article, company and people limits before paying for more work", async () => {
    const limits = { ...makeConfig().limits, maxArticlesPerFeed: 1, maxCompaniesPerArticle: 1, maxPeoplePerCompany: 1 };
    const fetcher = acmeFetcher();
    const llm = acmeLlm()
      .on("companies", JSON.stringify({ companies: [{ name: "Acme", team_page_url: TEAM_URL }, { name: "Globex" }] }))
      .on(
        "article_people",
        JSON.stringify({
          people: [
            { full_name: "Jane Doe", title: "Co-founder", linkedin_url: "li.com/jane" },
            { full_name: "Sam Roe", title: "CEO", linkedin_url: "li.com/sam" },
          ],
        }),
      )
      .on(
        "team_people",
        JSON.stringify({ people: [{ full_name: "Omar Lee", title: "CTO", linkedin_url: "https://li.com/omar" }] }),
      );

    const report = await runPipeline({ config: scoutConfig({ limits }), ledger: new InMemoryLedger(), fetcher, llm });

    expect(report.counts.feedItems).toBe(1);
    expect(fetcher.callsTo(A2)).toBe(0);
    expect(report.counts.companies).toBe(1);
    expect(llm.callsOf("article_people")).toBe(1);
    expect(llm.callsOf("website")).toBe(0);
    expect(report.counts.peopleFromArticles).toBe(1);
    expect(llm.callsOf("vetting")).toBe(1);
    expect(report.candidates.map((candidate) => candidate.person.name)).toEqual(["Jane Doe"]);
  });

  it("never computes fit for people below the response gate", async () => {
    const fitScore = vi.fn(() => ({ score: 10, reasons: "should not be asked" }));
    const scorer: Scorer = {
      responseScore: () => ({ score: 0.1, reasons: "busy" }),
      fitScore,
    };
    const sink = new RecordingSink();

    const report = await runPipeline({
      ledger: new InMemoryLedger(),
      fetcher: acmeFetcher(),
      llm: acmeLlm(),
      sink,
      scorer,
    });

    expect(fitScore).not.toHaveBeenCalled();
    expect(report.counts.failedResponseGate).toBe(1);
    expect(report.counts.qualified).toBe(0);
    expect(report.state).toBe("DONE");
    expect(sink.writes).toEqual([]);
  });

  it("drops people who fail the total score threshold", async () => {
    const report = await runPipeline({
      config: scoutConfig({ limits: { ...makeConfig().limits, minScoreThreshold: 5 } }),
      ledger: new InMemoryLedger(),
      fetcher: acmeFetcher(),
      llm: acmeLlm(),
    });

    expect(report.counts.failedScoreThreshold).toBe(1);
    expect(report.candidates).toEqual([]);
  });

  it("filters people the vetting rejects unless asked to keep them", async () => {
    const rejecting = JSON.stringify({ ...JSON.parse(VETTING_MATCH), matches_criteria: false });

    const strict = await runPipeline({
      ledger: new InMemoryLedger(),
      fetcher: acmeFetcher(),
      llm: acmeLlm().on("vetting", rejecting),
    });
    const lenient = await runPipeline({
      config: scoutConfig({ debugKeepNonmatching: true }),
      ledger: new InMemoryLedger(),
      fetcher: acmeFetcher(),
      llm: acmeLlm().on("vetting", rejecting),
    });

    expect(strict.counts.rejectedByVetting).toBe(1);
    expect(strict.candidates).toEqual([]);
    expect(lenient.counts.qualified).toBe(1);
  });

  it("reports a vetting failure against the person and carries on", async () => {
    const ledger = new InMemoryLedger();
    const report = await runPipeline({
      ledger,
      fetcher: acmeFetcher(),
      llm: acmeLlm().on("vetting", new Error("overloaded")),
      feedItems: [feedItem(A1, "Acme raises a seed round")],
    });

    expect(report.state).toBe("DONE");
    expect(report.counts.vettingFailed).toBe(1);
    expect(report.failures).toEqual([
      {
        stage: "vetting",
        url: TEAM_URL,
        subject: "Jane Doe",
        kind: "EXTRACTION_ERROR",
        message: "LLM call failed for vetting: overloaded",
      },
    ]);
    expect(report.counts.urlsReleased).toBe(2);
    expect(await ledger.hasSeen(A1)).toBe(false);
    expect(await ledger.hasSeen(TEAM_URL)).toBe(false);

    const retry = await runPipeline({
      ledger,
      fetcher: acmeFetcher(),
      llm: acmeLlm(),
      feedItems: [feedItem(A1)],
      runId: "run-2",
    });
    expect(retry.counts.qualified).toBe(1);
  });

  it("counts a missing team page without reporting it", async () => {
    const ledger = new InMemoryLedger();
    const fetcher = acmeFetcher().set(TEAM_URL, { status: 404, content: "" });

    const report = await runPipeline({ ledger, fetcher, llm: acmeLlm(), feedItems: [feedItem(A1)] });

    expect(report.failures).toEqual([]);
    expect(report.counts.teamPagesFailed).toBe(1);
    expect(report.counts.peopleFromArticles).toBe(1);
    expect(report.candidates.map((candidate) => candidate.person.title)).toEqual(["Co-founder"]);
    expect(await ledger.hasSeen(TEAM_URL)).toBe(false);
  });

  it("finishes with the output error when the sink fails and leaves the work to the next run", async () => {
    const ledger = new InMemoryLedger();
    const fetcher = acmeFetcher();

    const report = await runPipeline({
      ledger,
      fetcher,
      llm: acmeLlm(),
      sink: new RecordingSink(new OutputError("Failed to write out.csv: read-only file system")),
    });

    expect(report.state).toBe("DONE");
    expect(report.outputError).toBe("Failed to write out.csv: read-only file system");
    expect(report.outputLocation).toBeUndefined();
    expect(report.counts.urlsRecorded).toBe(0);
    expect(await ledger.hasSeen(A1)).toBe(false);
    const [run] = await ledger.listRecentRuns(1);
    expect(run.status).toBe("failed");

    const sink = new RecordingSink();
    await runPipeline({ ledger, fetcher, llm: acmeLlm(), sink, runId: "run-2" });
    expect(sink.writes[0].map((candidate) => candidate.person.name)).toEqual(["Jane Doe"]);
    expect(await ledger.hasSeen(A1)).toBe(true);
  });
});

describe("rankCandidates", () => {
  it("orders by total score and keeps discovery order on ties", () => {
    const base = {
      companyName: "Acme",
      vetting: { industryExperience: [], matchesCriteria: true, reasoning: "" },
      fitScore: 0,
      fitReasons: "",
      responseScore: 0,
      responseReasons: "",
      sourceArticleUrl: A1,
      discoveredAt: NOW,
    };
    const person = (name: string) => ({ name, source: "article" as const, sourceUrl: A1, sourceUrls: [A1] });
    const ranked = rankCandidates([
      { ...base, person: person("low"), totalScore: 1 },
      { ...base, person: person("first tie"), totalScore: 2 },
      { ...base, person: person("second tie"), totalScore: 2 },
    ]);

    expect(ranked.map((candidate) => candidate.person.name)).toEqual(["first tie", "second tie", "low"]);
  });
});
