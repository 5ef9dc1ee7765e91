import { ExtractionError, FetchError } from "../core/errors";
import { Result, fail } from "../core/result";
import { extractReadableText } from "../crawl/htmlParser";
import { PageFetcher, isSuccessStatus } from "../crawl/pageFetcher";
import { TeamUrlFinder } from "../crawl/teamUrlFinder";
import { PeopleExtractor } from "../extract/peopleExtractor";
import { Logger, MetricsRegistry } from "../observability";
import { FailureEntry, runFetchAndExtract, toFailureEntry } from "../pipeline/stage";
import { SeenLedger } from "../store";
import { Article, CompanyMention, PersonCandidate } from "../types";
import { mergePersonCandidates } from "./identity";

export interface ResolvedPeople {
  people: PersonCandidate[];
  fromArticle: number;
  fromTeamPages: number;
  teamPages: {
    processed: number;
    skipped: number;
    failed: number;
  };
  /** Item-level failures worth reporting. Team-page fetch misses are expected and left out. */
  failures: FailureEntry[];
}

export interface PersonResolverDeps {
  people: PeopleExtractor;
  teamUrls: TeamUrlFinder;
  fetcher: PageFetcher;
  ledger: SeenLedger;
  logger: Logger;
  metrics?: MetricsRegistry;
  maxPeoplePerCompany: number;
}

interface TeamPageTarget {
  url: string;
}

export class PersonResolver {
  private readonly logger: Logger;

  constructor(private readonly deps: PersonResolverDeps) {
    this.logger = deps.logger.child("person_resolver");
  }

  /**
   * Tier 1: people the article names for `company`. Part of the article's
   * own work unit, so a failure here leaves the article unrecorded.
   */
  async fromArticle(company: CompanyMention, article: Article): Promise<Result<PersonCandidate[], ExtractionError>> {
    const people = await this.deps.people.fromArticle(article, company.name);
    if (!people.ok) {
      this.logger.warn("article_people_failed", { url: article.url, company: company.name, error: people.error.message });
    }
    return people;
  }

  /** Tier 2 over the company's team pages, merged with the Tier 1 people already found. */
  async resolve(
    company: CompanyMention,
    article: Article,
    articlePeople: readonly PersonCandidate[],
  ): Promise<ResolvedPeople> {
    const failures: FailureEntry[] = [];

    const teamUrls = await this.deps.teamUrls.findTeamUrls(company, article);
    const targets: TeamPageTarget[] = teamUrls.map((url) => ({ url }));
    const stage = await runFetchAndExtract({
      stage: "team_page",
      items: targets,
      itemType: "company",
      ledger: this.deps.ledger,
      logger: this.logger,
      metrics: this.deps.metrics,
      metricPrefix: "team_pages",
      subject: () => company.name,
      worker: (target) => this.extractTeamPage(target.url, company.name),
    });

    const teamPeople = stage.succeeded.flatMap((success) => success.value);
    failures.push(...stage.failures.filter((failure) => failure.kind !== "FETCH_ERROR"));

    const people = mergePersonCandidates([...articlePeople, ...teamPeople]).slice(0, this.deps.maxPeoplePerCompany);
    this.logger.info("company_resolved", {
      company: company.name,
      fromArticle: articlePeople.length,
      fromTeamPages: teamPeople.length,
      merged: people.length,
    });

    return {
      people,
      fromArticle: articlePeople.length,
      fromTeamPages: teamPeople.length,
      teamPages: {
        processed: stage.succeeded.length,
        skipped: stage.skipped.length,
        failed: stage.failures.length,
      },
      failures,
    };
  }

  private async extractTeamPage(url: string, companyName: string): Promise<Result<PersonCandidate[]>> {
    const page = await this.deps.fetcher.fetch(url);
    if (!isSuccessStatus(page.status)) {
      return fail(new FetchError(`HTTP ${page.status} while fetching ${url}`, { url, status: page.status }));
    }
    const text = extractReadableText(page.content);
    if (!text) {
      return fail(new FetchError(`No readable text at ${url}`, { url, status: page.status }));
    }
    return this.deps.people.fromTeamPage(text, url, companyName);
  }
}
