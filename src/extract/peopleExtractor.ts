import { ExtractionError } from "../core/errors";
import { Result, fail, ok } from "../core/result";
import {
  PeopleExtractionOutput,
  StructuredExtractor,
  articlePeoplePrompt,
  peopleExtractionSchema,
  teamPagePeoplePrompt,
} from "../llm";
import { Article, PersonCandidate, PersonSource } from "../types";

export class PeopleExtractor {
  constructor(
    private readonly llm: StructuredExtractor,
    private readonly maxPeoplePerCompany: number,
  ) {}

  /** Tier 1: people named in the article itself, excluding its authors. */
  async fromArticle(article: Article, companyName: string): Promise<Result<PersonCandidate[], ExtractionError>> {
    const outcome = await this.llm.extract(
      articlePeoplePrompt(article.title, article.text, companyName),
      peopleExtractionSchema,
      "article_people",
    );
    return outcome.ok ? ok(this.toCandidates(outcome.value, "article", article.url)) : fail(outcome.error);
  }

  /** Tier 2: people listed on a company team/about page. */
  async fromTeamPage(
    pageText: string,
    pageUrl: string,
    companyName: string,
  ): Promise<Result<PersonCandidate[], ExtractionError>> {
    const outcome = await this.llm.extract(
      teamPagePeoplePrompt(pageText, companyName),
      peopleExtractionSchema,
      "team_page_people",
    );
    return outcome.ok ? ok(this.toCandidates(outcome.value, "team_page", pageUrl)) : fail(outcome.error);
  }

  private toCandidates(output: PeopleExtractionOutput, source: PersonSource, sourceUrl: string): PersonCandidate[] {
    return output.people.slice(0, this.maxPeoplePerCompany).map((person) => ({
      name: person.full_name,
      title: person.title,
      linkedinUrl: person.linkedin_url,
      email: person.email,
      bio: person.bio,
      source,
      sourceUrl,
      sourceUrls: [sourceUrl],
    }));
  }
}
