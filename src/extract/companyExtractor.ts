import { ExtractionError } from "../core/errors";
import { Result, fail, ok } from "../core/result";
import { StructuredExtractor, companyExtractionPrompt, companyExtractionSchema } from "../llm";
import { Article, CompanyMention } from "../types";

function normalizeCompanyName(name: string): string {
  return name.replace(/\s+/g, " ").trim().toLowerCase();
}

export class CompanyExtractor {
  constructor(
    private readonly llm: StructuredExtractor,
    private readonly maxCompaniesPerArticle: number,
  ) {}

  /** Companies in order of mention, one per name, at most `maxCompaniesPerArticle`. */
  async extract(article: Article): Promise<Result<CompanyMention[], ExtractionError>> {
    const outcome = await this.llm.extract(companyExtractionPrompt(article.text), companyExtractionSchema, "companies");
    if (!outcome.ok) {
      return fail(outcome.error);
    }

    const seen = new Set<string>();
    const companies: CompanyMention[] = [];
    for (const mention of outcome.value.companies) {
      const key = normalizeCompanyName(mention.name);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      companies.push({
        name: mention.name,
        description: mention.description,
        website: mention.website,
        teamPageUrl: mention.team_page_url,
        mentionedContext: mention.mentioned_context,
        sourceArticleUrl: article.url,
      });
      if (companies.length >= this.maxCompaniesPerArticle) {
        break;
      }
    }
    return ok(companies);
  }
}
