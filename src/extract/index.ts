import { AppConfig } from "../config";
import { PageFetcher } from "../crawl/pageFetcher";
import { StructuredExtractor } from "../llm";
import { ArticleExtractor } from "./articleExtractor";
import { CompanyExtractor } from "./companyExtractor";
import { PeopleExtractor } from "./peopleExtractor";
import { PersonVetter } from "./personVetter";
import { RelevanceFilter } from "./relevanceFilter";
import { WebsiteExtractor } from "./websiteExtractor";

/** Every LLM-backed extraction step the pipeline uses, built from one config. */
export interface ExtractionSuite {
  articles: ArticleExtractor;
  relevance: RelevanceFilter;
  companies: CompanyExtractor;
  people: PeopleExtractor;
  websites: WebsiteExtractor;
  vetter: PersonVetter;
}

export function createExtractionSuite(config: AppConfig, fetcher: PageFetcher, llm: StructuredExtractor): ExtractionSuite {
  return {
    articles: new ArticleExtractor(fetcher),
    relevance: new RelevanceFilter(llm, config.keywords),
    companies: new CompanyExtractor(llm, config.limits.maxCompaniesPerArticle),
    people: new PeopleExtractor(llm, config.limits.maxPeoplePerCompany),
    websites: new WebsiteExtractor(llm),
    vetter: new PersonVetter(llm, config.preferences),
  };
}

export * from "./articleExtractor";
export * from "./companyExtractor";
export * from "./peopleExtractor";
export * from "./personVetter";
export * from "./relevanceFilter";
export * from "./websiteExtractor";
