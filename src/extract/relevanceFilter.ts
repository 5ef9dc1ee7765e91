import { AppConfig } from "../config";
import { ExtractionError } from "../core/errors";
import { Result, fail, ok } from "../core/result";
import { StructuredExtractor, relevancePrompt, relevanceSchema } from "../llm";
import { Article, RelevanceVerdict } from "../types";

export class RelevanceFilter {
  constructor(
    private readonly llm: StructuredExtractor,
    private readonly keywords: AppConfig["keywords"],
  ) {}

  async check(article: Article): Promise<Result<RelevanceVerdict, ExtractionError>> {
    const outcome = await this.llm.extract(
      relevancePrompt(article.title, article.text, this.keywords),
      relevanceSchema,
      "relevance",
    );
    if (!outcome.ok) {
      return fail(outcome.error);
    }
    return ok({
      isRelevant: outcome.value.is_relevant,
      reason: outcome.value.reason,
      confidence: outcome.value.confidence,
    });
  }
}
