import { ExtractionError } from "../core/errors";
import { Result, fail, ok } from "../core/result";
import { StructuredExtractor, websiteExtractionPrompt, websiteExtractionSchema } from "../llm";
import { Article } from "../types";

const MIN_WEBSITE_CONFIDENCE = 0.5;

function toHttpUrl(value: string): string | undefined {
  const candidate = /^https?:\/\//i.test(value) ? value : `https://${value}`;
  try {
    const url = new URL(candidate);
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}

export class WebsiteExtractor {
  constructor(private readonly llm: StructuredExtractor) {}

  /** The company's website as stated in the article; undefined below the confidence bar. */
  async find(companyName: string, article: Article): Promise<Result<string | undefined, ExtractionError>> {
    const outcome = await this.llm.extract(
      websiteExtractionPrompt(companyName, article.text),
      websiteExtractionSchema,
      "website",
    );
    if (!outcome.ok) {
      return fail(outcome.error);
    }
    const { website_url: websiteUrl, confidence } = outcome.value;
    if (!websiteUrl || confidence <= MIN_WEBSITE_CONFIDENCE) {
      return ok(undefined);
    }
    return ok(toHttpUrl(websiteUrl));
  }
}
