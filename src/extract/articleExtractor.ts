import { FetchError } from "../core/errors";
import { extractReadableText, extractTitle } from "../crawl/htmlParser";
import { PageFetcher, isSuccessStatus } from "../crawl/pageFetcher";
import { Article, FeedItem } from "../types";

export class ArticleExtractor {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Fetches and cleans an article. Rejects with FetchError on a non-2xx status or an empty page. */
  async fetchArticle(item: Pick<FeedItem, "url" | "title">): Promise<Article> {
    const page = await this.fetcher.fetch(item.url);
    if (!isSuccessStatus(page.status)) {
      throw new FetchError(`HTTP ${page.status} while fetching ${item.url}`, { url: item.url, status: page.status });
    }

    const text = extractReadableText(page.content);
    if (!text) {
      throw new FetchError(`No readable text at ${item.url}`, { url: item.url, status: page.status });
    }

    return {
      url: item.url,
      title: item.title && item.title !== "No title" ? item.title : extractTitle(page.content) ?? item.title,
      rawHtml: page.content,
      text,
      fetchedAt: this.now().toISOString(),
    };
  }
}
