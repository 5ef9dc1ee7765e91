import Parser from "rss-parser";
import { FetchError, errorMessage } from "../core/errors";
import { PageFetcher, isSuccessStatus } from "../crawl/pageFetcher";
import { FeedConfig, FeedItem } from "../types";

export interface FeedSource {
  /** Rejects with FetchError when the feed cannot be retrieved or parsed. */
  fetchFeed(feed: FeedConfig): Promise<FeedItem[]>;
}

function toIsoDate(isoDate: string | undefined, pubDate: string | undefined): string | undefined {
  if (isoDate) {
    return isoDate;
  }
  if (!pubDate) {
    return undefined;
  }
  const parsed = new Date(pubDate);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}

function cleanText(value: string | undefined): string | undefined {
  const trimmed = value?.replace(/\s+/g, " ").trim();
  return trimmed ? trimmed : undefined;
}

export class RssFeedSource implements FeedSource {
  private readonly parser = new Parser<object, object>();

  constructor(private readonly fetcher: PageFetcher) {}

  async fetchFeed(feed: FeedConfig): Promise<FeedItem[]> {
    const page = await this.fetcher.fetch(feed.url);
    if (!isSuccessStatus(page.status)) {
      throw new FetchError(`Feed ${feed.name} returned HTTP ${page.status}`, {
        url: feed.url,
        status: page.status,
      });
    }

    let parsed: Parser.Output<object>;
    try {
      parsed = await this.parser.parseString(page.content);
    } catch (error) {
      throw new FetchError(`Feed ${feed.name} is not valid RSS/Atom: ${errorMessage(error)}`, { url: feed.url }, error);
    }

    const items: FeedItem[] = [];
    for (const item of parsed.items ?? []) {
      const url = (item.link ?? item.guid)?.trim();
      if (!url) {
        continue;
      }
      items.push({
        url,
        title: cleanText(item.title) ?? "No title",
        publishedAt: toIsoDate(item.isoDate, item.pubDate),
        description: cleanText(item.contentSnippet ?? item.summary),
        feedName: feed.name,
      });
    }
    return items;
  }
}
