import { AppConfig, ConfigInput, appConfigSchema } from "../../src/config";
import { FetchError } from "../../src/core/errors";
import { FetchedPage, PageFetcher } from "../../src/crawl/pageFetcher";
import { FeedSource } from "../../src/feed/rssFeed";
import { LlmProvider } from "../../src/llm";
import { Logger } from "../../src/observability";
import { FeedConfig, FeedItem } from "../../src/types";

export function silentLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", level: "silent" });
}

export function makeConfig(overrides: Partial<ConfigInput> = {}): AppConfig {
  return appConfigSchema.parse({
    feeds: [{ name: "Startup News", url: "https://feeds.test/startups.xml" }],
    politeDelayMs: 0,
    ...overrides,
  });
}

export function htmlPage(body: string): string {
  return `<html><head><title>Test page</title><script>var tracking = true;</script></head><body>${body}</body></html>`;
}

type PageResponse = { status: number; content: string } | Error;

export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];
  private readonly pages = new Map<string, PageResponse>();

  set(url: string, response: PageResponse): this {
    this.pages.set(url, response);
    return this;
  }

  ok(url: string, content: string): this {
    return this.set(url, { status: 200, content });
  }

  async fetch(url: string): Promise<FetchedPage> {
    this.calls.push(url);
    const response = this.pages.get(url);
    if (response instanceof Error) {
      throw response;
    }
    if (!response) {
      return { url, status: 404, content: "" };
    }
    return { url, ...response };
  }

  callsTo(url: string): number {
    return this.calls.filter((call) => call === url).length;
  }
}

export class FakeFeedSource implements FeedSource {
  readonly calls: string[] = [];

  constructor(private readonly feeds: Record<string, FeedItem[] | Error>) {}

  async fetchFeed(feed: FeedConfig): Promise<FeedItem[]> {
    this.calls.push(feed.url);
    const items = this.feeds[feed.url];
    if (items instanceof Error) {
      throw items;
    }
    if (!items) {
      throw new FetchError(`no feed at ${feed.url}`, { url: feed.url });
    }
    return items;
  }
}

export type PromptKind = "relevance" | "companies" | "article_people" | "team_people" | "website" | "vetting";

const PROMPT_MARKERS: Array<[PromptKind, string]> = [
  ["relevance", "Analyze this article and determine if it's relevant"],
  ["companies", "Extract all startup companies"],
  ["article_people", "Extract people associated with the company"],
  ["team_people", "Extract team members from this company team/about page"],
  ["website", "Extract the website URL"],
  ["vetting", "Analyze this person's profile"],
];

export function promptKind(prompt: string): PromptKind {
  const match = PROMPT_MARKERS.find(([, marker]) => prompt.startsWith(marker));
  if (!match) {
    throw new Error(`unrecognized prompt: ${prompt.slice(0, 60)}`);
  }
  return match[0];
}

export type ScriptedAnswer = string | Error | ((prompt: string) => string);

/**
 * Answers prompts by kind. A list of answers is consumed in order; the last
 * one repeats.
 */
export class ScriptedLlm implements LlmProvider {
  readonly name = "anthropic";
  readonly model = "test-model";
  readonly prompts: string[] = [];
  private readonly script = new Map<PromptKind, ScriptedAnswer[]>();

  on(kind: PromptKind, ...answers: ScriptedAnswer[]): this {
    this.script.set(kind, answers);
    return this;
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const kind = promptKind(prompt);
    const answers = this.script.get(kind);
    if (!answers || answers.length === 0) {
      throw new Error(`no scripted answer for ${kind}`);
    }
    const answer = answers.length > 1 ? answers.shift() : answers[0];
    if (answer === undefined) {
      throw new Error(`no scripted answer for ${kind}`);
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return typeof answer === "function" ? answer(prompt) : answer;
  }

  callsOf(kind: PromptKind): number {
    return this.prompts.filter((prompt) => promptKind(prompt) === kind).length;
  }
}

export function feedItem(url: string, title = "Startup news"): FeedItem {
  return { url, title, feedName: "Startup News" };
}
