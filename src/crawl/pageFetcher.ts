import { fetch } from "undici";
import { AppConfig } from "../config";
import { FetchError, errorMessage } from "../core/errors";
import { getFetchDispatcher } from "../core/fetch";
import { RateLimiter, hostKey } from "../core/rateLimiter";
import { MetricsRegistry } from "../observability";

export interface FetchedPage {
  /** Final URL after redirects. */
  url: string;
  status: number;
  content: string;
}

export interface PageFetcher {
  /** Resolves for any HTTP status; rejects with FetchError when no response arrives. */
  fetch(url: string): Promise<FetchedPage>;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

type FetcherSettings = Pick<AppConfig, "userAgent" | "requestTimeoutMs" | "ignoreHttpsErrors">;

export class HttpPageFetcher implements PageFetcher {
  constructor(
    private readonly config: FetcherSettings,
    private readonly limiter?: RateLimiter,
    private readonly metrics?: MetricsRegistry,
  ) {}

  async fetch(url: string): Promise<FetchedPage> {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      throw new FetchError(`Invalid URL: ${url}`, { url }, error);
    }
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      throw new FetchError(`Unsupported protocol ${target.protocol} for ${url}`, { url });
    }

    const run = () => this.fetchOnce(target.toString());
    return this.limiter ? this.limiter.schedule(hostKey(url), run) : run();
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    const stopTimer = this.metrics?.startTimer("page_fetch_ms");
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
          accept: "text/html,application/xhtml+xml,application/rss+xml,application/xml;q=0.9,*/*;q=0.8",
        },
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });

      return {
        url: response.url || url,
        status: response.status,
        content: await response.text(),
      };
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${this.config.requestTimeoutMs}ms` : errorMessage(error);
      throw new FetchError(`Request to ${url} failed: ${reason}`, { url }, error);
    } finally {
      clearTimeout(timeout);
      stopTimer?.();
    }
  }
}
