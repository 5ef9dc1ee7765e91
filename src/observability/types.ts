export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LogFields {
  url?: string;
  feed?: string;
  company?: string;
  state?: string;
  [key: string]: unknown;
}

export const METRIC_COUNTER_NAMES = [
  "feeds_fetched",
  "feeds_failed",
  "feed_items",
  "articles_ok",
  "articles_failed",
  "articles_skipped_seen",
  "team_pages_ok",
  "team_pages_failed",
  "team_pages_skipped_seen",
  "llm_calls",
  "llm_invalid_responses",
  "llm_failures",
  "people_vetted",
  "candidates_qualified",
] as const;

export type MetricCounterName = (typeof METRIC_COUNTER_NAMES)[number];

export const METRIC_TIMER_NAMES = ["feed_fetch_ms", "page_fetch_ms", "llm_call_ms"] as const;

export type MetricTimerName = (typeof METRIC_TIMER_NAMES)[number];

/** Counter prefix shared by the fetch-and-extract stages. */
export type StageMetricPrefix = "articles" | "team_pages";
