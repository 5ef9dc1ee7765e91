import { ScoredCandidate } from "../types";

export interface OutputSink {
  /** Where the output ends up, for the run report. */
  readonly location: string;
  /** Writes the ranked candidates. Rejects with OutputError. */
  write(candidates: readonly ScoredCandidate[]): Promise<void>;
}

export const OUTPUT_COLUMNS = [
  "name",
  "title",
  "company",
  "fit_score",
  "response_score",
  "total_score",
  "fit_reasons",
  "response_reasons",
  "source_article_url",
  "source_profile_urls",
  "linkedin_url",
  "email",
  "school",
  "role",
  "seniority",
  "location",
  "industries",
  "discovered_date",
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

export type OutputRow = Record<OutputColumn, string>;
