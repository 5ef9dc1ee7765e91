/**
 * Logical classification of a ledger entry. Team/about pages scraped for
 * people are recorded as `company`; `person` is reserved for individual
 * profile pages.
 */
export type ItemType = "article" | "company" | "person";

export const ITEM_TYPES: readonly ItemType[] = ["article", "company", "person"];

export interface SeenRecord {
  url: string;
  itemType: ItemType;
  firstSeen: string;
  lastUpdated: string;
}

export interface FeedConfig {
  name: string;
  url: string;
}

export interface FeedItem {
  url: string;
  title: string;
  publishedAt?: string;
  description?: string;
  feedName: string;
}

export interface Article {
  url: string;
  title: string;
  rawHtml: string;
  text: string;
  fetchedAt: string;
}

export interface RelevanceVerdict {
  isRelevant: boolean;
  reason: string;
  confidence: number;
}

export interface CompanyMention {
  name: string;
  description?: string;
  website?: string;
  teamPageUrl?: string;
  mentionedContext?: string;
  sourceArticleUrl: string;
}

export type PersonSource = "article" | "team_page";

export interface PersonCandidate {
  name: string;
  title?: string;
  linkedinUrl?: string;
  email?: string;
  bio?: string;
  source: PersonSource;
  sourceUrl: string;
  /** Every page this person was found on, in discovery order. */
  sourceUrls: string[];
}

export interface PersonVetting {
  school?: string;
  roleCategory?: string;
  seniorityLevel?: string;
  location?: string;
  industryExperience: string[];
  matchesCriteria: boolean;
  reasoning: string;
}

export interface CandidateScores {
  fitScore: number;
  fitReasons: string;
  responseScore: number;
  responseReasons: string;
}

export interface ScoredCandidate extends CandidateScores {
  person: PersonCandidate;
  companyName: string;
  vetting: PersonVetting;
  totalScore: number;
  sourceArticleUrl: string;
  discoveredAt: string;
}
