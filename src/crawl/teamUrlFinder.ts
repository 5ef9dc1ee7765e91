import { errorMessage, isFatalError } from "../core/errors";
import { WebsiteExtractor } from "../extract/websiteExtractor";
import { Logger } from "../observability";
import { Article, CompanyMention } from "../types";
import { extractTeamLinks } from "./htmlParser";
import { PageFetcher, isSuccessStatus } from "./pageFetcher";

export const TEAM_PAGE_PATHS = [
  "/team",
  "/about",
  "/about-us",
  "/company",
  "/leadership",
  "/people",
  "/our-team",
  "/careers",
  "/about/team",
] as const;

const COMPANY_SUFFIXES = [" inc", " inc.", " llc", " ltd", " corp", " corporation"];
const MAX_INFERRED_DOMAIN_LENGTH = 20;

function toOrigin(value: string): string | undefined {
  const candidate = /^https?:\/\//i.test(value) ? value : `https://${value}`;
  try {
    const url = new URL(candidate);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return undefined;
    }
    return url.origin;
  } catch {
    return undefined;
  }
}

function toAbsoluteUrl(value: string): string | undefined {
  try {
    const url = new URL(/^https?:\/\//i.test(value) ? value : `https://${value}`);
    url.hash = "";
    return url.toString();
  } catch {
    return undefined;
  }
}

/**
 * Guesses `https://<name>.com` for short, plain company names. Returns
 * undefined for anything that would need more than stripping a legal suffix
 * and separators.
 */
export function inferWebsiteFromName(companyName: string): string | undefined {
  let name = companyName.toLowerCase().trim();
  for (const suffix of COMPANY_SUFFIXES) {
    if (name.endsWith(suffix)) {
      name = name.slice(0, -suffix.length).trim();
    }
  }
  const domain = name.replace(/[\s_-]/g, "");
  if (domain.length === 0 || domain.length > MAX_INFERRED_DOMAIN_LENGTH || !/^[a-z0-9]+$/.test(domain)) {
    return undefined;
  }
  return `https://${domain}.com`;
}

export function synthesizeTeamPageUrls(websiteUrl: string): string[] {
  const origin = toOrigin(websiteUrl);
  return origin ? TEAM_PAGE_PATHS.map((suffix) => `${origin}${suffix}`) : [];
}

export interface TeamUrlFinderDeps {
  fetcher: PageFetcher;
  websites: WebsiteExtractor;
  logger: Logger;
  maxCandidates: number;
}

export class TeamUrlFinder {
  private readonly logger: Logger;

  constructor(private readonly deps: TeamUrlFinderDeps) {
    this.logger = deps.logger.child("team_url_finder");
  }

  /** Candidate team/about pages for a company, best first, capped at `maxCandidates`. */
  async findTeamUrls(company: CompanyMention, article: Article): Promise<string[]> {
    if (company.teamPageUrl) {
      const explicit = toAbsoluteUrl(company.teamPageUrl);
      if (explicit) {
        return [explicit];
      }
    }

    const website = await this.resolveWebsite(company, article);
    if (!website) {
      this.logger.debug("team_url_no_website", { company: company.name });
      return [];
    }

    const homepageLinks = await this.scanHomepage(website, company.name);
    const unique = [...new Set([...homepageLinks, ...synthesizeTeamPageUrls(website)])];
    const candidates = unique.slice(0, this.deps.maxCandidates);
    this.logger.debug("team_url_candidates", { company: company.name, website, count: candidates.length });
    return candidates;
  }

  private async resolveWebsite(company: CompanyMention, article: Article): Promise<string | undefined> {
    const stated = company.website ? toOrigin(company.website) : undefined;
    if (stated) {
      return stated;
    }

    const extracted = await this.deps.websites.find(company.name, article);
    if (extracted.ok && extracted.value) {
      const origin = toOrigin(extracted.value);
      if (origin) {
        return origin;
      }
    }
    if (!extracted.ok) {
      this.logger.debug("website_extraction_failed", { company: company.name, error: extracted.error.message });
    }

    return inferWebsiteFromName(company.name);
  }

  private async scanHomepage(website: string, companyName: string): Promise<string[]> {
    try {
      const page = await this.deps.fetcher.fetch(website);
      if (!isSuccessStatus(page.status)) {
        this.logger.debug("homepage_fetch_status", { company: companyName, url: website, status: page.status });
        return [];
      }
      return extractTeamLinks(page.content, page.url);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      this.logger.debug("homepage_fetch_failed", { company: companyName, url: website, error: errorMessage(error) });
      return [];
    }
  }
}
