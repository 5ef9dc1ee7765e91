import { load } from "cheerio";

const NOISE_SELECTORS = "script, style, noscript, svg, iframe, template, head";
const BLOCK_SELECTORS = "p, div, section, article, li, h1, h2, h3, h4, h5, h6, tr, header, footer";
const MAIN_CONTENT_SELECTORS = ["article", "main", "[role='main']"];
const MIN_MAIN_CONTENT_CHARS = 200;

export const TEAM_LINK_KEYWORDS = ["team", "about", "leadership", "people", "company", "our-team"] as const;
/** "company" is left out: anchor text like "Company blog" is too common. */
const TEAM_ANCHOR_KEYWORDS = ["team", "about", "leadership", "people"] as const;

function sanitizeText(value: string): string {
  return value
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    const url = new URL(href, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return undefined;
    }
    url.hash = "";
    return url.toString();
  } catch {
    return undefined;
  }
}

function bareHost(host: string): string {
  return host.toLowerCase().replace(/^www\./, "");
}

/**
 * Visible text of an HTML page, one block element per line. Prefers the
 * article/main region when it carries enough text.
 */
export function extractReadableText(html: string): string {
  const $ = load(html);
  $(NOISE_SELECTORS).remove();
  $("br").replaceWith("\n");
  $(BLOCK_SELECTORS).each((_, element) => {
    $(element).append("\n");
  });

  for (const selector of MAIN_CONTENT_SELECTORS) {
    const region = sanitizeText($(selector).first().text());
    if (region.length >= MIN_MAIN_CONTENT_CHARS) {
      return region;
    }
  }
  return sanitizeText($("body").text() || $.root().text());
}

export function extractTitle(html: string): string | undefined {
  const $ = load(html);
  const title =
    $("meta[property='og:title']").attr("content") || $("title").first().text() || $("h1").first().text();
  const cleaned = title.replace(/\s+/g, " ").trim();
  return cleaned || undefined;
}

/**
 * Same-site links whose path or anchor text mentions a team-related
 * keyword, in document order, without duplicates.
 */
export function extractTeamLinks(html: string, pageUrl: string): string[] {
  const $ = load(html);
  const pageHost = bareHost(new URL(pageUrl).host);
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href) {
      return;
    }

    const normalizedUrl = normalizeUrl(pageUrl, href);
    if (!normalizedUrl) {
      return;
    }
    const url = new URL(normalizedUrl);
    if (bareHost(url.host) !== pageHost) {
      return;
    }

    const path = url.pathname.toLowerCase();
    const anchorText = $(element).text().toLowerCase();
    const looksLikeTeamPage =
      TEAM_LINK_KEYWORDS.some((keyword) => path.includes(keyword)) ||
      TEAM_ANCHOR_KEYWORDS.some((keyword) => anchorText.includes(keyword));
    if (!looksLikeTeamPage) {
      return;
    }

    if (seen.has(normalizedUrl)) {
      return;
    }
    seen.add(normalizedUrl);
    links.push(normalizedUrl);
  });

  return links;
}
