import { ScoredCandidate } from "../types";
import { OutputRow } from "./types";

function profileUrls(candidate: ScoredCandidate): string[] {
  const urls = [candidate.person.linkedinUrl, ...candidate.person.sourceUrls].filter(
    (url): url is string => Boolean(url) && url !== candidate.sourceArticleUrl,
  );
  return [...new Set(urls)];
}

export function formatScore(value: number): string {
  return value.toFixed(2);
}

export function toOutputRow(candidate: ScoredCandidate): OutputRow {
  const { person, vetting } = candidate;
  return {
    name: person.name,
    title: person.title ?? "",
    company: candidate.companyName,
    fit_score: formatScore(candidate.fitScore),
    response_score: formatScore(candidate.responseScore),
    total_score: formatScore(candidate.totalScore),
    fit_reasons: candidate.fitReasons,
    response_reasons: candidate.responseReasons,
    source_article_url: candidate.sourceArticleUrl,
    source_profile_urls: profileUrls(candidate).join(", "),
    linkedin_url: person.linkedinUrl ?? "",
    email: person.email ?? "",
    school: vetting.school ?? "",
    role: vetting.roleCategory ?? "",
    seniority: vetting.seniorityLevel ?? "",
    location: vetting.location ?? "",
    industries: vetting.industryExperience.join(", "),
    discovered_date: candidate.discoveredAt.slice(0, 10),
  };
}
