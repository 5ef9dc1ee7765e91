import { Preferences } from "../config";

const ARTICLE_RELEVANCE_CHARS = 2000;
const ARTICLE_COMPANIES_CHARS = 4000;
const ARTICLE_PEOPLE_CHARS = 5000;
const ARTICLE_WEBSITE_CHARS = 3000;
const TEAM_PAGE_CHARS = 6000;

function listOr(values: readonly string[], fallback: string): string {
  return values.length > 0 ? values.join(", ") : fallback;
}

export function relevancePrompt(
  title: string,
  text: string,
  keywords: { include: readonly string[]; exclude: readonly string[] },
): string {
  return `Analyze this article and determine if it's relevant for finding startup team members to network with.

Article Title: ${title}

Article Text (first ${ARTICLE_RELEVANCE_CHARS} chars):
${text.slice(0, ARTICLE_RELEVANCE_CHARS)}

Keywords that indicate relevance: ${listOr(keywords.include, "none given")}
Keywords that indicate irrelevance: ${listOr(keywords.exclude, "none given")}

Determine if this article:
1. Mentions startups, new companies, or entrepreneurial ventures
2. Discusses hiring, team building, or new team members
3. Covers funding rounds, product launches, or company milestones
4. Contains information that could help identify people to reach out to

Return your analysis as JSON with:
- is_relevant: boolean (true if article is useful for networking outreach)
- reason: string (brief explanation of your decision)
- confidence: number between 0.0 and 1.0`;
}

export function companyExtractionPrompt(text: string): string {
  return `Extract all startup companies and their teams mentioned in this article.

Article Text:
${text.slice(0, ARTICLE_COMPANIES_CHARS)}

For each company mentioned, provide:
- name: The company name
- description: Brief description of what they do (if available)
- website: The company's website URL if it appears in the article, otherwise null
- team_page_url: URL to their team/about page if mentioned in the article, otherwise null
- mentioned_context: Why they were mentioned (e.g. "raised Series A", "hired new CTO", "launched product")

Focus on:
- Startups and new companies
- Companies mentioned in the context of funding, hiring, or team changes
- Companies with identifiable team members

Return as JSON with a "companies" array containing the extracted companies.
If no relevant companies are found, return {"companies": []}.`;
}

export function articlePeoplePrompt(articleTitle: string, text: string, companyName: string): string {
  return `Extract people associated with the company mentioned in this article.

Article Title: ${articleTitle}

Article Text (first ${ARTICLE_PEOPLE_CHARS} chars):
${text.slice(0, ARTICLE_PEOPLE_CHARS)}

Company: ${companyName}

Extract people who are:
- Founders, co-founders, executives, or team members of ${companyName}
- Mentioned in context of hiring, joining the team, or leadership roles
- Contact persons for the company

DO NOT extract:
- Article authors or reporters
- Journalists or press contacts
- People quoted from other companies
- Investors or board members (unless they're also executives)

For each person found, provide:
- full_name: Their full name
- title: Their job title or role at ${companyName}
- linkedin_url: LinkedIn profile URL if mentioned
- email: Email address if mentioned
- bio: Brief context about them from the article

Return as JSON with a "people" array containing all qualifying people.
If no qualifying people are found, return {"people": []}.`;
}

export function teamPagePeoplePrompt(pageText: string, companyName: string): string {
  return `Extract team members from this company team/about page.

Company: ${companyName}

Page Content:
${pageText.slice(0, TEAM_PAGE_CHARS)}

Extract information for each team member you can identify:
- full_name: Their full name
- title: Their job title/role
- linkedin_url: LinkedIn profile URL if present
- email: Email address if visible
- bio: Brief bio or description if available

Return as JSON with a "people" array containing all team members found.
Focus on leadership and senior team members.
If no team members are found, return {"people": []}.`;
}

export function websiteExtractionPrompt(companyName: string, articleText: string): string {
  return `Extract the website URL for ${companyName} from this article text.

Article text (first ${ARTICLE_WEBSITE_CHARS} chars):
${articleText.slice(0, ARTICLE_WEBSITE_CHARS)}

Company: ${companyName}

Find the main website URL for this company. Look for:
- Direct mentions of their website (e.g. "visit example.com")
- URLs in the article text
- Domain names associated with the company

Return as JSON:
- website_url: The main website URL (e.g. "https://example.com") or null if not found
- confidence: Your confidence (0.0-1.0) in this URL being correct`;
}

export interface VettingSubject {
  name: string;
  title?: string;
  bio?: string;
  linkedinUrl?: string;
}

export function personVettingPrompt(person: VettingSubject, preferences: Preferences): string {
  return `Analyze this person's profile and determine if they match the target networking criteria.

Person Information:
- Name: ${person.name}
- Title: ${person.title ?? "Not specified"}
- Bio: ${person.bio ?? "Not available"}
- LinkedIn: ${person.linkedinUrl ?? "Not available"}

Target Criteria:
- Preferred Schools: ${listOr(preferences.schools, "Any")}
- Preferred Roles: ${listOr(preferences.roles, "Any")}
- Preferred Industries: ${listOr(preferences.industries, "Any")}
- Preferred Seniority: ${listOr(preferences.seniorityLevels, "Any")}
- Preferred Locations: ${listOr(preferences.locations, "Any")}

Based on the available information, infer and extract:
- school: Educational institution (if identifiable from bio/LinkedIn, otherwise null)
- role_category: Role category that best matches (Engineering, Product, Design, etc.)
- seniority_level: Seniority level (Senior, Lead, Staff, Principal, Director, VP, C-level, etc.)
- location: Geographic location (if identifiable, otherwise null)
- industry_experience: Array of relevant industry tags based on their experience
- matches_criteria: Boolean indicating if they match at least some target criteria
- reasoning: Brief explanation of your assessment and what criteria they match

Return as JSON with these fields. Be generous with matching: if someone is close to the criteria or has relevant experience, mark them as a match.`;
}

export function repairPrompt(originalPrompt: string, problem: string): string {
  return `${originalPrompt}

Your previous answer could not be used: ${problem}
Respond again with only the JSON object, matching the requested fields exactly.`;
}
