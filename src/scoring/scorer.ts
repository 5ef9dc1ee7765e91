import { Limits, Preferences, ScoringWeights } from "../config";
import { CompanyMention, PersonVetting } from "../types";

export interface ScoreWithReasons {
  score: number;
  reasons: string;
}

/** Two-stage scorer: response likelihood gates first, fit is only computed for those that pass. */
export interface Scorer {
  responseScore(vetting: PersonVetting, company: CompanyMention): ScoreWithReasons;
  fitScore(vetting: PersonVetting): ScoreWithReasons;
}

const C_LEVEL_MARKERS = ["c-level", "ceo", "cto", "cfo"];
const DIRECTOR_MARKERS = ["vp", "director"];
const SENIOR_IC_MARKERS = ["senior", "lead", "staff"];
const RECRUITING_MARKERS = ["recruiting", "hr", "people"];
const BD_MARKERS = ["bd", "business development", "sales"];

function contains(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

function overlaps(a: string, b: string): boolean {
  return contains(a, b) || contains(b, a);
}

function containsAny(value: string, markers: readonly string[]): boolean {
  const lower = value.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}

export function calculateFitScore(
  vetting: PersonVetting,
  preferences: Preferences,
  weights: ScoringWeights,
): ScoreWithReasons {
  let score = 0;
  const reasons: string[] = [];
  const { school, roleCategory, seniorityLevel, location } = vetting;

  if (school && preferences.schools.some((target) => contains(school, target))) {
    score += weights.schoolMatch;
    reasons.push(`School match: ${school}`);
  }

  if (roleCategory && preferences.roles.some((target) => contains(roleCategory, target))) {
    score += weights.roleMatch;
    reasons.push(`Role match: ${roleCategory}`);
  }

  const matchedIndustries = vetting.industryExperience.filter((industry) =>
    preferences.industries.some((target) => overlaps(industry, target)),
  );
  if (matchedIndustries.length > 0) {
    score += weights.industryMatch * matchedIndustries.length;
    reasons.push(`Industry match: ${matchedIndustries.join(", ")}`);
  }

  if (seniorityLevel && preferences.seniorityLevels.some((target) => contains(seniorityLevel, target))) {
    score += weights.seniorityMatch;
    reasons.push(`Seniority match: ${seniorityLevel}`);
  }

  if (location && preferences.locations.some((target) => overlaps(location, target))) {
    score += weights.locationMatch;
    reasons.push(`Location match: ${location}`);
  }

  if (reasons.length === 0 && vetting.reasoning) {
    reasons.push(vetting.reasoning);
  }

  return { score, reasons: reasons.length > 0 ? reasons.join("; ") : "No specific matches found" };
}

export function calculateResponseScore(vetting: PersonVetting, company: CompanyMention): ScoreWithReasons {
  let score = 0.5;
  const reasons: string[] = [];

  if (vetting.seniorityLevel) {
    if (containsAny(vetting.seniorityLevel, C_LEVEL_MARKERS)) {
      score -= 0.2;
      reasons.push("C-level (typically busy)");
    } else if (containsAny(vetting.seniorityLevel, DIRECTOR_MARKERS)) {
      score -= 0.1;
      reasons.push("Director/VP level");
    } else if (containsAny(vetting.seniorityLevel, SENIOR_IC_MARKERS)) {
      score += 0.1;
      reasons.push("Senior IC (often accessible)");
    }
  }

  if (company.sourceArticleUrl) {
    score += 0.2;
    reasons.push("Recently in the news (good timing)");
  }

  if (vetting.roleCategory) {
    if (containsAny(vetting.roleCategory, RECRUITING_MARKERS)) {
      score += 0.2;
      reasons.push("Recruiting role (open to outreach)");
    } else if (containsAny(vetting.roleCategory, BD_MARKERS)) {
      score += 0.15;
      reasons.push("BD/Sales role (network-oriented)");
    }
  }

  return {
    score: Math.max(0, Math.min(1, score)),
    reasons: reasons.length > 0 ? reasons.join("; ") : "Standard response likelihood",
  };
}

export function createScorer(preferences: Preferences, weights: ScoringWeights): Scorer {
  return {
    responseScore: (vetting, company) => calculateResponseScore(vetting, company),
    fitScore: (vetting) => calculateFitScore(vetting, preferences, weights),
  };
}

export function passesResponseGate(responseScore: number, limits: Pick<Limits, "minResponseThreshold">): boolean {
  return responseScore >= limits.minResponseThreshold;
}

/** Applied after the response gate, to the sum of fit and response scores. */
export function passesScoreThreshold(totalScore: number, limits: Pick<Limits, "minScoreThreshold">): boolean {
  return totalScore >= limits.minScoreThreshold;
}
