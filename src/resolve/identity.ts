import { PersonCandidate } from "../types";

export function normalizeLinkedinUrl(url: string): string {
  return url
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, "")
    .replace(/^www\./, "")
    .replace(/[?#].*$/, "")
    .replace(/\/+$/, "");
}

export function normalizePersonName(name: string): string {
  return name.replace(/\s+/g, " ").trim().toLowerCase();
}

/** `linkedin:<normalized url>` when a LinkedIn URL is known, otherwise `name:<normalized name>`. */
export function identityKey(person: Pick<PersonCandidate, "name" | "linkedinUrl">): string {
  const linkedin = person.linkedinUrl ? normalizeLinkedinUrl(person.linkedinUrl) : "";
  if (linkedin) {
    return `linkedin:${linkedin}`;
  }
  return `name:${normalizePersonName(person.name)}`;
}

function pick<T>(preferred: T | undefined, fallback: T | undefined): T | undefined {
  return preferred ?? fallback;
}

/**
 * Combines two records for the same person. Team-page values win over
 * article values; otherwise the existing value is kept and only gaps are
 * filled.
 */
export function mergeCandidatePair(existing: PersonCandidate, incoming: PersonCandidate): PersonCandidate {
  const incomingWins = incoming.source === "team_page" && existing.source !== "team_page";
  const [primary, secondary] = incomingWins ? [incoming, existing] : [existing, incoming];

  return {
    name: primary.name,
    title: pick(primary.title, secondary.title),
    linkedinUrl: pick(primary.linkedinUrl, secondary.linkedinUrl),
    email: pick(primary.email, secondary.email),
    bio: pick(primary.bio, secondary.bio),
    source: primary.source,
    sourceUrl: primary.sourceUrl,
    sourceUrls: [...new Set([...existing.sourceUrls, existing.sourceUrl, ...incoming.sourceUrls, incoming.sourceUrl])],
  };
}

/**
 * Deduplicates by identity key, keeping first-appearance order. Feeding the
 * result back in together with the same inputs yields the same records.
 */
export function mergePersonCandidates(candidates: readonly PersonCandidate[]): PersonCandidate[] {
  const merged = new Map<string, PersonCandidate>();
  for (const candidate of candidates) {
    const key = identityKey(candidate);
    const existing = merged.get(key);
    merged.set(key, existing ? mergeCandidatePair(existing, candidate) : { ...candidate, sourceUrls: [...candidate.sourceUrls] });
  }
  return [...merged.values()];
}
