import { describe, expect, it } from "vitest";
import {
  identityKey,
  mergeCandidatePair,
  mergePersonCandidates,
  normalizeLinkedinUrl,
  normalizePersonName,
} from "../src/resolve/identity";
import { PersonCandidate } from "../src/types";

function person(overrides: Partial<PersonCandidate> & Pick<PersonCandidate, "name">): PersonCandidate {
  const sourceUrl = overrides.sourceUrl ?? "https://news.test/a1";
  return {
    source: "article",
    sourceUrl,
    sourceUrls: [sourceUrl],
    ...overrides,
  };
}

describe("identity keys", () => {
  it("normalizes LinkedIn URLs", () => {
    expect(normalizeLinkedinUrl(" HTTPS://www.LinkedIn.com/in/Jane-Doe/?trk=public ")).toBe("linkedin.com/in/jane-doe");
  });

  it("normalizes names by case and whitespace", () => {
    expect(normalizePersonName("  Jane \t  DOE ")).toBe("jane doe");
  });

  it("prefers the LinkedIn URL over the name", () => {
    expect(identityKey({ name: "Jane Doe", linkedinUrl: "https://li.com/jane/" })).toBe("linkedin:li.com/jane");
    expect(identityKey({ name: "Jane  Doe" })).toBe("name:jane doe");
    expect(identityKey({ name: "Jane Doe", linkedinUrl: "" })).toBe("name:jane doe");
  });

  it("merges records with the same LinkedIn URL regardless of name casing", () => {
    const merged = mergePersonCandidates([
      person({ name: "JANE DOE", linkedinUrl: "li.com/jane" }),
      person({ name: "jane doe", linkedinUrl: "https://li.com/jane", sourceUrl: "https://news.test/a2" }),
    ]);

    expect(merged).toHaveLength(1);
  });
});

describe("mergeCandidatePair", () => {
  const fromArticle = person({ name: "Jane Doe", title: "Co-founder", linkedinUrl: "li.com/jane" });
  const fromTeamPage = person({
    name: "Jane Doe",
    title: "CTO",
    linkedinUrl: "li.com/jane",
    email: "jane@acme.test",
    source: "team_page",
    sourceUrl: "https://acme.test/team",
  });

  it("lets team-page values win conflicts in either order", () => {
    const expected = {
      name: "Jane Doe",
      title: "CTO",
      linkedinUrl: "li.com/jane",
      email: "jane@acme.test",
      source: "team_page",
      sourceUrl: "https://acme.test/team",
    };

    expect(mergeCandidatePair(fromArticle, fromTeamPage)).toMatchObject(expected);
    expect(mergeCandidatePair(fromTeamPage, fromArticle)).toMatchObject(expected);
  });

  it("fills gaps from the later record within the same tier", () => {
    const first = person({ name: "Sam Lee", title: "Engineer" });
    const second = person({ name: "Sam Lee", title: "Staff Engineer", bio: "Builds compilers", sourceUrl: "https://news.test/a2" });

    const merged = mergeCandidatePair(first, second);

    expect(merged.title).toBe("Engineer");
    expect(merged.bio).toBe("Builds compilers");
    expect(merged.sourceUrls).toEqual(["https://news.test/a1", "https://news.test/a2"]);
  });
});

describe("mergePersonCandidates", () => {
  const candidates = [
    person({ name: "Jane Doe", title: "Co-founder", linkedinUrl: "li.com/jane" }),
    person({ name: "Omar Haddad" }),
    person({ name: "Jane Doe", title: "CTO", linkedinUrl: "li.com/jane/", source: "team_page", sourceUrl: "https://acme.test/team" }),
    person({ name: "omar  haddad", title: "Head of Sales", source: "team_page", sourceUrl: "https://acme.test/team" }),
  ];

  it("keeps first-appearance order", () => {
    expect(mergePersonCandidates(candidates).map((candidate) => candidate.title)).toEqual(["CTO", "Head of Sales"]);
  });

  it("is idempotent when merged again with the same inputs", () => {
    const once = mergePersonCandidates(candidates);
    const twice = mergePersonCandidates([...once, ...candidates]);

    expect(twice).toEqual(once);
    expect(mergePersonCandidates([...candidates, ...candidates])).toEqual(once);
  });
});
