import { Preferences } from "../config";
import { ExtractionError } from "../core/errors";
import { Result, fail, ok } from "../core/result";
import { StructuredExtractor, personVettingPrompt, personVettingSchema } from "../llm";
import { PersonCandidate, PersonVetting } from "../types";

export class PersonVetter {
  constructor(
    private readonly llm: StructuredExtractor,
    private readonly preferences: Preferences,
  ) {}

  async vet(person: PersonCandidate): Promise<Result<PersonVetting, ExtractionError>> {
    const outcome = await this.llm.extract(personVettingPrompt(person, this.preferences), personVettingSchema, "vetting");
    if (!outcome.ok) {
      return fail(outcome.error);
    }
    const value = outcome.value;
    return ok({
      school: value.school,
      roleCategory: value.role_category,
      seniorityLevel: value.seniority_level,
      location: value.location,
      industryExperience: value.industry_experience.map((industry) => industry.trim()).filter(Boolean),
      matchesCriteria: value.matches_criteria,
      reasoning: value.reasoning,
    });
  }
}
