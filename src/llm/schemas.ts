import { z } from "zod";

/** Models answer `null`, `""` or omit the key for unknown values; all become undefined. */
const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const score = z.coerce.number().min(0).max(1);

export const relevanceSchema = z.object({
  is_relevant: z.boolean(),
  reason: z.string().default(""),
  confidence: score.default(0),
});

export const companyMentionSchema = z.object({
  name: z.string().trim().min(1),
  description: optionalText,
  website: optionalText,
  team_page_url: optionalText,
  mentioned_context: optionalText,
});

export const companyExtractionSchema = z.object({
  companies: z.array(companyMentionSchema).default([]),
});

export const personExtractionSchema = z.object({
  full_name: z.string().trim().min(1),
  title: optionalText,
  linkedin_url: optionalText,
  email: optionalText,
  bio: optionalText,
});

export const peopleExtractionSchema = z.object({
  people: z.array(personExtractionSchema).default([]),
});

export const websiteExtractionSchema = z.object({
  website_url: optionalText,
  confidence: score.default(0),
});

export const personVettingSchema = z.object({
  school: optionalText,
  role_category: optionalText,
  seniority_level: optionalText,
  location: optionalText,
  industry_experience: z.array(z.string()).nullish().transform((values) => values ?? []),
  matches_criteria: z.boolean(),
  reasoning: z.string().default(""),
});

export type RelevanceOutput = z.output<typeof relevanceSchema>;
export type CompanyExtractionOutput = z.output<typeof companyExtractionSchema>;
export type PeopleExtractionOutput = z.output<typeof peopleExtractionSchema>;
export type WebsiteExtractionOutput = z.output<typeof websiteExtractionSchema>;
export type PersonVettingOutput = z.output<typeof personVettingSchema>;
