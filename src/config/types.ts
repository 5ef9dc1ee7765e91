import { z } from "zod";

const stringList = z.array(z.string().trim().min(1)).default([]);

export const feedSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().trim().url(),
});

export const preferencesSchema = z
  .object({
    schools: stringList,
    roles: stringList,
    industries: stringList,
    seniorityLevels: stringList,
    locations: stringList,
  })
  .default({});

export const scoringWeightsSchema = z
  .object({
    schoolMatch: z.number().nonnegative().default(1.0),
    roleMatch: z.number().nonnegative().default(1.0),
    industryMatch: z.number().nonnegative().default(1.0),
    seniorityMatch: z.number().nonnegative().default(0.5),
    locationMatch: z.number().nonnegative().default(0.3),
  })
  .default({});

export const limitsSchema = z
  .object({
    maxArticlesPerFeed: z.number().int().positive().default(50),
    maxCompaniesPerArticle: z.number().int().positive().default(10),
    maxPeoplePerCompany: z.number().int().positive().default(20),
    maxTeamPageCandidates: z.number().int().positive().default(5),
    minResponseThreshold: z.number().min(0).max(1).default(0.3),
    minScoreThreshold: z.number().min(0).default(0.5),
  })
  .default({});

export const llmSchema = z
  .object({
    provider: z.enum(["anthropic", "openai"]).default("anthropic"),
    model: z.string().trim().min(1).optional(),
    maxRetries: z.number().int().min(0).max(5).default(2),
    maxTokens: z.number().int().positive().default(4000),
    timeoutMs: z.number().int().positive().default(60_000),
  })
  .default({});

export const appConfigSchema = z.object({
  feeds: z.array(feedSchema).min(1, "at least one feed is required"),
  keywords: z
    .object({
      include: stringList,
      exclude: stringList,
    })
    .default({}),
  preferences: preferencesSchema,
  scoringWeights: scoringWeightsSchema,
  limits: limitsSchema,
  debugKeepNonmatching: z.boolean().default(false),
  outputFormat: z.enum(["csv", "jsonl"]).default("csv"),
  outputPath: z.string().trim().min(1).default("data/output/output.csv"),
  storePath: z.string().trim().min(1).default("data/scout.db"),
  userAgent: z
    .string()
    .trim()
    .min(1)
    .default("Mozilla/5.0 (compatible; outreach-scout/0.1; +https://www.npmjs.com/package/outreach-scout)"),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  ignoreHttpsErrors: z.boolean().default(false),
  politeDelayMs: z.number().int().min(0).default(500),
  articleConcurrency: z.number().int().min(1).max(8).default(1),
  llm: llmSchema,
});

export type AppConfig = z.output<typeof appConfigSchema>;
export type ConfigInput = z.input<typeof appConfigSchema>;
export type Preferences = AppConfig["preferences"];
export type ScoringWeights = AppConfig["scoringWeights"];
export type Limits = AppConfig["limits"];
export type LlmSettings = AppConfig["llm"];
export type LlmProviderName = LlmSettings["provider"];
