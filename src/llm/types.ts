import { LlmProviderName } from "../config";

export interface LlmProvider {
  readonly name: LlmProviderName;
  readonly model: string;
  /** Raw completion text for a single-turn prompt. Rejects on API failure. */
  complete(prompt: string): Promise<string>;
}

export const SYSTEM_PROMPT =
  "You extract structured information for a networking research tool. Always respond with a single JSON object and nothing else.";
