import OpenAI from "openai";
import { ExtractionError } from "../core/errors";
import { LlmProvider, SYSTEM_PROMPT } from "./types";

export const DEFAULT_OPENAI_MODEL = "gpt-4o";

export interface OpenAIProviderOptions {
  apiKey: string;
  model?: string;
  maxTokens: number;
  timeoutMs: number;
}

export class OpenAIProvider implements LlmProvider {
  readonly name = "openai";
  readonly model: string;
  private readonly client: OpenAI;
  private readonly maxTokens: number;

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    this.maxTokens = options.maxTokens;
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
    });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new ExtractionError("No content in OpenAI response", { model: this.model });
    }
    return content;
  }
}
