import Anthropic from "@anthropic-ai/sdk";
import { ExtractionError } from "../core/errors";
import { LlmProvider, SYSTEM_PROMPT } from "./types";

export const DEFAULT_ANTHROPIC_MODEL = "claude-haiku-4-5";

export interface AnthropicProviderOptions {
  apiKey: string;
  model?: string;
  maxTokens: number;
  timeoutMs: number;
}

export class AnthropicProvider implements LlmProvider {
  readonly name = "anthropic";
  readonly model: string;
  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = options.maxTokens;
    // Retries are handled one level up, where a bad answer can be re-prompted.
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
      temperature: 0,
    });

    const textContent = response.content.find((block) => block.type === "text");
    if (!textContent || textContent.type !== "text") {
      throw new ExtractionError("No text content in Anthropic response", { model: this.model });
    }
    return textContent.text;
  }
}
