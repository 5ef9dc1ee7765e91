import { LlmSettings } from "../config";
import { ConfigurationError } from "../core/errors";
import { AnthropicProvider } from "./anthropicProvider";
import { OpenAIProvider } from "./openaiProvider";
import { LlmProvider } from "./types";

type Env = Record<string, string | undefined>;

export function createLlmProvider(settings: LlmSettings, env: Env = process.env): LlmProvider {
  if (settings.provider === "openai") {
    const apiKey = env.OPENAI_API_KEY?.trim();
    if (!apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is required when llm.provider is openai");
    }
    return new OpenAIProvider({
      apiKey,
      model: settings.model,
      maxTokens: settings.maxTokens,
      timeoutMs: settings.timeoutMs,
    });
  }

  const apiKey = env.ANTHROPIC_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError("ANTHROPIC_API_KEY is required when llm.provider is anthropic");
  }
  return new AnthropicProvider({
    apiKey,
    model: settings.model,
    maxTokens: settings.maxTokens,
    timeoutMs: settings.timeoutMs,
  });
}
