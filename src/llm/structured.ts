import { z } from "zod";
import { ExtractionError, errorMessage } from "../core/errors";
import { RateLimiter } from "../core/rateLimiter";
import { Logger, MetricsRegistry } from "../observability";
import { repairPrompt } from "./prompts";
import { LlmProvider } from "./types";

export type ExtractOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: ExtractionError; attempts: number };

export interface StructuredExtractorDeps {
  provider: LlmProvider;
  logger: Logger;
  metrics?: MetricsRegistry;
  limiter?: RateLimiter;
  /** Extra attempts after the first when the answer is not valid JSON for the schema. */
  maxRetries: number;
}

/**
 * Pulls the JSON object out of a model answer, tolerating code fences and
 * prose around it.
 */
export function parseJsonObject(raw: string): unknown {
  const unfenced = raw.replace(/```(?:json)?/gi, "");
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new SyntaxError("no JSON object found in response");
  }
  return JSON.parse(unfenced.slice(start, end + 1));
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export class StructuredExtractor {
  private readonly logger: Logger;

  constructor(private readonly deps: StructuredExtractorDeps) {
    this.logger = deps.logger.child("llm");
  }

  get providerName(): string {
    return this.deps.provider.name;
  }

  async extract<S extends z.ZodTypeAny>(prompt: string, schema: S, label: string): Promise<ExtractOutcome<z.output<S>>> {
    const maxAttempts = Math.max(0, this.deps.maxRetries) + 1;
    let currentPrompt = prompt;
    let lastProblem = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let raw: string;
      try {
        raw = await this.call(currentPrompt);
      } catch (error) {
        this.deps.metrics?.incrementCounter("llm_failures");
        this.logger.warn("llm_call_failed", { label, attempt, error: errorMessage(error) });
        return {
          ok: false,
          attempts: attempt,
          error: new ExtractionError(`LLM call failed for ${label}: ${errorMessage(error)}`, { label, attempt }, error),
        };
      }

      let candidate: unknown;
      try {
        candidate = parseJsonObject(raw);
      } catch (error) {
        lastProblem = `response was not valid JSON (${errorMessage(error)})`;
        this.recordInvalid(label, attempt, lastProblem);
        currentPrompt = repairPrompt(prompt, lastProblem);
        continue;
      }

      const parsed = schema.safeParse(candidate);
      if (parsed.success) {
        return { ok: true, value: parsed.data, attempts: attempt };
      }
      lastProblem = `response did not match the expected fields (${describeIssues(parsed.error)})`;
      this.recordInvalid(label, attempt, lastProblem);
      currentPrompt = repairPrompt(prompt, lastProblem);
    }

    return {
      ok: false,
      attempts: maxAttempts,
      error: new ExtractionError(`Invalid ${label} output after ${maxAttempts} attempts: ${lastProblem}`, {
        label,
        attempts: maxAttempts,
      }),
    };
  }

  private async call(prompt: string): Promise<string> {
    const { provider, limiter, metrics } = this.deps;
    const run = async () => {
      metrics?.incrementCounter("llm_calls");
      const stopTimer = metrics?.startTimer("llm_call_ms");
      try {
        return await provider.complete(prompt);
      } finally {
        stopTimer?.();
      }
    };
    return limiter ? limiter.schedule(`llm:${provider.name}`, run) : run();
  }

  private recordInvalid(label: string, attempt: number, problem: string): void {
    this.deps.metrics?.incrementCounter("llm_invalid_responses");
    this.logger.warn("llm_invalid_response", { label, attempt, problem });
  }
}
