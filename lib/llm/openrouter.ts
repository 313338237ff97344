import { z } from "zod";
import type { AppConfig } from "../config";
import { APP_TITLE } from "../constants";
import { ProviderError } from "../errors";
import { silentTrace, type TraceSink } from "../trace";

export type GenerateRequest = {
  prompt: string;
  temperature?: number;
  maxTokens?: number;
};

/** Every model call in the app goes through this seam. */
export interface TextGenerator {
  generate(request: GenerateRequest): Promise<string>;
}

const openRouterResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      }),
    )
    .optional(),
  // OpenRouter reports some upstream failures as a 200 with an error body.
  error: z.object({ message: z.string() }).partial().optional(),
});

export function createOpenRouterGenerator(config: AppConfig, trace: TraceSink = silentTrace): TextGenerator {
  return {
    async generate({ prompt, temperature, maxTokens }) {
      trace("llm", `model=${config.model} prompt_chars=${prompt.length}`);
      const response = await fetch(`${config.openRouter.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${config.openRouter.apiKey}`,
          "Content-Type": "application/json",
          "X-Title": APP_TITLE,
        },
        body: JSON.stringify({
          model: config.model,
          temperature,
          max_tokens: maxTokens,
          messages: [{ role: "user", content: prompt }],
        }),
      });

      if (!response.ok) {
        const raw = await response.text();
        throw new ProviderError(
          "openrouter",
          `Model request failed (${response.status}): ${raw.slice(0, 200)}`,
          response.status,
        );
      }

      const payload = openRouterResponseSchema.parse(await response.json());
      if (payload.error) {
        throw new ProviderError(
          "openrouter",
          `Model request failed: ${payload.error.message ?? "unknown error"}`,
          response.status,
        );
      }
      const text = payload.choices?.[0]?.message?.content?.trim() ?? "";
      if (!text) {
        throw new ProviderError("openrouter", "Model returned an empty response.", response.status);
      }
      trace("llm", `response model=${payload.model ?? config.model} chars=${text.length}`);
      return text;
    },
  };
}

/** Models often wrap JSON in markdown fences; strip them before parsing. */
export function parseJsonReply(text: string): unknown {
  const clean = text
    .trim()
    .replace(/^```[a-z]*\n?/i, "")
    .replace(/\n?```$/, "")
    .trim();
  const parsed: unknown = JSON.parse(clean);
  return parsed;
}
