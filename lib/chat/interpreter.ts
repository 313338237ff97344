import { z } from "zod";
import { INTERPRET_MAX_TOKENS, INTERPRET_TEMPERATURE } from "../constants";
import { parseJsonReply, type TextGenerator } from "../llm/openrouter";
import { isIsoDate, toIsoDate } from "../weather/dates";
import type { WeatherQuery } from "../weather/types";

const TODAY_TOKEN = "today";

const extractionSchema = z.object({
  location: z.string().trim().min(1),
  date: z.string().trim().min(1),
});

export function buildInterpretPrompt(query: string) {
  return [
    "Extract the location and date from the following weather-related query.",
    "If no specific date is mentioned, assume it's for today.",
    "Reply with valid JSON only. No prose, no markdown.",
    "",
    `Query: """${query}"""`,
    "",
    "Return the result like this:",
    '{ "location": "extracted location", "date": "extracted date in YYYY-MM-DD format" }',
  ].join("\n");
}

/**
 * Turns a model reply into a WeatherQuery. Returns null when the reply is
 * not JSON, lacks either field, or carries a date that is neither
 * "today" nor a real YYYY-MM-DD calendar date.
 */
export function parseInterpretation(reply: string, now: Date): WeatherQuery | null {
  let raw: unknown;
  try {
    raw = parseJsonReply(reply);
  } catch {
    return null;
  }

  const parsed = extractionSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { location } = parsed.data;
  const date = parsed.data.date.toLowerCase() === TODAY_TOKEN ? toIsoDate(now) : parsed.data.date;
  if (!isIsoDate(date)) return null;
  return { location, date };
}

export async function interpretQuery(
  generator: TextGenerator,
  query: string,
  now: Date,
): Promise<WeatherQuery | null> {
  const reply = await generator.generate({
    prompt: buildInterpretPrompt(query),
    temperature: INTERPRET_TEMPERATURE,
    maxTokens: INTERPRET_MAX_TOKENS,
  });
  return parseInterpretation(reply, now);
}
