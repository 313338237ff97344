import type { AppConfig } from "../config";
import { describeError } from "../errors";
import type { TextGenerator } from "../llm/openrouter";
import { silentTrace, type TraceSink } from "../trace";
import { fetchDayForecast } from "../weather/forecast";
import { geocodeLocation } from "../weather/geocoder";
import type { DayForecast } from "../weather/types";
import { composeReport } from "./composer";
import { interpretQuery } from "./interpreter";

export type PipelineDeps = {
  config: AppConfig;
  generator: TextGenerator;
  now?: () => Date;
  trace?: TraceSink;
};

export type TurnOutcome =
  | { kind: "report"; location: string; day: DayForecast; text: string }
  | { kind: "not_understood" }
  | { kind: "location_not_found"; location: string }
  | { kind: "out_of_range"; location: string; date: string }
  | { kind: "error"; details: string };

/**
 * interpret -> geocode -> forecast -> compose, strictly in order. Expected
 * misses short-circuit to their own outcome; anything thrown along the way
 * becomes an "error" outcome so callers never have to catch.
 */
export async function answerWeatherQuestion(deps: PipelineDeps, text: string): Promise<TurnOutcome> {
  const now = (deps.now ?? (() => new Date()))();
  const trace = deps.trace ?? silentTrace;

  try {
    const query = await interpretQuery(deps.generator, text, now);
    if (!query) {
      trace("interpreter", "reply did not contain a usable location and date");
      return { kind: "not_understood" };
    }
    trace("interpreter", `location="${query.location}" date=${query.date}`);

    const coordinates = await geocodeLocation(deps.config, query.location, trace);
    if (!coordinates) {
      return { kind: "location_not_found", location: query.location };
    }

    const day = await fetchDayForecast(deps.config, coordinates, query.date, now, trace);
    if (!day) {
      return { kind: "out_of_range", location: query.location, date: query.date };
    }

    const report = await composeReport(deps.generator, day, query.location);
    return { kind: "report", location: query.location, day, text: report };
  } catch (error) {
    const details = describeError(error);
    trace("pipeline", `failed: ${details}`);
    return { kind: "error", details };
  }
}

export function formatOutcome(outcome: TurnOutcome): string {
  switch (outcome.kind) {
    case "report":
      return outcome.text;
    case "not_understood":
      return "I'm sorry, I couldn't understand the location or date in your query. Can you please rephrase?";
    case "location_not_found":
      return `I'm sorry, I couldn't find the coordinates for ${outcome.location}.`;
    case "out_of_range":
      return `I'm sorry, I couldn't get weather data for ${outcome.location} on ${outcome.date}. The date might be out of range.`;
    case "error":
      return `I'm sorry, I encountered an error: ${outcome.details}`;
  }
}
