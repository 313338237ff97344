import { vi } from "vitest";
import { loadConfig } from "../../lib/config";
import type { GenerateRequest, TextGenerator } from "../../lib/llm/openrouter";

export const testConfig = loadConfig({
  OPENROUTER_API_KEY: "test-openrouter-key",
  OPENCAGE_API_KEY: "test-opencage-key",
  METEOBLUE_API_KEY: "test-meteoblue-key",
});

/** Answers each generate() call with the next scripted reply. */
export function scriptedGenerator(...replies: Array<string | Error>) {
  const queue = [...replies];
  const generate = vi.fn(async (_request: GenerateRequest) => {
    const next = queue.shift();
    if (next === undefined) throw new Error("No scripted reply left");
    if (next instanceof Error) throw next;
    return next;
  });
  const generator: TextGenerator = { generate };
  return { generator, generate };
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/** Seven days starting 2024-09-27; day i carries recognisable values. */
export function basicDayPayload(start = ["2024-09-27", "2024-09-28", "2024-09-29", "2024-09-30", "2024-10-01", "2024-10-02", "2024-10-03"]) {
  const days = start.map((_, i) => i);
  return {
    metadata: { name: "", latitude: 48.137, longitude: 11.576 },
    units: { temperature: "C" },
    data_day: {
      time: start,
      temperature_max: days.map((i) => 20 + i),
      temperature_min: days.map((i) => 10 + i),
      temperature_mean: days.map((i) => 15 + i),
      felttemperature_max: days.map((i) => 19 + i),
      felttemperature_min: days.map((i) => 8 + i),
      precipitation: days.map((i) => i * 0.5),
      precipitation_probability: days.map((i) => i * 10),
      windspeed_mean: days.map((i) => 2 + i),
      winddirection: days.map((i) => i * 45),
      pictocode: days.map((i) => i + 1),
      uvindex: days.map((i) => i),
      relativehumidity_mean: days.map((i) => 60 + i),
    },
  };
}

export function requestUrl(input: string | URL | Request) {
  return new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
}
