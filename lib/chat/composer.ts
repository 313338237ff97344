import { REPORT_TEMPERATURE } from "../constants";
import type { TextGenerator } from "../llm/openrouter";
import { describePictocode } from "../weather/pictocodes";
import type { DayForecast } from "../weather/types";

export const REPORT_SECTIONS = [
  "A summary of the overall weather condition",
  "Temperature analysis, including how it might feel",
  "Precipitation forecast and probability",
  "Wind conditions and what they mean for the day",
  "UV index interpretation and sun protection advice if needed",
  "Any notable weather patterns or changes",
] as const;

export function buildReportPrompt(day: DayForecast, location: string) {
  return [
    "Analyze the following weather data and generate a detailed, natural language response:",
    "",
    `Location: ${location}`,
    `Date: ${day.date}`,
    `Weather Condition: ${describePictocode(day.pictocode)}`,
    "Temperature:",
    `  - Max: ${day.temperatureMax}°C`,
    `  - Min: ${day.temperatureMin}°C`,
    `  - Mean: ${day.temperatureMean}°C`,
    "Felt Temperature:",
    `  - Max: ${day.feltTemperatureMax}°C`,
    `  - Min: ${day.feltTemperatureMin}°C`,
    `Precipitation: ${day.precipitation} mm`,
    `Precipitation Probability: ${day.precipitationProbability}%`,
    "Wind:",
    `  - Speed: ${day.windspeedMean} m/s`,
    `  - Direction: ${day.windDirection}°`,
    `UV Index: ${day.uvIndex}`,
    `Relative Humidity: ${day.relativeHumidityMean}%`,
    "",
    "Provide a comprehensive weather report that includes:",
    ...REPORT_SECTIONS.map((section, index) => `${index + 1}. ${section}`),
    "",
    "The response should be friendly, informative, and easy to understand for the general public.",
  ].join("\n");
}

export async function composeReport(generator: TextGenerator, day: DayForecast, location: string) {
  return generator.generate({
    prompt: buildReportPrompt(day, location),
    temperature: REPORT_TEMPERATURE,
  });
}
