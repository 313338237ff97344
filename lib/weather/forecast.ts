import { z } from "zod";
import type { AppConfig } from "../config";
import { FORECAST_WINDOW_DAYS } from "../constants";
import { ProviderError } from "../errors";
import { silentTrace, type TraceSink } from "../trace";
import { dayOffset, toIsoDate } from "./dates";
import type { Coordinates, DayForecast } from "./types";

const series = z.array(z.number());

export const dataDaySchema = z.object({
  time: z.array(z.string()),
  temperature_max: series,
  temperature_min: series,
  temperature_mean: series,
  felttemperature_max: series,
  felttemperature_min: series,
  precipitation: series,
  precipitation_probability: series,
  windspeed_mean: series,
  winddirection: series,
  pictocode: series,
  uvindex: series,
  relativehumidity_mean: series,
});

export type DataDay = z.infer<typeof dataDaySchema>;

const basicDayResponseSchema = z.object({
  data_day: dataDaySchema,
});

export function isWithinForecastWindow(offset: number) {
  return Number.isInteger(offset) && offset >= 0 && offset < FORECAST_WINDOW_DAYS;
}

function pick<T>(values: T[], offset: number, key: keyof DataDay): T {
  const value = values[offset];
  if (value === undefined) {
    throw new ProviderError("meteoblue", `Forecast data has no "${key}" entry for day ${offset}.`);
  }
  return value;
}

/** Slices one day out of meteoblue's parallel per-field arrays. */
export function projectDay(dataDay: DataDay, offset: number): DayForecast {
  return {
    date: pick(dataDay.time, offset, "time"),
    temperatureMax: pick(dataDay.temperature_max, offset, "temperature_max"),
    temperatureMin: pick(dataDay.temperature_min, offset, "temperature_min"),
    temperatureMean: pick(dataDay.temperature_mean, offset, "temperature_mean"),
    feltTemperatureMax: pick(dataDay.felttemperature_max, offset, "felttemperature_max"),
    feltTemperatureMin: pick(dataDay.felttemperature_min, offset, "felttemperature_min"),
    precipitation: pick(dataDay.precipitation, offset, "precipitation"),
    precipitationProbability: pick(dataDay.precipitation_probability, offset, "precipitation_probability"),
    windspeedMean: pick(dataDay.windspeed_mean, offset, "windspeed_mean"),
    windDirection: pick(dataDay.winddirection, offset, "winddirection"),
    pictocode: pick(dataDay.pictocode, offset, "pictocode"),
    uvIndex: pick(dataDay.uvindex, offset, "uvindex"),
    relativeHumidityMean: pick(dataDay.relativehumidity_mean, offset, "relativehumidity_mean"),
  };
}

async function fetchBasicDay(config: AppConfig, coordinates: Coordinates): Promise<DataDay> {
  const query = new URLSearchParams({
    apikey: config.meteoblue.apiKey,
    lat: String(coordinates.latitude),
    lon: String(coordinates.longitude),
    format: "json",
  });
  const response = await fetch(`${config.meteoblue.baseUrl}/packages/basic-day?${query.toString()}`);
  if (!response.ok) {
    throw new ProviderError("meteoblue", `Forecast request failed (${response.status}).`, response.status);
  }
  return basicDayResponseSchema.parse(await response.json()).data_day;
}

/**
 * Returns the forecast for `date`, or null when the date falls outside
 * the seven-day window starting today. Out-of-window dates never reach
 * the provider.
 */
export async function fetchDayForecast(
  config: AppConfig,
  coordinates: Coordinates,
  date: string,
  now: Date,
  trace: TraceSink = silentTrace,
): Promise<DayForecast | null> {
  const offset = dayOffset(date, toIsoDate(now));
  if (!isWithinForecastWindow(offset)) {
    trace("forecast", `${date} is ${offset} day(s) from today, outside the window`);
    return null;
  }

  trace("forecast", `requesting ${coordinates.latitude},${coordinates.longitude} day offset ${offset}`);
  const dataDay = await fetchBasicDay(config, coordinates);
  return projectDay(dataDay, offset);
}
