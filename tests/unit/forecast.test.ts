import { afterEach, describe, expect, it, vi } from "vitest";
import { ProviderError } from "../../lib/errors";
import { fetchDayForecast, isWithinForecastWindow, projectDay } from "../../lib/weather/forecast";
import { basicDayPayload, jsonResponse, requestUrl, testConfig } from "../support/fixtures";

const now = new Date(2024, 8, 27, 12, 0);
const munich = { latitude: 48.137, longitude: 11.576 };

describe("forecast window", () => {
  it("accepts offsets 0 through 6 only", () => {
    expect([0, 1, 6].map(isWithinForecastWindow)).toEqual([true, true, true]);
    expect([-1, 7, 14, 2.5].map(isWithinForecastWindow)).toEqual([false, false, false, false]);
  });
});

describe("projectDay", () => {
  it("slices one day out of the parallel arrays", () => {
    expect(projectDay(basicDayPayload().data_day, 3)).toEqual({
      date: "2024-09-30",
      temperatureMax: 23,
      temperatureMin: 13,
      temperatureMean: 18,
      feltTemperatureMax: 22,
      feltTemperatureMin: 11,
      precipitation: 1.5,
      precipitationProbability: 30,
      windspeedMean: 5,
      windDirection: 135,
      pictocode: 4,
      uvIndex: 3,
      relativeHumidityMean: 63,
    });
  });

  it("fails when a series is shorter than the offset", () => {
    const dataDay = { ...basicDayPayload().data_day, uvindex: [1, 2] };
    expect(() => projectDay(dataDay, 4)).toThrow('Forecast data has no "uvindex" entry for day 4.');
  });
});

describe("fetchDayForecast", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requests the basic-day package and returns the matching day", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => jsonResponse(basicDayPayload()));
    vi.stubGlobal("fetch", fetchMock);

    const day = await fetchDayForecast(testConfig, munich, "2024-09-30", now);

    expect(day?.date).toBe("2024-09-30");
    expect(day?.pictocode).toBe(4);
    const url = requestUrl(fetchMock.mock.calls[0][0]);
    expect(url.origin + url.pathname).toBe("https://my.meteoblue.com/packages/basic-day");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      apikey: "test-meteoblue-key",
      lat: "48.137",
      lon: "11.576",
      format: "json",
    });
  });

  it("returns today's entry for offset 0 and the last day for offset 6", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(basicDayPayload())));

    await expect(fetchDayForecast(testConfig, munich, "2024-09-27", now)).resolves.toMatchObject({
      date: "2024-09-27",
      temperatureMax: 20,
    });
    await expect(fetchDayForecast(testConfig, munich, "2024-10-03", now)).resolves.toMatchObject({
      date: "2024-10-03",
      temperatureMax: 26,
    });
  });

  it.each([
    ["seven days ahead", "2024-10-04"],
    ["yesterday", "2024-09-26"],
    ["next month", "2024-10-27"],
  ])("returns null for a date %s without calling the provider", async (_label, date) => {
    const fetchMock = vi.fn(async () => jsonResponse(basicDayPayload()));
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchDayForecast(testConfig, munich, date, now)).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("raises a provider error on a failed request", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ error_message: "invalid apikey" }, 403)));

    const error = await fetchDayForecast(testConfig, munich, "2024-09-28", now).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ provider: "meteoblue", status: 403 });
  });

  it("rejects a body without data_day", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ metadata: {} })));
    await expect(fetchDayForecast(testConfig, munich, "2024-09-28", now)).rejects.toThrow();
  });
});
