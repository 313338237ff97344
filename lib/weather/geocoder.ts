import { z } from "zod";
import type { AppConfig } from "../config";
import { ProviderError } from "../errors";
import { silentTrace, type TraceSink } from "../trace";
import type { Coordinates } from "./types";

const openCageResponseSchema = z.object({
  results: z.array(
    z.object({
      formatted: z.string().optional(),
      geometry: z.object({
        lat: z.number(),
        lng: z.number(),
      }),
    }),
  ),
});

/** Resolves a place name to its first OpenCage match, or null when there is none. */
export async function geocodeLocation(
  config: AppConfig,
  location: string,
  trace: TraceSink = silentTrace,
): Promise<Coordinates | null> {
  const query = new URLSearchParams({
    q: location,
    key: config.openCage.apiKey,
    limit: "1",
    no_annotations: "1",
  });
  const response = await fetch(`${config.openCage.baseUrl}?${query.toString()}`);
  if (!response.ok) {
    throw new ProviderError("opencage", `Geocoding request failed (${response.status}).`, response.status);
  }

  const payload = openCageResponseSchema.parse(await response.json());
  const first = payload.results[0];
  if (!first) {
    trace("geocoder", `no match for "${location}"`);
    return null;
  }
  trace("geocoder", `"${location}" -> ${first.geometry.lat},${first.geometry.lng} (${first.formatted ?? "unnamed"})`);
  return { latitude: first.geometry.lat, longitude: first.geometry.lng };
}
