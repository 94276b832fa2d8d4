import type { AppConfig } from "@/lib/config";
import { getConfig } from "@/lib/config";
import { getErrorMessage, UpstreamSchemaError } from "@/lib/errors";
import { fetchWithTimeout } from "@/lib/http";
import type { CityMuseums, MuseumRecord } from "@/lib/types";
import { upstreamMuseumsSchema } from "@/lib/validation";

export const NO_MUSEUMS_ERROR = "No valid museums found for the provided cities. Please enter valid city names.";

function buildCityUrl(baseUrl: string, city: string): string {
  return `${baseUrl}/city/${encodeURIComponent(city)}`;
}

export function parseMuseumPayload(city: string, payload: unknown): MuseumRecord[] {
  const parsed = upstreamMuseumsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamSchemaError(
      city,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`)
    );
  }

  return parsed.data.map(({ name, latitude, longitude, imageUrl }) => ({
    name,
    latitude,
    longitude,
    city,
    ...(imageUrl != null ? { imageUrl } : {})
  }));
}

/**
 * Museums the provider lists for one city, or `null` when the provider does not
 * answer with HTTP 200. Throws {@link UpstreamSchemaError} on a malformed body.
 */
export async function fetchMuseumData(city: string, config: AppConfig = getConfig()): Promise<CityMuseums | null> {
  let response: Response;
  try {
    response = await fetchWithTimeout(buildCityUrl(config.museumApiBaseUrl, city), config.upstreamTimeoutMs);
  } catch (error) {
    console.warn(`[Museums] Request for "${city}" failed:`, getErrorMessage(error));
    return null;
  }

  if (response.status !== 200) {
    console.warn(`[Museums] Error fetching museum data for "${city}": HTTP ${response.status}`);
    return null;
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new UpstreamSchemaError(city, [`invalid JSON: ${getErrorMessage(error)}`]);
  }

  return { city, museums: parseMuseumPayload(city, payload) };
}

/** Fetches every city concurrently and concatenates the results in city order. */
export async function fetchMuseumsForCities(cities: readonly string[]): Promise<MuseumRecord[]> {
  const config = getConfig();
  const results = await Promise.allSettled(
    cities.map((city) => (city.trim() ? fetchMuseumData(city, config) : Promise.resolve(null)))
  );

  const museums: MuseumRecord[] = [];
  results.forEach((result, index) => {
    const city = cities[index];

    if (result.status === "rejected") {
      console.warn(`[Museums] Skipping "${city}":`, getErrorMessage(result.reason));
      return;
    }

    if (!result.value || result.value.museums.length === 0) {
      console.warn(`[Museums] No museum data found for "${city}".`);
      return;
    }

    for (const museum of result.value.museums) {
      museums.push({ ...museum, city });
    }
  });

  return museums;
}
