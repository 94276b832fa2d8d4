import { getConfig } from "@/lib/config";
import { parseLatLngPair } from "@/lib/coordinates";
import { getErrorMessage } from "@/lib/errors";
import { fetchWithTimeout } from "@/lib/http";
import type { Coordinates } from "@/lib/types";

interface IpLookupResponse {
  loc?: unknown;
}

function isIpLookupResponse(payload: unknown): payload is IpLookupResponse {
  return typeof payload === "object" && payload !== null;
}

function buildLookupUrl(baseUrl: string, clientIp?: string): string {
  if (!clientIp || clientIp === "unknown") {
    return baseUrl;
  }

  return `${baseUrl}/${encodeURIComponent(clientIp)}`;
}

/**
 * Approximate position of the caller from an IP lookup service.
 * Every failure is logged and reported as `null`.
 */
export async function resolveCurrentLocation(clientIp?: string): Promise<Coordinates | null> {
  try {
    const config = getConfig();
    const response = await fetchWithTimeout(buildLookupUrl(config.geolocationApiUrl, clientIp), config.upstreamTimeoutMs);

    if (!response.ok) {
      throw new Error(`IP lookup failed with HTTP ${response.status}.`);
    }

    const payload: unknown = await response.json();
    if (!isIpLookupResponse(payload) || typeof payload.loc !== "string") {
      throw new Error("Location data not found in IP lookup response.");
    }

    const coords = parseLatLngPair(payload.loc);
    if (!coords) {
      throw new Error(`Unparseable location "${payload.loc}".`);
    }

    console.log(`[Geolocation] Current location ${coords.lat},${coords.lng}`);
    return coords;
  } catch (error) {
    console.warn("[Geolocation] Error retrieving current location:", getErrorMessage(error));
    return null;
  }
}
