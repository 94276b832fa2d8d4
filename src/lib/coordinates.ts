import type { Coordinates, MuseumRecord } from "@/lib/types";

const LAT_LNG_PAIR_REGEX = /^\s*(-?\d{1,3}(?:\.\d+)?)\s*,\s*(-?\d{1,3}(?:\.\d+)?)\s*$/;

function isValidCoordinates(lat: number, lng: number): boolean {
  return Number.isFinite(lat) && Number.isFinite(lng) && lat >= -90 && lat <= 90 && lng >= -180 && lng <= 180;
}

function toCoordinates(latRaw: string, lngRaw: string): Coordinates | null {
  const lat = Number(latRaw);
  const lng = Number(lngRaw);

  if (!isValidCoordinates(lat, lng)) {
    return null;
  }

  return { lat, lng };
}

export function parseLatLngPair(raw: string): Coordinates | null {
  const match = raw.match(LAT_LNG_PAIR_REGEX);
  if (!match) {
    return null;
  }

  return toCoordinates(match[1], match[2]);
}

export function museumCoordinates(museum: Pick<MuseumRecord, "latitude" | "longitude">): Coordinates {
  return { lat: museum.latitude, lng: museum.longitude };
}
