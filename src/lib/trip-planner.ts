import { museumCoordinates } from "@/lib/coordinates";
import { distanceKm } from "@/lib/distance";
import type { Coordinates, MuseumRecord, StartLocationResult, TripStop } from "@/lib/types";

export const CURRENT_LOCATION_KEYWORD = "current location";
export const CURRENT_LOCATION_ERROR = "Unable to fetch current location.";
export const INVALID_START_NUMBER_ERROR = "Invalid start location number. Please enter a valid number or museum name.";
export const INVALID_START_INPUT_ERROR = "Invalid start location input. Please enter a valid number or museum name.";

const INTEGER_REGEX = /^[+-]?\d+$/;

// Ties go to the museum that comes first in `museums`.
export function planTrip(start: Coordinates, museums: readonly MuseumRecord[]): TripStop[] {
  const visited = new Array<boolean>(museums.length).fill(false);
  const plan: TripStop[] = [];
  let current = start;

  while (plan.length < museums.length) {
    let bestIndex = -1;
    let bestDistance = Number.POSITIVE_INFINITY;

    museums.forEach((museum, index) => {
      if (visited[index]) {
        return;
      }

      const distance = distanceKm(current, museumCoordinates(museum));
      if (bestIndex === -1 || distance < bestDistance) {
        bestIndex = index;
        bestDistance = distance;
      }
    });

    const next = museums[bestIndex];
    visited[bestIndex] = true;
    plan.push({ ...next, distance: bestDistance });
    current = museumCoordinates(next);
  }

  return plan;
}

export async function resolveStartLocation(
  input: string,
  museums: readonly MuseumRecord[],
  locateCurrent: () => Promise<Coordinates | null>
): Promise<StartLocationResult> {
  const normalized = input.trim().toLowerCase();

  if (normalized === CURRENT_LOCATION_KEYWORD) {
    const coordinates = await locateCurrent();
    return coordinates ? { ok: true, coordinates } : { ok: false, error: CURRENT_LOCATION_ERROR };
  }

  const named = museums.find((museum) => museum.name.toLowerCase() === normalized);
  if (named) {
    return { ok: true, coordinates: museumCoordinates(named) };
  }

  if (!INTEGER_REGEX.test(normalized)) {
    return { ok: false, error: INVALID_START_INPUT_ERROR };
  }

  const index = Number(normalized) - 1;
  if (index < 0 || index >= museums.length) {
    return { ok: false, error: INVALID_START_NUMBER_ERROR };
  }

  return { ok: true, coordinates: museumCoordinates(museums[index]) };
}
