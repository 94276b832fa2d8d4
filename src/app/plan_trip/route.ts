import { NextRequest } from "next/server";
import { ZodError } from "zod";
import { errorResponse, getClientIdentifier, jsonResponse, preflightResponse, readJsonBody } from "@/lib/api";
import { getErrorMessage, InvalidJsonBodyError } from "@/lib/errors";
import { resolveCurrentLocation } from "@/lib/geolocation";
import { fetchMuseumsForCities, NO_MUSEUMS_ERROR } from "@/lib/museums";
import { planTrip, resolveStartLocation } from "@/lib/trip-planner";
import { tripRequestSchema } from "@/lib/validation";

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const input = tripRequestSchema.parse(body);

    const museums = await fetchMuseumsForCities(input.cities);
    if (museums.length === 0) {
      return errorResponse(NO_MUSEUMS_ERROR, 400);
    }

    const clientIp = getClientIdentifier(request);
    const start = await resolveStartLocation(input.start_location, museums, () => resolveCurrentLocation(clientIp));
    if (!start.ok) {
      return errorResponse(start.error, 400);
    }

    const tripPlan = planTrip(start.coordinates, museums);
    console.log(`[Trip] Planned ${tripPlan.length} stops across ${input.cities.length} cities`);

    return jsonResponse({ trip_plan: tripPlan });
  } catch (error) {
    if (error instanceof ZodError) {
      return errorResponse("Invalid request payload.", 400, error.issues.map((issue) => issue.message).join("; "));
    }

    if (error instanceof InvalidJsonBodyError) {
      return errorResponse("Invalid request payload.", 400, error.message);
    }

    console.error("[Trip] Failed to plan trip:", error);
    return errorResponse("Failed to plan trip.", 400, getErrorMessage(error));
  }
}

export function OPTIONS() {
  return preflightResponse();
}
