import { NextRequest } from "next/server";
import { ZodError } from "zod";
import { errorResponse, jsonResponse, preflightResponse, readJsonBody } from "@/lib/api";
import { getErrorMessage, InvalidJsonBodyError } from "@/lib/errors";
import { fetchMuseumsForCities, NO_MUSEUMS_ERROR } from "@/lib/museums";
import { showMuseumsRequestSchema } from "@/lib/validation";

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const input = showMuseumsRequestSchema.parse(body);

    const museums = await fetchMuseumsForCities(input.cities);
    if (museums.length === 0) {
      return errorResponse(NO_MUSEUMS_ERROR, 400);
    }

    return jsonResponse(museums);
  } catch (error) {
    if (error instanceof ZodError) {
      return errorResponse("Invalid request payload.", 400, error.issues.map((issue) => issue.message).join("; "));
    }

    if (error instanceof InvalidJsonBodyError) {
      return errorResponse("Invalid request payload.", 400, error.message);
    }

    console.error("[Museums] Failed to list museums:", error);
    return errorResponse("Failed to list museums.", 400, getErrorMessage(error));
  }
}

export function OPTIONS() {
  return preflightResponse();
}
