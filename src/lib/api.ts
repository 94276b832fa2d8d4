import { NextRequest, NextResponse } from "next/server";
import { InvalidJsonBodyError } from "@/lib/errors";

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type"
};

export function getClientIdentifier(request: NextRequest): string {
  const forwardedFor = request.headers.get("x-forwarded-for");
  if (forwardedFor) {
    return forwardedFor.split(",")[0].trim();
  }

  const realIp = request.headers.get("x-real-ip");
  if (realIp) {
    return realIp;
  }

  return "unknown";
}

export async function readJsonBody(request: NextRequest): Promise<unknown> {
  const raw = await request.text();
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidJsonBodyError();
  }
}

export function jsonResponse(body: unknown, status = 200) {
  return NextResponse.json(body, { status, headers: CORS_HEADERS });
}

export function errorResponse(message: string, status = 400, details?: string) {
  return jsonResponse(
    {
      error: message,
      details
    },
    status
  );
}

export function preflightResponse() {
  return new NextResponse(null, { status: 204, headers: CORS_HEADERS });
}
