import { z } from "zod";

const configSchema = z.object({
  MUSEUM_API_BASE_URL: z.string().trim().url().default("https://historyproject.somee.com/api/Museums"),
  GEOLOCATION_API_URL: z.string().trim().url().default("https://ipinfo.io"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(15000)
});

export interface AppConfig {
  museumApiBaseUrl: string;
  geolocationApiUrl: string;
  upstreamTimeoutMs: number;
}

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, "");
}

export function getConfig(): AppConfig {
  const parsed = configSchema.safeParse(process.env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new Error(`Invalid configuration: ${fields}.`);
  }

  return {
    museumApiBaseUrl: stripTrailingSlashes(parsed.data.MUSEUM_API_BASE_URL),
    geolocationApiUrl: stripTrailingSlashes(parsed.data.GEOLOCATION_API_URL),
    upstreamTimeoutMs: parsed.data.UPSTREAM_TIMEOUT_MS
  };
}
