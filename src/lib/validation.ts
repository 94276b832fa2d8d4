import { z } from "zod";

const coordinateSchema = z.number().refine((value) => Number.isFinite(value), {
  message: "Invalid coordinate value"
});

const citiesSchema = z.array(z.string(), {
  required_error: "cities is required"
});

export const showMuseumsRequestSchema = z.object({
  cities: citiesSchema
});

export const tripRequestSchema = z.object({
  cities: citiesSchema,
  start_location: z.string({ required_error: "start_location is required" })
});

export const upstreamMuseumSchema = z.object({
  name: z.string().min(1),
  latitude: coordinateSchema,
  longitude: coordinateSchema,
  imageUrl: z.string().nullish()
});

export const upstreamMuseumsSchema = z.array(upstreamMuseumSchema);
