import { z } from "zod";
import { PLACE_CATEGORY_KEYS } from "@/lib/places";
import { SUPPORTED_LANGUAGES } from "@/lib/translator";

export const MAX_TEXT_LENGTH = 500;

export const textInputSchema = z.object({
  text: z
    .string()
    .trim()
    .min(1, "Describe the route, for example \"Pune to Mumbai by car\".")
    .max(MAX_TEXT_LENGTH, `The route description is too long (${MAX_TEXT_LENGTH} characters at most).`)
});

export const routeRequestSchema = z.object({
  origin: z.string().trim().min(1, "Origin is required"),
  destination: z.string().trim().min(1, "Destination is required"),
  mode: z.string()
});

export const extractionResponseSchema = z
  .object({
    origin: z.string().describe("Starting point exactly as named in the input; empty string if none is given"),
    destination: z.string().describe("End point exactly as named in the input; empty string if none is given"),
    mode: z
      .string()
      .nullable()
      .describe("Mode of transport in the input's own words (car, walk, bike, bus, train...); null if not stated")
  })
  .strict();

export const translateRequestSchema = z.object({
  text: z.string().trim().min(1, "Nothing to translate").max(20000, "Text is too long to translate"),
  language: z.enum(SUPPORTED_LANGUAGES)
});

export const placesRequestSchema = z.object({
  polyline: z.string().trim().min(1, "Route polyline is required").max(100000, "Route polyline is too long"),
  category: z.enum(PLACE_CATEGORY_KEYS).default("restaurants")
});

// Place ids and photo references share the same URL-safe alphabet.
export const placeIdSchema = z
  .string({ required_error: "Place identifier is required" })
  .trim()
  .min(1, "Place identifier is required")
  .max(1024, "Place identifier is too long")
  .regex(/^[A-Za-z0-9_-]+$/, "Place identifier has unexpected characters");

export const placePhotoRequestSchema = z.object({
  ref: placeIdSchema,
  maxwidth: z.coerce.number().int().min(50).max(1600).default(400)
});
