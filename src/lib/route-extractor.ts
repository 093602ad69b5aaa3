import { zodToJsonSchema } from "zod-to-json-schema";
import { PipelineError } from "@/lib/errors";
import { TextGenerator } from "@/lib/gemini";
import { assertUsableInput, toModelParts } from "@/lib/raw-input";
import { parseRouteMode } from "@/lib/route-modes";
import { RawInput, RouteRequest } from "@/lib/types";
import { extractionResponseSchema } from "@/lib/validation";

export interface Extractor {
  extract(input: RawInput, signal?: AbortSignal): Promise<RouteRequest>;
}

const extractionJsonSchema = zodToJsonSchema(extractionResponseSchema);

const PLACEHOLDER_VALUES = new Set(["", "unknown", "none", "null", "n/a", "na", "not specified", "not given", "not mentioned"]);

export function buildExtractionPrompt(input: RawInput): string {
  const subject = input.kind === "image" ? "the attached image" : "the route request below";

  return `Read ${subject} and identify the journey it describes.
Return a JSON object with exactly three fields:
- "origin": the starting point (city, landmark or address) as written.
- "destination": the end point as written.
- "mode": the mode of transport as written (for example car, walk, bike, bus, train), or null if none is stated.
Use an empty string for an origin or destination that is not present. Do not guess places that are not in the input.`;
}

function cleanPlace(value: string): string {
  const collapsed = value.replace(/\s+/g, " ").trim().replace(/[.;:,]+$/, "").trim();
  return PLACEHOLDER_VALUES.has(collapsed.toLowerCase()) ? "" : collapsed;
}

/** Strict parse of the model's structured answer; any deviation is an extraction failure. */
export function parseExtractionResponse(responseText: string): RouteRequest {
  let payload: unknown;
  try {
    payload = JSON.parse(responseText);
  } catch {
    throw new PipelineError("ExtractionFailed", "The AI response was not valid JSON.", responseText.slice(0, 200));
  }

  const parsed = extractionResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PipelineError(
      "ExtractionFailed",
      "The AI response did not have the expected fields.",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "response"}: ${issue.message}`).join("; ")
    );
  }

  const origin = cleanPlace(parsed.data.origin);
  const destination = cleanPlace(parsed.data.destination);

  if (!origin || !destination) {
    const missing = [!origin ? "origin" : null, !destination ? "destination" : null].filter(Boolean).join(" and ");
    throw new PipelineError("ExtractionFailed", `Could not identify the ${missing} of the route.`);
  }

  return {
    origin,
    destination,
    mode: parseRouteMode(parsed.data.mode)
  };
}

export class RouteExtractor implements Extractor {
  constructor(private readonly generator: TextGenerator) {}

  async extract(input: RawInput, signal?: AbortSignal): Promise<RouteRequest> {
    assertUsableInput(input);

    const responseText = await this.generator.generate([{ text: buildExtractionPrompt(input) }, ...toModelParts(input)], {
      responseSchema: extractionJsonSchema,
      temperature: 0,
      signal
    });

    return parseExtractionResponse(responseText);
  }
}
