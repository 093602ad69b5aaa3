import { ErrorKind } from "@/lib/errors";
import { describeRouteMode } from "@/lib/route-modes";
import { RouteRequest, RouteResult } from "@/lib/types";

export type InputKind = "image" | "text";

const MESSAGES: Record<ErrorKind, string> = {
  InvalidInput: "Add an image or type a route description before searching.",
  ExtractionFailed: "Could not understand your request. Name a clear starting point and destination, for example \"Pune to Mumbai by car\".",
  RouteNotFound: "No route found between these places for that mode of transport. Try another mode or a more specific place name.",
  InvalidMode: "That mode of transport is not supported. Use driving, walking, bicycling or transit.",
  ServiceUnavailable: "The map or AI service is unavailable right now. Please try again in a moment.",
  ConfigurationMissing: "The app is not configured: the AI and Google Maps API keys must be set before routes can be found.",
  TranslationFailed: "Could not translate the directions. They are shown in English instead."
};

export const ERROR_TITLES: Record<ErrorKind, string> = {
  InvalidInput: "Nothing to search",
  ExtractionFailed: "Request not understood",
  RouteNotFound: "No route found",
  InvalidMode: "Unsupported mode",
  ServiceUnavailable: "Service unavailable",
  ConfigurationMissing: "Configuration missing",
  TranslationFailed: "Translation failed"
};

export function userMessageFor(kind: ErrorKind, input?: InputKind): string {
  if (kind === "ExtractionFailed" && input === "image") {
    return "Could not understand the image. Use a clear photo of text naming a starting point and destination.";
  }

  return MESSAGES[kind];
}

export function formatRouteText(request: RouteRequest, result: RouteResult): string {
  const lines = [
    `Route from ${request.origin} to ${request.destination} (${describeRouteMode(request.mode)}):`,
    `Total Distance: ${result.distance_text}`,
    `Estimated Time: ${result.duration_text}`,
    "",
    "Directions:"
  ];

  if (result.steps.length === 0) {
    lines.push("Detailed directions not available.");
  } else {
    result.steps.forEach((step, index) => {
      lines.push(`${index + 1}. ${step.instruction} (${step.distance_text})`);
    });
  }

  return lines.join("\n");
}

export interface Translation {
  language: string;
  source: string;
  text: string;
}

/** A translation is shown only for the language and directions it was made from. */
export function visibleTranslation(translation: Translation | null, language: string, source: string): string {
  if (!translation || translation.language !== language || translation.source !== source) {
    return "";
  }

  return translation.text;
}
