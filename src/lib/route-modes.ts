import { PipelineError } from "@/lib/errors";
import { RouteMode } from "@/lib/types";

export const ROUTE_MODES: readonly RouteMode[] = ["driving", "walking", "bicycling", "transit"];

export const DEFAULT_ROUTE_MODE: RouteMode = "driving";

export type RoutesTravelMode = "DRIVE" | "WALK" | "BICYCLE" | "TRANSIT";

const TRAVEL_MODE_BY_ROUTE_MODE: Record<RouteMode, RoutesTravelMode> = {
  driving: "DRIVE",
  walking: "WALK",
  bicycling: "BICYCLE",
  transit: "TRANSIT"
};

// First match wins, so multi-word phrases come before the words they contain.
const MODE_KEYWORDS: ReadonlyArray<readonly [string, RouteMode]> = [
  ["public transportation", "transit"],
  ["public transport", "transit"],
  ["on foot", "walking"],
  ["car", "driving"],
  ["cab", "driving"],
  ["taxi", "driving"],
  ["driving", "driving"],
  ["drive", "driving"],
  ["walking", "walking"],
  ["walk", "walking"],
  ["foot", "walking"],
  ["bicycling", "bicycling"],
  ["bicycle", "bicycling"],
  ["cycling", "bicycling"],
  ["cycle", "bicycling"],
  ["biking", "bicycling"],
  ["bike", "bicycling"],
  ["transit", "transit"],
  ["bus", "transit"],
  ["train", "transit"],
  ["metro", "transit"],
  ["subway", "transit"],
  ["tram", "transit"],
  ["railway", "transit"],
  ["rail", "transit"]
];

// Keywords also match with a plural ending ("buses", "trains", "bikes").
const MODE_PATTERNS: ReadonlyArray<readonly [RegExp, RouteMode]> = MODE_KEYWORDS.map(([keyword, mode]): readonly [RegExp, RouteMode] => [
  new RegExp(` ${keyword}(?:s|es)? `),
  mode
]);

function normalizeModeText(raw: string): string {
  return ` ${raw
    .toLowerCase()
    .replace(/[^a-z]+/g, " ")
    .trim()} `;
}

export function isRouteMode(value: string): value is RouteMode {
  return (ROUTE_MODES as readonly string[]).includes(value);
}

/**
 * Maps free-form transport wording ("by car", "Bus", "on foot") to a route mode.
 * Missing or unrecognized wording falls back to driving.
 */
export function parseRouteMode(raw: string | null | undefined): RouteMode {
  if (!raw) {
    return DEFAULT_ROUTE_MODE;
  }

  const normalized = normalizeModeText(raw);
  for (const [pattern, mode] of MODE_PATTERNS) {
    if (pattern.test(normalized)) {
      return mode;
    }
  }

  return DEFAULT_ROUTE_MODE;
}

export function toRoutesTravelMode(mode: string): RoutesTravelMode {
  if (!isRouteMode(mode)) {
    throw new PipelineError("InvalidMode", `Travel mode "${mode}" is not supported.`);
  }

  return TRAVEL_MODE_BY_ROUTE_MODE[mode];
}

export function describeRouteMode(mode: RouteMode): string {
  switch (mode) {
    case "driving":
      return "Driving";
    case "walking":
      return "Walking";
    case "bicycling":
      return "Bicycling";
    case "transit":
      return "Public transit";
  }
}
