import { PipelineError } from "@/lib/errors";
import { formatDuration, formatStepDistance, formatTotalDistance, parseDurationSeconds } from "@/lib/format";
import { GoogleMapsClient, RoutesApiStep } from "@/lib/google-maps";
import { decodePolyline } from "@/lib/polyline";
import { isRouteMode, toRoutesTravelMode } from "@/lib/route-modes";
import { RouteRequest, RouteResult, RouteStep } from "@/lib/types";
import { routeRequestSchema } from "@/lib/validation";

export interface Lookup {
  lookup(request: RouteRequest, signal?: AbortSignal): Promise<RouteResult>;
}

export const ROUTES_FIELD_MASK = [
  "routes.distanceMeters",
  "routes.duration",
  "routes.polyline.encodedPolyline",
  "routes.legs.steps.distanceMeters",
  "routes.legs.steps.navigationInstruction",
  "routes.legs.steps.transitDetails.headsign",
  "routes.legs.steps.transitDetails.stopCount",
  "routes.legs.steps.transitDetails.transitLine.name",
  "routes.legs.steps.transitDetails.transitLine.nameShort"
].join(",");

function describeTransitStep(step: RoutesApiStep): string | null {
  const details = step.transitDetails;
  if (!details) {
    return null;
  }

  const line = details.transitLine?.nameShort || details.transitLine?.name || "transit";
  let text = `Take ${line}`;
  if (details.headsign) {
    text += ` toward ${details.headsign}`;
  }
  if (typeof details.stopCount === "number" && details.stopCount > 0) {
    text += ` (${details.stopCount} stop${details.stopCount === 1 ? "" : "s"})`;
  }

  return text;
}

function toRouteStep(step: RoutesApiStep): RouteStep {
  const distanceMeters = step.distanceMeters ?? 0;
  const instruction = step.navigationInstruction?.instructions?.trim() || describeTransitStep(step) || "Continue";

  return {
    instruction,
    distance_meters: distanceMeters,
    distance_text: formatStepDistance(distanceMeters)
  };
}

export class RouteLookup implements Lookup {
  constructor(private readonly maps: GoogleMapsClient) {}

  async lookup(request: RouteRequest, signal?: AbortSignal): Promise<RouteResult> {
    const parsed = routeRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new PipelineError("InvalidInput", "Origin and destination are both required.", parsed.error.issues.map((issue) => issue.message).join("; "));
    }

    if (!isRouteMode(parsed.data.mode)) {
      throw new PipelineError("InvalidMode", `Travel mode "${parsed.data.mode}" is not supported.`);
    }

    const travelMode = toRoutesTravelMode(parsed.data.mode);
    console.info(`[maps] route ${parsed.data.origin} -> ${parsed.data.destination} (${travelMode})`);

    const payload = await this.maps.computeRoutes(
      {
        origin: { address: parsed.data.origin },
        destination: { address: parsed.data.destination },
        travelMode,
        ...(travelMode === "DRIVE" ? { routingPreference: "TRAFFIC_AWARE" as const } : {}),
        computeAlternativeRoutes: false,
        languageCode: "en-US",
        units: "METRIC"
      },
      ROUTES_FIELD_MASK,
      signal
    );

    const route = payload.routes?.[0];
    if (!route) {
      throw new PipelineError(
        "RouteNotFound",
        `No ${parsed.data.mode} route found from ${parsed.data.origin} to ${parsed.data.destination}.`
      );
    }

    const distanceMeters = route.distanceMeters ?? 0;
    const durationSeconds = parseDurationSeconds(route.duration);
    const polyline = route.polyline?.encodedPolyline ?? "";
    const steps = (route.legs ?? []).flatMap((leg) => (leg.steps ?? []).map(toRouteStep));

    return {
      distance_meters: distanceMeters,
      distance_text: formatTotalDistance(distanceMeters),
      duration_seconds: durationSeconds,
      duration_text: formatDuration(durationSeconds),
      steps,
      polyline,
      path: decodePolyline(polyline)
    };
  }
}
