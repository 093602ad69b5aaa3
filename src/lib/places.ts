import { PipelineError, getErrorMessage } from "@/lib/errors";
import { GoogleMapsClient, NearbySearchResponse, PlaceDetailsResponse } from "@/lib/google-maps";
import { decodePolyline, samplePath } from "@/lib/polyline";
import { Place, PlaceCategory, PlaceDetails, PlacePhoto, PlacesSearchResult } from "@/lib/types";

export const PLACE_CATEGORY_KEYS = ["restaurants", "hotels", "fuel", "hospitals", "attractions", "shopping"] as const;

export const PLACE_CATEGORIES: Record<PlaceCategory, { label: string; type: string }> = {
  restaurants: { label: "Restaurants", type: "restaurant" },
  hotels: { label: "Hotels", type: "lodging" },
  fuel: { label: "Petrol Stations", type: "gas_station" },
  hospitals: { label: "Hospitals & Clinics", type: "hospital" },
  attractions: { label: "Attractions", type: "tourist_attraction" },
  shopping: { label: "Shopping", type: "shopping_mall" }
};

export interface PlacesSearchOptions {
  radiusMeters?: number;
  maxResults?: number;
  signal?: AbortSignal;
}

const DEFAULT_RADIUS_METERS = 5000;
const DEFAULT_MAX_RESULTS = 10;
const RATINGS_COUNT_CAP = 100;
const DEFAULT_PHOTO_WIDTH = 400;

function toPlaces(response: NearbySearchResponse): Place[] {
  return (response.results ?? []).flatMap((result) => {
    const lat = result.geometry?.location?.lat;
    const lng = result.geometry?.location?.lng;
    if (!result.place_id || !result.name || typeof lat !== "number" || typeof lng !== "number") {
      return [];
    }

    return [
      {
        place_id: result.place_id,
        name: result.name,
        address: result.vicinity ?? "",
        rating: result.rating ?? 0,
        ratings_total: result.user_ratings_total ?? 0,
        location: { lat, lng },
        types: result.types ?? [],
        photo_reference: result.photos?.[0]?.photo_reference ?? null
      }
    ];
  });
}

function toPlaceDetails(placeId: string, response: PlaceDetailsResponse): PlaceDetails {
  const result = response.result ?? {};

  return {
    place_id: result.place_id ?? placeId,
    name: result.name ?? "",
    address: result.formatted_address ?? "",
    phone: result.formatted_phone_number ?? null,
    website: result.website ?? null,
    maps_url: result.url ?? null,
    open_now: result.opening_hours?.open_now ?? null,
    opening_hours: result.opening_hours?.weekday_text ?? []
  };
}

export function placeScore(place: Place): number {
  return place.rating * Math.min(place.ratings_total, RATINGS_COUNT_CAP);
}

export class PlacesFinder {
  constructor(private readonly maps: GoogleMapsClient) {}

  async findAlongRoute(polyline: string, category: PlaceCategory, options: PlacesSearchOptions = {}): Promise<PlacesSearchResult> {
    const points = samplePath(decodePolyline(polyline));
    if (points.length === 0) {
      throw new PipelineError("InvalidInput", "The route polyline has no points.");
    }

    const { type } = PLACE_CATEGORIES[category];
    const radius = options.radiusMeters ?? DEFAULT_RADIUS_METERS;

    const responses = await Promise.allSettled(
      points.map(async (point) => {
        const response = await this.maps.nearbySearch(point, radius, type, options.signal);
        if (response.status !== "OK" && response.status !== "ZERO_RESULTS") {
          throw new Error(response.error_message || `Places search failed with status ${response.status}.`);
        }

        return toPlaces(response);
      })
    );

    const warnings: string[] = [];
    const byId = new Map<string, Place>();

    responses.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        warnings.push(`Search near point ${index + 1} failed: ${getErrorMessage(outcome.reason)}`);
        return;
      }

      for (const place of outcome.value) {
        if (!byId.has(place.place_id)) {
          byId.set(place.place_id, place);
        }
      }
    });

    if (warnings.length === responses.length) {
      console.error(`[maps] places search failed at every point: ${warnings.join(" | ")}`);
      throw new PipelineError("ServiceUnavailable", "Places along the route could not be searched.", warnings.join(" | "));
    }

    if (warnings.length > 0) {
      console.warn(`[maps] places search partially failed: ${warnings.join(" | ")}`);
    }

    const places = [...byId.values()]
      .sort((a, b) => placeScore(b) - placeScore(a))
      .slice(0, options.maxResults ?? DEFAULT_MAX_RESULTS);

    return { category, places, warnings };
  }

  async getDetails(placeId: string, signal?: AbortSignal): Promise<PlaceDetails> {
    const response = await this.maps.placeDetails(placeId, signal);
    if (response.status === "NOT_FOUND" || response.status === "INVALID_REQUEST") {
      throw new PipelineError("InvalidInput", "The place could not be found.", `Place details status ${response.status}.`);
    }
    if (response.status !== "OK") {
      const reason = response.error_message || `Place details failed with status ${response.status}.`;
      console.error(`[maps] place details failed: ${reason}`);
      throw new PipelineError("ServiceUnavailable", "Place details could not be loaded.", reason);
    }

    return toPlaceDetails(placeId, response);
  }

  async getPhoto(photoReference: string, maxWidth = DEFAULT_PHOTO_WIDTH, signal?: AbortSignal): Promise<PlacePhoto> {
    return this.maps.placePhoto(photoReference, maxWidth, signal);
  }
}
