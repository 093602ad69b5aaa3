import { PipelineError, getErrorMessage } from "@/lib/errors";
import { Coordinates, PlacePhoto } from "@/lib/types";

const ROUTES_URL = "https://routes.googleapis.com/directions/v2:computeRoutes";
const NEARBY_SEARCH_URL = "https://maps.googleapis.com/maps/api/place/nearbysearch/json";
const PLACE_DETAILS_URL = "https://maps.googleapis.com/maps/api/place/details/json";
const PLACE_PHOTO_URL = "https://maps.googleapis.com/maps/api/place/photo";
const PLACE_DETAILS_FIELDS = "place_id,name,formatted_address,formatted_phone_number,website,opening_hours,url";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface GoogleMapsClientOptions {
  apiKey: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface RoutesApiStep {
  distanceMeters?: number;
  navigationInstruction?: {
    maneuver?: string;
    instructions?: string;
  };
  transitDetails?: {
    headsign?: string;
    stopCount?: number;
    transitLine?: {
      name?: string;
      nameShort?: string;
    };
  };
}

export interface RoutesApiRoute {
  distanceMeters?: number;
  duration?: string;
  polyline?: {
    encodedPolyline?: string;
  };
  legs?: Array<{
    steps?: RoutesApiStep[];
  }>;
}

export interface ComputeRoutesResponse {
  routes?: RoutesApiRoute[];
}

export interface ComputeRoutesBody {
  origin: { address: string };
  destination: { address: string };
  travelMode: string;
  routingPreference?: "TRAFFIC_AWARE";
  computeAlternativeRoutes: boolean;
  languageCode: string;
  units: "METRIC" | "IMPERIAL";
}

export interface NearbySearchResponse {
  status: string;
  error_message?: string;
  results?: Array<{
    place_id?: string;
    name?: string;
    vicinity?: string;
    rating?: number;
    user_ratings_total?: number;
    types?: string[];
    photos?: Array<{
      photo_reference?: string;
    }>;
    geometry?: {
      location?: {
        lat?: number;
        lng?: number;
      };
    };
  }>;
}

export interface PlaceDetailsResponse {
  status: string;
  error_message?: string;
  result?: {
    place_id?: string;
    name?: string;
    formatted_address?: string;
    formatted_phone_number?: string;
    website?: string;
    url?: string;
    opening_hours?: {
      open_now?: boolean;
      weekday_text?: string[];
    };
  };
}

interface GoogleErrorBody {
  error?: {
    message?: string;
    status?: string;
  };
}

async function readErrorMessage(response: Response): Promise<string> {
  try {
    const body = (await response.json()) as GoogleErrorBody;
    if (body.error?.message) {
      return body.error.status ? `${body.error.status}: ${body.error.message}` : body.error.message;
    }
  } catch {
    // Non-JSON error bodies fall back to the status line.
  }

  return response.statusText || "no error message";
}

export class GoogleMapsClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: GoogleMapsClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async computeRoutes(body: ComputeRoutesBody, fieldMask: string, signal?: AbortSignal): Promise<ComputeRoutesResponse> {
    return this.requestJson<ComputeRoutesResponse>(
      ROUTES_URL,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          "X-Goog-Api-Key": this.apiKey,
          "X-Goog-FieldMask": fieldMask
        },
        body: JSON.stringify(body)
      },
      signal
    );
  }

  async nearbySearch(location: Coordinates, radiusMeters: number, type: string, signal?: AbortSignal): Promise<NearbySearchResponse> {
    const url = new URL(NEARBY_SEARCH_URL);
    url.searchParams.set("location", `${location.lat},${location.lng}`);
    url.searchParams.set("radius", radiusMeters.toString());
    url.searchParams.set("type", type);
    url.searchParams.set("key", this.apiKey);

    return this.requestJson<NearbySearchResponse>(
      url,
      {
        method: "GET",
        headers: {
          Accept: "application/json"
        }
      },
      signal
    );
  }

  async placeDetails(placeId: string, signal?: AbortSignal): Promise<PlaceDetailsResponse> {
    const url = new URL(PLACE_DETAILS_URL);
    url.searchParams.set("place_id", placeId);
    url.searchParams.set("fields", PLACE_DETAILS_FIELDS);
    url.searchParams.set("key", this.apiKey);

    return this.requestJson<PlaceDetailsResponse>(url, { method: "GET", headers: { Accept: "application/json" } }, signal);
  }

  /** Fetches the image behind a photo reference so the key never reaches the browser. */
  async placePhoto(photoReference: string, maxWidth: number, signal?: AbortSignal): Promise<PlacePhoto> {
    const url = new URL(PLACE_PHOTO_URL);
    url.searchParams.set("photoreference", photoReference);
    url.searchParams.set("maxwidth", maxWidth.toString());
    url.searchParams.set("key", this.apiKey);

    const response = await this.request(url, { method: "GET" }, signal);
    try {
      return {
        bytes: await response.arrayBuffer(),
        content_type: response.headers.get("content-type") ?? "image/jpeg"
      };
    } catch (error) {
      throw new PipelineError("ServiceUnavailable", "The mapping service returned an unreadable photo.", getErrorMessage(error));
    }
  }

  private async requestJson<T>(url: string | URL, init: RequestInit, signal?: AbortSignal): Promise<T> {
    const response = await this.request(url, init, signal);

    try {
      return (await response.json()) as T;
    } catch (error) {
      throw new PipelineError("ServiceUnavailable", "The mapping service returned an unreadable response.", getErrorMessage(error));
    }
  }

  private async request(url: string | URL, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (error) {
      const reason = controller.signal.aborted && !signal?.aborted ? `timed out after ${this.timeoutMs} ms` : getErrorMessage(error);
      console.error(`[maps] request failed: ${reason}`);
      throw new PipelineError("ServiceUnavailable", "The mapping service could not be reached.", reason);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }

    if (!response.ok) {
      const message = await readErrorMessage(response);
      console.error(`[maps] HTTP ${response.status}: ${message}`);
      throw new PipelineError("ServiceUnavailable", `The mapping service rejected the request (HTTP ${response.status}).`, message);
    }

    return response;
  }
}
