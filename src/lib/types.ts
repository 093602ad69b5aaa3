export type RouteMode = "driving" | "walking" | "bicycling" | "transit";

export type ImageMimeType = "image/jpeg" | "image/png" | "image/webp";

export type InputSource = "upload" | "camera";

export type RawInput =
  | {
      kind: "image";
      bytes: Uint8Array;
      mimeType: ImageMimeType;
      source: InputSource;
    }
  | {
      kind: "text";
      text: string;
    };

export interface Coordinates {
  lat: number;
  lng: number;
}

export interface RouteRequest {
  origin: string;
  destination: string;
  mode: RouteMode;
}

export interface RouteStep {
  instruction: string;
  distance_meters: number;
  distance_text: string;
}

export interface RouteResult {
  distance_meters: number;
  distance_text: string;
  duration_seconds: number;
  duration_text: string;
  steps: RouteStep[];
  polyline: string;
  path: Coordinates[];
}

export interface RouteOutcome {
  request: RouteRequest;
  result: RouteResult;
}

export type PlaceCategory = "restaurants" | "hotels" | "fuel" | "hospitals" | "attractions" | "shopping";

export interface Place {
  place_id: string;
  name: string;
  address: string;
  rating: number;
  ratings_total: number;
  location: Coordinates;
  types: string[];
  photo_reference: string | null;
}

export interface PlaceDetails {
  place_id: string;
  name: string;
  address: string;
  phone: string | null;
  website: string | null;
  maps_url: string | null;
  open_now: boolean | null;
  opening_hours: string[];
}

export interface PlacePhoto {
  bytes: ArrayBuffer;
  content_type: string;
}

export interface PlacesSearchResult {
  category: PlaceCategory;
  places: Place[];
  warnings: string[];
}
