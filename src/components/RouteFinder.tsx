"use client";

import { FormEvent, useCallback, useEffect, useMemo, useState } from "react";
import dynamic from "next/dynamic";
import { dataUrlToFile } from "@/lib/data-url";
import { ErrorKind, isErrorKind } from "@/lib/errors";
import { ERROR_TITLES, InputKind, Translation, formatRouteText, userMessageFor, visibleTranslation } from "@/lib/presenter";
import { describeRouteMode } from "@/lib/route-modes";
import { Place, PlaceCategory, PlaceDetails, PlacesSearchResult, RouteOutcome } from "@/lib/types";

const RouteMap = dynamic(() => import("@/components/RouteMap"), {
  ssr: false,
  loading: () => (
    <div className="loading-state">
      <div className="spinner" aria-hidden="true" />
      <span>Loading map...</span>
    </div>
  )
});

const CameraCapture = dynamic(() => import("@/components/CameraCapture"), {
  ssr: false,
  loading: () => <p>Starting camera...</p>
});

type InputTab = "upload" | "camera" | "text";

interface ApiErrorPayload {
  error?: string;
  kind?: string;
  details?: string;
}

interface RouteApiResponse extends RouteOutcome {
  generatedAt: string;
}

interface DisplayError {
  kind: ErrorKind;
  input?: InputKind;
  detail: string;
}

interface RouteFinderProps {
  languages: readonly string[];
  categories: Array<{ key: PlaceCategory; label: string }>;
}

const TABS: Array<{ key: InputTab; label: string }> = [
  { key: "upload", label: "Image Upload" },
  { key: "camera", label: "Camera" },
  { key: "text", label: "Text Input" }
];

const TEXT_EXAMPLES = [
  "Pune to Mumbai by car",
  "I want to go from New York to Boston by train",
  "Directions from Seattle to Portland by bicycle",
  "San Francisco to Los Angeles"
];

async function parseApiError(response: Response, input?: InputKind): Promise<DisplayError> {
  try {
    const payload = (await response.json()) as ApiErrorPayload;
    if (isErrorKind(payload.kind)) {
      return {
        kind: payload.kind,
        input,
        detail: [payload.error, payload.details].filter(Boolean).join(" ")
      };
    }
  } catch {
    // Non-JSON bodies come from the platform, not from our handlers.
  }

  return { kind: "ServiceUnavailable", input, detail: `Request failed (${response.status})` };
}

function networkError(error: unknown, input?: InputKind): DisplayError {
  return {
    kind: "ServiceUnavailable",
    input,
    detail: error instanceof Error ? error.message : "Network request failed."
  };
}

function ErrorBanner({ error }: { error: DisplayError }) {
  return (
    <div className="error-banner" role="alert">
      <strong>{ERROR_TITLES[error.kind]}.</strong> {userMessageFor(error.kind, error.input)}
      {error.detail ? <div className="error-detail">{error.detail}</div> : null}
    </div>
  );
}

function PlaceDetailsPanel({ details }: { details: PlaceDetails }) {
  return (
    <dl className="place-details">
      {details.address ? (
        <>
          <dt>Address</dt>
          <dd>{details.address}</dd>
        </>
      ) : null}
      {details.phone ? (
        <>
          <dt>Phone</dt>
          <dd>{details.phone}</dd>
        </>
      ) : null}
      {details.website ? (
        <>
          <dt>Website</dt>
          <dd>
            <a href={details.website} target="_blank" rel="noreferrer">
              {details.website}
            </a>
          </dd>
        </>
      ) : null}
      {details.open_now !== null ? (
        <>
          <dt>Status</dt>
          <dd>{details.open_now ? "Open now" : "Closed now"}</dd>
        </>
      ) : null}
      {details.opening_hours.length > 0 ? (
        <>
          <dt>Hours</dt>
          <dd>
            <ul>
              {details.opening_hours.map((line) => (
                <li key={line}>{line}</li>
              ))}
            </ul>
          </dd>
        </>
      ) : null}
      {details.maps_url ? (
        <>
          <dt>Map</dt>
          <dd>
            <a href={details.maps_url} target="_blank" rel="noreferrer">
              Open in Google Maps
            </a>
          </dd>
        </>
      ) : null}
    </dl>
  );
}

export default function RouteFinder({ languages, categories }: RouteFinderProps) {
  const [tab, setTab] = useState<InputTab>("upload");
  const [uploadFile, setUploadFile] = useState<File | null>(null);
  const [uploadPreview, setUploadPreview] = useState<string>("");
  const [cameraShot, setCameraShot] = useState<string>("");
  const [textInput, setTextInput] = useState<string>("");

  const [loading, setLoading] = useState<boolean>(false);
  const [routeError, setRouteError] = useState<DisplayError | null>(null);
  const [outcome, setOutcome] = useState<RouteApiResponse | null>(null);

  const [language, setLanguage] = useState<string>(languages[0] ?? "English");
  const [translation, setTranslation] = useState<Translation | null>(null);
  const [translating, setTranslating] = useState<boolean>(false);
  const [translateError, setTranslateError] = useState<DisplayError | null>(null);

  const [category, setCategory] = useState<PlaceCategory>(categories[0]?.key ?? "restaurants");
  const [places, setPlaces] = useState<PlacesSearchResult | null>(null);
  const [placesLoading, setPlacesLoading] = useState<boolean>(false);
  const [placesError, setPlacesError] = useState<DisplayError | null>(null);
  const [openPlaceId, setOpenPlaceId] = useState<string>("");
  const [placeDetails, setPlaceDetails] = useState<PlaceDetails | null>(null);
  const [detailsError, setDetailsError] = useState<DisplayError | null>(null);

  useEffect(() => {
    if (!uploadFile) {
      setUploadPreview("");
      return;
    }

    const href = URL.createObjectURL(uploadFile);
    setUploadPreview(href);
    return () => {
      URL.revokeObjectURL(href);
    };
  }, [uploadFile]);

  const runPipeline = useCallback(async (body: FormData, input: InputKind) => {
    setLoading(true);
    setRouteError(null);
    setOutcome(null);
    setTranslation(null);
    setTranslateError(null);
    setPlaces(null);
    setPlacesError(null);

    try {
      const response = await fetch("/api/route", {
        method: "POST",
        body
      });

      if (!response.ok) {
        setRouteError(await parseApiError(response, input));
        return;
      }

      setOutcome((await response.json()) as RouteApiResponse);
    } catch (error) {
      setRouteError(networkError(error, input));
    } finally {
      setLoading(false);
    }
  }, []);

  const onUploadSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!uploadFile) {
      setRouteError({ kind: "InvalidInput", input: "image", detail: "" });
      return;
    }

    const body = new FormData();
    body.set("image", uploadFile);
    body.set("source", "upload");
    await runPipeline(body, "image");
  };

  const onCameraSubmit = async () => {
    if (!cameraShot) {
      setRouteError({ kind: "InvalidInput", input: "image", detail: "" });
      return;
    }

    const body = new FormData();
    body.set("image", dataUrlToFile(cameraShot, "camera-capture"));
    body.set("source", "camera");
    await runPipeline(body, "image");
  };

  const onTextSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!textInput.trim()) {
      setRouteError({ kind: "InvalidInput", input: "text", detail: "" });
      return;
    }

    const body = new FormData();
    body.set("text", textInput.trim());
    await runPipeline(body, "text");
  };

  const routeText = useMemo(() => (outcome ? formatRouteText(outcome.request, outcome.result) : ""), [outcome]);

  const translated = visibleTranslation(translation, language, routeText);

  const onTranslate = async () => {
    if (!routeText) {
      return;
    }

    if (language === "English") {
      setTranslation(null);
      setTranslateError(null);
      return;
    }

    setTranslating(true);
    setTranslateError(null);

    try {
      const response = await fetch("/api/translate", {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({ text: routeText, language })
      });

      if (!response.ok) {
        setTranslateError(await parseApiError(response));
        return;
      }

      const payload = (await response.json()) as { text: string };
      setTranslation({ language, source: routeText, text: payload.text });
    } catch (error) {
      setTranslateError(networkError(error));
    } finally {
      setTranslating(false);
    }
  };

  const onSearchPlaces = async () => {
    if (!outcome?.result.polyline) {
      return;
    }

    setPlacesLoading(true);
    setPlacesError(null);
    setOpenPlaceId("");

    try {
      const response = await fetch("/api/places", {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({ polyline: outcome.result.polyline, category })
      });

      if (!response.ok) {
        setPlacesError(await parseApiError(response));
        return;
      }

      setPlaces((await response.json()) as PlacesSearchResult);
    } catch (error) {
      setPlacesError(networkError(error));
    } finally {
      setPlacesLoading(false);
    }
  };

  const onToggleDetails = async (place: Place) => {
    if (openPlaceId === place.place_id) {
      setOpenPlaceId("");
      return;
    }

    setOpenPlaceId(place.place_id);
    setPlaceDetails(null);
    setDetailsError(null);

    try {
      const response = await fetch(`/api/places/${encodeURIComponent(place.place_id)}`);
      if (!response.ok) {
        setDetailsError(await parseApiError(response));
        return;
      }

      setPlaceDetails((await response.json()) as PlaceDetails);
    } catch (error) {
      setDetailsError(networkError(error));
    }
  };

  const categoryLabel = categories.find((item) => item.key === places?.category)?.label ?? "Places";

  return (
    <>
      <section className="panel panel-main">
        <div className="tab-row" role="tablist">
          {TABS.map((item) => (
            <button
              key={item.key}
              type="button"
              role="tab"
              aria-selected={tab === item.key}
              className={tab === item.key ? "tab active" : "tab"}
              onClick={() => setTab(item.key)}
            >
              {item.label}
            </button>
          ))}
        </div>

        {tab === "upload" ? (
          <form className="input-form" onSubmit={onUploadSubmit}>
            <label htmlFor="route-image">Upload an image that names a starting point and a destination</label>
            <input
              id="route-image"
              type="file"
              accept="image/jpeg,image/png,image/webp"
              onChange={(event) => setUploadFile(event.target.files?.[0] ?? null)}
            />
            {uploadPreview ? <img className="image-preview" src={uploadPreview} alt="Selected route request" /> : null}
            <div className="toolbar-row">
              <button type="submit" disabled={loading || !uploadFile}>
                {loading ? "Finding route..." : "Find Route"}
              </button>
            </div>
          </form>
        ) : null}

        {tab === "camera" ? (
          <div className="input-form">
            <p className="panel-subtitle">Point the camera at a sign, ticket or note that shows your route.</p>
            {cameraShot ? (
              <>
                <img className="image-preview" src={cameraShot} alt="Captured route request" />
                <div className="toolbar-row">
                  <button type="button" onClick={() => void onCameraSubmit()} disabled={loading}>
                    {loading ? "Finding route..." : "Find Route"}
                  </button>
                  <button type="button" className="secondary" onClick={() => setCameraShot("")} disabled={loading}>
                    Retake
                  </button>
                </div>
              </>
            ) : (
              <CameraCapture disabled={loading} onCapture={setCameraShot} />
            )}
          </div>
        ) : null}

        {tab === "text" ? (
          <form className="input-form" onSubmit={onTextSubmit}>
            <label htmlFor="route-text">Enter your route request</label>
            <input
              id="route-text"
              type="text"
              maxLength={500}
              placeholder="Pune to Mumbai by car"
              value={textInput}
              onChange={(event) => setTextInput(event.target.value)}
            />
            <div className="toolbar-row">
              <button type="submit" disabled={loading}>
                {loading ? "Finding route..." : "Find Route"}
              </button>
            </div>
            <ul className="examples">
              {TEXT_EXAMPLES.map((example) => (
                <li key={example}>
                  <button type="button" className="link-button" onClick={() => setTextInput(example)}>
                    {example}
                  </button>
                </li>
              ))}
            </ul>
          </form>
        ) : null}

        {loading ? (
          <div className="loading-state">
            <div className="spinner" aria-hidden="true" />
            <span>Reading your request and looking up directions...</span>
          </div>
        ) : null}

        {routeError ? <ErrorBanner error={routeError} /> : null}
      </section>

      {outcome ? (
        <div className="content-grid">
          <section className="panel">
            <h2>
              {outcome.request.origin} &rarr; {outcome.request.destination}
            </h2>
            <p className="meta-row">Mode: {describeRouteMode(outcome.request.mode)}</p>

            <div className="route-summary">
              <div>
                <span className="summary-label">Total distance</span>
                <strong>{outcome.result.distance_text}</strong>
              </div>
              <div>
                <span className="summary-label">Estimated time</span>
                <strong>{outcome.result.duration_text}</strong>
              </div>
            </div>

            <h3>Directions</h3>
            {outcome.result.steps.length === 0 ? (
              <p>Detailed directions not available.</p>
            ) : (
              <ol className="step-list">
                {outcome.result.steps.map((step, index) => (
                  <li key={`${index}-${step.instruction}`}>
                    {step.instruction} <span className="step-distance">({step.distance_text})</span>
                  </li>
                ))}
              </ol>
            )}

            <div className="toolbar-row">
              <label htmlFor="language">Language</label>
              <select
                id="language"
                value={language}
                onChange={(event) => {
                  setLanguage(event.target.value);
                  setTranslation(null);
                  setTranslateError(null);
                }}
              >
                {languages.map((item) => (
                  <option key={item} value={item}>
                    {item}
                  </option>
                ))}
              </select>
              <button type="button" onClick={() => void onTranslate()} disabled={translating}>
                {translating ? "Translating..." : "Translate"}
              </button>
            </div>

            {translateError ? <ErrorBanner error={translateError} /> : null}
            {translated ? <pre className="translated-text">{translated}</pre> : null}

            <p className="meta-row">Last updated: {new Date(outcome.generatedAt).toLocaleString()}</p>
          </section>

          <section className="panel">
            <h2>Map</h2>
            <RouteMap
              key={outcome.result.polyline}
              path={outcome.result.path}
              originLabel={outcome.request.origin}
              destinationLabel={outcome.request.destination}
              places={places?.places ?? []}
            />

            <div className="toolbar-row">
              <label htmlFor="place-category">Find along the route</label>
              <select id="place-category" value={category} onChange={(event) => setCategory(event.target.value as PlaceCategory)}>
                {categories.map((item) => (
                  <option key={item.key} value={item.key}>
                    {item.label}
                  </option>
                ))}
              </select>
              <button type="button" onClick={() => void onSearchPlaces()} disabled={placesLoading || !outcome.result.polyline}>
                {placesLoading ? "Searching..." : "Search"}
              </button>
            </div>

            {placesError ? <ErrorBanner error={placesError} /> : null}

            {places ? (
              places.places.length === 0 ? (
                <p>No {categoryLabel.toLowerCase()} found near this route.</p>
              ) : (
                <ul className="place-list">
                  {places.places.map((place) => (
                    <li key={place.place_id}>
                      {place.photo_reference ? (
                        <img
                          className="place-photo"
                          src={`/api/places/photo?ref=${encodeURIComponent(place.photo_reference)}`}
                          alt={place.name}
                          loading="lazy"
                        />
                      ) : null}
                      <strong>{place.name}</strong>
                      <span className="legend-metrics">
                        {place.rating > 0 ? `${place.rating.toFixed(1)} stars (${place.ratings_total} reviews)` : "No rating"} |{" "}
                        {place.address}
                      </span>
                      <button type="button" className="link-button" onClick={() => void onToggleDetails(place)}>
                        {openPlaceId === place.place_id ? "Hide details" : "Show details"}
                      </button>
                      {openPlaceId === place.place_id ? (
                        detailsError ? (
                          <ErrorBanner error={detailsError} />
                        ) : placeDetails?.place_id === place.place_id ? (
                          <PlaceDetailsPanel details={placeDetails} />
                        ) : (
                          <p className="meta-row">Loading details...</p>
                        )
                      ) : null}
                    </li>
                  ))}
                </ul>
              )
            ) : null}

            {places && places.warnings.length > 0 ? <p className="row-error">{places.warnings.join(" ")}</p> : null}
          </section>
        </div>
      ) : null}
    </>
  );
}
