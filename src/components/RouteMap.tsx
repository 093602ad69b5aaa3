"use client";

import { CircleMarker, MapContainer, Polyline, Popup, TileLayer, Tooltip } from "react-leaflet";
import { Coordinates, Place } from "@/lib/types";

interface RouteMapProps {
  path: Coordinates[];
  originLabel: string;
  destinationLabel: string;
  places: Place[];
}

function toPosition(point: Coordinates): [number, number] {
  return [point.lat, point.lng];
}

export default function RouteMap({ path, originLabel, destinationLabel, places }: RouteMapProps) {
  const positions = path.map(toPosition);
  const start = positions[0];
  const end = positions[positions.length - 1];

  if (!start || !end) {
    return <p>No route geometry to display.</p>;
  }

  return (
    <div className="live-map-shell">
      <MapContainer
        bounds={positions.length > 1 ? positions : undefined}
        center={positions.length > 1 ? undefined : start}
        zoom={positions.length > 1 ? undefined : 13}
        boundsOptions={{ padding: [24, 24] }}
        scrollWheelZoom
        className="live-map"
        preferCanvas
      >
        <TileLayer
          attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
          url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
        />

        <Polyline positions={positions} pathOptions={{ color: "#0f4aa6", weight: 5, opacity: 0.75 }} />

        <CircleMarker center={start} radius={10} pathOptions={{ color: "#2e7d32", fillColor: "#2e7d32", fillOpacity: 0.95 }}>
          <Tooltip permanent direction="top" offset={[0, -10]} className="map-tooltip">
            A
          </Tooltip>
          <Popup>
            <strong>Start</strong>
            <div>{originLabel}</div>
          </Popup>
        </CircleMarker>

        <CircleMarker center={end} radius={10} pathOptions={{ color: "#d32f2f", fillColor: "#d32f2f", fillOpacity: 0.95 }}>
          <Tooltip permanent direction="top" offset={[0, -10]} className="map-tooltip target">
            B
          </Tooltip>
          <Popup>
            <strong>Destination</strong>
            <div>{destinationLabel}</div>
          </Popup>
        </CircleMarker>

        {places.map((place) => (
          <CircleMarker
            key={place.place_id}
            center={toPosition(place.location)}
            radius={7}
            pathOptions={{ color: "#f57c00", fillColor: "#ffb300", fillOpacity: 0.9 }}
          >
            <Popup>
              <strong>{place.name}</strong>
              {place.address ? <div>{place.address}</div> : null}
              <div>
                Rating: {place.rating > 0 ? place.rating.toFixed(1) : "-"} ({place.ratings_total} reviews)
              </div>
            </Popup>
          </CircleMarker>
        ))}
      </MapContainer>
    </div>
  );
}
