import { Coordinates } from "@/lib/types";

// Google encoded polyline algorithm, precision 1e5.
export function decodePolyline(encoded: string): Coordinates[] {
  const points: Coordinates[] = [];
  let index = 0;
  let lat = 0;
  let lng = 0;

  const readValue = (): number | null => {
    let shift = 0;
    let result = 0;
    let byte: number;

    do {
      if (index >= encoded.length) {
        return null;
      }
      byte = encoded.charCodeAt(index++) - 63;
      result |= (byte & 0x1f) << shift;
      shift += 5;
    } while (byte >= 0x20);

    return (result & 1) !== 0 ? ~(result >> 1) : result >> 1;
  };

  while (index < encoded.length) {
    const dlat = readValue();
    const dlng = readValue();
    if (dlat === null || dlng === null) {
      break;
    }

    lat += dlat;
    lng += dlng;
    points.push({ lat: lat * 1e-5, lng: lng * 1e-5 });
  }

  return points;
}

/** Picks start, quarter, half, three-quarter and end points of a path. */
export function samplePath(path: Coordinates[], maxPoints = 5): Coordinates[] {
  if (path.length <= maxPoints) {
    return path;
  }

  const last = path.length - 1;
  const indexes = new Set<number>();
  for (let slot = 0; slot < maxPoints; slot += 1) {
    indexes.add(Math.floor((slot * path.length) / (maxPoints - 1)));
  }
  indexes.delete(path.length);
  indexes.add(last);

  return [...indexes].sort((a, b) => a - b).map((index) => path[index]);
}
