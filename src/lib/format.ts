function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? "" : "s"}`;
}

/** Seconds are only shown for trips shorter than an hour. */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const remainder = seconds % 60;

  const parts: string[] = [];
  if (hours > 0) {
    parts.push(plural(hours, "hour"));
  }
  if (minutes > 0) {
    parts.push(plural(minutes, "minute"));
  }
  if (remainder > 0 && hours === 0) {
    parts.push(plural(remainder, "second"));
  }

  return parts.length > 0 ? parts.join(" ") : "0 seconds";
}

export function formatTotalDistance(meters: number): string {
  return `${(meters / 1000).toFixed(1)} km`;
}

export function formatStepDistance(meters: number): string {
  if (meters < 1000) {
    return `${Math.round(meters)} m`;
  }

  return `${(meters / 1000).toFixed(1)} km`;
}

/** Parses protobuf duration strings such as "3725s" or "12.5s". */
export function parseDurationSeconds(raw: string | undefined): number {
  if (!raw) {
    return 0;
  }

  const value = Number(raw.trim().replace(/s$/, ""));
  return Number.isFinite(value) ? Math.round(value) : 0;
}
