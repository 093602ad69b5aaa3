import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GET } from "./route";

describe("GET /api/health", () => {
  beforeEach(() => {
    vi.stubEnv("GEMINI_API_KEY", "test-secret");
    vi.stubEnv("GOOGLE_MAPS_API_KEY", "test-maps-key");
    vi.stubEnv("GEMINI_MODEL", "gemini-2.5-pro");
    vi.stubEnv("REQUEST_TIMEOUT_MS", "15000");
    vi.stubEnv("AI_MAX_RETRIES", "1");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reports ok with the configured model", async () => {
    const response = GET();

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", model: "gemini-2.5-pro", problems: [] });
  });

  it("answers 503 while a key is missing", async () => {
    vi.stubEnv("GOOGLE_MAPS_API_KEY", "  ");

    const response = GET();

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      status: "misconfigured",
      kind: "ConfigurationMissing",
      problems: ["GOOGLE_MAPS_API_KEY is not configured."]
    });
  });
});
