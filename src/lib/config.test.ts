import { describe, expect, it } from "vitest";
import { getConfigStatus, loadConfig } from "@/lib/config";
import { capturePipelineError } from "@/test/helpers";

const validEnv = {
  GEMINI_API_KEY: "test-gemini-key",
  GOOGLE_MAPS_API_KEY: "test-maps-key"
};

describe("getConfigStatus", () => {
  it("applies defaults when only the keys are set", () => {
    const status = getConfigStatus(validEnv);

    expect(status).toEqual({
      ok: true,
      config: {
        geminiApiKey: "test-gemini-key",
        googleMapsApiKey: "test-maps-key",
        geminiModel: "gemini-2.5-flash",
        requestTimeoutMs: 15000,
        aiMaxRetries: 1
      }
    });
  });

  it("reads optional overrides", () => {
    const status = getConfigStatus({
      ...validEnv,
      GEMINI_MODEL: "gemini-2.0-flash",
      REQUEST_TIMEOUT_MS: "5000",
      AI_MAX_RETRIES: "0"
    });

    expect(status.ok && status.config).toMatchObject({
      geminiModel: "gemini-2.0-flash",
      requestTimeoutMs: 5000,
      aiMaxRetries: 0
    });
  });

  it("reports every missing key", () => {
    expect(getConfigStatus({})).toEqual({
      ok: false,
      problems: ["GEMINI_API_KEY is not configured.", "GOOGLE_MAPS_API_KEY is not configured."]
    });
  });

  it("treats a blank key as missing", () => {
    expect(getConfigStatus({ ...validEnv, GOOGLE_MAPS_API_KEY: "   " })).toEqual({
      ok: false,
      problems: ["GOOGLE_MAPS_API_KEY is not configured."]
    });
  });

  it("rejects more than one retry", () => {
    expect(getConfigStatus({ ...validEnv, AI_MAX_RETRIES: "3" })).toEqual({
      ok: false,
      problems: ["AI_MAX_RETRIES must be 0 or 1."]
    });
  });
});

describe("loadConfig", () => {
  it("throws ConfigurationMissing with the problems as details", async () => {
    const error = await capturePipelineError(() => loadConfig({ GEMINI_API_KEY: "test-gemini-key" }));

    expect(error.kind).toBe("ConfigurationMissing");
    expect(error.status).toBe(503);
    expect(error.details).toBe("GOOGLE_MAPS_API_KEY is not configured.");
  });
});
