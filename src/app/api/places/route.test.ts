import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { PipelineError } from "@/lib/errors";
import { POST } from "./route";

const { getServices, findAlongRoute } = vi.hoisted(() => {
  const findAlongRoute = vi.fn();
  return {
    findAlongRoute,
    getServices: vi.fn(() => ({ places: { findAlongRoute } }))
  };
});

vi.mock("@/lib/services", () => ({ getServices }));

function jsonRequest(body: string) {
  return new NextRequest("http://localhost/api/places", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body
  });
}

describe("POST /api/places", () => {
  beforeEach(() => {
    findAlongRoute.mockReset();
    getServices.mockClear();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("searches the requested category, defaulting to restaurants", async () => {
    findAlongRoute.mockResolvedValue({ category: "restaurants", places: [], warnings: [] });

    const response = await POST(jsonRequest(JSON.stringify({ polyline: "_p~iF~ps|U" })));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ category: "restaurants", places: [], warnings: [] });
    expect(findAlongRoute.mock.calls[0][0]).toBe("_p~iF~ps|U");
    expect(findAlongRoute.mock.calls[0][1]).toBe("restaurants");
  });

  it("rejects an unknown category with 400", async () => {
    const response = await POST(jsonRequest(JSON.stringify({ polyline: "_p~iF~ps|U", category: "casinos" })));

    expect(response.status).toBe(400);
    expect((await response.json()).kind).toBe("InvalidInput");
    expect(findAlongRoute).not.toHaveBeenCalled();
  });

  it("rejects a body that is not JSON with 400", async () => {
    const response = await POST(jsonRequest("{polyline"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Request body is not valid JSON.", kind: "InvalidInput" });
  });

  it("answers 503 while keys are missing", async () => {
    getServices.mockImplementationOnce(() => {
      throw new PipelineError("ConfigurationMissing", "Application configuration is incomplete.", "GOOGLE_MAPS_API_KEY is not configured.");
    });

    const response = await POST(jsonRequest(JSON.stringify({ polyline: "_p~iF~ps|U" })));

    expect(response.status).toBe(503);
    expect((await response.json()).kind).toBe("ConfigurationMissing");
  });
});
