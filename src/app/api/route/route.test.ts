import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { PipelineError } from "@/lib/errors";
import { POST } from "./route";

const { getServices, processRoute } = vi.hoisted(() => {
  const processRoute = vi.fn();
  return {
    processRoute,
    getServices: vi.fn(() => ({ pipeline: { process: processRoute } }))
  };
});

vi.mock("@/lib/services", () => ({ getServices }));

function textRequest(text: string) {
  const form = new FormData();
  form.set("text", text);
  return new NextRequest("http://localhost/api/route", { method: "POST", body: form });
}

const outcome = {
  request: { origin: "Pune", destination: "Mumbai", mode: "driving" },
  result: {
    distance_meters: 148500,
    distance_text: "148.5 km",
    duration_seconds: 10800,
    duration_text: "3 hours",
    steps: [],
    polyline: "",
    path: []
  }
};

describe("POST /api/route", () => {
  beforeEach(() => {
    processRoute.mockReset();
    getServices.mockClear();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("returns the extracted request and route", async () => {
    processRoute.mockResolvedValue(outcome);

    const response = await POST(textRequest("Pune to Mumbai by car"));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.request).toEqual(outcome.request);
    expect(body.result.distance_text).toBe("148.5 km");
    expect(typeof body.generatedAt).toBe("string");
    expect(processRoute.mock.calls[0][0]).toEqual({ kind: "text", text: "Pune to Mumbai by car" });
  });

  it("maps a missing route to 404", async () => {
    processRoute.mockRejectedValue(new PipelineError("RouteNotFound", "No driving route found from Pune to Atlantis."));

    const response = await POST(textRequest("Pune to Atlantis"));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: "No driving route found from Pune to Atlantis.",
      kind: "RouteNotFound"
    });
  });

  it("rejects blank text before running the pipeline", async () => {
    const response = await POST(textRequest("   "));

    expect(response.status).toBe(400);
    expect((await response.json()).kind).toBe("InvalidInput");
    expect(processRoute).not.toHaveBeenCalled();
  });

  it("answers 503 while keys are missing", async () => {
    getServices.mockImplementationOnce(() => {
      throw new PipelineError("ConfigurationMissing", "The server is not configured.", "GEMINI_API_KEY is not configured.");
    });

    const response = await POST(textRequest("Pune to Mumbai"));

    expect(response.status).toBe(503);
    expect((await response.json()).kind).toBe("ConfigurationMissing");
  });
});
