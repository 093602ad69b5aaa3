import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { PipelineError } from "@/lib/errors";
import { POST } from "./route";

const { getServices, translate } = vi.hoisted(() => {
  const translate = vi.fn();
  return {
    translate,
    getServices: vi.fn(() => ({ translator: { translate } }))
  };
});

vi.mock("@/lib/services", () => ({ getServices }));

function jsonRequest(body: unknown) {
  return new NextRequest("http://localhost/api/translate", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
  });
}

describe("POST /api/translate", () => {
  beforeEach(() => {
    translate.mockReset();
    getServices.mockClear();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("returns the translated text with its language", async () => {
    translate.mockResolvedValue("पुणे से मुंबई");

    const response = await POST(jsonRequest({ text: "Pune to Mumbai", language: "Hindi" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ language: "Hindi", text: "पुणे से मुंबई" });
    expect(translate.mock.calls[0][0]).toBe("Pune to Mumbai");
    expect(translate.mock.calls[0][1]).toBe("Hindi");
  });

  it("rejects an unsupported language with 400", async () => {
    const response = await POST(jsonRequest({ text: "Pune to Mumbai", language: "Klingon" }));

    expect(response.status).toBe(400);
    expect((await response.json()).kind).toBe("InvalidInput");
    expect(translate).not.toHaveBeenCalled();
  });

  it("maps an empty translation to 502", async () => {
    translate.mockRejectedValue(new PipelineError("TranslationFailed", "The AI service returned no Tamil translation."));

    const response = await POST(jsonRequest({ text: "Pune to Mumbai", language: "Tamil" }));

    expect(response.status).toBe(502);
    expect((await response.json()).kind).toBe("TranslationFailed");
  });

  it("answers 503 while keys are missing", async () => {
    getServices.mockImplementationOnce(() => {
      throw new PipelineError("ConfigurationMissing", "Application configuration is incomplete.", "GEMINI_API_KEY is not configured.");
    });

    const response = await POST(jsonRequest({ text: "Pune to Mumbai", language: "Hindi" }));

    expect(response.status).toBe(503);
    expect((await response.json()).kind).toBe("ConfigurationMissing");
  });
});
