import { describe, expect, it } from "vitest";
import { PipelineError } from "@/lib/errors";
import { RouteExtractor, parseExtractionResponse } from "@/lib/route-extractor";
import { RawInput } from "@/lib/types";
import { StubGenerator, capturePipelineError } from "@/test/helpers";

function text(value: string): RawInput {
  return { kind: "text", text: value };
}

function reply(origin: string, destination: string, mode: string | null): string {
  return JSON.stringify({ origin, destination, mode });
}

describe("RouteExtractor", () => {
  it("extracts a typed request with an explicit mode", async () => {
    const generator = new StubGenerator(reply("Pune", "Mumbai", "car"));
    const extractor = new RouteExtractor(generator);

    await expect(extractor.extract(text("Pune to Mumbai by car"))).resolves.toEqual({
      origin: "Pune",
      destination: "Mumbai",
      mode: "driving"
    });
  });

  it("maps train to transit", async () => {
    const extractor = new RouteExtractor(new StubGenerator(reply("New York", "Boston", "train")));

    await expect(extractor.extract(text("I want to go from New York to Boston by train"))).resolves.toEqual({
      origin: "New York",
      destination: "Boston",
      mode: "transit"
    });
  });

  it("defaults to driving when no mode is stated", async () => {
    const extractor = new RouteExtractor(new StubGenerator(reply("San Francisco", "Los Angeles", null)));

    await expect(extractor.extract(text("San Francisco to Los Angeles"))).resolves.toEqual({
      origin: "San Francisco",
      destination: "Los Angeles",
      mode: "driving"
    });
  });

  it("sends the prompt, the payload and the response schema", async () => {
    const generator = new StubGenerator(reply("Pune", "Mumbai", "car"));
    await new RouteExtractor(generator).extract(text("Pune to Mumbai by car"));

    expect(generator.calls).toHaveLength(1);
    const [call] = generator.calls;
    expect(call.parts).toHaveLength(2);
    expect(call.parts[0].text).toContain("the route request below");
    expect(call.parts[1]).toEqual({ text: "Route request: Pune to Mumbai by car" });
    expect(call.options?.responseSchema).toMatchObject({
      type: "object",
      required: ["origin", "destination", "mode"]
    });
  });

  it("sends images inline", async () => {
    const generator = new StubGenerator(reply("Pune", "Mumbai", "bus"));
    const input: RawInput = { kind: "image", bytes: new Uint8Array([1, 2, 3]), mimeType: "image/png", source: "camera" };

    await expect(new RouteExtractor(generator).extract(input)).resolves.toMatchObject({ mode: "transit" });
    expect(generator.calls[0].parts[0].text).toContain("the attached image");
    expect(generator.calls[0].parts[1]).toEqual({ inlineData: { mimeType: "image/png", data: "AQID" } });
  });

  it("returns the same request for the same response", async () => {
    const extractor = new RouteExtractor(new StubGenerator(reply("Pune", "Mumbai", "walk")));

    const first = await extractor.extract(text("Pune to Mumbai on foot"));
    const second = await extractor.extract(text("Pune to Mumbai on foot"));
    expect(second).toEqual(first);
  });

  it("rejects unusable input before calling the model", async () => {
    const generator = new StubGenerator(reply("Pune", "Mumbai", null));
    const error = await capturePipelineError(new RouteExtractor(generator).extract(text("  ")));

    expect(error.kind).toBe("InvalidInput");
    expect(generator.calls).toHaveLength(0);
  });

  it("passes service failures through unchanged", async () => {
    const generator = new StubGenerator(new PipelineError("ServiceUnavailable", "The AI service could not be reached."));
    const error = await capturePipelineError(new RouteExtractor(generator).extract(text("Pune to Mumbai")));

    expect(error.kind).toBe("ServiceUnavailable");
  });
});

describe("parseExtractionResponse", () => {
  it("trims whitespace and trailing punctuation", () => {
    expect(parseExtractionResponse(reply("  Pune Station. ", "Mumbai  Central", "Bike"))).toEqual({
      origin: "Pune Station",
      destination: "Mumbai Central",
      mode: "bicycling"
    });
  });

  it("maps a plural mode from the model", () => {
    expect(parseExtractionResponse(reply("Pune", "Mumbai", "buses"))).toEqual({
      origin: "Pune",
      destination: "Mumbai",
      mode: "transit"
    });
  });

  it("fails when the destination is missing", async () => {
    const error = await capturePipelineError(() => parseExtractionResponse(reply("Pune", "", "car")));

    expect(error.kind).toBe("ExtractionFailed");
    expect(error.message).toBe("Could not identify the destination of the route.");
  });

  it("treats placeholder answers as missing", async () => {
    const error = await capturePipelineError(() => parseExtractionResponse(reply("Unknown", "N/A", null)));
    expect(error.message).toBe("Could not identify the origin and destination of the route.");
  });

  it("fails on text that is not JSON", async () => {
    const error = await capturePipelineError(() => parseExtractionResponse("Origin: Pune\nDestination: Mumbai"));

    expect(error.kind).toBe("ExtractionFailed");
    expect(error.message).toBe("The AI response was not valid JSON.");
  });

  it("fails on unexpected fields", async () => {
    const error = await capturePipelineError(() =>
      parseExtractionResponse(JSON.stringify({ origin: "Pune", destination: "Mumbai", mode: "car", via: "Lonavala" }))
    );

    expect(error.kind).toBe("ExtractionFailed");
    expect(error.message).toBe("The AI response did not have the expected fields.");
  });

  it("fails when the mode field is absent", async () => {
    const error = await capturePipelineError(() => parseExtractionResponse(JSON.stringify({ origin: "Pune", destination: "Mumbai" })));
    expect(error.kind).toBe("ExtractionFailed");
  });
});
