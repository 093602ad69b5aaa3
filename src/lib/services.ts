import { AppConfig, loadConfig } from "@/lib/config";
import { GeminiGenerator, TextGenerator } from "@/lib/gemini";
import { FetchLike, GoogleMapsClient } from "@/lib/google-maps";
import { RoutePipeline, StageListener, logPipelineStage } from "@/lib/pipeline";
import { PlacesFinder } from "@/lib/places";
import { RouteExtractor } from "@/lib/route-extractor";
import { RouteLookup } from "@/lib/route-lookup";
import { Translator } from "@/lib/translator";

export interface Services {
  pipeline: RoutePipeline;
  places: PlacesFinder;
  translator: Translator;
}

export interface ServiceOverrides {
  generator?: TextGenerator;
  fetchImpl?: FetchLike;
  onStage?: StageListener;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const generator = overrides.generator ?? new GeminiGenerator(config);
  const maps = new GoogleMapsClient({
    apiKey: config.googleMapsApiKey,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl: overrides.fetchImpl
  });

  return {
    pipeline: new RoutePipeline(new RouteExtractor(generator), new RouteLookup(maps), overrides.onStage ?? logPipelineStage),
    places: new PlacesFinder(maps),
    translator: new Translator(generator)
  };
}

let services: Services | null = null;

/** Builds the services on first use; throws ConfigurationMissing until the keys are set. */
export function getServices(): Services {
  if (!services) {
    services = createServices(loadConfig());
  }

  return services;
}
