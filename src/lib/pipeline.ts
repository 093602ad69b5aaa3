import { ErrorKind, PipelineError, getErrorMessage } from "@/lib/errors";
import { describeInput } from "@/lib/raw-input";
import { Extractor } from "@/lib/route-extractor";
import { Lookup } from "@/lib/route-lookup";
import { RawInput, RouteMode, RouteOutcome } from "@/lib/types";

export type PipelineStage =
  | { name: "NotStarted" }
  | { name: "Extracting"; input: string }
  | { name: "LookingUp"; mode: RouteMode }
  | { name: "Done"; steps: number }
  | { name: "Failed"; kind: ErrorKind; message: string };

export type StageListener = (stage: PipelineStage) => void;

/** Stage listener used by the app: one log line per transition. */
export function logPipelineStage(stage: PipelineStage): void {
  switch (stage.name) {
    case "NotStarted":
      return;
    case "Extracting":
      console.info(`[pipeline] extracting route from ${stage.input}`);
      return;
    case "LookingUp":
      console.info(`[pipeline] looking up ${stage.mode} route`);
      return;
    case "Done":
      console.info(`[pipeline] done, ${stage.steps} step(s)`);
      return;
    case "Failed":
      console.warn(`[pipeline] ${stage.kind}: ${stage.message}`);
  }
}

function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  return new PipelineError("ServiceUnavailable", "Unexpected failure while finding the route.", getErrorMessage(error));
}

/**
 * Extract, then look up. The first failure stops the run and is rethrown with
 * its kind untouched; lookup never starts before extraction has succeeded.
 */
export class RoutePipeline {
  constructor(
    private readonly extractor: Extractor,
    private readonly lookup: Lookup,
    private readonly onStage?: StageListener
  ) {}

  async process(input: RawInput, signal?: AbortSignal): Promise<RouteOutcome> {
    this.emit({ name: "NotStarted" });

    try {
      this.emit({ name: "Extracting", input: describeInput(input) });
      const request = await this.extractor.extract(input, signal);

      this.emit({ name: "LookingUp", mode: request.mode });
      const result = await this.lookup.lookup(request, signal);

      this.emit({ name: "Done", steps: result.steps.length });
      return { request, result };
    } catch (error) {
      const failure = toPipelineError(error);
      this.emit({ name: "Failed", kind: failure.kind, message: failure.message });
      throw failure;
    }
  }

  private emit(stage: PipelineStage): void {
    this.onStage?.(stage);
  }
}
