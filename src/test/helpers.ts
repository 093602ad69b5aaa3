import { PipelineError } from "@/lib/errors";
import { TextGenerator, GenerateOptions, ModelPart } from "@/lib/gemini";

export async function capturePipelineError(work: Promise<unknown> | (() => unknown)): Promise<PipelineError> {
  try {
    await (typeof work === "function" ? work() : work);
  } catch (error) {
    if (error instanceof PipelineError) {
      return error;
    }
    throw error;
  }

  throw new Error("Expected a PipelineError to be thrown.");
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export class StubGenerator implements TextGenerator {
  readonly calls: Array<{ parts: ModelPart[]; options?: GenerateOptions }> = [];

  constructor(private readonly reply: string | Error) {}

  async generate(parts: ModelPart[], options?: GenerateOptions): Promise<string> {
    this.calls.push({ parts, options });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}
