import { GoogleGenAI } from "@google/genai";
import { AppConfig } from "@/lib/config";
import { PipelineError, getErrorMessage } from "@/lib/errors";

export interface ModelPart {
  text?: string;
  inlineData?: {
    mimeType: string;
    data: string;
  };
}

export interface GenerateOptions {
  /** JSON Schema the model must answer with; plain text when omitted. */
  responseSchema?: unknown;
  temperature?: number;
  signal?: AbortSignal;
}

export interface TextGenerator {
  generate(parts: ModelPart[], options?: GenerateOptions): Promise<string>;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }

  return undefined;
}

// Network errors carry no status; 408, 429 and 5xx are worth one more attempt.
function isTransient(error: unknown): boolean {
  const status = statusOf(error);
  if (status === undefined) {
    return true;
  }

  return status === 408 || status === 429 || status >= 500;
}

export class GeminiGenerator implements TextGenerator {
  private readonly ai: GoogleGenAI;
  private readonly model: string;
  private readonly maxRetries: number;

  constructor(config: Pick<AppConfig, "geminiApiKey" | "geminiModel" | "requestTimeoutMs" | "aiMaxRetries">) {
    this.ai = new GoogleGenAI({
      apiKey: config.geminiApiKey,
      httpOptions: { timeout: config.requestTimeoutMs }
    });
    this.model = config.geminiModel;
    this.maxRetries = config.aiMaxRetries;
  }

  async generate(parts: ModelPart[], options: GenerateOptions = {}): Promise<string> {
    let attempt = 0;

    while (true) {
      try {
        return await this.generateOnce(parts, options);
      } catch (error) {
        const aborted = options.signal?.aborted ?? false;
        if (aborted || attempt >= this.maxRetries || !isTransient(error)) {
          console.error(`[gemini] request failed after ${attempt + 1} attempt(s): ${getErrorMessage(error)}`);
          throw new PipelineError("ServiceUnavailable", "The AI service could not be reached.", getErrorMessage(error));
        }

        attempt += 1;
        console.warn(`[gemini] transient failure, retrying once: ${getErrorMessage(error)}`);
      }
    }
  }

  private async generateOnce(parts: ModelPart[], options: GenerateOptions): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: [{ role: "user", parts }],
      config: {
        temperature: options.temperature ?? 0.1,
        abortSignal: options.signal,
        ...(options.responseSchema !== undefined
          ? { responseMimeType: "application/json", responseJsonSchema: options.responseSchema }
          : {})
      }
    });

    return response.text ?? "";
  }
}
