import { PipelineError, getErrorMessage } from "@/lib/errors";
import { ModelPart } from "@/lib/gemini";
import { ImageMimeType, InputSource, RawInput } from "@/lib/types";
import { textInputSchema } from "@/lib/validation";

export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

const IMAGE_MIME_TYPES: readonly ImageMimeType[] = ["image/jpeg", "image/png", "image/webp"];

function toImageMimeType(type: string): ImageMimeType | null {
  const normalized = type.toLowerCase() === "image/jpg" ? "image/jpeg" : type.toLowerCase();
  return IMAGE_MIME_TYPES.find((candidate) => candidate === normalized) ?? null;
}

function toInputSource(value: FormDataEntryValue | null): InputSource {
  return value === "camera" ? "camera" : "upload";
}

export function imageInput(bytes: Uint8Array, type: string, source: InputSource = "upload"): RawInput {
  if (bytes.byteLength === 0) {
    throw new PipelineError("InvalidInput", "The image is empty.");
  }

  if (bytes.byteLength > MAX_IMAGE_BYTES) {
    throw new PipelineError("InvalidInput", "The image is larger than 10 MB.");
  }

  const mimeType = toImageMimeType(type);
  if (!mimeType) {
    throw new PipelineError("InvalidInput", "Only JPEG, PNG and WebP images are supported.", `Received "${type || "unknown"}".`);
  }

  return { kind: "image", bytes, mimeType, source };
}

export function textInput(raw: string): RawInput {
  const parsed = textInputSchema.safeParse({ text: raw });
  if (!parsed.success) {
    throw new PipelineError(
      "InvalidInput",
      "The route description is invalid.",
      parsed.error.issues.map((issue) => issue.message).join("; ")
    );
  }

  return { kind: "text", text: parsed.data.text };
}

/** Re-checks a value that may not have come through the constructors above. */
export function assertUsableInput(input: RawInput): void {
  if (input.kind === "image") {
    imageInput(input.bytes, input.mimeType, input.source);
    return;
  }

  textInput(input.text);
}

async function readMultipart(request: Request): Promise<RawInput> {
  let form: FormData;
  try {
    form = await request.formData();
  } catch (error) {
    throw new PipelineError("InvalidInput", "The upload could not be read.", getErrorMessage(error));
  }

  const image = form.get("image");
  if (image !== null && typeof image !== "string") {
    const bytes = new Uint8Array(await image.arrayBuffer());
    return imageInput(bytes, image.type, toInputSource(form.get("source")));
  }

  const text = form.get("text");
  if (typeof text === "string") {
    return textInput(text);
  }

  throw new PipelineError("InvalidInput", "Provide either an image or a text description.");
}

async function readJson(request: Request): Promise<RawInput> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new PipelineError("InvalidInput", "The request body is not valid JSON.");
  }

  if (typeof body === "object" && body !== null && "text" in body && typeof body.text === "string") {
    return textInput(body.text);
  }

  throw new PipelineError("InvalidInput", "Provide either an image or a text description.");
}

/** Normalizes the upload, camera and text surfaces into one RawInput. */
export async function readRawInput(request: Request): Promise<RawInput> {
  const contentType = request.headers.get("content-type")?.toLowerCase() ?? "";

  if (contentType.startsWith("multipart/form-data") || contentType.startsWith("application/x-www-form-urlencoded")) {
    return readMultipart(request);
  }

  if (contentType.startsWith("application/json")) {
    return readJson(request);
  }

  throw new PipelineError("InvalidInput", "Unsupported request format.", `Content-Type "${contentType || "none"}".`);
}

export function toModelParts(input: RawInput): ModelPart[] {
  if (input.kind === "image") {
    return [{ inlineData: { mimeType: input.mimeType, data: Buffer.from(input.bytes).toString("base64") } }];
  }

  return [{ text: `Route request: ${input.text}` }];
}

export function describeInput(input: RawInput): string {
  if (input.kind === "image") {
    return `${input.source} image, ${input.mimeType}, ${input.bytes.byteLength} bytes`;
  }

  return `text, ${input.text.length} characters`;
}
