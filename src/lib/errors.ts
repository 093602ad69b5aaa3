export type ErrorKind =
  | "InvalidInput"
  | "ServiceUnavailable"
  | "ExtractionFailed"
  | "RouteNotFound"
  | "InvalidMode"
  | "ConfigurationMissing"
  | "TranslationFailed";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "InvalidInput",
  "ServiceUnavailable",
  "ExtractionFailed",
  "RouteNotFound",
  "InvalidMode",
  "ConfigurationMissing",
  "TranslationFailed"
];

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidInput: 400,
  InvalidMode: 400,
  ExtractionFailed: 422,
  RouteNotFound: 404,
  ServiceUnavailable: 502,
  ConfigurationMissing: 503,
  TranslationFailed: 502
};

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly details?: string;

  constructor(kind: ErrorKind, message: string, details?: string) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.details = details;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === "string" && (ERROR_KINDS as readonly string[]).includes(value);
}

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "Unknown error";
}
