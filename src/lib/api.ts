import { NextResponse } from "next/server";
import { ZodError } from "zod";
import { ErrorKind, getErrorMessage, isPipelineError, statusForKind } from "@/lib/errors";

export interface ApiErrorBody {
  error: string;
  kind: ErrorKind;
  details?: string;
}

export function errorResponse(message: string, kind: ErrorKind, details?: string, status = statusForKind(kind)) {
  return NextResponse.json<ApiErrorBody>(
    {
      error: message,
      kind,
      details
    },
    { status }
  );
}

export function handleApiError(scope: string, error: unknown, fallbackMessage: string) {
  if (isPipelineError(error)) {
    if (error.kind !== "ConfigurationMissing") {
      console.warn(`[api] ${scope} ${error.kind}: ${error.message}${error.details ? ` (${error.details})` : ""}`);
    }
    return errorResponse(error.message, error.kind, error.details);
  }

  if (error instanceof ZodError) {
    return errorResponse("Invalid request payload.", "InvalidInput", error.issues.map((issue) => issue.message).join("; "));
  }

  if (error instanceof SyntaxError) {
    return errorResponse("Request body is not valid JSON.", "InvalidInput");
  }

  console.error(`[api] ${scope} failed: ${getErrorMessage(error)}`);
  return errorResponse(fallbackMessage, "ServiceUnavailable", getErrorMessage(error), 500);
}
