import { NextRequest, NextResponse } from "next/server";
import { handleApiError } from "@/lib/api";
import { readRawInput } from "@/lib/raw-input";
import { getServices } from "@/lib/services";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  try {
    const { pipeline } = getServices();
    const input = await readRawInput(request);
    const outcome = await pipeline.process(input, request.signal);

    return NextResponse.json({
      ...outcome,
      generatedAt: new Date().toISOString()
    });
  } catch (error) {
    return handleApiError("route", error, "Failed to find a route.");
  }
}
