import { NextRequest, NextResponse } from "next/server";
import { handleApiError } from "@/lib/api";
import { getServices } from "@/lib/services";
import { placesRequestSchema } from "@/lib/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  try {
    const { places } = getServices();
    const body = await request.json();
    const input = placesRequestSchema.parse(body);

    const result = await places.findAlongRoute(input.polyline, input.category, { signal: request.signal });
    return NextResponse.json(result);
  } catch (error) {
    return handleApiError("places", error, "Failed to search places along the route.");
  }
}
