import { NextRequest, NextResponse } from "next/server";
import { handleApiError } from "@/lib/api";
import { getServices } from "@/lib/services";
import { placePhotoRequestSchema } from "@/lib/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  try {
    const { places } = getServices();
    const input = placePhotoRequestSchema.parse({
      ref: request.nextUrl.searchParams.get("ref") ?? undefined,
      maxwidth: request.nextUrl.searchParams.get("maxwidth") ?? undefined
    });

    const photo = await places.getPhoto(input.ref, input.maxwidth, request.signal);
    return new NextResponse(photo.bytes, {
      headers: {
        "Content-Type": photo.content_type
      }
    });
  } catch (error) {
    return handleApiError("place-photo", error, "Failed to load the place photo.");
  }
}
