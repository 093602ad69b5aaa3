import { NextRequest, NextResponse } from "next/server";
import { handleApiError } from "@/lib/api";
import { getServices } from "@/lib/services";
import { translateRequestSchema } from "@/lib/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  try {
    const { translator } = getServices();
    const body = await request.json();
    const input = translateRequestSchema.parse(body);

    const text = await translator.translate(input.text, input.language, request.signal);
    return NextResponse.json({ language: input.language, text });
  } catch (error) {
    return handleApiError("translate", error, "Failed to translate the directions.");
  }
}
