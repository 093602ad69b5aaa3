import { NextResponse } from "next/server";
import { getConfigStatus } from "@/lib/config";

export const dynamic = "force-dynamic";

export function GET() {
  const status = getConfigStatus();
  if (!status.ok) {
    return NextResponse.json({ status: "misconfigured", kind: "ConfigurationMissing", problems: status.problems }, { status: 503 });
  }

  return NextResponse.json({ status: "ok", model: status.config.geminiModel, problems: [] });
}
