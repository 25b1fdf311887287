import { NextResponse } from "next/server";

import { SERVICE_NAME, SERVICE_VERSION } from "@/lib/config";

export const dynamic = "force-dynamic";

export async function GET() {
  return NextResponse.json({
    status: "healthy",
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
  });
}
