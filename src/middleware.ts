import { NextRequest, NextResponse } from "next/server";

import { readServerConfig } from "@/lib/config";
import { applyCorsHeaders, isOriginAllowed } from "@/lib/cors";

export function middleware(request: NextRequest) {
  const origin = request.headers.get("origin");
  const allowedOrigin = isOriginAllowed(origin, readServerConfig()) ? origin : null;
  const requestedHeaders = request.headers.get("access-control-request-headers");

  const response =
    request.method === "OPTIONS" ? new NextResponse(null, { status: 204 }) : NextResponse.next();

  if (allowedOrigin) {
    applyCorsHeaders(response.headers, allowedOrigin, requestedHeaders);
  }

  return response;
}

export const config = {
  matcher: ["/analyze", "/health", "/debug/:path*"],
};
