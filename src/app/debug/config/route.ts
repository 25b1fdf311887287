import { NextResponse } from "next/server";

import { notFoundResponse } from "@/lib/api-errors";
import { readServerConfig } from "@/lib/config";

export const dynamic = "force-dynamic";

export async function GET() {
  const config = readServerConfig();
  if (!config.debug) {
    return notFoundResponse();
  }

  return NextResponse.json({
    gemini_model: config.geminiModel,
    gemini_api_key_configured: config.geminiApiKey.length > 0,
    request_timeout_ms: config.requestTimeoutMs,
    max_file_size_mb: config.maxFileSizeMb,
    allowed_file_types: config.allowedFileTypes,
    allowed_origins: config.allowedOrigins,
    rate_limit: {
      max_requests: config.rateLimitMaxRequests,
      window_ms: config.rateLimitWindowMs,
    },
  });
}
