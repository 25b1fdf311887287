import { createAnalyzeHandler } from "@/lib/analyze-handler";
import { readServerConfig } from "@/lib/config";
import { getImageAnalyzer } from "@/lib/gemini-service";
import { InMemoryRateLimitStore, RateLimiter } from "@/lib/rate-limit";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

const { rateLimitMaxRequests, rateLimitWindowMs } = readServerConfig();

export const POST = createAnalyzeHandler({
  getAnalyzer: getImageAnalyzer,
  rateLimiter: new RateLimiter({
    store: new InMemoryRateLimitStore(),
    limit: rateLimitMaxRequests,
    windowMs: rateLimitWindowMs,
  }),
});
