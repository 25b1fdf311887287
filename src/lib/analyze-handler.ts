import { NextResponse } from "next/server";

import type { ApiResponse, UploadedImage } from "@/lib/analysis-types";
import { ApiError, toErrorResponse } from "@/lib/api-errors";
import { readServerConfig, type ServerConfig } from "@/lib/config";
import { GeminiServiceError, type ImageAnalyzer } from "@/lib/gemini-service";
import { readUploadForm, validateUpload } from "@/lib/image-intake";
import { resolveClientKey, type RateLimiter } from "@/lib/rate-limit";
import { logServerPerf } from "@/lib/server-perf";

export type AnalyzeHandlerDeps = {
  getAnalyzer: () => ImageAnalyzer;
  rateLimiter: RateLimiter;
  readConfig?: () => ServerConfig;
};

const ROUTE = "/analyze";

const enforceRateLimit = async (rateLimiter: RateLimiter, clientKey: string) => {
  const decision = await rateLimiter.consume(clientKey);
  if (decision.allowed) {
    return;
  }

  throw new ApiError(429, "Too many requests. Please wait a minute before trying again.", {
    headers: { "Retry-After": String(Math.max(1, Math.ceil(decision.retryAfterMs / 1000))) },
  });
};

const runAnalyzer = async (analyzer: ImageAnalyzer, image: UploadedImage) => {
  try {
    return await analyzer.analyzeImage(image);
  } catch (error) {
    if (error instanceof GeminiServiceError) {
      throw new ApiError(503, "Analysis service temporarily unavailable. Please try again later.", {
        cause: error,
      });
    }
    throw new ApiError(500, "Internal server error during image analysis", { cause: error });
  }
};

export const createAnalyzeHandler = ({
  getAnalyzer,
  rateLimiter,
  readConfig = readServerConfig,
}: AnalyzeHandlerDeps) =>
  async function analyze(request: Request) {
    const startedAt = Date.now();
    const config = readConfig();
    const clientKey = resolveClientKey(request.headers, config.trustedProxyHops);
    let status = 200;

    try {
      await enforceRateLimit(rateLimiter, clientKey);

      const form = await readUploadForm(request, config);
      const image = await validateUpload(form, config);

      console.info(
        "[analyze] request",
        JSON.stringify({ fileName: image.fileName ?? null, mimeType: image.mimeType })
      );
      if (config.debug) {
        console.debug("[analyze] image bytes", image.bytes.byteLength);
      }

      const data = await runAnalyzer(getAnalyzer(), image);

      console.info(
        "[analyze] completed",
        JSON.stringify({ ingredients: data.ingredients.length, recipes: data.recipes.length })
      );

      const body: ApiResponse = {
        success: true,
        message: "Image analyzed successfully",
        data,
      };
      return NextResponse.json(body);
    } catch (error) {
      const response = toErrorResponse(error, { debug: config.debug });
      status = response.status;
      return response;
    } finally {
      logServerPerf(
        {
          phase: "analyze.request",
          route: ROUTE,
          startedAt,
          success: status === 200,
          clientKey,
          meta: { status },
        },
        config
      );
    }
  };
