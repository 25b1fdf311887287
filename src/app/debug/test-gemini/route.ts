import { NextResponse } from "next/server";

import { notFoundResponse } from "@/lib/api-errors";
import { readServerConfig } from "@/lib/config";
import { getImageAnalyzer } from "@/lib/gemini-service";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

// 1x1 white PNG; a responsive model should report no ingredients for it.
const SAMPLE_IMAGE_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAIAAACQd1PeAAAADElEQVR42mP4//8/AAX+Av4N70a4AAAAAElFTkSuQmCC";

export async function POST() {
  if (!readServerConfig().debug) {
    return notFoundResponse();
  }

  try {
    const result = await getImageAnalyzer().analyzeImage({
      bytes: new Uint8Array(Buffer.from(SAMPLE_IMAGE_BASE64, "base64")),
      mimeType: "image/png",
      fileName: "sample.png",
    });

    return NextResponse.json({
      status: "success",
      gemini_responsive: true,
      test_result: {
        ingredients_found: result.ingredients.length,
        recipes_found: result.recipes.length,
      },
    });
  } catch (error) {
    console.warn("[debug] gemini test call failed", error);
    return NextResponse.json({
      status: "error",
      gemini_responsive: false,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
