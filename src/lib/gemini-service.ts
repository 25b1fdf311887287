import {
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
  Type,
  type SafetySetting,
  type Schema,
} from "@google/genai";

import { AnalysisParseError, parseAnalysisText } from "@/lib/analysis-parser";
import { DIFFICULTIES, type AnalysisResult, type UploadedImage } from "@/lib/analysis-types";
import { readServerConfig } from "@/lib/config";
import { logServerPerf } from "@/lib/server-perf";

export type GeminiSettings = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export interface ImageAnalyzer {
  analyzeImage(image: UploadedImage): Promise<AnalysisResult>;
}

export class GeminiServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GeminiServiceError";
  }
}

export const SYSTEM_INSTRUCTION = `You are a kitchen assistant that looks at photos of food.
- Identify the food ingredients visible in the uploaded image and suggest simple recipes that use them.
- Always answer with a single JSON object and nothing else:
  {
    "ingredients": [ { "name": string, "category": string } ],
    "recipes": [
      { "title": string, "prep_time": string, "difficulty": "easy" | "medium" | "hard", "steps": [string] }
    ]
  }
- "category" is a short label such as vegetable, fruit, protein, dairy, grain, spice or condiment.
- Do not wrap the JSON in markdown and do not add explanations.
- If the image is unclear or shows no food, return empty "ingredients" and "recipes" arrays.`;

export const USER_PROMPT =
  "Analyze the uploaded image. 1) List every visible food ingredient. 2) Suggest up to 3 recipes that use only these ingredients plus common kitchen staples (oil, salt, pepper, basic spices).";

const analysisSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    ingredients: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          name: { type: Type.STRING },
          category: { type: Type.STRING },
        },
        required: ["name", "category"],
      },
    },
    recipes: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          title: { type: Type.STRING },
          prep_time: { type: Type.STRING },
          difficulty: { type: Type.STRING, enum: [...DIFFICULTIES] },
          steps: { type: Type.ARRAY, items: { type: Type.STRING } },
        },
        required: ["title", "prep_time", "difficulty", "steps"],
      },
    },
  },
  required: ["ingredients", "recipes"],
};

const SAFETY_SETTINGS: SafetySetting[] = [
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_HARASSMENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE }));

const toBase64 = (bytes: Uint8Array) => Buffer.from(bytes).toString("base64");

/**
 * Runs `work` with an abort signal that fires after `timeoutMs`. The caller is
 * rejected at the deadline even if the SDK has not settled yet.
 */
const withTimeout = async <T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> => {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GeminiServiceError(`Gemini API timeout after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export class GeminiService implements ImageAnalyzer {
  private client: GoogleGenAI | null = null;
  private clientKey: string | null = null;

  constructor(private readonly getSettings: () => GeminiSettings) {}

  private resolveClient(apiKey: string) {
    if (!this.client || this.clientKey !== apiKey) {
      this.client = new GoogleGenAI({ apiKey });
      this.clientKey = apiKey;
    }
    return this.client;
  }

  private async generate(image: UploadedImage, settings: GeminiSettings) {
    const client = this.resolveClient(settings.apiKey);

    try {
      const response = await withTimeout(
        (abortSignal) =>
          client.models.generateContent({
            model: settings.model,
            contents: {
              parts: [
                { inlineData: { data: toBase64(image.bytes), mimeType: image.mimeType } },
                { text: USER_PROMPT },
              ],
            },
            config: {
              systemInstruction: SYSTEM_INSTRUCTION,
              responseMimeType: "application/json",
              responseSchema: analysisSchema,
              safetySettings: SAFETY_SETTINGS,
              abortSignal,
            },
          }),
        settings.timeoutMs
      );

      const text = response.text?.trim();
      if (!text) {
        throw new GeminiServiceError("Empty response from Gemini API");
      }
      return text;
    } catch (error) {
      if (error instanceof GeminiServiceError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new GeminiServiceError(`Gemini API error: ${reason}`, { cause: error });
    }
  }

  async analyzeImage(image: UploadedImage): Promise<AnalysisResult> {
    const settings = this.getSettings();
    if (!settings.apiKey) {
      throw new GeminiServiceError("Gemini API key is missing");
    }

    const startedAt = Date.now();
    let success = false;

    try {
      const text = await this.generate(image, settings);
      const result = parseAnalysisText(text);
      success = true;

      console.info(
        "[gemini]",
        JSON.stringify({
          model: settings.model,
          ingredients: result.ingredients.length,
          recipes: result.recipes.length,
        })
      );
      return result;
    } catch (error) {
      if (error instanceof AnalysisParseError) {
        throw new GeminiServiceError(`Invalid analysis response: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      logServerPerf({
        phase: "gemini.generate",
        route: "/server/gemini",
        startedAt,
        success,
        meta: { model: settings.model, bytes: image.bytes.byteLength },
      });
    }
  }
}

const settingsFromEnv = (): GeminiSettings => {
  const config = readServerConfig();
  return {
    apiKey: config.geminiApiKey,
    model: config.geminiModel,
    timeoutMs: config.requestTimeoutMs,
  };
};

let sharedAnalyzer: ImageAnalyzer | null = null;

export const getImageAnalyzer = (): ImageAnalyzer => {
  if (!sharedAnalyzer) {
    sharedAnalyzer = new GeminiService(settingsFromEnv);
  }
  return sharedAnalyzer;
};
