import { z } from "zod";

export const DIFFICULTIES = ["easy", "medium", "hard"] as const;

export const IngredientSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
});

export const RecipeSchema = z.object({
  title: z.string().min(1),
  prep_time: z.string(),
  difficulty: z.enum(DIFFICULTIES),
  steps: z.array(z.string()),
});

export const AnalysisResultSchema = z.object({
  ingredients: z.array(IngredientSchema),
  recipes: z.array(RecipeSchema),
});

export type Ingredient = z.infer<typeof IngredientSchema>;
export type Difficulty = (typeof DIFFICULTIES)[number];
export type Recipe = z.infer<typeof RecipeSchema>;
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

export type ApiResponse = {
  success: boolean;
  message: string;
  data: AnalysisResult | null;
};

export type ErrorResponse = {
  error: string;
  detail: string | null;
  status_code: number;
};

export type UploadedImage = {
  bytes: Uint8Array;
  mimeType: string;
  fileName?: string;
};

export const emptyAnalysisResult = (): AnalysisResult => ({ ingredients: [], recipes: [] });
