import {
  DIFFICULTIES,
  IngredientSchema,
  RecipeSchema,
  type AnalysisResult,
  type Difficulty,
  type Ingredient,
  type Recipe,
} from "@/lib/analysis-types";

export const MAX_RECIPES = 3;
const DEFAULT_CATEGORY = "unknown";
const DEFAULT_PREP_TIME = "30 minutes";
const DEFAULT_DIFFICULTY: Difficulty = "medium";

const DIFFICULTY_SYNONYMS: Record<string, Difficulty> = {
  simple: "easy",
  beginner: "easy",
  "very easy": "easy",
  quick: "easy",
  moderate: "medium",
  intermediate: "medium",
  average: "medium",
  normal: "medium",
  difficult: "hard",
  advanced: "hard",
  challenging: "hard",
  expert: "hard",
};

export class AnalysisParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnalysisParseError";
  }
}

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toText = (value: unknown) => {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value) ?? "";
};

export const cleanResponseText = (text: string) => {
  const stripped = text.replace(/```json/gi, "").replace(/```/g, "").trim();
  const start = stripped.indexOf("{");
  const end = stripped.lastIndexOf("}");

  if (start !== -1 && end > start) {
    return stripped.slice(start, end + 1);
  }

  return stripped;
};

/**
 * Finds `"key": [` and returns the balanced array literal that follows it,
 * skipping brackets inside string literals.
 */
const sliceArrayForKey = (text: string, key: string) => {
  const keyMatch = new RegExp(`"${key}"\\s*:\\s*\\[`).exec(text);
  if (!keyMatch) {
    return null;
  }

  const start = keyMatch.index + keyMatch[0].length - 1;
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "[") {
      depth += 1;
    } else if (char === "]") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }

  return null;
};

const parseArrayForKey = (text: string, key: string): unknown[] | null => {
  const literal = sliceArrayForKey(text, key);
  if (!literal) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(literal);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const extractJsonFragments = (text: string): UnknownRecord | null => {
  const ingredients = parseArrayForKey(text, "ingredients");
  const recipes = parseArrayForKey(text, "recipes");

  if (!ingredients && !recipes) {
    return null;
  }

  return {
    ingredients: ingredients ?? [],
    recipes: recipes ?? [],
  };
};

export const normalizeDifficulty = (value: unknown): Difficulty => {
  const normalized = toText(value).toLowerCase().replace(/\s+/g, " ");
  const direct = DIFFICULTIES.find((difficulty) => difficulty === normalized);
  return direct ?? DIFFICULTY_SYNONYMS[normalized] ?? DEFAULT_DIFFICULTY;
};

const shapeIngredient = (value: unknown): Ingredient | null => {
  if (!isRecord(value) || !("name" in value)) {
    return null;
  }

  const parsed = IngredientSchema.safeParse({
    name: toText(value.name),
    category: toText(value.category) || DEFAULT_CATEGORY,
  });
  return parsed.success ? parsed.data : null;
};

const shapeSteps = (value: unknown) => {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((step) => Boolean(step)).map(toText).filter((step) => step.length > 0);
};

const shapeRecipe = (value: unknown): Recipe | null => {
  if (!isRecord(value) || !("title" in value)) {
    return null;
  }

  const parsed = RecipeSchema.safeParse({
    title: toText(value.title),
    prep_time: toText(value.prep_time) || DEFAULT_PREP_TIME,
    difficulty: normalizeDifficulty(value.difficulty),
    steps: shapeSteps(value.steps),
  });
  return parsed.success ? parsed.data : null;
};

const isPresent = <T>(value: T | null): value is T => value !== null;

export const shapeAnalysis = (data: unknown): AnalysisResult => {
  if (!isRecord(data)) {
    throw new AnalysisParseError("Response is not a JSON object");
  }

  const ingredients = Array.isArray(data.ingredients)
    ? data.ingredients.map(shapeIngredient).filter(isPresent)
    : [];
  const recipes = Array.isArray(data.recipes)
    ? data.recipes.map(shapeRecipe).filter(isPresent).slice(0, MAX_RECIPES)
    : [];

  return { ingredients, recipes };
};

export const parseAnalysisText = (text: string): AnalysisResult => {
  const cleaned = cleanResponseText(text);
  if (!cleaned) {
    throw new AnalysisParseError("Empty model response");
  }

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch {
    data = extractJsonFragments(cleaned);
    if (!data) {
      throw new AnalysisParseError("Model response did not contain recoverable JSON");
    }
    console.warn("[gemini] recovered analysis from malformed JSON");
  }

  return shapeAnalysis(data);
};
