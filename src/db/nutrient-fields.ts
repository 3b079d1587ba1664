/**
 * Single Source of Truth for Nutrition Field Definitions
 *
 * Food items, recipes, meal entries and days all carry the same nine-field
 * vector. Column names, schemas and vector arithmetic are derived from
 * NUTRIENT_FIELDS so the tables and the engine cannot drift apart.
 */

import { z } from "zod";

export const NUTRIENT_FIELDS = [
  "calories",
  "protein",
  "carbs",
  "fat",
  "fiber",
  "sodium",
  "sugar",
  "saturatedFat",
  "cholesterol",
] as const;

export type NutrientField = (typeof NUTRIENT_FIELDS)[number];

export type NutritionVector = Record<NutrientField, number>;

/** snake_case column suffix for each field */
export const NUTRIENT_COLUMNS: Record<NutrientField, string> = {
  calories: "calories",
  protein: "protein",
  carbs: "carbs",
  fat: "fat",
  fiber: "fiber",
  sodium: "sodium",
  sugar: "sugar",
  saturatedFat: "saturated_fat",
  cholesterol: "cholesterol",
};

/**
 * Full nutrition vector (all fields required, non-negative)
 */
export const nutritionSchema = z.object({
  calories: z.number().min(0),
  protein: z.number().min(0),
  carbs: z.number().min(0),
  fat: z.number().min(0),
  fiber: z.number().min(0),
  sodium: z.number().min(0),
  sugar: z.number().min(0),
  saturatedFat: z.number().min(0),
  cholesterol: z.number().min(0),
}) satisfies z.ZodType<NutritionVector>;

/**
 * Optional nutrition input: omitted fields default to 0 on create and are
 * left untouched on update.
 */
export const optionalNutritionSchema = nutritionSchema.partial();

export type OptionalNutrition = z.infer<typeof optionalNutritionSchema>;

export function zeroNutrition(): NutritionVector {
  return {
    calories: 0,
    protein: 0,
    carbs: 0,
    fat: 0,
    fiber: 0,
    sodium: 0,
    sugar: 0,
    saturatedFat: 0,
    cholesterol: 0,
  };
}

function mapFields(fn: (field: NutrientField) => number): NutritionVector {
  const out = zeroNutrition();
  for (const field of NUTRIENT_FIELDS) {
    out[field] = fn(field);
  }
  return out;
}

export function addNutrition(a: NutritionVector, b: NutritionVector): NutritionVector {
  return mapFields((f) => a[f] + b[f]);
}

export function scaleNutrition(v: NutritionVector, factor: number): NutritionVector {
  return mapFields((f) => v[f] * factor);
}

export function sumNutrition(vectors: Iterable<NutritionVector>): NutritionVector {
  let total = zeroNutrition();
  for (const v of vectors) {
    total = addNutrition(total, v);
  }
  return total;
}

export function roundNutrition(v: NutritionVector): NutritionVector {
  return mapFields((f) => Math.round(v[f] * 10) / 10);
}

export function withDefaults(input: OptionalNutrition): NutritionVector {
  return mapFields((f) => input[f] ?? 0);
}

/**
 * Comma-separated column list with an optional prefix, e.g.
 * nutrientColumnList("cached_") -> "cached_calories, cached_protein, ..."
 */
export function nutrientColumnList(prefix: string = ""): string {
  return NUTRIENT_FIELDS.map((f) => `${prefix}${NUTRIENT_COLUMNS[f]}`).join(", ");
}

/** Named parameter list matching nutrientColumnList(): "@calories, @protein, ..." */
export function nutrientParamList(): string {
  return NUTRIENT_FIELDS.map((f) => `@${f}`).join(", ");
}

/**
 * SET clause for an UPDATE with named parameters matching the field names,
 * e.g. "cached_calories = @calories, ..."
 */
export function nutrientAssignments(prefix: string = ""): string {
  return NUTRIENT_FIELDS.map((f) => `${prefix}${NUTRIENT_COLUMNS[f]} = @${f}`).join(", ");
}

/** Reads a vector from a row whose columns follow NUTRIENT_COLUMNS. */
export function nutritionFromRow(row: Record<string, unknown>, prefix: string = ""): NutritionVector {
  return mapFields((f) => {
    const value = row[`${prefix}${NUTRIENT_COLUMNS[f]}`];
    return typeof value === "number" ? value : 0;
  });
}

export function formatNutritionLine(v: NutritionVector): string {
  const r = roundNutrition(v);
  return `${r.calories} cal | ${r.protein}p ${r.carbs}c ${r.fat}f | fiber ${r.fiber}g sodium ${r.sodium}mg`;
}
