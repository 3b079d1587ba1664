import { z } from "zod";
import { ValidationError } from "../errors.js";
import { optionalNutritionSchema } from "./nutrient-fields.js";

/**
 * Parses input against a schema, turning zod issues into a ValidationError
 * ("servingSize: Number must be greater than 0").
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const message = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  throw new ValidationError(message);
}

// Meal types
export const mealTypeSchema = z.enum(["breakfast", "lunch", "dinner", "snack", "unspecified"]);
export type MealType = z.infer<typeof mealTypeSchema>;

// Food preferences
export const preferenceSchema = z.enum(["liked", "disliked", "neutral"]);
export type Preference = z.infer<typeof preferenceSchema>;

// Exercise types ("tm" is accepted as shorthand for treadmill)
export const exerciseTypeSchema = z.enum(["treadmill", "tm"]).transform((): "treadmill" => "treadmill");
export type ExerciseType = z.output<typeof exerciseTypeSchema>;

// Date rolls 2024-02-31 over to March, so the parts must survive the round trip
function isCalendarDate(s: string): boolean {
  const parsed = new Date(`${s}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === s;
}

export const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD")
  .refine(isCalendarDate, "Invalid calendar date");

const idSchema = z.number().int().positive();
const positive = z.number().positive();
const percentSchema = z.number().min(0).max(100);

// Food item input
// Nutrition is per serving; omitted fields are 0
export const foodItemInputSchema = z
  .object({
    name: z.string().min(1),
    brand: z.string().nullish(),
    servingSize: positive,
    servingUnit: z.string().min(1),
    preference: preferenceSchema.default("neutral"),
    notes: z.string().nullish(),
  })
  .merge(optionalNutritionSchema);

export const foodItemUpdateSchema = z
  .object({
    name: z.string().min(1).optional(),
    brand: z.string().nullish(),
    servingSize: positive.optional(),
    servingUnit: z.string().min(1).optional(),
    preference: preferenceSchema.optional(),
    notes: z.string().nullish(),
  })
  .merge(optionalNutritionSchema);

export const recipeInputSchema = z.object({
  name: z.string().min(1),
  servingsProduced: positive.default(1),
  isFavorite: z.boolean().default(false),
  notes: z.string().nullish(),
});

export const recipeUpdateSchema = z.object({
  name: z.string().min(1).optional(),
  servingsProduced: positive.optional(),
  isFavorite: z.boolean().optional(),
  notes: z.string().nullish(),
});

export const ingredientInputSchema = z.object({
  foodItemId: idSchema,
  quantity: positive,
  unit: z.string().min(1).default("serving"),
  notes: z.string().nullish(),
});

export const ingredientUpdateSchema = z.object({
  quantity: positive.optional(),
  unit: z.string().min(1).optional(),
  notes: z.string().nullish(),
});

export const componentInputSchema = z.object({
  recipeId: idSchema,
  componentRecipeId: idSchema,
  servings: positive,
  notes: z.string().nullish(),
});

export const componentUpdateSchema = z.object({
  servings: positive.optional(),
  notes: z.string().nullish(),
});

// Meal log input
// Exactly one of recipeId / foodItemId. quantity+unit is only valid for food items
// and replaces servings.
export const mealLogInputSchema = z
  .object({
    date: dateSchema,
    mealType: mealTypeSchema.default("unspecified"),
    recipeId: idSchema.optional(),
    foodItemId: idSchema.optional(),
    servings: positive.optional(),
    quantity: positive.optional(),
    unit: z.string().min(1).optional(),
    percentEaten: percentSchema.default(100),
    notes: z.string().nullish(),
  })
  .refine((d) => (d.recipeId === undefined) !== (d.foodItemId === undefined), {
    message: "Provide exactly one of recipeId or foodItemId",
  })
  .refine((d) => (d.quantity === undefined) === (d.unit === undefined), {
    message: "quantity and unit must be given together",
  })
  .refine((d) => d.quantity === undefined || d.foodItemId !== undefined, {
    message: "quantity/unit logging is only supported for food items",
  })
  .refine((d) => d.quantity === undefined || d.servings === undefined, {
    message: "Provide servings or quantity/unit, not both",
  });

export const mealEntryUpdateSchema = z.object({
  mealType: mealTypeSchema.optional(),
  servings: positive.optional(),
  percentEaten: percentSchema.optional(),
  notes: z.string().nullish(),
});

export const exerciseInputSchema = z.object({
  date: dateSchema,
  exerciseType: exerciseTypeSchema,
  notes: z.string().nullish(),
});

export const segmentInputSchema = z.object({
  durationMinutes: positive.optional(),
  speedMph: positive.optional(),
  distanceMiles: positive.optional(),
  inclinePercent: z.number().min(0).max(40).default(0),
  avgHeartRate: positive.optional(),
  notes: z.string().nullish(),
});

export const segmentUpdateSchema = z.object({
  durationMinutes: positive.optional(),
  speedMph: positive.optional(),
  distanceMiles: positive.optional(),
  inclinePercent: z.number().min(0).max(40).optional(),
  avgHeartRate: positive.optional(),
  notes: z.string().nullish(),
});

export const bodyWeightInputSchema = z.object({
  weightLbs: positive,
  date: dateSchema,
});

// Type exports from schemas
export type FoodItemInput = z.input<typeof foodItemInputSchema>;
export type FoodItemUpdate = z.infer<typeof foodItemUpdateSchema>;
export type RecipeInput = z.input<typeof recipeInputSchema>;
export type RecipeUpdate = z.infer<typeof recipeUpdateSchema>;
export type IngredientInput = z.input<typeof ingredientInputSchema>;
export type IngredientUpdate = z.infer<typeof ingredientUpdateSchema>;
export type ComponentInput = z.infer<typeof componentInputSchema>;
export type ComponentUpdate = z.infer<typeof componentUpdateSchema>;
export type MealLogInput = z.input<typeof mealLogInputSchema>;
export type MealEntryUpdate = z.infer<typeof mealEntryUpdateSchema>;
export type ExerciseInput = z.input<typeof exerciseInputSchema>;
export type SegmentInput = z.input<typeof segmentInputSchema>;
export type SegmentUpdate = z.infer<typeof segmentUpdateSchema>;
