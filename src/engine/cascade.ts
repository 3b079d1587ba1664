/**
 * Cascading recalculation.
 *
 * A change to a food item (or to a recipe's own ingredient/component list)
 * invalidates the recipe that holds it, every recipe that transitively uses
 * that recipe, and every day that logs any of them. `cascade` finds that set,
 * orders it so components are refreshed before the recipes that use them,
 * rewrites each cached vector, then refreshes the affected meal entries and
 * day totals. The whole walk runs in one transaction.
 */

import type { DB } from "../db.js";
import { ValidationError } from "../errors.js";
import {
  addNutrition,
  scaleNutrition,
  sumNutrition,
  zeroNutrition,
  type NutritionVector,
} from "../db/nutrient-fields.js";
import {
  componentEdgesFrom,
  listComponents,
  listIngredients,
  listMealEntriesForDay,
  mealEntriesReferencing,
  recipeIdsUsingFoods,
  recipeIdsUsingRecipes,
  requireDay,
  requireFoodItem,
  requireRecipe,
  updateDayNutrition,
  updateMealEntryNutrition,
  updateMealEntryServings,
  updateRecipeNutrition,
  withTransaction,
  type MealEntry,
  type Recipe,
} from "../db/store.js";
import { nutritionMultiplier, type ConversionOptions } from "./converter.js";
import { orderRecipes } from "./orderer.js";

export type CascadeOptions = ConversionOptions;

export interface CascadeSeeds {
  /** food items whose nutrition or serving definition changed */
  foodItemIds?: Iterable<number>;
  /** recipes whose own ingredients, components or yield changed */
  recipeIds?: Iterable<number>;
}

export interface CascadeResult {
  recipesRecalculated: number;
  daysRecalculated: number;
  /** recipes in the order they were recalculated */
  recipeIds: number[];
  dayIds: number[];
  warnings: string[];
}

export interface RecipeComputation {
  nutrition: NutritionVector;
  warnings: string[];
}

/**
 * Per-serving nutrition of a recipe from the current state of its children:
 * (Σ food nutrition × multiplier + Σ component cached nutrition × servings) / servings produced.
 */
export function computeRecipeNutrition(db: DB, recipe: Recipe, options: CascadeOptions = {}): RecipeComputation {
  const warnings: string[] = [];
  let total = zeroNutrition();

  for (const ingredient of listIngredients(db, recipe.id)) {
    const food = requireFoodItem(db, ingredient.foodItemId);
    const conversion = nutritionMultiplier(ingredient.quantity, ingredient.unitSpec, food, options);
    if (conversion.warning) {
      warnings.push(`Recipe ${recipe.id} (${recipe.name}), ${food.name}: ${conversion.warning}`);
    }
    total = addNutrition(total, scaleNutrition(food.nutrition, conversion.multiplier));
  }

  for (const component of listComponents(db, recipe.id)) {
    const child = requireRecipe(db, component.componentRecipeId);
    total = addNutrition(total, scaleNutrition(child.nutrition, component.servings));
  }

  return { nutrition: scaleNutrition(total, 1 / recipe.servingsProduced), warnings };
}

/** Recomputes and stores one recipe's cached per-serving nutrition. */
export function recalculateRecipe(db: DB, recipeId: number, options: CascadeOptions = {}): NutritionVector {
  const recipe = requireRecipe(db, recipeId);
  const { nutrition } = computeRecipeNutrition(db, recipe, options);
  updateRecipeNutrition(db, recipe.id, nutrition);
  return nutrition;
}

/** Per-serving nutrition of a meal entry's source as it is stored right now. */
export function mealSourceNutrition(db: DB, entry: Pick<MealEntry, "recipeId" | "foodItemId">): NutritionVector {
  if (entry.recipeId !== null) return requireRecipe(db, entry.recipeId).nutrition;
  if (entry.foodItemId !== null) return requireFoodItem(db, entry.foodItemId).nutrition;
  throw new ValidationError("Meal entry has no source");
}

export function mealEntryNutrition(perServing: NutritionVector, servings: number, percentEaten: number): NutritionVector {
  return scaleNutrition(perServing, servings * (percentEaten / 100));
}

/** Re-sums a day's cached nutrition from its meal entries as they are stored. */
export function sumDayNutrition(db: DB, dayId: number): NutritionVector {
  requireDay(db, dayId);
  const total = sumNutrition(listMealEntriesForDay(db, dayId).map((e) => e.nutrition));
  updateDayNutrition(db, dayId, total);
  return total;
}

/**
 * Refreshes every meal entry of a day from its recipe or food item, then
 * re-sums the day. Entries left stale by deferred updates are brought up
 * to date.
 */
export function recalculateDay(
  db: DB,
  dayId: number,
  options: CascadeOptions = {},
  warnings: string[] = []
): NutritionVector {
  return withTransaction(db, () => {
    requireDay(db, dayId);
    for (const entry of listMealEntriesForDay(db, dayId)) {
      refreshMealEntry(db, entry, options, warnings);
    }
    return sumDayNutrition(db, dayId);
  });
}

function refreshMealEntry(db: DB, entry: MealEntry, options: CascadeOptions, warnings: string[]): void {
  const servings = loggedServings(db, entry, options, warnings);
  const perServing = mealSourceNutrition(db, entry);
  updateMealEntryNutrition(db, entry.id, mealEntryNutrition(perServing, servings, entry.percentEaten));
}

/**
 * Servings of an entry logged as a quantity of a food are re-derived, since
 * the food's serving definition may be what changed.
 */
function loggedServings(db: DB, entry: MealEntry, options: CascadeOptions, warnings: string[]): number {
  if (entry.foodItemId === null || entry.quantity === null || entry.unitSpec === null) {
    return entry.servings;
  }
  const food = requireFoodItem(db, entry.foodItemId);
  const conversion = nutritionMultiplier(entry.quantity, entry.unitSpec, food, options);
  if (conversion.warning) {
    warnings.push(`Meal entry ${entry.id}, ${food.name}: ${conversion.warning}`);
  }
  if (conversion.multiplier !== entry.servings) {
    updateMealEntryServings(db, entry.id, conversion.multiplier);
  }
  return conversion.multiplier;
}

/** Seed recipes plus every recipe reachable upward through component edges. */
function discoverAffectedRecipes(db: DB, foodItemIds: number[], seedRecipeIds: number[]): number[] {
  const found = new Set<number>(seedRecipeIds);
  for (const id of recipeIdsUsingFoods(db, foodItemIds)) found.add(id);

  let frontier = [...found];
  while (frontier.length > 0) {
    const next: number[] = [];
    for (const parent of recipeIdsUsingRecipes(db, frontier)) {
      if (!found.has(parent)) {
        found.add(parent);
        next.push(parent);
      }
    }
    frontier = next;
  }
  return [...found];
}

/**
 * Brings every recipe and day that depends on the seeds back in line with
 * current leaf values. At least one seed is required.
 */
export function cascade(db: DB, seeds: CascadeSeeds, options: CascadeOptions = {}): CascadeResult {
  const foodItemIds = [...new Set(seeds.foodItemIds ?? [])];
  const seedRecipeIds = [...new Set(seeds.recipeIds ?? [])];
  if (foodItemIds.length === 0 && seedRecipeIds.length === 0) {
    throw new ValidationError("Cascade needs at least one food item or recipe");
  }

  return withTransaction(db, () => {
    for (const id of foodItemIds) requireFoodItem(db, id);
    for (const id of seedRecipeIds) requireRecipe(db, id);

    const affected = discoverAffectedRecipes(db, foodItemIds, seedRecipeIds);
    const order = orderRecipes(affected, componentEdgesFrom(db, affected));

    const warnings: string[] = [];
    for (const recipeId of order) {
      const recipe = requireRecipe(db, recipeId);
      const result = computeRecipeNutrition(db, recipe, options);
      warnings.push(...result.warnings);
      updateRecipeNutrition(db, recipeId, result.nutrition);
    }

    const entries = mealEntriesReferencing(db, order, foodItemIds);
    const dayIds = [...new Set(entries.map((e) => e.dayId))].sort((a, b) => a - b);
    for (const entry of entries) {
      refreshMealEntry(db, entry, options, warnings);
    }
    for (const dayId of dayIds) {
      sumDayNutrition(db, dayId);
    }

    return {
      recipesRecalculated: order.length,
      daysRecalculated: dayIds.length,
      recipeIds: order,
      dayIds,
      warnings,
    };
  });
}

export function cascadeFromFoodItems(db: DB, foodItemIds: Iterable<number>, options: CascadeOptions = {}): CascadeResult {
  return cascade(db, { foodItemIds }, options);
}

export function cascadeFromRecipes(db: DB, recipeIds: Iterable<number>, options: CascadeOptions = {}): CascadeResult {
  return cascade(db, { recipeIds }, options);
}
