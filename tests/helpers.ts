import { openDatabase, type DB } from "../src/db.js";
import { createFoodItem } from "../src/db/foods.js";
import { createRecipe } from "../src/db/recipes.js";
import type { FoodItemInput, RecipeInput } from "../src/db/schemas.js";
import type { FoodItem, Recipe } from "../src/db/store.js";

export function memoryDb(): DB {
  return openDatabase(":memory:");
}

/** A food item with one "serving" serving unless overridden. */
export function addFood(db: DB, name: string, input: Partial<Omit<FoodItemInput, "name">> = {}): FoodItem {
  return createFoodItem(db, { servingSize: 1, servingUnit: "serving", ...input, name });
}

export function addRecipe(db: DB, name: string, input: Partial<Omit<RecipeInput, "name">> = {}): Recipe {
  return createRecipe(db, { ...input, name });
}

/** Deterministic PRNG (mulberry32) for property-style tests. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
