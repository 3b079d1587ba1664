/**
 * Row bindings for the nutrition graph.
 *
 * Every read and cached-aggregate write the engine issues goes through this
 * module. Rows are mapped from snake_case columns to camelCase records.
 */

import type { DB } from "../db.js";
import { IntegrityError, NotFoundError, toNutrigraphError } from "../errors.js";
import { unitSpecSchema, type BaseUnitType, type UnitSpec } from "../engine/units.js";
import type { ComponentEdge } from "../engine/orderer.js";
import {
  nutrientAssignments,
  nutritionFromRow,
  type NutritionVector,
} from "./nutrient-fields.js";
import type { MealType, Preference } from "./schemas.js";

export interface FoodItem {
  id: number;
  name: string;
  brand: string | null;
  servingSize: number;
  servingUnit: string;
  unitSpec: UnitSpec;
  baseUnitType: BaseUnitType;
  gramsPerServing: number | null;
  mlPerServing: number | null;
  nutrition: NutritionVector;
  preference: Preference;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Recipe {
  id: number;
  name: string;
  servingsProduced: number;
  isFavorite: boolean;
  notes: string | null;
  /** per serving */
  nutrition: NutritionVector;
  createdAt: string;
  updatedAt: string;
}

export interface RecipeIngredient {
  id: number;
  recipeId: number;
  foodItemId: number;
  quantity: number;
  unit: string;
  unitSpec: UnitSpec;
  notes: string | null;
}

export interface RecipeComponent {
  id: number;
  recipeId: number;
  componentRecipeId: number;
  servings: number;
  notes: string | null;
}

export interface Day {
  id: number;
  date: string;
  notes: string | null;
  nutrition: NutritionVector;
  caloriesBurned: number;
  createdAt: string;
  updatedAt: string;
}

export interface MealEntry {
  id: number;
  dayId: number;
  mealType: MealType;
  recipeId: number | null;
  foodItemId: number | null;
  servings: number;
  percentEaten: number;
  quantity: number | null;
  unit: string | null;
  unitSpec: UnitSpec | null;
  nutrition: NutritionVector;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
}

type FoodItemRow = {
  id: number;
  name: string;
  brand: string | null;
  serving_size: number;
  serving_unit: string;
  unit_spec: string;
  base_unit_type: BaseUnitType;
  grams_per_serving: number | null;
  ml_per_serving: number | null;
  preference: Preference;
  notes: string | null;
  created_at: string;
  updated_at: string;
} & Record<string, unknown>;

type RecipeRow = {
  id: number;
  name: string;
  servings_produced: number;
  is_favorite: number;
  notes: string | null;
  created_at: string;
  updated_at: string;
} & Record<string, unknown>;

type IngredientRow = {
  id: number;
  recipe_id: number;
  food_item_id: number;
  quantity: number;
  unit: string;
  unit_spec: string;
  notes: string | null;
};

type ComponentRow = {
  id: number;
  recipe_id: number;
  component_recipe_id: number;
  servings: number;
  notes: string | null;
};

type DayRow = {
  id: number;
  date: string;
  notes: string | null;
  cached_calories_burned: number;
  created_at: string;
  updated_at: string;
} & Record<string, unknown>;

type MealEntryRow = {
  id: number;
  day_id: number;
  meal_type: MealType;
  recipe_id: number | null;
  food_item_id: number | null;
  servings: number;
  percent_eaten: number;
  quantity: number | null;
  unit: string | null;
  unit_spec: string | null;
  notes: string | null;
  created_at: string;
  updated_at: string;
} & Record<string, unknown>;

export function readUnitSpec(json: string, owner: string): UnitSpec {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new IntegrityError(`Stored unit for ${owner} is not valid JSON`);
  }
  const parsed = unitSpecSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IntegrityError(`Stored unit for ${owner} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

function rowToFoodItem(row: FoodItemRow): FoodItem {
  return {
    id: row.id,
    name: row.name,
    brand: row.brand,
    servingSize: row.serving_size,
    servingUnit: row.serving_unit,
    unitSpec: readUnitSpec(row.unit_spec, `food item ${row.id}`),
    baseUnitType: row.base_unit_type,
    gramsPerServing: row.grams_per_serving,
    mlPerServing: row.ml_per_serving,
    nutrition: nutritionFromRow(row),
    preference: row.preference,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToRecipe(row: RecipeRow): Recipe {
  return {
    id: row.id,
    name: row.name,
    servingsProduced: row.servings_produced,
    isFavorite: row.is_favorite === 1,
    notes: row.notes,
    nutrition: nutritionFromRow(row, "cached_"),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToIngredient(row: IngredientRow): RecipeIngredient {
  return {
    id: row.id,
    recipeId: row.recipe_id,
    foodItemId: row.food_item_id,
    quantity: row.quantity,
    unit: row.unit,
    unitSpec: readUnitSpec(row.unit_spec, `recipe ingredient ${row.id}`),
    notes: row.notes,
  };
}

function rowToComponent(row: ComponentRow): RecipeComponent {
  return {
    id: row.id,
    recipeId: row.recipe_id,
    componentRecipeId: row.component_recipe_id,
    servings: row.servings,
    notes: row.notes,
  };
}

function rowToDay(row: DayRow): Day {
  return {
    id: row.id,
    date: row.date,
    notes: row.notes,
    nutrition: nutritionFromRow(row, "cached_"),
    caloriesBurned: row.cached_calories_burned,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToMealEntry(row: MealEntryRow): MealEntry {
  return {
    id: row.id,
    dayId: row.day_id,
    mealType: row.meal_type,
    recipeId: row.recipe_id,
    foodItemId: row.food_item_id,
    servings: row.servings,
    percentEaten: row.percent_eaten,
    quantity: row.quantity,
    unit: row.unit,
    unitSpec: row.unit_spec === null ? null : readUnitSpec(row.unit_spec, `meal entry ${row.id}`),
    nutrition: nutritionFromRow(row, "cached_"),
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Runs `fn` in one transaction (a savepoint when already inside one). Any
 * throw rolls back every write made by `fn`; driver failures surface as
 * PersistenceError.
 */
export function withTransaction<T>(db: DB, fn: () => T): T {
  try {
    return db.transaction(fn)();
  } catch (e) {
    throw toNutrigraphError(e);
  }
}

function placeholders(ids: readonly number[]): string {
  return ids.map(() => "?").join(", ");
}

// ---- Point lookups ----

export function getFoodItem(db: DB, id: number): FoodItem | null {
  const row = db.prepare<[number], FoodItemRow>("SELECT * FROM food_items WHERE id = ?").get(id);
  return row ? rowToFoodItem(row) : null;
}

export function requireFoodItem(db: DB, id: number): FoodItem {
  const food = getFoodItem(db, id);
  if (!food) throw new NotFoundError("Food item", id);
  return food;
}

export function getRecipe(db: DB, id: number): Recipe | null {
  const row = db.prepare<[number], RecipeRow>("SELECT * FROM recipes WHERE id = ?").get(id);
  return row ? rowToRecipe(row) : null;
}

export function requireRecipe(db: DB, id: number): Recipe {
  const recipe = getRecipe(db, id);
  if (!recipe) throw new NotFoundError("Recipe", id);
  return recipe;
}

export function getIngredient(db: DB, id: number): RecipeIngredient | null {
  const row = db.prepare<[number], IngredientRow>("SELECT * FROM recipe_ingredients WHERE id = ?").get(id);
  return row ? rowToIngredient(row) : null;
}

export function getComponent(db: DB, id: number): RecipeComponent | null {
  const row = db.prepare<[number], ComponentRow>("SELECT * FROM recipe_components WHERE id = ?").get(id);
  return row ? rowToComponent(row) : null;
}

export function getDay(db: DB, id: number): Day | null {
  const row = db.prepare<[number], DayRow>("SELECT * FROM days WHERE id = ?").get(id);
  return row ? rowToDay(row) : null;
}

export function requireDay(db: DB, id: number): Day {
  const day = getDay(db, id);
  if (!day) throw new NotFoundError("Day", id);
  return day;
}

export function getDayByDate(db: DB, date: string): Day | null {
  const row = db.prepare<[string], DayRow>("SELECT * FROM days WHERE date = ?").get(date);
  return row ? rowToDay(row) : null;
}

export function getOrCreateDay(db: DB, date: string): { day: Day; created: boolean } {
  const existing = getDayByDate(db, date);
  if (existing) return { day: existing, created: false };
  const info = db.prepare<[string]>("INSERT INTO days (date) VALUES (?)").run(date);
  return { day: requireDay(db, Number(info.lastInsertRowid)), created: true };
}

export function getMealEntry(db: DB, id: number): MealEntry | null {
  const row = db.prepare<[number], MealEntryRow>("SELECT * FROM meal_entries WHERE id = ?").get(id);
  return row ? rowToMealEntry(row) : null;
}

export function requireMealEntry(db: DB, id: number): MealEntry {
  const entry = getMealEntry(db, id);
  if (!entry) throw new NotFoundError("Meal entry", id);
  return entry;
}

// ---- Lookups by parent ----

export function listIngredients(db: DB, recipeId: number): RecipeIngredient[] {
  return db
    .prepare<[number], IngredientRow>("SELECT * FROM recipe_ingredients WHERE recipe_id = ? ORDER BY id")
    .all(recipeId)
    .map(rowToIngredient);
}

export function listComponents(db: DB, recipeId: number): RecipeComponent[] {
  return db
    .prepare<[number], ComponentRow>("SELECT * FROM recipe_components WHERE recipe_id = ? ORDER BY id")
    .all(recipeId)
    .map(rowToComponent);
}

export function listComponentIds(db: DB, recipeId: number): number[] {
  return db
    .prepare<[number], { component_recipe_id: number }>(
      "SELECT component_recipe_id FROM recipe_components WHERE recipe_id = ?"
    )
    .all(recipeId)
    .map((r) => r.component_recipe_id);
}

export function listMealEntriesForDay(db: DB, dayId: number): MealEntry[] {
  return db
    .prepare<[number], MealEntryRow>("SELECT * FROM meal_entries WHERE day_id = ? ORDER BY id")
    .all(dayId)
    .map(rowToMealEntry);
}

// ---- Predicate scans ----

/** Recipes holding an ingredient edge to any of the food items. */
export function recipeIdsUsingFoods(db: DB, foodItemIds: readonly number[]): number[] {
  if (foodItemIds.length === 0) return [];
  return db
    .prepare<number[], { recipe_id: number }>(
      `SELECT DISTINCT recipe_id FROM recipe_ingredients WHERE food_item_id IN (${placeholders(foodItemIds)})`
    )
    .all(...foodItemIds)
    .map((r) => r.recipe_id);
}

/** Recipes holding a component edge to any of the recipes. */
export function recipeIdsUsingRecipes(db: DB, recipeIds: readonly number[]): number[] {
  if (recipeIds.length === 0) return [];
  return db
    .prepare<number[], { recipe_id: number }>(
      `SELECT DISTINCT recipe_id FROM recipe_components WHERE component_recipe_id IN (${placeholders(recipeIds)})`
    )
    .all(...recipeIds)
    .map((r) => r.recipe_id);
}

/** Component edges leaving any of the recipes. */
export function componentEdgesFrom(db: DB, recipeIds: readonly number[]): ComponentEdge[] {
  if (recipeIds.length === 0) return [];
  return db
    .prepare<number[], { recipe_id: number; component_recipe_id: number }>(
      `SELECT recipe_id, component_recipe_id FROM recipe_components WHERE recipe_id IN (${placeholders(recipeIds)})`
    )
    .all(...recipeIds)
    .map((r) => ({ recipeId: r.recipe_id, componentRecipeId: r.component_recipe_id }));
}

/** Meal entries whose source is one of the recipes or food items. */
export function mealEntriesReferencing(
  db: DB,
  recipeIds: readonly number[],
  foodItemIds: readonly number[]
): MealEntry[] {
  const clauses: string[] = [];
  if (recipeIds.length > 0) clauses.push(`recipe_id IN (${placeholders(recipeIds)})`);
  if (foodItemIds.length > 0) clauses.push(`food_item_id IN (${placeholders(foodItemIds)})`);
  if (clauses.length === 0) return [];
  return db
    .prepare<number[], MealEntryRow>(`SELECT * FROM meal_entries WHERE ${clauses.join(" OR ")} ORDER BY id`)
    .all(...recipeIds, ...foodItemIds)
    .map(rowToMealEntry);
}

export function countMealEntriesForRecipe(db: DB, recipeId: number): number {
  const row = db
    .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM meal_entries WHERE recipe_id = ?")
    .get(recipeId);
  return row?.n ?? 0;
}

// ---- Cached aggregate writes ----

export function updateRecipeNutrition(db: DB, recipeId: number, nutrition: NutritionVector): void {
  db.prepare(
    `UPDATE recipes SET ${nutrientAssignments("cached_")}, updated_at = datetime('now') WHERE id = @id`
  ).run({ ...nutrition, id: recipeId });
}

export function updateMealEntryNutrition(db: DB, entryId: number, nutrition: NutritionVector): void {
  db.prepare(
    `UPDATE meal_entries SET ${nutrientAssignments("cached_")}, updated_at = datetime('now') WHERE id = @id`
  ).run({ ...nutrition, id: entryId });
}

export function updateMealEntryServings(db: DB, entryId: number, servings: number): void {
  db.prepare<[number, number]>("UPDATE meal_entries SET servings = ?, updated_at = datetime('now') WHERE id = ?").run(
    servings,
    entryId
  );
}

export function updateDayNutrition(db: DB, dayId: number, nutrition: NutritionVector): void {
  db.prepare(
    `UPDATE days SET ${nutrientAssignments("cached_")}, updated_at = datetime('now') WHERE id = @id`
  ).run({ ...nutrition, id: dayId });
}

export function updateDayCaloriesBurned(db: DB, dayId: number, calories: number): void {
  db.prepare<[number, number]>(
    "UPDATE days SET cached_calories_burned = ?, updated_at = datetime('now') WHERE id = ?"
  ).run(calories, dayId);
}
