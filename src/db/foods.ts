import type { DB } from "../db.js";
import { ValidationError } from "../errors.js";
import { cascadeFromFoodItems, type CascadeOptions, type CascadeResult } from "../engine/cascade.js";
import { nutritionMultiplier, type Conversion, type ConversionOptions } from "../engine/converter.js";
import { deriveServingProfile, parseUnit, type UnitSpec } from "../engine/units.js";
import { forgetPendingFood, isBatchActive, recordPendingFood } from "./batch.js";
import {
  NUTRIENT_FIELDS,
  nutrientAssignments,
  nutrientColumnList,
  nutrientParamList,
  withDefaults,
  type NutritionVector,
} from "./nutrient-fields.js";
import {
  foodItemInputSchema,
  foodItemUpdateSchema,
  parseInput,
  type FoodItemInput,
  type FoodItemUpdate,
  type Preference,
} from "./schemas.js";
import { requireFoodItem, withTransaction, type FoodItem } from "./store.js";

type FoodRecord = {
  name: string;
  brand: string | null;
  servingSize: number;
  servingUnit: string;
  preference: Preference;
  notes: string | null;
} & NutritionVector;

function recordParams(record: FoodRecord): Record<string, string | number | null> {
  const profile = deriveServingProfile(record.servingSize, record.servingUnit);
  const params: Record<string, string | number | null> = {
    name: record.name,
    brand: record.brand,
    servingSize: record.servingSize,
    servingUnit: record.servingUnit,
    unitSpec: JSON.stringify(profile.unitSpec),
    baseUnitType: profile.baseUnitType,
    gramsPerServing: profile.gramsPerServing,
    mlPerServing: profile.mlPerServing,
    preference: record.preference,
    notes: record.notes,
  };
  for (const f of NUTRIENT_FIELDS) {
    params[f] = record[f];
  }
  return params;
}

export function createFoodItem(db: DB, input: FoodItemInput): FoodItem {
  const data = parseInput(foodItemInputSchema, input);
  const params = recordParams({
    name: data.name,
    brand: data.brand ?? null,
    servingSize: data.servingSize,
    servingUnit: data.servingUnit,
    preference: data.preference,
    notes: data.notes ?? null,
    ...withDefaults(data),
  });

  const info = db
    .prepare(
      `INSERT INTO food_items (name, brand, serving_size, serving_unit, unit_spec, base_unit_type,
                               grams_per_serving, ml_per_serving, preference, notes, ${nutrientColumnList()})
       VALUES (@name, @brand, @servingSize, @servingUnit, @unitSpec, @baseUnitType,
               @gramsPerServing, @mlPerServing, @preference, @notes, ${nutrientParamList()})`
    )
    .run(params);

  return requireFoodItem(db, Number(info.lastInsertRowid));
}

export interface ListFoodItemsOptions {
  query?: string;
  preference?: Preference;
  sortBy?: "name" | "calories" | "created";
  sortOrder?: "asc" | "desc";
  limit?: number;
  offset?: number;
}

const SORT_COLUMNS = { name: "name COLLATE NOCASE", calories: "calories", created: "created_at" } as const;

export function listFoodItems(db: DB, options: ListFoodItemsOptions = {}): { total: number; items: FoodItem[] } {
  const where: string[] = [];
  const params: Array<string | number> = [];
  if (options.query) {
    where.push("(name LIKE ? OR brand LIKE ?)");
    params.push(`%${options.query}%`, `%${options.query}%`);
  }
  if (options.preference) {
    where.push("preference = ?");
    params.push(options.preference);
  }
  const whereSql = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
  const order = `${SORT_COLUMNS[options.sortBy ?? "name"]} ${options.sortOrder === "desc" ? "DESC" : "ASC"}, id ASC`;

  const total = db.prepare<Array<string | number>, { n: number }>(`SELECT COUNT(*) AS n FROM food_items ${whereSql}`).get(...params);
  const ids = db
    .prepare<Array<string | number>, { id: number }>(`SELECT id FROM food_items ${whereSql} ORDER BY ${order} LIMIT ? OFFSET ?`)
    .all(...params, options.limit ?? 50, options.offset ?? 0);

  return { total: total?.n ?? 0, items: ids.map((r) => requireFoodItem(db, r.id)) };
}

export interface FoodItemChange {
  foodItem: FoodItem;
  /** null when batch mode deferred the cascade */
  cascade: CascadeResult | null;
  deferred: boolean;
}

/**
 * Updates a food item and re-derives its unit profile. Every recipe and day
 * that depends on it is recalculated in the same transaction, unless batch
 * mode is active, in which case the id is queued for the batch cascade.
 */
export function updateFoodItem(
  db: DB,
  id: number,
  update: FoodItemUpdate,
  options: CascadeOptions = {}
): FoodItemChange {
  const data = parseInput(foodItemUpdateSchema, update);

  return withTransaction(db, () => {
    const existing = requireFoodItem(db, id);
    const nutrition = { ...existing.nutrition };
    for (const f of NUTRIENT_FIELDS) {
      nutrition[f] = data[f] ?? existing.nutrition[f];
    }

    const params = recordParams({
      name: data.name ?? existing.name,
      brand: data.brand === undefined ? existing.brand : data.brand,
      servingSize: data.servingSize ?? existing.servingSize,
      servingUnit: data.servingUnit ?? existing.servingUnit,
      preference: data.preference ?? existing.preference,
      notes: data.notes === undefined ? existing.notes : data.notes,
      ...nutrition,
    });

    db.prepare(
      `UPDATE food_items SET
         name = @name, brand = @brand, serving_size = @servingSize, serving_unit = @servingUnit,
         unit_spec = @unitSpec, base_unit_type = @baseUnitType, grams_per_serving = @gramsPerServing,
         ml_per_serving = @mlPerServing, preference = @preference, notes = @notes,
         ${nutrientAssignments()}, updated_at = datetime('now')
       WHERE id = @id`
    ).run({ ...params, id });

    if (isBatchActive(db)) {
      recordPendingFood(db, id);
      return { foodItem: requireFoodItem(db, id), cascade: null, deferred: true };
    }

    const cascade = cascadeFromFoodItems(db, [id], options);
    return { foodItem: requireFoodItem(db, id), cascade, deferred: false };
  });
}

export interface FoodItemUsage {
  recipeIds: number[];
  mealEntryCount: number;
}

export function getFoodItemUsage(db: DB, id: number): FoodItemUsage {
  const recipeIds = db
    .prepare<[number], { recipe_id: number }>(
      "SELECT DISTINCT recipe_id FROM recipe_ingredients WHERE food_item_id = ? ORDER BY recipe_id"
    )
    .all(id)
    .map((r) => r.recipe_id);
  const entries = db
    .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM meal_entries WHERE food_item_id = ?")
    .get(id);
  return { recipeIds, mealEntryCount: entries?.n ?? 0 };
}

/** Deletes a food item that no recipe or meal entry references. */
export function deleteFoodItem(db: DB, id: number): FoodItem {
  return withTransaction(db, () => {
    const existing = requireFoodItem(db, id);
    const usage = getFoodItemUsage(db, id);
    if (usage.recipeIds.length > 0 || usage.mealEntryCount > 0) {
      const parts: string[] = [];
      if (usage.recipeIds.length > 0) parts.push(`used in recipes ${usage.recipeIds.join(", ")}`);
      if (usage.mealEntryCount > 0) parts.push(`logged in ${usage.mealEntryCount} meal entries`);
      throw new ValidationError(`Cannot delete food item ${id} (${existing.name}): ${parts.join(" and ")}`);
    }
    db.prepare<[number]>("DELETE FROM food_items WHERE id = ?").run(id);
    forgetPendingFood(db, id);
    return existing;
  });
}

/** Food items that no recipe or meal entry references. */
export function listUnusedFoodItems(db: DB): FoodItem[] {
  return db
    .prepare<[], { id: number }>(
      `SELECT f.id FROM food_items f
       WHERE NOT EXISTS (SELECT 1 FROM recipe_ingredients ri WHERE ri.food_item_id = f.id)
         AND NOT EXISTS (SELECT 1 FROM meal_entries me WHERE me.food_item_id = f.id)
       ORDER BY f.name COLLATE NOCASE, f.id`
    )
    .all()
    .map((r) => requireFoodItem(db, r.id));
}

/**
 * Servings of a stored food represented by `quantity` of a free-text unit.
 * The same conversion recipes and quantity-logged meals use.
 */
export function convertMultiplier(
  db: DB,
  foodItemId: number,
  quantity: number,
  unit: string,
  options: ConversionOptions = {}
): Conversion & { unitSpec: UnitSpec } {
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new ValidationError("quantity: Number must be greater than 0");
  }
  const food = requireFoodItem(db, foodItemId);
  const unitSpec = parseUnit(unit);
  return { ...nutritionMultiplier(quantity, unitSpec, food, options), unitSpec };
}
