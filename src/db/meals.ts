import type { DB } from "../db.js";
import { NotFoundError } from "../errors.js";
import {
  mealEntryNutrition,
  mealSourceNutrition,
  recalculateDay,
  sumDayNutrition,
  type CascadeOptions,
} from "../engine/cascade.js";
import { nutritionMultiplier } from "../engine/converter.js";
import { parseUnit, type UnitSpec } from "../engine/units.js";
import { listExercisesForDay, recalculateDayCaloriesBurned, type Exercise } from "./exercises.js";
import { nutrientColumnList, nutrientParamList, type NutritionVector } from "./nutrient-fields.js";
import {
  dateSchema,
  mealEntryUpdateSchema,
  mealLogInputSchema,
  parseInput,
  type MealEntryUpdate,
  type MealLogInput,
} from "./schemas.js";
import {
  getDayByDate,
  getOrCreateDay,
  listMealEntriesForDay,
  requireDay,
  requireFoodItem,
  requireMealEntry,
  requireRecipe,
  updateMealEntryNutrition,
  withTransaction,
  type Day,
  type MealEntry,
} from "./store.js";

export interface MealEntryDetail extends MealEntry {
  date: string;
  sourceType: "recipe" | "food_item";
  sourceName: string;
}

export interface MealChange {
  entry: MealEntryDetail;
  day: Day;
  warnings: string[];
}

function describeEntry(db: DB, entry: MealEntry): MealEntryDetail {
  const day = requireDay(db, entry.dayId);
  if (entry.recipeId !== null) {
    return { ...entry, date: day.date, sourceType: "recipe", sourceName: requireRecipe(db, entry.recipeId).name };
  }
  const foodItemId = entry.foodItemId ?? 0;
  return { ...entry, date: day.date, sourceType: "food_item", sourceName: requireFoodItem(db, foodItemId).name };
}

/**
 * Logs a recipe or food item on a date. Food items may be logged by
 * quantity and unit (e.g. 150 g), which is converted to servings with the
 * same rules recipes use.
 */
export function logMeal(db: DB, input: MealLogInput, options: CascadeOptions = {}): MealChange {
  const data = parseInput(mealLogInputSchema, input);

  return withTransaction(db, () => {
    const warnings: string[] = [];
    let servings = data.servings ?? 1;
    let perServing: NutritionVector;
    let unitSpec: UnitSpec | null = null;

    if (data.recipeId !== undefined) {
      perServing = requireRecipe(db, data.recipeId).nutrition;
    } else {
      const food = requireFoodItem(db, data.foodItemId ?? 0);
      perServing = food.nutrition;
      if (data.quantity !== undefined && data.unit !== undefined) {
        unitSpec = parseUnit(data.unit);
        const conversion = nutritionMultiplier(data.quantity, unitSpec, food, options);
        if (conversion.warning) warnings.push(conversion.warning);
        servings = conversion.multiplier;
      }
    }

    const { day } = getOrCreateDay(db, data.date);
    const nutrition = mealEntryNutrition(perServing, servings, data.percentEaten);

    const info = db
      .prepare(
        `INSERT INTO meal_entries (day_id, meal_type, recipe_id, food_item_id, servings, percent_eaten,
                                   quantity, unit, unit_spec, notes, ${nutrientColumnList("cached_")})
         VALUES (@dayId, @mealType, @recipeId, @foodItemId, @servings, @percentEaten,
                 @quantity, @unit, @unitSpec, @notes, ${nutrientParamList()})`
      )
      .run({
        dayId: day.id,
        mealType: data.mealType,
        recipeId: data.recipeId ?? null,
        foodItemId: data.foodItemId ?? null,
        servings,
        percentEaten: data.percentEaten,
        quantity: data.quantity ?? null,
        unit: data.unit ?? null,
        unitSpec: unitSpec === null ? null : JSON.stringify(unitSpec),
        notes: data.notes ?? null,
        ...nutrition,
      });

    sumDayNutrition(db, day.id);
    const entry = requireMealEntry(db, Number(info.lastInsertRowid));
    return { entry: describeEntry(db, entry), day: requireDay(db, day.id), warnings };
  });
}

export function getMealEntryDetail(db: DB, id: number): MealEntryDetail {
  return describeEntry(db, requireMealEntry(db, id));
}

/** Changing servings drops any quantity/unit the entry was logged with. */
export function updateMealEntry(db: DB, id: number, update: MealEntryUpdate): MealChange {
  const data = parseInput(mealEntryUpdateSchema, update);

  return withTransaction(db, () => {
    const existing = requireMealEntry(db, id);
    const servings = data.servings ?? existing.servings;
    const percentEaten = data.percentEaten ?? existing.percentEaten;
    const keepQuantity = data.servings === undefined;

    db.prepare(
      `UPDATE meal_entries SET meal_type = @mealType, servings = @servings, percent_eaten = @percentEaten,
         quantity = @quantity, unit = @unit, unit_spec = @unitSpec, notes = @notes, updated_at = datetime('now')
       WHERE id = @id`
    ).run({
      id,
      mealType: data.mealType ?? existing.mealType,
      servings,
      percentEaten,
      quantity: keepQuantity ? existing.quantity : null,
      unit: keepQuantity ? existing.unit : null,
      unitSpec: keepQuantity && existing.unitSpec !== null ? JSON.stringify(existing.unitSpec) : null,
      notes: data.notes === undefined ? existing.notes : data.notes,
    });

    updateMealEntryNutrition(db, id, mealEntryNutrition(mealSourceNutrition(db, existing), servings, percentEaten));
    sumDayNutrition(db, existing.dayId);

    return {
      entry: describeEntry(db, requireMealEntry(db, id)),
      day: requireDay(db, existing.dayId),
      warnings: [],
    };
  });
}

export function deleteMealEntry(db: DB, id: number): { deleted: MealEntry; day: Day } {
  return withTransaction(db, () => {
    const existing = requireMealEntry(db, id);
    db.prepare<[number]>("DELETE FROM meal_entries WHERE id = ?").run(id);
    sumDayNutrition(db, existing.dayId);
    return { deleted: existing, day: requireDay(db, existing.dayId) };
  });
}

// ---- Days ----

export interface DayDetail {
  day: Day;
  entries: MealEntryDetail[];
  exercises: Exercise[];
  netCalories: number;
}

function requireDayByDate(db: DB, date: string): Day {
  const day = getDayByDate(db, parseInput(dateSchema, date));
  if (!day) throw new NotFoundError("Day", date);
  return day;
}

export function getDayDetail(db: DB, date: string): DayDetail {
  const day = requireDayByDate(db, date);
  return {
    day,
    entries: listMealEntriesForDay(db, day.id).map((e) => describeEntry(db, e)),
    exercises: listExercisesForDay(db, day.id),
    netCalories: Math.round((day.nutrition.calories - day.caloriesBurned) * 10) / 10,
  };
}

export function getOrCreateDayByDate(db: DB, date: string): { day: Day; created: boolean } {
  return getOrCreateDay(db, parseInput(dateSchema, date));
}

export interface ListDaysOptions {
  from?: string;
  to?: string;
  limit?: number;
}

export function listDays(db: DB, options: ListDaysOptions = {}): Day[] {
  const where: string[] = [];
  const params: Array<string | number> = [];
  if (options.from) {
    where.push("date >= ?");
    params.push(parseInput(dateSchema, options.from));
  }
  if (options.to) {
    where.push("date <= ?");
    params.push(parseInput(dateSchema, options.to));
  }
  const whereSql = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
  return db
    .prepare<Array<string | number>, { id: number }>(`SELECT id FROM days ${whereSql} ORDER BY date DESC LIMIT ?`)
    .all(...params, options.limit ?? 30)
    .map((r) => requireDay(db, r.id));
}

export function updateDayNotes(db: DB, date: string, notes: string | null): Day {
  const day = requireDayByDate(db, date);
  db.prepare<[string | null, number]>("UPDATE days SET notes = ?, updated_at = datetime('now') WHERE id = ?").run(notes, day.id);
  return requireDay(db, day.id);
}

/**
 * Refreshes every meal entry on a date from its source, then re-sums the
 * day's nutrition and calories burned.
 */
export function recalculateDayByDate(
  db: DB,
  date: string,
  options: CascadeOptions = {}
): { day: Day; warnings: string[] } {
  return withTransaction(db, () => {
    const day = requireDayByDate(db, date);
    const warnings: string[] = [];
    recalculateDay(db, day.id, options, warnings);
    recalculateDayCaloriesBurned(db, day.id);
    return { day: requireDay(db, day.id), warnings };
  });
}
