import type { DB } from "../db.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { cascadeFromRecipes, type CascadeOptions, type CascadeResult } from "../engine/cascade.js";
import { nutritionMultiplier, type ConversionRule } from "../engine/converter.js";
import { getAllComponentIds, getParentRecipeIds } from "../engine/graph.js";
import { parseUnit } from "../engine/units.js";
import { scaleNutrition, type NutritionVector } from "./nutrient-fields.js";
import {
  ingredientInputSchema,
  ingredientUpdateSchema,
  parseInput,
  recipeInputSchema,
  recipeUpdateSchema,
  type IngredientInput,
  type IngredientUpdate,
  type RecipeInput,
  type RecipeUpdate,
} from "./schemas.js";
import {
  countMealEntriesForRecipe,
  getIngredient,
  listComponents,
  listIngredients,
  requireFoodItem,
  requireRecipe,
  withTransaction,
  type Recipe,
  type RecipeComponent,
  type RecipeIngredient,
} from "./store.js";

export function createRecipe(db: DB, input: RecipeInput): Recipe {
  const data = parseInput(recipeInputSchema, input);
  const info = db
    .prepare<[string, number, number, string | null]>(
      "INSERT INTO recipes (name, servings_produced, is_favorite, notes) VALUES (?, ?, ?, ?)"
    )
    .run(data.name, data.servingsProduced, data.isFavorite ? 1 : 0, data.notes ?? null);
  return requireRecipe(db, Number(info.lastInsertRowid));
}

export interface IngredientDetail extends RecipeIngredient {
  foodName: string;
  multiplier: number;
  rule: ConversionRule;
  /** whole-recipe contribution, before dividing by servings produced */
  nutrition: NutritionVector;
}

export interface ComponentDetail extends RecipeComponent {
  componentName: string;
  nutrition: NutritionVector;
}

export interface RecipeDetail {
  recipe: Recipe;
  ingredients: IngredientDetail[];
  components: ComponentDetail[];
  /** every recipe nested anywhere below this one */
  allComponentIds: number[];
  usedBy: number[];
  loggedCount: number;
  warnings: string[];
}

export function getRecipeDetail(db: DB, id: number): RecipeDetail {
  const recipe = requireRecipe(db, id);
  const warnings: string[] = [];

  const ingredients = listIngredients(db, id).map((ingredient): IngredientDetail => {
    const food = requireFoodItem(db, ingredient.foodItemId);
    const conversion = nutritionMultiplier(ingredient.quantity, ingredient.unitSpec, food, { bestEffort: true });
    if (conversion.warning) warnings.push(`${food.name}: ${conversion.warning}`);
    return {
      ...ingredient,
      foodName: food.name,
      multiplier: conversion.multiplier,
      rule: conversion.rule,
      nutrition: scaleNutrition(food.nutrition, conversion.multiplier),
    };
  });

  const components = listComponents(db, id).map((component): ComponentDetail => {
    const child = requireRecipe(db, component.componentRecipeId);
    return {
      ...component,
      componentName: child.name,
      nutrition: scaleNutrition(child.nutrition, component.servings),
    };
  });

  return {
    recipe,
    ingredients,
    components,
    allComponentIds: getAllComponentIds(db, id),
    usedBy: getParentRecipeIds(db, id),
    loggedCount: countMealEntriesForRecipe(db, id),
    warnings,
  };
}

export interface ListRecipesOptions {
  query?: string;
  favoritesOnly?: boolean;
  limit?: number;
  offset?: number;
}

export function listRecipes(db: DB, options: ListRecipesOptions = {}): { total: number; recipes: Recipe[] } {
  const where: string[] = [];
  const params: Array<string | number> = [];
  if (options.query) {
    where.push("name LIKE ?");
    params.push(`%${options.query}%`);
  }
  if (options.favoritesOnly) {
    where.push("is_favorite = 1");
  }
  const whereSql = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";

  const total = db.prepare<Array<string | number>, { n: number }>(`SELECT COUNT(*) AS n FROM recipes ${whereSql}`).get(...params);
  const ids = db
    .prepare<Array<string | number>, { id: number }>(
      `SELECT id FROM recipes ${whereSql} ORDER BY name COLLATE NOCASE, id LIMIT ? OFFSET ?`
    )
    .all(...params, options.limit ?? 50, options.offset ?? 0);

  return { total: total?.n ?? 0, recipes: ids.map((r) => requireRecipe(db, r.id)) };
}

export interface RecipeChange {
  recipe: Recipe;
  cascade: CascadeResult | null;
}

/**
 * Updates recipe metadata. Refused once the recipe has been logged, since
 * logged meals were recorded against its current definition.
 */
export function updateRecipe(db: DB, id: number, update: RecipeUpdate, options: CascadeOptions = {}): RecipeChange {
  const data = parseInput(recipeUpdateSchema, update);

  return withTransaction(db, () => {
    const existing = requireRecipe(db, id);
    const logged = countMealEntriesForRecipe(db, id);
    if (logged > 0) {
      throw new ValidationError(`Cannot update recipe ${id} (${existing.name}): logged in ${logged} meal entries`);
    }

    const servings = data.servingsProduced ?? existing.servingsProduced;
    db.prepare<[string, number, number, string | null, number]>(
      `UPDATE recipes SET name = ?, servings_produced = ?, is_favorite = ?, notes = ?, updated_at = datetime('now')
       WHERE id = ?`
    ).run(
      data.name ?? existing.name,
      servings,
      (data.isFavorite ?? existing.isFavorite) ? 1 : 0,
      data.notes === undefined ? existing.notes : data.notes,
      id
    );

    const cascade = servings !== existing.servingsProduced ? cascadeFromRecipes(db, [id], options) : null;
    return { recipe: requireRecipe(db, id), cascade };
  });
}

/** Deletes a recipe that is neither logged nor used as a component. Its own edges go with it. */
export function deleteRecipe(db: DB, id: number): Recipe {
  return withTransaction(db, () => {
    const existing = requireRecipe(db, id);
    const logged = countMealEntriesForRecipe(db, id);
    const parents = getParentRecipeIds(db, id);
    if (logged > 0 || parents.length > 0) {
      const parts: string[] = [];
      if (logged > 0) parts.push(`logged in ${logged} meal entries`);
      if (parents.length > 0) parts.push(`used as a component of recipes ${parents.join(", ")}`);
      throw new ValidationError(`Cannot delete recipe ${id} (${existing.name}): ${parts.join(" and ")}`);
    }
    db.prepare<[number]>("DELETE FROM recipes WHERE id = ?").run(id);
    return existing;
  });
}

// ---- Ingredients ----

export interface IngredientChange {
  ingredients: RecipeIngredient[];
  cascade: CascadeResult;
}

function requireIngredient(db: DB, id: number): RecipeIngredient {
  const ingredient = getIngredient(db, id);
  if (!ingredient) throw new NotFoundError("Recipe ingredient", id);
  return ingredient;
}

/**
 * Adds ingredients to a recipe and recalculates once. Each unit is parsed
 * and checked against its food before anything is written.
 */
export function addIngredients(
  db: DB,
  recipeId: number,
  inputs: IngredientInput[],
  options: CascadeOptions = {}
): IngredientChange {
  if (inputs.length === 0) {
    throw new ValidationError("At least one ingredient is required");
  }
  const items = inputs.map((input) => parseInput(ingredientInputSchema, input));

  return withTransaction(db, () => {
    requireRecipe(db, recipeId);

    const seen = new Set<number>();
    const existing = new Set(listIngredients(db, recipeId).map((i) => i.foodItemId));
    const prepared = items.map((item) => {
      const food = requireFoodItem(db, item.foodItemId);
      if (existing.has(food.id) || seen.has(food.id)) {
        throw new ValidationError(`Food item ${food.id} (${food.name}) is already an ingredient of recipe ${recipeId}`);
      }
      seen.add(food.id);
      const unitSpec = parseUnit(item.unit);
      // throws UnitConversionError unless best-effort
      nutritionMultiplier(item.quantity, unitSpec, food, options);
      return { ...item, unitSpec };
    });

    const insert = db.prepare<[number, number, number, string, string, string | null]>(
      "INSERT INTO recipe_ingredients (recipe_id, food_item_id, quantity, unit, unit_spec, notes) VALUES (?, ?, ?, ?, ?, ?)"
    );
    const created: RecipeIngredient[] = [];
    for (const item of prepared) {
      const info = insert.run(recipeId, item.foodItemId, item.quantity, item.unit, JSON.stringify(item.unitSpec), item.notes ?? null);
      created.push(requireIngredient(db, Number(info.lastInsertRowid)));
    }

    return { ingredients: created, cascade: cascadeFromRecipes(db, [recipeId], options) };
  });
}

export function addIngredient(
  db: DB,
  recipeId: number,
  input: IngredientInput,
  options: CascadeOptions = {}
): IngredientChange {
  return addIngredients(db, recipeId, [input], options);
}

export function updateIngredient(
  db: DB,
  id: number,
  update: IngredientUpdate,
  options: CascadeOptions = {}
): IngredientChange {
  const data = parseInput(ingredientUpdateSchema, update);

  return withTransaction(db, () => {
    const existing = requireIngredient(db, id);
    const food = requireFoodItem(db, existing.foodItemId);
    const quantity = data.quantity ?? existing.quantity;
    const unit = data.unit ?? existing.unit;
    const unitSpec = data.unit === undefined ? existing.unitSpec : parseUnit(data.unit);
    nutritionMultiplier(quantity, unitSpec, food, options);

    db.prepare<[number, string, string, string | null, number]>(
      "UPDATE recipe_ingredients SET quantity = ?, unit = ?, unit_spec = ?, notes = ? WHERE id = ?"
    ).run(quantity, unit, JSON.stringify(unitSpec), data.notes === undefined ? existing.notes : data.notes, id);

    return {
      ingredients: [requireIngredient(db, id)],
      cascade: cascadeFromRecipes(db, [existing.recipeId], options),
    };
  });
}

export function removeIngredient(db: DB, id: number, options: CascadeOptions = {}): IngredientChange {
  return withTransaction(db, () => {
    const existing = requireIngredient(db, id);
    db.prepare<[number]>("DELETE FROM recipe_ingredients WHERE id = ?").run(id);
    return { ingredients: [existing], cascade: cascadeFromRecipes(db, [existing.recipeId], options) };
  });
}

export interface RecipeTreeNode {
  recipeId: number;
  name: string;
  /** servings of this recipe used by its parent (1 at the root) */
  servings: number;
  nutrition: NutritionVector;
  components: RecipeTreeNode[];
}

/** Nested view of a recipe and every recipe composed into it. */
export function getRecipeTree(db: DB, id: number, servings = 1): RecipeTreeNode {
  const recipe = requireRecipe(db, id);
  return {
    recipeId: recipe.id,
    name: recipe.name,
    servings,
    nutrition: scaleNutrition(recipe.nutrition, servings),
    components: listComponents(db, id).map((c) => getRecipeTree(db, c.componentRecipeId, c.servings)),
  };
}

/** Recalculates a recipe and everything that depends on it. */
export function recalculateRecipeTree(db: DB, id: number, options: CascadeOptions = {}): RecipeChange {
  return withTransaction(db, () => {
    const cascade = cascadeFromRecipes(db, [id], options);
    return { recipe: requireRecipe(db, id), cascade };
  });
}
