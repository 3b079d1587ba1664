import { describe, test, expect, beforeEach } from "vitest";
import type { DB } from "../../src/db.js";
import { convertMultiplier, deleteFoodItem, getFoodItemUsage, listFoodItems, listUnusedFoodItems } from "../../src/db/foods.js";
import {
  deleteMealEntry,
  getDayDetail,
  listDays,
  logMeal,
  updateDayNotes,
  updateMealEntry,
} from "../../src/db/meals.js";
import { addIngredient, deleteRecipe, getRecipeDetail, getRecipeTree, updateRecipe } from "../../src/db/recipes.js";
import { requireRecipe } from "../../src/db/store.js";
import { addComponentEdge } from "../../src/engine/graph.js";
import { NotFoundError, ValidationError } from "../../src/errors.js";
import { addFood, addRecipe, memoryDb } from "../helpers.js";

describe("Food items", () => {
  let db: DB;

  beforeEach(() => {
    db = memoryDb();
  });

  test("should derive the unit profile from the serving", () => {
    const pb = addFood(db, "Peanut butter", { servingSize: 2, servingUnit: "tbsp (16g)", calories: 190 });
    expect(pb.baseUnitType).toBe("weight");
    expect(pb.gramsPerServing).toBe(32);
  });

  test("should refuse to delete a food item that is still referenced", () => {
    const oats = addFood(db, "Oats", { calories: 150 });
    const porridge = addRecipe(db, "Porridge");
    addIngredient(db, porridge.id, { foodItemId: oats.id, quantity: 1 });
    logMeal(db, { date: "2024-05-01", foodItemId: oats.id });

    expect(getFoodItemUsage(db, oats.id)).toEqual({ recipeIds: [porridge.id], mealEntryCount: 1 });
    expect(() => deleteFoodItem(db, oats.id)).toThrow(
      "Cannot delete food item 1 (Oats): used in recipes 1 and logged in 1 meal entries"
    );
  });

  test("should list unused food items by name", () => {
    const zucchini = addFood(db, "zucchini");
    const oats = addFood(db, "Oats");
    const apple = addFood(db, "apple");
    logMeal(db, { date: "2024-05-01", foodItemId: oats.id });

    expect(listUnusedFoodItems(db).map((f) => f.id)).toEqual([apple.id, zucchini.id]);
    deleteFoodItem(db, apple.id);
    expect(listFoodItems(db).total).toBe(2);
  });

  test("convertMultiplier should use the recipe conversion rules", () => {
    const rice = addFood(db, "Rice", { servingSize: 100, servingUnit: "g" });
    expect(convertMultiplier(db, rice.id, 250, "grams").multiplier).toBe(2.5);
    expect(() => convertMultiplier(db, rice.id, 0, "g")).toThrow("quantity: Number must be greater than 0");
    expect(() => convertMultiplier(db, 999, 1, "g")).toThrow(NotFoundError);
  });
});

describe("Recipes", () => {
  let db: DB;

  beforeEach(() => {
    db = memoryDb();
  });

  test("should divide by servings produced and cascade on change", () => {
    const oats = addFood(db, "Oats", { calories: 150 });
    const porridge = addRecipe(db, "Porridge", { servingsProduced: 2 });
    addIngredient(db, porridge.id, { foodItemId: oats.id, quantity: 4 });
    expect(requireRecipe(db, porridge.id).nutrition.calories).toBe(300);

    const change = updateRecipe(db, porridge.id, { servingsProduced: 4 });
    expect(change.cascade?.recipeIds).toEqual([porridge.id]);
    expect(change.recipe.nutrition.calories).toBe(150);

    expect(updateRecipe(db, porridge.id, { name: "Oat porridge" }).cascade).toBeNull();
  });

  test("should refuse to update a logged recipe", () => {
    const porridge = addRecipe(db, "Porridge");
    logMeal(db, { date: "2024-05-01", recipeId: porridge.id });
    expect(() => updateRecipe(db, porridge.id, { servingsProduced: 2 })).toThrow(
      "Cannot update recipe 1 (Porridge): logged in 1 meal entries"
    );
  });

  test("should refuse to delete a recipe used as a component", () => {
    const bowl = addRecipe(db, "Bowl");
    const base = addRecipe(db, "Base");
    addComponentEdge(db, { recipeId: bowl.id, componentRecipeId: base.id, servings: 1 });

    expect(() => deleteRecipe(db, base.id)).toThrow("Cannot delete recipe 2 (Base): used as a component of recipes 1");
    deleteRecipe(db, bowl.id);
    expect(deleteRecipe(db, base.id).name).toBe("Base");
  });

  test("should reject the same food twice in one recipe", () => {
    const oats = addFood(db, "Oats");
    const porridge = addRecipe(db, "Porridge");
    addIngredient(db, porridge.id, { foodItemId: oats.id, quantity: 1 });
    expect(() => addIngredient(db, porridge.id, { foodItemId: oats.id, quantity: 2 })).toThrow(
      "Food item 1 (Oats) is already an ingredient of recipe 1"
    );
  });

  test("should describe a recipe and its nested components", () => {
    const oats = addFood(db, "Oats", { servingSize: 40, servingUnit: "g", calories: 150 });
    const berries = addFood(db, "Berries", { servingSize: 1, servingUnit: "cup", calories: 80 });
    const base = addRecipe(db, "Base");
    addIngredient(db, base.id, { foodItemId: oats.id, quantity: 80, unit: "g" });
    const bowl = addRecipe(db, "Bowl");
    addIngredient(db, bowl.id, { foodItemId: berries.id, quantity: 0.5, unit: "cup" });
    addComponentEdge(db, { recipeId: bowl.id, componentRecipeId: base.id, servings: 0.5 });

    const detail = getRecipeDetail(db, bowl.id);
    expect(detail.ingredients).toHaveLength(1);
    expect(detail.ingredients[0]?.nutrition.calories).toBe(40);
    expect(detail.components[0]?.nutrition.calories).toBe(150);
    expect(detail.allComponentIds).toEqual([base.id]);
    expect(getRecipeDetail(db, base.id).usedBy).toEqual([bowl.id]);

    const tree = getRecipeTree(db, bowl.id);
    expect(tree.nutrition.calories).toBe(190);
    expect(tree.components).toHaveLength(1);
    expect(tree.components[0]?.name).toBe("Base");
    expect(tree.components[0]?.servings).toBe(0.5);
    expect(tree.components[0]?.nutrition.calories).toBe(150);
  });
});

describe("Meal log", () => {
  let db: DB;

  beforeEach(() => {
    db = memoryDb();
  });

  test("should validate what is logged", () => {
    const oats = addFood(db, "Oats");
    const porridge = addRecipe(db, "Porridge");
    expect(() => logMeal(db, { date: "2024-05-01", recipeId: porridge.id, foodItemId: oats.id })).toThrow(
      "Provide exactly one of recipeId or foodItemId"
    );
    expect(() => logMeal(db, { date: "2024-05-01", recipeId: porridge.id, quantity: 1, unit: "g" })).toThrow(
      "quantity/unit logging is only supported for food items"
    );
    expect(() => logMeal(db, { date: "2024-05-01", recipeId: 999 })).toThrow(NotFoundError);
    expect(listDays(db)).toEqual([]);
  });

  test("should apply servings and percent eaten", () => {
    const oats = addFood(db, "Oats", { calories: 150, protein: 5 });
    const { entry, day } = logMeal(db, {
      date: "2024-05-01",
      foodItemId: oats.id,
      servings: 2,
      percentEaten: 50,
      mealType: "breakfast",
    });
    expect(entry.sourceType).toBe("food_item");
    expect(entry.sourceName).toBe("Oats");
    expect(entry.nutrition.calories).toBe(150);
    expect(day.nutrition.protein).toBe(5);
  });

  test("changing servings drops the logged quantity", () => {
    const rice = addFood(db, "Rice", { servingSize: 100, servingUnit: "g", calories: 130 });
    const { entry } = logMeal(db, { date: "2024-05-01", foodItemId: rice.id, quantity: 150, unit: "g" });
    expect(entry.servings).toBe(1.5);
    expect(entry.quantity).toBe(150);

    const updated = updateMealEntry(db, entry.id, { servings: 2 });
    expect(updated.entry.quantity).toBeNull();
    expect(updated.entry.unit).toBeNull();
    expect(updated.day.nutrition.calories).toBe(260);

    expect(deleteMealEntry(db, entry.id).day.nutrition.calories).toBe(0);
  });

  test("days are listed newest first and keep their notes", () => {
    const oats = addFood(db, "Oats", { calories: 150 });
    logMeal(db, { date: "2024-05-01", foodItemId: oats.id });
    logMeal(db, { date: "2024-05-03", foodItemId: oats.id });
    logMeal(db, { date: "2024-05-02", foodItemId: oats.id });

    expect(listDays(db).map((d) => d.date)).toEqual(["2024-05-03", "2024-05-02", "2024-05-01"]);
    expect(listDays(db, { from: "2024-05-02", limit: 1 }).map((d) => d.date)).toEqual(["2024-05-03"]);

    expect(updateDayNotes(db, "2024-05-02", "rest day").notes).toBe("rest day");
    expect(getDayDetail(db, "2024-05-02").entries).toHaveLength(1);
    expect(() => getDayDetail(db, "2024-04-30")).toThrow("Day not found: 2024-04-30");
    expect(() => getDayDetail(db, "May 1st")).toThrow(ValidationError);
    expect(() => logMeal(db, { date: "2024-02-31", foodItemId: oats.id })).toThrow("date: Invalid calendar date");
    expect(logMeal(db, { date: "2024-02-29", foodItemId: oats.id }).day.date).toBe("2024-02-29");
  });
});
