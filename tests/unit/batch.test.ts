import { describe, test, expect, beforeEach } from "vitest";
import type { DB } from "../../src/db.js";
import { finishBatch, getBatchState, startBatch } from "../../src/db/batch.js";
import { deleteFoodItem, updateFoodItem } from "../../src/db/foods.js";
import { addIngredient } from "../../src/db/recipes.js";
import { requireRecipe } from "../../src/db/store.js";
import { addFood, addRecipe, memoryDb } from "../helpers.js";

describe("Batch mode", () => {
  let db: DB;

  beforeEach(() => {
    db = memoryDb();
  });

  test("should defer cascades until the batch is finished", () => {
    const oats = addFood(db, "Oats", { calories: 150 });
    const milk = addFood(db, "Milk", { calories: 100 });
    const porridge = addRecipe(db, "Porridge");
    addIngredient(db, porridge.id, { foodItemId: oats.id, quantity: 1 });
    addIngredient(db, porridge.id, { foodItemId: milk.id, quantity: 1 });
    expect(requireRecipe(db, porridge.id).nutrition.calories).toBe(250);

    expect(startBatch(db)).toEqual({
      success: true,
      message: "Batch mode started. Food item updates will defer recalculation until the batch is finished.",
      pendingItems: 0,
    });

    const change = updateFoodItem(db, milk.id, { calories: 120 });
    expect(change.deferred).toBe(true);
    expect(change.cascade).toBeNull();
    updateFoodItem(db, oats.id, { calories: 160 });
    updateFoodItem(db, milk.id, { calories: 130 });

    expect(requireRecipe(db, porridge.id).nutrition.calories).toBe(250);
    expect(getBatchState(db).pendingFoodItemIds).toEqual([oats.id, milk.id]);
    expect(startBatch(db).pendingItems).toBe(2);

    const result = finishBatch(db);
    expect(result).toEqual({
      success: true,
      message: "Batch update completed",
      foodItemsProcessed: 2,
      recipesRecalculated: 1,
      daysRecalculated: 0,
      warnings: [],
    });
    expect(requireRecipe(db, porridge.id).nutrition.calories).toBe(290);
    expect(getBatchState(db)).toEqual({ active: false, startedAt: null, pendingFoodItemIds: [] });
  });

  test("should report when no batch is active", () => {
    expect(finishBatch(db)).toEqual({
      success: false,
      message: "Batch mode was not active",
      foodItemsProcessed: 0,
      recipesRecalculated: 0,
      daysRecalculated: 0,
      warnings: [],
    });
  });

  test("should drop a deleted food item from the pending set", () => {
    const unused = addFood(db, "Unused");
    startBatch(db);
    updateFoodItem(db, unused.id, { calories: 10 });
    deleteFoodItem(db, unused.id);

    expect(getBatchState(db).pendingFoodItemIds).toEqual([]);
    expect(finishBatch(db).foodItemsProcessed).toBe(0);
  });
});
