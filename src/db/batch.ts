/**
 * Batch update mode.
 *
 * While active, food item updates skip their cascade and record the food id
 * instead. Finishing the batch runs a single cascade over every recorded id.
 * State lives in the database so it survives across CLI invocations.
 */

import type { DB } from "../db.js";
import { cascadeFromFoodItems, type CascadeOptions } from "../engine/cascade.js";
import { withTransaction } from "./store.js";

export interface BatchState {
  active: boolean;
  startedAt: string | null;
  pendingFoodItemIds: number[];
}

export interface BatchStartResult {
  success: boolean;
  message: string;
  pendingItems: number;
}

export interface BatchFinishResult {
  success: boolean;
  message: string;
  foodItemsProcessed: number;
  recipesRecalculated: number;
  daysRecalculated: number;
  warnings: string[];
}

function pendingIds(db: DB): number[] {
  return db
    .prepare<[], { food_item_id: number }>("SELECT food_item_id FROM batch_pending_foods ORDER BY food_item_id")
    .all()
    .map((r) => r.food_item_id);
}

export function getBatchState(db: DB): BatchState {
  const row = db
    .prepare<[], { active: number; started_at: string | null }>("SELECT active, started_at FROM batch_state WHERE id = 1")
    .get();
  return {
    active: row?.active === 1,
    startedAt: row?.started_at ?? null,
    pendingFoodItemIds: pendingIds(db),
  };
}

export function isBatchActive(db: DB): boolean {
  return getBatchState(db).active;
}

export function recordPendingFood(db: DB, foodItemId: number): void {
  db.prepare<[number]>("INSERT OR IGNORE INTO batch_pending_foods (food_item_id) VALUES (?)").run(foodItemId);
}

export function forgetPendingFood(db: DB, foodItemId: number): void {
  db.prepare<[number]>("DELETE FROM batch_pending_foods WHERE food_item_id = ?").run(foodItemId);
}

export function startBatch(db: DB): BatchStartResult {
  return withTransaction(db, () => {
    const state = getBatchState(db);
    if (state.active) {
      return {
        success: true,
        message: "Batch mode was already active",
        pendingItems: state.pendingFoodItemIds.length,
      };
    }

    db.exec("DELETE FROM batch_pending_foods");
    db.prepare("UPDATE batch_state SET active = 1, started_at = datetime('now') WHERE id = 1").run();
    return {
      success: true,
      message: "Batch mode started. Food item updates will defer recalculation until the batch is finished.",
      pendingItems: 0,
    };
  });
}

export function finishBatch(db: DB, options: CascadeOptions = {}): BatchFinishResult {
  return withTransaction(db, () => {
    const state = getBatchState(db);
    if (!state.active) {
      return {
        success: false,
        message: "Batch mode was not active",
        foodItemsProcessed: 0,
        recipesRecalculated: 0,
        daysRecalculated: 0,
        warnings: [],
      };
    }

    const ids = state.pendingFoodItemIds;
    const result = ids.length > 0 ? cascadeFromFoodItems(db, ids, options) : null;

    db.exec("DELETE FROM batch_pending_foods");
    db.prepare("UPDATE batch_state SET active = 0, started_at = NULL WHERE id = 1").run();

    return {
      success: true,
      message: "Batch update completed",
      foodItemsProcessed: ids.length,
      recipesRecalculated: result?.recipesRecalculated ?? 0,
      daysRecalculated: result?.daysRecalculated ?? 0,
      warnings: result?.warnings ?? [],
    };
  });
}
