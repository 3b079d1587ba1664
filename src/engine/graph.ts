import type { DB } from "../db.js";
import { CycleError, NotFoundError, ValidationError } from "../errors.js";
import {
  componentInputSchema,
  componentUpdateSchema,
  parseInput,
  type ComponentInput,
  type ComponentUpdate,
} from "../db/schemas.js";
import {
  getComponent,
  listComponentIds,
  recipeIdsUsingRecipes,
  requireRecipe,
  withTransaction,
  type RecipeComponent,
} from "../db/store.js";
import { cascadeFromRecipes, type CascadeOptions, type CascadeResult } from "./cascade.js";

/**
 * Depth-first search over `children`. True when `target` can be reached from
 * `start`, counting `start` itself.
 */
export function isReachable(start: number, target: number, children: (id: number) => Iterable<number>): boolean {
  const visited = new Set<number>();
  const stack = [start];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (id === target) return true;
    if (visited.has(id)) continue;
    visited.add(id);
    for (const child of children(id)) {
      if (!visited.has(child)) stack.push(child);
    }
  }
  return false;
}

/** An edge recipe -> component closes a cycle iff recipe is reachable from component. */
export function wouldCreateCycle(db: DB, recipeId: number, componentRecipeId: number): boolean {
  return isReachable(componentRecipeId, recipeId, (id) => listComponentIds(db, id));
}

/** Every recipe reachable from `recipeId` through component edges, excluding itself. */
export function getAllComponentIds(db: DB, recipeId: number): number[] {
  requireRecipe(db, recipeId);
  const seen = new Set<number>();
  const queue = listComponentIds(db, recipeId);
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    queue.push(...listComponentIds(db, id));
  }
  seen.delete(recipeId);
  return [...seen].sort((a, b) => a - b);
}

/** Recipes that list `recipeId` directly as a component. */
export function getParentRecipeIds(db: DB, recipeId: number): number[] {
  return recipeIdsUsingRecipes(db, [recipeId]).sort((a, b) => a - b);
}

export interface ComponentChange {
  component: RecipeComponent;
  cascade: CascadeResult;
}

function requireComponent(db: DB, id: number): RecipeComponent {
  const component = getComponent(db, id);
  if (!component) throw new NotFoundError("Recipe component", id);
  return component;
}

/**
 * Adds `componentRecipeId` to `recipeId` with a servings weight. The cycle
 * check and the insert share one transaction, so a rejected edge leaves the
 * graph untouched.
 */
export function addComponentEdge(db: DB, input: ComponentInput, options: CascadeOptions = {}): ComponentChange {
  const data = parseInput(componentInputSchema, input);

  return withTransaction(db, () => {
    requireRecipe(db, data.recipeId);
    requireRecipe(db, data.componentRecipeId);

    if (wouldCreateCycle(db, data.recipeId, data.componentRecipeId)) {
      throw new CycleError(data.recipeId, data.componentRecipeId);
    }

    const duplicate = db
      .prepare<[number, number], { id: number }>(
        "SELECT id FROM recipe_components WHERE recipe_id = ? AND component_recipe_id = ?"
      )
      .get(data.recipeId, data.componentRecipeId);
    if (duplicate) {
      throw new ValidationError(
        `Recipe ${data.componentRecipeId} is already a component of recipe ${data.recipeId} (component ${duplicate.id})`
      );
    }

    const info = db
      .prepare<[number, number, number, string | null]>(
        "INSERT INTO recipe_components (recipe_id, component_recipe_id, servings, notes) VALUES (?, ?, ?, ?)"
      )
      .run(data.recipeId, data.componentRecipeId, data.servings, data.notes ?? null);

    const component = requireComponent(db, Number(info.lastInsertRowid));
    return { component, cascade: cascadeFromRecipes(db, [data.recipeId], options) };
  });
}

export function updateComponent(
  db: DB,
  id: number,
  update: ComponentUpdate,
  options: CascadeOptions = {}
): ComponentChange {
  const data = parseInput(componentUpdateSchema, update);

  return withTransaction(db, () => {
    const existing = requireComponent(db, id);
    db.prepare<[number, string | null, number]>("UPDATE recipe_components SET servings = ?, notes = ? WHERE id = ?").run(
      data.servings ?? existing.servings,
      data.notes === undefined ? existing.notes : data.notes,
      id
    );
    return {
      component: requireComponent(db, id),
      cascade: cascadeFromRecipes(db, [existing.recipeId], options),
    };
  });
}

export function removeComponent(db: DB, id: number, options: CascadeOptions = {}): ComponentChange {
  return withTransaction(db, () => {
    const existing = requireComponent(db, id);
    db.prepare<[number]>("DELETE FROM recipe_components WHERE id = ?").run(id);
    return { component: existing, cascade: cascadeFromRecipes(db, [existing.recipeId], options) };
  });
}
