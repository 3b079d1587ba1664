import { describe, test, expect, beforeEach } from "vitest";
import type { DB } from "../../src/db.js";
import { addIngredient } from "../../src/db/recipes.js";
import { requireRecipe } from "../../src/db/store.js";
import {
  addComponentEdge,
  getAllComponentIds,
  getParentRecipeIds,
  isReachable,
  removeComponent,
  updateComponent,
  wouldCreateCycle,
} from "../../src/engine/graph.js";
import { CycleError, NotFoundError, ValidationError } from "../../src/errors.js";
import { addFood, addRecipe, memoryDb, seededRandom } from "../helpers.js";

function edgeCount(db: DB): number {
  return db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM recipe_components").get()?.n ?? 0;
}

describe("Component Graph", () => {
  let db: DB;

  beforeEach(() => {
    db = memoryDb();
  });

  describe("isReachable", () => {
    const graph = new Map<number, number[]>([
      [1, [2]],
      [2, [3]],
      [4, [1]],
    ]);
    const children = (id: number) => graph.get(id) ?? [];

    test("should follow edges transitively", () => {
      expect(isReachable(4, 3, children)).toBe(true);
      expect(isReachable(3, 4, children)).toBe(false);
    });

    test("should count the start node itself", () => {
      expect(isReachable(5, 5, children)).toBe(true);
    });
  });

  describe("addComponentEdge", () => {
    test("should reject an edge that closes an indirect cycle and leave the graph unchanged", () => {
      const a = addRecipe(db, "A");
      const b = addRecipe(db, "B");
      const x = addRecipe(db, "X");
      addComponentEdge(db, { recipeId: a.id, componentRecipeId: x.id, servings: 1 });
      addComponentEdge(db, { recipeId: x.id, componentRecipeId: b.id, servings: 1 });
      expect(edgeCount(db)).toBe(2);

      expect(wouldCreateCycle(db, b.id, a.id)).toBe(true);
      expect(() => addComponentEdge(db, { recipeId: b.id, componentRecipeId: a.id, servings: 1 })).toThrow(CycleError);
      expect(edgeCount(db)).toBe(2);
      expect(getAllComponentIds(db, b.id)).toEqual([]);
      expect(getAllComponentIds(db, a.id)).toEqual([b.id, x.id].sort((p, q) => p - q));
    });

    test("should reject a recipe as its own component", () => {
      const a = addRecipe(db, "A");
      const run = () => addComponentEdge(db, { recipeId: a.id, componentRecipeId: a.id, servings: 1 });
      expect(run).toThrow(CycleError);
      expect(run).toThrow(`Recipe ${a.id} cannot be a component of itself`);
      expect(edgeCount(db)).toBe(0);
    });

    test("should report the cycle error code", () => {
      const a = addRecipe(db, "A");
      const b = addRecipe(db, "B");
      addComponentEdge(db, { recipeId: a.id, componentRecipeId: b.id, servings: 1 });
      try {
        addComponentEdge(db, { recipeId: b.id, componentRecipeId: a.id, servings: 1 });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(CycleError);
        if (e instanceof CycleError) {
          expect(e.code).toBe("cycle");
          expect(e.recipeId).toBe(b.id);
          expect(e.componentRecipeId).toBe(a.id);
        }
      }
    });

    test("should reject duplicate edges and unknown recipes", () => {
      const a = addRecipe(db, "A");
      const b = addRecipe(db, "B");
      addComponentEdge(db, { recipeId: a.id, componentRecipeId: b.id, servings: 1 });
      expect(() => addComponentEdge(db, { recipeId: a.id, componentRecipeId: b.id, servings: 2 })).toThrow(
        ValidationError
      );
      expect(() => addComponentEdge(db, { recipeId: a.id, componentRecipeId: 999, servings: 1 })).toThrow(
        NotFoundError
      );
      expect(() => addComponentEdge(db, { recipeId: a.id, componentRecipeId: b.id, servings: 0 })).toThrow(
        "servings: Number must be greater than 0"
      );
    });

    test("should recalculate the parent from the component's servings", () => {
      const oats = addFood(db, "Oats", { calories: 150, protein: 5 });
      const base = addRecipe(db, "Porridge base");
      addIngredient(db, base.id, { foodItemId: oats.id, quantity: 1 });
      const bowl = addRecipe(db, "Porridge bowl");

      const added = addComponentEdge(db, { recipeId: bowl.id, componentRecipeId: base.id, servings: 2 });
      expect(added.cascade.recipeIds).toEqual([bowl.id]);
      expect(requireRecipe(db, bowl.id).nutrition.calories).toBe(300);
      expect(requireRecipe(db, bowl.id).nutrition.protein).toBe(10);

      updateComponent(db, added.component.id, { servings: 3 });
      expect(requireRecipe(db, bowl.id).nutrition.calories).toBe(450);

      removeComponent(db, added.component.id);
      expect(requireRecipe(db, bowl.id).nutrition.calories).toBe(0);
      expect(getParentRecipeIds(db, base.id)).toEqual([]);
    });
  });

  describe("cycle detection on random graphs", () => {
    test("should reject an edge exactly when the parent is reachable from the component", () => {
      const random = seededRandom(20240501);
      const ids = Array.from({ length: 8 }, (_, i) => addRecipe(db, `R${i}`).id);
      const adjacency = new Map<number, Set<number>>(ids.map((id) => [id, new Set<number>()]));
      const reachable = (from: number, to: number) => isReachable(from, to, (id) => adjacency.get(id) ?? []);

      for (let attempt = 0; attempt < 60; attempt++) {
        const recipeId = ids[Math.floor(random() * ids.length)];
        const componentRecipeId = ids[Math.floor(random() * ids.length)];
        if (recipeId === undefined || componentRecipeId === undefined) continue;
        if (adjacency.get(recipeId)?.has(componentRecipeId)) continue;

        const expectCycle = recipeId === componentRecipeId || reachable(componentRecipeId, recipeId);
        expect(wouldCreateCycle(db, recipeId, componentRecipeId)).toBe(expectCycle);

        if (expectCycle) {
          expect(() => addComponentEdge(db, { recipeId, componentRecipeId, servings: 1 })).toThrow(CycleError);
        } else {
          addComponentEdge(db, { recipeId, componentRecipeId, servings: 1 });
          adjacency.get(recipeId)?.add(componentRecipeId);
        }
      }

      const expectedEdges = [...adjacency.values()].reduce((n, s) => n + s.size, 0);
      expect(edgeCount(db)).toBe(expectedEdges);

      for (const id of ids) {
        const closure = ids.filter((other) => other !== id && reachable(id, other));
        expect(getAllComponentIds(db, id)).toEqual(closure);
      }
    });
  });
});
