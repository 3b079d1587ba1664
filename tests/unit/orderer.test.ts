import { describe, test, expect } from "vitest";
import { orderRecipes, type ComponentEdge } from "../../src/engine/orderer.js";
import { IntegrityError } from "../../src/errors.js";

const edge = (recipeId: number, componentRecipeId: number): ComponentEdge => ({ recipeId, componentRecipeId });

describe("orderRecipes", () => {
  test("should place components before the recipes that use them", () => {
    // 1 uses 2, 2 uses 3
    expect(orderRecipes([1, 2, 3], [edge(1, 2), edge(2, 3)])).toEqual([3, 2, 1]);
  });

  test("should break ties by ascending id", () => {
    expect(orderRecipes([5, 3, 9, 1], [])).toEqual([1, 3, 5, 9]);
    // 10 uses 4 and 7; 4 and 7 are independent
    expect(orderRecipes([10, 7, 4], [edge(10, 7), edge(10, 4)])).toEqual([4, 7, 10]);
  });

  test("should handle a diamond", () => {
    // 1 uses 2 and 3, both use 4
    const edges = [edge(1, 2), edge(1, 3), edge(2, 4), edge(3, 4)];
    expect(orderRecipes([1, 2, 3, 4], edges)).toEqual([4, 2, 3, 1]);
  });

  test("should ignore edges leaving the set and duplicate ids", () => {
    expect(orderRecipes([2, 1, 2], [edge(1, 2), edge(2, 99), edge(42, 1)])).toEqual([2, 1]);
  });

  test("should ignore duplicate edges", () => {
    expect(orderRecipes([1, 2], [edge(1, 2), edge(1, 2)])).toEqual([2, 1]);
  });

  test("should return an empty order for an empty set", () => {
    expect(orderRecipes([], [edge(1, 2)])).toEqual([]);
  });

  test("should fail loudly on a residual cycle", () => {
    const run = () => orderRecipes([1, 2, 3, 4], [edge(1, 2), edge(2, 3), edge(3, 2), edge(4, 1)]);
    expect(run).toThrow(IntegrityError);
    expect(run).toThrow("Recipe composition cycle detected among recipes 1, 2, 3, 4");
  });
});
