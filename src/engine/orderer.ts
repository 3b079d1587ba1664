import { IntegrityError } from "../errors.js";

/** A composition edge: `recipeId` uses `componentRecipeId`. */
export interface ComponentEdge {
  recipeId: number;
  componentRecipeId: number;
}

/**
 * Orders `recipeIds` so every recipe comes after the components it uses
 * (Kahn's algorithm on the subgraph induced by the set). Edges with an
 * endpoint outside the set are ignored.
 *
 * The starting recipes, and the parents each step frees, are queued in
 * ascending id order, so the order is stable across runs.
 * A residual cycle means the composition graph is corrupt and raises
 * IntegrityError.
 */
export function orderRecipes(recipeIds: Iterable<number>, edges: Iterable<ComponentEdge>): number[] {
  const nodes = [...new Set(recipeIds)].sort((a, b) => a - b);
  const inSet = new Set(nodes);

  const inDegree = new Map<number, number>();
  const dependents = new Map<number, number[]>();
  for (const id of nodes) {
    inDegree.set(id, 0);
    dependents.set(id, []);
  }

  const seen = new Set<string>();
  for (const { recipeId, componentRecipeId } of edges) {
    if (!inSet.has(recipeId) || !inSet.has(componentRecipeId)) continue;
    const key = `${recipeId}:${componentRecipeId}`;
    if (seen.has(key)) continue;
    seen.add(key);

    inDegree.set(recipeId, (inDegree.get(recipeId) ?? 0) + 1);
    dependents.get(componentRecipeId)?.push(recipeId);
  }

  const queue = nodes.filter((id) => inDegree.get(id) === 0);
  const order: number[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    order.push(id);

    const next = (dependents.get(id) ?? []).sort((a, b) => a - b);
    for (const parent of next) {
      const remaining = (inDegree.get(parent) ?? 0) - 1;
      inDegree.set(parent, remaining);
      if (remaining === 0) queue.push(parent);
    }
  }

  if (order.length < nodes.length) {
    const placed = new Set(order);
    const stuck = nodes.filter((id) => !placed.has(id));
    throw new IntegrityError(
      `Recipe composition cycle detected among recipes ${stuck.join(", ")}; cached nutrition was not updated`
    );
  }

  return order;
}
