import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { executeCommand } from "../../src/cli.js";

// Runs commands against a database in the per-test data directory from tests/setup.ts
async function run(...argv: string[]): Promise<unknown> {
  const result = await executeCommand(argv);
  if (result.exitCode !== 0) {
    throw new Error(`nutrigraph ${argv.join(" ")} failed: ${result.stderr}`);
  }
  return JSON.parse(result.stdout);
}

describe("CLI", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("food, nested recipe, log and cascade", async () => {
    expect(await run("food", "add", "Butter", "--serving-size", "100", "--serving-unit", "g", "--calories", "700", "--fat", "80")).toMatchObject({
      id: 1,
      name: "Butter",
      servingUnit: "g",
      nutrition: { calories: 700, fat: 80 },
    });
    await run("recipe", "add", "Dough", "--servings", "4");
    await run("ingredient", "add", "1", "1", "100", "g");
    await run("recipe", "add", "Tart");
    await run("component", "add", "2", "1", "--servings", "2");

    expect(await run("recipe", "get", "2")).toMatchObject({
      recipe: { name: "Tart", nutrition: { calories: 350 } },
      allComponentIds: [1],
    });

    expect(await run("log", "recipe", "2", "--date", "2024-05-01", "--type", "dinner")).toMatchObject({
      entry: { mealType: "dinner", sourceName: "Tart" },
      day: { date: "2024-05-01", nutrition: { calories: 350 } },
    });

    expect(await run("food", "update", "1", "--calories", "800")).toMatchObject({
      deferred: false,
      cascade: { recipeIds: [1, 2], recipesRecalculated: 2, daysRecalculated: 1 },
    });
    expect(await run("day", "get", "2024-05-01")).toMatchObject({
      day: { nutrition: { calories: 400 } },
      netCalories: 400,
    });
  });

  test("rejects a cycle with its error code", async () => {
    await run("recipe", "add", "A");
    await run("recipe", "add", "B");
    await run("component", "add", "1", "2");

    const result = await executeCommand(["component", "add", "2", "1"]);
    expect(result.exitCode).toBe(1);
    expect(JSON.parse(result.stderr)).toEqual({
      error: "Adding recipe 1 as a component of recipe 2 would create a cycle",
      code: "cycle",
    });
  });

  test("converts a quantity against a food", async () => {
    await run("food", "add", "Rice", "--serving-size", "100", "--serving-unit", "g", "--calories", "130");
    const conversion = await run("convert", "2", "oz", "--food", "1");
    expect(conversion).toMatchObject({ quantity: 2, unit: "oz", foodItemId: 1, rule: "weight", warning: null });
    expect(conversion).toHaveProperty("multiplier");

    const human = await executeCommand(["convert", "250", "g", "--food", "1", "--human"]);
    expect(human.stdout).toBe("250 g = 2.5 servings (same_unit)\n");
  });

  test("treadmill segment and body weight", async () => {
    await run("exercise", "add", "--date", "2024-05-01", "--type", "tm");
    expect(await run("segment", "add", "1", "--duration", "30", "--speed", "3", "--incline", "2")).toMatchObject({
      segment: { caloriesBurned: 125.9, calculatedField: "distance", distanceMiles: 1.5 },
      exercise: { caloriesBurned: 125.9 },
    });

    await run("config", "--default-weight", "200");
    expect(await run("segment", "update", "1", "--incline", "2")).toMatchObject({
      segment: { caloriesBurned: 167.8, weightUsedLbs: 200 },
    });
  });

  test("batch mode round trip", async () => {
    expect(await run("batch", "finish")).toMatchObject({ success: false, message: "Batch mode was not active" });
    await run("batch", "start");
    expect(await run("batch", "status")).toMatchObject({ active: true, pendingFoodItemIds: [] });
  });

  test("config stores the unit fallback", async () => {
    expect(await run("config", "--unit-fallback", "best-effort")).toEqual({
      success: true,
      unitFallback: "best-effort",
    });
    expect(await run("config")).toMatchObject({ config: { unitFallback: "best-effort", defaultWeightLbs: 150 } });

    const bad = await executeCommand(["config", "--unit-fallback", "sometimes"]);
    expect(bad.exitCode).toBe(1);
    expect(JSON.parse(bad.stderr)).toMatchObject({ code: "validation" });
  });

  test("switch flags leave the next argument positional", async () => {
    await run("recipe", "add", "Soup");
    expect(await run("recipe", "recalc", "--best-effort", "1")).toMatchObject({
      recipe: { id: 1, name: "Soup" },
      cascade: { recipeIds: [1] },
    });
  });

  test("reports usage errors", async () => {
    const unknown = await executeCommand(["frobnicate"]);
    expect(unknown.exitCode).toBe(1);
    expect(JSON.parse(unknown.stderr)).toEqual({ error: "Unknown command: frobnicate. Run 'nutrigraph help' for usage." });

    const missing = await executeCommand(["food", "get", "42"]);
    expect(JSON.parse(missing.stderr)).toEqual({ error: "Food item not found: 42", code: "not_found" });

    const help = await executeCommand(["help"]);
    expect(help.exitCode).toBe(0);
    expect(help.stdout).toContain("component add <recipe> <component>");
  });
});
