#!/usr/bin/env node
import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  getConfig,
  getConfigPaths,
  getDb,
  initializeDatabase,
  resetConfig,
  saveConfig,
  setDataDir,
  unitFallbackSchema,
  type DB,
} from "./db.js";
import { finishBatch, getBatchState, startBatch } from "./db/batch.js";
import {
  addExercise,
  addSegment,
  deleteExercise,
  deleteSegment,
  getExerciseDetail,
  listBodyWeights,
  listExercises,
  recordBodyWeight,
  updateSegment,
  type ExerciseDetail,
} from "./db/exercises.js";
import {
  convertMultiplier,
  createFoodItem,
  deleteFoodItem,
  getFoodItemUsage,
  listFoodItems,
  listUnusedFoodItems,
  updateFoodItem,
} from "./db/foods.js";
import {
  deleteMealEntry,
  getDayDetail,
  getMealEntryDetail,
  listDays,
  logMeal,
  recalculateDayByDate,
  updateDayNotes,
  updateMealEntry,
  type MealEntryDetail,
} from "./db/meals.js";
import { NUTRIENT_FIELDS, formatNutritionLine, type NutrientField, type NutritionVector } from "./db/nutrient-fields.js";
import {
  addIngredients,
  createRecipe,
  deleteRecipe,
  getRecipeDetail,
  getRecipeTree,
  listRecipes,
  recalculateRecipeTree,
  removeIngredient,
  updateIngredient,
  updateRecipe,
  type RecipeTreeNode,
} from "./db/recipes.js";
import {
  exerciseTypeSchema,
  ingredientInputSchema,
  mealTypeSchema,
  parseInput,
  preferenceSchema,
  type IngredientInput,
} from "./db/schemas.js";
import { requireFoodItem, type Day, type FoodItem, type Recipe } from "./db/store.js";
import type { CascadeOptions, CascadeResult } from "./engine/cascade.js";
import { addComponentEdge, removeComponent, updateComponent } from "./engine/graph.js";
import { NutrigraphError } from "./errors.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

// Flags that never take a value, so `--best-effort 4` leaves 4 positional
const SWITCH_FLAGS = new Set(["human", "h", "best-effort", "reset", "favorites"]);

function parseFlags(args: string[]): { flags: Record<string, string>; positional: string[] } {
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || arg === "") continue;
    if (arg === "--") {
      // End-of-flags sentinel: everything after is positional
      positional.push(...args.slice(i + 1).filter(Boolean));
      break;
    }

    let key: string | null = null;
    if (arg.startsWith("--")) {
      // Handle --flag=value syntax
      const eqIdx = arg.indexOf("=");
      if (eqIdx !== -1) {
        flags[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
        continue;
      }
      key = arg.slice(2);
    } else if (/^-[a-zA-Z]$/.test(arg)) {
      // Single-letter flags like -h (alphabetic only, so -5 stays positional)
      key = arg.slice(1);
    }

    if (key === null) {
      positional.push(arg);
      continue;
    }
    const value = args[i + 1];
    if (!SWITCH_FLAGS.has(key) && value && (!value.startsWith("-") || /^-\d/.test(value))) {
      flags[key] = value;
      i++;
    } else {
      flags[key] = "true";
    }
  }

  return { flags, positional };
}

function parsePositiveInt(value: string | undefined, defaultValue: number, max: number = 100): number {
  if (value === undefined) return defaultValue;
  const n = parseInt(value, 10);
  if (isNaN(n) || n < 1) return defaultValue;
  return Math.min(n, max);
}

function parseId(value: string | undefined, usage: string): number {
  if (value === undefined) throw new CliError(`Usage: nutrigraph ${usage}`);
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new CliError(`Invalid id "${value}". Usage: nutrigraph ${usage}`);
  return n;
}

function parseNumber(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new CliError(`${label} must be a number, got "${value}"`);
  }
  return n;
}

function parseBool(value: string | undefined, label: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (["true", "yes", "1"].includes(value)) return true;
  if (["false", "no", "0"].includes(value)) return false;
  throw new CliError(`${label} must be true or false, got "${value}"`);
}

function flagName(field: NutrientField): string {
  return field.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

function nutritionFlags(flags: Record<string, string>): Partial<NutritionVector> {
  const nutrition: Partial<NutritionVector> = {};
  for (const field of NUTRIENT_FIELDS) {
    const value = parseNumber(flags[flagName(field)], `--${flagName(field)}`);
    if (value !== undefined) nutrition[field] = value;
  }
  return nutrition;
}

function computeDateStr(offset: number): string {
  const d = new Date();
  d.setDate(d.getDate() + offset);
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, "0")}-${String(d.getDate()).padStart(2, "0")}`;
}

function formatFood(food: FoodItem): string {
  return (
    `#${food.id} ${food.name}${food.brand ? ` (${food.brand})` : ""}: per ${food.servingSize} ${food.servingUnit}` +
    `\n   ${formatNutritionLine(food.nutrition)}`
  );
}

function formatRecipe(recipe: Recipe): string {
  return (
    `#${recipe.id} ${recipe.name}${recipe.isFavorite ? " *" : ""}: makes ${recipe.servingsProduced} servings` +
    `\n   per serving: ${formatNutritionLine(recipe.nutrition)}`
  );
}

function formatDay(day: Day): string {
  return `${day.date}: ${formatNutritionLine(day.nutrition)} | burned ${day.caloriesBurned} cal`;
}

function formatEntry(entry: MealEntryDetail): string {
  const amount =
    entry.quantity !== null && entry.unit !== null
      ? `${entry.quantity} ${entry.unit}`
      : `${Math.round(entry.servings * 100) / 100} servings`;
  const eaten = entry.percentEaten < 100 ? `, ${entry.percentEaten}% eaten` : "";
  return `#${entry.id} [${entry.mealType}] ${entry.sourceName} (${amount}${eaten})\n   ${formatNutritionLine(entry.nutrition)}`;
}

function formatCascade(cascade: CascadeResult | null): string {
  if (!cascade) return "";
  const lines = [`Recalculated ${cascade.recipesRecalculated} recipes and ${cascade.daysRecalculated} days`];
  for (const w of cascade.warnings) lines.push(`warning: ${w}`);
  return "\n" + lines.join("\n");
}

function formatExercise(detail: ExerciseDetail): string {
  const e = detail.exercise;
  const lines = [
    `#${e.id} ${e.exerciseType} on ${detail.date}: ${e.durationMinutes} min, ${e.distanceMiles} mi, ${e.caloriesBurned} cal`,
  ];
  for (const s of detail.segments) {
    lines.push(
      `   ${s.segmentOrder}. ${s.durationMinutes ?? "?"} min @ ${s.speedMph ?? "?"} mph, ${s.distanceMiles ?? "?"} mi, ` +
        `${s.inclinePercent}% incline: ${s.caloriesBurned} cal${s.isConsistent ? "" : " (inconsistent)"}`
    );
  }
  return lines.join("\n");
}

function formatTree(node: RecipeTreeNode, depth: number = 0): string {
  const line = `${"  ".repeat(depth)}${depth > 0 ? `${node.servings} x ` : ""}#${node.recipeId} ${node.name}: ${Math.round(node.nutrition.calories * 10) / 10} cal`;
  return [line, ...node.components.map((c) => formatTree(c, depth + 1))].join("\n");
}

function showHelp(): string {
  return `
nutrigraph - Nutrition tracking with recipes that compose other recipes

Commands:
  init                              Initialize database (auto-runs if needed)

  food add <name> [options]         Add a food item (nutrition is per serving)
    --serving-size <n>              Serving size (required)
    --serving-unit <u>              Serving unit, e.g. "g", "cup", "tbsp (15g)" (required)
    --brand <text>                  Brand name
    --preference <p>                liked/disliked/neutral
    --calories <n> --protein <n> --carbs <n> --fat <n> --fiber <n>
    --sodium <n> --sugar <n> --saturated-fat <n> --cholesterol <n>
  food get <id>                     Show a food item and where it is used
  food list                         List food items
    --query <q> --preference <p> --sort name|calories|created --order asc|desc
    --limit <n> --offset <n>
  food update <id> [options]        Update a food item (recalculates dependents)
  food delete <id>                  Delete an unused food item
  food unused                       List food items nothing references

  recipe add <name>                 Create a recipe
    --servings <n>                  Servings produced (default: 1)
    --favorite                      Mark as favorite
  recipe get <id>                   Show a recipe with ingredients and components
  recipe list                       --query <q> --favorites --limit <n> --offset <n>
  recipe update <id>                --name <n> --servings <n> --favorite true|false --notes <t>
  recipe delete <id>                Delete a recipe nothing depends on
  recipe recalc <id>                Recalculate a recipe and its dependents
  recipe tree <id>                  Show the component tree

  ingredient add <recipe> <food> <qty> [unit]
                                    Add an ingredient (unit default: serving)
    --items <json>                  Add several: '[{"foodItemId":1,"quantity":2,"unit":"cup"}]'
  ingredient update <id>            --qty <n> --unit <u> --notes <t>
  ingredient remove <id>

  component add <recipe> <component> [--servings <n>]
                                    Use one recipe inside another (cycles are rejected)
  component update <id> --servings <n>
  component remove <id>

  log <recipe|food> <id> [options]  Log a meal
    --date <YYYY-MM-DD>             Date (default: today)
    --type <t>                      breakfast/lunch/dinner/snack
    --servings <n>                  Servings (default: 1)
    --qty <n> --unit <u>            Amount of a food item instead of servings
    --pct <n>                       Percent eaten (default: 100)
    --notes <text>                  Notes
  entry get|delete <id>
  entry update <id>                 --servings <n> --pct <n> --type <t> --notes <t>

  day get [date]                    Show a day's meals, exercise and totals
  day list                          --from <date> --to <date> --limit <n>
  day notes <date> <text>           Set a day's notes
  day recalc [date]                 Re-sum a day's totals

  exercise add                      --date <d> --type treadmill --notes <t>
  exercise get|delete <id>
  exercise list                     --from <date> --to <date> --limit <n>
  segment add <exercise>            Two of --duration <min> --speed <mph> --distance <mi>
    --incline <pct> --hr <bpm> --notes <t>
  segment update <id>               Same options as add
  segment delete <id>

  weight log <lbs> [--date <d>]     Record body weight (used for calorie estimates)
  weight list [--limit <n>]

  batch start                       Defer recalculation of food item updates
  batch finish                      Recalculate everything touched during the batch
  batch status

  convert <qty> <unit> --food <id>  Show the servings multiplier for a food

  config [options]                  View or set configuration
    --set-data-dir <path>           Set data directory
    --unit-fallback <mode>          error/best-effort for unconvertible units
    --default-weight <lbs>          Body weight used when none is recorded
    --reset                         Reset to defaults

  mcp                               Start MCP server (stdio transport)

  help                              Show this help

Global options:
  --best-effort                     Count unconvertible units as servings, with a warning

Environment Variables:
  NUTRIGRAPH_DATA_DIR    Override data directory
  NUTRIGRAPH_CONFIG_DIR  Override config directory

Output is JSON by default. Add --human or -h for readable format.
`;
}

export async function executeCommand(argv: string[]): Promise<CommandResult> {
  let stdoutBuf = "";
  let stderrBuf = "";

  function out(s: string): void {
    stdoutBuf += s + "\n";
  }

  let humanMode = false;

  function printResult(data: unknown, human?: string): void {
    if (humanMode) {
      out(human || JSON.stringify(data, null, 2));
    } else {
      out(JSON.stringify(data, null, 2));
    }
  }

  function printError(message: string): never {
    throw new CliError(message);
  }

  try {
    const command = argv[0];

    if (!command || command === "help" || command === "--help" || command === "-h") {
      out(showHelp());
      return { stdout: stdoutBuf, stderr: stderrBuf, exitCode: 0 };
    }

    const { flags, positional } = parseFlags(argv.slice(1));
    humanMode = flags.human === "true" || flags.h === "true";
    const subcommand = positional[0];

    const cascadeOptions = (): CascadeOptions => ({
      bestEffort: flags["best-effort"] === "true" || getConfig().unitFallback === "best-effort",
    });
    const db = (): DB => getDb();

    switch (command) {
      case "init": {
        const result = initializeDatabase();
        printResult(
          result,
          result.dbCreated
            ? `Initialized nutrigraph!\n\nDatabase: ${result.dbPath}`
            : `Database already initialized.\n\nDatabase: ${result.dbPath}`
        );
        break;
      }

      case "config": {
        if (flags["set-data-dir"]) {
          setDataDir(flags["set-data-dir"]);
          printResult(
            { success: true, dataDir: flags["set-data-dir"] },
            `Data directory set to: ${flags["set-data-dir"]}`
          );
          break;
        }
        if (flags["unit-fallback"] !== undefined) {
          const unitFallback = parseInput(unitFallbackSchema, flags["unit-fallback"]);
          saveConfig({ unitFallback });
          printResult({ success: true, unitFallback }, `Unit fallback set to: ${unitFallback}`);
          break;
        }
        if (flags["default-weight"] !== undefined) {
          const defaultWeightLbs = parseInput(z.number().positive(), parseNumber(flags["default-weight"], "--default-weight"));
          saveConfig({ defaultWeightLbs });
          printResult({ success: true, defaultWeightLbs }, `Default body weight set to: ${defaultWeightLbs} lbs`);
          break;
        }
        if (flags.reset) {
          resetConfig();
          printResult({ success: true }, "Configuration reset to defaults");
          break;
        }

        const config = getConfig();
        const paths = getConfigPaths();
        printResult(
          { config, paths },
          `Configuration:
  Data directory:  ${config.dataDir}
  Database:        ${config.dbPath}
  Unit fallback:   ${config.unitFallback}
  Default weight:  ${config.defaultWeightLbs} lbs

Paths:
  Config dir:  ${paths.configDir}
  Config file: ${paths.configFile}`
        );
        break;
      }

      case "food": {
        if (subcommand === "add") {
          const name = positional.slice(1).join(" ");
          if (!name) printError("Usage: nutrigraph food add <name> --serving-size <n> --serving-unit <u>");
          const servingSize = parseNumber(flags["serving-size"], "--serving-size");
          const servingUnit = flags["serving-unit"];
          if (servingSize === undefined || servingUnit === undefined) {
            printError("food add requires --serving-size and --serving-unit");
          }
          const food = createFoodItem(db(), {
            name,
            brand: flags.brand,
            servingSize,
            servingUnit,
            preference: parseInput(preferenceSchema.optional(), flags.preference),
            notes: flags.notes,
            ...nutritionFlags(flags),
          });
          printResult(food, `Added food item:\n${formatFood(food)}`);
          break;
        }

        if (subcommand === "get") {
          const id = parseId(positional[1], "food get <id>");
          const food = requireFoodItem(db(), id);
          const usage = getFoodItemUsage(db(), id);
          printResult(
            { ...food, usage },
            `${formatFood(food)}\n   used in ${usage.recipeIds.length} recipes, ${usage.mealEntryCount} meal entries`
          );
          break;
        }

        if (!subcommand || subcommand === "list") {
          const result = listFoodItems(db(), {
            query: flags.query,
            preference: parseInput(preferenceSchema.optional(), flags.preference),
            sortBy: parseInput(z.enum(["name", "calories", "created"]).optional(), flags.sort),
            sortOrder: parseInput(z.enum(["asc", "desc"]).optional(), flags.order),
            limit: parsePositiveInt(flags.limit, 50, 500),
            offset: parseNumber(flags.offset, "--offset"),
          });
          printResult(
            { total: result.total, count: result.items.length, items: result.items },
            result.items.length === 0 ? "No food items" : result.items.map(formatFood).join("\n\n")
          );
          break;
        }

        if (subcommand === "update") {
          const id = parseId(positional[1], "food update <id> [options]");
          const change = updateFoodItem(
            db(),
            id,
            {
              name: flags.name,
              brand: flags.brand,
              servingSize: parseNumber(flags["serving-size"], "--serving-size"),
              servingUnit: flags["serving-unit"],
              preference: parseInput(preferenceSchema.optional(), flags.preference),
              notes: flags.notes,
              ...nutritionFlags(flags),
            },
            cascadeOptions()
          );
          printResult(
            change,
            `Updated food item:\n${formatFood(change.foodItem)}` +
              (change.deferred ? "\nRecalculation deferred until the batch is finished" : formatCascade(change.cascade))
          );
          break;
        }

        if (subcommand === "delete") {
          const id = parseId(positional[1], "food delete <id>");
          const deleted = deleteFoodItem(db(), id);
          printResult({ success: true, id, name: deleted.name }, `Deleted food item: ${deleted.name}`);
          break;
        }

        if (subcommand === "unused") {
          const items = listUnusedFoodItems(db());
          printResult(
            { count: items.length, items },
            items.length === 0 ? "Every food item is in use" : items.map(formatFood).join("\n\n")
          );
          break;
        }

        printError(`Unknown food subcommand "${subcommand}". Use: add, get, list, update, delete, unused`);
        break;
      }

      case "recipe": {
        if (subcommand === "add") {
          const name = positional.slice(1).join(" ");
          if (!name) printError("Usage: nutrigraph recipe add <name> [--servings <n>]");
          const recipe = createRecipe(db(), {
            name,
            servingsProduced: parseNumber(flags.servings, "--servings"),
            isFavorite: parseBool(flags.favorite, "--favorite"),
            notes: flags.notes,
          });
          printResult(recipe, `Created recipe:\n${formatRecipe(recipe)}`);
          break;
        }

        if (subcommand === "get") {
          const id = parseId(positional[1], "recipe get <id>");
          const detail = getRecipeDetail(db(), id);
          const lines = [formatRecipe(detail.recipe)];
          for (const i of detail.ingredients) {
            lines.push(`   - ${i.quantity} ${i.unit} ${i.foodName} (x${Math.round(i.multiplier * 1000) / 1000}, #${i.id})`);
          }
          for (const c of detail.components) {
            lines.push(`   - ${c.servings} serving(s) of ${c.componentName} (recipe #${c.componentRecipeId}, #${c.id})`);
          }
          for (const w of detail.warnings) lines.push(`warning: ${w}`);
          printResult(detail, lines.join("\n"));
          break;
        }

        if (!subcommand || subcommand === "list") {
          const result = listRecipes(db(), {
            query: flags.query,
            favoritesOnly: flags.favorites === "true",
            limit: parsePositiveInt(flags.limit, 50, 500),
            offset: parseNumber(flags.offset, "--offset"),
          });
          printResult(
            { total: result.total, count: result.recipes.length, recipes: result.recipes },
            result.recipes.length === 0 ? "No recipes" : result.recipes.map(formatRecipe).join("\n\n")
          );
          break;
        }

        if (subcommand === "update") {
          const id = parseId(positional[1], "recipe update <id> [options]");
          const change = updateRecipe(
            db(),
            id,
            {
              name: flags.name,
              servingsProduced: parseNumber(flags.servings, "--servings"),
              isFavorite: parseBool(flags.favorite, "--favorite"),
              notes: flags.notes,
            },
            cascadeOptions()
          );
          printResult(change, `Updated recipe:\n${formatRecipe(change.recipe)}${formatCascade(change.cascade)}`);
          break;
        }

        if (subcommand === "delete") {
          const id = parseId(positional[1], "recipe delete <id>");
          const deleted = deleteRecipe(db(), id);
          printResult({ success: true, id, name: deleted.name }, `Deleted recipe: ${deleted.name}`);
          break;
        }

        if (subcommand === "recalc") {
          const id = parseId(positional[1], "recipe recalc <id>");
          const change = recalculateRecipeTree(db(), id, cascadeOptions());
          printResult(change, `${formatRecipe(change.recipe)}${formatCascade(change.cascade)}`);
          break;
        }

        if (subcommand === "tree") {
          const id = parseId(positional[1], "recipe tree <id>");
          const tree = getRecipeTree(db(), id);
          printResult(tree, formatTree(tree));
          break;
        }

        printError(`Unknown recipe subcommand "${subcommand}". Use: add, get, list, update, delete, recalc, tree`);
        break;
      }

      case "ingredient": {
        if (subcommand === "add") {
          const recipeId = parseId(positional[1], "ingredient add <recipe> <food> <qty> [unit]");
          let inputs: IngredientInput[];
          if (flags.items !== undefined) {
            let raw: unknown;
            try {
              raw = JSON.parse(flags.items);
            } catch (e) {
              throw new CliError(`--items is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
            }
            inputs = parseInput(z.array(ingredientInputSchema), raw);
          } else {
            const foodItemId = parseId(positional[2], "ingredient add <recipe> <food> <qty> [unit]");
            const quantity = parseNumber(positional[3], "quantity");
            if (quantity === undefined) printError("Usage: nutrigraph ingredient add <recipe> <food> <qty> [unit]");
            const unit = flags.unit ?? (positional.slice(4).join(" ") || undefined);
            inputs = [{ foodItemId, quantity, unit, notes: flags.notes }];
          }
          const change = addIngredients(db(), recipeId, inputs, cascadeOptions());
          printResult(
            change,
            change.ingredients.map((i) => `Added ${i.quantity} ${i.unit} of food #${i.foodItemId} (#${i.id})`).join("\n") +
              formatCascade(change.cascade)
          );
          break;
        }

        if (subcommand === "update") {
          const id = parseId(positional[1], "ingredient update <id> --qty <n> --unit <u>");
          const change = updateIngredient(
            db(),
            id,
            { quantity: parseNumber(flags.qty, "--qty"), unit: flags.unit, notes: flags.notes },
            cascadeOptions()
          );
          printResult(change, `Updated ingredient #${id}${formatCascade(change.cascade)}`);
          break;
        }

        if (subcommand === "remove" || subcommand === "delete") {
          const id = parseId(positional[1], "ingredient remove <id>");
          const change = removeIngredient(db(), id, cascadeOptions());
          printResult(change, `Removed ingredient #${id}${formatCascade(change.cascade)}`);
          break;
        }

        printError(`Unknown ingredient subcommand "${subcommand}". Use: add, update, remove`);
        break;
      }

      case "component": {
        if (subcommand === "add") {
          const usage = "component add <recipe> <component> [--servings <n>]";
          const recipeId = parseId(positional[1], usage);
          const componentRecipeId = parseId(positional[2], usage);
          const change = addComponentEdge(
            db(),
            {
              recipeId,
              componentRecipeId,
              servings: parseNumber(flags.servings, "--servings") ?? 1,
              notes: flags.notes,
            },
            cascadeOptions()
          );
          printResult(
            change,
            `Recipe #${componentRecipeId} is now a component of recipe #${recipeId} (#${change.component.id})` +
              formatCascade(change.cascade)
          );
          break;
        }

        if (subcommand === "update") {
          const id = parseId(positional[1], "component update <id> --servings <n>");
          const change = updateComponent(
            db(),
            id,
            { servings: parseNumber(flags.servings, "--servings"), notes: flags.notes },
            cascadeOptions()
          );
          printResult(change, `Updated component #${id}${formatCascade(change.cascade)}`);
          break;
        }

        if (subcommand === "remove" || subcommand === "delete") {
          const id = parseId(positional[1], "component remove <id>");
          const change = removeComponent(db(), id, cascadeOptions());
          printResult(change, `Removed component #${id}${formatCascade(change.cascade)}`);
          break;
        }

        printError(`Unknown component subcommand "${subcommand}". Use: add, update, remove`);
        break;
      }

      case "log": {
        const usage = "log <recipe|food> <id> [--servings <n> | --qty <n> --unit <u>]";
        const kind = positional[0];
        if (kind !== "recipe" && kind !== "food") printError(`Usage: nutrigraph ${usage}`);
        const id = parseId(positional[1], usage);
        const change = logMeal(
          db(),
          {
            date: flags.date ?? computeDateStr(0),
            mealType: parseInput(mealTypeSchema.optional(), flags.type),
            recipeId: kind === "recipe" ? id : undefined,
            foodItemId: kind === "food" ? id : undefined,
            servings: parseNumber(flags.servings, "--servings"),
            quantity: parseNumber(flags.qty, "--qty"),
            unit: flags.unit,
            percentEaten: parseNumber(flags.pct, "--pct"),
            notes: flags.notes,
          },
          cascadeOptions()
        );
        printResult(
          change,
          `Logged on ${change.entry.date}:\n${formatEntry(change.entry)}\n\n${formatDay(change.day)}` +
            change.warnings.map((w) => `\nwarning: ${w}`).join("")
        );
        break;
      }

      case "entry": {
        if (subcommand === "get") {
          const entry = getMealEntryDetail(db(), parseId(positional[1], "entry get <id>"));
          printResult(entry, formatEntry(entry));
          break;
        }

        if (subcommand === "update") {
          const id = parseId(positional[1], "entry update <id> [options]");
          const change = updateMealEntry(db(), id, {
            mealType: parseInput(mealTypeSchema.optional(), flags.type),
            servings: parseNumber(flags.servings, "--servings"),
            percentEaten: parseNumber(flags.pct, "--pct"),
            notes: flags.notes,
          });
          printResult(change, `Updated:\n${formatEntry(change.entry)}\n\n${formatDay(change.day)}`);
          break;
        }

        if (subcommand === "delete") {
          const id = parseId(positional[1], "entry delete <id>");
          const result = deleteMealEntry(db(), id);
          printResult({ success: true, id, day: result.day }, `Deleted meal entry #${id}\n${formatDay(result.day)}`);
          break;
        }

        printError(`Unknown entry subcommand "${subcommand}". Use: get, update, delete`);
        break;
      }

      case "day": {
        if (!subcommand || subcommand === "get") {
          const detail = getDayDetail(db(), positional[1] ?? computeDateStr(0));
          const lines = [formatDay(detail.day), ...detail.entries.map(formatEntry)];
          for (const e of detail.exercises) {
            lines.push(`   exercise #${e.id} ${e.exerciseType}: ${e.caloriesBurned} cal`);
          }
          lines.push(`Net: ${detail.netCalories} cal`);
          printResult(detail, lines.join("\n"));
          break;
        }

        if (subcommand === "list") {
          const days = listDays(db(), {
            from: flags.from,
            to: flags.to,
            limit: parsePositiveInt(flags.limit, 30, 366),
          });
          printResult(
            { count: days.length, days },
            days.length === 0 ? "No days logged" : days.map(formatDay).join("\n")
          );
          break;
        }

        if (subcommand === "notes") {
          const date = positional[1];
          if (!date) printError("Usage: nutrigraph day notes <date> <text>");
          const text = positional.slice(2).join(" ");
          const day = updateDayNotes(db(), date, text || null);
          printResult(day, `Notes for ${day.date}: ${day.notes ?? "(cleared)"}`);
          break;
        }

        if (subcommand === "recalc") {
          const result = recalculateDayByDate(db(), positional[1] ?? computeDateStr(0), cascadeOptions());
          printResult(result, `Recalculated ${formatDay(result.day)}`);
          break;
        }

        printError(`Unknown day subcommand "${subcommand}". Use: get, list, notes, recalc`);
        break;
      }

      case "exercise": {
        if (subcommand === "add") {
          const detail = addExercise(db(), {
            date: flags.date ?? computeDateStr(0),
            exerciseType: parseInput(exerciseTypeSchema.optional(), flags.type) ?? "treadmill",
            notes: flags.notes,
          });
          printResult(detail, `Added ${formatExercise(detail)}`);
          break;
        }

        if (subcommand === "get") {
          const detail = getExerciseDetail(db(), parseId(positional[1], "exercise get <id>"));
          printResult(detail, formatExercise(detail));
          break;
        }

        if (!subcommand || subcommand === "list") {
          const exercises = listExercises(db(), {
            from: flags.from,
            to: flags.to,
            limit: parsePositiveInt(flags.limit, 30, 366),
          });
          printResult(
            { count: exercises.length, exercises },
            exercises.length === 0 ? "No exercises logged" : exercises.map(formatExercise).join("\n\n")
          );
          break;
        }

        if (subcommand === "delete") {
          const id = parseId(positional[1], "exercise delete <id>");
          const result = deleteExercise(db(), id);
          printResult({ success: true, id, day: result.day }, `Deleted exercise #${id}\n${formatDay(result.day)}`);
          break;
        }

        printError(`Unknown exercise subcommand "${subcommand}". Use: add, get, list, delete`);
        break;
      }

      case "segment": {
        const values = {
          durationMinutes: parseNumber(flags.duration, "--duration"),
          speedMph: parseNumber(flags.speed, "--speed"),
          distanceMiles: parseNumber(flags.distance, "--distance"),
          inclinePercent: parseNumber(flags.incline, "--incline"),
          avgHeartRate: parseNumber(flags.hr, "--hr"),
          notes: flags.notes,
        };
        const weight = getConfig().defaultWeightLbs;

        if (subcommand === "add") {
          const exerciseId = parseId(positional[1], "segment add <exercise> --duration <min> --speed <mph>");
          const change = addSegment(db(), exerciseId, values, weight);
          printResult(
            change,
            `Added segment: ${change.segment.caloriesBurned} cal` +
              (change.segment.calculatedField !== "none" ? ` (${change.segment.calculatedField} calculated)` : "")
          );
          break;
        }

        if (subcommand === "update") {
          const id = parseId(positional[1], "segment update <id> [options]");
          const change = updateSegment(db(), id, values, weight);
          printResult(change, `Updated segment #${id}: ${change.segment.caloriesBurned} cal`);
          break;
        }

        if (subcommand === "delete") {
          const id = parseId(positional[1], "segment delete <id>");
          const change = deleteSegment(db(), id);
          printResult(change, `Deleted segment #${id}`);
          break;
        }

        printError(`Unknown segment subcommand "${subcommand}". Use: add, update, delete`);
        break;
      }

      case "weight": {
        if (subcommand === "log") {
          const weightLbs = parseNumber(positional[1], "weight");
          if (weightLbs === undefined) printError("Usage: nutrigraph weight log <lbs> [--date <d>]");
          const entry = recordBodyWeight(db(), { weightLbs, date: flags.date ?? computeDateStr(0) });
          printResult(entry, `Recorded ${entry.weightLbs} lbs on ${entry.recordedOn}`);
          break;
        }

        if (!subcommand || subcommand === "list") {
          const weights = listBodyWeights(db(), parsePositiveInt(flags.limit, 30, 366));
          printResult(
            { count: weights.length, weights },
            weights.length === 0 ? "No body weight recorded" : weights.map((w) => `${w.recordedOn}: ${w.weightLbs} lbs`).join("\n")
          );
          break;
        }

        printError(`Unknown weight subcommand "${subcommand}". Use: log, list`);
        break;
      }

      case "batch": {
        if (subcommand === "start") {
          const result = startBatch(db());
          printResult(result, result.message);
          break;
        }

        if (subcommand === "finish") {
          const result = finishBatch(db(), cascadeOptions());
          printResult(
            result,
            result.success
              ? `${result.message}: ${result.foodItemsProcessed} food items, ${result.recipesRecalculated} recipes, ${result.daysRecalculated} days`
              : result.message
          );
          break;
        }

        if (!subcommand || subcommand === "status") {
          const state = getBatchState(db());
          printResult(
            state,
            state.active
              ? `Batch mode active since ${state.startedAt}, ${state.pendingFoodItemIds.length} food items pending`
              : "Batch mode inactive"
          );
          break;
        }

        printError(`Unknown batch subcommand "${subcommand}". Use: start, finish, status`);
        break;
      }

      case "convert": {
        const usage = "convert <qty> <unit> --food <id>";
        const quantity = parseNumber(positional[0], "quantity");
        const unit = positional.slice(1).join(" ");
        if (quantity === undefined || !unit) printError(`Usage: nutrigraph ${usage}`);
        const foodItemId = parseId(flags.food, usage);
        const conversion = convertMultiplier(db(), foodItemId, quantity, unit, cascadeOptions());
        printResult(
          { quantity, unit, foodItemId, ...conversion },
          `${quantity} ${unit} = ${Math.round(conversion.multiplier * 1000) / 1000} servings (${conversion.rule})` +
            (conversion.warning ? `\nwarning: ${conversion.warning}` : "")
        );
        break;
      }

      case "mcp":
        printError("MCP server must be started directly: nutrigraph mcp");

      default:
        printError(`Unknown command: ${command}. Run 'nutrigraph help' for usage.`);
    }

    return { stdout: stdoutBuf, stderr: stderrBuf, exitCode: 0 };
  } catch (e) {
    if (e instanceof NutrigraphError) {
      stderrBuf += JSON.stringify({ error: e.message, code: e.code }) + "\n";
      return { stdout: stdoutBuf, stderr: stderrBuf, exitCode: 1 };
    }
    if (e instanceof CliError) {
      stderrBuf += JSON.stringify({ error: e.message }) + "\n";
      return { stdout: stdoutBuf, stderr: stderrBuf, exitCode: 1 };
    }
    // Unexpected error
    const message = e instanceof Error ? e.message : "Unknown error";
    stderrBuf += JSON.stringify({ error: message }) + "\n";
    return { stdout: stdoutBuf, stderr: stderrBuf, exitCode: 1 };
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isMainModule()) {
  if (process.argv[2] === "mcp") {
    try {
      await import("./mcp.js");
    } catch (e) {
      const msg = e instanceof Error ? e.message : "Failed to start MCP server";
      process.stderr.write(JSON.stringify({ error: msg }) + "\n");
      process.exit(1);
    }
  } else {
    const result = await executeCommand(process.argv.slice(2));
    if (result.stderr) process.stderr.write(result.stderr);
    if (result.stdout) process.stdout.write(result.stdout);
    process.exit(result.exitCode);
  }
}
