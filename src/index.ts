// Library entry point. Every operation takes an open better-sqlite3 handle
// first; use openDatabase(":memory:") or getDb() to get one.

export {
  openDatabase,
  getDb,
  closeDb,
  initializeDatabase,
  getConfig,
  loadConfig,
  saveConfig,
  SCHEMA_VERSION,
  DEFAULT_WEIGHT_LBS,
  type DB,
  type Config,
  type UnitFallback,
} from "./db.js";

export * from "./errors.js";

// Engine
export {
  parseUnit,
  unitCategory,
  unitLabel,
  deriveServingProfile,
  type UnitSpec,
  type UnitCategory,
  type CanonicalUnit,
} from "./engine/units.js";
export { nutritionMultiplier, type Conversion, type ConversionRule, type FoodServing } from "./engine/converter.js";
export { orderRecipes, type ComponentEdge } from "./engine/orderer.js";
export {
  addComponentEdge,
  updateComponent,
  removeComponent,
  wouldCreateCycle,
  getAllComponentIds,
  getParentRecipeIds,
  type ComponentChange,
} from "./engine/graph.js";
export {
  cascade,
  cascadeFromFoodItems,
  cascadeFromRecipes,
  recalculateRecipe,
  recalculateDay,
  type CascadeOptions,
  type CascadeResult,
  type CascadeSeeds,
} from "./engine/cascade.js";
export { deriveMissing, caloriesBurned, baseMet, type SegmentMetrics } from "./engine/exercise.js";

// Records
export * from "./db/foods.js";
export * from "./db/recipes.js";
export * from "./db/meals.js";
export * from "./db/exercises.js";
export * from "./db/batch.js";
export { NUTRIENT_FIELDS, type NutritionVector, type NutrientField } from "./db/nutrient-fields.js";
export type { FoodItem, Recipe, RecipeIngredient, RecipeComponent, Day, MealEntry } from "./db/store.js";
export type {
  FoodItemInput,
  FoodItemUpdate,
  RecipeInput,
  RecipeUpdate,
  IngredientInput,
  IngredientUpdate,
  ComponentInput,
  ComponentUpdate,
  MealLogInput,
  MealEntryUpdate,
  ExerciseInput,
  SegmentInput,
  SegmentUpdate,
} from "./db/schemas.js";

export { executeCommand, type CommandResult } from "./cli.js";
