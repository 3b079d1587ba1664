import { UnitConversionError } from "../errors.js";
import {
  isUnit,
  mlFactor,
  sameBaseUnit,
  toGrams,
  toMl,
  unitCategory,
  unitLabel,
  type UnitSpec,
} from "./units.js";

/** The parts of a food item the multiplier depends on. */
export interface FoodServing {
  servingSize: number;
  servingUnit: string;
  unitSpec: UnitSpec;
  gramsPerServing: number | null;
  mlPerServing: number | null;
}

export interface ConversionOptions {
  /**
   * When no rule applies, count the raw quantity as servings and report a
   * warning instead of throwing UnitConversionError.
   */
  bestEffort?: boolean;
}

export type ConversionRule =
  | "servings"
  | "same_unit"
  | "weight"
  | "grams"
  | "volume"
  | "milliliters"
  | "fallback";

export interface Conversion {
  multiplier: number;
  rule: ConversionRule;
  warning: string | null;
}

function converted(multiplier: number, rule: ConversionRule): Conversion {
  return { multiplier, rule, warning: null };
}

/**
 * Number of food servings represented by `quantity` of `unit`. Rules are
 * tried in order; the first that applies wins.
 */
export function nutritionMultiplier(
  quantity: number,
  unit: UnitSpec,
  food: FoodServing,
  options: ConversionOptions = {}
): Conversion {
  if (isUnit(unit, "serving")) {
    return converted(quantity, "servings");
  }

  if (sameBaseUnit(unit, food.unitSpec)) {
    return converted(quantity / food.servingSize, "same_unit");
  }

  const category = unitCategory(unit);

  if (category === "weight" && food.gramsPerServing !== null) {
    const grams = toGrams(quantity, unit);
    if (grams !== null) {
      return converted(grams / food.gramsPerServing, "weight");
    }
  }

  if (isUnit(unit, "g") && food.gramsPerServing !== null) {
    return converted(quantity / food.gramsPerServing, "grams");
  }

  if (category === "volume") {
    const ml = toMl(quantity, unit);
    if (ml !== null) {
      if (food.mlPerServing !== null) {
        return converted(ml / food.mlPerServing, "volume");
      }
      const foodMlPerUnit = mlFactor(food.unitSpec);
      if (foodMlPerUnit !== null) {
        return converted(ml / (food.servingSize * foodMlPerUnit), "volume");
      }
    }
  }

  if (isUnit(unit, "ml") && food.mlPerServing !== null) {
    return converted(quantity / food.mlPerServing, "milliliters");
  }

  if (!options.bestEffort) {
    throw new UnitConversionError(quantity, describeUnit(unit), food.servingUnit);
  }

  const warning =
    `No conversion from "${describeUnit(unit)}" to "${food.servingUnit}"; ` +
    `counted ${quantity} as servings`;
  console.error(`Warning: ${warning}`);
  return { multiplier: quantity, rule: "fallback", warning };
}

function describeUnit(unit: UnitSpec): string {
  const base = unitLabel(unit);
  if (unit.gramWeight !== null) return `${base} (${unit.gramWeight}g)`;
  if (unit.mlAmount !== null) return `${base} (${unit.mlAmount}ml)`;
  return base;
}
