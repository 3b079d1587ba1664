import { z } from "zod";
import aliasTable from "./unit-aliases.json" with { type: "json" };

export const CANONICAL_UNITS = [
  "g",
  "mg",
  "kg",
  "oz",
  "lb",
  "ml",
  "l",
  "tsp",
  "tbsp",
  "fl oz",
  "cup",
  "pint",
  "quart",
  "gallon",
  "each",
  "serving",
] as const;

export type CanonicalUnit = (typeof CANONICAL_UNITS)[number];

export const canonicalUnitSchema = z.enum(CANONICAL_UNITS);

export type UnitCategory = "weight" | "volume" | "count" | "custom";

/** How a food item's nutrition is anchored. Custom units anchor to weight. */
export type BaseUnitType = "weight" | "volume" | "count";

export const baseUnitTypeSchema = z.enum(["weight", "volume", "count"]);

// Volume (to milliliters)
export const ML_PER_TSP = 4.92892;
export const ML_PER_TBSP = 14.7868;
export const ML_PER_FL_OZ = 29.5735;
export const ML_PER_CUP = 236.588;
export const ML_PER_PINT = 473.176;
export const ML_PER_QUART = 946.353;
export const ML_PER_LITER = 1000;
export const ML_PER_GALLON = 3785.41;

// Weight (to grams)
export const G_PER_MG = 0.001;
export const G_PER_KG = 1000;
export const G_PER_OZ = 28.3495;
export const G_PER_LB = 453.592;

const GRAMS_PER_UNIT: Partial<Record<CanonicalUnit, number>> = {
  g: 1,
  mg: G_PER_MG,
  kg: G_PER_KG,
  oz: G_PER_OZ,
  lb: G_PER_LB,
};

const ML_PER_UNIT: Partial<Record<CanonicalUnit, number>> = {
  ml: 1,
  l: ML_PER_LITER,
  tsp: ML_PER_TSP,
  tbsp: ML_PER_TBSP,
  "fl oz": ML_PER_FL_OZ,
  cup: ML_PER_CUP,
  pint: ML_PER_PINT,
  quart: ML_PER_QUART,
  gallon: ML_PER_GALLON,
};

const annotationAmount = z.number().positive().nullable();

/**
 * A unit resolved once, at write time. `gramWeight` and `mlAmount` come from a
 * parenthetical annotation such as "tbsp (16g)" and apply to a single unit.
 */
export const unitSpecSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("canonical"),
    unit: canonicalUnitSchema,
    gramWeight: annotationAmount,
    mlAmount: annotationAmount,
  }),
  z.object({
    kind: z.literal("custom"),
    name: z.string(),
    gramWeight: annotationAmount,
    mlAmount: annotationAmount,
  }),
]);

export type UnitSpec = z.infer<typeof unitSpecSchema>;

const ALIASES: ReadonlyMap<string, CanonicalUnit> = buildAliasMap();

function buildAliasMap(): Map<string, CanonicalUnit> {
  const table = z.record(z.string(), z.array(z.string())).parse(aliasTable);
  const map = new Map<string, CanonicalUnit>();
  for (const [key, aliases] of Object.entries(table)) {
    const unit = canonicalUnitSchema.parse(key);
    for (const alias of aliases) {
      map.set(alias, unit);
    }
  }
  return map;
}

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

export function resolveCanonicalUnit(text: string): CanonicalUnit | null {
  return ALIASES.get(normalize(text)) ?? null;
}

function parseAnnotatedAmount(annotation: string, suffixes: readonly string[]): number | null {
  const text = normalize(annotation);
  for (const suffix of suffixes) {
    if (!text.endsWith(suffix)) continue;
    const numPart = text.slice(0, text.length - suffix.length).trim();
    if (numPart === "") continue;
    const value = Number(numPart);
    if (Number.isFinite(value) && value > 0) return value;
  }
  return null;
}

const GRAM_SUFFIXES = ["g", "gram", "grams"] as const;
const ML_SUFFIXES = ["ml", "milliliter", "milliliters", "millilitre", "millilitres"] as const;

/**
 * Parses free text such as "g", "Tablespoons", "tbsp (16g)", "cup (240ml)" or
 * "slice (28 grams)".
 */
export function parseUnit(text: string): UnitSpec {
  let base = text;
  let gramWeight: number | null = null;
  let mlAmount: number | null = null;

  const open = text.indexOf("(");
  const close = open === -1 ? -1 : text.indexOf(")", open);
  if (open !== -1 && close !== -1) {
    base = text.slice(0, open);
    const annotation = text.slice(open + 1, close);
    gramWeight = parseAnnotatedAmount(annotation, GRAM_SUFFIXES);
    mlAmount = parseAnnotatedAmount(annotation, ML_SUFFIXES);
  }

  const unit = resolveCanonicalUnit(base);
  if (unit) {
    return { kind: "canonical", unit, gramWeight, mlAmount };
  }
  return { kind: "custom", name: normalize(base), gramWeight, mlAmount };
}

export function unitCategory(spec: UnitSpec): UnitCategory {
  if (spec.kind === "custom") return "custom";
  if (GRAMS_PER_UNIT[spec.unit] !== undefined) return "weight";
  if (ML_PER_UNIT[spec.unit] !== undefined) return "volume";
  return "count";
}

export function unitLabel(spec: UnitSpec): string {
  return spec.kind === "canonical" ? spec.unit : spec.name;
}

export function isUnit(spec: UnitSpec, unit: CanonicalUnit): boolean {
  return spec.kind === "canonical" && spec.unit === unit;
}

/** True when both specs name the same base unit, ignoring annotations. */
export function sameBaseUnit(a: UnitSpec, b: UnitSpec): boolean {
  return a.kind === b.kind && unitLabel(a) === unitLabel(b);
}

/** Static grams-per-unit factor of a canonical weight unit. */
export function gramFactor(spec: UnitSpec): number | null {
  return spec.kind === "canonical" ? GRAMS_PER_UNIT[spec.unit] ?? null : null;
}

/** Static ml-per-unit factor of a canonical volume unit. */
export function mlFactor(spec: UnitSpec): number | null {
  return spec.kind === "canonical" ? ML_PER_UNIT[spec.unit] ?? null : null;
}

/** Grams in `quantity` units; an annotation wins over the static factor. */
export function toGrams(quantity: number, spec: UnitSpec): number | null {
  const perUnit = spec.gramWeight ?? gramFactor(spec);
  return perUnit === null ? null : quantity * perUnit;
}

/** Milliliters in `quantity` units; an annotation wins over the static factor. */
export function toMl(quantity: number, spec: UnitSpec): number | null {
  const perUnit = spec.mlAmount ?? mlFactor(spec);
  return perUnit === null ? null : quantity * perUnit;
}

export function inferBaseUnitType(spec: UnitSpec): BaseUnitType {
  if (spec.gramWeight !== null) return "weight";
  if (spec.mlAmount !== null) return "volume";
  const category = unitCategory(spec);
  return category === "custom" ? "weight" : category;
}

export interface ServingProfile {
  unitSpec: UnitSpec;
  baseUnitType: BaseUnitType;
  gramsPerServing: number | null;
  mlPerServing: number | null;
}

/**
 * Everything the multiplier needs about a food's serving, derived when the
 * food is written so recalculation never parses unit text.
 */
export function deriveServingProfile(servingSize: number, servingUnit: string): ServingProfile {
  const unitSpec = parseUnit(servingUnit);
  return {
    unitSpec,
    baseUnitType: inferBaseUnitType(unitSpec),
    gramsPerServing: toGrams(servingSize, unitSpec),
    mlPerServing: toMl(servingSize, unitSpec),
  };
}
