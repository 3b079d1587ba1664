import { describe, test, expect } from "vitest";
import {
  deriveServingProfile,
  inferBaseUnitType,
  parseUnit,
  resolveCanonicalUnit,
  sameBaseUnit,
  toGrams,
  toMl,
  unitCategory,
} from "../../src/engine/units.js";

describe("parseUnit", () => {
  test("should resolve canonical units and their aliases", () => {
    expect(parseUnit("g")).toEqual({ kind: "canonical", unit: "g", gramWeight: null, mlAmount: null });
    expect(parseUnit("Tablespoons")).toEqual({ kind: "canonical", unit: "tbsp", gramWeight: null, mlAmount: null });
    expect(parseUnit("  Fluid   Ounces ")).toEqual({ kind: "canonical", unit: "fl oz", gramWeight: null, mlAmount: null });
    expect(parseUnit("pieces")).toEqual({ kind: "canonical", unit: "each", gramWeight: null, mlAmount: null });
  });

  test("should read a gram annotation", () => {
    expect(parseUnit("tbsp (16g)")).toEqual({ kind: "canonical", unit: "tbsp", gramWeight: 16, mlAmount: null });
    expect(parseUnit("slice (28 grams)")).toEqual({ kind: "custom", name: "slice", gramWeight: 28, mlAmount: null });
  });

  test("should read a milliliter annotation", () => {
    expect(parseUnit("cup (240ml)")).toEqual({ kind: "canonical", unit: "cup", gramWeight: null, mlAmount: 240 });
  });

  test("should ignore annotations that are not positive amounts", () => {
    expect(parseUnit("scoop (large)")).toEqual({ kind: "custom", name: "scoop", gramWeight: null, mlAmount: null });
    expect(parseUnit("scoop (0g)")).toEqual({ kind: "custom", name: "scoop", gramWeight: null, mlAmount: null });
  });

  test("should normalize custom unit names", () => {
    expect(parseUnit("Large  Egg")).toEqual({ kind: "custom", name: "large egg", gramWeight: null, mlAmount: null });
  });

  test("resolveCanonicalUnit returns null for unknown text", () => {
    expect(resolveCanonicalUnit("handful")).toBeNull();
    expect(resolveCanonicalUnit("LBS")).toBe("lb");
  });
});

describe("unit categories", () => {
  test("should classify by canonical tables", () => {
    expect(unitCategory(parseUnit("oz"))).toBe("weight");
    expect(unitCategory(parseUnit("cup"))).toBe("volume");
    expect(unitCategory(parseUnit("each"))).toBe("count");
    expect(unitCategory(parseUnit("serving"))).toBe("count");
    expect(unitCategory(parseUnit("slice (28g)"))).toBe("custom");
  });

  test("annotations decide the base unit type", () => {
    expect(inferBaseUnitType(parseUnit("tbsp (16g)"))).toBe("weight");
    expect(inferBaseUnitType(parseUnit("scoop (30ml)"))).toBe("volume");
    expect(inferBaseUnitType(parseUnit("cup"))).toBe("volume");
    expect(inferBaseUnitType(parseUnit("each"))).toBe("count");
    expect(inferBaseUnitType(parseUnit("slice"))).toBe("weight");
  });

  test("sameBaseUnit ignores annotations", () => {
    expect(sameBaseUnit(parseUnit("tbsp"), parseUnit("tbsp (16g)"))).toBe(true);
    expect(sameBaseUnit(parseUnit("tablespoon"), parseUnit("tbsp"))).toBe(true);
    expect(sameBaseUnit(parseUnit("slice"), parseUnit("Slice (28g)"))).toBe(true);
    expect(sameBaseUnit(parseUnit("tsp"), parseUnit("tbsp"))).toBe(false);
  });
});

describe("conversions", () => {
  test("an annotation wins over the static factor", () => {
    expect(toGrams(2, parseUnit("oz"))).toBeCloseTo(56.699, 9);
    expect(toGrams(2, parseUnit("tbsp (16g)"))).toBe(32);
    expect(toGrams(2, parseUnit("tbsp"))).toBeNull();
    expect(toMl(3, parseUnit("tsp"))).toBeCloseTo(14.78676, 9);
    expect(toMl(2, parseUnit("cup (240ml)"))).toBe(480);
    expect(toMl(1, parseUnit("g"))).toBeNull();
  });

  test("deriveServingProfile precomputes grams and milliliters per serving", () => {
    const peanutButter = deriveServingProfile(2, "tbsp (16g)");
    expect(peanutButter.unitSpec).toEqual({ kind: "canonical", unit: "tbsp", gramWeight: 16, mlAmount: null });
    expect(peanutButter.baseUnitType).toBe("weight");
    expect(peanutButter.gramsPerServing).toBe(32);
    expect(peanutButter.mlPerServing).toBeCloseTo(29.5736, 9);

    const milk = deriveServingProfile(1, "cup");
    expect(milk.baseUnitType).toBe("volume");
    expect(milk.gramsPerServing).toBeNull();
    expect(milk.mlPerServing).toBeCloseTo(236.588, 9);

    const egg = deriveServingProfile(1, "each");
    expect(egg.baseUnitType).toBe("count");
    expect(egg.gramsPerServing).toBeNull();
    expect(egg.mlPerServing).toBeNull();
  });
});
