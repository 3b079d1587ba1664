export type ErrorCode =
  | "validation"
  | "cycle"
  | "not_found"
  | "unit_conversion"
  | "integrity"
  | "persistence";

export class NutrigraphError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NutrigraphError";
    this.code = code;
  }
}

export class ValidationError extends NutrigraphError {
  constructor(message: string, code: ErrorCode = "validation") {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** Raised when a component edge would make a recipe reachable from itself. */
export class CycleError extends ValidationError {
  readonly recipeId: number;
  readonly componentRecipeId: number;

  constructor(recipeId: number, componentRecipeId: number) {
    super(
      recipeId === componentRecipeId
        ? `Recipe ${recipeId} cannot be a component of itself`
        : `Adding recipe ${componentRecipeId} as a component of recipe ${recipeId} would create a cycle`,
      "cycle"
    );
    this.name = "CycleError";
    this.recipeId = recipeId;
    this.componentRecipeId = componentRecipeId;
  }
}

export class NotFoundError extends NutrigraphError {
  constructor(kind: string, id: number | string) {
    super("not_found", `${kind} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export class UnitConversionError extends NutrigraphError {
  readonly quantity: number;
  readonly unit: string;
  readonly servingUnit: string;

  constructor(quantity: number, unit: string, servingUnit: string) {
    super(
      "unit_conversion",
      `Cannot convert ${quantity} "${unit}" to servings of "${servingUnit}". ` +
        `Use a unit compatible with the food's serving unit, log it in servings, or enable best-effort conversion.`
    );
    this.name = "UnitConversionError";
    this.quantity = quantity;
    this.unit = unit;
    this.servingUnit = servingUnit;
  }
}

export class IntegrityError extends NutrigraphError {
  constructor(message: string) {
    super("integrity", message);
    this.name = "IntegrityError";
  }
}

export class PersistenceError extends NutrigraphError {
  constructor(message: string, cause: unknown) {
    super("persistence", message, { cause });
    this.name = "PersistenceError";
  }
}

/**
 * Normalizes anything thrown inside a store call. Domain errors pass through,
 * driver errors become PersistenceError.
 */
export function toNutrigraphError(e: unknown): NutrigraphError {
  if (e instanceof NutrigraphError) return e;
  const message = e instanceof Error ? e.message : "Unknown error";
  return new PersistenceError(`Database error: ${message}`, e);
}
