export interface Ingredient {
  readonly name: string;
  readonly carbonKg: number;
}

/**
 * `error` is null for a successful provider round trip and carries the
 * reason otherwise; a non-null error always comes with the fallback shape.
 */
export interface EstimateResult {
  readonly dish: string;
  readonly estimatedCarbonKg: number;
  readonly ingredients: ReadonlyArray<Ingredient>;
  readonly error: string | null;
}
