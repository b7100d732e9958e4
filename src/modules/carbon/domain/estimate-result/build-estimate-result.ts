import { UNKNOWN_ERROR_MESSAGE } from '../../../../common/constants/error-messages.constants';
import { toTitleCase } from '../../../../common/utils/string.utils';
import type { EmissionFactorTable } from '../emission-factors';
import { normalizeIngredientKey } from '../emission-factors';
import type { EstimateResult, Ingredient } from './types';

export const FALLBACK_INGREDIENT_NAME = 'Unknown';
export const FALLBACK_CARBON_KG = 1.0;
export const UNKNOWN_DISH_NAME = 'Unknown Dish';

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function sumCarbonKg(ingredients: ReadonlyArray<Ingredient>): number {
  return round1(ingredients.reduce((total, ingredient) => total + ingredient.carbonKg, 0));
}

export function buildIngredient(name: string, carbonKg: number): Ingredient {
  return Object.freeze({ name: toTitleCase(name), carbonKg: round1(Math.max(0, carbonKg)) });
}

/**
 * Maps recognized ingredient names to factors. Blank names are skipped;
 * the total is derived from the rounded per-ingredient values.
 */
export function buildEstimateResult(
  dish: string,
  ingredientNames: ReadonlyArray<string>,
  factors: EmissionFactorTable,
): EstimateResult {
  const ingredients = ingredientNames
    .map(normalizeIngredientKey)
    .filter((name) => name.length > 0)
    .map((name) => buildIngredient(name, factors.lookup(name)));

  return Object.freeze({
    dish: toTitleCase(dish),
    estimatedCarbonKg: sumCarbonKg(ingredients),
    ingredients: Object.freeze(ingredients),
    error: null,
  });
}

export function buildFallbackResult(dish: string, error: string | null | undefined): EstimateResult {
  const ingredients = Object.freeze([buildIngredient(FALLBACK_INGREDIENT_NAME, FALLBACK_CARBON_KG)]);
  const displayDish = toTitleCase(dish);

  return Object.freeze({
    dish: displayDish.length > 0 ? displayDish : UNKNOWN_DISH_NAME,
    estimatedCarbonKg: sumCarbonKg(ingredients),
    ingredients,
    error: error && error.trim().length > 0 ? error : UNKNOWN_ERROR_MESSAGE,
  });
}

export function isFallbackResult(result: EstimateResult): boolean {
  return result.error !== null;
}
