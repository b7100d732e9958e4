export type { EstimateResult, Ingredient } from './types';
export {
  FALLBACK_CARBON_KG,
  FALLBACK_INGREDIENT_NAME,
  UNKNOWN_DISH_NAME,
  buildEstimateResult,
  buildFallbackResult,
  buildIngredient,
  isFallbackResult,
  round1,
  sumCarbonKg,
} from './build-estimate-result';
