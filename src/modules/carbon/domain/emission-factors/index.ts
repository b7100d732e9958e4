export {
  DEFAULT_EMISSION_FACTOR_KG,
  DEFAULT_EMISSION_FACTORS,
  EmissionFactorTable,
  normalizeIngredientKey,
} from './emission-factor-table';
