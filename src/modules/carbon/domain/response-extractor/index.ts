export {
  PLACEHOLDER_INGREDIENTS,
  extractDishName,
  extractIngredientList,
  parseEnvelope,
  parseFirstBracketBlock,
  parseStringArray,
  type ProviderEnvelope,
} from './response-extractor';
