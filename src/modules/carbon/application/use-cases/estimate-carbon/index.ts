export { EstimateCarbonUseCase } from './estimate-carbon.use-case';
export { describeProviderFailure } from './describe-failure';
export { buildDishIdentificationContent, buildIngredientPrompt, resolveImageMimeType } from './prompt-builder';
