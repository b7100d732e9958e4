export const TEXT_MAX_TOKENS = 200;
export const VISION_MAX_TOKENS = 50;

export const DEFAULT_IMAGE_MIME_TYPE = 'image/jpeg';

export const INGREDIENT_PROMPT_TEMPLATE = [
  'You are a strict JSON generator.',
  'Given a dish name, return ONLY a JSON array of its likely main ingredients (strings).',
  'No prose, no backticks, no explanations.',
  'Example output: ["rice","chicken","spices"]',
  'Dish: {{dish}}',
].join('\n');

export const DISH_IDENTIFICATION_PROMPT =
  'Identify the dish in the image. Reply with ONLY the dish name.';

export const PROVIDER_MESSAGE_PREFIX = 'Provider';
export const VISION_PROVIDER_MESSAGE_PREFIX = 'Vision provider';
