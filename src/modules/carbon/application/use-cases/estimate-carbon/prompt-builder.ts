import type { CompletionContentPart } from '../../ports/completion-provider.port';
import {
  DEFAULT_IMAGE_MIME_TYPE,
  DISH_IDENTIFICATION_PROMPT,
  INGREDIENT_PROMPT_TEMPLATE,
} from './constants';

export function buildIngredientPrompt(dish: string): string {
  // Replacer function: `$&`, `$'` and friends in a dish name stay literal.
  return INGREDIENT_PROMPT_TEMPLATE.replace('{{dish}}', () => dish);
}

export function resolveImageMimeType(mimeType: string | undefined): string {
  const normalized = mimeType?.trim().toLowerCase() ?? '';
  return normalized.startsWith('image/') ? normalized : DEFAULT_IMAGE_MIME_TYPE;
}

export function buildImageDataUri(bytes: Uint8Array, mimeType: string | undefined): string {
  const base64 = Buffer.from(bytes).toString('base64');
  return `data:${resolveImageMimeType(mimeType)};base64,${base64}`;
}

export function buildDishIdentificationContent(
  bytes: Uint8Array,
  mimeType: string | undefined,
): CompletionContentPart[] {
  return [
    { type: 'text', text: DISH_IDENTIFICATION_PROMPT },
    { type: 'image_url', image_url: { url: buildImageDataUri(bytes, mimeType) } },
  ];
}
