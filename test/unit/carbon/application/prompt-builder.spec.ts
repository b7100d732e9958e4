import {
  buildIngredientPrompt,
  resolveImageMimeType,
} from '@/modules/carbon/application/use-cases/estimate-carbon';

describe('prompt-builder', () => {
  it('builds the ingredient prompt', () => {
    expect(buildIngredientPrompt('Lasagna')).toBe(
      [
        'You are a strict JSON generator.',
        'Given a dish name, return ONLY a JSON array of its likely main ingredients (strings).',
        'No prose, no backticks, no explanations.',
        'Example output: ["rice","chicken","spices"]',
        'Dish: Lasagna',
      ].join('\n'),
    );
  });

  it('inserts dish names containing replacement patterns verbatim', () => {
    const prompt = buildIngredientPrompt("Mac $& Cheese $'");

    expect(prompt.split('\n').pop()).toBe("Dish: Mac $& Cheese $'");
    expect(prompt).not.toContain('{{dish}}');
  });

  it('keeps image mime types and defaults the rest to JPEG', () => {
    expect(resolveImageMimeType('image/webp')).toBe('image/webp');
    expect(resolveImageMimeType(' IMAGE/PNG ')).toBe('image/png');
    expect(resolveImageMimeType('text/plain')).toBe('image/jpeg');
    expect(resolveImageMimeType(undefined)).toBe('image/jpeg');
  });
});
