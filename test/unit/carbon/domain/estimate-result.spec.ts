import { EmissionFactorTable } from '@/modules/carbon/domain/emission-factors';
import {
  buildEstimateResult,
  buildFallbackResult,
  buildIngredient,
  isFallbackResult,
  round1,
} from '@/modules/carbon/domain/estimate-result';

describe('estimate-result', () => {
  const factors = new EmissionFactorTable();

  it('sums rounded ingredient values', () => {
    const result = buildEstimateResult('chicken fried rice', ['rice', 'chicken', 'oil'], factors);

    expect(result).toEqual({
      dish: 'Chicken Fried Rice',
      estimatedCarbonKg: 4.0,
      ingredients: [
        { name: 'Rice', carbonKg: 1.1 },
        { name: 'Chicken', carbonKg: 2.5 },
        { name: 'Oil', carbonKg: 0.4 },
      ],
      error: null,
    });
    expect(isFallbackResult(result)).toBe(false);
  });

  it('skips blank names and prices unknown ones at the default', () => {
    const result = buildEstimateResult('Mystery Bowl', ['  ', 'Beef', 'dragonfruit'], factors);

    expect(result.ingredients).toEqual([
      { name: 'Beef', carbonKg: 6 },
      { name: 'Dragonfruit', carbonKg: 0.5 },
    ]);
    expect(result.estimatedCarbonKg).toBe(6.5);
  });

  it('rounds each ingredient to one decimal', () => {
    expect(buildIngredient('garlic', 0.03)).toEqual({ name: 'Garlic', carbonKg: 0 });
    expect(buildIngredient('potato', 0.07)).toEqual({ name: 'Potato', carbonKg: 0.1 });
    expect(round1(2.345)).toBe(2.3);
  });

  it('builds the fallback shape', () => {
    const result = buildFallbackResult('pad thai', 'Provider HTTP 500');

    expect(result).toEqual({
      dish: 'Pad Thai',
      estimatedCarbonKg: 1.0,
      ingredients: [{ name: 'Unknown', carbonKg: 1.0 }],
      error: 'Provider HTTP 500',
    });
    expect(isFallbackResult(result)).toBe(true);
  });

  it('names the dish and the error when both are missing', () => {
    const result = buildFallbackResult('', '  ');

    expect(result.dish).toBe('Unknown Dish');
    expect(result.error).toBe('Unknown error');
  });

  it('freezes results', () => {
    const result = buildEstimateResult('rice', ['rice'], factors);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.ingredients)).toBe(true);
  });
});
