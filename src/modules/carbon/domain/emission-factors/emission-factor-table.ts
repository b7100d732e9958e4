export const DEFAULT_EMISSION_FACTOR_KG = 0.5;

/** kg CO2 per typical serving of the ingredient. */
export const DEFAULT_EMISSION_FACTORS: Readonly<Record<string, number>> = Object.freeze({
  chicken: 2.5,
  rice: 1.1,
  beef: 6.0,
  pork: 3.8,
  lamb: 5.5,
  tofu: 0.2,
  cheese: 3.0,
  milk: 0.6,
  butter: 1.0,
  oil: 0.4,
  spices: 0.2,
  onion: 0.05,
  garlic: 0.03,
  tomato: 0.1,
  potato: 0.07,
  egg: 0.5,
  noodles: 0.9,
  vegetables: 0.1,
  beans: 0.3,
  lentils: 0.2,
});

export function normalizeIngredientKey(name: string): string {
  return name.trim().toLowerCase();
}

export class EmissionFactorTable {
  private readonly factors: ReadonlyMap<string, number>;

  constructor(
    entries: Readonly<Record<string, number>> = DEFAULT_EMISSION_FACTORS,
    private readonly defaultFactorKg: number = DEFAULT_EMISSION_FACTOR_KG,
  ) {
    const factors = new Map<string, number>();
    for (const [name, kg] of Object.entries(entries)) {
      if (!Number.isFinite(kg) || kg <= 0) {
        throw new Error(`Invalid emission factor for "${name}": ${kg}`);
      }
      factors.set(normalizeIngredientKey(name), kg);
    }
    this.factors = factors;
  }

  lookup(name: string): number {
    return this.factors.get(normalizeIngredientKey(name)) ?? this.defaultFactorKg;
  }

  get size(): number {
    return this.factors.size;
  }
}
