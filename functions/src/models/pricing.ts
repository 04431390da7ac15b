export type PricePreference = 'free' | 'budget' | 'moderate' | 'premium' | 'any';

export const PRICE_PREFERENCES: readonly PricePreference[] = ['free', 'budget', 'moderate', 'premium', 'any'];

type PriceBand = Exclude<PricePreference, 'any'>;

// Inclusive bounds in UGX
const PRICE_BAND_RANGES: Record<PriceBand, { min: number; max: number }> = {
  free: { min: 0, max: 0 },
  budget: { min: 0, max: 50_000 },
  moderate: { min: 50_000, max: 150_000 },
  premium: { min: 150_000, max: Number.POSITIVE_INFINITY },
};

export function isPricePreference(value: unknown): value is PricePreference {
  return typeof value === 'string' && PRICE_PREFERENCES.some(preference => preference === value);
}

/**
 * Whether a price falls inside the preferred band. `any` expresses no preference
 * and therefore never counts as a match.
 */
export function matchesPricePreference(price: number, preference: PricePreference): boolean {
  if (preference === 'any') {
    return false;
  }
  const range = PRICE_BAND_RANGES[preference];
  return price >= range.min && price <= range.max;
}
