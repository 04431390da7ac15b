import { EventCategory, isEventCategory } from '../models/eventCategory';
import { INTERACTION_TYPES } from '../models/interaction';
import { isPricePreference } from '../models/pricing';
import { InteractionCounts, InterestProfileSnapshot } from '../services/interestProfile';
import { extractDate, isRecord } from './eventRecordNormalizer';

function sanitizeCategoryList(value: unknown): EventCategory[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return Array.from(new Set(value.filter(isEventCategory)));
}

function sanitizeStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function sanitizeWeights(value: unknown): Partial<Record<EventCategory, number>> {
  const weights: Partial<Record<EventCategory, number>> = {};
  if (!isRecord(value)) {
    return weights;
  }
  for (const [category, weight] of Object.entries(value)) {
    if (isEventCategory(category) && typeof weight === 'number' && Number.isFinite(weight) && weight > 0) {
      weights[category] = weight;
    }
  }
  return weights;
}

function sanitizeCounts(value: unknown): Partial<Record<EventCategory, InteractionCounts>> {
  const counts: Partial<Record<EventCategory, InteractionCounts>> = {};
  if (!isRecord(value)) {
    return counts;
  }
  for (const [category, raw] of Object.entries(value)) {
    if (!isEventCategory(category) || !isRecord(raw)) {
      continue;
    }
    const entry: InteractionCounts = { view: 0, like: 0, share: 0, purchase: 0 };
    for (const type of INTERACTION_TYPES) {
      const count = raw[type];
      entry[type] = typeof count === 'number' && Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
    }
    counts[category] = entry;
  }
  return counts;
}

/**
 * Reads a stored profile document. Unknown categories and malformed counters are
 * dropped rather than failing the read.
 */
export function normalizeInterestProfileRecord(data: unknown): InterestProfileSnapshot {
  const record = isRecord(data) ? data : {};
  const maxTravel = record.maxTravelDistanceKm;
  const city = record.preferredCity;

  return {
    preferredCategories: sanitizeCategoryList(record.preferredCategories),
    pricePreference: isPricePreference(record.pricePreference) ? record.pricePreference : null,
    preferredCity: typeof city === 'string' && city.trim().length > 0 ? city.trim() : null,
    maxTravelDistanceKm:
      typeof maxTravel === 'number' && Number.isFinite(maxTravel) && maxTravel > 0 ? maxTravel : null,
    followedOrganizerIds: Array.from(new Set(sanitizeStringList(record.followedOrganizerIds))),
    inferredWeights: sanitizeWeights(record.inferredWeights),
    interactionCounts: sanitizeCounts(record.interactionCounts),
    updatedAt: extractDate(record.updatedAt),
  };
}
