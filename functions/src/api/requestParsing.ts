import { Response } from 'express';
import * as logger from 'firebase-functions/logger';
import { GeoPoint } from '../models/event';
import { EVENT_CATEGORIES, isEventCategory } from '../models/eventCategory';
import { CreateInteractionInput, INTERACTION_TYPES, isInteractionType } from '../models/interaction';
import { isPricePreference, PRICE_PREFERENCES } from '../models/pricing';
import { isRecord } from '../normalizers/eventRecordNormalizer';
import { InterestPreferences } from '../services/interestProfile';
import { isValidGeoPoint } from '../utils/geo';

export const MAX_INTERACTION_BATCH = 100;
export const MAX_RECOMMENDATION_LIMIT = 200;

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export interface RecommendationRequestBody {
  userId: string;
  now: Date | null;
  location: GeoPoint | null;
  limit: number | null;
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new RequestValidationError('request body must be a JSON object');
  }
  return body;
}

export function parseRequiredString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new RequestValidationError(`${fieldName} is required and must be a string`);
  }
  return value.trim();
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function parseOptionalDate(value: unknown, fieldName: string): Date | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new RequestValidationError(`${fieldName} must be an ISO date string`);
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new RequestValidationError(`${fieldName} must be a valid ISO date string`);
  }
  return parsed;
}

function parseLocation(value: unknown): GeoPoint | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isRecord(value) || typeof value.lat !== 'number' || typeof value.lng !== 'number') {
    throw new RequestValidationError('location must be an object with numeric lat and lng');
  }
  const point = { lat: value.lat, lng: value.lng };
  if (!isValidGeoPoint(point)) {
    throw new RequestValidationError('location lat/lng are out of range');
  }
  return point;
}

function parseLimit(value: unknown): number | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0 || value > MAX_RECOMMENDATION_LIMIT) {
    throw new RequestValidationError(`limit must be an integer between 1 and ${MAX_RECOMMENDATION_LIMIT}`);
  }
  return value;
}

export function parseRecommendationRequest(body: unknown): RecommendationRequestBody {
  const record = requireBody(body);
  return {
    userId: parseRequiredString(record.userId, 'userId'),
    now: parseOptionalDate(record.now, 'now'),
    location: parseLocation(record.location),
    limit: parseLimit(record.limit),
  };
}

export function parseInteraction(value: unknown, path = 'body'): CreateInteractionInput {
  if (!isRecord(value)) {
    throw new RequestValidationError(`${path} must be an object`);
  }
  if (!isEventCategory(value.category)) {
    throw new RequestValidationError(`${path}.category must be one of: ${EVENT_CATEGORIES.join(', ')}`);
  }
  if (!isInteractionType(value.type)) {
    throw new RequestValidationError(`${path}.type must be one of: ${INTERACTION_TYPES.join(', ')}`);
  }
  return {
    userId: parseRequiredString(value.userId, `${path}.userId`),
    eventId: parseRequiredString(value.eventId, `${path}.eventId`),
    category: value.category,
    type: value.type,
  };
}

/**
 * Validates every entry before returning, so a single bad entry rejects the batch.
 */
export function parseInteractionBatch(body: unknown): CreateInteractionInput[] {
  const record = requireBody(body);
  const entries = record.interactions;
  if (!Array.isArray(entries) || entries.length === 0 || entries.length > MAX_INTERACTION_BATCH) {
    throw new RequestValidationError(
      `interactions must be an array of 1 to ${MAX_INTERACTION_BATCH} entries`
    );
  }
  return entries.map((entry, index) => parseInteraction(entry, `interactions[${index}]`));
}

export function parsePreferencesPatch(body: unknown): Partial<InterestPreferences> {
  const record = requireBody(body);
  const patch: Partial<InterestPreferences> = {};

  const categories = record.preferredCategories;
  if (Array.isArray(categories) && categories.every(isEventCategory)) {
    patch.preferredCategories = Array.from(new Set(categories.filter(isEventCategory)));
  } else if (categories !== undefined) {
    throw new RequestValidationError(`preferredCategories must be an array of: ${EVENT_CATEGORIES.join(', ')}`);
  }

  const preference = record.pricePreference;
  if (preference === null || isPricePreference(preference)) {
    patch.pricePreference = preference;
  } else if (preference !== undefined) {
    throw new RequestValidationError(`pricePreference must be one of: ${PRICE_PREFERENCES.join(', ')}`);
  }

  const city = record.preferredCity;
  if (city === null) {
    patch.preferredCity = null;
  } else if (typeof city === 'string' && city.trim().length > 0) {
    patch.preferredCity = city.trim();
  } else if (city !== undefined) {
    throw new RequestValidationError('preferredCity must be a non-empty string or null');
  }

  const distance = record.maxTravelDistanceKm;
  if (distance === null) {
    patch.maxTravelDistanceKm = null;
  } else if (typeof distance === 'number' && Number.isFinite(distance) && distance > 0) {
    patch.maxTravelDistanceKm = distance;
  } else if (distance !== undefined) {
    throw new RequestValidationError('maxTravelDistanceKm must be a positive number or null');
  }

  const organizers = record.followedOrganizerIds;
  if (Array.isArray(organizers) && organizers.every(isNonEmptyString)) {
    const ids = organizers.filter(isNonEmptyString).map(id => id.trim());
    patch.followedOrganizerIds = Array.from(new Set(ids));
  } else if (organizers !== undefined) {
    throw new RequestValidationError('followedOrganizerIds must be an array of non-empty strings');
  }

  if (Object.keys(patch).length === 0) {
    throw new RequestValidationError('at least one preference field is required');
  }

  return patch;
}

/**
 * Validation failures become 400s; anything else is logged and answered with a 500.
 */
export function sendRouteError(res: Response, error: unknown, failure: string): void {
  if (error instanceof RequestValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  logger.error(failure, error);
  res.status(500).json({
    error: failure,
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}
