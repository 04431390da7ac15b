import { EventRating, EventVenue, isEventStatus, NO_RATING, TicketedEvent, TicketType } from '../models/event';
import { isEventCategory } from '../models/eventCategory';

export type NormalizedEventResult =
  | { ok: true; event: TicketedEvent }
  | { ok: false; eventId: string; reason: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts Date instances, ISO strings, epoch milliseconds and Firestore
 * Timestamps (anything exposing `toDate()`).
 */
export function extractDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  if (isRecord(value) && typeof value.toDate === 'function') {
    const converted: unknown = value.toDate();
    return converted instanceof Date && !Number.isNaN(converted.getTime()) ? converted : null;
  }

  return null;
}

function readString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function readNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function sanitizeVenue(value: unknown): EventVenue | null {
  if (!isRecord(value)) {
    return null;
  }

  const city = readString(value.city);
  const geo = isRecord(value.geo) ? value.geo : null;
  const lat = geo ? readNumber(geo.lat) : null;
  const lng = geo ? readNumber(geo.lng) : null;
  if (!city || lat === null || lng === null) {
    return null;
  }

  return {
    name: readString(value.name) ?? '',
    address: readString(value.address) ?? '',
    city,
    geo: { lat, lng },
  };
}

function sanitizeTicketTypes(value: unknown): TicketType[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value
    .filter(isRecord)
    .map((ticket, index): TicketType | null => {
      const price = readNumber(ticket.price);
      if (price === null || price < 0) {
        return null;
      }
      return {
        id: readString(ticket.id) ?? `ticket-${index}`,
        name: readString(ticket.name) ?? 'General Admission',
        price,
        quantity: Math.max(0, readNumber(ticket.quantity) ?? 0),
        sold: Math.max(0, readNumber(ticket.sold) ?? 0),
      };
    })
    .filter((ticket): ticket is TicketType => ticket !== null);
}

function sanitizeRating(value: unknown): EventRating {
  if (!isRecord(value)) {
    return NO_RATING;
  }
  const mean = readNumber(value.mean);
  const count = readNumber(value.count);
  if (mean === null || count === null || count <= 0) {
    return NO_RATING;
  }
  return { mean: Math.min(5, Math.max(0, mean)), count: Math.floor(count) };
}

/**
 * Turns an untrusted event record (a Firestore document or a JSON body) into a
 * typed event, or explains why it cannot be scored.
 */
export function normalizeEventRecord(id: string, data: unknown): NormalizedEventResult {
  const reject = (reason: string): NormalizedEventResult => ({ ok: false, eventId: id, reason });

  if (!isRecord(data)) {
    return reject('record must be an object');
  }

  if (!isEventCategory(data.category)) {
    return reject('category is missing or unknown');
  }

  const startTime = extractDate(data.startTime);
  const endTime = extractDate(data.endTime);
  if (!startTime || !endTime) {
    return reject('startTime and endTime must be valid dates');
  }
  if (startTime.getTime() >= endTime.getTime()) {
    return reject('startTime must be before endTime');
  }

  const venue = sanitizeVenue(data.venue);
  if (!venue) {
    return reject('venue must include a city and numeric geo.lat / geo.lng');
  }

  const organizerId = readString(data.organizerId);
  if (!organizerId) {
    return reject('organizerId is required');
  }

  const status = data.status ?? 'published';
  if (!isEventStatus(status)) {
    return reject(`status "${String(status)}" is not a known event status`);
  }

  return {
    ok: true,
    event: {
      id,
      title: readString(data.title) ?? 'Untitled',
      category: data.category,
      startTime,
      endTime,
      venue,
      ticketTypes: sanitizeTicketTypes(data.ticketTypes),
      rating: sanitizeRating(data.rating),
      likeCount: Math.max(0, readNumber(data.likeCount) ?? 0),
      createdAt: extractDate(data.createdAt) ?? startTime,
      organizerId,
      organizerName: readString(data.organizerName),
      status,
    },
  };
}
