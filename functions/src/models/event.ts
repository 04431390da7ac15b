import { EventCategory } from './eventCategory';

export type EventStatus = 'draft' | 'published' | 'ongoing' | 'completed' | 'cancelled';

export const EVENT_STATUSES: readonly EventStatus[] = [
  'draft',
  'published',
  'ongoing',
  'completed',
  'cancelled',
];

export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface EventVenue {
  name: string;
  address: string;
  city: string;
  geo: GeoPoint;
}

export interface TicketType {
  id: string;
  name: string;
  price: number; // UGX
  quantity: number;
  sold: number;
}

export interface EventRating {
  mean: number;
  count: number;
}

export interface TicketedEvent {
  id: string;
  title: string;
  category: EventCategory;
  startTime: Date;
  endTime: Date;
  venue: EventVenue;
  ticketTypes: TicketType[];
  rating: EventRating;
  likeCount: number;
  createdAt: Date;
  organizerId: string;
  organizerName: string | null;
  status: EventStatus;
}

export interface PriceRange {
  min: number;
  max: number;
}

// Events nobody has rated yet carry this instead of a missing rating.
export const NO_RATING: EventRating = { mean: 0, count: 0 };

export function isEventStatus(value: unknown): value is EventStatus {
  return typeof value === 'string' && EVENT_STATUSES.some(status => status === value);
}

/**
 * Cheapest ticket on offer. An event without ticket types is free.
 */
export function minTicketPrice(event: TicketedEvent): number {
  if (event.ticketTypes.length === 0) {
    return 0;
  }
  return Math.min(...event.ticketTypes.map(ticket => ticket.price));
}

export function priceRange(event: TicketedEvent): PriceRange {
  if (event.ticketTypes.length === 0) {
    return { min: 0, max: 0 };
  }
  const prices = event.ticketTypes.map(ticket => ticket.price);
  return { min: Math.min(...prices), max: Math.max(...prices) };
}

export function isFreeEvent(event: TicketedEvent): boolean {
  return minTicketPrice(event) === 0;
}

export function ticketsSoldRatio(event: TicketedEvent): number {
  const total = event.ticketTypes.reduce((sum, ticket) => sum + ticket.quantity, 0);
  if (total <= 0) {
    return 0;
  }
  const sold = event.ticketTypes.reduce((sum, ticket) => sum + ticket.sold, 0);
  return sold / total;
}

export function hasStarted(event: TicketedEvent, now: Date): boolean {
  return now.getTime() >= event.startTime.getTime();
}

export function hasEnded(event: TicketedEvent, now: Date): boolean {
  return now.getTime() > event.endTime.getTime();
}

export function isHappeningNow(event: TicketedEvent, now: Date): boolean {
  return hasStarted(event, now) && !hasEnded(event, now);
}
