import { EventCategory, EVENT_CATEGORY_LABELS } from '../models/eventCategory';
import { priceRange, PriceRange } from '../models/event';
import { describeTicketSales, TicketSalesStatus } from '../models/ticketSales';
import { FeedSection, FeedSectionId } from '../services/discoveryFeedBuilder';
import { InterestProfile, InterestProfileSnapshot } from '../services/interestProfile';
import { ScoredEvent } from '../services/recommendationEngine';

export type SerializedScoredEvent = {
  eventId: string;
  title: string;
  category: EventCategory;
  categoryLabel: string;
  startTime: string;
  endTime: string;
  venue: {
    name: string;
    city: string;
  };
  organizerId: string;
  organizerName: string | null;
  priceRange: PriceRange;
  score: number;
  reasons: string[];
  ticketSales: TicketSalesStatus;
};

export type SerializedFeedSection = {
  id: FeedSectionId;
  title: string;
  events: SerializedScoredEvent[];
};

export type SerializedInterestProfile = Omit<InterestProfileSnapshot, 'updatedAt'> & {
  updatedAt: string | null;
  confidence: number;
  isNewUser: boolean;
  topCategories: EventCategory[];
};

export function serializeScoredEvent(item: ScoredEvent, now: Date): SerializedScoredEvent {
  const { event } = item;
  return {
    eventId: event.id,
    title: event.title,
    category: event.category,
    categoryLabel: EVENT_CATEGORY_LABELS[event.category],
    startTime: event.startTime.toISOString(),
    endTime: event.endTime.toISOString(),
    venue: {
      name: event.venue.name,
      city: event.venue.city,
    },
    organizerId: event.organizerId,
    organizerName: event.organizerName,
    priceRange: priceRange(event),
    score: item.score,
    reasons: item.reasons,
    ticketSales: describeTicketSales(event, now),
  };
}

export function serializeFeedSection(section: FeedSection, now: Date): SerializedFeedSection {
  return {
    id: section.id,
    title: section.title,
    events: section.events.map(item => serializeScoredEvent(item, now)),
  };
}

export function serializeInterestProfile(profile: InterestProfile): SerializedInterestProfile {
  return {
    ...profile.toSnapshot(),
    updatedAt: profile.updatedAt ? profile.updatedAt.toISOString() : null,
    confidence: profile.confidenceScore(),
    isNewUser: profile.isNewUser(),
    topCategories: profile.topCategories(),
  };
}
