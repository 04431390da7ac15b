import { isHappeningNow } from '../models/event';
import { hasSignal, ScoredEvent } from './recommendationEngine';
import { INTEREST_SIGNALS } from './scoringSignals';

export type FeedSectionId =
  | 'happening-now'
  | 'recommended-for-you'
  | 'based-on-your-interests'
  | 'near-you'
  | 'popular-right-now'
  | 'this-weekend'
  | 'free-events';

export interface FeedSection {
  id: FeedSectionId;
  title: string;
  events: ScoredEvent[];
}

export interface FeedSectionDefinition {
  id: FeedSectionId;
  title: string;
  qualifies: (item: ScoredEvent, now: Date) => boolean;
}

export interface DiscoveryFeedBuilderOptions {
  /** Maximum events per section. */
  sectionSize?: number;
}

export const DEFAULT_SECTION_SIZE = 10;

// Priority order: an event lands in the first section it qualifies for.
export const FEED_SECTIONS: readonly FeedSectionDefinition[] = [
  {
    id: 'happening-now',
    title: 'Happening Now',
    qualifies: (item, now) => isHappeningNow(item.event, now),
  },
  {
    // Interest-matched events are held back for the interests rail below.
    id: 'recommended-for-you',
    title: 'Recommended for You',
    qualifies: item => !hasSignal(item, ...INTEREST_SIGNALS),
  },
  {
    id: 'based-on-your-interests',
    title: 'Based on Your Interests',
    qualifies: item => hasSignal(item, ...INTEREST_SIGNALS),
  },
  {
    id: 'near-you',
    title: 'Events Near You',
    qualifies: item => hasSignal(item, 'withinTravelRadius'),
  },
  {
    id: 'popular-right-now',
    title: 'Popular Right Now',
    qualifies: item => hasSignal(item, 'popularity'),
  },
  {
    id: 'this-weekend',
    title: 'This Weekend',
    qualifies: item => hasSignal(item, 'weekend') && hasSignal(item, 'upcomingSoon'),
  },
  {
    id: 'free-events',
    title: 'Free Events',
    qualifies: item => hasSignal(item, 'freeEvent'),
  },
];

/**
 * Splits an already-ranked list into named discovery rails without repeating an
 * event across rails. Rails keep the ranking's order.
 */
export class DiscoveryFeedBuilder {
  private readonly sectionSize: number;

  constructor(
    options: DiscoveryFeedBuilderOptions = {},
    private readonly sections: readonly FeedSectionDefinition[] = FEED_SECTIONS
  ) {
    const size = options.sectionSize ?? DEFAULT_SECTION_SIZE;
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError('sectionSize must be a positive integer');
    }
    this.sectionSize = size;
  }

  buildSections(scored: ScoredEvent[], now: Date): FeedSection[] {
    const placed = new Set<string>();
    const result: FeedSection[] = [];

    for (const definition of this.sections) {
      const events: ScoredEvent[] = [];
      for (const item of scored) {
        if (events.length >= this.sectionSize) {
          break;
        }
        if (placed.has(item.event.id) || !definition.qualifies(item, now)) {
          continue;
        }
        events.push(item);
        placed.add(item.event.id);
      }

      if (events.length > 0) {
        result.push({ id: definition.id, title: definition.title, events });
      }
    }

    return result;
  }
}
