import { EventStatus, GeoPoint, hasEnded, isHappeningNow, TicketedEvent, TicketType } from '../models/event';
import { isEventCategory } from '../models/eventCategory';
import { distanceKm } from '../utils/geo';
import { InterestProfile } from './interestProfile';
import {
  INTEREST_SIGNALS,
  resolveScoringConfig,
  roundScore,
  ScoringConfig,
  ScoringConfigOverrides,
  SignalContext,
  SignalContribution,
  signalOrder,
  SIGNALS,
} from './scoringSignals';

const UNRANKED_STATUSES: ReadonlySet<EventStatus> = new Set(['draft', 'cancelled', 'completed']);

export interface ScoredEvent {
  event: TicketedEvent;
  score: number;
  /** At most `maxReasons` explanations, strongest first. */
  reasons: string[];
  /** Every applied signal, strongest first. */
  signals: SignalContribution[];
}

export interface SkippedEvent {
  eventId: string | null;
  reason: string;
}

export interface RankingResult {
  scored: ScoredEvent[];
  skipped: SkippedEvent[];
  coldStart: boolean;
}

/**
 * Deterministic multi-signal relevance scoring. Never reads the clock: callers pass
 * `now` and the user's location so identical inputs always rank identically.
 */
export class RecommendationEngine {
  readonly config: ScoringConfig;

  constructor(overrides: ScoringConfigOverrides = {}) {
    this.config = resolveScoringConfig(overrides);
  }

  score(
    events: TicketedEvent[],
    profile: InterestProfile,
    now: Date,
    userLocation: GeoPoint | null = null
  ): ScoredEvent[] {
    return this.rank(events, profile, now, userLocation).scored;
  }

  rank(
    events: TicketedEvent[],
    profile: InterestProfile,
    now: Date,
    userLocation: GeoPoint | null = null
  ): RankingResult {
    const coldStart = this.isColdStart(profile);
    const scored: ScoredEvent[] = [];
    const skipped: SkippedEvent[] = [];

    for (const event of events) {
      const problem = findEventProblem(event);
      if (problem) {
        skipped.push({
          eventId: typeof event?.id === 'string' ? event.id : null,
          reason: problem,
        });
        continue;
      }

      if (UNRANKED_STATUSES.has(event.status) || hasEnded(event, now)) {
        continue;
      }

      scored.push(this.scoreEvent(event, profile, now, userLocation, coldStart));
    }

    scored.sort(compareScoredEvents);

    return {
      scored: coldStart
        ? diversifyHead(
            scored,
            this.config.coldStartTopN,
            this.config.coldStartMaxPerCategory,
            // Live events fill their own section, not the head
            item => isHappeningNow(item.event, now)
          )
        : scored,
      skipped,
      coldStart,
    };
  }

  /**
   * New or nearly-new users without explicit category choices get a feed that
   * leans on popularity, recency and category variety instead of history.
   */
  isColdStart(profile: InterestProfile): boolean {
    if (profile.hasPreferredCategories()) {
      return false;
    }
    return profile.isNewUser() || profile.confidenceScore() < this.config.coldStartConfidenceFloor;
  }

  private scoreEvent(
    event: TicketedEvent,
    profile: InterestProfile,
    now: Date,
    userLocation: GeoPoint | null,
    coldStart: boolean
  ): ScoredEvent {
    const context: SignalContext = {
      event,
      profile,
      now,
      distanceKm: userLocation ? distanceKm(userLocation, event.venue.geo) : null,
      config: this.config,
    };

    const signals: SignalContribution[] = [];
    for (const signal of SIGNALS) {
      if (coldStart && INTEREST_SIGNALS.includes(signal.id)) {
        continue;
      }
      const result = signal.evaluate(context);
      if (result && result.contribution !== 0) {
        signals.push(result);
      }
    }

    const total = signals.reduce((sum, signal) => sum + signal.contribution, 0);
    const ordered = [...signals].sort(
      (a, b) => Math.abs(b.contribution) - Math.abs(a.contribution) || signalOrder(a.id) - signalOrder(b.id)
    );

    const reasons = ordered
      .filter(signal => signal.reason !== null && signal.contribution > this.config.reasonVisibilityThreshold)
      .slice(0, this.config.maxReasons)
      .map(signal => signal.reason ?? '');

    return {
      event,
      score: roundScore(total),
      reasons,
      signals: ordered,
    };
  }
}

export function hasSignal(item: ScoredEvent, ...ids: SignalContribution['id'][]): boolean {
  return item.signals.some(signal => ids.includes(signal.id));
}

/**
 * Highest score first, then soonest start, then id.
 */
export function compareScoredEvents(a: ScoredEvent, b: ScoredEvent): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  const startDelta = a.event.startTime.getTime() - b.event.startTime.getTime();
  if (startDelta !== 0) {
    return startDelta;
  }
  if (a.event.id < b.event.id) {
    return -1;
  }
  return a.event.id > b.event.id ? 1 : 0;
}

/**
 * Keeps at most `maxPerCategory` events of a category within the first `topN`
 * positions; events pushed out follow in their original order. Exempt events keep
 * their place and count toward neither limit.
 */
export function diversifyHead(
  ranked: ScoredEvent[],
  topN: number,
  maxPerCategory: number,
  isExempt: (item: ScoredEvent) => boolean = () => false
): ScoredEvent[] {
  const head: ScoredEvent[] = [];
  const deferred: ScoredEvent[] = [];
  const perCategory = new Map<string, number>();
  let headSize = 0;

  for (const item of ranked) {
    if (isExempt(item)) {
      head.push(item);
      continue;
    }
    const count = perCategory.get(item.event.category) ?? 0;
    if (headSize < topN && count < maxPerCategory) {
      head.push(item);
      headSize += 1;
      perCategory.set(item.event.category, count + 1);
    } else {
      deferred.push(item);
    }
  }

  return [...head, ...deferred];
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

// Events reach the engine from external catalogs; typed fields can still be missing at runtime.
function findEventProblem(event: TicketedEvent | null | undefined): string | null {
  if (!event || typeof event.id !== 'string' || event.id.length === 0) {
    return 'event id is missing';
  }
  if (!isEventCategory(event.category)) {
    return 'category is missing or unknown';
  }
  if (!isValidDate(event.startTime) || !isValidDate(event.endTime)) {
    return 'startTime and endTime must be valid dates';
  }
  if (event.startTime.getTime() >= event.endTime.getTime()) {
    return 'startTime must be before endTime';
  }
  if (!isValidDate(event.createdAt)) {
    return 'createdAt must be a valid date';
  }
  const { venue, rating, ticketTypes } = event;
  if (
    !venue ||
    typeof venue.city !== 'string' ||
    !venue.geo ||
    !Number.isFinite(venue.geo.lat) ||
    !Number.isFinite(venue.geo.lng)
  ) {
    return 'venue must include a city and numeric geo.lat / geo.lng';
  }
  if (!rating || !Number.isFinite(rating.mean) || !Number.isFinite(rating.count)) {
    return 'rating must have a numeric mean and count';
  }
  if (!Array.isArray(ticketTypes) || !ticketTypes.every(isValidTicketType)) {
    return 'ticketTypes must list tickets with numeric price, quantity and sold';
  }
  return null;
}

function isValidTicketType(ticket: TicketType | null | undefined): boolean {
  return (
    !!ticket &&
    Number.isFinite(ticket.price) &&
    Number.isFinite(ticket.quantity) &&
    Number.isFinite(ticket.sold)
  );
}
